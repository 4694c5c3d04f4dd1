import type { JsonValue, ToolDescriptor } from '@canopy/types';
import {
  ToolInvocationError,
  parameterNames,
  type CallOptions,
  type ToolRegistry,
} from '@canopy/kernel-vm';
import { ToolArgumentsSchema } from './schemas.js';

export class MCPError extends Error {
  constructor(message: string, public readonly code: 'NOT_FOUND' | 'VALIDATION' | 'TOOL_FAILED') {
    super(message);
    this.name = 'MCPError';
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

export class MCPValidationError extends MCPError {
  constructor(message: string, public readonly issues: ValidationIssue[]) {
    super(message, 'VALIDATION');
    this.name = 'MCPValidationError';
  }
}

export interface MCPToolRouter {
  readonly registry: ToolRegistry;
  listTools(): ToolDescriptor[];
  callTool(name: string, input: unknown, options?: CallOptions): Promise<JsonValue>;
}

export function createMCPToolRouter(registry: ToolRegistry): MCPToolRouter {
  return {
    registry,

    listTools(): ToolDescriptor[] {
      return registry.list();
    },

    async callTool(name, input, options = {}) {
      const tool = registry.get(name);
      if (!tool) {
        throw new MCPError(`Unknown tool: ${name}`, 'NOT_FOUND');
      }

      const parsed = ToolArgumentsSchema.safeParse(input);
      if (!parsed.success) {
        throw new MCPValidationError(
          `Invalid input for ${name}`,
          parsed.error.issues.map(issue => ({
            path: issue.path.join('.'),
            message: issue.message,
            code: issue.code,
          })),
        );
      }

      const args = Array.isArray(parsed.data)
        ? parsed.data
        : positional(name, parameterNames(tool.parameter_schema), parsed.data);

      try {
        return await registry.call(name, args, options);
      } catch (err) {
        if (err instanceof ToolInvocationError) {
          if (err.code === 'INVALID_ARGUMENTS') {
            throw new MCPValidationError(`Invalid input for ${name}`, [
              { path: '', message: err.message, code: 'invalid_arguments' },
            ]);
          }
          throw new MCPError(err.message, 'TOOL_FAILED');
        }
        throw err;
      }
    },
  };
}

/** Orders named arguments by the tool's parameters; trailing optional ones may be left out. */
function positional(tool: string, names: string[], input: Record<string, JsonValue>): JsonValue[] {
  const issues: ValidationIssue[] = Object.keys(input)
    .filter(key => !names.includes(key))
    .map(key => ({ path: key, message: `Unknown argument: ${key}`, code: 'unrecognized_keys' }));

  const has = (name: string): boolean => Object.prototype.hasOwnProperty.call(input, name);
  const last = names.reduce((found, name, i) => (has(name) ? i : found), -1);
  const args: JsonValue[] = [];
  for (const name of names.slice(0, last + 1)) {
    const value = has(name) ? input[name] : undefined;
    if (value === undefined) {
      issues.push({ path: name, message: `Missing argument: ${name}`, code: 'invalid_type' });
    } else {
      args.push(value);
    }
  }

  if (issues.length > 0) {
    throw new MCPValidationError(`Invalid input for ${tool}`, issues);
  }
  return args;
}
