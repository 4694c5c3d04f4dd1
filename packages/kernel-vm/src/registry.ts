import type { JsonValue, ParameterType, ToolDescriptor } from '@canopy/types';
import type { CallOptions, ToolDefinition, ToolProvider } from './tool.js';
import { describeTool, parameterNames } from './tool.js';
import { ToolInvocationError, errorMessage } from './errors.js';

export class ToolRegistry implements ToolProvider {
  // Map<name, Map<version, ToolDefinition>>
  private tools = new Map<string, Map<string, ToolDefinition>>();

  register(tool: ToolDefinition): void {
    let versions = this.tools.get(tool.name);
    if (!versions) {
      versions = new Map();
      this.tools.set(tool.name, versions);
    }
    if (versions.has(tool.version)) {
      throw new Error(
        `Tool ${tool.name}@${tool.version} is already registered`
      );
    }
    versions.set(tool.version, tool);
  }

  /** Get the latest version of a tool by name. */
  get(name: string): ToolDefinition | undefined {
    const versions = this.tools.get(name);
    if (!versions || versions.size === 0) return undefined;
    return this.latestVersion(versions);
  }

  list(): ToolDescriptor[] {
    const result: ToolDescriptor[] = [];
    for (const versions of this.tools.values()) {
      const latest = this.latestVersion(versions);
      if (latest) result.push(describeTool(latest));
    }
    return result;
  }

  async listTools(): Promise<ToolDescriptor[]> {
    return this.list();
  }

  async call(name: string, args: readonly JsonValue[], options: CallOptions = {}): Promise<JsonValue> {
    const tool = this.get(name);
    if (!tool) {
      throw new ToolInvocationError(`Unknown tool: ${name}`, 'UNKNOWN_TOOL', name);
    }
    checkArguments(tool, args);

    try {
      return await tool.execute(args, options);
    } catch (err) {
      if (err instanceof ToolInvocationError) throw err;
      throw new ToolInvocationError(errorMessage(err), 'TOOL_FAILED', name, { cause: err });
    }
  }

  private latestVersion(
    versions: Map<string, ToolDefinition>
  ): ToolDefinition | undefined {
    let latest: ToolDefinition | undefined;
    let latestParts: number[] = [];
    for (const tool of versions.values()) {
      const parts = tool.version.split('.').map(Number);
      if (!latest || this.compareVersions(parts, latestParts) > 0) {
        latest = tool;
        latestParts = parts;
      }
    }
    return latest;
  }

  private compareVersions(a: number[], b: number[]): number {
    for (let i = 0; i < Math.max(a.length, b.length); i++) {
      const av = a[i] ?? 0;
      const bv = b[i] ?? 0;
      if (av !== bv) return av - bv;
    }
    return 0;
  }
}

function checkArguments(tool: ToolDefinition, args: readonly JsonValue[]): void {
  const schema = tool.parameter_schema;
  const names = parameterNames(schema);
  const min = schema.required?.length ?? names.length;

  if (args.length < min || args.length > names.length) {
    const expected = min === names.length ? `${names.length}` : `${min}-${names.length}`;
    throw new ToolInvocationError(
      `${tool.name} expects ${expected} argument(s) (${names.join(', ')}), got ${args.length}`,
      'INVALID_ARGUMENTS',
      tool.name,
    );
  }

  args.forEach((arg, i) => {
    const name = names[i];
    const type = name === undefined ? undefined : schema.properties[name]?.type;
    if (type && !matchesType(arg, type)) {
      throw new ToolInvocationError(
        `${tool.name}: argument ${name} must be ${type}, got ${JSON.stringify(arg)}`,
        'INVALID_ARGUMENTS',
        tool.name,
      );
    }
  });
}

export function matchesType(value: JsonValue, type: ParameterType): boolean {
  switch (type) {
    case 'number': return typeof value === 'number';
    case 'integer': return typeof value === 'number' && Number.isInteger(value);
    case 'string': return typeof value === 'string';
    case 'boolean': return typeof value === 'boolean';
    case 'array': return Array.isArray(value);
    case 'object': return typeof value === 'object' && value !== null && !Array.isArray(value);
    case 'null': return value === null;
  }
}
