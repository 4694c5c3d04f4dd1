import type {
  JsonValue,
  ParameterSchema,
  ToolCategory,
  ToolDescriptor,
} from '@canopy/types';

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * The capability the evaluator uses to run a named primitive operation.
 * Implemented by the local ToolRegistry and by remote clients.
 */
export interface ToolProvider {
  listTools(): Promise<ToolDescriptor[]>;
  call(name: string, args: readonly JsonValue[], options?: CallOptions): Promise<JsonValue>;
}

export interface ToolDefinition {
  readonly name: string;
  readonly version: string;
  readonly category: ToolCategory;
  readonly description: string;
  /** Property order is the positional argument order. */
  readonly parameter_schema: ParameterSchema;

  execute(args: readonly JsonValue[], options: CallOptions): JsonValue | Promise<JsonValue>;
}

export function parameterNames(schema: ParameterSchema): string[] {
  return Object.keys(schema.properties);
}

export function describeTool(tool: ToolDefinition): ToolDescriptor {
  return {
    name: tool.name,
    description: tool.description,
    parameter_schema: tool.parameter_schema,
  };
}
