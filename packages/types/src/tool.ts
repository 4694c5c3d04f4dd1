import { z } from 'zod';
import { JsonValueSchema } from './json.js';

export const ToolCategorySchema = z.enum([
  'arithmetic',
  'comparison',
  'list',
  'compiled',
  'remote',
]);
export type ToolCategory = z.infer<typeof ToolCategorySchema>;

export const ParameterTypeSchema = z.enum(['number', 'integer', 'string', 'boolean', 'array', 'object', 'null']);
export type ParameterType = z.infer<typeof ParameterTypeSchema>;

export const ParameterPropertySchema = z.object({
  type: ParameterTypeSchema.optional(),
  description: z.string().optional(),
}).passthrough();
export type ParameterProperty = z.infer<typeof ParameterPropertySchema>;

/** JSON-schema subset describing a tool's parameters. Property order is the positional order. */
export const ParameterSchemaSchema = z.object({
  type: z.literal('object'),
  properties: z.record(z.string(), ParameterPropertySchema),
  required: z.array(z.string()).optional(),
}).passthrough();
export type ParameterSchema = z.infer<typeof ParameterSchemaSchema>;

export const ToolDescriptorSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  parameter_schema: ParameterSchemaSchema,
});
export type ToolDescriptor = z.infer<typeof ToolDescriptorSchema>;

// --- Tool call envelopes (MCP-style) ---

export const ToolCallRequestSchema = z.object({
  tool: z.string().min(1),
  arguments: z.union([z.array(JsonValueSchema), z.record(z.string(), JsonValueSchema)]),
});
export type ToolCallRequest = z.infer<typeof ToolCallRequestSchema>;

export const TextContentSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});
export type TextContent = z.infer<typeof TextContentSchema>;

export const ToolCallResponseSchema = z.object({
  content: z.array(TextContentSchema),
  isError: z.boolean().optional(),
});
export type ToolCallResponse = z.infer<typeof ToolCallResponseSchema>;
