import { z } from 'zod';
import { JsonValueSchema } from '@canopy/types';

// --- Tool calls ---

/** Positional arguments, or named ones mapped through the tool's parameter order. */
export const ToolArgumentsSchema = z.union([
  z.array(JsonValueSchema),
  z.record(z.string(), JsonValueSchema),
]);
export type ToolArguments = z.infer<typeof ToolArgumentsSchema>;

// --- Tree evaluation ---

export const EvaluateOptionsSchema = z.object({
  timeout_ms: z.number().int().positive().optional(),
  max_concurrency: z.number().int().positive().optional(),
  program_result: z.enum(['last', 'all']).optional(),
}).strict();

export const EvaluateInputSchema = z.object({
  tree: z.unknown().refine(v => v !== undefined, 'Required'),
  options: EvaluateOptionsSchema.optional(),
});
export type EvaluateInput = z.infer<typeof EvaluateInputSchema>;

export const ValidateInputSchema = z.object({
  tree: z.unknown().refine(v => v !== undefined, 'Required'),
  allow_placeholders: z.boolean().optional(),
});
export type ValidateInput = z.infer<typeof ValidateInputSchema>;
