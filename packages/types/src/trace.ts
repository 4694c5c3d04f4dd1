import { z } from 'zod';
import { JsonValueSchema, type JsonValue } from './json.js';

// --- Tool call trace ---

export interface ToolCallTrace {
  node_id: number;
  label: string;
  tool: string;
  args: JsonValue[];
  output: JsonValue | null;
  duration_ms: number;
  status: 'success' | 'error' | 'cancelled';
  error?: { message: string; code?: string };
}

export const ToolCallTraceSchema: z.ZodType<ToolCallTrace> = z.object({
  node_id: z.number().int().nonnegative(),
  label: z.string(),
  tool: z.string(),
  args: z.array(JsonValueSchema),
  output: JsonValueSchema,
  duration_ms: z.number(),
  status: z.enum(['success', 'error', 'cancelled']),
  error: z.object({
    message: z.string(),
    code: z.string().optional(),
  }).optional(),
});

export const EvaluationStatusSchema = z.enum(['success', 'failed', 'cancelled']);
export type EvaluationStatus = z.infer<typeof EvaluationStatusSchema>;
