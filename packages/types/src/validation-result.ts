import { z } from 'zod';

export const TreeValidationErrorSchema = z.object({
  path: z.string(),
  error: z.string(),
  suggestion: z.string().optional(),
});
export type TreeValidationError = z.infer<typeof TreeValidationErrorSchema>;

export const TreeValidationResultSchema = z.object({
  valid: z.boolean(),
  errors: z.array(TreeValidationErrorSchema),
  tools_used: z.array(z.string()),
  estimated_complexity: z.number(),
});
export type TreeValidationResult = z.infer<typeof TreeValidationResultSchema>;
