import { readFile } from 'fs/promises';
import { z } from 'zod';
import {
  compile,
  parseDocument,
  toToolDefinition,
  validateTree,
  type ToolDefinition,
  type ToolProvider,
} from '@canopy/kernel-vm';

/** A tree published as a tool: the tree plus the value leaves its callers set. */
export const CompiledToolFileSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  version: z.string().regex(/^\d+\.\d+\.\d+$/).optional(),
  params: z.array(z.string().min(1)),
  overrides: z.record(z.string(), z.array(z.number().int().nonnegative())).optional(),
  tree: z.unknown(),
}).strict();
export type CompiledToolFile = z.infer<typeof CompiledToolFileSchema>;

/**
 * Compiles a tool file against the tools `provider` lists now. A tree may
 * only call tools already registered, so a tool cannot reach itself.
 */
export async function loadCompiledTool(path: string, provider: ToolProvider): Promise<ToolDefinition> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
  const parsed = CompiledToolFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new Error(`Invalid tool file ${path}: ${issues.join('; ')}`);
  }
  const file = parsed.data;
  const tree = parseDocument(file.tree);

  const check = validateTree(tree, await provider.listTools(), { allow_placeholders: true });
  if (!check.valid) {
    const errors = check.errors.map(e => `${e.path}: ${e.error}`);
    throw new Error(`Invalid tool file ${path}: ${errors.join('; ')}`);
  }
  // A new version of an existing tool would otherwise resolve to itself.
  if (check.tools_used.includes(file.name)) {
    throw new Error(`Invalid tool file ${path}: ${file.name} calls itself`);
  }

  const compiled = compile(tree, file.params, provider, {
    name: file.name,
    description: file.description,
    overrides: file.overrides,
  });
  return toToolDefinition(compiled, file.version);
}
