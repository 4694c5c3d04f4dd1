import { ParseError, createDefaultToolRegistry, validateTree } from '@canopy/kernel-vm';
import type { TreeValidationResult } from '@canopy/types';
import { readTreeFile } from './tree-file.js';

export interface LintResult {
  valid: boolean;
  file: string;
  errors: Array<{ path: string; error: string; suggestion?: string }>;
  toolsUsed: string[];
  complexity: number;
}

export async function lint(file: string, options: { allowPlaceholders?: boolean } = {}): Promise<LintResult> {
  const tree = await readTreeFile(file).catch((err: unknown) => {
    if (err instanceof ParseError) return err;
    throw err;
  });
  if (tree instanceof ParseError) {
    return {
      valid: false,
      file,
      errors: [{ path: tree.path, error: tree.detail }],
      toolsUsed: [],
      complexity: 0,
    };
  }

  const registry = createDefaultToolRegistry();
  const result: TreeValidationResult = validateTree(tree, registry.list(), {
    allow_placeholders: options.allowPlaceholders,
  });

  return {
    valid: result.valid,
    file,
    errors: result.errors,
    toolsUsed: result.tools_used,
    complexity: result.estimated_complexity,
  };
}
