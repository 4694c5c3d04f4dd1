import { readFile } from 'fs/promises';
import { parseDocument, type Tree } from '@canopy/kernel-vm';

/** Reads a tree file (a `{ schema_version, ast }` envelope or a bare node). */
export async function readTreeFile(file: string): Promise<Tree> {
  const text = await readFile(file, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
  return parseDocument(raw);
}
