import { hashTree, repr } from '@canopy/kernel-vm';
import { readTreeFile } from './tree-file.js';

export interface InspectResult {
  file: string;
  hash: string;
  nodes: number;
  repr: string;
}

export async function inspect(file: string): Promise<InspectResult> {
  const tree = await readTreeFile(file);
  return {
    file,
    hash: hashTree(tree),
    nodes: tree.reachable().length,
    repr: repr(tree),
  };
}
