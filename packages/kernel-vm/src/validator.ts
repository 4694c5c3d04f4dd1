import type { ToolDescriptor, TreeValidationResult, TreeValidationError } from '@canopy/types';
import type { Tree, NodeId } from './node.js';

const MAX_DEPTH = 50;

export interface ValidateOptions {
  /** Accept placeholders no lambda binds, e.g. for trees about to be compiled. */
  allow_placeholders?: boolean;
}

// Field names under which each node kind holds its children, in child order.
const CHILD_FIELDS: Record<string, (count: number) => string[]> = {
  function: count => Array.from({ length: count }, (_, i) => `params[${i}]`),
  lambda: () => ['body'],
  map: () => ['function', 'iterable'],
  filter: () => ['function', 'iterable'],
  reduce: count => ['function', 'iterable', 'initial'].slice(0, count),
  conditional: () => ['predicate', 'consequent', 'alternate'],
  program: count => Array.from({ length: count }, (_, i) => `body[${i}]`),
};

export function validateTree(
  tree: Tree,
  tools: readonly ToolDescriptor[],
  options: ValidateOptions = {},
): TreeValidationResult {
  const errors: TreeValidationError[] = [];
  const toolsUsed = new Set<string>();
  const catalog = new Map(tools.map(t => [t.name, t]));
  const visited = new Set<string>();
  const checked = new Set<NodeId>();
  let complexity = 0;

  function walk(id: NodeId, path: string, depth: number, scope: readonly string[]): void {
    if (depth > MAX_DEPTH) {
      errors.push({
        path,
        error: `Maximum tree depth (${MAX_DEPTH}) exceeded`,
      });
      return;
    }

    const key = `${id}|${scope.join(',')}`;
    if (visited.has(key)) return;
    visited.add(key);

    const node = tree.node(id);
    if (!checked.has(id)) {
      checked.add(id);
      complexity++;

      if (node.kind === 'function') {
        const tool = catalog.get(node.name);
        if (!tool) {
          const suggestion = closest(node.name, [...catalog.keys()]);
          errors.push({
            path,
            error: `Unknown tool: ${node.name}`,
            ...(suggestion ? { suggestion: `Did you mean ${suggestion}?` } : {}),
          });
        } else {
          toolsUsed.add(node.name);
          const expected = Object.keys(tool.parameter_schema.properties);
          const min = tool.parameter_schema.required?.length ?? expected.length;
          if (node.params.length < min || node.params.length > expected.length) {
            const count = min === expected.length ? `${min}` : `${min}-${expected.length}`;
            errors.push({
              path,
              error: `${node.name} expects ${count} param(s) (${expected.join(', ')}), got ${node.params.length}`,
            });
          }
        }
      }
    }

    if (node.kind === 'value') {
      if (node.placeholder && !options.allow_placeholders && !scope.includes(node.name)) {
        errors.push({ path, error: `Unbound parameter: ${node.name}` });
      }
      return;
    }

    const children = tree.children(id);
    const fields = CHILD_FIELDS[node.kind]?.(children.length) ?? [];
    const childScope = node.kind === 'lambda' ? [...node.params].sort() : scope;
    children.forEach((child, i) => {
      walk(child, `${path}.${fields[i] ?? i}`, depth + 1, childScope);
    });
  }

  walk(tree.root, 'root', 0, []);

  return {
    valid: errors.length === 0,
    errors,
    tools_used: Array.from(toolsUsed),
    estimated_complexity: complexity,
  };
}

/** Closest candidate within edit distance 2, if any. */
function closest(name: string, candidates: string[]): string | undefined {
  let best: string | undefined;
  let bestDistance = 3;
  for (const candidate of candidates) {
    const d = editDistance(name, candidate);
    if (d < bestDistance) {
      best = candidate;
      bestDistance = d;
    }
  }
  return best;
}

function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost,
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}
