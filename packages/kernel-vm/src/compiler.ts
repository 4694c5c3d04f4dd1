import {
  JsonValueSchema,
  type JsonValue,
  type ParameterProperty,
  type ParameterSchema,
  type ParameterType,
} from '@canopy/types';
import type { Tree, NodeId } from './node.js';
import type { ToolDefinition, ToolProvider } from './tool.js';
import { BindingError } from './errors.js';
import { evaluate, toJsonValue, type EvalValue, type EvaluateOptions, type EvaluationResult } from './evaluator.js';

export interface CompileOptions {
  /**
   * Bind a declared parameter to exactly these value-node identities instead
   * of every leaf sharing its name.
   */
  overrides?: Record<string, readonly NodeId[]>;
  name?: string;
  description?: string;
  /** Defaults for every call; per-call options win. */
  evaluate?: EvaluateOptions;
}

export interface CompiledTool {
  readonly name: string;
  readonly description: string;
  readonly params: readonly string[];
  /** Declared parameter -> identities of the value leaves it overwrites. */
  readonly bindings: ReadonlyMap<string, readonly NodeId[]>;
  readonly parameter_schema: ParameterSchema;
  readonly tree: Tree;

  /** Binds the arguments and evaluates. Binding problems throw; evaluation failures are in the result. */
  evaluate(args: Record<string, JsonValue>, options?: EvaluateOptions): Promise<EvaluationResult>;
  /** Like evaluate(), but returns the value or throws the evaluation error. */
  call(args: Record<string, JsonValue>, options?: EvaluateOptions): Promise<EvalValue>;
}

/**
 * Turn a resolved tree into a reusable callable. Each call overwrites the
 * bound leaves in a fresh copy of the tree and evaluates the copy; the
 * compiled tree itself is never modified.
 */
export function compile(
  tree: Tree,
  declared: readonly string[],
  provider: ToolProvider,
  options: CompileOptions = {},
): CompiledTool {
  const bindings = bind(tree, declared, options.overrides ?? {});
  const params = [...declared];

  const properties: Record<string, ParameterProperty> = {};
  for (const param of params) {
    const first = bindings.get(param)?.[0];
    const leaf = first === undefined ? undefined : tree.node(first);
    const type = leaf?.kind === 'value' && !leaf.placeholder ? typeOf(leaf.value) : undefined;
    properties[param] = type ? { type } : {};
  }

  const bindArgs = (args: Record<string, JsonValue>): Map<NodeId, JsonValue> => {
    const overrides = new Map<NodeId, JsonValue>();
    for (const key of Object.keys(args)) {
      if (!bindings.has(key)) {
        throw new BindingError(`Unknown argument: ${key}`, key);
      }
    }
    for (const param of params) {
      if (!Object.prototype.hasOwnProperty.call(args, param)) {
        throw new BindingError(`Missing argument: ${param}`, param);
      }
      const parsed = JsonValueSchema.safeParse(args[param]);
      if (!parsed.success) {
        throw new BindingError(`Argument ${param} is not a JSON value`, param);
      }
      for (const id of bindings.get(param) ?? []) {
        overrides.set(id, parsed.data);
      }
    }
    return overrides;
  };

  const run = async (args: Record<string, JsonValue>, callOptions: EvaluateOptions = {}) =>
    evaluate(tree.withValues(bindArgs(args)), provider, { ...options.evaluate, ...callOptions });

  return {
    name: options.name ?? 'compiled_tree',
    description: options.description ?? `Compiled tree taking (${params.join(', ')})`,
    params,
    bindings,
    parameter_schema: { type: 'object', properties, required: params },
    tree,

    evaluate: run,

    async call(args, callOptions) {
      const result = await run(args, callOptions);
      if (!result.success) throw result.error;
      return result.value;
    },
  };
}

/** Expose a compiled tree as a tool, so it can be registered and called by other trees. */
export function toToolDefinition(compiled: CompiledTool, version = '1.0.0'): ToolDefinition {
  return {
    name: compiled.name,
    version,
    category: 'compiled',
    description: compiled.description,
    parameter_schema: compiled.parameter_schema,

    async execute(args, options) {
      const named: Record<string, JsonValue> = {};
      compiled.params.forEach((param, i) => {
        named[param] = args[i] ?? null;
      });
      return toJsonValue(await compiled.call(named, { signal: options.signal }));
    },
  };
}

function bind(
  tree: Tree,
  declared: readonly string[],
  overrides: Record<string, readonly NodeId[]>,
): Map<string, NodeId[]> {
  const seen = new Set<string>();
  for (const param of declared) {
    if (seen.has(param)) {
      throw new BindingError(`Duplicate parameter: ${param}`, param);
    }
    seen.add(param);
  }

  const reachable = new Set(tree.reachable());
  const lambdaBound = lambdaBoundLeaves(tree);
  const claimedBy = new Map<NodeId, string>();
  const bindings = new Map<string, NodeId[]>();

  // Explicit identities first; name matching skips whatever they claim.
  for (const [param, ids] of Object.entries(overrides)) {
    if (!seen.has(param)) {
      throw new BindingError(`Override for undeclared parameter: ${param}`, param);
    }
    if (ids.length === 0) {
      throw new BindingError(`Override for ${param} lists no nodes`, param);
    }
    for (const id of ids) {
      const node = tree.has(id) && reachable.has(id) ? tree.node(id) : undefined;
      if (!node || node.kind !== 'value') {
        throw new BindingError(`Override for ${param}: node ${id} is not a value leaf of this tree`, param);
      }
      if (lambdaBound.has(id)) {
        throw new BindingError(`Override for ${param}: ${tree.label(id)} is bound by an enclosing lambda`, param);
      }
      const owner = claimedBy.get(id);
      if (owner !== undefined && owner !== param) {
        throw new BindingError(`${tree.label(id)} is claimed by both ${owner} and ${param}`, param);
      }
      claimedBy.set(id, param);
    }
    bindings.set(param, [...new Set(ids)]);
  }

  for (const param of declared) {
    if (bindings.has(param)) continue;
    const named = tree.values().filter(leaf => leaf.name === param && !lambdaBound.has(leaf.id));
    const free = named.filter(leaf => !claimedBy.has(leaf.id));
    if (free.length === 0) {
      throw new BindingError(
        named.length === 0
          ? `Parameter ${param} matches no value leaf`
          : `Parameter ${param}: every matching leaf is claimed by an override`,
        param,
      );
    }
    for (const leaf of free) claimedBy.set(leaf.id, param);
    bindings.set(param, free.map(leaf => leaf.id));
  }

  // Keep declaration order.
  return new Map(declared.map(param => [param, bindings.get(param) ?? []]));
}

/** Value leaves that an enclosing lambda binds by name on some path from the root. */
function lambdaBoundLeaves(tree: Tree): Set<NodeId> {
  const bound = new Set<NodeId>();
  const visited = new Set<string>();

  const walk = (id: NodeId, scope: readonly string[]): void => {
    const key = `${id}|${scope.join(',')}`;
    if (visited.has(key)) return;
    visited.add(key);

    const node = tree.node(id);
    if (node.kind === 'value') {
      if (scope.includes(node.name)) bound.add(id);
      return;
    }
    if (node.kind === 'lambda') {
      // Lambdas capture nothing: the body sees only their own parameters.
      walk(node.body, [...node.params].sort());
      return;
    }
    for (const child of tree.children(id)) walk(child, scope);
  };

  walk(tree.root, []);
  return bound;
}

function typeOf(value: JsonValue): ParameterType {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'number': return 'number';
    case 'string': return 'string';
    case 'boolean': return 'boolean';
    default: return 'object';
  }
}
