import type { JsonValue } from '@canopy/types';
import { StructuralError } from './errors.js';

/** Arena index of a node. Stable for the lifetime of a tree and its copies. */
export type NodeId = number;

export interface ValueNode {
  readonly kind: 'value';
  readonly id: NodeId;
  readonly name: string;
  readonly value: JsonValue;
  /** No literal: must be bound by a lambda or the tool compiler before evaluation. */
  readonly placeholder: boolean;
}

export interface FunctionNode {
  readonly kind: 'function';
  readonly id: NodeId;
  readonly name: string;
  readonly params: readonly NodeId[];
}

export interface LambdaNode {
  readonly kind: 'lambda';
  readonly id: NodeId;
  readonly params: readonly string[];
  readonly body: NodeId;
}

export interface MapNode {
  readonly kind: 'map';
  readonly id: NodeId;
  readonly function: NodeId;
  readonly iterable: NodeId;
}

export interface FilterNode {
  readonly kind: 'filter';
  readonly id: NodeId;
  readonly function: NodeId;
  readonly iterable: NodeId;
}

export interface ReduceNode {
  readonly kind: 'reduce';
  readonly id: NodeId;
  readonly function: NodeId;
  readonly iterable: NodeId;
  readonly initial?: NodeId;
}

export interface ConditionalNode {
  readonly kind: 'conditional';
  readonly id: NodeId;
  readonly predicate: NodeId;
  readonly consequent: NodeId;
  readonly alternate: NodeId;
}

export interface ProgramNode {
  readonly kind: 'program';
  readonly id: NodeId;
  readonly body: readonly NodeId[];
  readonly name?: string;
  readonly description?: string;
}

export type TreeNode =
  | ValueNode
  | FunctionNode
  | LambdaNode
  | MapNode
  | FilterNode
  | ReduceNode
  | ConditionalNode
  | ProgramNode;

/** Child ids in declaration order. */
export function childrenOf(node: TreeNode): NodeId[] {
  switch (node.kind) {
    case 'value':
      return [];
    case 'function':
      return [...node.params];
    case 'lambda':
      return [node.body];
    case 'map':
    case 'filter':
      return [node.function, node.iterable];
    case 'reduce':
      return node.initial === undefined
        ? [node.function, node.iterable]
        : [node.function, node.iterable, node.initial];
    case 'conditional':
      return [node.predicate, node.consequent, node.alternate];
    case 'program':
      return [...node.body];
  }
}

/**
 * An immutable, rooted program tree. Nodes live in an arena and reference
 * children by id; a child always has a lower id than its parents, so the
 * graph is acyclic by construction. A node may have several parents.
 */
export class Tree {
  private labels?: Map<NodeId, string>;
  private parentIndex?: Map<NodeId, NodeId[]>;
  private order?: NodeId[];

  /** @internal Use TreeBuilder or parse() to create trees. */
  constructor(
    private readonly nodes: readonly TreeNode[],
    public readonly root: NodeId,
  ) {}

  get size(): number {
    return this.nodes.length;
  }

  has(id: NodeId): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.nodes.length;
  }

  node(id: NodeId): TreeNode {
    const node = this.has(id) ? this.nodes[id] : undefined;
    if (!node) {
      throw new StructuralError(`Unknown node reference: ${id}`);
    }
    return node;
  }

  get rootNode(): TreeNode {
    return this.node(this.root);
  }

  children(id: NodeId): NodeId[] {
    return childrenOf(this.node(id));
  }

  /** Ids reachable from the root, depth-first pre-order, each once. */
  reachable(): readonly NodeId[] {
    if (!this.order) {
      const seen = new Set<NodeId>();
      const order: NodeId[] = [];
      const visit = (id: NodeId): void => {
        if (seen.has(id)) return;
        seen.add(id);
        order.push(id);
        for (const child of this.children(id)) visit(child);
      };
      visit(this.root);
      this.order = order;
    }
    return this.order;
  }

  /** Distinct parents of a reachable node, in discovery order. */
  parents(id: NodeId): readonly NodeId[] {
    if (!this.parentIndex) {
      const index = new Map<NodeId, NodeId[]>();
      for (const parent of this.reachable()) {
        for (const child of this.children(parent)) {
          const list = index.get(child) ?? [];
          if (!list.includes(parent)) list.push(parent);
          index.set(child, list);
        }
      }
      this.parentIndex = index;
    }
    return this.parentIndex.get(id) ?? [];
  }

  /** `<name>_<n>` for functions and values, `<kind>_<n>` otherwise, numbered in pre-order. */
  label(id: NodeId): string {
    if (!this.labels) {
      const labels = new Map<NodeId, string>();
      const counts = new Map<string, number>();
      for (const reachableId of this.reachable()) {
        const node = this.node(reachableId);
        const key = node.kind === 'function' || node.kind === 'value' ? node.name : node.kind;
        const n = (counts.get(key) ?? 0) + 1;
        counts.set(key, n);
        labels.set(reachableId, `${key}_${n}`);
      }
      this.labels = labels;
    }
    return this.labels.get(id) ?? `${this.node(id).kind}#${id}`;
  }

  /** Reachable value leaves in pre-order. */
  values(): ValueNode[] {
    const out: ValueNode[] = [];
    for (const id of this.reachable()) {
      const node = this.node(id);
      if (node.kind === 'value') out.push(node);
    }
    return out;
  }

  /**
   * A copy in which the given value nodes carry new literals (and are no
   * longer placeholders). This tree is left untouched.
   */
  withValues(overrides: ReadonlyMap<NodeId, JsonValue>): Tree {
    const nodes = [...this.nodes];
    for (const [id, value] of overrides) {
      const node = this.node(id);
      if (node.kind !== 'value') {
        throw new StructuralError(`Node ${id} is a ${node.kind}, not a value`, node.kind);
      }
      nodes[id] = Object.freeze({ ...node, value, placeholder: false });
    }
    return new Tree(nodes, this.root);
  }
}

/** Builds a tree bottom-up; every reference must point at an already-built node. */
export class TreeBuilder {
  private readonly nodes: TreeNode[] = [];

  get size(): number {
    return this.nodes.length;
  }

  value(name: string, value: JsonValue): NodeId {
    requireName(name, 'value');
    return this.push(id => ({ kind: 'value', id, name, value, placeholder: false }));
  }

  placeholder(name: string): NodeId {
    requireName(name, 'value');
    return this.push(id => ({ kind: 'value', id, name, value: null, placeholder: true }));
  }

  fn(name: string, params: readonly NodeId[]): NodeId {
    requireName(name, 'function');
    for (const p of params) this.ref(p, `function ${name}`);
    return this.push(id => ({ kind: 'function', id, name, params: Object.freeze([...params]) }));
  }

  lambda(params: readonly string[], body: NodeId): NodeId {
    const seen = new Set<string>();
    for (const p of params) {
      requireName(p, 'lambda parameter');
      if (seen.has(p)) {
        throw new StructuralError(`Duplicate lambda parameter: ${p}`, 'lambda');
      }
      seen.add(p);
    }
    this.ref(body, 'lambda');
    return this.push(id => ({ kind: 'lambda', id, params: Object.freeze([...params]), body }));
  }

  map(fn: NodeId, iterable: NodeId): NodeId {
    this.requireLambda(fn, 1, 'map');
    this.ref(iterable, 'map');
    return this.push(id => ({ kind: 'map', id, function: fn, iterable }));
  }

  filter(fn: NodeId, iterable: NodeId): NodeId {
    this.requireLambda(fn, 1, 'filter');
    this.ref(iterable, 'filter');
    return this.push(id => ({ kind: 'filter', id, function: fn, iterable }));
  }

  reduce(fn: NodeId, iterable: NodeId, initial?: NodeId): NodeId {
    this.requireLambda(fn, 2, 'reduce');
    this.ref(iterable, 'reduce');
    if (initial !== undefined) this.ref(initial, 'reduce');
    return this.push(id =>
      initial === undefined
        ? { kind: 'reduce', id, function: fn, iterable }
        : { kind: 'reduce', id, function: fn, iterable, initial }
    );
  }

  conditional(predicate: NodeId, consequent: NodeId, alternate: NodeId): NodeId {
    this.ref(predicate, 'conditional');
    this.ref(consequent, 'conditional');
    this.ref(alternate, 'conditional');
    return this.push(id => ({ kind: 'conditional', id, predicate, consequent, alternate }));
  }

  program(body: readonly NodeId[], meta: { name?: string; description?: string } = {}): NodeId {
    for (const statement of body) this.ref(statement, 'program');
    return this.push(id => ({
      kind: 'program',
      id,
      body: Object.freeze([...body]),
      ...(meta.name !== undefined ? { name: meta.name } : {}),
      ...(meta.description !== undefined ? { description: meta.description } : {}),
    }));
  }

  build(root: NodeId): Tree {
    this.ref(root, 'root');
    return new Tree([...this.nodes], root);
  }

  private push(make: (id: NodeId) => TreeNode): NodeId {
    const id = this.nodes.length;
    this.nodes.push(Object.freeze(make(id)));
    return id;
  }

  private ref(id: NodeId, owner: string): TreeNode {
    const node = Number.isInteger(id) && id >= 0 ? this.nodes[id] : undefined;
    if (!node) {
      throw new StructuralError(`${owner} references absent node ${id}`, owner);
    }
    return node;
  }

  private requireLambda(id: NodeId, arity: number, owner: string): void {
    const node = this.ref(id, owner);
    if (node.kind !== 'lambda') {
      throw new StructuralError(`${owner} function must be a lambda, got ${node.kind}`, owner);
    }
    if (node.params.length !== arity) {
      throw new StructuralError(
        `${owner} lambda must take ${arity} parameter${arity === 1 ? '' : 's'}, got ${node.params.length}`,
        owner,
      );
    }
  }
}

function requireName(name: string, what: string): void {
  if (name.length === 0) {
    throw new StructuralError(`${what} name must not be empty`, what);
  }
}

export function jsonEqual(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;
  if (typeof a === 'number' && typeof b === 'number') return Number.isNaN(a) && Number.isNaN(b);
  if (a === null || b === null || typeof a !== 'object' || typeof b !== 'object') return false;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => {
      const other = b[i];
      return other !== undefined && jsonEqual(item, other);
    });
  }
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every(key => {
    const left = a[key];
    const right = b[key];
    return left !== undefined && right !== undefined && jsonEqual(left, right);
  });
}

/** Same kinds, names, leaf values and child order, compared from the roots. */
export function isStructurallyEqual(a: Tree, b: Tree): boolean {
  const compared = new Set<string>();

  const same = (x: NodeId, y: NodeId): boolean => {
    const key = `${x}:${y}`;
    if (compared.has(key)) return true;
    compared.add(key);

    const left = a.node(x);
    const right = b.node(y);
    if (left.kind !== right.kind) return false;

    switch (left.kind) {
      case 'value': {
        if (right.kind !== 'value') return false;
        return left.name === right.name
          && left.placeholder === right.placeholder
          && jsonEqual(left.value, right.value);
      }
      case 'function': {
        if (right.kind !== 'function' || left.name !== right.name) return false;
        break;
      }
      case 'lambda': {
        if (right.kind !== 'lambda') return false;
        if (left.params.join('\u0000') !== right.params.join('\u0000')) return false;
        break;
      }
      case 'program': {
        if (right.kind !== 'program') return false;
        if (left.name !== right.name || left.description !== right.description) return false;
        break;
      }
      default:
        break;
    }

    const lc = childrenOf(left);
    const rc = childrenOf(right);
    if (lc.length !== rc.length) return false;
    return lc.every((child, i) => {
      const other = rc[i];
      return other !== undefined && same(child, other);
    });
  };

  return same(a.root, b.root);
}
