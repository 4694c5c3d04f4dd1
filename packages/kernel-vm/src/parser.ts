import { createHash } from 'crypto';
import type { z } from 'zod';
import {
  CURRENT_SCHEMA_VERSION,
  JsonValueSchema,
  WireValueShape,
  WireFunctionShape,
  WireLambdaShape,
  WireMapShape,
  WireFilterShape,
  WireReduceShape,
  WireConditionalShape,
  WireProgramShape,
  WireRefShape,
  WireDocumentShape,
  type JsonValue,
  type WireNode,
  type WireDocument,
} from '@canopy/types';
import { ParseError, StructuralError } from './errors.js';
import { Tree, TreeBuilder, childrenOf, type NodeId } from './node.js';

/**
 * Parse a wire tree. The same JS object reached from several parents becomes
 * one shared node; `{ ref }` objects refer back to an earlier node's `id`.
 */
export function parse(wire: unknown): Tree {
  const parser = new WireParser();
  const root = parser.node(wire, '$');
  return parser.build(root);
}

/** Parse a `{ schema_version, ast }` envelope, or a bare node. */
export function parseDocument(doc: unknown): Tree {
  if (isRecord(doc) && 'schema_version' in doc) {
    const result = WireDocumentShape.safeParse(doc);
    if (!result.success) {
      throw fromZod(result.error, '$');
    }
    return parse(result.data.ast);
  }
  return parse(doc);
}

/** Nesting limit for wire input; deeper trees are rejected before the stack runs out. */
export const MAX_PARSE_DEPTH = 500;

class WireParser {
  private readonly builder = new TreeBuilder();
  private readonly byObject = new Map<object, NodeId>();
  private readonly inProgress = new Set<object>();
  private readonly labels = new Map<string, NodeId>();
  private readonly pendingLabels = new Set<string>();

  build(root: NodeId): Tree {
    return this.builder.build(root);
  }

  node(raw: unknown, path: string): NodeId {
    if (!isRecord(raw)) {
      throw new ParseError(`Expected a node object, got ${describeType(raw)}`, path);
    }
    if (this.inProgress.has(raw)) {
      throw new ParseError('Cycle detected: node references one of its ancestors', path);
    }
    const known = this.byObject.get(raw);
    if (known !== undefined) return known;
    // inProgress holds exactly the ancestors of this node.
    if (this.inProgress.size >= MAX_PARSE_DEPTH) {
      throw new ParseError(`Maximum tree depth (${MAX_PARSE_DEPTH}) exceeded`, path);
    }

    if (!('type' in raw) && 'ref' in raw) {
      return this.ref(raw, path);
    }

    const type = raw.type;
    if (typeof type !== 'string') {
      throw new ParseError('Missing node type', path);
    }

    const label = typeof raw.id === 'string' ? raw.id : undefined;
    if (label !== undefined && (this.labels.has(label) || this.pendingLabels.has(label))) {
      throw new ParseError(`Duplicate node id: ${label}`, `${path}.id`);
    }

    this.inProgress.add(raw);
    if (label !== undefined) this.pendingLabels.add(label);
    try {
      const id = this.structural(path, () => this.kind(type, raw, path));
      this.byObject.set(raw, id);
      if (label !== undefined) this.labels.set(label, id);
      return id;
    } finally {
      this.inProgress.delete(raw);
      if (label !== undefined) this.pendingLabels.delete(label);
    }
  }

  private kind(type: string, raw: Record<string, unknown>, path: string): NodeId {
    const b = this.builder;
    switch (type) {
      case 'value': {
        const data = shape(WireValueShape, raw, path);
        return data.value === undefined ? b.placeholder(data.name) : b.value(data.name, data.value);
      }
      case 'function': {
        const data = shape(WireFunctionShape, raw, path);
        return b.fn(data.name, this.params(data, path));
      }
      case 'lambda': {
        const data = shape(WireLambdaShape, raw, path);
        const body = this.lambdaBody(data.body, `${path}.body`);
        return b.lambda(data.params, body);
      }
      case 'map': {
        const data = shape(WireMapShape, raw, path);
        const fn = this.node(data.function, `${path}.function`);
        return b.map(fn, this.node(data.iterable, `${path}.iterable`));
      }
      case 'filter': {
        const data = shape(WireFilterShape, raw, path);
        const fn = this.node(data.function, `${path}.function`);
        return b.filter(fn, this.node(data.iterable, `${path}.iterable`));
      }
      case 'reduce': {
        const data = shape(WireReduceShape, raw, path);
        const fn = this.node(data.function, `${path}.function`);
        const iterable = this.node(data.iterable, `${path}.iterable`);
        const initial = data.initial === undefined ? undefined : this.node(data.initial, `${path}.initial`);
        return b.reduce(fn, iterable, initial);
      }
      case 'conditional': {
        const data = shape(WireConditionalShape, raw, path);
        const predicate = this.node(data.predicate, `${path}.predicate`);
        const consequent = this.node(data.consequent, `${path}.consequent`);
        return b.conditional(predicate, consequent, this.node(data.alternate, `${path}.alternate`));
      }
      case 'program': {
        const data = shape(WireProgramShape, raw, path);
        const body = data.body.map((statement, i) => this.node(statement, `${path}.body[${i}]`));
        return b.program(body, { name: data.name, description: data.description });
      }
      default:
        throw new ParseError(`Unknown node type: ${type}`, `${path}.type`);
    }
  }

  private params(data: z.infer<typeof WireFunctionShape>, path: string): NodeId[] {
    const { params, param_order: order } = data;
    if (Array.isArray(params)) {
      if (order !== undefined) {
        throw new ParseError('param_order is only valid with keyed params', `${path}.param_order`);
      }
      return params.map((p, i) => this.node(p, `${path}.params[${i}]`));
    }

    // Keyed params carry no reliable order of their own.
    if (order === undefined) {
      throw new ParseError('Keyed params require param_order', `${path}.param_order`);
    }
    const keys = Object.keys(params);
    const distinct = new Set(order);
    if (distinct.size !== order.length || order.length !== keys.length || !keys.every(k => distinct.has(k))) {
      throw new ParseError(
        `param_order [${order.join(', ')}] does not match params {${keys.join(', ')}}`,
        `${path}.param_order`,
      );
    }

    return order.map(name => {
      const entry = params[name];
      const entryPath = `${path}.params.${name}`;
      if (isRecord(entry)) return this.node(entry, entryPath);
      const literal = JsonValueSchema.safeParse(entry);
      if (!literal.success) {
        throw new ParseError(`Invalid literal for ${name}`, entryPath);
      }
      return this.builder.value(name, literal.data);
    });
  }

  /** Lambda bodies may use the short `{ name, params }` function form. */
  private lambdaBody(raw: unknown, path: string): NodeId {
    if (isRecord(raw) && !('type' in raw) && !('ref' in raw) && 'name' in raw && 'params' in raw) {
      return this.node({ ...raw, type: 'function' }, path);
    }
    return this.node(raw, path);
  }

  private ref(raw: Record<string, unknown>, path: string): NodeId {
    const { ref } = shape(WireRefShape, raw, path);
    if (this.pendingLabels.has(ref)) {
      throw new ParseError(`Cycle detected: ${ref} references itself`, `${path}.ref`);
    }
    const id = this.labels.get(ref);
    if (id === undefined) {
      throw new ParseError(`Unknown reference: ${ref}`, `${path}.ref`);
    }
    return id;
  }

  private structural(path: string, build: () => NodeId): NodeId {
    try {
      return build();
    } catch (err) {
      if (err instanceof StructuralError) {
        throw new ParseError(err.message, path, { cause: err });
      }
      throw err;
    }
  }
}

function shape<T extends z.ZodTypeAny>(schema: T, raw: unknown, path: string): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw fromZod(result.error, path);
  }
  return result.data;
}

function fromZod(error: z.ZodError, path: string): ParseError {
  const issue = error.issues[0];
  if (!issue) return new ParseError('Invalid node', path);
  const where = issue.path.length > 0 ? `${path}.${issue.path.join('.')}` : path;
  const message = issue.code === 'unrecognized_keys'
    ? `Unknown field${issue.keys.length > 1 ? 's' : ''}: ${issue.keys.join(', ')}`
    : issue.message === 'Required' ? 'Missing required field' : issue.message;
  return new ParseError(message, where, { cause: error });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

// --- Serialization ---

/**
 * Canonical wire form. A node referenced more than once is written in full at
 * its first pre-order position with `id`, and as `{ ref }` afterwards.
 */
export function serialize(tree: Tree): WireNode {
  const references = new Map<NodeId, number>();
  for (const id of tree.reachable()) {
    for (const child of tree.children(id)) {
      references.set(child, (references.get(child) ?? 0) + 1);
    }
  }
  const emitted = new Set<NodeId>();

  const emit = (id: NodeId): WireNode => {
    if (emitted.has(id)) return { ref: tree.label(id) };
    emitted.add(id);

    const node = tree.node(id);
    const base = (references.get(id) ?? 0) > 1 ? { id: tree.label(id) } : {};
    switch (node.kind) {
      case 'value':
        return node.placeholder
          ? { type: 'value', ...base, name: node.name }
          : { type: 'value', ...base, name: node.name, value: node.value };
      case 'function':
        return { type: 'function', ...base, name: node.name, params: node.params.map(emit) };
      case 'lambda':
        return { type: 'lambda', ...base, params: [...node.params], body: emit(node.body) };
      case 'map':
        return { type: 'map', ...base, function: emit(node.function), iterable: emit(node.iterable) };
      case 'filter':
        return { type: 'filter', ...base, function: emit(node.function), iterable: emit(node.iterable) };
      case 'reduce': {
        const fn = emit(node.function);
        const iterable = emit(node.iterable);
        return node.initial === undefined
          ? { type: 'reduce', ...base, function: fn, iterable }
          : { type: 'reduce', ...base, function: fn, iterable, initial: emit(node.initial) };
      }
      case 'conditional': {
        const predicate = emit(node.predicate);
        const consequent = emit(node.consequent);
        return { type: 'conditional', ...base, predicate, consequent, alternate: emit(node.alternate) };
      }
      case 'program':
        return {
          type: 'program',
          ...base,
          body: node.body.map(emit),
          ...(node.name !== undefined ? { name: node.name } : {}),
          ...(node.description !== undefined ? { description: node.description } : {}),
        };
    }
  };

  return emit(tree.root);
}

export function serializeDocument(tree: Tree): WireDocument {
  return { schema_version: CURRENT_SCHEMA_VERSION, ast: serialize(tree) };
}

/** sha256 of the canonical serialization. */
export function hashTree(tree: Tree): string {
  return createHash('sha256').update(JSON.stringify(serialize(tree))).digest('hex');
}

// --- repr ---

/**
 * Human-readable, order-decorated view, e.g. `{"add_1": {"a": [1], "b": [2]}}`.
 * Lossy: not accepted by parse().
 */
export function repr(tree: Tree): string {
  const entry = (id: NodeId): string => {
    const node = tree.node(id);
    const key = JSON.stringify(tree.label(id));
    const wrap = (child: NodeId): string => `{${entry(child)}}`;

    switch (node.kind) {
      case 'value':
        return `${JSON.stringify(node.name)}: [${node.placeholder ? '' : formatLiteral(node.value)}]`;
      case 'function':
        return `${key}: {${node.params.map(entry).join(', ')}}`;
      case 'lambda':
        return `${key}: {"params": ${JSON.stringify(node.params)}, "body": ${wrap(node.body)}}`;
      case 'map':
      case 'filter':
      case 'reduce': {
        const parts = [`"function": ${wrap(node.function)}`, `"iterable": ${wrap(node.iterable)}`];
        if (node.kind === 'reduce' && node.initial !== undefined) parts.push(`"initial": ${wrap(node.initial)}`);
        return `${key}: {${parts.join(', ')}}`;
      }
      case 'conditional':
        return `${key}: {"predicate": ${wrap(node.predicate)}, "consequent": ${wrap(node.consequent)}, "alternate": ${wrap(node.alternate)}}`;
      case 'program':
        return `${key}: {${node.body.map(entry).join(', ')}}`;
    }
  };

  const root = tree.rootNode;
  if (root.kind === 'program') {
    return `{${childrenOf(root).map(entry).join(', ')}}`;
  }
  return `{${entry(tree.root)}}`;
}

function formatLiteral(value: JsonValue): string {
  // JSON.stringify already renders 93.0 as 93 and booleans in lower case.
  return JSON.stringify(value);
}
