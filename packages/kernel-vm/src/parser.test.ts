import { describe, it, expect } from 'vitest';
import { parse, parseDocument, serialize, serializeDocument, repr, hashTree, MAX_PARSE_DEPTH } from './parser.js';
import { isStructurallyEqual } from './node.js';
import { ParseError, StructuralError } from './errors.js';

const v = (name: string, value: unknown) => ({ type: 'value', name, value });
const p = (name: string) => ({ type: 'value', name });
const fn = (name: string, ...params: object[]) => ({ type: 'function', name, params });

/** A chain of `depth` nodes: sqrt(sqrt(...(a=1))). */
function nested(depth: number): object {
  let node: object = v('a', 1);
  for (let i = 1; i < depth; i++) node = fn('sqrt', node);
  return node;
}

function parseError(wire: unknown): ParseError {
  try {
    parse(wire);
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error('expected parse to fail');
}

describe('parse', () => {
  it('builds nodes bottom-up with children before parents', () => {
    const tree = parse(fn('add', v('a', 1), v('b', 2)));
    expect(tree.size).toBe(3);
    expect(tree.rootNode).toEqual({ kind: 'function', id: 2, name: 'add', params: [0, 1] });
    expect(tree.node(0)).toEqual({ kind: 'value', id: 0, name: 'a', value: 1, placeholder: false });
  });

  it('turns a value without a literal into a placeholder', () => {
    const tree = parse(p('x'));
    expect(tree.rootNode).toEqual({ kind: 'value', id: 0, name: 'x', value: null, placeholder: true });
  });

  it('keeps a null literal distinct from a placeholder', () => {
    const tree = parse(v('nothing', null));
    expect(tree.rootNode).toMatchObject({ value: null, placeholder: false });
  });

  it('shares a node reached twice through the same object', () => {
    const shared = fn('add', v('a', 1), v('b', 2));
    const tree = parse(fn('multiply', shared, shared));
    expect(tree.size).toBe(4);
    expect(tree.children(tree.root)).toEqual([2, 2]);
    expect(tree.parents(2)).toEqual([3]);
  });

  it('shares a node referenced by label', () => {
    const tree = parse(fn('multiply', { ...fn('add', v('a', 1), v('b', 2)), id: 'sum' }, { ref: 'sum' }));
    expect(tree.size).toBe(4);
    expect(tree.children(tree.root)).toEqual([2, 2]);
  });

  it('orders keyed params by param_order and names literal entries by key', () => {
    const tree = parse({
      type: 'function',
      name: 'subtract',
      params: { b: 2, a: fn('add', v('x', 4), v('y', 6)) },
      param_order: ['a', 'b'],
    });
    const [first, second] = tree.children(tree.root);
    expect(first === undefined ? undefined : tree.node(first).kind).toBe('function');
    expect(second === undefined ? undefined : tree.node(second)).toMatchObject({
      kind: 'value', name: 'b', value: 2,
    });
  });

  it('accepts the short function form as a lambda body', () => {
    const tree = parse({
      type: 'map',
      function: { type: 'lambda', params: ['x'], body: { name: 'sqrt', params: [p('x')] } },
      iterable: v('xs', [4, 9]),
    });
    expect(tree.node(1)).toEqual({ kind: 'function', id: 1, name: 'sqrt', params: [0] });
  });

  it('reads an optional reduce initial and program metadata', () => {
    const tree = parse({
      type: 'program',
      name: 'totals',
      description: 'Adds things up',
      body: [{
        type: 'reduce',
        function: { type: 'lambda', params: ['acc', 'x'], body: fn('add', p('acc'), p('x')) },
        iterable: v('xs', [1, 2]),
      }],
    });
    expect(tree.rootNode).toMatchObject({ kind: 'program', name: 'totals', description: 'Adds things up' });
    const reduce = tree.node(5);
    expect(reduce.kind).toBe('reduce');
    expect('initial' in reduce).toBe(false);
  });
});

describe('parse errors', () => {
  it('rejects an object cycle', () => {
    const loop: { type: string; name: string; params: unknown[] } = { type: 'function', name: 'f', params: [] };
    loop.params.push(loop);
    const err = parseError(loop);
    expect(err.path).toBe('$.params[0]');
    expect(err.message).toBe('$.params[0]: Cycle detected: node references one of its ancestors');
  });

  it('rejects a cycle through two objects', () => {
    const first: { type: string; name: string; params: unknown[] } = { type: 'function', name: 'f', params: [] };
    const second = fn('g', first);
    first.params.push(second);
    const err = parseError(first);
    expect(err.path).toBe('$.params[0].params[0]');
    expect(err.detail).toBe('Cycle detected: node references one of its ancestors');
  });

  it('accepts a tree at the depth limit', () => {
    expect(() => parse(nested(MAX_PARSE_DEPTH))).not.toThrow();
  });

  it('rejects a tree nested past the depth limit', () => {
    const err = parseError(nested(MAX_PARSE_DEPTH + 1));
    expect(err.detail).toBe('Maximum tree depth (500) exceeded');
    expect(err.path).toBe(`$${'.params[0]'.repeat(MAX_PARSE_DEPTH)}`);
    expect(parseError(nested(20_000)).detail).toBe('Maximum tree depth (500) exceeded');
  });

  it('rejects a label that references itself', () => {
    const err = parseError({ type: 'function', id: 'loop', name: 'f', params: [{ ref: 'loop' }] });
    expect(err.message).toBe('$.params[0].ref: Cycle detected: loop references itself');
  });

  it('rejects an unknown reference', () => {
    expect(parseError(fn('f', { ref: 'nope' })).message).toBe('$.params[0].ref: Unknown reference: nope');
  });

  it('rejects duplicate labels', () => {
    const err = parseError(fn('f', { ...v('a', 1), id: 'x' }, { ...v('b', 2), id: 'x' }));
    expect(err.message).toBe('$.params[1].id: Duplicate node id: x');
  });

  it('rejects unknown and missing types', () => {
    expect(parseError({ type: 'loop' }).message).toBe('$.type: Unknown node type: loop');
    expect(parseError({ name: 'a' }).message).toBe('$: Missing node type');
    expect(parseError(5).message).toBe('$: Expected a node object, got number');
    expect(parseError(fn('f', [1])).message).toBe('$.params[0]: Expected a node object, got array');
  });

  it('rejects unknown fields', () => {
    expect(parseError({ ...v('a', 1), extra: true }).message).toBe('$: Unknown field: extra');
  });

  it('rejects missing required fields', () => {
    const err = parseError({
      type: 'map',
      function: { type: 'lambda', params: ['x'], body: p('x') },
    });
    expect(err.message).toBe('$.iterable: Missing required field');
  });

  it('requires param_order for keyed params and only for them', () => {
    expect(parseError({ type: 'function', name: 'f', params: { a: 1 } }).message)
      .toBe('$.param_order: Keyed params require param_order');
    expect(parseError({ type: 'function', name: 'f', params: [], param_order: [] }).message)
      .toBe('$.param_order: param_order is only valid with keyed params');
    expect(parseError({ type: 'function', name: 'f', params: { a: 1 }, param_order: ['b'] }).message)
      .toBe('$.param_order: param_order [b] does not match params {a}');
  });

  it('reports structural violations as parse errors', () => {
    const err = parseError({
      type: 'map',
      function: { type: 'lambda', params: ['x', 'y'], body: p('x') },
      iterable: v('xs', []),
    });
    expect(err.message).toBe('$: map lambda must take 1 parameter, got 2');
    expect(err.cause).toBeInstanceOf(StructuralError);
  });

  it('rejects duplicate lambda parameters', () => {
    const err = parseError({ type: 'lambda', params: ['x', 'x'], body: p('x') });
    expect(err.message).toBe('$: Duplicate lambda parameter: x');
  });
});

describe('parseDocument', () => {
  it('unwraps a versioned envelope', () => {
    const tree = parseDocument({ schema_version: '1.0', ast: fn('add', v('a', 1), v('b', 2)) });
    expect(tree.rootNode.kind).toBe('function');
  });

  it('accepts a bare node', () => {
    expect(parseDocument(v('a', 1)).size).toBe(1);
  });

  it('rejects an unsupported schema version', () => {
    expect(() => parseDocument({ schema_version: '2.0', ast: v('a', 1) })).toThrow(ParseError);
  });
});

describe('serialize', () => {
  it('writes a shared node once with a label and refers to it afterwards', () => {
    const shared = fn('add', v('a', 1), v('b', 2));
    const tree = parse(fn('multiply', shared, shared));
    expect(serialize(tree)).toEqual({
      type: 'function',
      name: 'multiply',
      params: [
        {
          type: 'function',
          id: 'add_1',
          name: 'add',
          params: [
            { type: 'value', name: 'a', value: 1 },
            { type: 'value', name: 'b', value: 2 },
          ],
        },
        { ref: 'add_1' },
      ],
    });
  });

  it('round-trips structure and sharing', () => {
    const shared = fn('add', v('a', 1), p('b'));
    const tree = parse({
      type: 'conditional',
      predicate: fn('greater_than', shared, v('limit', 100)),
      consequent: v('result', 100),
      alternate: shared,
    });
    const again = parse(serialize(tree));
    expect(isStructurallyEqual(tree, again)).toBe(true);
    expect(again.size).toBe(tree.size);
    expect(parse(JSON.parse(JSON.stringify(serializeDocument(tree))).ast).size).toBe(tree.size);
  });

  it('wraps the tree in a versioned envelope', () => {
    expect(serializeDocument(parse(v('a', 1)))).toEqual({
      schema_version: '1.0',
      ast: { type: 'value', name: 'a', value: 1 },
    });
  });
});

describe('hashTree', () => {
  it('is stable across a round trip and sensitive to literals', () => {
    const tree = parse(fn('add', v('a', 1), v('b', 2)));
    const hash = hashTree(tree);
    expect(hash).toMatch(/^[0-9a-f]{64}$/);
    expect(hashTree(parse(serialize(tree)))).toBe(hash);
    expect(hashTree(parse(fn('add', v('a', 1), v('b', 3))))).not.toBe(hash);
  });
});

describe('repr', () => {
  it('renders labelled nodes and literal lists', () => {
    expect(repr(parse(fn('add', v('a', 1), v('b', 2))))).toBe('{"add_1": {"a": [1], "b": [2]}}');
  });

  it('renders placeholders as empty lists', () => {
    expect(repr(parse(fn('sqrt', p('x'))))).toBe('{"sqrt_1": {"x": []}}');
  });

  it('renders a root program as its statements', () => {
    const tree = parse({
      type: 'program',
      body: [fn('add', v('a', 1), v('b', 2)), fn('sqrt', v('a', 4))],
    });
    expect(repr(tree)).toBe('{"add_1": {"a": [1], "b": [2]}, "sqrt_1": {"a": [4]}}');
  });

  it('renders higher-order nodes with named fields', () => {
    const tree = parse({
      type: 'map',
      function: { type: 'lambda', params: ['x'], body: fn('sqrt', p('x')) },
      iterable: v('xs', [1, 4]),
    });
    expect(repr(tree)).toBe(
      '{"map_1": {"function": {"lambda_1": {"params": ["x"], "body": {"sqrt_1": {"x": []}}}}, "iterable": {"xs": [[1,4]]}}}',
    );
  });
});
