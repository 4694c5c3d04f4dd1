import { describe, it, expect } from 'vitest';
import { TreeBuilder, isStructurallyEqual, jsonEqual } from './node.js';
import { StructuralError } from './errors.js';

function sample() {
  const b = new TreeBuilder();
  const a = b.value('a', 1);
  const x = b.placeholder('x');
  const add = b.fn('add', [a, x]);
  const root = b.fn('multiply', [add, add]);
  return { tree: b.build(root), a, x, add, root };
}

describe('TreeBuilder', () => {
  it('assigns increasing ids', () => {
    const { tree, a, x, add, root } = sample();
    expect([a, x, add, root]).toEqual([0, 1, 2, 3]);
    expect(tree.size).toBe(4);
    expect(tree.root).toBe(root);
  });

  it('rejects references to nodes that do not exist yet', () => {
    const b = new TreeBuilder();
    expect(() => b.fn('add', [0])).toThrow(StructuralError);
    expect(() => b.build(0)).toThrow('root references absent node 0');
  });

  it('requires a lambda of the right arity for higher-order nodes', () => {
    const b = new TreeBuilder();
    const xs = b.value('xs', [1]);
    const one = b.lambda(['x'], b.placeholder('x'));
    expect(() => b.map(xs, xs)).toThrow('map function must be a lambda, got value');
    expect(() => b.reduce(one, xs)).toThrow('reduce lambda must take 2 parameters, got 1');
    const filtered = b.filter(one, xs);
    expect(b.build(filtered).node(filtered).kind).toBe('filter');
  });

  it('rejects empty names', () => {
    const b = new TreeBuilder();
    expect(() => b.value('', 1)).toThrow('value name must not be empty');
    expect(() => b.fn('', [])).toThrow('function name must not be empty');
  });

  it('freezes nodes', () => {
    const { tree, root } = sample();
    expect(Object.isFrozen(tree.node(root))).toBe(true);
  });
});

describe('Tree', () => {
  it('lists reachable nodes once in pre-order', () => {
    const { tree } = sample();
    expect(tree.reachable()).toEqual([3, 2, 0, 1]);
  });

  it('ignores unreachable nodes', () => {
    const b = new TreeBuilder();
    b.value('orphan', 0);
    const root = b.value('a', 1);
    const tree = b.build(root);
    expect(tree.reachable()).toEqual([1]);
    expect(tree.values().map(n => n.name)).toEqual(['a']);
  });

  it('labels nodes by name and pre-order position', () => {
    const b = new TreeBuilder();
    const a1 = b.value('a', 1);
    const a2 = b.value('a', 2);
    const lambda = b.lambda(['x'], b.placeholder('x'));
    const root = b.program([b.fn('add', [a1, a2]), lambda]);
    const tree = b.build(root);
    expect(tree.label(root)).toBe('program_1');
    expect(tree.label(a1)).toBe('a_1');
    expect(tree.label(a2)).toBe('a_2');
    expect(tree.label(lambda)).toBe('lambda_1');
  });

  it('reports distinct parents', () => {
    const { tree, add, root } = sample();
    expect(tree.parents(add)).toEqual([root]);
    expect(tree.parents(root)).toEqual([]);
  });

  it('throws on an unknown id', () => {
    const { tree } = sample();
    expect(tree.has(9)).toBe(false);
    expect(() => tree.node(9)).toThrow('Unknown node reference: 9');
  });

  it('copies with new literals and leaves the original untouched', () => {
    const { tree, x } = sample();
    const bound = tree.withValues(new Map([[x, 5]]));
    expect(bound.node(x)).toMatchObject({ value: 5, placeholder: false });
    expect(tree.node(x)).toMatchObject({ value: null, placeholder: true });
    expect(() => tree.withValues(new Map([[3, 1]]))).toThrow('Node 3 is a function, not a value');
  });
});

describe('isStructurallyEqual', () => {
  it('compares kinds, names, literals and child order', () => {
    expect(isStructurallyEqual(sample().tree, sample().tree)).toBe(true);

    const b = new TreeBuilder();
    const add = b.fn('add', [b.placeholder('x'), b.value('a', 1)]);
    expect(isStructurallyEqual(sample().tree, b.build(b.fn('multiply', [add, add])))).toBe(false);
  });

  it('treats a placeholder and a null literal as different', () => {
    const left = new TreeBuilder();
    const right = new TreeBuilder();
    expect(isStructurallyEqual(
      left.build(left.placeholder('x')),
      right.build(right.value('x', null)),
    )).toBe(false);
  });
});

describe('jsonEqual', () => {
  it('compares deeply', () => {
    expect(jsonEqual({ a: [1, { b: null }] }, { a: [1, { b: null }] })).toBe(true);
    expect(jsonEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false);
    expect(jsonEqual([1, 2], [2, 1])).toBe(false);
    expect(jsonEqual(Number.NaN, Number.NaN)).toBe(true);
  });
});
