import { v4 as uuid } from 'uuid';
import type { JsonValue, ToolCallTrace } from '@canopy/types';
import type { Tree, NodeId, TreeNode, FunctionNode, LambdaNode } from './node.js';
import type { ToolProvider } from './tool.js';
import {
  TreeError,
  EvalError,
  UnboundParameterError,
  ToolError,
  CancelledError,
  ToolInvocationError,
  errorMessage,
  type NodeLocation,
} from './errors.js';
import { ConcurrencyGate } from './gate.js';
import { makeCallTrace, now } from './result.js';

/** The value of an evaluated lambda: applied by map, filter and reduce. */
export class Closure {
  constructor(
    public readonly lambda: NodeId,
    public readonly params: readonly string[],
  ) {}

  toJSON(): { closure: NodeId; params: readonly string[] } {
    return { closure: this.lambda, params: this.params };
  }
}

export type EvalValue = JsonValue | Closure | EvalValue[];

export const DEFAULT_MAX_CONCURRENCY = 8;

export interface EvaluateOptions {
  signal?: AbortSignal;
  /** Wall-clock limit for the whole evaluation. In-flight tool calls are abandoned when it passes. */
  timeout_ms?: number;
  /** Maximum outstanding tool calls. Default: 8. */
  max_concurrency?: number;
  /** Result of a program node: its last statement (default) or every statement. */
  program_result?: 'last' | 'all';
}

interface Outcome {
  trace: ToolCallTrace[];
  run_id: string;
  duration_ms: number;
}

export type EvaluationResult =
  | (Outcome & { success: true; status: 'success'; value: EvalValue })
  | (Outcome & { success: false; status: 'failed' | 'cancelled'; error: TreeError });

export async function evaluate(
  tree: Tree,
  provider: ToolProvider,
  options: EvaluateOptions = {},
): Promise<EvaluationResult> {
  const start = now();
  const invalid = invalidOption(options);
  if (invalid !== undefined) {
    return {
      success: false,
      status: 'failed',
      error: new TreeError(invalid, 'EVAL'),
      trace: [],
      run_id: uuid(),
      duration_ms: now() - start,
    };
  }
  const run = new Evaluation(tree, provider, options);
  try {
    const value = await run.start();
    return {
      success: true,
      status: 'success',
      value,
      trace: run.trace,
      run_id: run.id,
      duration_ms: now() - start,
    };
  } catch (err) {
    const error = run.fail(err);
    return {
      success: false,
      status: error instanceof CancelledError ? 'cancelled' : 'failed',
      error,
      trace: run.trace,
      run_id: run.id,
      duration_ms: now() - start,
    };
  } finally {
    run.dispose();
  }
}

function invalidOption(options: EvaluateOptions): string | undefined {
  const { max_concurrency: limit, timeout_ms: timeout } = options;
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    return `max_concurrency must be a positive integer, got ${limit}`;
  }
  if (timeout !== undefined && !(Number.isFinite(timeout) && timeout > 0)) {
    return `timeout_ms must be a positive number, got ${timeout}`;
  }
  return undefined;
}

/** Like evaluate(), but returns the value or throws the evaluation error. */
export async function evaluateOrThrow(
  tree: Tree,
  provider: ToolProvider,
  options: EvaluateOptions = {},
): Promise<EvalValue> {
  const result = await evaluate(tree, provider, options);
  if (!result.success) throw result.error;
  return result.value;
}

/**
 * false, 0, NaN, null, "", "false", [] and {} are falsy; everything else is truthy.
 * Tool output often arrives as text, hence the string "false".
 */
export function isTruthy(value: EvalValue): boolean {
  if (value instanceof Closure) return true;
  if (value === null) return false;
  if (Array.isArray(value)) return value.length > 0;
  switch (typeof value) {
    case 'boolean': return value;
    case 'number': return value !== 0 && !Number.isNaN(value);
    case 'string': return value !== '' && value.toLowerCase() !== 'false';
    default: return Object.keys(value).length > 0;
  }
}

/** Throws if the value holds a closure, which has no JSON form. */
export function toJsonValue(value: EvalValue): JsonValue {
  if (value instanceof Closure) {
    throw new TypeError('A lambda has no JSON representation');
  }
  if (Array.isArray(value)) return value.map(toJsonValue);
  return value;
}

/** Like {@link toJsonValue}, but a lambda becomes `{ closure, params }`. */
export function toWire(value: EvalValue): JsonValue {
  if (value instanceof Closure) return { closure: value.lambda, params: [...value.params] };
  if (Array.isArray(value)) return value.map(toWire);
  return value;
}

interface Scope {
  /** Distinguishes lambda applications so bound subtrees are not shared across them. */
  readonly id: number;
  readonly bindings: ReadonlyMap<string, EvalValue>;
}

const ROOT_SCOPE: Scope = { id: 0, bindings: new Map() };

class Evaluation {
  readonly id = uuid();
  readonly trace: ToolCallTrace[] = [];

  private readonly controller = new AbortController();
  private readonly gate: ConcurrencyGate;
  private readonly memo = new Map<string, Promise<EvalValue>>();
  private readonly free: Map<NodeId, ReadonlySet<string>>;
  private readonly programResult: 'last' | 'all';
  private cancelReason?: string;
  private timer?: ReturnType<typeof setTimeout>;
  private scopes = 0;

  constructor(
    private readonly tree: Tree,
    private readonly provider: ToolProvider,
    private readonly options: EvaluateOptions,
  ) {
    this.gate = new ConcurrencyGate(options.max_concurrency ?? DEFAULT_MAX_CONCURRENCY);
    this.programResult = options.program_result ?? 'last';
    this.free = freeNames(tree);

    const { signal, timeout_ms } = options;
    if (signal) {
      if (signal.aborted) {
        this.cancel('aborted by caller');
      } else {
        signal.addEventListener('abort', this.onCallerAbort, { once: true });
      }
    }
    if (timeout_ms != null) {
      this.timer = setTimeout(() => this.cancel(`timeout of ${timeout_ms}ms exceeded`), timeout_ms);
    }
  }

  start(): Promise<EvalValue> {
    return this.eval(this.tree.root, ROOT_SCOPE);
  }

  /** Normalizes a failure and abandons whatever is still in flight. */
  fail(err: unknown): TreeError {
    this.cancel('evaluation failed');
    if (err instanceof TreeError) return err;
    return new EvalError(errorMessage(err), this.locate(this.tree.rootNode), 'EVAL', { cause: err });
  }

  dispose(): void {
    if (this.timer !== undefined) clearTimeout(this.timer);
    this.options.signal?.removeEventListener('abort', this.onCallerAbort);
  }

  private readonly onCallerAbort = (): void => {
    this.cancel('aborted by caller');
  };

  private cancel(reason: string): void {
    if (this.controller.signal.aborted) return;
    this.cancelReason = reason;
    this.controller.abort(reason);
  }

  private get signal(): AbortSignal {
    return this.controller.signal;
  }

  private eval(id: NodeId, scope: Scope): Promise<EvalValue> {
    const key = this.memoKey(id, scope);
    let pending = this.memo.get(key);
    if (!pending) {
      pending = this.compute(this.tree.node(id), scope);
      this.memo.set(key, pending);
    }
    return pending;
  }

  private memoKey(id: NodeId, scope: Scope): string {
    if (scope.bindings.size === 0) return String(id);
    const names = this.free.get(id);
    if (!names) return String(id);
    for (const name of names) {
      if (scope.bindings.has(name)) return `${id}@${scope.id}`;
    }
    return String(id);
  }

  private async compute(node: TreeNode, scope: Scope): Promise<EvalValue> {
    this.throwIfCancelled(node);

    switch (node.kind) {
      case 'value': {
        const bound = scope.bindings.get(node.name);
        if (bound !== undefined) return bound;
        if (node.placeholder) {
          throw new UnboundParameterError(node.name, this.locate(node));
        }
        return node.value;
      }

      case 'function': {
        const values = await Promise.all(node.params.map(p => this.eval(p, scope)));
        const args = values.map((value, i) => this.toArgument(value, node, i));
        return this.invoke(node, args);
      }

      case 'lambda':
        return new Closure(node.id, node.params);

      case 'map': {
        const items = await this.sequence(node, node.iterable, scope);
        const fn = this.lambda(node.function);
        return Promise.all(items.map(item => this.apply(fn, [item])));
      }

      case 'filter': {
        const items = await this.sequence(node, node.iterable, scope);
        const fn = this.lambda(node.function);
        const keep = await Promise.all(items.map(item => this.apply(fn, [item])));
        return items.filter((_, i) => {
          const verdict = keep[i];
          return verdict !== undefined && isTruthy(verdict);
        });
      }

      case 'reduce': {
        const items = await this.sequence(node, node.iterable, scope);
        const fn = this.lambda(node.function);
        let rest = items;
        let accumulator: EvalValue;
        if (node.initial !== undefined) {
          accumulator = await this.eval(node.initial, scope);
        } else {
          const [first, ...others] = items;
          if (first === undefined) return null;
          accumulator = first;
          rest = others;
        }
        for (const item of rest) {
          accumulator = await this.apply(fn, [accumulator, item]);
        }
        return accumulator;
      }

      case 'conditional': {
        const predicate = await this.eval(node.predicate, scope);
        return isTruthy(predicate)
          ? this.eval(node.consequent, scope)
          : this.eval(node.alternate, scope);
      }

      case 'program': {
        const results: EvalValue[] = [];
        for (const statement of node.body) {
          results.push(await this.eval(statement, scope));
        }
        if (this.programResult === 'all') return results;
        return results.length > 0 ? results[results.length - 1] ?? null : null;
      }
    }
  }

  private async invoke(node: FunctionNode, args: JsonValue[]): Promise<JsonValue> {
    const location = this.locate(node);
    try {
      await this.gate.acquire(this.signal);
    } catch {
      throw this.cancelled(node);
    }

    const started = now();
    try {
      this.throwIfCancelled(node);
      const output = await abortable(this.provider.call(node.name, args, { signal: this.signal }), this.signal);
      this.trace.push(makeCallTrace({
        ...this.traceBase(location, args),
        output,
        duration_ms: now() - started,
        status: 'success',
      }));
      return output;
    } catch (err) {
      if (this.signal.aborted) {
        this.trace.push(makeCallTrace({
          ...this.traceBase(location, args),
          duration_ms: now() - started,
          status: 'cancelled',
        }));
        throw err instanceof CancelledError ? err : this.cancelled(node);
      }
      this.trace.push(makeCallTrace({
        ...this.traceBase(location, args),
        duration_ms: now() - started,
        status: 'error',
        error: {
          message: errorMessage(err),
          ...(err instanceof ToolInvocationError ? { code: err.code } : {}),
        },
      }));
      throw new ToolError(node.name, location, err);
    } finally {
      this.gate.release();
    }
  }

  private traceBase(location: NodeLocation, args: JsonValue[]) {
    return { node_id: location.node_id, label: location.label, tool: location.operation, args };
  }

  private apply(fn: LambdaNode, args: EvalValue[]): Promise<EvalValue> {
    const bindings = new Map<string, EvalValue>();
    fn.params.forEach((param, i) => {
      const arg = args[i];
      if (arg !== undefined) bindings.set(param, arg);
    });
    this.scopes++;
    return this.eval(fn.body, { id: this.scopes, bindings });
  }

  private lambda(id: NodeId): LambdaNode {
    const node = this.tree.node(id);
    if (node.kind !== 'lambda') {
      throw new EvalError(`Expected a lambda, got ${node.kind}`, this.locate(node));
    }
    return node;
  }

  private async sequence(owner: TreeNode, iterable: NodeId, scope: Scope): Promise<EvalValue[]> {
    const value = await this.eval(iterable, scope);
    if (!Array.isArray(value)) {
      throw new EvalError(
        `${owner.kind} expects a list, got ${value === null ? 'null' : typeof value}`,
        this.locate(owner),
      );
    }
    return value;
  }

  private toArgument(value: EvalValue, node: FunctionNode, index: number): JsonValue {
    if (value instanceof Closure) {
      throw new EvalError(`Argument ${index} of ${node.name} is a lambda, not a value`, this.locate(node));
    }
    if (Array.isArray(value)) {
      return value.map(item => this.toArgument(item, node, index));
    }
    return value;
  }

  private throwIfCancelled(node: TreeNode): void {
    if (this.signal.aborted) throw this.cancelled(node);
  }

  private cancelled(node: TreeNode): CancelledError {
    return new CancelledError(this.cancelReason ?? 'aborted', this.locate(node));
  }

  private locate(node: TreeNode): NodeLocation {
    return {
      node_id: node.id,
      label: this.tree.label(node.id),
      operation: node.kind === 'function' ? node.name : node.kind,
    };
  }
}

/** Rejects as soon as the signal aborts, leaving the underlying promise to settle unobserved. */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Names of the value leaves whose bindings can change a node's result. A
 * lambda binds its own parameters, so neither it nor the body of a map,
 * filter or reduce depends on the enclosing scope.
 */
function freeNames(tree: Tree): Map<NodeId, ReadonlySet<string>> {
  const free = new Map<NodeId, ReadonlySet<string>>();
  const union = (ids: readonly NodeId[]): Set<string> => {
    const out = new Set<string>();
    for (const id of ids) {
      for (const name of free.get(id) ?? []) out.add(name);
    }
    return out;
  };

  // Children always have lower ids than their parents.
  for (let id = 0; id < tree.size; id++) {
    const node = tree.node(id);
    switch (node.kind) {
      case 'value':
        free.set(id, new Set([node.name]));
        break;
      case 'lambda':
        free.set(id, new Set());
        break;
      case 'map':
      case 'filter':
        free.set(id, union([node.iterable]));
        break;
      case 'reduce':
        free.set(id, union(node.initial === undefined ? [node.iterable] : [node.iterable, node.initial]));
        break;
      case 'function':
      case 'conditional':
      case 'program':
        free.set(id, union(tree.children(id)));
        break;
    }
  }
  return free;
}
