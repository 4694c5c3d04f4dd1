import { JsonValueSchema, type JsonValue, type ToolCallTrace } from '@canopy/types';
import {
  compile,
  createDefaultToolRegistry,
  evaluate,
  toWire,
  type EvaluateOptions,
  type EvaluationResult,
  type ToolProvider,
} from '@canopy/kernel-vm';
import { HttpToolProvider, type FetchLike } from '@canopy/tool-gateway';
import { readTreeFile } from './tree-file.js';

export interface RunOptions {
  /** Tool server base URL; the built-in tools are used when absent. */
  server?: string;
  /** Values for value leaves, matched by name. */
  bindings?: Record<string, JsonValue>;
  /** Return every statement of a program instead of the last. */
  all?: boolean;
  timeoutMs?: number;
  maxConcurrency?: number;
  fetch?: FetchLike;
}

export interface RunResult {
  success: boolean;
  file: string;
  status: EvaluationResult['status'];
  value?: JsonValue;
  error?: string;
  trace: ToolCallTrace[];
}

/** Splits `name=value`; the value is read as JSON, falling back to the raw text. */
export function parseBinding(arg: string): [string, JsonValue] {
  const eq = arg.indexOf('=');
  if (eq <= 0) {
    throw new Error(`Invalid binding "${arg}": expected name=value`);
  }
  const name = arg.slice(0, eq);
  const text = arg.slice(eq + 1);
  try {
    return [name, JsonValueSchema.parse(JSON.parse(text))];
  } catch {
    return [name, text];
  }
}

export async function run(file: string, options: RunOptions = {}): Promise<RunResult> {
  const tree = await readTreeFile(file);
  const provider: ToolProvider = options.server
    ? new HttpToolProvider(options.server, { fetch: options.fetch })
    : createDefaultToolRegistry();

  const evalOptions: EvaluateOptions = {
    timeout_ms: options.timeoutMs,
    max_concurrency: options.maxConcurrency,
    program_result: options.all ? 'all' : 'last',
  };

  const bindings = options.bindings ?? {};
  const names = Object.keys(bindings);
  const result = names.length > 0
    ? await compile(tree, names, provider, { evaluate: evalOptions }).evaluate(bindings)
    : await evaluate(tree, provider, evalOptions);

  if (result.success) {
    return {
      success: true,
      file,
      status: result.status,
      value: toWire(result.value),
      trace: result.trace,
    };
  }
  return {
    success: false,
    file,
    status: result.status,
    error: result.error.message,
    trace: result.trace,
  };
}
