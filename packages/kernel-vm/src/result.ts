import type { JsonValue, ToolCallTrace } from '@canopy/types';

export function makeCallTrace(opts: {
  node_id: number;
  label: string;
  tool: string;
  args: JsonValue[];
  output?: JsonValue;
  duration_ms: number;
  status: ToolCallTrace['status'];
  error?: { message: string; code?: string };
}): ToolCallTrace {
  return {
    node_id: opts.node_id,
    label: opts.label,
    tool: opts.tool,
    args: opts.args,
    output: opts.output ?? null,
    duration_ms: opts.duration_ms,
    status: opts.status,
    ...(opts.error ? { error: opts.error } : {}),
  };
}

/** Measure execution duration in ms using performance.now() if available, Date.now() otherwise. */
export function now(): number {
  if (typeof performance !== 'undefined' && performance.now) {
    return performance.now();
  }
  return Date.now();
}
