export interface ToolServerConfig {
  port: number;
  /** Ceiling for outstanding tool calls per evaluation. */
  maxConcurrency: number;
  /** Ceiling for a single evaluation's wall-clock time. */
  evalTimeoutMs?: number;
  /** Directory of `*.tool.json` compiled-tool files registered at boot. */
  toolsDir?: string;
  /** Abort boot when any tool file fails to load. */
  requireTools: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ToolServerConfig {
  return {
    port: positiveInt(env, 'PORT') ?? 3000,
    maxConcurrency: positiveInt(env, 'MAX_CONCURRENCY') ?? 8,
    evalTimeoutMs: positiveInt(env, 'EVAL_TIMEOUT_MS'),
    toolsDir: env.TOOLS_DIR || undefined,
    requireTools: env.REQUIRE_TOOLS === 'true',
  };
}

function positiveInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}
