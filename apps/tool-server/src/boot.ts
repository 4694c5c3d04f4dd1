import { readdirSync } from 'fs';
import { join } from 'path';
import { createDefaultToolRegistry, type ToolRegistry } from '@canopy/kernel-vm';
import { createMCPServer, createMCPToolRouter } from '@canopy/tool-gateway';
import type { ToolServerConfig } from './config.js';
import { loadCompiledTool } from './tool-file.js';

export interface ToolServerInstance {
  app: ReturnType<typeof createMCPServer>;
  registry: ToolRegistry;
  /** Names of the compiled tools registered from `toolsDir`. */
  compiledTools: string[];
}

export async function boot(config: ToolServerConfig): Promise<ToolServerInstance> {
  const registry = createDefaultToolRegistry();
  const compiledTools: string[] = [];

  if (config.toolsDir) {
    const files = readdirSync(config.toolsDir)
      .filter(name => name.endsWith('.tool.json'))
      .sort()
      .map(name => join(config.toolsDir ?? '', name));

    const failed: string[] = [];
    // Sequential: a later file may call a tool an earlier one registered.
    for (const file of files) {
      try {
        const tool = await loadCompiledTool(file, registry);
        registry.register(tool);
        compiledTools.push(tool.name);
      } catch (err) {
        failed.push(file);
        console.error(`Failed to load tool from ${file}:`, err instanceof Error ? err.message : err);
      }
    }

    if (config.requireTools && failed.length > 0) {
      throw new Error(`Boot aborted: failed to load required tools from: ${failed.join(', ')}`);
    }
  }

  const app = createMCPServer(createMCPToolRouter(registry), {
    max_concurrency: config.maxConcurrency,
    timeout_ms: config.evalTimeoutMs,
  });

  return { app, registry, compiledTools };
}
