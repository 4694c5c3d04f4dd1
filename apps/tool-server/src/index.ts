import { serve } from '@hono/node-server';
import { loadConfig } from './config.js';
import { boot } from './boot.js';

async function main(): Promise<void> {
  const config = loadConfig();
  console.log('Booting tool server...');

  const instance = await boot(config);
  console.log(`Tool server booted with ${instance.registry.list().length} tools.`);
  if (instance.compiledTools.length > 0) {
    console.log(`  Compiled: ${instance.compiledTools.join(', ')}`);
  }

  const server = serve({
    fetch: instance.app.fetch,
    port: config.port,
  }, (info) => {
    console.log(`Tool server listening on port ${info.port}`);
  });

  const shutdown = () => {
    console.log('Shutting down...');
    server.close(() => process.exit(0));
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err: unknown) => {
  console.error('Failed to boot tool server:', err);
  process.exit(1);
});
