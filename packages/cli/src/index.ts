#!/usr/bin/env node

import type { JsonValue } from '@canopy/types';
import { lint } from './commands/lint.js';
import { parseBinding, run } from './commands/run.js';
import { inspect } from './commands/inspect.js';

const [command, ...args] = process.argv.slice(2);

function option(name: string): string | undefined {
  const index = args.indexOf(name);
  return index === -1 ? undefined : args[index + 1];
}

function numberOption(name: string): number | undefined {
  const raw = option(name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} expects a positive integer, got "${raw}"`);
  }
  return value;
}

function bindings(): Record<string, JsonValue> {
  const result: Record<string, JsonValue> = {};
  args.forEach((arg, i) => {
    if (arg !== '--bind') return;
    const next = args[i + 1];
    if (next === undefined) throw new Error('--bind expects name=value');
    const [name, value] = parseBinding(next);
    result[name] = value;
  });
  return result;
}

async function main(): Promise<void> {
  const file = args[0];

  switch (command) {
    case 'lint': {
      if (!file) {
        console.error('Usage: canopy lint <tree.json> [--allow-placeholders]');
        process.exit(1);
      }
      const result = await lint(file, { allowPlaceholders: args.includes('--allow-placeholders') });
      if (result.valid) {
        console.log(`✓ ${result.file} valid`);
        console.log(`  Tools: ${result.toolsUsed.join(', ')}`);
        console.log(`  Complexity: ${result.complexity}`);
      } else {
        console.error(`✗ ${result.file}: ${result.errors.length} error(s)`);
        for (const err of result.errors) {
          const hint = err.suggestion ? ` (${err.suggestion})` : '';
          console.error(`  ${err.path}: ${err.error}${hint}`);
        }
        process.exit(1);
      }
      break;
    }

    case 'run': {
      if (!file) {
        console.error('Usage: canopy run <tree.json> [--bind name=value]... [--server <url>] [--all] [--timeout <ms>]');
        process.exit(1);
      }
      const result = await run(file, {
        server: option('--server'),
        bindings: bindings(),
        all: args.includes('--all'),
        timeoutMs: numberOption('--timeout'),
        maxConcurrency: numberOption('--concurrency'),
      });
      if (args.includes('--trace')) {
        for (const call of result.trace) {
          const outcome = call.status === 'success' ? JSON.stringify(call.output) : `failed: ${call.error?.message ?? call.status}`;
          console.error(`  ${call.tool}(${call.args.map(a => JSON.stringify(a)).join(', ')}) -> ${outcome}`);
        }
      }
      if (result.success) {
        console.log(JSON.stringify(result.value));
      } else {
        console.error(`✗ ${result.status}: ${result.error}`);
        process.exit(1);
      }
      break;
    }

    case 'inspect': {
      if (!file) {
        console.error('Usage: canopy inspect <tree.json>');
        process.exit(1);
      }
      const result = await inspect(file);
      console.log(`${result.file}`);
      console.log(`  Hash: ${result.hash}`);
      console.log(`  Nodes: ${result.nodes}`);
      console.log(`  ${result.repr}`);
      break;
    }

    default:
      console.log('Usage: canopy <command> [args]');
      console.log('');
      console.log('Commands:');
      console.log('  lint <tree.json>               Check a tree against the built-in tools');
      console.log('  run <tree.json> [options]      Evaluate a tree and print its value');
      console.log('  inspect <tree.json>            Print a tree\'s hash, size and compact form');
      console.log('');
      console.log('Run options:');
      console.log('  --bind name=value   Set every value leaf named "name" (value read as JSON)');
      console.log('  --server <url>      Call tools on a tool server instead of the built-in tools');
      console.log('  --all               Print every statement of a program');
      console.log('  --timeout <ms>      Cancel the evaluation after this long');
      console.log('  --concurrency <n>   Maximum outstanding tool calls');
      console.log('  --trace             Print each tool call to stderr');
      process.exit(command ? 1 : 0);
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
