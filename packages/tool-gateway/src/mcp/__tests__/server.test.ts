import { describe, it, expect } from 'vitest';
import type { JsonValue } from '@canopy/types';
import { MAX_PARSE_DEPTH, createDefaultToolRegistry } from '@canopy/kernel-vm';
import { createMCPToolRouter } from '../tools.js';
import { createMCPServer } from '../server.js';

const v = (name: string, value: unknown) => ({ type: 'value', name, value });
const fn = (name: string, ...params: object[]) => ({ type: 'function', name, params });

function post(app: ReturnType<typeof createMCPServer>, path: string, body: unknown) {
  return app.request(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('MCP HTTP server', () => {
  const app = createMCPServer(createMCPToolRouter(createDefaultToolRegistry()));

  it('lists tools', async () => {
    const res = await app.request('/mcp/tools');
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body).toEqual(expect.arrayContaining([
      expect.objectContaining({ name: 'add', description: 'Add two numbers' }),
    ]));
  });

  it('returns tool output as text content', async () => {
    const res = await post(app, '/mcp/call', { tool: 'add', arguments: [2, 3] });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ content: [{ type: 'text', text: '5' }], isError: false });
  });

  it('returns 404 for an unknown tool', async () => {
    const res = await post(app, '/mcp/call', { tool: 'nope', arguments: [] });
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      content: [{ type: 'text', text: 'Error: Unknown tool: nope' }],
      isError: true,
    });
  });

  it('returns 400 for a malformed request', async () => {
    const res = await post(app, '/mcp/call', { tool: 'add' });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      isError: true,
      validation_errors: [expect.objectContaining({ path: 'arguments' })],
    });
  });

  it('returns 400 for a body that is not JSON', async () => {
    const res = await app.request('/mcp/call', { method: 'POST', body: 'add 2 3' });
    expect(res.status).toBe(400);
  });

  it('returns a tool failure as an error result', async () => {
    const res = await post(app, '/mcp/call', { tool: 'divide', arguments: [1, 0] });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      content: [{ type: 'text', text: 'Error: Cannot divide by zero.' }],
      isError: true,
    });
  });

  it('evaluates a tree', async () => {
    const res = await post(app, '/evaluate', {
      tree: { schema_version: '1.0', ast: fn('multiply', fn('add', v('a', 2), v('b', 3)), v('c', 4)) },
    });
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body).toMatchObject({ success: true, status: 'success', value: 20 });
    expect(body).toHaveProperty('trace', [
      expect.objectContaining({ tool: 'add', args: [2, 3], output: 5, status: 'success' }),
      expect.objectContaining({ tool: 'multiply', args: [5, 4], output: 20, status: 'success' }),
    ]);
  });

  it('reports a lambda result by its node', async () => {
    const res = await post(app, '/evaluate', {
      tree: { type: 'lambda', params: ['x'], body: fn('sqrt', { type: 'value', name: 'x' }) },
    });
    expect(await res.json()).toMatchObject({ success: true, value: { closure: 2, params: ['x'] } });
  });

  it('honors program_result', async () => {
    const res = await post(app, '/evaluate', {
      tree: { type: 'program', body: [fn('add', v('a', 1), v('b', 1)), fn('sqrt', v('a', 9))] },
      options: { program_result: 'all' },
    });
    expect(await res.json()).toMatchObject({ success: true, value: [2, 3] });
  });

  it('returns an evaluation failure with the failing node', async () => {
    const res = await post(app, '/evaluate', { tree: fn('divide', v('a', 1), v('b', 0)) });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: false,
      status: 'failed',
      error: {
        name: 'ToolError',
        code: 'TOOL',
        node_id: 2,
        label: 'divide_1',
        operation: 'divide',
        message: 'Tool divide failed: Cannot divide by zero. (node 2 divide_1)',
      },
    });
  });

  it('returns 400 for a tree that does not parse', async () => {
    const res = await post(app, '/evaluate', { tree: { type: 'loop' } });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      success: false,
      error: '$.type: Unknown node type: loop',
      path: '$.type',
    });
  });

  it('returns 400 for a tree nested too deeply', async () => {
    let tree: object = v('a', 4);
    for (let i = 0; i < MAX_PARSE_DEPTH; i++) tree = fn('sqrt', tree);

    const evaluated = await post(app, '/evaluate', { tree });
    expect(evaluated.status).toBe(400);
    expect(await evaluated.json()).toMatchObject({ success: false, path: expect.stringMatching(/^\$(\.params\[0\])+$/) });

    const validated = await post(app, '/validate', { tree });
    expect(validated.status).toBe(400);
  });

  it('returns 400 for unknown evaluate options', async () => {
    const res = await post(app, '/evaluate', { tree: v('a', 1), options: { retries: 3 } });
    expect(res.status).toBe(400);
  });

  it('validates a tree', async () => {
    const res = await post(app, '/validate', { tree: fn('ad', v('a', 1), v('b', 2)) });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      valid: false,
      errors: [{ path: 'root', error: 'Unknown tool: ad', suggestion: 'Did you mean add?' }],
      tools_used: [],
      estimated_complexity: 3,
    });
  });

  it('reports health', async () => {
    const res = await app.request('/health');
    expect(await res.json()).toEqual({ status: 'ok' });
  });
});

describe('MCP HTTP server limits', () => {
  it('caps a requested timeout at the server limit', async () => {
    const registry = createDefaultToolRegistry();
    registry.register({
      name: 'stall',
      version: '1.0.0',
      category: 'remote',
      description: 'Never finishes',
      parameter_schema: { type: 'object', properties: {} },
      execute: () => new Promise<JsonValue>(() => undefined),
    });
    const app = createMCPServer(createMCPToolRouter(registry), { timeout_ms: 20 });

    const res = await post(app, '/evaluate', { tree: fn('stall'), options: { timeout_ms: 60_000 } });
    expect(await res.json()).toMatchObject({
      success: false,
      status: 'cancelled',
      error: { code: 'CANCELLED' },
    });
  });
});
