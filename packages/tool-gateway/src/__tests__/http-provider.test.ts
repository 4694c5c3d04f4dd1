import { describe, it, expect } from 'vitest';
import { createDefaultToolRegistry, evaluateOrThrow, parse, ToolInvocationError } from '@canopy/kernel-vm';
import { HttpToolProvider, type FetchLike } from '../http-provider.js';
import { createMCPToolRouter } from '../mcp/tools.js';
import { createMCPServer } from '../mcp/server.js';

const v = (name: string, value: unknown) => ({ type: 'value', name, value });
const fn = (name: string, ...params: object[]) => ({ type: 'function', name, params });

function inProcess() {
  const app = createMCPServer(createMCPToolRouter(createDefaultToolRegistry()));
  const urls: string[] = [];
  const fetch: FetchLike = async (url, init) => {
    urls.push(url);
    return app.request(url, init);
  };
  return { provider: new HttpToolProvider('http://tools.test/', { fetch }), urls };
}

/** Answers every request with the given JSON body. */
function replying(body: unknown, status = 200): FetchLike {
  return async () => new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

async function invocationError(run: () => Promise<unknown>): Promise<ToolInvocationError> {
  try {
    await run();
  } catch (err) {
    if (err instanceof ToolInvocationError) return err;
    throw err;
  }
  throw new Error('expected the call to fail');
}

describe('HttpToolProvider', () => {
  it('lists the remote tools', async () => {
    const { provider, urls } = inProcess();
    const tools = await provider.listTools();
    expect(tools.map(t => t.name)).toContain('sqrt');
    expect(urls).toEqual(['http://tools.test/mcp/tools']);
  });

  it('calls a remote tool', async () => {
    const { provider } = inProcess();
    expect(await provider.call('add', [2, 3])).toBe(5);
    expect(await provider.call('range', [0, 3])).toEqual([0, 1, 2]);
  });

  it('evaluates a tree against the remote tools', async () => {
    const { provider } = inProcess();
    const shared = fn('add',
      fn('divide', fn('subtract', v('a', 50), v('b', 8)), v('b', 2)),
      fn('multiply', fn('sqrt', v('a', 64)), fn('power', v('a', 3), v('b', 2))),
    );
    const tree = parse({
      type: 'conditional',
      predicate: fn('greater_than', shared, v('b', 100)),
      consequent: v('result', 100),
      alternate: shared,
    });
    expect(await evaluateOrThrow(tree, provider)).toBe(93);
  });

  it('maps remote failures to invocation error codes', async () => {
    const { provider } = inProcess();

    const failed = await invocationError(() => provider.call('divide', [1, 0]));
    expect(failed.code).toBe('TOOL_FAILED');
    expect(failed.message).toBe('Cannot divide by zero.');

    const unknown = await invocationError(() => provider.call('nope', []));
    expect(unknown.code).toBe('UNKNOWN_TOOL');
    expect(unknown.message).toBe('Unknown tool: nope');

    const invalid = await invocationError(() => provider.call('add', [1]));
    expect(invalid.code).toBe('INVALID_ARGUMENTS');
    expect(invalid.message).toBe('Invalid input for add');
  });

  it('passes text that is not JSON through as a string', async () => {
    const provider = new HttpToolProvider('http://tools.test', {
      fetch: replying({ content: [{ type: 'text', text: 'hello world' }] }),
    });
    expect(await provider.call('greet', [])).toBe('hello world');
  });

  it('collects several content items into a list', async () => {
    const provider = new HttpToolProvider('http://tools.test', {
      fetch: replying({ content: [{ type: 'text', text: '1' }, { type: 'text', text: 'two' }] }),
    });
    expect(await provider.call('pair', [])).toEqual([1, 'two']);
  });

  it('returns null for empty content', async () => {
    const provider = new HttpToolProvider('http://tools.test', { fetch: replying({ content: [] }) });
    expect(await provider.call('nothing', [])).toBeNull();
  });

  it('treats text starting with Error as a failure', async () => {
    const provider = new HttpToolProvider('http://tools.test', {
      fetch: replying({ content: [{ type: 'text', text: 'Error: quota exhausted' }] }),
    });
    const err = await invocationError(() => provider.call('lookup', ['x']));
    expect(err.code).toBe('TOOL_FAILED');
    expect(err.message).toBe('quota exhausted');
  });

  it('reports network and protocol failures as transport errors', async () => {
    const down = new HttpToolProvider('http://tools.test', {
      fetch: async () => { throw new Error('connection refused'); },
    });
    const network = await invocationError(() => down.call('add', [1, 2]));
    expect(network.code).toBe('TRANSPORT');
    expect(network.message).toBe('Request to http://tools.test/mcp/call failed: connection refused');

    const broken = new HttpToolProvider('http://tools.test', {
      fetch: async () => new Response('<html>bad gateway</html>', { status: 502 }),
    });
    expect((await invocationError(() => broken.call('add', [1, 2]))).code).toBe('TRANSPORT');

    const garbled = new HttpToolProvider('http://tools.test', { fetch: replying({ result: 3 }) });
    expect((await invocationError(() => garbled.call('add', [1, 2]))).code).toBe('TRANSPORT');
    expect((await invocationError(() => garbled.listTools())).message).toBe('Malformed tool listing');
  });

  it('sends named arguments in parameter order when asked to', async () => {
    const app = createMCPServer(createMCPToolRouter(createDefaultToolRegistry()));
    const requests: Array<{ url: string; body: unknown }> = [];
    const provider = new HttpToolProvider('http://tools.test', {
      arguments: 'named',
      fetch: async (url, init) => {
        requests.push({ url, body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined });
        return app.request(url, init);
      },
    });

    expect(await provider.call('subtract', [10, 3])).toBe(7);
    expect(await provider.call('range', [0, 2])).toEqual([0, 1]);
    expect(requests).toEqual([
      { url: 'http://tools.test/mcp/tools', body: undefined },
      { url: 'http://tools.test/mcp/call', body: { tool: 'subtract', arguments: { a: 10, b: 3 } } },
      { url: 'http://tools.test/mcp/call', body: { tool: 'range', arguments: { start: 0, stop: 2 } } },
    ]);

    const unknown = await invocationError(() => provider.call('nope', [1]));
    expect(unknown.code).toBe('UNKNOWN_TOOL');
    expect(unknown.message).toBe('Unknown tool: nope');

    const extra = await invocationError(() => provider.call('sqrt', [4, 5]));
    expect(extra.code).toBe('INVALID_ARGUMENTS');
    expect(extra.message).toBe('sqrt takes 1 argument(s) (a), got 2');
  });

  it('sends configured headers', async () => {
    const seen: Array<Record<string, string>> = [];
    const provider = new HttpToolProvider('http://tools.test', {
      headers: { Authorization: 'Bearer test-token' },
      fetch: async (_url, init) => {
        seen.push(Object.fromEntries(new Headers(init?.headers).entries()));
        return new Response(JSON.stringify({ content: [{ type: 'text', text: '1' }] }));
      },
    });
    await provider.call('one', []);
    expect(seen[0]).toMatchObject({
      authorization: 'Bearer test-token',
      'content-type': 'application/json',
    });
  });
});
