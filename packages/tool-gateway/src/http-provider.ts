import { z } from 'zod';
import {
  JsonValueSchema,
  ToolCallResponseSchema,
  ToolDescriptorSchema,
  type JsonValue,
  type ToolCallRequest,
  type ToolDescriptor,
} from '@canopy/types';
import {
  ToolInvocationError,
  errorMessage,
  parameterNames,
  type CallOptions,
  type ToolProvider,
} from '@canopy/kernel-vm';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpToolProviderOptions {
  /** Defaults to the global fetch. */
  fetch?: FetchLike;
  headers?: Record<string, string>;
  /**
   * `named` sends `arguments` as an object keyed by the tool's parameter
   * names, in `parameter_schema` property order, for servers that take
   * named arguments. The names come from the first tool listing.
   */
  arguments?: 'positional' | 'named';
}

const ToolListSchema = z.array(ToolDescriptorSchema);

/** Calls tools on a remote tool server (GET /mcp/tools, POST /mcp/call). */
export class HttpToolProvider implements ToolProvider {
  private readonly baseUrl: string;
  private readonly fetch: FetchLike;
  private readonly headers: Record<string, string>;
  private readonly argumentStyle: 'positional' | 'named';
  private parameters?: Promise<Map<string, string[]>>;

  constructor(baseUrl: string, options: HttpToolProviderOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
    this.headers = options.headers ?? {};
    this.argumentStyle = options.arguments ?? 'positional';
  }

  async listTools(): Promise<ToolDescriptor[]> {
    const response = await this.send('', `${this.baseUrl}/mcp/tools`, { headers: this.headers });
    if (!response.ok) {
      throw new ToolInvocationError(`Tool listing failed: ${response.status}`, 'TRANSPORT', '');
    }
    const tools = ToolListSchema.safeParse(await this.body(response, ''));
    if (!tools.success) {
      throw new ToolInvocationError('Malformed tool listing', 'TRANSPORT', '', { cause: tools.error });
    }
    return tools.data;
  }

  async call(name: string, args: readonly JsonValue[], options: CallOptions = {}): Promise<JsonValue> {
    const request: ToolCallRequest = { tool: name, arguments: await this.encode(name, args) };
    const response = await this.send(name, `${this.baseUrl}/mcp/call`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...this.headers },
      body: JSON.stringify(request),
      signal: options.signal,
    });

    const parsed = ToolCallResponseSchema.safeParse(await this.body(response, name));
    if (!parsed.success) {
      throw new ToolInvocationError(
        `Tool call failed: ${response.status}`,
        'TRANSPORT',
        name,
        { cause: parsed.error },
      );
    }

    const texts = parsed.data.content.map(item => item.text);
    const failure = parsed.data.isError === true || texts.some(text => text.startsWith('Error'));
    if (failure || !response.ok) {
      const message = texts.join('\n').replace(/^Error:\s*/, '') || `Tool call failed: ${response.status}`;
      throw new ToolInvocationError(message, failureCode(response.status), name);
    }

    const values = texts.map(decode);
    if (values.length === 0) return null;
    if (values.length === 1) return values[0] ?? null;
    return values;
  }

  private async encode(name: string, args: readonly JsonValue[]): Promise<ToolCallRequest['arguments']> {
    if (this.argumentStyle === 'positional') return [...args];

    const names = (await this.toolParameters()).get(name);
    if (names === undefined) {
      throw new ToolInvocationError(`Unknown tool: ${name}`, 'UNKNOWN_TOOL', name);
    }
    if (args.length > names.length) {
      throw new ToolInvocationError(
        `${name} takes ${names.length} argument(s) (${names.join(', ')}), got ${args.length}`,
        'INVALID_ARGUMENTS',
        name,
      );
    }
    const named: Record<string, JsonValue> = {};
    args.forEach((arg, i) => {
      const key = names[i];
      if (key !== undefined) named[key] = arg;
    });
    return named;
  }

  private async toolParameters(): Promise<Map<string, string[]>> {
    this.parameters ??= this.listTools().then(
      tools => new Map(tools.map(tool => [tool.name, parameterNames(tool.parameter_schema)])),
    );
    try {
      return await this.parameters;
    } catch (err) {
      // Retry the listing on the next call.
      this.parameters = undefined;
      throw err;
    }
  }

  private async send(tool: string, url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetch(url, init);
    } catch (err) {
      throw new ToolInvocationError(`Request to ${url} failed: ${errorMessage(err)}`, 'TRANSPORT', tool, { cause: err });
    }
  }

  private async body(response: Response, tool: string): Promise<unknown> {
    try {
      return await response.json();
    } catch (err) {
      throw new ToolInvocationError(
        `Tool server returned a non-JSON body (${response.status})`,
        'TRANSPORT',
        tool,
        { cause: err },
      );
    }
  }
}

function failureCode(status: number): ToolInvocationError['code'] {
  switch (status) {
    case 404: return 'UNKNOWN_TOOL';
    case 400: return 'INVALID_ARGUMENTS';
    default: return status >= 500 ? 'TRANSPORT' : 'TOOL_FAILED';
  }
}

/** Text content is JSON when it parses as JSON; anything else is passed through as a string. */
function decode(text: string): JsonValue {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return text;
  }
  const value = JsonValueSchema.safeParse(raw);
  return value.success ? value.data : text;
}
