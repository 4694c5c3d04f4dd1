import { Hono } from 'hono';
import type { z } from 'zod';
import { ToolCallRequestSchema, type ToolCallResponse } from '@canopy/types';
import {
  ParseError,
  evaluate,
  parseDocument,
  toWire,
  validateTree,
  type EvaluateOptions,
  type Tree,
} from '@canopy/kernel-vm';
import type { MCPToolRouter, ValidationIssue } from './tools.js';
import { MCPError, MCPValidationError } from './tools.js';
import { EvaluateInputSchema, ValidateInputSchema } from './schemas.js';

export interface MCPServerOptions {
  /** Defaults for POST /evaluate; a request may lower them but not raise them. */
  max_concurrency?: number;
  timeout_ms?: number;
}

function textResponse(text: string, isError: boolean): ToolCallResponse {
  return { content: [{ type: 'text', text }], isError };
}

export function createMCPServer(router: MCPToolRouter, options: MCPServerOptions = {}) {
  const app = new Hono();

  app.get('/mcp/tools', (c) => {
    return c.json(router.listTools());
  });

  app.post('/mcp/call', async (c) => {
    const body = await readJson(c.req.raw);
    const request = ToolCallRequestSchema.safeParse(body);
    if (!request.success) {
      return c.json({
        ...textResponse('Error: Invalid tool call request', true),
        validation_errors: issuesOf(request.error),
      }, 400);
    }

    try {
      const output = await router.callTool(request.data.tool, request.data.arguments, {
        signal: c.req.raw.signal,
      });
      return c.json(textResponse(JSON.stringify(output), false));
    } catch (err) {
      if (err instanceof MCPValidationError) {
        return c.json({
          ...textResponse(`Error: ${err.message}`, true),
          validation_errors: err.issues,
        }, 400);
      }

      if (err instanceof MCPError) {
        // Tool failures are results, not transport errors.
        const failure = textResponse(`Error: ${err.message}`, true);
        switch (err.code) {
          case 'NOT_FOUND': return c.json(failure, 404);
          case 'VALIDATION': return c.json(failure, 400);
          case 'TOOL_FAILED': return c.json(failure, 200);
        }
      }

      const message = err instanceof Error ? err.message : 'Unknown error';
      return c.json(textResponse(`Error: ${message}`, true), 500);
    }
  });

  app.post('/evaluate', async (c) => {
    const input = EvaluateInputSchema.safeParse(await readJson(c.req.raw));
    if (!input.success) {
      return c.json({ success: false, error: 'Invalid evaluate request', validation_errors: issuesOf(input.error) }, 400);
    }

    const tree = parseTree(input.data.tree);
    if (tree instanceof ParseError) {
      return c.json({ success: false, error: tree.message, path: tree.path }, 400);
    }

    const result = await evaluate(tree, router.registry, {
      ...input.data.options,
      max_concurrency: lowest(input.data.options?.max_concurrency, options.max_concurrency),
      timeout_ms: lowest(input.data.options?.timeout_ms, options.timeout_ms),
      signal: c.req.raw.signal,
    } satisfies EvaluateOptions);

    const base = {
      status: result.status,
      trace: result.trace,
      run_id: result.run_id,
      duration_ms: result.duration_ms,
    };
    if (result.success) {
      return c.json({ success: true, value: toWire(result.value), ...base });
    }
    return c.json({
      success: false,
      error: {
        name: result.error.name,
        code: result.error.code,
        message: result.error.message,
        node_id: result.error.node_id ?? null,
        label: result.error.label ?? null,
        operation: result.error.operation ?? null,
      },
      ...base,
    });
  });

  app.post('/validate', async (c) => {
    const input = ValidateInputSchema.safeParse(await readJson(c.req.raw));
    if (!input.success) {
      return c.json({ success: false, error: 'Invalid validate request', validation_errors: issuesOf(input.error) }, 400);
    }
    const tree = parseTree(input.data.tree);
    if (tree instanceof ParseError) {
      return c.json({ success: false, error: tree.message, path: tree.path }, 400);
    }
    return c.json(validateTree(tree, router.listTools(), {
      allow_placeholders: input.data.allow_placeholders,
    }));
  });

  app.get('/health', (c) => c.json({ status: 'ok' }));

  return app;
}

function issuesOf(error: z.ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

async function readJson(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    // Not JSON: let the schema report it.
    return undefined;
  }
}

function lowest(requested: number | undefined, limit: number | undefined): number | undefined {
  if (requested === undefined) return limit;
  if (limit === undefined) return requested;
  return Math.min(requested, limit);
}

function parseTree(raw: unknown): Tree | ParseError {
  try {
    return parseDocument(raw);
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
}

