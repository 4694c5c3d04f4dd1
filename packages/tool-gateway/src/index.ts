// MCP
export {
  createMCPToolRouter,
  type MCPToolRouter,
  type ValidationIssue,
  MCPError,
  MCPValidationError,
} from './mcp/tools.js';
export { createMCPServer, type MCPServerOptions } from './mcp/server.js';
export {
  ToolArgumentsSchema,
  EvaluateOptionsSchema,
  EvaluateInputSchema,
  ValidateInputSchema,
  type ToolArguments,
  type EvaluateInput,
  type ValidateInput,
} from './mcp/schemas.js';

// Remote tools
export { HttpToolProvider, type HttpToolProviderOptions, type FetchLike } from './http-provider.js';
