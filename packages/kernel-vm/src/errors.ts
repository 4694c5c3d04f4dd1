export type TreeErrorCode =
  | 'PARSE'
  | 'STRUCTURAL'
  | 'BINDING'
  | 'EVAL'
  | 'UNBOUND_PARAMETER'
  | 'TOOL'
  | 'CANCELLED';

/** Where in a tree an error happened. */
export interface NodeLocation {
  node_id: number;
  label: string;
  operation: string;
}

export class TreeError extends Error {
  readonly node_id?: number;
  readonly label?: string;
  readonly operation?: string;

  constructor(
    message: string,
    public readonly code: TreeErrorCode,
    location?: NodeLocation,
    options?: { cause?: unknown },
  ) {
    super(location ? `${message} (node ${location.node_id} ${location.label})` : message, options);
    this.name = 'TreeError';
    this.node_id = location?.node_id;
    this.label = location?.label;
    this.operation = location?.operation;
  }
}

export class ParseError extends TreeError {
  /** The message without its path prefix. */
  readonly detail: string;

  constructor(message: string, public readonly path: string, options?: { cause?: unknown }) {
    super(`${path}: ${message}`, 'PARSE', undefined, options);
    this.name = 'ParseError';
    this.detail = message;
  }
}

export class StructuralError extends TreeError {
  constructor(message: string, public readonly operation_kind?: string) {
    super(message, 'STRUCTURAL');
    this.name = 'StructuralError';
  }
}

export class BindingError extends TreeError {
  constructor(message: string, public readonly parameter?: string) {
    super(message, 'BINDING');
    this.name = 'BindingError';
  }
}

/** Raised while evaluating; always tied to the node being evaluated. */
export class EvalError extends TreeError {
  constructor(
    message: string,
    location: NodeLocation,
    code: TreeErrorCode = 'EVAL',
    options?: { cause?: unknown },
  ) {
    super(message, code, location, options);
    this.name = 'EvalError';
  }
}

export class UnboundParameterError extends EvalError {
  constructor(public readonly parameter: string, location: NodeLocation) {
    super(`Unbound parameter: ${parameter}`, location, 'UNBOUND_PARAMETER');
    this.name = 'UnboundParameterError';
  }
}

export class ToolError extends EvalError {
  constructor(public readonly tool: string, location: NodeLocation, cause: unknown) {
    super(`Tool ${tool} failed: ${errorMessage(cause)}`, location, 'TOOL', { cause });
    this.name = 'ToolError';
  }
}

export class CancelledError extends EvalError {
  constructor(reason: string, location: NodeLocation) {
    super(`Evaluation cancelled: ${reason}`, location, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

export type ToolInvocationErrorCode = 'UNKNOWN_TOOL' | 'INVALID_ARGUMENTS' | 'TRANSPORT' | 'TOOL_FAILED';

/** Raised by a tool provider. The evaluator wraps it in a ToolError. */
export class ToolInvocationError extends Error {
  constructor(
    message: string,
    public readonly code: ToolInvocationErrorCode,
    public readonly tool: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ToolInvocationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
