export { Tree, TreeBuilder, childrenOf, isStructurallyEqual, jsonEqual } from './node.js';
export type {
  NodeId,
  TreeNode,
  ValueNode,
  FunctionNode,
  LambdaNode,
  MapNode,
  FilterNode,
  ReduceNode,
  ConditionalNode,
  ProgramNode,
} from './node.js';
export { parse, parseDocument, serialize, serializeDocument, repr, hashTree, MAX_PARSE_DEPTH } from './parser.js';
export {
  evaluate,
  evaluateOrThrow,
  isTruthy,
  toJsonValue,
  toWire,
  Closure,
  DEFAULT_MAX_CONCURRENCY,
} from './evaluator.js';
export type { EvalValue, EvaluateOptions, EvaluationResult } from './evaluator.js';
export { compile, toToolDefinition } from './compiler.js';
export type { CompileOptions, CompiledTool } from './compiler.js';
export { ToolRegistry, matchesType } from './registry.js';
export { describeTool, parameterNames } from './tool.js';
export type { ToolDefinition, ToolProvider, CallOptions } from './tool.js';
export { createDefaultToolRegistry } from './tools/index.js';
export { validateTree } from './validator.js';
export type { ValidateOptions } from './validator.js';
export { ConcurrencyGate } from './gate.js';
export { makeCallTrace, now } from './result.js';
export {
  TreeError,
  ParseError,
  StructuralError,
  BindingError,
  EvalError,
  UnboundParameterError,
  ToolError,
  CancelledError,
  ToolInvocationError,
  errorMessage,
} from './errors.js';
export type { TreeErrorCode, ToolInvocationErrorCode, NodeLocation } from './errors.js';
