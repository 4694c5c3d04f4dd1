export { JsonPrimitiveSchema, JsonValueSchema } from './json.js';
export type { JsonPrimitive, JsonValue } from './json.js';

export {
  CURRENT_SCHEMA_VERSION,
  NodeKindSchema,
  WireValueShape,
  WireFunctionShape,
  WireLambdaShape,
  WireMapShape,
  WireFilterShape,
  WireReduceShape,
  WireConditionalShape,
  WireProgramShape,
  WireRefShape,
  WireShapes,
  WireDocumentShape,
} from './wire.js';

export type {
  NodeKind,
  WireValue,
  WireFunction,
  WireLambda,
  WireMap,
  WireFilter,
  WireReduce,
  WireConditional,
  WireProgram,
  WireRef,
  WireNode,
  WireDocument,
} from './wire.js';

export {
  ToolCategorySchema,
  ParameterTypeSchema,
  ParameterPropertySchema,
  ParameterSchemaSchema,
  ToolDescriptorSchema,
  ToolCallRequestSchema,
  TextContentSchema,
  ToolCallResponseSchema,
} from './tool.js';

export type {
  ToolCategory,
  ParameterType,
  ParameterProperty,
  ParameterSchema,
  ToolDescriptor,
  ToolCallRequest,
  TextContent,
  ToolCallResponse,
} from './tool.js';

export { TreeValidationErrorSchema, TreeValidationResultSchema } from './validation-result.js';
export type { TreeValidationError, TreeValidationResult } from './validation-result.js';

export { ToolCallTraceSchema, EvaluationStatusSchema } from './trace.js';
export type { ToolCallTrace, EvaluationStatus } from './trace.js';
