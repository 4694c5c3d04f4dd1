import { z } from 'zod';
import { JsonValueSchema, type JsonValue } from './json.js';

export const CURRENT_SCHEMA_VERSION = '1.0';

export const NodeKindSchema = z.enum([
  'program',
  'function',
  'value',
  'lambda',
  'map',
  'filter',
  'reduce',
  'conditional',
]);
export type NodeKind = z.infer<typeof NodeKindSchema>;

// --- Wire node shapes ---
//
// Children are typed as the full WireNode union here, but the shallow schemas
// below leave them as z.unknown(): the parser walks children itself so that it
// can detect cycles and shared objects before descending.

interface WireBase {
  id?: string;
}

export interface WireValue extends WireBase {
  type: 'value';
  name: string;
  value?: JsonValue;
}

export interface WireFunction extends WireBase {
  type: 'function';
  name: string;
  params: WireNode[] | Record<string, WireNode | JsonValue>;
  param_order?: string[];
}

export interface WireLambda extends WireBase {
  type: 'lambda';
  params: string[];
  body: WireNode;
}

export interface WireMap extends WireBase {
  type: 'map';
  function: WireNode;
  iterable: WireNode;
}

export interface WireFilter extends WireBase {
  type: 'filter';
  function: WireNode;
  iterable: WireNode;
}

export interface WireReduce extends WireBase {
  type: 'reduce';
  function: WireNode;
  iterable: WireNode;
  initial?: WireNode;
}

export interface WireConditional extends WireBase {
  type: 'conditional';
  predicate: WireNode;
  consequent: WireNode;
  alternate: WireNode;
}

export interface WireProgram extends WireBase {
  type: 'program';
  body: WireNode[];
  name?: string;
  description?: string;
}

export interface WireRef {
  ref: string;
}

export type WireNode =
  | WireValue
  | WireFunction
  | WireLambda
  | WireMap
  | WireFilter
  | WireReduce
  | WireConditional
  | WireProgram
  | WireRef;

export interface WireDocument {
  schema_version: typeof CURRENT_SCHEMA_VERSION;
  ast: WireNode;
}

// --- Shallow schemas (one level, children unchecked) ---

const id = z.string().min(1).optional();

export const WireValueShape = z.object({
  type: z.literal('value'),
  id,
  name: z.string().min(1),
  value: JsonValueSchema.optional(),
}).strict();

export const WireFunctionShape = z.object({
  type: z.literal('function'),
  id,
  name: z.string().min(1),
  params: z.union([z.array(z.unknown()), z.record(z.string(), z.unknown())]),
  param_order: z.array(z.string()).optional(),
}).strict();

export const WireLambdaShape = z.object({
  type: z.literal('lambda'),
  id,
  params: z.array(z.string().min(1)),
  body: z.unknown().refine(v => v !== undefined, 'Required'),
}).strict();

const higherOrder = {
  id,
  function: z.unknown().refine(v => v !== undefined, 'Required'),
  iterable: z.unknown().refine(v => v !== undefined, 'Required'),
};

export const WireMapShape = z.object({ type: z.literal('map'), ...higherOrder }).strict();

export const WireFilterShape = z.object({ type: z.literal('filter'), ...higherOrder }).strict();

export const WireReduceShape = z.object({
  type: z.literal('reduce'),
  ...higherOrder,
  initial: z.unknown().optional(),
}).strict();

export const WireConditionalShape = z.object({
  type: z.literal('conditional'),
  id,
  predicate: z.unknown().refine(v => v !== undefined, 'Required'),
  consequent: z.unknown().refine(v => v !== undefined, 'Required'),
  alternate: z.unknown().refine(v => v !== undefined, 'Required'),
}).strict();

export const WireProgramShape = z.object({
  type: z.literal('program'),
  id,
  body: z.array(z.unknown()),
  name: z.string().optional(),
  description: z.string().optional(),
}).strict();

export const WireRefShape = z.object({
  ref: z.string().min(1),
}).strict();

export const WireShapes = {
  value: WireValueShape,
  function: WireFunctionShape,
  lambda: WireLambdaShape,
  map: WireMapShape,
  filter: WireFilterShape,
  reduce: WireReduceShape,
  conditional: WireConditionalShape,
  program: WireProgramShape,
} as const satisfies Record<NodeKind, z.ZodTypeAny>;

export const WireDocumentShape = z.object({
  schema_version: z.literal(CURRENT_SCHEMA_VERSION),
  ast: z.unknown().refine(v => v !== undefined, 'Required'),
}).strict();
