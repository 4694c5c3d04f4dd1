import type { ToolDefinition } from '../tool.js';
import { jsonEqual } from '../node.js';

const VERSION = '1.0.0';

const numberPair = {
  type: 'object' as const,
  properties: { a: { type: 'number' as const }, b: { type: 'number' as const } },
  required: ['a', 'b'],
};

export const greaterThanTool: ToolDefinition = {
  name: 'greater_than', version: VERSION, category: 'comparison',
  description: 'True when a > b',
  parameter_schema: numberPair,
  execute: ([a, b]) => Number(a) > Number(b),
};

export const lessThanTool: ToolDefinition = {
  name: 'less_than', version: VERSION, category: 'comparison',
  description: 'True when a < b',
  parameter_schema: numberPair,
  execute: ([a, b]) => Number(a) < Number(b),
};

export const equalsTool: ToolDefinition = {
  name: 'equals', version: VERSION, category: 'comparison',
  description: 'True when a and b are the same JSON value',
  parameter_schema: {
    type: 'object',
    properties: { a: {}, b: {} },
    required: ['a', 'b'],
  },
  execute: ([a = null, b = null]) => jsonEqual(a, b),
};

export const comparisonTools = [greaterThanTool, lessThanTool, equalsTool];
