import type { JsonValue } from '@canopy/types';
import type { ToolDefinition } from '../tool.js';

const VERSION = '1.0.0';
const MAX_RANGE = 10_000;

export const rangeTool: ToolDefinition = {
  name: 'range', version: VERSION, category: 'list',
  description: 'Numbers from start (inclusive) to stop (exclusive), by step',
  parameter_schema: {
    type: 'object',
    properties: {
      start: { type: 'number' },
      stop: { type: 'number' },
      step: { type: 'number' },
    },
    required: ['start', 'stop'],
  },
  execute([start, stop, step = 1]) {
    const from = Number(start);
    const to = Number(stop);
    const by = Number(step);
    if (by === 0 || Number.isNaN(by)) throw new Error('range step must be a non-zero number');
    const out: number[] = [];
    for (let x = from; by > 0 ? x < to : x > to; x += by) {
      out.push(x);
      if (out.length > MAX_RANGE) throw new Error(`range exceeds ${MAX_RANGE} items`);
    }
    return out;
  },
};

function list(value: JsonValue | undefined): JsonValue[] {
  if (!Array.isArray(value)) {
    throw new Error(`Expected a list, got ${JSON.stringify(value ?? null)}`);
  }
  return value;
}

export const sumTool: ToolDefinition = {
  name: 'sum', version: VERSION, category: 'list',
  description: 'Sum of a list of numbers',
  parameter_schema: {
    type: 'object',
    properties: { values: { type: 'array' } },
    required: ['values'],
  },
  execute: ([values]) => list(values).reduce<number>((total, v) => total + Number(v), 0),
};

export const lengthTool: ToolDefinition = {
  name: 'length', version: VERSION, category: 'list',
  description: 'Number of items in a list',
  parameter_schema: {
    type: 'object',
    properties: { values: { type: 'array' } },
    required: ['values'],
  },
  execute: ([values]) => list(values).length,
};

export const listTools = [rangeTool, sumTool, lengthTool];
