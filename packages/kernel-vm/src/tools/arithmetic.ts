import type { JsonValue, ParameterSchema } from '@canopy/types';
import type { ToolDefinition } from '../tool.js';

const VERSION = '1.0.0';

function numbers(...names: string[]): ParameterSchema {
  const properties: ParameterSchema['properties'] = {};
  for (const name of names) properties[name] = { type: 'number' };
  return { type: 'object', properties, required: names };
}

function num(args: readonly JsonValue[], i: number): number {
  const value = args[i];
  if (typeof value !== 'number') {
    throw new Error(`Expected a number at position ${i}, got ${JSON.stringify(value ?? null)}`);
  }
  return value;
}

export const addTool: ToolDefinition = {
  name: 'add', version: VERSION, category: 'arithmetic',
  description: 'Add two numbers',
  parameter_schema: numbers('a', 'b'),
  execute: args => num(args, 0) + num(args, 1),
};

export const subtractTool: ToolDefinition = {
  name: 'subtract', version: VERSION, category: 'arithmetic',
  description: 'Subtract b from a',
  parameter_schema: numbers('a', 'b'),
  execute: args => num(args, 0) - num(args, 1),
};

export const multiplyTool: ToolDefinition = {
  name: 'multiply', version: VERSION, category: 'arithmetic',
  description: 'Multiply two numbers',
  parameter_schema: numbers('a', 'b'),
  execute: args => num(args, 0) * num(args, 1),
};

export const divideTool: ToolDefinition = {
  name: 'divide', version: VERSION, category: 'arithmetic',
  description: 'Divide a by b',
  parameter_schema: numbers('a', 'b'),
  execute(args) {
    const b = num(args, 1);
    if (b === 0) throw new Error('Cannot divide by zero.');
    return num(args, 0) / b;
  },
};

export const powerTool: ToolDefinition = {
  name: 'power', version: VERSION, category: 'arithmetic',
  description: 'Raise a to the power b',
  parameter_schema: numbers('a', 'b'),
  execute: args => num(args, 0) ** num(args, 1),
};

export const sqrtTool: ToolDefinition = {
  name: 'sqrt', version: VERSION, category: 'arithmetic',
  description: 'Square root of a',
  parameter_schema: numbers('a'),
  execute(args) {
    const a = num(args, 0);
    if (a < 0) throw new Error('Cannot take square root of a negative number.');
    return Math.sqrt(a);
  },
};

export const moduloTool: ToolDefinition = {
  name: 'modulo', version: VERSION, category: 'arithmetic',
  description: 'Remainder of a divided by b',
  parameter_schema: numbers('a', 'b'),
  execute(args) {
    const b = num(args, 1);
    if (b === 0) throw new Error('Cannot take modulo by zero.');
    return num(args, 0) % b;
  },
};

export const arithmeticTools = [
  addTool, subtractTool, multiplyTool, divideTool, powerTool, sqrtTool, moduloTool,
];
