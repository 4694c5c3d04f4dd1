import { ToolRegistry } from '../registry.js';
import { arithmeticTools } from './arithmetic.js';
import { comparisonTools } from './comparison.js';
import { listTools } from './list.js';

export function createDefaultToolRegistry(): ToolRegistry {
  const r = new ToolRegistry();
  [...arithmeticTools, ...comparisonTools, ...listTools].forEach(t => r.register(t));
  return r;
}
