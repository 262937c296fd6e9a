/**
 * Agent tools module.
 */

export * from './types.js';
export { ToolManager } from './tool-manager.js';
export { evaluateExpression } from './calculator.js';
export {
  calculatorTool,
  createBuiltinTools,
  createSchedulerTool,
  summarizeTool,
  type ScheduledEvent,
} from './builtin.js';
