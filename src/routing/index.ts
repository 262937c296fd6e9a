/**
 * Task routing module.
 */

export {
  TaskRouter,
  type AgentSelection,
  type AgentStatusEntry,
  type AgentStatusError,
  type TaskRouterConfig,
} from './task-router.js';
