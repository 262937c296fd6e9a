import type { TaskDescriptor } from './task.js';

/**
 * Lifecycle state of an agent.
 */
export type AgentState = 'idle' | 'processing' | 'error' | 'shutting_down';

/**
 * Outcome of an agent processing a task.
 */
export type AgentTaskResult =
  | { success: true; result: string; agent: string }
  | { success: false; error: string; agent: string };

/**
 * Point-in-time status reported by an agent.
 */
export interface AgentStatusSnapshot {
  agentId: string;
  status: AgentState;
  capabilities: string[];
  tools: string[];
  memoryKeys: string[];
}

/**
 * Contract every locally hosted agent satisfies.
 */
export interface AgentHandle {
  readonly agentId: string;
  processTask(task: TaskDescriptor): Promise<AgentTaskResult>;
  getStatus(): AgentStatusSnapshot;
  getCapabilities(): readonly string[];
}
