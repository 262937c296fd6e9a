/**
 * agentmesh - capability-based task routing, agent-to-agent delegation and
 * per-user conversation sessions.
 */

export * from './directory/index.js';
export * from './a2a/index.js';
export * from './transport/index.js';
export * from './routing/index.js';
export * from './session/index.js';
export * from './llm/index.js';
export * from './tools/index.js';
export * from './agents/index.js';
export * from './config/index.js';
export { AgentMesh, createAgentMesh, type AgentMeshOptions } from './system.js';

export type { TaskDescriptor, HistoryEntry, KnownTaskType } from './types/task.js';
export type { AgentHandle, AgentState, AgentStatusSnapshot, AgentTaskResult } from './types/agent.js';

export {
  AgentMeshError,
  TargetNotFoundError,
  DelegationFailedError,
  NoSuitableAgentError,
  UnknownEnvelopeKindError,
  InvalidToolInvocationError,
  SessionNotFoundError,
  ProviderError,
  TimeoutError,
  ConfigurationError,
  isRetryable,
  formatError,
} from './utils/errors.js';
export { initLogger, createLogger, flushLogger, type LoggerConfig, type LogLevel } from './utils/logger.js';
