/**
 * Agent-to-agent protocol module.
 */

export * from './types.js';
export {
  createDirectMessage,
  createMessageId,
  createStatusUpdate,
  createTaskDelegation,
} from './envelope.js';
export {
  DelegationClient,
  type DelegationClientOptions,
  type InboxEnvelope,
} from './delegation-client.js';
