/**
 * Conversation session module.
 */

export { SessionManager } from './session-manager.js';
export { ConversationHistory } from './conversation-history.js';
export {
  CLASSIFICATION_TABLE,
  classifyMessage,
  type Classification,
  type ClassificationRule,
} from './classifier.js';
export type {
  ConversationState,
  MultiAgentContext,
  SessionManagerOptions,
  SessionStats,
} from './types.js';
