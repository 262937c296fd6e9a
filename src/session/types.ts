/**
 * Session layer types.
 */

import type { AgentStatusEntry } from '../routing/task-router.js';

/**
 * Conversation state held for one user.
 */
export interface ConversationState {
  /** ISO-8601 creation time */
  startedAt: string;
  /** Accumulated conversation facts, updated key-wise */
  context: Record<string, unknown>;
  /** Replaced wholesale by setPreferences */
  preferences: Record<string, unknown>;
  /** ISO-8601 time of the last history append */
  lastActivity: string;
  active: boolean;
}

/**
 * Multi-agent conversation marker stored under the `multi_agent` context key.
 */
export interface MultiAgentContext {
  type: 'multi_agent';
  agents: string[];
  topic: string;
  startedAt: string;
}

export interface SessionStats {
  totalSessions: number;
  activeSessions: number;
  totalMessages: number;
  routerStatus: Record<string, AgentStatusEntry>;
}

export interface SessionManagerOptions {
  /** History entries attached to each task (default: 5) */
  historyWindow?: number;
  /** Clock, replaceable in tests */
  now?: () => Date;
}
