/**
 * SessionManager - per-user conversation state in front of the TaskRouter.
 *
 * Turns each user message into a TaskDescriptor (classification, context,
 * recent history), routes it and records both sides of the exchange.
 * Calls for the same user are serialized so history order matches arrival
 * order; different users proceed concurrently.
 *
 * @module session/session-manager
 */

import type { TaskRouter } from '../routing/task-router.js';
import type { TaskDescriptor, HistoryEntry } from '../types/task.js';
import { createLogger } from '../utils/logger.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { NoSuitableAgentError, SessionNotFoundError } from '../utils/errors.js';
import { logError } from '../utils/error-handler.js';
import { classifyMessage } from './classifier.js';
import { ConversationHistory } from './conversation-history.js';
import type {
  ConversationState,
  MultiAgentContext,
  SessionManagerOptions,
  SessionStats,
} from './types.js';

const DEFAULT_HISTORY_WINDOW = 5;

export class SessionManager {
  private readonly states = new Map<string, ConversationState>();
  private readonly histories = new ConversationHistory();
  private readonly locks = new KeyedMutex();
  private readonly router: TaskRouter;
  private readonly historyWindow: number;
  private readonly now: () => Date;
  private readonly logger = createLogger('SessionManager');

  constructor(router: TaskRouter, options: SessionManagerOptions = {}) {
    this.router = router;
    this.historyWindow = options.historyWindow ?? DEFAULT_HISTORY_WINDOW;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Route a user message and return the reply text.
   *
   * Never rejects: unroutable messages yield the no-suitable-agent text and
   * any other routing failure yields an error text, so every user entry is
   * followed by an assistant entry.
   */
  async process(userId: string, message: string): Promise<string> {
    return this.locks.runExclusive(userId, async () => {
      this.ensureSession(userId);
      this.record(userId, 'user', message);

      const task = this.buildTask(userId, message);
      this.logger.debug(
        { userId, taskType: task.type, requiredCapabilities: task.requiredCapabilities },
        'Message classified'
      );

      let response: string;
      try {
        response = await this.router.route(task);
      } catch (error) {
        if (error instanceof NoSuitableAgentError) {
          this.logger.warn({ userId, taskType: task.type }, 'Message could not be routed');
          response = error.message;
        } else {
          logError(error, { userId, taskType: task.type }, this.logger);
          response = `Error processing message: ${error instanceof Error ? error.message : String(error)}`;
        }
      }

      this.record(userId, 'assistant', response);
      return response;
    });
  }

  /**
   * Build the task descriptor for a message from the user's current state.
   */
  buildTask(userId: string, message: string): TaskDescriptor {
    const { type, requiredCapabilities } = classifyMessage(message);
    const state = this.states.get(userId);

    return {
      type,
      message,
      userId,
      requiredCapabilities,
      context: { ...(state?.context ?? {}) },
      history: this.histories.get(userId, this.historyWindow),
      timestamp: this.now().toISOString(),
    };
  }

  /**
   * Full history, or the most recent `limit` entries.
   */
  history(userId: string, limit?: number): HistoryEntry[] {
    return this.histories.get(userId, limit);
  }

  formatHistory(userId: string, limit?: number): string {
    return this.histories.format(userId, limit);
  }

  getState(userId: string): ConversationState | undefined {
    const state = this.states.get(userId);
    return state
      ? { ...state, context: { ...state.context }, preferences: { ...state.preferences } }
      : undefined;
  }

  /**
   * Merge `patch` into the user's context.
   *
   * @throws SessionNotFoundError if the user has no session
   */
  updateContext(userId: string, patch: Record<string, unknown>): void {
    const state = this.states.get(userId);
    if (!state) {
      throw new SessionNotFoundError(userId);
    }
    Object.assign(state.context, patch);
    this.logger.info({ userId, keys: Object.keys(patch) }, 'Updated context');
  }

  /**
   * Replace the user's preferences, creating the session if needed.
   */
  setPreferences(userId: string, preferences: Record<string, unknown>): void {
    const state = this.ensureSession(userId);
    state.preferences = { ...preferences };
    this.logger.info({ userId, keys: Object.keys(preferences) }, 'Set preferences');
  }

  /**
   * Mark the session inactive. State and history are kept.
   */
  end(userId: string): void {
    const state = this.states.get(userId);
    if (state && state.active) {
      state.active = false;
      this.logger.info({ userId }, 'Ended conversation');
    }
  }

  /**
   * Remove all state for users idle longer than `thresholdMs`.
   *
   * @returns Removed user ids
   */
  cleanupInactive(thresholdMs: number): string[] {
    const cutoff = this.now().getTime() - thresholdMs;
    const removed: string[] = [];

    for (const [userId, state] of this.states) {
      if (Date.parse(state.lastActivity) < cutoff) {
        removed.push(userId);
      }
    }

    for (const userId of removed) {
      this.states.delete(userId);
      this.histories.delete(userId);
      this.logger.info({ userId }, 'Cleaned up inactive conversation');
    }

    return removed;
  }

  stats(): SessionStats {
    let activeSessions = 0;
    for (const state of this.states.values()) {
      if (state.active) {
        activeSessions++;
      }
    }

    return {
      totalSessions: this.states.size,
      activeSessions,
      totalMessages: this.histories.countEntries(),
      routerStatus: this.router.status(),
    };
  }

  /**
   * Record a multi-agent conversation in the user's context.
   */
  startMultiAgentConversation(userId: string, agentIds: string[], topic: string): string {
    this.ensureSession(userId);

    const multiAgent: MultiAgentContext = {
      type: 'multi_agent',
      agents: [...agentIds],
      topic,
      startedAt: this.now().toISOString(),
    };
    this.updateContext(userId, { multi_agent: multiAgent });

    const unknown = agentIds.filter((agentId) => !this.router.hasAgent(agentId));
    if (unknown.length > 0) {
      this.logger.warn({ userId, agentIds: unknown }, 'Multi-agent conversation names agents not hosted locally');
    }

    return `Started multi-agent conversation with ${agentIds.length} agents on topic: ${topic}`;
  }

  private ensureSession(userId: string): ConversationState {
    const existing = this.states.get(userId);
    if (existing) {
      return existing;
    }

    const timestamp = this.now().toISOString();
    const state: ConversationState = {
      startedAt: timestamp,
      context: {},
      preferences: {},
      lastActivity: timestamp,
      active: true,
    };
    this.states.set(userId, state);
    this.logger.info({ userId }, 'Initialized conversation');
    return state;
  }

  private record(userId: string, role: 'user' | 'assistant', content: string): void {
    const timestamp = this.now();
    this.histories.append(userId, role, content, timestamp);
    const state = this.states.get(userId);
    if (state) {
      state.lastActivity = timestamp.toISOString();
    }
  }
}
