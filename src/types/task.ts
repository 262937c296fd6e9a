/**
 * Task descriptors produced by the session layer and consumed by routing
 * and agents.
 */

/**
 * Built-in task categories. Any other string is accepted as a task type.
 */
export type KnownTaskType = 'research' | 'planning' | 'analysis' | 'coding' | 'general';

export type TaskType = KnownTaskType | (string & {});

/**
 * Speaker of a history entry.
 */
export type HistoryRole = 'user' | 'assistant';

/**
 * Single entry in a user's conversation history.
 */
export interface HistoryEntry {
  role: HistoryRole;
  content: string;
  /** ISO-8601 timestamp */
  timestamp: string;
}

/**
 * Routable description of a unit of work.
 */
export interface TaskDescriptor {
  type: TaskType;
  /** Originating free-text message */
  message: string;
  /** Originating user id */
  userId: string;
  /** Capability tags an agent must advertise to handle the task */
  requiredCapabilities: string[];
  /** Accumulated conversation facts */
  context: Record<string, unknown>;
  /** Recent history, chronological */
  history: HistoryEntry[];
  /** ISO-8601 creation timestamp */
  timestamp: string;
}
