/**
 * Envelope construction.
 *
 * Built envelopes are frozen; ownership passes to the delivery capability.
 */

import type { TaskDescriptor } from '../types/task.js';
import type {
  DirectMessageEnvelope,
  StatusUpdateEnvelope,
  TaskDelegationEnvelope,
} from './types.js';

let sequence = 0;

/**
 * Message id of the form `<from>_<to>_<epochMs>_<seq>`.
 *
 * The per-process sequence keeps ids distinct within one millisecond.
 */
export function createMessageId(from: string, to: string | undefined, now: Date = new Date()): string {
  sequence = (sequence + 1) % Number.MAX_SAFE_INTEGER;
  return `${from}_${to ?? 'broadcast'}_${now.getTime()}_${sequence}`;
}

export function createTaskDelegation(from: string, to: string, task: TaskDescriptor): TaskDelegationEnvelope {
  const now = new Date();
  return Object.freeze({
    kind: 'task_delegation' as const,
    messageId: createMessageId(from, to, now),
    from,
    to,
    task,
    timestamp: now.toISOString(),
  });
}

export function createStatusUpdate(from: string, status: Record<string, unknown>): StatusUpdateEnvelope {
  const now = new Date();
  return Object.freeze({
    kind: 'status_update' as const,
    messageId: createMessageId(from, undefined, now),
    from,
    status: { ...status },
    timestamp: now.toISOString(),
  });
}

export function createDirectMessage(from: string, to: string, content: string): DirectMessageEnvelope {
  const now = new Date();
  return Object.freeze({
    kind: 'direct_message' as const,
    messageId: createMessageId(from, to, now),
    from,
    to,
    content,
    timestamp: now.toISOString(),
  });
}
