import { describe, it, expect } from 'vitest';
import {
  createDirectMessage,
  createMessageId,
  createStatusUpdate,
  createTaskDelegation,
} from './envelope.js';
import { EnvelopeSchema } from './types.js';
import type { TaskDescriptor } from '../types/task.js';

const task: TaskDescriptor = {
  type: 'planning',
  message: 'Plan the offsite',
  userId: 'u1',
  requiredCapabilities: ['task_decomposition'],
  context: {},
  history: [],
  timestamp: '2024-02-02T08:00:00.000Z',
};

describe('createMessageId', () => {
  it('should join sender, recipient, time and sequence', () => {
    const id = createMessageId('research-001', 'planning-001', new Date(1700000000000));

    expect(id).toMatch(/^research-001_planning-001_1700000000000_\d+$/);
  });

  it('should use broadcast when there is no recipient', () => {
    expect(createMessageId('a', undefined, new Date(5))).toMatch(/^a_broadcast_5_\d+$/);
  });

  it('should differ within the same millisecond', () => {
    const now = new Date(42);

    expect(createMessageId('a', 'b', now)).not.toBe(createMessageId('a', 'b', now));
  });
});

describe('envelope builders', () => {
  it('should build a frozen task delegation', () => {
    const envelope = createTaskDelegation('system', 'planning-001', task);

    expect(envelope).toMatchObject({ kind: 'task_delegation', from: 'system', to: 'planning-001', task });
    expect(Object.isFrozen(envelope)).toBe(true);
    expect(EnvelopeSchema.safeParse(envelope).success).toBe(true);
  });

  it('should copy the status of a status update and leave it unaddressed', () => {
    const status = { state: 'busy' };
    const envelope = createStatusUpdate('research-001', status);
    status.state = 'idle';

    expect(envelope.status).toEqual({ state: 'busy' });
    expect(envelope.to).toBeUndefined();
    expect(envelope.messageId).toMatch(/^research-001_broadcast_/);
  });

  it('should build a direct message', () => {
    const envelope = createDirectMessage('a', 'b', 'hello');

    expect(envelope).toMatchObject({ kind: 'direct_message', from: 'a', to: 'b', content: 'hello' });
    expect(Number.isNaN(Date.parse(envelope.timestamp))).toBe(false);
  });
});
