/**
 * Tests for DelegationClient (src/a2a/delegation-client.ts)
 *
 * Tests the following functionality:
 * - Outbound delegation and direct messages
 * - Retry of retryable delivery failures
 * - Status broadcast to subscribers
 * - Inbound dispatch and the inbox
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { DelegationClient } from './delegation-client.js';
import { createDirectMessage, createStatusUpdate, createTaskDelegation } from './envelope.js';
import { AgentDirectory } from '../directory/agent-directory.js';
import { LocalTransport } from '../transport/local-transport.js';
import { DelegationFailedError, TargetNotFoundError } from '../utils/errors.js';
import type { Delivery } from '../transport/types.js';
import type { DeliveryResult } from './types.js';
import type { TaskDescriptor } from '../types/task.js';

vi.mock('../utils/logger.js', () => ({
  createLogger: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

const task: TaskDescriptor = {
  type: 'research',
  message: 'Research tides',
  userId: 'u1',
  requiredCapabilities: ['web_search'],
  context: {},
  history: [],
  timestamp: '2024-02-02T08:00:00.000Z',
};

const delivered: DeliveryResult = { status: 'delivered' };

function stalled(): Promise<DeliveryResult> {
  return new Promise(() => {});
}

function createDelivery(): { delivery: Delivery; deliver: Mock<Delivery['deliver']> } {
  const deliver = vi.fn<Delivery['deliver']>();
  deliver.mockResolvedValue({ status: 'delivered' });
  return { delivery: { deliver }, deliver };
}

describe('DelegationClient', () => {
  let directory: AgentDirectory;

  beforeEach(() => {
    directory = new AgentDirectory();
    directory.register({ id: 'research-001', name: 'ResearchAgent', description: '', capabilities: ['web_search'] });
    directory.register({ id: 'planning-001', name: 'PlanningAgent', description: '', capabilities: [] });
  });

  describe('delegateTask', () => {
    it('should deliver a task delegation to the resolved target', async () => {
      const { delivery, deliver } = createDelivery();
      const client = new DelegationClient('system', directory, delivery);

      const result = await client.delegateTask('research-001', task);

      expect(result).toEqual({ status: 'delivered' });
      const [envelope, target] = deliver.mock.calls[0];
      expect(envelope).toMatchObject({ kind: 'task_delegation', from: 'system', to: 'research-001', task });
      expect(target.id).toBe('research-001');
    });

    it('should throw TargetNotFoundError without delivering', async () => {
      const { delivery, deliver } = createDelivery();
      const client = new DelegationClient('system', directory, delivery);

      await expect(client.delegateTask('ghost', task)).rejects.toBeInstanceOf(TargetNotFoundError);
      expect(deliver).not.toHaveBeenCalled();
    });

    it('should wrap delivery failures', async () => {
      const { delivery, deliver } = createDelivery();
      deliver.mockRejectedValue(new Error('socket closed'));
      const client = new DelegationClient('system', directory, delivery);

      const promise = client.delegateTask('research-001', task);

      await expect(promise).rejects.toBeInstanceOf(DelegationFailedError);
      await expect(promise).rejects.toThrow('Failed to delegate to research-001: socket closed');
    });

    it('should retry retryable failures when configured', async () => {
      const { delivery, deliver } = createDelivery();
      deliver.mockRejectedValueOnce(new Error('ECONNRESET'));
      const client = new DelegationClient('system', directory, delivery, { maxRetries: 2, retryDelayMs: 0 });

      await expect(client.delegateTask('research-001', task)).resolves.toEqual({ status: 'delivered' });
      expect(deliver).toHaveBeenCalledTimes(2);
    });

    it('should not retry by default', async () => {
      const { delivery, deliver } = createDelivery();
      deliver.mockRejectedValue(new Error('ECONNRESET'));
      const client = new DelegationClient('system', directory, delivery);

      await expect(client.delegateTask('research-001', task)).rejects.toBeInstanceOf(DelegationFailedError);
      expect(deliver).toHaveBeenCalledTimes(1);
    });

    it('should wrap a delivery that throws synchronously', async () => {
      const { delivery, deliver } = createDelivery();
      deliver.mockImplementation(() => {
        throw new Error('encoder crashed');
      });
      const client = new DelegationClient('system', directory, delivery);

      await expect(client.delegateTask('research-001', task)).rejects.toThrow(
        'Failed to delegate to research-001: encoder crashed'
      );
    });
  });

  describe('delivery deadline', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('should fail a delivery that outlives deliveryTimeoutMs', async () => {
      vi.useFakeTimers();
      const { delivery, deliver } = createDelivery();
      deliver.mockImplementation(stalled);
      const client = new DelegationClient('system', directory, delivery, { deliveryTimeoutMs: 50 });

      const pending = client.delegateTask('research-001', task);
      const assertion = expect(pending).rejects.toThrow(
        'Failed to delegate to research-001: task_delegation to research-001 timed out after 50ms'
      );
      await vi.advanceTimersByTimeAsync(50);

      await assertion;
      expect(deliver).toHaveBeenCalledTimes(1);
    });

    it('should retry a timed-out delivery', async () => {
      vi.useFakeTimers();
      const { delivery, deliver } = createDelivery();
      deliver.mockImplementationOnce(stalled);
      const client = new DelegationClient('system', directory, delivery, {
        deliveryTimeoutMs: 50,
        maxRetries: 1,
        retryDelayMs: 10,
      });

      const pending = client.sendDirect('planning-001', 'still there?');
      await vi.advanceTimersByTimeAsync(60);

      await expect(pending).resolves.toEqual({ status: 'delivered' });
      expect(deliver).toHaveBeenCalledTimes(2);
    });

    it('should report a status update that outlives deliveryTimeoutMs as failed', async () => {
      vi.useFakeTimers();
      directory.register({ id: 'observer', name: 'Observer', description: '', capabilities: [] });
      const { delivery, deliver } = createDelivery();
      deliver.mockImplementation((_envelope, target) =>
        target.id === 'observer' ? stalled() : Promise.resolve(delivered)
      );
      const client = new DelegationClient('research-001', directory, delivery, { deliveryTimeoutMs: 30 });
      client.subscribe('planning-001');
      client.subscribe('observer');

      const pending = client.broadcastStatus({ state: 'busy' });
      await vi.advanceTimersByTimeAsync(30);

      expect(await pending).toEqual({
        delivered: ['planning-001'],
        failed: [{ agentId: 'observer', error: 'status_update to observer timed out after 30ms' }],
        skipped: [],
      });
    });
  });

  describe('sendDirect', () => {
    it('should deliver a direct message', async () => {
      const { delivery, deliver } = createDelivery();
      const client = new DelegationClient('research-001', directory, delivery);

      await client.sendDirect('planning-001', 'found three sources');

      expect(deliver.mock.calls[0][0]).toMatchObject({
        kind: 'direct_message',
        from: 'research-001',
        to: 'planning-001',
        content: 'found three sources',
      });
    });
  });

  describe('subscribers', () => {
    it('should keep subscribers unique', () => {
      const client = new DelegationClient('research-001', directory, createDelivery().delivery);

      client.subscribe('planning-001');
      client.subscribe('planning-001');
      client.subscribe('system');
      client.unsubscribe('system');
      client.unsubscribe('never-added');

      expect(client.getSubscribers()).toEqual(['planning-001']);
    });
  });

  describe('broadcastStatus', () => {
    it('should report delivered, failed and skipped subscribers', async () => {
      directory.register({ id: 'observer', name: 'Observer', description: '', capabilities: [] });
      const { delivery, deliver } = createDelivery();
      deliver.mockImplementation(async (_envelope, target) => {
        if (target.id === 'observer') {
          throw new Error('observer offline');
        }
        return { status: 'delivered' };
      });
      const client = new DelegationClient('research-001', directory, delivery);
      client.subscribe('planning-001');
      client.subscribe('observer');
      client.subscribe('ghost');

      const report = await client.broadcastStatus({ state: 'busy' });

      expect(report).toEqual({
        delivered: ['planning-001'],
        failed: [{ agentId: 'observer', error: 'observer offline' }],
        skipped: ['ghost'],
      });
      expect(deliver.mock.calls[0][0]).toMatchObject({ kind: 'status_update', status: { state: 'busy' } });
    });

    it('should count a failed delivery result as a failure', async () => {
      const { delivery, deliver } = createDelivery();
      deliver.mockResolvedValue({ status: 'failed' });
      const client = new DelegationClient('research-001', directory, delivery);
      client.subscribe('planning-001');

      const report = await client.broadcastStatus({ state: 'idle' });

      expect(report.failed).toEqual([{ agentId: 'planning-001', error: 'delivery reported failure' }]);
    });

    it('should still deliver to the others when one subscriber throws synchronously', async () => {
      directory.register({ id: 'observer', name: 'Observer', description: '', capabilities: [] });
      const { delivery, deliver } = createDelivery();
      deliver.mockImplementation((_envelope, target) => {
        if (target.id === 'observer') {
          throw new Error('socket closed');
        }
        return Promise.resolve(delivered);
      });
      const client = new DelegationClient('research-001', directory, delivery);
      client.subscribe('observer');
      client.subscribe('planning-001');

      const report = await client.broadcastStatus({ state: 'busy' });

      expect(report).toEqual({
        delivered: ['planning-001'],
        failed: [{ agentId: 'observer', error: 'socket closed' }],
        skipped: [],
      });
      expect(deliver).toHaveBeenCalledTimes(2);
    });

    it('should finish the current round when a subscriber leaves during delivery', async () => {
      directory.register({ id: 'observer', name: 'Observer', description: '', capabilities: [] });
      const { delivery, deliver } = createDelivery();
      const client = new DelegationClient('research-001', directory, delivery);
      deliver.mockImplementation((_envelope, target) => {
        if (target.id === 'planning-001') {
          client.unsubscribe('observer');
        }
        return Promise.resolve(delivered);
      });
      client.subscribe('planning-001');
      client.subscribe('observer');

      const report = await client.broadcastStatus({ state: 'busy' });

      expect(report.delivered).toEqual(['planning-001', 'observer']);
      expect(deliver).toHaveBeenCalledTimes(2);
      expect(client.getSubscribers()).toEqual(['planning-001']);
    });

    it('should send to a subscriber added during delivery only on the next round', async () => {
      directory.register({ id: 'observer', name: 'Observer', description: '', capabilities: [] });
      const { delivery, deliver } = createDelivery();
      const client = new DelegationClient('research-001', directory, delivery);
      deliver.mockImplementationOnce(() => {
        client.subscribe('observer');
        return Promise.resolve(delivered);
      });
      client.subscribe('planning-001');

      const first = await client.broadcastStatus({ state: 'busy' });
      const second = await client.broadcastStatus({ state: 'idle' });

      expect(first.delivered).toEqual(['planning-001']);
      expect(second.delivered).toEqual(['planning-001', 'observer']);
    });
  });

  describe('handleInbound', () => {
    it('should queue task delegations', async () => {
      const client = new DelegationClient('research-001', directory, createDelivery().delivery);
      const envelope = createTaskDelegation('system', 'research-001', task);

      expect(await client.handleInbound(envelope)).toEqual({
        status: 'accepted',
        message: 'Task delegation received',
      });
      expect(client.pendingCount).toBe(1);
      expect(await client.receive(0)).toEqual(envelope);
    });

    it('should queue direct messages', async () => {
      const client = new DelegationClient('planning-001', directory, createDelivery().delivery);

      expect(await client.handleInbound(createDirectMessage('research-001', 'planning-001', 'hi'))).toEqual({
        status: 'received',
      });
      expect((await client.receive(0))?.kind).toBe('direct_message');
    });

    it('should record status updates without queueing them', async () => {
      const client = new DelegationClient('planning-001', directory, createDelivery().delivery);

      await client.handleInbound(createStatusUpdate('research-001', { state: 'busy' }));
      await client.handleInbound(createStatusUpdate('research-001', { state: 'idle' }));

      expect(client.pendingCount).toBe(0);
      expect(client.getReceivedStatuses().get('research-001')).toEqual({ state: 'idle' });
    });

    it('should reject unknown kinds', async () => {
      const client = new DelegationClient('planning-001', directory, createDelivery().delivery);

      expect(await client.handleInbound({ kind: 'gossip' })).toEqual({
        status: 'error',
        error: 'Unknown message type: gossip',
      });
      expect(await client.handleInbound('not an envelope')).toEqual({
        status: 'error',
        error: 'Unknown message type: undefined',
      });
    });

    it('should reject malformed envelopes of a known kind', async () => {
      const client = new DelegationClient('planning-001', directory, createDelivery().delivery);

      const ack = await client.handleInbound({
        kind: 'direct_message',
        messageId: 'm1',
        from: 'a',
        to: 'planning-001',
        timestamp: '2024-02-02T08:00:00.000Z',
      });

      expect(ack).toEqual({ status: 'error', error: 'Malformed direct_message envelope: content: Required' });
      expect(client.pendingCount).toBe(0);
    });

    it('should drop the oldest envelope when the inbox is full', async () => {
      const client = new DelegationClient('planning-001', directory, createDelivery().delivery, { inboxCapacity: 1 });

      await client.handleInbound(createDirectMessage('a', 'planning-001', 'first'));
      await client.handleInbound(createDirectMessage('a', 'planning-001', 'second'));

      const next = await client.receive(0);
      expect(next?.kind === 'direct_message' && next.content).toBe('second');
    });
  });

  describe('receive', () => {
    it('should resolve undefined when nothing arrives', async () => {
      const client = new DelegationClient('planning-001', directory, createDelivery().delivery, {
        receiveTimeoutMs: 5,
      });

      expect(await client.receive()).toBeUndefined();
    });
  });

  describe('over LocalTransport', () => {
    it('should deliver into the recipient inbox', async () => {
      const transport = new LocalTransport();
      const sender = new DelegationClient('system', directory, transport);
      const recipient = new DelegationClient('research-001', directory, transport);
      transport.attach('research-001', (envelope) => recipient.handleInbound(envelope));
      await transport.start();

      const result = await sender.delegateTask('research-001', task);

      expect(result).toEqual({
        status: 'delivered',
        response: { status: 'accepted', message: 'Task delegation received' },
      });
      const received = await recipient.receive(0);
      expect(received?.kind === 'task_delegation' && received.task).toEqual(task);
      await transport.stop();
    });
  });
});
