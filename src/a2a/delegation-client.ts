/**
 * DelegationClient - identity-scoped agent-to-agent gateway.
 *
 * Outbound: builds envelopes, resolves targets through the shared
 * AgentDirectory and hands them to the Delivery capability.
 * Inbound: validates envelopes and queues delegations and direct messages
 * in this identity's inbox for `receive`.
 *
 * @module a2a/delegation-client
 */

import type { Logger } from 'pino';
import type { AgentDirectory } from '../directory/agent-directory.js';
import type { AgentRecord } from '../directory/types.js';
import type { Delivery } from '../transport/types.js';
import type { TaskDescriptor } from '../types/task.js';
import { createLogger } from '../utils/logger.js';
import { AsyncQueue } from '../utils/async-queue.js';
import { retry, withTimeout } from '../utils/retry.js';
import {
  DelegationFailedError,
  TargetNotFoundError,
  UnknownEnvelopeKindError,
  isRetryable,
} from '../utils/errors.js';
import { createDirectMessage, createStatusUpdate, createTaskDelegation } from './envelope.js';
import {
  ENVELOPE_KINDS,
  EnvelopeSchema,
  type BroadcastReport,
  type DeliveryResult,
  type Envelope,
  type EnvelopeKind,
  type InboundAck,
} from './types.js';

/**
 * DelegationClient options.
 */
export interface DelegationClientOptions {
  /** Inbox capacity; the oldest envelope is dropped on overflow (default: 1000) */
  inboxCapacity?: number;
  /** Default wait for `receive` in milliseconds (default: 1000) */
  receiveTimeoutMs?: number;
  /** Delivery retries for retryable failures (default: 0) */
  maxRetries?: number;
  /** Initial backoff between delivery retries (default: 500) */
  retryDelayMs?: number;
  /** Deadline for one delivery attempt; 0 waits indefinitely (default: 0) */
  deliveryTimeoutMs?: number;
}

/**
 * Envelopes that land in the inbox.
 */
export type InboxEnvelope = Extract<Envelope, { kind: 'task_delegation' | 'direct_message' }>;

function isEnvelopeKind(value: unknown): value is EnvelopeKind {
  return typeof value === 'string' && (ENVELOPE_KINDS as readonly string[]).includes(value);
}

function readKind(envelope: unknown): unknown {
  if (typeof envelope === 'object' && envelope !== null && 'kind' in envelope) {
    return envelope.kind;
  }
  return undefined;
}

export class DelegationClient {
  readonly agentId: string;
  readonly directory: AgentDirectory;

  private readonly delivery: Delivery;
  private readonly subscribers = new Set<string>();
  private readonly inbox: AsyncQueue<InboxEnvelope>;
  private readonly receiveTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly deliveryTimeoutMs: number;
  private readonly logger: Logger;
  private readonly lastStatus = new Map<string, Record<string, unknown>>();

  constructor(
    agentId: string,
    directory: AgentDirectory,
    delivery: Delivery,
    options: DelegationClientOptions = {}
  ) {
    this.agentId = agentId;
    this.directory = directory;
    this.delivery = delivery;
    this.inbox = new AsyncQueue<InboxEnvelope>(options.inboxCapacity ?? 1000);
    this.receiveTimeoutMs = options.receiveTimeoutMs ?? 1000;
    this.maxRetries = options.maxRetries ?? 0;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.deliveryTimeoutMs = options.deliveryTimeoutMs ?? 0;
    this.logger = createLogger(`DelegationClient:${agentId}`, { agentId });
  }

  /**
   * Delegate a task to another agent.
   *
   * @throws TargetNotFoundError if the directory has no record for `targetId`
   * @throws DelegationFailedError if delivery raises
   */
  async delegateTask(targetId: string, task: TaskDescriptor): Promise<DeliveryResult> {
    const target = this.resolve(targetId);
    const envelope = createTaskDelegation(this.agentId, targetId, task);
    this.logger.info({ targetId, messageId: envelope.messageId, taskType: task.type }, 'Delegating task');
    return this.send(envelope, target);
  }

  /**
   * Send free text to another agent.
   *
   * @throws TargetNotFoundError if the directory has no record for `targetId`
   * @throws DelegationFailedError if delivery raises
   */
  async sendDirect(targetId: string, text: string): Promise<DeliveryResult> {
    const target = this.resolve(targetId);
    const envelope = createDirectMessage(this.agentId, targetId, text);
    this.logger.debug({ targetId, messageId: envelope.messageId }, 'Sending direct message');
    return this.send(envelope, target);
  }

  /**
   * Send a status update to every subscriber. Never raises.
   *
   * The subscriber set is snapshotted first; each subscriber gets at most
   * one delivery attempt per call and a failure does not stop the others.
   */
  async broadcastStatus(status: Record<string, unknown>): Promise<BroadcastReport> {
    const report: BroadcastReport = { delivered: [], failed: [], skipped: [] };
    const targets: AgentRecord[] = [];

    for (const subscriberId of [...this.subscribers]) {
      const target = this.directory.get(subscriberId);
      if (target) {
        targets.push(target);
      } else {
        report.skipped.push(subscriberId);
      }
    }

    // async so a synchronous throw becomes this subscriber's rejection
    const outcomes = await Promise.allSettled(
      targets.map(async (target) =>
        withTimeout(
          this.delivery.deliver(createStatusUpdate(this.agentId, status), target),
          this.deliveryTimeoutMs,
          `status_update to ${target.id}`
        )
      )
    );

    outcomes.forEach((outcome, index) => {
      const subscriberId = targets[index].id;
      if (outcome.status === 'fulfilled' && outcome.value.status === 'delivered') {
        report.delivered.push(subscriberId);
        return;
      }

      const error = outcome.status === 'rejected'
        ? (outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason))
        : 'delivery reported failure';
      report.failed.push({ agentId: subscriberId, error });
      this.logger.warn({ subscriberId, error }, 'Failed to send status update');
    });

    if (report.skipped.length > 0) {
      this.logger.debug({ skipped: report.skipped }, 'Skipped unresolvable status subscribers');
    }

    return report;
  }

  subscribe(agentId: string): void {
    if (!this.subscribers.has(agentId)) {
      this.subscribers.add(agentId);
      this.logger.debug({ subscriberId: agentId }, 'Subscriber added');
    }
  }

  unsubscribe(agentId: string): void {
    if (this.subscribers.delete(agentId)) {
      this.logger.debug({ subscriberId: agentId }, 'Subscriber removed');
    }
  }

  getSubscribers(): string[] {
    return [...this.subscribers];
  }

  /**
   * Next inbound delegation or direct message.
   *
   * @param timeoutMs - Maximum wait (default: the client's receiveTimeoutMs)
   * @returns The envelope, or undefined on timeout
   */
  receive(timeoutMs: number = this.receiveTimeoutMs): Promise<InboxEnvelope | undefined> {
    return this.inbox.shift(timeoutMs);
  }

  get pendingCount(): number {
    return this.inbox.length;
  }

  /**
   * Latest status received from each sender.
   */
  getReceivedStatuses(): Map<string, Record<string, unknown>> {
    return new Map(this.lastStatus);
  }

  /**
   * Dispatch an inbound envelope by kind.
   *
   * Unknown kinds and malformed envelopes yield an error acknowledgment.
   */
  async handleInbound(envelope: unknown): Promise<InboundAck> {
    const kind = readKind(envelope);
    if (!isEnvelopeKind(kind)) {
      const error = new UnknownEnvelopeKindError(String(kind));
      this.logger.warn({ kind }, error.message);
      return { status: 'error', error: error.message };
    }

    const parsed = EnvelopeSchema.safeParse(envelope);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      this.logger.warn({ kind, detail }, 'Malformed inbound envelope');
      return { status: 'error', error: `Malformed ${kind} envelope: ${detail}` };
    }

    const message = parsed.data;
    switch (message.kind) {
      case 'task_delegation':
        this.enqueue(message);
        this.logger.info({ from: message.from, messageId: message.messageId }, 'Task delegation received');
        return { status: 'accepted', message: 'Task delegation received' };

      case 'status_update':
        this.lastStatus.set(message.from, message.status);
        this.logger.info({ from: message.from, status: message.status }, 'Status update received');
        return { status: 'received' };

      case 'direct_message':
        this.enqueue(message);
        this.logger.info({ from: message.from, messageId: message.messageId }, 'Direct message received');
        return { status: 'received' };
    }
  }

  private enqueue(envelope: InboxEnvelope): void {
    const dropped = this.inbox.push(envelope);
    if (dropped) {
      this.logger.warn(
        { droppedMessageId: dropped.messageId, capacity: this.inbox.capacity },
        'Inbox full, dropped oldest envelope'
      );
    }
  }

  private resolve(targetId: string): AgentRecord {
    const target = this.directory.get(targetId);
    if (!target) {
      throw new TargetNotFoundError(targetId);
    }
    return target;
  }

  private async send(envelope: Envelope, target: AgentRecord): Promise<DeliveryResult> {
    try {
      return await retry(async () => this.delivery.deliver(envelope, target), {
        maxRetries: this.maxRetries,
        initialDelayMs: this.retryDelayMs,
        attemptTimeoutMs: this.deliveryTimeoutMs,
        operation: `${envelope.kind} to ${target.id}`,
        shouldRetry: isRetryable,
        onRetry: (attempt, error, delayMs) => {
          this.logger.warn(
            { targetId: target.id, messageId: envelope.messageId, attempt, delayMs: Math.round(delayMs), err: error },
            'Retrying delivery'
          );
        },
      });
    } catch (error) {
      this.logger.error({ targetId: target.id, messageId: envelope.messageId, err: error }, 'Delivery failed');
      throw new DelegationFailedError(target.id, error);
    }
  }
}
