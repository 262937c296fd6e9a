/**
 * LocalTransport - In-process delivery between agents.
 *
 * Used when sender and recipient live in the same process. Each hosted
 * agent attaches its inbound handler; delivery is a direct function call.
 *
 * Usage:
 * ```typescript
 * const transport = new LocalTransport();
 * const client = new DelegationClient('planning-001', directory, transport);
 * transport.attach('planning-001', (envelope) => client.handleInbound(envelope));
 * await transport.start();
 * ```
 */

import type { AgentRecord } from '../directory/types.js';
import type { DeliveryResult, Envelope } from '../a2a/types.js';
import type { ITransport, InboundHandler } from './types.js';
import { createLogger } from '../utils/logger.js';

export class LocalTransport implements ITransport {
  private readonly handlers = new Map<string, InboundHandler>();
  private running = false;
  private logger = createLogger('LocalTransport');

  /**
   * Attach the inbound handler for an agent id, replacing any previous one.
   */
  attach(agentId: string, handler: InboundHandler): void {
    this.handlers.set(agentId, handler);
    this.logger.debug({ agentId }, 'Inbound handler attached');
  }

  detach(agentId: string): void {
    if (this.handlers.delete(agentId)) {
      this.logger.debug({ agentId }, 'Inbound handler detached');
    }
  }

  isAttached(agentId: string): boolean {
    return this.handlers.has(agentId);
  }

  /**
   * Deliver by calling the target's attached handler.
   *
   * @throws Error if no handler is attached for the target
   */
  async deliver(envelope: Envelope, target: AgentRecord): Promise<DeliveryResult> {
    if (!this.running) {
      this.logger.warn({ messageId: envelope.messageId }, 'Transport not started, delivery may fail');
    }

    const handler = this.handlers.get(target.id);
    if (!handler) {
      this.logger.error({ targetId: target.id, messageId: envelope.messageId }, 'No inbound handler attached');
      throw new Error(`No inbound handler attached for agent ${target.id}`);
    }

    this.logger.debug(
      { targetId: target.id, kind: envelope.kind, messageId: envelope.messageId },
      'Delivering envelope'
    );

    const ack = await handler(envelope);
    if (ack.status === 'error') {
      this.logger.warn({ targetId: target.id, messageId: envelope.messageId, error: ack.error }, 'Envelope rejected');
      return { status: 'failed', response: ack };
    }

    return { status: 'delivered', response: ack };
  }

  /**
   * Start the transport.
   * For LocalTransport, this just marks the transport as running.
   */
  async start(): Promise<void> {
    this.running = true;
    this.logger.info('LocalTransport started');
  }

  /**
   * Stop the transport and detach every handler.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.handlers.clear();
    this.logger.info('LocalTransport stopped');
  }

  isRunning(): boolean {
    return this.running;
  }
}
