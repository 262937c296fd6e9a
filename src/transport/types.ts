/**
 * Transport layer types for agent-to-agent delivery.
 *
 * The Delivery abstraction decouples how envelopes physically travel from
 * the delegation protocol. agentmesh ships an in-process implementation
 * (LocalTransport); network transports plug in behind the same interface.
 */

import type { AgentRecord } from '../directory/types.js';
import type { DeliveryResult, Envelope, InboundAck } from '../a2a/types.js';

/**
 * Handler invoked for envelopes arriving at an agent.
 * Normally bound to `DelegationClient.handleInbound`.
 */
export type InboundHandler = (envelope: unknown) => Promise<InboundAck>;

/**
 * Delivery capability used by DelegationClient.
 */
export interface Delivery {
  /**
   * Deliver an envelope to a resolved target.
   *
   * @param envelope - Immutable envelope to send
   * @param target - Directory record of the recipient (endpoints pick the route)
   * @returns Delivery outcome
   * @throws When the envelope cannot be delivered at all
   */
  deliver(envelope: Envelope, target: AgentRecord): Promise<DeliveryResult>;
}

/**
 * Transport lifecycle, shared by implementations that hold resources.
 */
export interface ITransport extends Delivery {
  start(): Promise<void>;
  stop(): Promise<void>;
  isRunning(): boolean;
}
