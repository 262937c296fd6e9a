/**
 * Agent-to-agent envelope types.
 *
 * Envelopes are the transmissible unit between agents. Inbound envelopes
 * arrive as untyped data, so each kind has a zod schema used by
 * `DelegationClient.handleInbound`.
 */

import { z } from 'zod';

export const ENVELOPE_KINDS = ['task_delegation', 'status_update', 'direct_message'] as const;

export type EnvelopeKind = (typeof ENVELOPE_KINDS)[number];

const HistoryEntrySchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  timestamp: z.string(),
});

export const TaskDescriptorSchema = z.object({
  type: z.string(),
  message: z.string(),
  userId: z.string(),
  requiredCapabilities: z.array(z.string()),
  context: z.record(z.unknown()),
  history: z.array(HistoryEntrySchema),
  timestamp: z.string(),
});

const EnvelopeBaseSchema = z.object({
  /** Unique message id */
  messageId: z.string(),
  /** Sender agent id */
  from: z.string(),
  /** ISO-8601 creation timestamp */
  timestamp: z.string(),
});

export const TaskDelegationEnvelopeSchema = EnvelopeBaseSchema.extend({
  kind: z.literal('task_delegation'),
  to: z.string(),
  task: TaskDescriptorSchema,
});

export const StatusUpdateEnvelopeSchema = EnvelopeBaseSchema.extend({
  kind: z.literal('status_update'),
  /** Absent for broadcast */
  to: z.string().optional(),
  status: z.record(z.unknown()),
});

export const DirectMessageEnvelopeSchema = EnvelopeBaseSchema.extend({
  kind: z.literal('direct_message'),
  to: z.string(),
  content: z.string(),
});

export const EnvelopeSchema = z.discriminatedUnion('kind', [
  TaskDelegationEnvelopeSchema,
  StatusUpdateEnvelopeSchema,
  DirectMessageEnvelopeSchema,
]);

export type TaskDelegationEnvelope = z.infer<typeof TaskDelegationEnvelopeSchema>;
export type StatusUpdateEnvelope = z.infer<typeof StatusUpdateEnvelopeSchema>;
export type DirectMessageEnvelope = z.infer<typeof DirectMessageEnvelopeSchema>;
export type Envelope = z.infer<typeof EnvelopeSchema>;

/**
 * Acknowledgment returned by an inbound handler.
 */
export type InboundAck =
  | { status: 'accepted'; message: string }
  | { status: 'received' }
  | { status: 'error'; error: string };

/**
 * Outcome reported by the delivery capability.
 */
export interface DeliveryResult {
  status: 'delivered' | 'failed';
  response?: unknown;
}

/**
 * Per-subscriber outcome of a status broadcast.
 */
export interface BroadcastReport {
  delivered: string[];
  failed: Array<{ agentId: string; error: string }>;
  /** Subscribers the directory could not resolve */
  skipped: string[];
}
