/**
 * Agent directory record types.
 */

import { z } from 'zod';

/**
 * Schema of a registered agent's capability record.
 */
export const AgentRecordSchema = z.object({
  /** Unique, stable identifier */
  id: z.string().min(1),
  /** Display name */
  name: z.string(),
  description: z.string(),
  /** Ordered capability tags, matched case-sensitively */
  capabilities: z.array(z.string()),
  /** Transport name → endpoint address */
  endpoints: z.record(z.string()).default({}),
  /** Auth scheme → credential hint (never enforced here) */
  authentication: z.record(z.string()).default({}),
  metadata: z.record(z.unknown()).default({}),
});

/**
 * Capability record of a discoverable agent.
 */
export type AgentRecord = z.infer<typeof AgentRecordSchema>;

/**
 * Input accepted by `AgentDirectory.register` (maps may be omitted).
 */
export type AgentRecordInput = z.input<typeof AgentRecordSchema>;
