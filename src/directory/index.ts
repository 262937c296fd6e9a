/**
 * Agent directory module.
 */

export { AgentDirectory } from './agent-directory.js';
export { AgentRecordSchema, type AgentRecord, type AgentRecordInput } from './types.js';
