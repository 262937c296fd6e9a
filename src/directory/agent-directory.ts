/**
 * AgentDirectory - process-wide registry of agent capability records.
 *
 * Constructed once at startup and passed to every DelegationClient and the
 * TaskRouter. All operations are synchronous, so each call observes the
 * latest completed register/unregister.
 *
 * @module directory/agent-directory
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { ConfigurationError } from '../utils/errors.js';
import { AgentRecordSchema, type AgentRecord, type AgentRecordInput } from './types.js';

const DirectorySnapshotSchema = z.record(AgentRecordSchema);

function copyRecord(record: AgentRecord): AgentRecord {
  return {
    ...record,
    capabilities: [...record.capabilities],
    endpoints: { ...record.endpoints },
    authentication: { ...record.authentication },
    metadata: { ...record.metadata },
  };
}

export class AgentDirectory {
  private readonly records = new Map<string, AgentRecord>();
  private readonly logger = createLogger('AgentDirectory');

  get size(): number {
    return this.records.size;
  }

  /**
   * Insert or overwrite a record by id. Last writer wins.
   */
  register(input: AgentRecordInput): AgentRecord {
    const record: AgentRecord = {
      id: input.id,
      name: input.name,
      description: input.description,
      capabilities: [...input.capabilities],
      endpoints: { ...input.endpoints },
      authentication: { ...input.authentication },
      metadata: { ...input.metadata },
    };
    const replaced = this.records.has(record.id);
    this.records.set(record.id, record);
    this.logger.info(
      { agentId: record.id, name: record.name, capabilities: record.capabilities, replaced },
      'Registered agent'
    );
    return copyRecord(record);
  }

  /**
   * Remove a record. Unknown ids are ignored.
   *
   * @returns Whether a record was removed
   */
  unregister(id: string): boolean {
    const removed = this.records.delete(id);
    if (removed) {
      this.logger.info({ agentId: id }, 'Unregistered agent');
    }
    return removed;
  }

  get(id: string): AgentRecord | undefined {
    const record = this.records.get(id);
    return record ? copyRecord(record) : undefined;
  }

  /**
   * All records advertising `capability`, in registration order.
   */
  findByCapability(capability: string): AgentRecord[] {
    const matches: AgentRecord[] = [];
    for (const record of this.records.values()) {
      if (record.capabilities.includes(capability)) {
        matches.push(copyRecord(record));
      }
    }
    return matches;
  }

  /**
   * Case-insensitive substring search over name and description.
   */
  search(query: string): AgentRecord[] {
    const needle = query.toLowerCase();
    const matches: AgentRecord[] = [];
    for (const record of this.records.values()) {
      if (
        record.name.toLowerCase().includes(needle) ||
        record.description.toLowerCase().includes(needle)
      ) {
        matches.push(copyRecord(record));
      }
    }
    return matches;
  }

  list(): AgentRecord[] {
    return Array.from(this.records.values(), copyRecord);
  }

  /**
   * Serialize every record keyed by id.
   */
  toJSON(): string {
    return JSON.stringify(Object.fromEntries(this.records), null, 2);
  }

  /**
   * Rebuild a directory from `toJSON` output.
   *
   * @throws ConfigurationError if the snapshot is not valid JSON or a record is malformed
   */
  static fromJSON(json: string): AgentDirectory {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      throw new ConfigurationError(
        `Directory snapshot is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const parsed = DirectorySnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        'Directory snapshot is invalid',
        parsed.error.issues.map((issue) => ({
          field: issue.path.join('.'),
          message: issue.message,
        }))
      );
    }

    const directory = new AgentDirectory();
    for (const record of Object.values(parsed.data)) {
      directory.register(record);
    }
    return directory;
  }
}
