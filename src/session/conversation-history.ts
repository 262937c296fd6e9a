/**
 * Per-user conversation history.
 *
 * Append-only: entries are never trimmed on write, only read back with an
 * optional limit. Storage is an in-memory Map and is lost on restart.
 */

import type { HistoryEntry, HistoryRole } from '../types/task.js';

export class ConversationHistory {
  private histories = new Map<string, HistoryEntry[]>();

  /**
   * Append an entry, creating the user's log if needed.
   */
  append(userId: string, role: HistoryRole, content: string, timestamp: Date): HistoryEntry {
    let entries = this.histories.get(userId);
    if (!entries) {
      entries = [];
      this.histories.set(userId, entries);
    }

    const entry: HistoryEntry = { role, content, timestamp: timestamp.toISOString() };
    entries.push(entry);
    return { ...entry };
  }

  /**
   * Entries in chronological order. A positive `limit` keeps only the most
   * recent `limit` entries.
   */
  get(userId: string, limit?: number): HistoryEntry[] {
    const entries = this.histories.get(userId) ?? [];
    const selected = limit !== undefined && limit > 0 ? entries.slice(-limit) : entries;
    return selected.map((entry) => ({ ...entry }));
  }

  /**
   * History formatted as numbered lines for display or prompts.
   */
  format(userId: string, limit?: number): string {
    const entries = this.get(userId, limit);
    if (entries.length === 0) {
      return '(No previous conversation history)';
    }

    return entries
      .map((entry, idx) => `[${idx + 1}] ${entry.role === 'user' ? 'User' : 'Assistant'}: ${entry.content}`)
      .join('\n');
  }

  delete(userId: string): void {
    this.histories.delete(userId);
  }

  /**
   * Total number of entries across all users.
   */
  countEntries(): number {
    let total = 0;
    for (const entries of this.histories.values()) {
      total += entries.length;
    }
    return total;
  }
}
