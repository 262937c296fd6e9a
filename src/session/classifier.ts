/**
 * Keyword classification of free-text messages into task categories.
 *
 * The table is ordered; the first category with a keyword contained in the
 * lowercased message wins. Messages matching nothing are `general` with no
 * required capabilities.
 */

import type { KnownTaskType } from '../types/task.js';

export interface ClassificationRule {
  type: Exclude<KnownTaskType, 'general'>;
  keywords: readonly string[];
  requiredCapabilities: readonly string[];
}

export interface Classification {
  type: KnownTaskType;
  requiredCapabilities: string[];
}

export const CLASSIFICATION_TABLE: readonly ClassificationRule[] = [
  {
    type: 'research',
    keywords: ['search', 'find', 'research', 'look up'],
    requiredCapabilities: ['web_search', 'data_analysis'],
  },
  {
    type: 'planning',
    keywords: ['plan', 'schedule', 'organize', 'break down'],
    requiredCapabilities: ['task_decomposition', 'workflow_planning'],
  },
  {
    type: 'analysis',
    keywords: ['analyze', 'report', 'summarize'],
    requiredCapabilities: ['data_analysis', 'report_generation'],
  },
  {
    type: 'coding',
    keywords: ['code', 'program', 'implement', 'develop'],
    requiredCapabilities: ['code_generation', 'debugging'],
  },
];

export function classifyMessage(message: string): Classification {
  const text = message.toLowerCase();
  for (const rule of CLASSIFICATION_TABLE) {
    if (rule.keywords.some((keyword) => text.includes(keyword))) {
      return { type: rule.type, requiredCapabilities: [...rule.requiredCapabilities] };
    }
  }
  return { type: 'general', requiredCapabilities: [] };
}
