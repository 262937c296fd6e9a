/**
 * Built-in tools: calculator, summarize, scheduler.
 */

import { z } from 'zod';
import { defineTool, type ManagedTool } from './types.js';
import { evaluateExpression, roundTo } from './calculator.js';

export const calculatorTool = defineTool({
  name: 'calculator',
  description: 'Evaluate an arithmetic expression with + - * / % ^ and parentheses',
  parameters: z.object({
    expression: z.string().min(1).describe('Expression to evaluate, e.g. "(2 + 3) * 4"'),
    precision: z.number().int().min(0).max(10).default(2).describe('Decimal places in the result'),
  }),
  execute: ({ expression, precision }) => ({
    expression,
    result: roundTo(evaluateExpression(expression), precision),
    precision,
  }),
});

/**
 * Split text into sentences, keeping terminal punctuation.
 */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Whole sentences up to `maxWords` words. A first sentence longer than the
 * limit is cut at the limit and ends with an ellipsis.
 */
export function selectSentences(text: string, maxWords: number): string[] {
  const selected: string[] = [];
  let words = 0;

  for (const sentence of splitSentences(text)) {
    const sentenceWords = countWords(sentence);
    if (words + sentenceWords > maxWords) {
      if (selected.length === 0) {
        selected.push(`${sentence.split(/\s+/).slice(0, maxWords).join(' ')}...`);
      }
      break;
    }
    selected.push(sentence);
    words += sentenceWords;
  }

  return selected;
}

export const summarizeTool = defineTool({
  name: 'summarize',
  description: 'Shorten text to whole sentences within a word limit',
  parameters: z.object({
    text: z.string(),
    maxLength: z.number().int().positive().default(100).describe('Maximum words in the summary'),
    style: z.enum(['brief', 'bullets']).default('brief'),
  }),
  execute: ({ text, maxLength, style }) => {
    const sentences = selectSentences(text, maxLength);
    const summary = style === 'bullets'
      ? sentences.map((sentence) => `- ${sentence}`).join('\n')
      : sentences.join(' ');

    return {
      summary,
      style,
      originalWords: countWords(text),
      summaryWords: countWords(sentences.join(' ')),
    };
  },
});

export interface ScheduledEvent {
  id: string;
  title: string;
  start: string;
  end?: string;
  description: string;
}

/**
 * Scheduler with its own in-memory calendar.
 */
export function createSchedulerTool(): ManagedTool {
  const events: ScheduledEvent[] = [];
  let nextId = 1;

  return defineTool({
    name: 'scheduler',
    description: 'Add, list or remove calendar events',
    parameters: z.object({
      action: z.enum(['add', 'list', 'remove']),
      title: z.string().optional(),
      start: z.string().optional().describe('ISO-8601 start time'),
      end: z.string().optional().describe('ISO-8601 end time'),
      description: z.string().optional(),
      eventId: z.string().optional(),
    }),
    execute: (args) => {
      switch (args.action) {
        case 'add': {
          if (!args.title || !args.start) {
            throw new Error('add requires title and start');
          }
          const event: ScheduledEvent = {
            id: `event_${nextId++}`,
            title: args.title,
            start: args.start,
            end: args.end,
            description: args.description ?? '',
          };
          events.push(event);
          return { action: 'add', status: 'created', event: { ...event } };
        }

        case 'list':
          return { action: 'list', events: events.map((event) => ({ ...event })) };

        case 'remove': {
          if (!args.eventId) {
            throw new Error('remove requires eventId');
          }
          const index = events.findIndex((event) => event.id === args.eventId);
          if (index === -1) {
            return { action: 'remove', status: 'not_found', eventId: args.eventId };
          }
          events.splice(index, 1);
          return { action: 'remove', status: 'deleted', eventId: args.eventId };
        }
      }
    },
  });
}

/**
 * Fresh instances of every built-in tool.
 */
export function createBuiltinTools(): ManagedTool[] {
  return [calculatorTool, summarizeTool, createSchedulerTool()];
}
