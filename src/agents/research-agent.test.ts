/**
 * Tests for ResearchAgent (src/agents/research-agent.ts)
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ResearchAgent } from './research-agent.js';
import { AgentDirectory } from '../directory/agent-directory.js';
import { DelegationClient } from '../a2a/delegation-client.js';
import { ToolManager } from '../tools/tool-manager.js';
import { createBuiltinTools } from '../tools/builtin.js';
import type { LlmProvider } from '../llm/types.js';
import type { TaskDescriptor } from '../types/task.js';

vi.mock('../utils/logger.js', () => ({
  createLogger: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

function createTask(message: string, type = 'research'): TaskDescriptor {
  return {
    type,
    message,
    userId: 'user-1',
    requiredCapabilities: [],
    context: {},
    history: [],
    timestamp: '2024-01-01T00:00:00.000Z',
  };
}

describe('ResearchAgent', () => {
  let generate: ReturnType<typeof vi.fn>;
  let llm: LlmProvider;
  let client: DelegationClient;
  let agent: ResearchAgent;

  beforeEach(() => {
    generate = vi.fn().mockResolvedValue('model output');
    llm = { name: 'stub', generate, toolCall: vi.fn() };
    client = new DelegationClient('research-001', new AgentDirectory(), { deliver: vi.fn() });
    agent = new ResearchAgent({ agentId: 'research-001', llm, client });
  });

  it('should advertise research capabilities and tools', () => {
    expect(agent.getCapabilities()).toEqual(['web_search', 'data_analysis', 'report_generation']);
    expect(agent.getTools()).toEqual(['web_search', 'pdf_reader', 'database_query', 'summarize']);
  });

  it('should plan a web search for search messages', async () => {
    const result = await agent.processTask(createTask('search for battery chemistry'));

    expect(result).toEqual({
      success: true,
      result: 'Search plan for "search for battery chemistry":\nmodel output',
      agent: 'research-001',
    });
    expect(generate).toHaveBeenCalledTimes(1);
    expect(agent.getResearchHistory()).toMatchObject({ lastSearchQuery: 'search for battery chemistry' });
  });

  it('should analyze data for analyze messages', async () => {
    const result = await agent.processTask(createTask('analyze churn numbers', 'analysis'));

    expect(result).toMatchObject({ success: true, result: 'model output' });
    expect(agent.getMemory('last_analysis_request')).toBe('analyze churn numbers');
  });

  it('should search before writing a report', async () => {
    generate.mockResolvedValueOnce('plan').mockResolvedValueOnce('The report.');

    const result = await agent.processTask(createTask('write a report on tides', 'analysis'));

    expect(result).toMatchObject({ success: true, result: 'The report.' });
    expect(generate).toHaveBeenCalledTimes(2);
    expect(agent.getResearchHistory()).toMatchObject({
      currentReportTopic: 'write a report on tides',
      lastReport: 'The report.',
    });
  });

  it('should append a summary when the summarize tool is available', async () => {
    const toolManager = new ToolManager();
    createBuiltinTools().forEach((tool) => toolManager.registerTool(tool));
    const withTools = new ResearchAgent({ agentId: 'research-002', llm, client, toolManager });
    generate.mockResolvedValueOnce('plan').mockResolvedValueOnce('Tides rise. Tides fall.');

    const result = await withTools.processTask(createTask('report on tides'));

    expect(result).toMatchObject({
      success: true,
      result: 'Tides rise. Tides fall.\n\nSummary:\nTides rise. Tides fall.',
    });
  });

  it('should combine search and analysis for general research', async () => {
    generate.mockResolvedValueOnce('plan').mockResolvedValueOnce('insights');

    const result = await agent.processTask(createTask('tell me about tides', 'general'));

    expect(result).toMatchObject({
      success: true,
      result: 'Research Results:\nSearch plan for "tell me about tides":\nplan\n\nAnalysis:\ninsights',
    });
  });

  it('should turn model failures into error text', async () => {
    generate.mockRejectedValue(new Error('claude: rate limited'));

    const result = await agent.processTask(createTask('search for tides'));

    expect(result).toEqual({
      success: true,
      result: 'Error performing web search: claude: rate limited',
      agent: 'research-001',
    });
    expect(agent.getStatus().status).toBe('idle');
  });
});
