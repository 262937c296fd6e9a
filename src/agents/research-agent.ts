/**
 * ResearchAgent - search planning, data analysis and report writing.
 *
 * Skill selection by task type or message keyword:
 * - `web_search` / "search" → search plan
 * - `data_analysis` / "analyze" → analysis
 * - `report_generation` / "report" → search, then report (plus summary when
 *   the `summarize` tool is reachable)
 * - otherwise general research
 *
 * Model failures inside a skill become an error text in the result.
 *
 * @module agents/research-agent
 */

import type { TaskDescriptor } from '../types/task.js';
import { BaseAgent } from './base-agent.js';

function describeFailure(prefix: string, error: unknown): string {
  return `${prefix}: ${error instanceof Error ? error.message : String(error)}`;
}

export class ResearchAgent extends BaseAgent {
  protected readonly capabilities = ['web_search', 'data_analysis', 'report_generation'];
  protected readonly tools = ['web_search', 'pdf_reader', 'database_query', 'summarize'];

  protected getAgentName(): string {
    return 'ResearchAgent';
  }

  protected async handleTask(task: TaskDescriptor): Promise<string> {
    const message = task.message.toLowerCase();

    if (task.type === 'web_search' || message.includes('search')) {
      return this.performWebSearch(task.message);
    }
    if (task.type === 'data_analysis' || message.includes('analyze')) {
      return this.analyzeData(task.message);
    }
    if (task.type === 'report_generation' || message.includes('report')) {
      return this.generateReport(task);
    }
    return this.generalResearch(task);
  }

  async performWebSearch(query: string): Promise<string> {
    this.updateMemory('last_search_query', query);

    const prompt = [
      `You are a research assistant. Given the query: "${query}"`,
      '',
      '1. Break down the search into key topics',
      '2. Suggest refined search terms',
      '3. Identify what types of sources would be most valuable',
      '',
      'Respond with a structured search plan.',
    ].join('\n');

    try {
      const plan = await this.generate(prompt);
      const results = `Search plan for "${query}":\n${plan}`;
      this.updateMemory('last_search_results', results);
      return results;
    } catch (error) {
      this.logger.warn({ err: error }, 'Search planning failed');
      return describeFailure('Error performing web search', error);
    }
  }

  async analyzeData(description: string): Promise<string> {
    this.updateMemory('last_analysis_request', description);

    const prompt = [
      `You are a data analyst. Analyze the following data description: "${description}"`,
      '',
      'Provide:',
      '1. Key patterns and trends',
      '2. Statistical insights',
      '3. Actionable recommendations',
      '4. Potential limitations or caveats',
    ].join('\n');

    try {
      const analysis = await this.generate(prompt);
      this.updateMemory('last_analysis', analysis);
      return analysis;
    } catch (error) {
      this.logger.warn({ err: error }, 'Analysis failed');
      return describeFailure('Error analyzing data', error);
    }
  }

  async generateReport(task: TaskDescriptor): Promise<string> {
    const topic = task.message || 'General Research Topic';
    this.updateMemory('current_report_topic', topic);

    const searchResults = await this.performWebSearch(topic);
    const prompt = [
      `Generate a research report on: "${topic}"`,
      '',
      `Based on these search results: ${searchResults}`,
      '',
      'Structure the report with an executive summary, key findings, analysis, recommendations and a conclusion.',
    ].join('\n');

    let report: string;
    try {
      report = await this.generate(prompt);
    } catch (error) {
      this.logger.warn({ err: error }, 'Report generation failed');
      return describeFailure('Error generating report', error);
    }
    this.updateMemory('last_report', report);

    if (!this.canUseTool('summarize')) {
      return report;
    }

    const summary = await this.useTool('summarize', { text: report, maxLength: 60 });
    if (summary.success && typeof summary.result === 'object' && summary.result !== null && 'summary' in summary.result) {
      return `${report}\n\nSummary:\n${String(summary.result.summary)}`;
    }
    return report;
  }

  async generalResearch(task: TaskDescriptor): Promise<string> {
    const message = task.message.toLowerCase();

    if (message.includes('find')) {
      return this.performWebSearch(task.message);
    }
    if (message.includes('examine')) {
      return this.analyzeData(task.message);
    }

    const searchResults = await this.performWebSearch(task.message);
    const analysis = await this.analyzeData(`Research findings: ${searchResults}`);
    return `Research Results:\n${searchResults}\n\nAnalysis:\n${analysis}`;
  }

  getResearchHistory(): Record<string, unknown> {
    return {
      lastSearchQuery: this.getMemory('last_search_query'),
      lastSearchResults: this.getMemory('last_search_results'),
      lastAnalysis: this.getMemory('last_analysis'),
      lastReport: this.getMemory('last_report'),
      currentReportTopic: this.getMemory('current_report_topic'),
    };
  }
}
