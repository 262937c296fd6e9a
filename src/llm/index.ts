/**
 * LLM provider module.
 */

export * from './types.js';
export { ClaudeProvider, renderTranscript } from './claude-provider.js';
export { LlmProviderFactory } from './factory.js';
