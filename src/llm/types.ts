/**
 * LLM provider contract.
 *
 * Providers are opaque collaborators: agents hand them a transcript and get
 * text (or requested tool calls) back.
 */

import type { ZodRawShape } from 'zod';

export type LlmRole = 'system' | 'user' | 'assistant';

export interface LlmMessage {
  role: LlmRole;
  content: string;
}

/**
 * Per-call model settings.
 */
export interface LlmConfig {
  /** Model identifier; provider default when absent */
  model?: string;
  /** Prepended to any system messages in the transcript */
  systemPrompt?: string;
  /** Upper bound on agent turns for one call */
  maxTurns?: number;
}

/**
 * Tool offered to the model during `toolCall`.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ZodRawShape;
}

/**
 * Tool invocation requested by the model.
 */
export interface RequestedToolCall {
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolCallResult {
  /** Final model text */
  message: string;
  toolCalls: RequestedToolCall[];
}

export interface LlmProvider {
  readonly name: string;
  generate(messages: LlmMessage[], config?: LlmConfig): Promise<string>;
  toolCall(messages: LlmMessage[], tools: ToolDefinition[], config?: LlmConfig): Promise<ToolCallResult>;
}

/**
 * Connection settings passed to provider constructors.
 */
export interface LlmProviderOptions {
  apiKey?: string;
  apiBaseUrl?: string;
  /** Default model for calls that do not name one */
  model?: string;
}

export type LlmProviderCreator = (options: LlmProviderOptions) => LlmProvider;
