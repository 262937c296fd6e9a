/**
 * ClaudeProvider - LlmProvider on top of the Claude Agent SDK.
 *
 * System messages become the system prompt; the remaining messages are
 * rendered as a transcript prompt. No built-in SDK tool is pre-approved.
 *
 * `toolCall` exposes the offered tools through an in-process MCP server
 * whose handlers record each call instead of running it. The caller
 * executes the recorded calls itself.
 *
 * @module llm/claude-provider
 */

import { createSdkMcpServer, query, tool, type Options, type SDKUserMessage } from '@anthropic-ai/claude-agent-sdk';
import { createLogger } from '../utils/logger.js';
import { ProviderError } from '../utils/errors.js';
import { buildSdkEnv, extractAssistantText, singleUserMessage } from '../utils/sdk.js';
import type {
  LlmConfig,
  LlmMessage,
  LlmProvider,
  LlmProviderOptions,
  RequestedToolCall,
  ToolCallResult,
  ToolDefinition,
} from './types.js';

const PROVIDER_NAME = 'claude';
const TOOL_SERVER_NAME = 'agentmesh-tools';
const DEFAULT_MAX_TURNS = 1;
const DEFAULT_TOOL_MAX_TURNS = 3;

/**
 * Split a transcript into system prompt and prompt text.
 */
export function renderTranscript(
  messages: LlmMessage[],
  systemPrompt?: string
): { system?: string; prompt: string } {
  const systemParts = systemPrompt ? [systemPrompt] : [];
  const turns: LlmMessage[] = [];

  for (const message of messages) {
    if (message.role === 'system') {
      systemParts.push(message.content);
    } else {
      turns.push(message);
    }
  }

  const [onlyTurn] = turns;
  const prompt = turns.length === 1 && onlyTurn.role === 'user'
    ? onlyTurn.content
    : turns.map((turn) => `${turn.role === 'user' ? 'User' : 'Assistant'}: ${turn.content}`).join('\n\n');

  return {
    system: systemParts.length > 0 ? systemParts.join('\n\n') : undefined,
    prompt,
  };
}

export class ClaudeProvider implements LlmProvider {
  readonly name = PROVIDER_NAME;

  private readonly apiKey?: string;
  private readonly apiBaseUrl?: string;
  private readonly defaultModel?: string;
  private readonly logger = createLogger('ClaudeProvider');

  constructor(options: LlmProviderOptions = {}) {
    this.apiKey = options.apiKey;
    this.apiBaseUrl = options.apiBaseUrl;
    this.defaultModel = options.model;
  }

  async generate(messages: LlmMessage[], config: LlmConfig = {}): Promise<string> {
    const { system, prompt } = renderTranscript(messages, config.systemPrompt);
    const options = this.createOptions(config, system, config.maxTurns ?? DEFAULT_MAX_TURNS);

    const { text } = await this.run(prompt, options);
    return text;
  }

  async toolCall(
    messages: LlmMessage[],
    tools: ToolDefinition[],
    config: LlmConfig = {}
  ): Promise<ToolCallResult> {
    const { system, prompt } = renderTranscript(messages, config.systemPrompt);
    const toolCalls: RequestedToolCall[] = [];

    const server = createSdkMcpServer({
      name: TOOL_SERVER_NAME,
      version: '1.0.0',
      tools: tools.map((definition) =>
        tool(definition.name, definition.description, definition.parameters, async (args) => {
          toolCalls.push({ name: definition.name, arguments: { ...args } });
          return { content: [{ type: 'text' as const, text: `Call to ${definition.name} recorded` }] };
        })
      ),
    });

    const options: Options = {
      ...this.createOptions(config, system, config.maxTurns ?? DEFAULT_TOOL_MAX_TURNS),
      mcpServers: { [TOOL_SERVER_NAME]: server },
      allowedTools: tools.map((definition) => `mcp__${TOOL_SERVER_NAME}__${definition.name}`),
    };

    const { text } = await this.run(singleUserMessage(prompt), options);
    this.logger.debug({ toolCalls: toolCalls.map((call) => call.name) }, 'Tool calls recorded');
    return { message: text, toolCalls };
  }

  private createOptions(config: LlmConfig, system: string | undefined, maxTurns: number): Options {
    const options: Options = {
      maxTurns,
      allowedTools: [],
      env: buildSdkEnv(this.apiKey, this.apiBaseUrl),
    };

    const model = config.model ?? this.defaultModel;
    if (model) {
      options.model = model;
    }
    if (system) {
      options.systemPrompt = system;
    }
    return options;
  }

  /**
   * Drive one query to completion and return its result text.
   *
   * @throws ProviderError if the query fails or ends without a successful result
   */
  private async run(
    prompt: string | AsyncIterable<SDKUserMessage>,
    options: Options
  ): Promise<{ text: string }> {
    let lastAssistantText = '';

    try {
      for await (const message of query({ prompt, options })) {
        this.logger.debug({ messageType: message.type }, 'SDK message received');

        if (message.type === 'assistant') {
          const text = extractAssistantText(message);
          if (text) {
            lastAssistantText = text;
          }
          continue;
        }

        if (message.type === 'result') {
          if (message.subtype === 'success') {
            return { text: message.result || lastAssistantText };
          }
          throw new ProviderError(PROVIDER_NAME, `query ended with ${message.subtype}`);
        }
      }
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }
      this.logger.error({ err: error }, 'Claude query failed');
      throw new ProviderError(
        PROVIDER_NAME,
        error instanceof Error ? error.message : String(error),
        error
      );
    }

    throw new ProviderError(PROVIDER_NAME, 'query returned no result');
  }
}
