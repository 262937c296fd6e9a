/**
 * Shared helpers for Claude Agent SDK integration.
 */
import type { SDKMessage, SDKUserMessage } from '@anthropic-ai/claude-agent-sdk';

/**
 * Get directory containing node executable.
 * This is needed for SDK subprocess spawning to find node.
 */
export function getNodeBinDir(): string {
  const { execPath } = process;
  return execPath.substring(0, execPath.lastIndexOf('/'));
}

/**
 * Build the environment for the SDK subprocess.
 *
 * The configured key and base URL take precedence over the inherited
 * environment.
 */
export function buildSdkEnv(
  apiKey: string | undefined,
  apiBaseUrl?: string
): Record<string, string | undefined> {
  const env: Record<string, string | undefined> = {
    ...process.env,
    PATH: `${getNodeBinDir()}:${process.env.PATH ?? ''}`,
  };

  if (apiKey) {
    env.ANTHROPIC_API_KEY = apiKey;
  }
  if (apiBaseUrl) {
    env.ANTHROPIC_BASE_URL = apiBaseUrl;
  }

  return env;
}

/**
 * Wrap a single prompt as a streaming input.
 *
 * In-process MCP servers are only reachable when the prompt is streamed.
 */
export async function* singleUserMessage(text: string): AsyncGenerator<SDKUserMessage> {
  yield {
    type: 'user',
    message: { role: 'user', content: text },
    parent_tool_use_id: null,
    session_id: '',
  };
}

/**
 * Text blocks of an assistant message, joined.
 */
export function extractAssistantText(message: SDKMessage): string {
  if (message.type !== 'assistant') {
    return '';
  }

  const parts: string[] = [];
  for (const block of message.message.content) {
    if (block.type === 'text') {
      parts.push(block.text);
    }
  }
  return parts.join('');
}
