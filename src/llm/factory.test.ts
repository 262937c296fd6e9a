import { describe, it, expect, vi } from 'vitest';
import { LlmProviderFactory } from './factory.js';
import { ClaudeProvider } from './claude-provider.js';
import type { LlmProvider } from './types.js';
import { ConfigurationError } from '../utils/errors.js';

vi.mock('@anthropic-ai/claude-agent-sdk', () => ({
  query: vi.fn(),
  tool: vi.fn(),
  createSdkMcpServer: vi.fn(),
}));

function createStubProvider(name: string): LlmProvider {
  return {
    name,
    generate: vi.fn().mockResolvedValue('stub'),
    toolCall: vi.fn().mockResolvedValue({ message: 'stub', toolCalls: [] }),
  };
}

describe('LlmProviderFactory', () => {
  it('should provide claude by default', () => {
    const factory = new LlmProviderFactory({ apiKey: 'test-key' });

    expect(factory.listProviders()).toEqual(['claude']);
    expect(factory.getProvider('claude')).toBeInstanceOf(ClaudeProvider);
  });

  it('should cache provider instances', () => {
    const factory = new LlmProviderFactory();

    expect(factory.getProvider('claude')).toBe(factory.getProvider('claude'));
  });

  it('should create registered providers with the factory options', () => {
    const factory = new LlmProviderFactory({ apiKey: 'test-key', model: 'm' });
    const creator = vi.fn(() => createStubProvider('stub'));

    factory.registerProvider('stub', creator);
    factory.getProvider('stub');

    expect(creator).toHaveBeenCalledWith({ apiKey: 'test-key', model: 'm' });
    expect(factory.listProviders()).toEqual(['claude', 'stub']);
  });

  it('should drop the cached instance when a provider is re-registered', () => {
    const factory = new LlmProviderFactory();
    factory.registerProvider('stub', () => createStubProvider('first'));
    const first = factory.getProvider('stub');

    factory.registerProvider('stub', () => createStubProvider('second'));

    expect(factory.getProvider('stub')).not.toBe(first);
    expect(factory.getProvider('stub').name).toBe('second');
  });

  it('should reject unknown providers with ConfigurationError', () => {
    const factory = new LlmProviderFactory();

    expect(() => factory.getProvider('openai')).toThrow(ConfigurationError);
    expect(() => factory.getProvider('openai')).toThrow('Unknown provider: openai');
  });
});
