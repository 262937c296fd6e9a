/**
 * LlmProviderFactory - named provider registry with cached instances.
 */

import { createLogger } from '../utils/logger.js';
import { ConfigurationError } from '../utils/errors.js';
import { ClaudeProvider } from './claude-provider.js';
import type { LlmProvider, LlmProviderCreator, LlmProviderOptions } from './types.js';

const logger = createLogger('LlmProviderFactory');

export class LlmProviderFactory {
  private readonly creators = new Map<string, LlmProviderCreator>();
  private readonly instances = new Map<string, LlmProvider>();
  private readonly options: LlmProviderOptions;

  constructor(options: LlmProviderOptions = {}) {
    this.options = options;
    this.creators.set('claude', (providerOptions) => new ClaudeProvider(providerOptions));
  }

  /**
   * Register or replace a provider. A cached instance under the same name is discarded.
   */
  registerProvider(name: string, creator: LlmProviderCreator): void {
    this.creators.set(name, creator);
    this.instances.delete(name);
    logger.debug({ provider: name }, 'Provider registered');
  }

  /**
   * @throws ConfigurationError for an unregistered name
   */
  getProvider(name: string): LlmProvider {
    const cached = this.instances.get(name);
    if (cached) {
      return cached;
    }

    const creator = this.creators.get(name);
    if (!creator) {
      throw new ConfigurationError(`Unknown provider: ${name}`, [
        { field: 'llm.provider', message: `expected one of ${this.listProviders().join(', ')}` },
      ]);
    }

    const provider = creator(this.options);
    this.instances.set(name, provider);
    logger.info({ provider: name }, 'Provider created');
    return provider;
  }

  listProviders(): string[] {
    return [...this.creators.keys()];
  }
}
