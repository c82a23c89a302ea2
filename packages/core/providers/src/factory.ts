import type { ProviderConfig } from '@memsift/config';
import { PROVIDER_KINDS, UnknownProviderError, isProviderKind } from '@memsift/types';
import type { Logger } from '@memsift/utils';
import { AnthropicAdapter, type AnthropicMessagesClient } from './adapters/anthropic.js';
import { OllamaAdapter } from './adapters/ollama.js';
import { OpenAIAdapter, type OpenAIChatClient } from './adapters/openai.js';
import type { ClientFactory, ProviderAdapter } from './adapters/types.js';

export interface ProviderFactoryOptions {
  logger?: Logger;
  /** Per-kind SDK client builders; the real SDKs are used when absent */
  clients?: {
    openai?: ClientFactory<OpenAIChatClient>;
    anthropic?: ClientFactory<AnthropicMessagesClient>;
    ollama?: ClientFactory<OpenAIChatClient>;
  };
}

export type ProviderFactory = (config: ProviderConfig) => ProviderAdapter;

/**
 * Build the adapter for a provider entry, selected by its `name`
 *
 * @throws UnknownProviderError when no adapter exists for the name
 */
export function createProvider(config: ProviderConfig, options: ProviderFactoryOptions = {}): ProviderAdapter {
  if (!isProviderKind(config.name)) {
    throw new UnknownProviderError(config.name, PROVIDER_KINDS);
  }

  switch (config.name) {
    case 'openai':
      return new OpenAIAdapter(config, { logger: options.logger, createClient: options.clients?.openai });
    case 'anthropic':
      return new AnthropicAdapter(config, { logger: options.logger, createClient: options.clients?.anthropic });
    case 'ollama':
      return new OllamaAdapter(config, { logger: options.logger, createClient: options.clients?.ollama });
  }
}

export function createProviderFactory(options: ProviderFactoryOptions = {}): ProviderFactory {
  return (config) => createProvider(config, options);
}
