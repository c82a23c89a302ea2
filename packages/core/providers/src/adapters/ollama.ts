import type { ProviderConfig } from '@memsift/config';
import type { ProviderCompletion, ProviderKind } from '@memsift/types';
import { OpenAIAdapter, type OpenAIChatClient } from './openai.js';
import type { AdapterOptions, ProviderAdapter } from './types.js';

export const OLLAMA_DEFAULT_BASE_URL = 'http://localhost:11434/v1';
/** Ollama ignores the key but the OpenAI client requires one */
export const OLLAMA_PLACEHOLDER_KEY = 'ollama';

/**
 * Local Ollama server through its OpenAI-compatible endpoint
 */
export class OllamaAdapter implements ProviderAdapter {
  public readonly name: string;
  public readonly kind: ProviderKind = 'ollama';
  private readonly delegate: OpenAIAdapter;

  constructor(
    public readonly config: ProviderConfig,
    options: AdapterOptions<OpenAIChatClient> = {}
  ) {
    this.name = config.name;
    this.delegate = new OpenAIAdapter(
      {
        ...config,
        api_key: config.api_key ?? OLLAMA_PLACEHOLDER_KEY,
        base_url: config.base_url ?? OLLAMA_DEFAULT_BASE_URL,
      },
      { ...options, label: 'Ollama' }
    );
  }

  isAvailable(): boolean {
    return this.delegate.isAvailable();
  }

  async complete(prompt: string): Promise<ProviderCompletion> {
    return this.delegate.complete(prompt);
  }
}
