import OpenAI from 'openai';
import type { ProviderConfig } from '@memsift/config';
import { ProviderCallError, errorMessage, type ProviderCompletion, type ProviderKind } from '@memsift/types';
import { createLogger, type Logger } from '@memsift/utils';
import { parseCompletion } from '../parse.js';
import { mapProviderError } from './errors.js';
import type { AdapterOptions, ClientFactory, ProviderAdapter } from './types.js';

/**
 * The part of the OpenAI SDK client the adapter calls
 */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(body: OpenAI.ChatCompletionCreateParamsNonStreaming): Promise<{
        choices: Array<{ message?: { content?: string | null } | null }>;
      }>;
    };
  };
}

export const createOpenAIClient: ClientFactory<OpenAIChatClient> = (config, apiKey) =>
  new OpenAI({
    apiKey,
    baseURL: config.base_url,
    maxRetries: config.max_retries,
    timeout: config.timeout_ms,
  });

export interface OpenAIAdapterOptions extends AdapterOptions<OpenAIChatClient> {
  /** Name used in log lines and error messages */
  label?: string;
}

export class OpenAIAdapter implements ProviderAdapter {
  public readonly name: string;
  public readonly kind: ProviderKind = 'openai';
  private readonly label: string;
  private readonly logger: Logger;
  private readonly client: OpenAIChatClient | null = null;

  constructor(
    public readonly config: ProviderConfig,
    options: OpenAIAdapterOptions = {}
  ) {
    this.name = config.name;
    this.label = options.label ?? 'OpenAI';
    this.logger = options.logger ?? createLogger(`provider:${config.name}`);

    if (config.enabled && config.api_key) {
      const createClient = options.createClient ?? createOpenAIClient;
      try {
        this.client = createClient(config, config.api_key);
      } catch (error) {
        this.logger.warn(`${this.label} client could not be created: ${errorMessage(error)}`);
      }
    }
  }

  isAvailable(): boolean {
    return this.config.enabled && Boolean(this.config.api_key) && this.client !== null;
  }

  async complete(prompt: string): Promise<ProviderCompletion> {
    if (!this.client) {
      throw new ProviderCallError(`${this.label} client not initialized`, 'not_configured', {
        provider: this.name,
      });
    }

    let content: string;
    try {
      const response = await this.client.chat.completions.create({
        model: this.config.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: this.config.temperature,
        max_tokens: this.config.max_tokens,
        response_format: { type: 'json_object' },
        stream: false,
      });

      const choice = response.choices[0];
      if (!choice) {
        throw new ProviderCallError(`${this.label} returned no completion choice`, 'invalid_response', {
          provider: this.name,
        });
      }
      content = choice.message?.content ?? '';
    } catch (error) {
      const mapped = mapProviderError(error, this.name, this.label);
      this.logger.error(`${this.label} API error: ${mapped.message}`);
      throw mapped;
    }

    return parseCompletion(content, this.name);
  }
}
