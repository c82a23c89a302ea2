import Anthropic from '@anthropic-ai/sdk';
import type { MessageCreateParamsNonStreaming } from '@anthropic-ai/sdk/resources/messages';
import type { ProviderConfig } from '@memsift/config';
import { ProviderCallError, errorMessage, type ProviderCompletion, type ProviderKind } from '@memsift/types';
import { createLogger, type Logger } from '@memsift/utils';
import { parseCompletion } from '../parse.js';
import { mapProviderError } from './errors.js';
import type { AdapterOptions, ClientFactory, ProviderAdapter } from './types.js';

interface AnthropicContentBlock {
  type: string;
  text?: string;
}

/**
 * The part of the Anthropic SDK client the adapter calls
 */
export interface AnthropicMessagesClient {
  messages: {
    create(body: MessageCreateParamsNonStreaming): Promise<{ content: AnthropicContentBlock[] }>;
  };
}

export const createAnthropicClient: ClientFactory<AnthropicMessagesClient> = (config, apiKey) =>
  new Anthropic({
    apiKey,
    baseURL: config.base_url,
    maxRetries: config.max_retries,
    timeout: config.timeout_ms,
  });

function extractText(content: AnthropicContentBlock[]): string {
  return content
    .filter((part): part is AnthropicContentBlock & { text: string } => part.type === 'text' && Boolean(part.text))
    .map((part) => part.text)
    .join('');
}

export class AnthropicAdapter implements ProviderAdapter {
  public readonly name: string;
  public readonly kind: ProviderKind = 'anthropic';
  private readonly logger: Logger;
  private readonly client: AnthropicMessagesClient | null = null;

  constructor(
    public readonly config: ProviderConfig,
    options: AdapterOptions<AnthropicMessagesClient> = {}
  ) {
    this.name = config.name;
    this.logger = options.logger ?? createLogger(`provider:${config.name}`);

    if (config.enabled && config.api_key) {
      const createClient = options.createClient ?? createAnthropicClient;
      try {
        this.client = createClient(config, config.api_key);
      } catch (error) {
        this.logger.warn(`Anthropic client could not be created: ${errorMessage(error)}`);
      }
    }
  }

  isAvailable(): boolean {
    return this.config.enabled && Boolean(this.config.api_key) && this.client !== null;
  }

  async complete(prompt: string): Promise<ProviderCompletion> {
    if (!this.client) {
      throw new ProviderCallError('Anthropic client not initialized', 'not_configured', {
        provider: this.name,
      });
    }

    let content: string;
    try {
      const response = await this.client.messages.create({
        model: this.config.model,
        max_tokens: this.config.max_tokens,
        temperature: this.config.temperature,
        messages: [{ role: 'user', content: prompt }],
      });
      content = extractText(response.content);
    } catch (error) {
      const mapped = mapProviderError(error, this.name, 'Anthropic');
      this.logger.error(`Anthropic API error: ${mapped.message}`);
      throw mapped;
    }

    return parseCompletion(content, this.name);
  }
}
