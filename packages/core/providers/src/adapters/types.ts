import type { ProviderConfig } from '@memsift/config';
import type { ProviderCompletion, ProviderKind } from '@memsift/types';
import type { Logger } from '@memsift/utils';

/**
 * Builds the backend SDK client for an adapter. Receives the resolved
 * credential separately since Ollama substitutes a placeholder key.
 */
export type ClientFactory<TClient> = (config: ProviderConfig, apiKey: string) => TClient;

export interface AdapterOptions<TClient> {
  logger?: Logger;
  createClient?: ClientFactory<TClient>;
}

/**
 * One configured LLM backend able to answer a filter prompt with a
 * structured completion.
 */
export interface ProviderAdapter {
  readonly name: string;
  readonly kind: ProviderKind;
  readonly config: ProviderConfig;
  /**
   * Send the prompt as a single user message and parse the JSON reply.
   * Rejects with ProviderCallError; never retries on its own.
   */
  complete(prompt: string): Promise<ProviderCompletion>;
  /** Enabled, has a credential, and the client was constructed */
  isAvailable(): boolean;
}
