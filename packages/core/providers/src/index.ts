export type { AdapterOptions, ClientFactory, ProviderAdapter } from './adapters/types.js';
export { OpenAIAdapter, createOpenAIClient } from './adapters/openai.js';
export type { OpenAIAdapterOptions, OpenAIChatClient } from './adapters/openai.js';
export { AnthropicAdapter, createAnthropicClient } from './adapters/anthropic.js';
export type { AnthropicMessagesClient } from './adapters/anthropic.js';
export { OllamaAdapter, OLLAMA_DEFAULT_BASE_URL, OLLAMA_PLACEHOLDER_KEY } from './adapters/ollama.js';
export { mapProviderError } from './adapters/errors.js';
export { extractJsonText, parseCompletion } from './parse.js';
export { createProvider, createProviderFactory } from './factory.js';
export type { ProviderFactory, ProviderFactoryOptions } from './factory.js';
