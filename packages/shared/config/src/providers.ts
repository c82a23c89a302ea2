/**
 * Provider configuration resolution
 *
 * Turns validated file entries into immutable `ProviderConfig` records:
 * defaults applied, credentials looked up, priority fixed.
 */

import { isProviderKind, type ProviderKind } from '@memsift/types';
import { isLogLevel } from '@memsift/utils';
import type {
  MemsiftConfig,
  ProviderConfig,
  ProviderConfigInput,
  FilterConfig,
  LoggingConfig,
  ResolvedConfig,
} from './schema.js';

export const DEFAULT_MAX_CONTEXT_TOKENS = 5000;
export const DEFAULT_PROVIDER_TEMPERATURE = 0;
export const DEFAULT_PROVIDER_MAX_TOKENS = 256;

/**
 * Environment variable consulted when an entry names neither `api_key` nor
 * `api_key_env`. Ollama runs locally and needs none.
 */
export const DEFAULT_API_KEY_ENV: Readonly<Partial<Record<ProviderKind, string>>> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

function nonEmpty(value: string | undefined): string | null {
  return value !== undefined && value !== '' ? value : null;
}

function lookupApiKey(input: ProviderConfigInput, env: NodeJS.ProcessEnv): string | null {
  const inline = nonEmpty(input.api_key);
  if (inline) return inline;

  const envName =
    input.api_key_env ?? (isProviderKind(input.name) ? DEFAULT_API_KEY_ENV[input.name] : undefined);
  if (!envName) return null;
  return nonEmpty(env[envName]);
}

/**
 * Resolve one provider entry. `index` is its position in the file and
 * supplies the default priority.
 */
export function resolveProviderConfig(
  input: ProviderConfigInput,
  index: number,
  env: NodeJS.ProcessEnv = process.env,
): ProviderConfig {
  return Object.freeze({
    name: input.name,
    model: input.model,
    api_key: lookupApiKey(input, env),
    enabled: input.enabled ?? true,
    temperature: input.temperature ?? DEFAULT_PROVIDER_TEMPERATURE,
    max_tokens: input.max_tokens ?? DEFAULT_PROVIDER_MAX_TOKENS,
    priority: input.priority ?? index + 1,
    base_url: input.base_url,
    max_retries: input.max_retries,
    timeout_ms: input.timeout_ms,
  });
}

/**
 * Stable ascending sort by priority; ties keep their original order
 */
export function getSortedProviders(providers: readonly ProviderConfig[]): ProviderConfig[] {
  return providers
    .map((provider, index) => ({ provider, index }))
    .sort((a, b) => a.provider.priority - b.provider.priority || a.index - b.index)
    .map(({ provider }) => provider);
}

export function resolveFilterConfig(
  config: MemsiftConfig,
  env: NodeJS.ProcessEnv = process.env,
): FilterConfig {
  const providers = (config.filter.providers ?? []).map((input, index) =>
    resolveProviderConfig(input, index, env),
  );

  return {
    enabled: config.filter.enabled ?? true,
    providers,
    session: {
      max_context_tokens: config.filter.session?.max_context_tokens ?? DEFAULT_MAX_CONTEXT_TOKENS,
    },
  };
}

export function resolveLoggingConfig(config: MemsiftConfig): LoggingConfig {
  const level = config.logging?.level;
  return {
    level: level !== undefined && isLogLevel(level) ? level : 'info',
    log_filter_decisions: config.logging?.log_filter_decisions ?? true,
  };
}

export function resolveConfig(
  config: MemsiftConfig,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
  return {
    filter: resolveFilterConfig(config, env),
    logging: resolveLoggingConfig(config),
  };
}
