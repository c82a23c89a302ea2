/**
 * Bootstrap - wires configuration, provider pool and filter together
 */
import {
  DEFAULT_MAX_CONTEXT_TOKENS,
  loadAndValidateConfig,
  type ResolvedConfig,
} from '@memsift/config';
import type { ProviderFactory } from '@memsift/providers';
import { errorMessage } from '@memsift/types';
import { createLogger, type Logger } from '@memsift/utils';
import { FilterManager } from './filter-manager.js';
import { SessionManager } from './session-manager.js';

export interface CreateMemoryFilterOptions {
  /** Path to memsift.toml; searched for when omitted */
  configPath?: string;
  /** Already resolved configuration; skips loading entirely */
  config?: ResolvedConfig;
  /** Environment for locating the file, overlays and credentials (default: process.env) */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  providerFactory?: ProviderFactory;
  promptTemplate?: string;
}

export interface MemoryFilter {
  config: ResolvedConfig;
  sessions: SessionManager;
  filter: FilterManager;
}

/**
 * Configuration used when none could be loaded: no providers, so every
 * decision is `filter_disabled`. Frozen, since every failed load shares it.
 */
export const INERT_CONFIG: ResolvedConfig = Object.freeze({
  filter: Object.freeze({
    enabled: true,
    providers: Object.freeze([]),
    session: Object.freeze({ max_context_tokens: DEFAULT_MAX_CONTEXT_TOKENS }),
  }),
  logging: Object.freeze({ level: 'info', log_filter_decisions: true }),
});

function loadConfigOrInert(options: CreateMemoryFilterOptions, logger: Logger): ResolvedConfig {
  if (options.config) {
    return options.config;
  }

  try {
    return loadAndValidateConfig({ configPath: options.configPath, env: options.env, logger });
  } catch (error) {
    logger.error(`Failed to load filter configuration - filtering disabled: ${errorMessage(error)}`);
    return INERT_CONFIG;
  }
}

/**
 * Build a ready-to-use memory filter. Never throws: a configuration that
 * cannot be loaded yields a filter that stores everything.
 */
export function createMemoryFilter(options: CreateMemoryFilterOptions = {}): MemoryFilter {
  const bootLogger = options.logger ?? createLogger('memsift');
  const config = loadConfigOrInert(options, bootLogger);
  const logger = options.logger ?? createLogger('memsift', config.logging.level);

  const sessions = new SessionManager(config.filter, {
    logger,
    providerFactory: options.providerFactory,
  });
  const filter = new FilterManager(sessions, {
    logger,
    promptTemplate: options.promptTemplate,
    logDecisions: config.logging.log_filter_decisions,
  });

  return { config, sessions, filter };
}
