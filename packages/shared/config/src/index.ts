/**
 * @memsift/config - Configuration System
 *
 * Provides TOML parsing, environment variable overlays, validation and
 * provider-config resolution for memsift.
 */

// Export schema types
export {
  MemsiftConfigSchema,
  ProviderConfigInputSchema,
  FilterSectionSchema,
  LoggingSectionSchema,
  type MemsiftConfig,
  type ProviderConfigInput,
  type FilterSection,
  type LoggingSection,
  type ProviderConfig,
  type SessionPolicy,
  type FilterConfig,
  type LoggingConfig,
  type ResolvedConfig,
} from './schema.js';

// Export loader functions
export {
  loadConfig,
  loadTomlFile,
  parseToml,
  findConfigFile,
  getConfigSearchPaths,
  ConfigLoadError,
  CONFIG_FILE_NAME,
  CONFIG_PATH_ENV,
  type LoadConfigFileOptions,
  type RawConfig,
} from './loader.js';

// Export environment overlay functions
export { createEnvOverlay, applyEnvOverlay } from './env.js';

// Export validation functions
export {
  validateConfig,
  validateConfigOrThrow,
  ConfigValidationError,
  type ValidationResult,
} from './validation.js';

// Export provider resolution
export {
  resolveProviderConfig,
  resolveFilterConfig,
  resolveLoggingConfig,
  resolveConfig,
  getSortedProviders,
  DEFAULT_MAX_CONTEXT_TOKENS,
  DEFAULT_PROVIDER_TEMPERATURE,
  DEFAULT_PROVIDER_MAX_TOKENS,
  DEFAULT_API_KEY_ENV,
} from './providers.js';

// Main convenience function that loads, overlays, validates and resolves config
export { loadAndValidateConfig, type LoadConfigOptions } from './main.js';
