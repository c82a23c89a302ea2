/**
 * Main Configuration Loading
 *
 * Convenience function that combines loading, overlay, validation and
 * resolution
 */

import type { Logger } from '@memsift/utils';
import type { ResolvedConfig } from './schema.js';
import { loadConfig } from './loader.js';
import { applyEnvOverlay } from './env.js';
import { validateConfigOrThrow } from './validation.js';
import { resolveConfig } from './providers.js';

/**
 * Options for loading configuration
 */
export interface LoadConfigOptions {
  /** Custom path to memsift.toml; MEMSIFT_CONFIG and the search paths are used otherwise */
  configPath?: string;
  /** Whether to apply environment variable overlays (default: true) */
  applyEnv?: boolean;
  /** Environment used to locate the file, for overlays and for credentials (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory searched first for memsift.toml (default: process.cwd()) */
  cwd?: string;
  /** Receives configuration warnings */
  logger?: Logger;
}

/**
 * Load, overlay, validate and resolve configuration in one call
 *
 * @throws ConfigLoadError if loading fails
 * @throws ConfigValidationError if validation fails
 */
export function loadAndValidateConfig(options: LoadConfigOptions = {}): ResolvedConfig {
  const { configPath, applyEnv = true, env = process.env, cwd, logger } = options;

  let raw = loadConfig({ configPath, env, cwd });

  if (applyEnv) {
    raw = applyEnvOverlay(raw, env);
  }

  const config = validateConfigOrThrow(raw, logger);
  return resolveConfig(config, env);
}
