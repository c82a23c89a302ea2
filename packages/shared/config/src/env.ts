/**
 * Environment Variable Overlay
 *
 * Allows environment variables to override TOML configuration values
 */

import type { RawConfig } from './loader.js';

/**
 * Mapping of environment variables to configuration paths
 */
const ENV_VAR_MAPPINGS: Record<string, string> = {
  MEMSIFT_FILTER_ENABLED: 'filter.enabled',
  MEMSIFT_MAX_CONTEXT_TOKENS: 'filter.session.max_context_tokens',
  MEMSIFT_LOG_LEVEL: 'logging.level',
  MEMSIFT_LOG_FILTER_DECISIONS: 'logging.log_filter_decisions',
};

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string, path: string): string | number | boolean {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  if (path.includes('max_context_tokens')) {
    const num = Number(value);
    if (!isNaN(num)) return num;
  }

  return value;
}

/**
 * Check if a key is safe to use (not a prototype pollution vector)
 */
function isSafeKey(key: string): boolean {
  return key !== '__proto__' && key !== 'constructor' && key !== 'prototype';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set a nested property in an object using dot notation
 * Protected against prototype pollution
 */
function setNestedProperty(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    if (!part || !isSafeKey(part)) continue;
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  const lastPart = parts[parts.length - 1];
  if (lastPart && isSafeKey(lastPart)) {
    current[lastPart] = value;
  }
}

/**
 * Create configuration overlay from environment variables
 */
export function createEnvOverlay(env: NodeJS.ProcessEnv = process.env): RawConfig {
  const overlay: RawConfig = {};

  for (const [envVar, configPath] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setNestedProperty(overlay, configPath, parseEnvValue(value, configPath));
    }
  }

  return overlay;
}

/**
 * Deep merge two objects, with source taking precedence
 * Protected against prototype pollution
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    if (!isSafeKey(key)) {
      continue;
    }

    const sourceValue = source[key];
    const targetValue = result[key];

    if (sourceValue === undefined) {
      continue;
    }

    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

/**
 * Apply environment variable overlay to configuration
 */
export function applyEnvOverlay(config: RawConfig, env: NodeJS.ProcessEnv = process.env): RawConfig {
  return deepMerge(config, createEnvOverlay(env));
}
