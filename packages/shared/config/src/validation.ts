/**
 * Configuration Validation
 *
 * Checks memsift.toml structure against the TypeBox schema, then applies the
 * range and consistency rules the schema cannot express.
 */

import {
  MemsiftError,
  MemsiftErrorCodes,
  PROVIDER_KINDS,
  isProviderKind,
  validate,
  formatValidationErrors,
} from '@memsift/types';
import { createLogger, isLogLevel, LOG_LEVELS, type Logger } from '@memsift/utils';
import { MemsiftConfigSchema, type MemsiftConfig } from './schema.js';

/**
 * Error thrown when configuration validation fails
 */
export class ConfigValidationError extends MemsiftError {
  constructor(
    message: string,
    public readonly errors: string[] = [],
  ) {
    super({
      code: MemsiftErrorCodes.VALIDATION,
      message,
      component: 'config',
      details: { errors },
      timestamp: new Date().toISOString(),
    });
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  /** The typed configuration, present when `valid` is true */
  config?: MemsiftConfig;
}

/**
 * Validate the [filter] section
 */
function validateFilterSection(config: MemsiftConfig, errors: string[], warnings: string[]): void {
  const providers = config.filter.providers ?? [];

  if (providers.length === 0) {
    warnings.push('No filter providers configured - every event will be stored');
  }

  const seenPriorities = new Map<number, number>();

  providers.forEach((provider, index) => {
    const prefix = `filter.providers[${index}]`;

    if (provider.name.trim() === '') {
      errors.push(`${prefix}.name is required and cannot be empty`);
    } else if (!isProviderKind(provider.name)) {
      warnings.push(
        `${prefix}.name "${provider.name}" is not a supported provider (${PROVIDER_KINDS.join(', ')}) and will be skipped`,
      );
    }

    if (provider.model.trim() === '') {
      errors.push(`${prefix}.model is required and cannot be empty`);
    }

    if (provider.temperature !== undefined && (provider.temperature < 0 || provider.temperature > 2)) {
      errors.push(`${prefix}.temperature must be between 0 and 2`);
    }

    if (provider.max_tokens !== undefined && provider.max_tokens < 1) {
      errors.push(`${prefix}.max_tokens must be at least 1`);
    }

    if (provider.max_retries !== undefined && provider.max_retries < 0) {
      errors.push(`${prefix}.max_retries cannot be negative`);
    }

    if (provider.timeout_ms !== undefined && provider.timeout_ms < 1) {
      errors.push(`${prefix}.timeout_ms must be at least 1`);
    }

    const priority = provider.priority ?? index + 1;
    const seen = seenPriorities.get(priority) ?? 0;
    if (seen === 1) {
      warnings.push(
        `filter.providers priority ${priority} is used by more than one provider - file order breaks the tie`,
      );
    }
    seenPriorities.set(priority, seen + 1);
  });

  const maxContext = config.filter.session?.max_context_tokens;
  if (maxContext !== undefined && maxContext < 1) {
    errors.push('filter.session.max_context_tokens must be at least 1');
  }
}

/**
 * Validate the [logging] section
 */
function validateLoggingSection(config: MemsiftConfig, errors: string[], _warnings: string[]): void {
  const level = config.logging?.level;
  if (level !== undefined && !isLogLevel(level)) {
    errors.push(`Invalid logging.level: "${level}". Must be one of: ${LOG_LEVELS.join(', ')}`);
  }
}

/**
 * Validate complete configuration
 */
export function validateConfig(config: unknown): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (typeof config !== 'object' || config === null || !('filter' in config)) {
    errors.push('Missing required [filter] section');
    return { valid: false, errors, warnings };
  }

  const structure = validate(MemsiftConfigSchema, config);
  if (!structure.success) {
    for (const line of formatValidationErrors(structure.errors)) {
      errors.push(`Invalid configuration at ${line}`);
    }
    return { valid: false, errors, warnings };
  }

  validateFilterSection(structure.data, errors, warnings);
  validateLoggingSection(structure.data, errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config: errors.length === 0 ? structure.data : undefined,
  };
}

/**
 * Validate configuration and throw if invalid
 */
export function validateConfigOrThrow(
  config: unknown,
  logger: Logger = createLogger('config'),
): MemsiftConfig {
  const result = validateConfig(config);

  if (!result.valid || !result.config) {
    throw new ConfigValidationError(
      `Configuration validation failed:\n${result.errors.join('\n')}`,
      result.errors,
    );
  }

  if (result.warnings.length > 0) {
    logger.warn('Configuration warnings:');
    for (const warning of result.warnings) {
      logger.warn(`  - ${warning}`);
    }
  }

  return result.config;
}
