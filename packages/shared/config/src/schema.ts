/**
 * Configuration Schema for memsift
 *
 * The TypeBox schemas describe the memsift.toml structure as written on disk;
 * the interfaces below them describe the resolved records the rest of the
 * system consumes.
 */

import { Type, type Static } from '@sinclair/typebox';
import type { LogLevel } from '@memsift/utils';

// ============================================================================
// File Schema
// ============================================================================

/**
 * One `[[filter.providers]]` entry
 */
export const ProviderConfigInputSchema = Type.Object({
  name: Type.String({ description: 'Backend kind: openai, anthropic or ollama' }),
  model: Type.String(),
  api_key: Type.Optional(Type.String()),
  api_key_env: Type.Optional(Type.String()),
  enabled: Type.Optional(Type.Boolean()),
  temperature: Type.Optional(Type.Number()),
  max_tokens: Type.Optional(Type.Integer()),
  priority: Type.Optional(Type.Integer()),
  base_url: Type.Optional(Type.String()),
  max_retries: Type.Optional(Type.Integer()),
  timeout_ms: Type.Optional(Type.Integer()),
});

export const SessionPolicyInputSchema = Type.Object({
  max_context_tokens: Type.Optional(Type.Integer()),
});

export const FilterSectionSchema = Type.Object({
  enabled: Type.Optional(Type.Boolean()),
  providers: Type.Optional(Type.Array(ProviderConfigInputSchema)),
  session: Type.Optional(SessionPolicyInputSchema),
});

export const LoggingSectionSchema = Type.Object({
  level: Type.Optional(Type.String()),
  log_filter_decisions: Type.Optional(Type.Boolean()),
});

export const MemsiftConfigSchema = Type.Object({
  filter: FilterSectionSchema,
  logging: Type.Optional(LoggingSectionSchema),
});

export type ProviderConfigInput = Static<typeof ProviderConfigInputSchema>;
export type FilterSection = Static<typeof FilterSectionSchema>;
export type LoggingSection = Static<typeof LoggingSectionSchema>;

/**
 * Validated memsift.toml contents
 */
export type MemsiftConfig = Static<typeof MemsiftConfigSchema>;

// ============================================================================
// Resolved Records
// ============================================================================

/**
 * A backend entry with defaults applied and its credential looked up
 */
export interface ProviderConfig {
  readonly name: string;
  readonly model: string;
  readonly api_key: string | null;
  readonly enabled: boolean;
  readonly temperature: number;
  readonly max_tokens: number;
  readonly priority: number;
  readonly base_url?: string;
  /** Retries performed by the backend SDK client, not by memsift */
  readonly max_retries?: number;
  readonly timeout_ms?: number;
}

export interface SessionPolicy {
  readonly max_context_tokens: number;
}

export interface FilterConfig {
  readonly enabled: boolean;
  readonly providers: readonly ProviderConfig[];
  readonly session: SessionPolicy;
}

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly log_filter_decisions: boolean;
}

export interface ResolvedConfig {
  readonly filter: FilterConfig;
  readonly logging: LoggingConfig;
}
