// Shared types for memsift

// ============================================================================
// Provider Kinds
// ============================================================================

/**
 * Backend kinds the provider factory can build
 */
export const PROVIDER_KINDS = ['openai', 'anthropic', 'ollama'] as const;

export type ProviderKind = (typeof PROVIDER_KINDS)[number];

export function isProviderKind(value: string): value is ProviderKind {
  return PROVIDER_KINDS.some((kind) => kind === value);
}

// ============================================================================
// Categories
// ============================================================================

/** Categories worth keeping in long-term memory */
export const STORE_CATEGORIES = [
  'env-quirk',
  'user-pref',
  'external-api',
  'historical-context',
  'cross-project',
  'workaround',
] as const;

/** Categories already captured elsewhere (code, repo, docs) */
export const SKIP_CATEGORIES = [
  'bug-in-code',
  'config-in-repo',
  'docs-added',
  'first-success',
] as const;

// ============================================================================
// Decisions
// ============================================================================

/**
 * Parsed provider reply. Fields beyond the verdict (`reason`, `confidence`)
 * are kept as the model sent them.
 */
export type ProviderCompletion = {
  should_store: boolean;
  category: string;
} & Record<string, unknown>;

/**
 * Verdict handed to the storage collaborator
 */
export type FilterDecision = {
  should_store: boolean;
  category: string;
  reason: string;
  session_id: string;
} & Record<string, unknown>;

// Errors
export * from './errors.js';

// Schemas and validation
export * from './schemas.js';
export * from './validation.js';
