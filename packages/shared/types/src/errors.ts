/**
 * Memsift Error Types and Factory Functions
 *
 * Provides standardized error handling across all memsift components.
 * All errors include component attribution and structured details.
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * All memsift error codes with descriptions
 */
export const MemsiftErrorCodes = {
  /** memsift.toml missing, unreadable or not valid TOML */
  CONFIG: 'MEMSIFT_ERR_CONFIG',
  /** memsift.toml parsed but failed validation */
  VALIDATION: 'MEMSIFT_ERR_VALIDATION',
  /** Configuration names a backend kind with no adapter */
  UNKNOWN_PROVIDER: 'MEMSIFT_ERR_UNKNOWN_PROVIDER',
  /** Backend call failed or returned unparseable content */
  PROVIDER_CALL: 'MEMSIFT_ERR_PROVIDER_CALL',
  /** Every adapter in the pool failed to bind a session */
  NO_PROVIDER: 'MEMSIFT_ERR_NO_PROVIDER',
} as const;

export type MemsiftErrorCode = (typeof MemsiftErrorCodes)[keyof typeof MemsiftErrorCodes];

// ============================================================================
// Error Interface
// ============================================================================

/**
 * Structured memsift error
 */
export interface MemsiftErrorData {
  /** Error code */
  code: MemsiftErrorCode;
  /** Human-readable error message */
  message: string;
  /** Component that generated the error */
  component: string;
  /** Additional error details */
  details?: Record<string, unknown>;
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Original error if wrapping another error */
  cause?: Error;
}

// ============================================================================
// MemsiftError Class
// ============================================================================

/**
 * Base error class for all memsift errors
 */
export class MemsiftError extends Error {
  readonly code: MemsiftErrorCode;
  readonly component: string;
  readonly details?: Record<string, unknown>;
  readonly timestamp: string;

  constructor(data: MemsiftErrorData) {
    super(data.message);
    this.name = 'MemsiftError';
    this.code = data.code;
    this.component = data.component;
    this.details = data.details;
    this.timestamp = data.timestamp;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    if (data.cause) {
      this.cause = data.cause;
    }
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      component: this.component,
      details: this.details,
      timestamp: this.timestamp,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message} (component: ${this.component})`;
  }
}

// ============================================================================
// Provider Errors
// ============================================================================

/**
 * Why a provider call failed
 */
export type ProviderFailureKind =
  | 'not_configured'
  | 'auth'
  | 'billing'
  | 'rate_limit'
  | 'unavailable'
  | 'network'
  | 'invalid_request'
  | 'invalid_response'
  | 'unknown';

const RETRYABLE_KINDS: ReadonlySet<ProviderFailureKind> = new Set([
  'rate_limit',
  'unavailable',
  'network',
]);

export interface ProviderCallErrorOptions {
  provider: string;
  status?: number;
  cause?: Error;
}

/**
 * Raised by a provider adapter when the backend client is absent, the call
 * throws, or the reply cannot be parsed into a completion.
 */
export class ProviderCallError extends MemsiftError {
  readonly kind: ProviderFailureKind;
  readonly provider: string;
  readonly status?: number;

  constructor(message: string, kind: ProviderFailureKind, options: ProviderCallErrorOptions) {
    super({
      code: MemsiftErrorCodes.PROVIDER_CALL,
      message,
      component: `provider:${options.provider}`,
      details: { kind, provider: options.provider, status: options.status },
      timestamp: new Date().toISOString(),
      cause: options.cause,
    });
    this.name = 'ProviderCallError';
    this.kind = kind;
    this.provider = options.provider;
    this.status = options.status;
  }

  /** Transient failures a backend client may retry */
  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

/**
 * Raised by the provider factory for a backend kind it has no adapter for
 */
export class UnknownProviderError extends MemsiftError {
  readonly providerName: string;

  constructor(providerName: string, supported: readonly string[]) {
    super({
      code: MemsiftErrorCodes.UNKNOWN_PROVIDER,
      message: `Unknown provider: ${providerName}`,
      component: 'provider-factory',
      details: { provider: providerName, supported: [...supported] },
      timestamp: new Date().toISOString(),
    });
    this.name = 'UnknownProviderError';
    this.providerName = providerName;
  }
}

/**
 * Raised when no adapter in the pool could bind a new session
 */
export class NoProviderAvailableError extends MemsiftError {
  readonly sessionId: string;

  constructor(sessionId: string, attempted: readonly string[]) {
    super({
      code: MemsiftErrorCodes.NO_PROVIDER,
      message: 'No available LLM providers for filter session',
      component: 'session-manager',
      details: { sessionId, attempted: [...attempted] },
      timestamp: new Date().toISOString(),
    });
    this.name = 'NoProviderAvailableError';
    this.sessionId = sessionId;
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

export function isMemsiftError(error: unknown): error is MemsiftError {
  return error instanceof MemsiftError;
}

/**
 * Human-readable message for any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
