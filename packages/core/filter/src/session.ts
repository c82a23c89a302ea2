/**
 * Filter Session - one agent's LLM context, bound to a single provider
 */
import type { ProviderAdapter } from '@memsift/providers';

/**
 * Plain view of a session for logging and stats
 */
export interface SessionSnapshot {
  sessionId: string;
  provider: string;
  model: string;
  createdAt: string;
  lastUsedAt: string;
  contextTokens: number;
  queryCount: number;
}

export class Session {
  readonly createdAt: Date;
  lastUsedAt: Date;
  contextTokens = 0;
  queryCount = 0;

  constructor(
    readonly sessionId: string,
    readonly provider: ProviderAdapter,
    now: Date = new Date()
  ) {
    this.createdAt = now;
    this.lastUsedAt = now;
  }

  /**
   * Whether the accumulated context exceeds the limit (strictly greater)
   */
  shouldCleanup(maxContextTokens: number): boolean {
    return this.contextTokens > maxContextTokens;
  }

  /**
   * Zero the counters. Identity and provider binding are kept.
   */
  resetContext(): void {
    this.contextTokens = 0;
    this.queryCount = 0;
  }

  /**
   * Account for one completed query
   */
  recordQuery(promptTokens: number): void {
    this.queryCount += 1;
    this.contextTokens += promptTokens;
    this.lastUsedAt = new Date();
  }

  toSnapshot(): SessionSnapshot {
    return {
      sessionId: this.sessionId,
      provider: this.provider.name,
      model: this.provider.config.model,
      createdAt: this.createdAt.toISOString(),
      lastUsedAt: this.lastUsedAt.toISOString(),
      contextTokens: this.contextTokens,
      queryCount: this.queryCount,
    };
  }
}
