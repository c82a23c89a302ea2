/**
 * Session Manager - owns the provider pool and the session registry
 */
import { randomUUID } from 'node:crypto';
import { getSortedProviders, type FilterConfig } from '@memsift/config';
import { createProviderFactory, type ProviderAdapter, type ProviderFactory } from '@memsift/providers';
import { NoProviderAvailableError, errorMessage } from '@memsift/types';
import { createLogger, type Logger } from '@memsift/utils';
import { Session } from './session.js';

/**
 * Binds a new session to an adapter. May throw to skip that adapter.
 */
export type SessionFactory = (sessionId: string, provider: ProviderAdapter) => Session;

export interface SessionManagerOptions {
  logger?: Logger;
  providerFactory?: ProviderFactory;
  sessionFactory?: SessionFactory;
}

export interface SessionManagerStats {
  providers: Array<{ name: string; model: string; priority: number }>;
  activeSessions: number;
  totalQueries: number;
  maxContextTokens: number;
}

const defaultSessionFactory: SessionFactory = (sessionId, provider) => new Session(sessionId, provider);

export class SessionManager {
  private readonly sessions = new Map<string, Session>();
  private readonly providers: readonly ProviderAdapter[];
  private readonly logger: Logger;
  private readonly sessionFactory: SessionFactory;
  readonly maxContextTokens: number;

  constructor(config: FilterConfig, options: SessionManagerOptions = {}) {
    this.logger = options.logger ?? createLogger('session-manager');
    this.sessionFactory = options.sessionFactory ?? defaultSessionFactory;
    this.maxContextTokens = config.session.max_context_tokens;
    this.providers = this.initializeProviders(
      config,
      options.providerFactory ?? createProviderFactory({ logger: this.logger })
    );
  }

  private initializeProviders(config: FilterConfig, factory: ProviderFactory): ProviderAdapter[] {
    if (!config.enabled) {
      this.logger.info('Filtering disabled by configuration; no providers loaded');
      return [];
    }

    const pool: ProviderAdapter[] = [];
    for (const providerConfig of getSortedProviders(config.providers)) {
      let adapter: ProviderAdapter;
      try {
        adapter = factory(providerConfig);
      } catch (error) {
        this.logger.warn(`Skipping provider ${providerConfig.name}: ${errorMessage(error)}`);
        continue;
      }

      if (!adapter.isAvailable()) {
        this.logger.warn(
          `Provider ${providerConfig.name} (${providerConfig.model}) unavailable - disabled or missing credentials`
        );
        continue;
      }

      pool.push(adapter);
      this.logger.info(
        `Loaded provider ${providerConfig.name} (${providerConfig.model}) at priority ${providerConfig.priority}`
      );
    }

    if (pool.length === 0) {
      this.logger.warn('No LLM providers available - memory filtering disabled');
    }

    return pool;
  }

  /**
   * Whether any provider loaded; a manager without providers can never bind a session
   */
  get hasProviders(): boolean {
    return this.providers.length > 0;
  }

  /**
   * Return the session for `sessionId`, binding a new one when absent.
   * An existing session over the context limit is reset in place.
   *
   * @throws NoProviderAvailableError when no adapter can bind a new session
   */
  getOrCreateSession(sessionId: string = randomUUID()): Session {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      if (existing.shouldCleanup(this.maxContextTokens)) {
        this.logger.info(
          `Session ${sessionId} context at ${existing.contextTokens} tokens (limit ${this.maxContextTokens}) - resetting`
        );
        existing.resetContext();
      }
      return existing;
    }

    const attempted: string[] = [];
    for (const provider of this.providers) {
      attempted.push(provider.name);
      try {
        const session = this.sessionFactory(sessionId, provider);
        this.sessions.set(sessionId, session);
        this.logger.info(`Created session ${sessionId} with ${provider.name} (${provider.config.model})`);
        return session;
      } catch (error) {
        this.logger.warn(`Could not bind session ${sessionId} to ${provider.name}: ${errorMessage(error)}`);
      }
    }

    throw new NoProviderAvailableError(sessionId, attempted);
  }

  getSession(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  listSessions(): Session[] {
    return [...this.sessions.values()];
  }

  /**
   * Drop a session. Unknown identifiers are ignored.
   *
   * @returns whether a session was removed
   */
  cleanupSession(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) {
      this.logger.info(`Cleaned up session ${sessionId}`);
    }
    return removed;
  }

  getStats(): SessionManagerStats {
    let totalQueries = 0;
    for (const session of this.sessions.values()) {
      totalQueries += session.queryCount;
    }

    return {
      providers: this.providers.map((provider) => ({
        name: provider.name,
        model: provider.config.model,
        priority: provider.config.priority,
      })),
      activeSessions: this.sessions.size,
      totalQueries,
      maxContextTokens: this.maxContextTokens,
    };
  }
}
