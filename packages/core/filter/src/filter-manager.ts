/**
 * Filter Manager - decides whether an event is worth storing in memory
 *
 * Fail-open: when filtering is disabled or any step fails, the decision is
 * to store. A broken filter may over-store but never drops an event.
 */
import { ProviderCallError, errorMessage, isMemsiftError, type FilterDecision } from '@memsift/types';
import { createLogger, type Logger } from '@memsift/utils';
import { DEFAULT_PROMPT_TEMPLATE, renderPrompt } from './prompt.js';
import type { SessionManager } from './session-manager.js';
import { estimatePromptTokens } from './utils/token-estimate.js';

export interface FilterManagerOptions {
  logger?: Logger;
  /** Template with `{event_description}` and `{context}` placeholders */
  promptTemplate?: string;
  /** Log each decision at info instead of debug */
  logDecisions?: boolean;
}

function describeFailure(error: unknown): string {
  if (error instanceof ProviderCallError) {
    return `${error.code}/${error.kind}`;
  }
  if (isMemsiftError(error)) {
    return error.code;
  }
  return error instanceof Error ? error.name : 'unknown';
}

export class FilterManager {
  readonly enabled: boolean;
  readonly promptTemplate: string;
  private readonly logger: Logger;
  private readonly logDecisions: boolean;

  constructor(
    private readonly sessionManager: SessionManager,
    options: FilterManagerOptions = {}
  ) {
    this.logger = options.logger ?? createLogger('filter');
    this.promptTemplate = options.promptTemplate ?? DEFAULT_PROMPT_TEMPLATE;
    this.logDecisions = options.logDecisions ?? true;
    this.enabled = sessionManager.hasProviders;
  }

  /**
   * Classify an event. Never rejects: failures resolve to a
   * `filter_error` decision with `should_store: true`.
   */
  async shouldStore(eventDescription: string, context = '', sessionId?: string): Promise<FilterDecision> {
    if (!this.enabled) {
      return {
        should_store: true,
        category: 'filter_disabled',
        reason: 'Filtering is disabled',
        session_id: sessionId || 'none',
      };
    }

    try {
      const session = this.sessionManager.getOrCreateSession(sessionId || undefined);
      const prompt = renderPrompt(this.promptTemplate, {
        event_description: eventDescription,
        context,
      });

      const completion = await session.provider.complete(prompt);
      session.recordQuery(estimatePromptTokens(prompt));

      const decision: FilterDecision = {
        ...completion,
        reason: typeof completion.reason === 'string' ? completion.reason : '',
        session_id: session.sessionId,
      };
      this.logDecision(decision, session.provider.name);
      return decision;
    } catch (error) {
      this.logger.error(
        `Filter failed for session ${sessionId || 'error'} [${describeFailure(error)}]: ${errorMessage(error)}`
      );
      return {
        should_store: true,
        category: 'filter_error',
        reason: `Filter failed: ${errorMessage(error)}`,
        session_id: sessionId || 'error',
      };
    }
  }

  private logDecision(decision: FilterDecision, provider: string): void {
    const verdict = decision.should_store ? 'STORE' : 'SKIP';
    const line = `${verdict} [${decision.category}] via ${provider} (session ${decision.session_id})${
      decision.reason ? `: ${decision.reason}` : ''
    }`;

    if (this.logDecisions) {
      this.logger.info(line);
    } else {
      this.logger.debug(line);
    }
  }
}
