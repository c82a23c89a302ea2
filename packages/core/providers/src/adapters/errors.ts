import { ProviderCallError, errorMessage } from '@memsift/types';

const CONNECTION_FAILURE = /connection|timeout|timed out|ECONNREFUSED|ECONNRESET|ENOTFOUND|EAI_AGAIN/i;

function readStatus(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function isConnectionFailure(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return CONNECTION_FAILURE.test(`${error.name} ${error.constructor.name} ${error.message}`);
}

/**
 * Map an SDK failure onto a ProviderCallError kind.
 * Both SDKs expose the HTTP status as `status` on their API errors.
 */
export function mapProviderError(error: unknown, provider: string, label: string): ProviderCallError {
  if (error instanceof ProviderCallError) {
    return error;
  }

  const cause = error instanceof Error ? error : undefined;
  const status = readStatus(error);

  if (status !== undefined) {
    if (status === 401 || status === 403) {
      return new ProviderCallError(`${label} authentication failed`, 'auth', { provider, status, cause });
    }
    if (status === 402) {
      return new ProviderCallError(`${label} billing issue`, 'billing', { provider, status, cause });
    }
    if (status === 429) {
      return new ProviderCallError(`${label} rate limit exceeded`, 'rate_limit', { provider, status, cause });
    }
    if (status >= 500) {
      return new ProviderCallError(`${label} provider unavailable`, 'unavailable', { provider, status, cause });
    }
    if (status >= 400) {
      return new ProviderCallError(
        `${label} rejected the request (${status}): ${errorMessage(error)}`,
        'invalid_request',
        { provider, status, cause }
      );
    }
  }

  if (isConnectionFailure(error)) {
    return new ProviderCallError(`${label} network error: ${errorMessage(error)}`, 'network', {
      provider,
      cause,
    });
  }

  return new ProviderCallError(`${label} provider error: ${errorMessage(error)}`, 'unknown', {
    provider,
    status,
    cause,
  });
}
