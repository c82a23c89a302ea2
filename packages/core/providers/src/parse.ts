import {
  ProviderCallError,
  errorMessage,
  formatValidationErrors,
  validateProviderCompletion,
  type ProviderCompletion,
} from '@memsift/types';

const JSON_FENCE = '```json';
const FENCE = '```';

function sliceUntilFence(text: string): string {
  const end = text.indexOf(FENCE);
  return end === -1 ? text : text.slice(0, end);
}

/**
 * Pull the JSON body out of a model reply, unwrapping a markdown code fence
 * when the model added one.
 */
export function extractJsonText(content: string): string {
  const tagged = content.indexOf(JSON_FENCE);
  if (tagged !== -1) {
    return sliceUntilFence(content.slice(tagged + JSON_FENCE.length)).trim();
  }

  const fence = content.indexOf(FENCE);
  if (fence !== -1) {
    return sliceUntilFence(content.slice(fence + FENCE.length)).trim();
  }

  return content.trim();
}

/**
 * Parse a reply into a completion, rejecting with `invalid_response` when it
 * is not JSON or lacks `should_store`/`category`.
 */
export function parseCompletion(content: string, provider: string): ProviderCompletion {
  const text = extractJsonText(content);

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ProviderCallError(`${provider} returned invalid JSON: ${errorMessage(error)}`, 'invalid_response', {
      provider,
      cause: error instanceof Error ? error : undefined,
    });
  }

  const result = validateProviderCompletion(parsed);
  if (!result.success) {
    throw new ProviderCallError(
      `${provider} returned an unexpected completion: ${formatValidationErrors(result.errors).join('; ')}`,
      'invalid_response',
      { provider }
    );
  }

  return { ...result.data };
}
