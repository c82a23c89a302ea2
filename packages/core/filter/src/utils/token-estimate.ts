/**
 * Token Estimate - character-based size proxy for session context
 *
 * Uses the ~4 chars/token rule of thumb. Only the prompt is counted,
 * not the provider's reply.
 */

export const CHARS_PER_TOKEN = 4;

/**
 * Estimate tokens for a prompt, rounding down
 */
export function estimatePromptTokens(prompt: string): number {
  if (!prompt) {
    return 0;
  }

  return Math.floor(prompt.length / CHARS_PER_TOKEN);
}
