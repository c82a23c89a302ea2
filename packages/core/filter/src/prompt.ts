/**
 * Classification prompt for the memory filter
 */
import { SKIP_CATEGORIES, STORE_CATEGORIES } from '@memsift/types';

export const DEFAULT_PROMPT_TEMPLATE = `Analyze event. Store ONLY if non-redundant:
✅ STORE if: ${STORE_CATEGORIES.join(' | ')}
❌ SKIP if: ${SKIP_CATEGORIES.join(' | ')}
Event: {event_description}
Context: {context}
JSON only: {"should_store": bool, "category": str, "reason": str}`;

export interface PromptValues {
  event_description: string;
  context: string;
}

/**
 * Substitute `{event_description}` and `{context}`. Any other braces,
 * including the JSON example, stay literal, and substituted values are
 * not scanned again.
 */
export function renderPrompt(template: string, values: PromptValues): string {
  return template.replace(/\{(event_description|context)\}/g, (_match, key: string) =>
    key === 'event_description' ? values.event_description : values.context
  );
}
