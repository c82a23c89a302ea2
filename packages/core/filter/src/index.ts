export { Session, type SessionSnapshot } from './session.js';
export {
  SessionManager,
  type SessionFactory,
  type SessionManagerOptions,
  type SessionManagerStats,
} from './session-manager.js';
export { FilterManager, type FilterManagerOptions } from './filter-manager.js';
export { DEFAULT_PROMPT_TEMPLATE, renderPrompt, type PromptValues } from './prompt.js';
export { CHARS_PER_TOKEN, estimatePromptTokens } from './utils/token-estimate.js';
export {
  createMemoryFilter,
  INERT_CONFIG,
  type CreateMemoryFilterOptions,
  type MemoryFilter,
} from './bootstrap.js';
