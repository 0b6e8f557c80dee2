/**
 * Conversation context assembly
 */

export {
  ContextAssembler,
  type ContextAssemblerDeps,
  type PrepareContextRequest,
  type ContextStats,
  type ClearSummariesOptions,
} from './assembler.js';
export { loadContextConfig, resolveContextConfig } from './config.js';
export { normalizeMessage, normalizeMessages, type NormalizeOptions } from './message-normalizer.js';
export {
  injectSummaries,
  formatSummaryContent,
  summaryToMessage,
  type SummaryInjectionOptions,
} from './summary-injector.js';
export {
  injectMemories,
  formatMemoryContent,
  insertBeforeFirstDialogue,
  MEMORY_BLOCK_HEADER,
  type MemoryInjectionOptions,
} from './memory-injector.js';
export { applySlidingWindow, toWireMessages } from './sliding-window.js';
export {
  optimizeForTokenBudget,
  selectNewestWithinBudget,
  type TokenBudgetOptions,
  type CostedMessage,
} from './token-budget.js';
export {
  SummaryTrigger,
  buildTranscript,
  resolveSummaryPeriod,
  type SummaryTriggerOptions,
  type CompactionRequest,
  type CompactionOutcome,
} from './summary-trigger.js';
export {
  parseIsoTimestamp,
  resolveTimestamp,
  pickTimestampField,
  formatMinuteUtc,
  type TimestampResolution,
} from './timestamps.js';
