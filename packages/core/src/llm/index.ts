/**
 * LLM module
 *
 * Claude API client, conversation summarizer and approximate token counting.
 */

export {
  ClaudeClient,
  createSummaryClient,
  describeFailure,
  estimateCostUsd,
  retryDelayMs,
  MODEL_ALIASES,
  MODEL_PRICES,
} from './client.js';
export type { CompletionOptions } from './client.js';
export {
  ClaudeSummarizer,
  DEFAULT_SUMMARY_SYSTEM_PROMPT,
  SUMMARY_MAX_TOKENS,
  SUMMARY_TEMPERATURE,
  buildSummaryUserMessage,
  formatPersonaName,
} from './summarizer.js';
export type { ClaudeSummarizerOptions } from './summarizer.js';
export { ApproximateTokenCounter, detectLanguage } from './tokens.js';
export type {
  LlmConfig,
  LlmResponse,
  TokenUsage,
  ModelId,
  ModelPrice,
  RetryConfig,
  TextLanguage,
} from './types.js';
