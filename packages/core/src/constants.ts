/**
 * Application constants
 */

import type { SyntheticMessageType } from './types/index.js';

export const TABLE_NAME = process.env.TABLE_NAME ?? 'PersonaChat';

/** Dialogue turns kept by the sliding window */
export const DEFAULT_MAX_MESSAGES_IN_CONTEXT = 20;

/** History length at which a new summary is compacted */
export const DEFAULT_SUMMARY_THRESHOLD = 30;

/** Hard token ceiling for one model request */
export const DEFAULT_MAX_TOKENS_FOR_LLM = 3800;

/** Persisted summaries injected ahead of the dialogue */
export const DEFAULT_SUMMARIES_TO_INJECT = 1;

/** Long-term memories injected per request */
export const DEFAULT_MAX_INJECTED_MEMORIES = 3;

/** Raw messages used by the reduced fallback context */
export const DEFAULT_FALLBACK_MESSAGE_COUNT = 5;

/** Model name handed to the token counter */
export const DEFAULT_CONTEXT_MODEL = 'claude-3-5-haiku-20241022';

/** Upper bound on one summarizer call */
export const DEFAULT_SUMMARIZER_TIMEOUT_MS = 30_000;

/** Retention period for persisted summaries */
export const DEFAULT_SUMMARY_RETENTION_DAYS = 30;

/** Fallback width of a compacted period when the first timestamp is unusable */
export const SUMMARY_PERIOD_FALLBACK_MINUTES = 10;

/** DynamoDB key prefixes */
export const KEY_PREFIX = {
  USER: 'USER#',
  SUMMARY: 'SUMMARY#',
} as const;

/** Metadata `type` values of synthetic messages */
export const SYNTHETIC_MESSAGE_TYPE = {
  CONTEXT_SUMMARY: 'context_summary',
  INJECTED_MEMORIES: 'injected_memories',
} as const satisfies Record<string, SyntheticMessageType>;

/** Returned when system messages alone cannot fit the token budget */
export const CONTEXT_TOO_LARGE_MESSAGE =
  'Error: the context for this reply is too large and could not be optimised.';

/** Returned when every context strategy failed */
export const CONTEXT_UNAVAILABLE_MESSAGE =
  'Something went wrong while preparing the conversation context. Please try again.';
