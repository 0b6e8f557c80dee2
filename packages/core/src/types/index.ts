/**
 * Core TypeScript types for the persona chat context assembler
 */

// ============================================================================
// Primitive Types
// ============================================================================

export type MessageRole = 'system' | 'user' | 'assistant';

export type SyntheticMessageType = 'context_summary' | 'injected_memories';

/**
 * Why a message timestamp was replaced with the current time
 */
export type TimestampFallbackReason = 'missing' | 'unparseable' | 'unsupported_type';

// ============================================================================
// Messages
// ============================================================================

/**
 * A message record as read from the message datastore.
 *
 * Records come from several writers over the bot's lifetime, so every field is
 * untyped until normalised.
 */
export interface RawMessageRecord {
  id?: unknown;
  role?: unknown;
  content?: unknown;
  timestamp?: unknown;
  created_at?: unknown;
  createdAt?: unknown;
  persona?: unknown;
  metadata?: unknown;
  [key: string]: unknown;
}

/**
 * In-memory message used while a context is being assembled
 */
export interface Message {
  role: MessageRole;
  content: string;
  timestamp: Date;
  persona: string;
  metadata: Record<string, unknown>;
}

/**
 * Role/content pair in the shape the LLM client consumes
 */
export interface WireMessage {
  role: MessageRole;
  content: string;
}

// ============================================================================
// Summaries
// ============================================================================

/**
 * A compacted block of conversation persisted by the summary store
 */
export interface PersistedSummary {
  summaryId: string;
  userId: string;
  persona: string;
  summaryText: string;
  /** Raw messages replaced by this summary */
  messageCount: number;
  periodStart: Date;
  periodEnd: Date;
  tokensSaved: number;
  createdAt: Date;
}

export interface SaveSummaryInput {
  userId: string;
  persona: string;
  summaryText: string;
  messageCount: number;
  periodStart: Date;
  periodEnd: Date;
  tokensSaved?: number;
}

export type SummarizerErrorCode =
  | 'empty_summary'
  | 'llm_error'
  | 'timeout'
  | 'unexpected_error';

export interface SummarizerError {
  code: SummarizerErrorCode;
  message: string;
  retryable: boolean;
}

/**
 * Outcome of one summarisation call
 */
export type SummaryResult =
  | { success: true; summary: string }
  | { success: false; error: SummarizerError };

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Counts the tokens `content` costs for `model`. Must be deterministic.
 */
export type TokenCounter = (content: string, model: string) => number | Promise<number>;

/**
 * Persistence for conversation summaries
 */
export interface SummaryStore {
  /** Most recent summaries for the pair, newest `periodEnd` first */
  getLatest(userId: string, persona: string, limit: number): Promise<PersistedSummary[]>;
  save(input: SaveSummaryInput): Promise<PersistedSummary>;
  /** Deletes summaries created before `cutoff`; all personas when none is given */
  deleteOlderThan(userId: string, cutoff: Date, persona?: string): Promise<number>;
}

/**
 * Produces a condensed summary of a dialogue transcript
 */
export interface Summarizer {
  createSummary(transcript: string, persona: string): Promise<SummaryResult>;
}

// ============================================================================
// Configuration
// ============================================================================

export interface ContextConfig {
  /** Sliding window size in dialogue turns */
  maxMessagesInContext: number;
  /** History length that triggers compaction */
  summaryThreshold: number;
  /** Hard token ceiling for one request */
  maxTokens: number;
  summariesToInject: number;
  maxInjectedMemories: number;
  fallbackMessageCount: number;
  /** Model name handed to the token counter */
  model: string;
  summarizerTimeoutMs: number;
}
