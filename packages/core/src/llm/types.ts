/**
 * LLM module types
 */

/**
 * Supported Claude model IDs
 */
export type ModelId = 'claude-3-5-haiku-20241022' | 'claude-sonnet-4-5-20250514';

/**
 * USD per million tokens
 */
export interface ModelPrice {
  input: number;
  output: number;
}

/**
 * Configuration for LLM client
 */
export interface LlmConfig {
  apiKey: string;
  model: ModelId;
  maxTokens?: number;
  temperature?: number;
}

/**
 * Retry behaviour for transient API failures
 */
export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  retryableStatusCodes: number[];
}

/**
 * Response from LLM
 */
export interface LlmResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  usage: TokenUsage;
  durationMs?: number;
  stopReason?: string | null;
  retryable?: boolean;
  retriesUsed?: number;
}

/**
 * Token usage summed over every attempt of one request
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
}

/**
 * Language buckets used by the approximate token counter
 */
export type TextLanguage = 'russian' | 'english' | 'mixed';
