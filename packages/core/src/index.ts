/**
 * @persona-chat/core
 *
 * Conversation context assembly for the persona chat bot: message
 * normalisation, summary and memory injection, token budgeting, history
 * compaction and the DynamoDB summary store.
 */

// Types and schemas
export * from './types/index.js';
export * from './schemas/index.js';
export * from './constants.js';

// Logging
export { StructuredLogger, parseLogLevel, toError } from './logger.js';
export type { Logger, LogLevel, StructuredLoggerOptions } from './logger.js';

// Database
export { DynamoDBClient, DynamoDBError, ContextSummaryRepository } from './db/index.js';

// LLM
export {
  ClaudeClient,
  ClaudeSummarizer,
  ApproximateTokenCounter,
  createSummaryClient,
  estimateCostUsd,
  MODEL_ALIASES,
  MODEL_PRICES,
} from './llm/index.js';
export type { ModelId, TokenUsage, LlmResponse } from './llm/index.js';

// Context assembly
export {
  ContextAssembler,
  SummaryTrigger,
  loadContextConfig,
  resolveContextConfig,
} from './context/index.js';
export type {
  ContextAssemblerDeps,
  PrepareContextRequest,
  ContextStats,
  CompactionOutcome,
  CompactionRequest,
} from './context/index.js';
