/**
 * Zod validation schemas for persona chat
 *
 * Runtime validation for configuration, message roles and summary items read
 * back from DynamoDB.
 */

import { z } from 'zod';

import {
  DEFAULT_CONTEXT_MODEL,
  DEFAULT_FALLBACK_MESSAGE_COUNT,
  DEFAULT_MAX_INJECTED_MEMORIES,
  DEFAULT_MAX_MESSAGES_IN_CONTEXT,
  DEFAULT_MAX_TOKENS_FOR_LLM,
  DEFAULT_SUMMARIES_TO_INJECT,
  DEFAULT_SUMMARIZER_TIMEOUT_MS,
  DEFAULT_SUMMARY_THRESHOLD,
} from '../constants.js';

// ============================================================================
// Primitive Schemas
// ============================================================================

export const MessageRoleSchema = z.enum(['system', 'user', 'assistant']);

// ISO 8601 datetime string
export const IsoDateTimeSchema = z.string().datetime({ offset: true });

// ULID (26 character base32 string)
export const UlidSchema = z.string().regex(/^[0-9A-HJKMNP-TV-Z]{26}$/);

// Personas are embedded in sort keys, so the key separator is not allowed
export const PersonaSchema = z
  .string()
  .min(1)
  .max(50)
  .regex(/^[^#]+$/, 'Persona must not contain "#"');

// ============================================================================
// Entity Schemas
// ============================================================================

export const ContextSummaryItemSchema = z
  .object({
    summaryId: UlidSchema,
    userId: z.string().min(1),
    persona: PersonaSchema,
    summaryText: z.string(),
    messageCount: z.number().int().nonnegative(),
    periodStart: IsoDateTimeSchema,
    periodEnd: IsoDateTimeSchema,
    tokensSaved: z.number().int().nonnegative().default(0),
    createdAt: IsoDateTimeSchema,
  })
  .refine((item) => Date.parse(item.periodEnd) >= Date.parse(item.periodStart), {
    message: 'periodEnd must not precede periodStart',
    path: ['periodEnd'],
  });

// ============================================================================
// Configuration Schemas
// ============================================================================

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const ContextConfigSchema = z.object({
  maxMessagesInContext: z.coerce.number().int().nonnegative().default(DEFAULT_MAX_MESSAGES_IN_CONTEXT),
  summaryThreshold: positiveInt(DEFAULT_SUMMARY_THRESHOLD),
  maxTokens: positiveInt(DEFAULT_MAX_TOKENS_FOR_LLM),
  summariesToInject: z.coerce.number().int().nonnegative().default(DEFAULT_SUMMARIES_TO_INJECT),
  maxInjectedMemories: z.coerce.number().int().nonnegative().default(DEFAULT_MAX_INJECTED_MEMORIES),
  fallbackMessageCount: positiveInt(DEFAULT_FALLBACK_MESSAGE_COUNT),
  model: z.string().min(1).default(DEFAULT_CONTEXT_MODEL),
  summarizerTimeoutMs: positiveInt(DEFAULT_SUMMARIZER_TIMEOUT_MS),
});
