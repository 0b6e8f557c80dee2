/**
 * Context assembler configuration
 */

import { ContextConfigSchema } from '../schemas/index.js';
import type { ContextConfig } from '../types/index.js';

const ENV_KEYS: Record<keyof ContextConfig, string> = {
  maxMessagesInContext: 'CONTEXT_MAX_MESSAGES',
  summaryThreshold: 'CONTEXT_SUMMARY_THRESHOLD',
  maxTokens: 'CONTEXT_MAX_TOKENS',
  summariesToInject: 'CONTEXT_SUMMARIES_TO_INJECT',
  maxInjectedMemories: 'CONTEXT_MAX_MEMORIES',
  fallbackMessageCount: 'CONTEXT_FALLBACK_MESSAGES',
  model: 'CONTEXT_MODEL',
  summarizerTimeoutMs: 'SUMMARIZER_TIMEOUT_MS',
};

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Validate a partial configuration and fill in defaults
 *
 * @throws ZodError when a value is out of range
 */
export function resolveContextConfig(config: Partial<ContextConfig> = {}): ContextConfig {
  return ContextConfigSchema.parse(config);
}

/**
 * Read configuration from environment variables; `overrides` win over env
 *
 * @throws ZodError when a variable is set to an invalid value
 */
export function loadContextConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ContextConfig> = {}
): ContextConfig {
  return ContextConfigSchema.parse({
    maxMessagesInContext: envValue(env, ENV_KEYS.maxMessagesInContext),
    summaryThreshold: envValue(env, ENV_KEYS.summaryThreshold),
    maxTokens: envValue(env, ENV_KEYS.maxTokens),
    summariesToInject: envValue(env, ENV_KEYS.summariesToInject),
    maxInjectedMemories: envValue(env, ENV_KEYS.maxInjectedMemories),
    fallbackMessageCount: envValue(env, ENV_KEYS.fallbackMessageCount),
    model: envValue(env, ENV_KEYS.model),
    summarizerTimeoutMs: envValue(env, ENV_KEYS.summarizerTimeoutMs),
    ...overrides,
  });
}
