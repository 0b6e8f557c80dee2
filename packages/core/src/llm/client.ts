/**
 * Claude API client
 *
 * Single-turn text completions over the Anthropic SDK. Rate limits, 5xx
 * responses and dropped connections are retried with backoff; every other
 * failure is returned at once.
 */

import Anthropic from '@anthropic-ai/sdk';

import type { LlmConfig, LlmResponse, ModelId, ModelPrice, RetryConfig } from './types.js';

export const MODEL_ALIASES = {
  haiku: 'claude-3-5-haiku-20241022',
  sonnet: 'claude-sonnet-4-5-20250514',
} as const satisfies Record<string, ModelId>;

/** USD per million tokens */
export const MODEL_PRICES: Record<ModelId, ModelPrice> = {
  [MODEL_ALIASES.haiku]: { input: 0.8, output: 4 },
  [MODEL_ALIASES.sonnet]: { input: 3, output: 15 },
};

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  retryableStatusCodes: [429, 500, 502, 503, 504],
};

const DEFAULT_MAX_TOKENS = 4096;

export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
}

interface Failure {
  message: string;
  retryable: boolean;
}

/**
 * Cost of a request in USD
 */
export function estimateCostUsd(model: ModelId, inputTokens: number, outputTokens: number): number {
  const price = MODEL_PRICES[model];
  return (inputTokens * price.input + outputTokens * price.output) / 1_000_000;
}

/**
 * Map an SDK error to a message and whether another attempt could succeed
 */
export function describeFailure(error: unknown, retryableStatusCodes: readonly number[]): Failure {
  if (error instanceof Anthropic.RateLimitError) {
    return { message: 'Rate limited by Claude API after all retries exhausted.', retryable: true };
  }
  if (error instanceof Anthropic.AuthenticationError) {
    return { message: 'Claude API authentication failed. Check API key.', retryable: false };
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return { message: `Claude API connection error: ${error.message}`, retryable: true };
  }
  if (error instanceof Anthropic.APIError) {
    return {
      message: `Claude API error: ${error.message} (status: ${error.status})`,
      retryable: error.status !== undefined && retryableStatusCodes.includes(error.status),
    };
  }
  return { message: error instanceof Error ? error.message : 'Unknown error', retryable: false };
}

/**
 * Delay before the next attempt. A Retry-After header on a rate limit wins
 * over exponential backoff; both are capped at `maxDelayMs`.
 */
export function retryDelayMs(error: unknown, attempt: number, config: RetryConfig): number {
  if (error instanceof Anthropic.RateLimitError) {
    const seconds = Number.parseInt(error.headers?.['retry-after'] ?? '', 10);
    if (seconds > 0) {
      return Math.min(seconds * 1000, config.maxDelayMs);
    }
  }

  const jitter = Math.random() * config.baseDelayMs * 0.5;
  return Math.min(config.baseDelayMs * 2 ** attempt + jitter, config.maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class ClaudeClient {
  private readonly client: Anthropic;
  private readonly retryConfig: RetryConfig;

  constructor(
    private readonly config: LlmConfig,
    retryConfig?: Partial<RetryConfig>
  ) {
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...retryConfig };
    this.client = new Anthropic({ apiKey: config.apiKey });
  }

  getModel(): ModelId {
    return this.config.model;
  }

  /**
   * Single-turn text completion
   *
   * Never throws: failures come back as `success: false` with the last error.
   */
  async complete(
    systemPrompt: string,
    userMessage: string,
    options: CompletionOptions = {}
  ): Promise<LlmResponse<string>> {
    const startedAt = Date.now();
    const { model } = this.config;

    for (let attempt = 0; ; attempt++) {
      try {
        const response = await this.client.messages.create({
          model,
          max_tokens: options.maxTokens ?? this.config.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: options.temperature ?? this.config.temperature ?? 0,
          system: systemPrompt,
          messages: [{ role: 'user', content: userMessage }],
        });

        const { input_tokens: inputTokens, output_tokens: outputTokens } = response.usage;

        const text = response.content
          .flatMap((block) => (block.type === 'text' ? [block.text] : []))
          .join('\n');

        return {
          success: true,
          data: text,
          usage: { inputTokens, outputTokens, costUsd: estimateCostUsd(model, inputTokens, outputTokens) },
          durationMs: Date.now() - startedAt,
          stopReason: response.stop_reason,
          retriesUsed: attempt,
        };
      } catch (error) {
        const failure = describeFailure(error, this.retryConfig.retryableStatusCodes);

        if (failure.retryable && attempt < this.retryConfig.maxRetries) {
          await sleep(retryDelayMs(error, attempt, this.retryConfig));
          continue;
        }

        return {
          success: false,
          error: failure.message,
          usage: { inputTokens: 0, outputTokens: 0, costUsd: 0 },
          durationMs: Date.now() - startedAt,
          retryable: failure.retryable,
          retriesUsed: attempt,
        };
      }
    }
  }
}

/**
 * Haiku client for conversation summaries
 */
export function createSummaryClient(apiKey: string): ClaudeClient {
  return new ClaudeClient({
    apiKey,
    model: MODEL_ALIASES.haiku,
    maxTokens: 200,
    temperature: 0.3,
  });
}
