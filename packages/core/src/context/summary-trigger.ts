/**
 * Summary trigger
 *
 * Side pipeline run after a turn is persisted. Once history reaches the
 * threshold, the last `threshold` raw messages are summarised and the summary
 * is stored. Compaction is best-effort: failures are logged and reported in
 * the outcome, never thrown, and the next threshold crossing tries again.
 *
 * Concurrent runs for the same user may both persist a summary.
 */

import { SUMMARY_PERIOD_FALLBACK_MINUTES } from '../constants.js';
import type { Logger } from '../logger.js';
import { toError } from '../logger.js';
import type {
  PersistedSummary,
  RawMessageRecord,
  Summarizer,
  SummarizerError,
  SummaryResult,
  SummaryStore,
  TokenCounter,
} from '../types/index.js';

import { resolveContextConfig } from './config.js';
import { pickTimestampField, resolveTimestamp } from './timestamps.js';

export interface SummaryTriggerOptions {
  store: SummaryStore;
  summarizer: Summarizer;
  /** History length that triggers compaction; also the compaction window size */
  threshold?: number;
  logger: Logger;
  /** Upper bound on the summarizer call; a timeout counts as a failure */
  timeoutMs?: number;
  /** Enables the tokensSaved figure on stored summaries */
  countTokens?: TokenCounter;
  model?: string;
}

export interface CompactionRequest {
  userId: string;
  persona: string;
  /** Full raw history in chronological order */
  history: RawMessageRecord[];
  /** Compact even below the threshold */
  force?: boolean;
}

export type CompactionOutcome =
  | { status: 'created'; summary: PersistedSummary }
  | { status: 'skipped'; reason: 'below_threshold' | 'empty_history' }
  | { status: 'failed'; reason: 'summarizer_failed'; error: SummarizerError }
  | { status: 'failed'; reason: 'persist_failed'; error: Error };

function transcriptLine(record: RawMessageRecord): string {
  const role = typeof record.role === 'string' && record.role ? record.role : 'unknown';
  const content =
    record.content === undefined || record.content === null ? '' : String(record.content);
  return `${role}: ${content}`;
}

/**
 * Plain `role: content` transcript in chronological order
 */
export function buildTranscript(records: RawMessageRecord[]): string {
  return records.map(transcriptLine).join('\n');
}

/**
 * Period covered by a compaction window, in UTC
 *
 * Unusable first/last timestamps fall back to now − 10 minutes and now.
 */
export function resolveSummaryPeriod(
  window: RawMessageRecord[],
  now: Date = new Date()
): { periodStart: Date; periodEnd: Date } {
  const first = window[0];
  const last = window[window.length - 1];

  const start = first ? resolveTimestamp(pickTimestampField(first)) : null;
  const end = last ? resolveTimestamp(pickTimestampField(last)) : null;

  const periodEnd = end?.ok ? end.date : now;
  let periodStart = start?.ok
    ? start.date
    : new Date(now.getTime() - SUMMARY_PERIOD_FALLBACK_MINUTES * 60_000);

  if (periodStart.getTime() > periodEnd.getTime()) {
    periodStart = periodEnd;
  }

  return { periodStart, periodEnd };
}

export class SummaryTrigger {
  private readonly threshold: number;
  private readonly timeoutMs: number;

  /**
   * `threshold` and `timeoutMs` default to the configured context values
   */
  constructor(private options: SummaryTriggerOptions) {
    const defaults = resolveContextConfig();
    this.threshold = options.threshold ?? defaults.summaryThreshold;
    this.timeoutMs = options.timeoutMs ?? defaults.summarizerTimeoutMs;
  }

  /**
   * Whether a history of this length must be compacted
   */
  shouldCreateSummary(totalMessages: number): boolean {
    return totalMessages >= this.threshold;
  }

  /**
   * Compact the tail of the history when the threshold is reached (or forced)
   */
  async maybeCreateSummary(request: CompactionRequest): Promise<CompactionOutcome> {
    const { userId, persona, history } = request;
    const { logger } = this.options;

    if (!request.force && !this.shouldCreateSummary(history.length)) {
      return { status: 'skipped', reason: 'below_threshold' };
    }

    const window = history.slice(-this.threshold);
    if (window.length === 0) {
      return { status: 'skipped', reason: 'empty_history' };
    }

    const transcript = buildTranscript(window);
    logger.info('Creating conversation summary', { userId, persona, messages: window.length });

    const result = await this.summarize(transcript, persona);
    if (!result.success) {
      logger.warn('Summary not created, summarizer failed', {
        userId,
        persona,
        code: result.error.code,
        error: result.error.message,
      });
      return { status: 'failed', reason: 'summarizer_failed', error: result.error };
    }

    const { periodStart, periodEnd } = resolveSummaryPeriod(window);
    const tokensSaved = await this.estimateTokensSaved(transcript, result.summary);

    try {
      const summary = await this.options.store.save({
        userId,
        persona,
        summaryText: result.summary,
        messageCount: window.length,
        periodStart,
        periodEnd,
        tokensSaved,
      });

      logger.info('Conversation summary stored', {
        userId,
        persona,
        summaryId: summary.summaryId,
        messageCount: summary.messageCount,
        tokensSaved,
      });
      return { status: 'created', summary };
    } catch (error) {
      const cause = toError(error);
      logger.error('Failed to store conversation summary', cause, { userId, persona });
      return { status: 'failed', reason: 'persist_failed', error: cause };
    }
  }

  private async summarize(transcript: string, persona: string): Promise<SummaryResult> {
    const call = Promise.resolve()
      .then(() => this.options.summarizer.createSummary(transcript, persona))
      .then(
        (result): SummaryResult =>
          result.success && !result.summary.trim()
            ? {
                success: false,
                error: { code: 'empty_summary', message: 'Summarizer returned no text', retryable: true },
              }
            : result.success
              ? { success: true, summary: result.summary.trim() }
              : result,
        (error: unknown): SummaryResult => ({
          success: false,
          error: { code: 'unexpected_error', message: toError(error).message, retryable: false },
        })
      );

    const timeoutMs = this.timeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<SummaryResult>((resolve) => {
      timer = setTimeout(
        () =>
          resolve({
            success: false,
            error: {
              code: 'timeout',
              message: `Summarizer did not respond within ${timeoutMs}ms`,
              retryable: true,
            },
          }),
        timeoutMs
      );
    });

    try {
      return await Promise.race([call, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async estimateTokensSaved(transcript: string, summary: string): Promise<number> {
    const { countTokens, model, logger } = this.options;
    if (!countTokens) {
      return 0;
    }

    try {
      const modelName = model ?? '';
      const before = await countTokens(transcript, modelName);
      const after = await countTokens(summary, modelName);
      return Math.max(0, before - after);
    } catch (error) {
      logger.warn('Could not estimate tokens saved by summary', {
        error: toError(error).message,
      });
      return 0;
    }
  }
}
