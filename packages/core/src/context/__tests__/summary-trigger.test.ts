/**
 * Summary Trigger Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import type { RawMessageRecord, Summarizer, SummaryResult } from '../../types/index.js';
import { loadContextConfig } from '../config.js';
import { buildTranscript, resolveSummaryPeriod, SummaryTrigger } from '../summary-trigger.js';

import { countWords, createMockLogger, createMockStore, makeSummary } from './helpers.js';

const NOW = new Date('2026-02-01T09:00:00.000Z');

function history(count: number): RawMessageRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    role: i % 2 === 0 ? 'user' : 'assistant',
    content: `message ${i}`,
    timestamp: new Date(Date.UTC(2026, 0, 15, 10, i)).toISOString(),
  }));
}

function createSummarizer(result: SummaryResult = { success: true, summary: 'A short recap.' }) {
  return {
    createSummary: vi.fn().mockResolvedValue(result),
  } satisfies Summarizer;
}

describe('SummaryTrigger', () => {
  let logger: ReturnType<typeof createMockLogger>;
  let store: ReturnType<typeof createMockStore>;
  let summarizer: ReturnType<typeof createSummarizer>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    logger = createMockLogger();
    store = createMockStore();
    store.save.mockImplementation(async (input) => makeSummary({ ...input, tokensSaved: input.tokensSaved ?? 0 }));
    summarizer = createSummarizer();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function createTrigger(overrides: Partial<ConstructorParameters<typeof SummaryTrigger>[0]> = {}) {
    return new SummaryTrigger({ store, summarizer, threshold: 30, logger, ...overrides });
  }

  describe('shouldCreateSummary', () => {
    it('triggers at the threshold, not below it', () => {
      const trigger = createTrigger();

      expect(trigger.shouldCreateSummary(29)).toBe(false);
      expect(trigger.shouldCreateSummary(30)).toBe(true);
      expect(trigger.shouldCreateSummary(31)).toBe(true);
    });
  });

  describe('maybeCreateSummary', () => {
    it('skips below the threshold without calling the summarizer', async () => {
      const outcome = await createTrigger().maybeCreateSummary({
        userId: 'user-1',
        persona: 'aeris',
        history: history(29),
      });

      expect(outcome).toEqual({ status: 'skipped', reason: 'below_threshold' });
      expect(summarizer.createSummary).not.toHaveBeenCalled();
    });

    it('summarises the last threshold messages and stores the result', async () => {
      const records = history(32);

      const outcome = await createTrigger().maybeCreateSummary({
        userId: 'user-1',
        persona: 'aeris',
        history: records,
      });

      expect(outcome.status).toBe('created');
      const [transcript, persona] = summarizer.createSummary.mock.calls[0] ?? [];
      expect(persona).toBe('aeris');
      expect(String(transcript).split('\n')).toHaveLength(30);
      expect(String(transcript).startsWith('user: message 2\nassistant: message 3')).toBe(true);
      expect(store.save).toHaveBeenCalledWith({
        userId: 'user-1',
        persona: 'aeris',
        summaryText: 'A short recap.',
        messageCount: 30,
        periodStart: new Date('2026-01-15T10:02:00.000Z'),
        periodEnd: new Date('2026-01-15T10:31:00.000Z'),
        tokensSaved: 0,
      });
    });

    it('compacts a short history when forced', async () => {
      const outcome = await createTrigger().maybeCreateSummary({
        userId: 'user-1',
        persona: 'aeris',
        history: history(4),
        force: true,
      });

      expect(outcome.status).toBe('created');
      expect(store.save).toHaveBeenCalledWith(expect.objectContaining({ messageCount: 4 }));
    });

    it('skips a forced run with no history', async () => {
      const outcome = await createTrigger().maybeCreateSummary({
        userId: 'user-1',
        persona: 'aeris',
        history: [],
        force: true,
      });

      expect(outcome).toEqual({ status: 'skipped', reason: 'empty_history' });
    });

    it('persists nothing when the summarizer fails', async () => {
      summarizer.createSummary.mockResolvedValueOnce({
        success: false,
        error: { code: 'llm_error', message: 'Overloaded', retryable: true },
      });

      const outcome = await createTrigger().maybeCreateSummary({
        userId: 'user-1',
        persona: 'aeris',
        history: history(30),
      });

      expect(outcome).toEqual({
        status: 'failed',
        reason: 'summarizer_failed',
        error: { code: 'llm_error', message: 'Overloaded', retryable: true },
      });
      expect(store.save).not.toHaveBeenCalled();
    });

    it('treats a blank summary as a failure', async () => {
      summarizer.createSummary.mockResolvedValueOnce({ success: true, summary: '   ' });

      const outcome = await createTrigger().maybeCreateSummary({
        userId: 'user-1',
        persona: 'aeris',
        history: history(30),
      });

      expect(outcome.status).toBe('failed');
      expect(outcome.status === 'failed' && outcome.reason).toBe('summarizer_failed');
      expect(store.save).not.toHaveBeenCalled();
    });

    it('treats a thrown summarizer error as a failure', async () => {
      summarizer.createSummary.mockRejectedValueOnce(new Error('socket hang up'));

      const outcome = await createTrigger().maybeCreateSummary({
        userId: 'user-1',
        persona: 'aeris',
        history: history(30),
      });

      expect(outcome).toEqual({
        status: 'failed',
        reason: 'summarizer_failed',
        error: { code: 'unexpected_error', message: 'socket hang up', retryable: false },
      });
    });

    it('gives up when the summarizer exceeds the timeout', async () => {
      summarizer.createSummary.mockReturnValueOnce(new Promise<SummaryResult>(() => undefined));

      const pending = createTrigger({ timeoutMs: 5_000 }).maybeCreateSummary({
        userId: 'user-1',
        persona: 'aeris',
        history: history(30),
      });
      await vi.advanceTimersByTimeAsync(5_000);
      const outcome = await pending;

      expect(outcome).toEqual({
        status: 'failed',
        reason: 'summarizer_failed',
        error: { code: 'timeout', message: 'Summarizer did not respond within 5000ms', retryable: true },
      });
      expect(store.save).not.toHaveBeenCalled();
    });

    it('applies the configured summarizer timeout', async () => {
      const config = loadContextConfig({ SUMMARIZER_TIMEOUT_MS: '50' });
      summarizer.createSummary.mockReturnValueOnce(new Promise<SummaryResult>(() => undefined));

      const pending = createTrigger({ timeoutMs: config.summarizerTimeoutMs }).maybeCreateSummary({
        userId: 'user-1',
        persona: 'aeris',
        history: history(30),
      });
      await vi.advanceTimersByTimeAsync(50);
      const outcome = await pending;

      expect(outcome).toEqual({
        status: 'failed',
        reason: 'summarizer_failed',
        error: { code: 'timeout', message: 'Summarizer did not respond within 50ms', retryable: true },
      });
    });

    it('bounds the summarizer call by the default timeout when none is given', async () => {
      summarizer.createSummary.mockReturnValueOnce(new Promise<SummaryResult>(() => undefined));
      const trigger = new SummaryTrigger({ store, summarizer, logger });

      const pending = trigger.maybeCreateSummary({
        userId: 'user-1',
        persona: 'aeris',
        history: history(30),
      });
      await vi.advanceTimersByTimeAsync(30_000);
      const outcome = await pending;

      expect(outcome).toEqual({
        status: 'failed',
        reason: 'summarizer_failed',
        error: { code: 'timeout', message: 'Summarizer did not respond within 30000ms', retryable: true },
      });
    });

    it('uses the default threshold when none is given', () => {
      const trigger = new SummaryTrigger({ store, summarizer, logger });

      expect(trigger.shouldCreateSummary(29)).toBe(false);
      expect(trigger.shouldCreateSummary(30)).toBe(true);
    });

    it('reports a store failure without throwing', async () => {
      store.save.mockRejectedValueOnce(new Error('Throttled'));

      const outcome = await createTrigger().maybeCreateSummary({
        userId: 'user-1',
        persona: 'aeris',
        history: history(30),
      });

      expect(outcome.status).toBe('failed');
      expect(outcome.status === 'failed' && outcome.reason).toBe('persist_failed');
      expect(logger.error).toHaveBeenCalledWith(
        'Failed to store conversation summary',
        expect.any(Error),
        { userId: 'user-1', persona: 'aeris' }
      );
    });

    it('records tokens saved when a counter is configured', async () => {
      const outcome = await createTrigger({ countTokens: countWords, model: 'test-model' }).maybeCreateSummary({
        userId: 'user-1',
        persona: 'aeris',
        history: history(30),
      });

      // 30 lines of "role: message N" are 3 words each; the summary is 3 words
      expect(store.save).toHaveBeenCalledWith(expect.objectContaining({ tokensSaved: 87 }));
      expect(outcome.status).toBe('created');
    });
  });
});

describe('buildTranscript', () => {
  it('writes one role-prefixed line per record', () => {
    expect(
      buildTranscript([
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' },
        { content: null },
      ])
    ).toBe('user: hi\nassistant: hello\nunknown: ');
  });
});

describe('resolveSummaryPeriod', () => {
  const now = new Date('2026-02-01T09:00:00.000Z');

  it('uses the first and last timestamps', () => {
    expect(
      resolveSummaryPeriod(
        [
          { timestamp: '2026-01-15T10:00:00Z' },
          { created_at: '2026-01-15 10:20:00' },
        ],
        now
      )
    ).toEqual({
      periodStart: new Date('2026-01-15T10:00:00.000Z'),
      periodEnd: new Date('2026-01-15T10:20:00.000Z'),
    });
  });

  it('falls back to the last ten minutes when timestamps are unusable', () => {
    expect(resolveSummaryPeriod([{ timestamp: 'never' }, {}], now)).toEqual({
      periodStart: new Date('2026-02-01T08:50:00.000Z'),
      periodEnd: now,
    });
  });

  it('clamps the start to the end', () => {
    const period = resolveSummaryPeriod(
      [{ timestamp: 'never' }, { timestamp: '2026-01-15T10:00:00Z' }],
      now
    );

    expect(period.periodStart).toEqual(period.periodEnd);
    expect(period.periodEnd).toEqual(new Date('2026-01-15T10:00:00.000Z'));
  });
});
