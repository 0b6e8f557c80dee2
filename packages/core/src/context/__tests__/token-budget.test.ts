/**
 * Token Budget Optimizer Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import { CONTEXT_TOO_LARGE_MESSAGE } from '../../constants.js';
import type { WireMessage } from '../../types/index.js';
import { optimizeForTokenBudget, selectNewestWithinBudget } from '../token-budget.js';

import { countWords, createMockLogger } from './helpers.js';

function words(count: number, word = 'w'): string {
  return Array.from({ length: count }, () => word).join(' ');
}

describe('selectNewestWithinBudget', () => {
  it('keeps the two newest of five equal messages within 12 tokens', () => {
    const dialogue = [1, 2, 3, 4, 5].map((n) => ({
      message: { role: 'user' as const, content: `m${n}` },
      tokens: 5,
    }));

    const selected = selectNewestWithinBudget(dialogue, 12);

    expect(selected.map((entry) => entry.message.content)).toEqual(['m4', 'm5']);
  });

  it('skips a message that does not fit and keeps walking back', () => {
    const dialogue = [
      { message: { role: 'user' as const, content: 'old' }, tokens: 2 },
      { message: { role: 'assistant' as const, content: 'huge' }, tokens: 50 },
      { message: { role: 'user' as const, content: 'new' }, tokens: 3 },
    ];

    const selected = selectNewestWithinBudget(dialogue, 6);

    expect(selected.map((entry) => entry.message.content)).toEqual(['old', 'new']);
  });
});

describe('optimizeForTokenBudget', () => {
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    logger = createMockLogger();
  });

  it('returns the input when it already fits', async () => {
    const messages: WireMessage[] = [
      { role: 'system', content: words(3) },
      { role: 'user', content: words(4) },
    ];

    const result = await optimizeForTokenBudget(messages, {
      countTokens: countWords,
      model: 'test-model',
      maxTokens: 7,
      logger,
    });

    expect(result).toBe(messages);
  });

  it('pays for system messages first and fills the rest newest first', async () => {
    const messages: WireMessage[] = [
      { role: 'system', content: words(4, 's') },
      { role: 'user', content: words(5, 'a') },
      { role: 'assistant', content: words(5, 'b') },
      { role: 'user', content: words(5, 'c') },
    ];

    const result = await optimizeForTokenBudget(messages, {
      countTokens: countWords,
      model: 'test-model',
      maxTokens: 14,
      logger,
    });

    expect(result).toEqual([messages[0], messages[2], messages[3]]);
  });

  it('never shortens message content', async () => {
    const messages: WireMessage[] = [
      { role: 'user', content: words(10) },
      { role: 'user', content: words(3) },
    ];

    const result = await optimizeForTokenBudget(messages, {
      countTokens: countWords,
      model: 'test-model',
      maxTokens: 9,
      logger,
    });

    expect(result).toEqual([{ role: 'user', content: words(3) }]);
  });

  it('keeps only the last system message when system messages overflow', async () => {
    const messages: WireMessage[] = [
      { role: 'system', content: words(6, 'old') },
      { role: 'system', content: words(4, 'new') },
      { role: 'user', content: words(2) },
    ];

    const result = await optimizeForTokenBudget(messages, {
      countTokens: countWords,
      model: 'test-model',
      maxTokens: 8,
      logger,
    });

    expect(result).toEqual([messages[1], messages[2]]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('returns a single notice when one system message cannot fit', async () => {
    const result = await optimizeForTokenBudget(
      [
        { role: 'system', content: words(20) },
        { role: 'user', content: 'hi' },
      ],
      { countTokens: countWords, model: 'test-model', maxTokens: 10, logger }
    );

    expect(result).toEqual([{ role: 'user', content: CONTEXT_TOO_LARGE_MESSAGE }]);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('accepts an async token counter and passes the model through', async () => {
    const countTokens = vi.fn(async (content: string) => countWords(content));

    const result = await optimizeForTokenBudget(
      [
        { role: 'user', content: words(3) },
        { role: 'assistant', content: words(3) },
      ],
      { countTokens, model: 'claude-3-5-haiku-20241022', maxTokens: 4, logger }
    );

    expect(result).toEqual([{ role: 'assistant', content: words(3) }]);
    expect(countTokens).toHaveBeenCalledWith(words(3), 'claude-3-5-haiku-20241022');
  });

  it('stays within budget whenever the system messages fit', async () => {
    const messages: WireMessage[] = [
      { role: 'system', content: words(3) },
      ...[7, 1, 4, 2, 6, 3].map((n): WireMessage => ({ role: 'user', content: words(n) })),
    ];

    for (const maxTokens of [3, 5, 9, 12, 20]) {
      const result = await optimizeForTokenBudget(messages, {
        countTokens: countWords,
        model: 'test-model',
        maxTokens,
        logger,
      });
      const total = result.reduce((sum, message) => sum + countWords(message.content), 0);

      expect(total).toBeLessThanOrEqual(maxTokens);
      expect(result[0]).toBe(messages[0]);
    }
  });
});
