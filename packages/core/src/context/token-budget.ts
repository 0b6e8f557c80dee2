/**
 * Token budget enforcement
 *
 * Two-tier split: system messages are paid for first, dialogue fills what is
 * left, newest turn first. Messages are kept whole or dropped whole; content is
 * never shortened. An unmeetable budget yields one synthetic message instead of
 * an error.
 */

import { CONTEXT_TOO_LARGE_MESSAGE } from '../constants.js';
import type { Logger } from '../logger.js';
import type { TokenCounter, WireMessage } from '../types/index.js';

export interface TokenBudgetOptions {
  countTokens: TokenCounter;
  model: string;
  maxTokens: number;
  logger: Logger;
}

export interface CostedMessage {
  message: WireMessage;
  tokens: number;
}

function sumTokens(entries: CostedMessage[]): number {
  return entries.reduce((total, entry) => total + entry.tokens, 0);
}

/**
 * Select the newest dialogue messages that fit within `remaining`, in
 * chronological order. A message that does not fit is skipped and older ones
 * are still considered.
 */
export function selectNewestWithinBudget(
  dialogue: CostedMessage[],
  remaining: number
): CostedMessage[] {
  const selected: CostedMessage[] = [];
  let running = 0;

  for (let i = dialogue.length - 1; i >= 0; i--) {
    const entry = dialogue[i];
    if (entry && running + entry.tokens <= remaining) {
      selected.push(entry);
      running += entry.tokens;
    }
  }

  return selected.reverse();
}

/**
 * Fit a wire-format context into the token budget
 */
export async function optimizeForTokenBudget(
  messages: WireMessage[],
  options: TokenBudgetOptions
): Promise<WireMessage[]> {
  const { countTokens, model, maxTokens, logger } = options;

  const costed: CostedMessage[] = [];
  for (const message of messages) {
    costed.push({ message, tokens: await countTokens(message.content, model) });
  }

  const totalTokens = sumTokens(costed);
  if (totalTokens <= maxTokens) {
    return messages;
  }

  logger.info('Context exceeds token budget, optimising', { totalTokens, maxTokens });

  let system = costed.filter((entry) => entry.message.role === 'system');
  const dialogue = costed.filter((entry) => entry.message.role !== 'system');
  let systemTokens = sumTokens(system);

  if (systemTokens > maxTokens) {
    logger.warn('System messages exceed token budget, keeping only the most recent one', {
      systemTokens,
      systemMessages: system.length,
      maxTokens,
    });
    system = system.slice(-1);
    systemTokens = sumTokens(system);

    if (systemTokens > maxTokens) {
      logger.error('Context cannot fit token budget: system message alone is too large', undefined, {
        systemTokens,
        maxTokens,
      });
      return [{ role: 'user', content: CONTEXT_TOO_LARGE_MESSAGE }];
    }
  }

  const selected = selectNewestWithinBudget(dialogue, maxTokens - systemTokens);
  const optimized = [...system, ...selected].map((entry) => entry.message);

  logger.info('Context optimised', {
    messages: optimized.length,
    droppedDialogue: dialogue.length - selected.length,
    tokens: systemTokens + sumTokens(selected),
    maxTokens,
  });

  return optimized;
}
