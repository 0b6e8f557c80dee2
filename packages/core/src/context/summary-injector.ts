/**
 * Summary injection
 *
 * Prepends the most recent persisted summaries for the user and persona as
 * synthetic system messages. Summaries enhance the context but are never
 * required: any store failure leaves the dialogue untouched.
 */

import { SYNTHETIC_MESSAGE_TYPE } from '../constants.js';
import type { Logger } from '../logger.js';
import { toError } from '../logger.js';
import type { Message, PersistedSummary, SummaryStore } from '../types/index.js';

import { formatMinuteUtc } from './timestamps.js';

export interface SummaryInjectionOptions {
  store: SummaryStore;
  userId: string;
  persona: string;
  /** How many summaries to inject */
  limit: number;
  logger: Logger;
}

export function formatSummaryContent(summary: PersistedSummary): string {
  return `[Summary of the earlier conversation from ${formatMinuteUtc(summary.periodStart)}]\n${summary.summaryText}`;
}

export function summaryToMessage(summary: PersistedSummary, persona: string): Message {
  return {
    role: 'system',
    content: formatSummaryContent(summary),
    timestamp: summary.periodEnd,
    persona,
    metadata: {
      type: SYNTHETIC_MESSAGE_TYPE.CONTEXT_SUMMARY,
      summaryId: summary.summaryId,
      messageCount: summary.messageCount,
    },
  };
}

/**
 * Prepend persisted summaries, newest period first
 */
export async function injectSummaries(
  messages: Message[],
  options: SummaryInjectionOptions
): Promise<Message[]> {
  if (options.limit <= 0) {
    return messages;
  }

  try {
    const summaries = await options.store.getLatest(options.userId, options.persona, options.limit);
    if (summaries.length === 0) {
      return messages;
    }

    return [
      ...summaries.map((summary) => summaryToMessage(summary, options.persona)),
      ...messages,
    ];
  } catch (error) {
    options.logger.warn('Summary injection failed, continuing without summaries', {
      userId: options.userId,
      persona: options.persona,
      error: toError(error).message,
    });
    return messages;
  }
}
