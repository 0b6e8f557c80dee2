/**
 * Shared fixtures for context tests
 */

import { vi } from 'vitest';

import type { Logger } from '../../logger.js';
import type { Message, PersistedSummary, SummaryStore } from '../../types/index.js';

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

export function createMockStore(summaries: PersistedSummary[] = []) {
  return {
    getLatest: vi.fn().mockResolvedValue(summaries),
    save: vi.fn(),
    deleteOlderThan: vi.fn().mockResolvedValue(0),
  } satisfies SummaryStore;
}

export function makeSummary(overrides: Partial<PersistedSummary> = {}): PersistedSummary {
  return {
    summaryId: '01HQ8Z5X2Y3W4V5T6S7R8Q9P0N',
    userId: 'user-1',
    persona: 'aeris',
    summaryText: 'They planned a hiking trip.',
    messageCount: 30,
    periodStart: new Date('2026-01-15T10:00:00.000Z'),
    periodEnd: new Date('2026-01-15T10:30:00.000Z'),
    tokensSaved: 0,
    createdAt: new Date('2026-01-15T10:31:00.000Z'),
    ...overrides,
  };
}

export function makeMessage(
  role: Message['role'],
  content: string,
  overrides: Partial<Message> = {}
): Message {
  return {
    role,
    content,
    timestamp: new Date('2026-01-15T12:00:00.000Z'),
    persona: 'aeris',
    metadata: {},
    ...overrides,
  };
}

/** Token counter charging one token per whitespace-separated word */
export function countWords(content: string): number {
  const trimmed = content.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}
