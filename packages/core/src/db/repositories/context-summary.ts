/**
 * Context Summary Repository
 *
 * Persists compacted conversation summaries per user and persona.
 * PK: USER#{userId}  SK: SUMMARY#{persona}#{periodEnd}#{summaryId}
 *
 * Sort keys embed the ISO period end, so a descending query returns the
 * newest period first.
 */

import { ulid } from 'ulid';

import { KEY_PREFIX } from '../../constants.js';
import { ContextSummaryItemSchema, PersonaSchema } from '../../schemas/index.js';
import type {
  PersistedSummary,
  SaveSummaryInput,
  SummaryStore,
} from '../../types/index.js';
import { DynamoDBClient } from '../client.js';
import type { DynamoDBItem } from '../types.js';

/** Page size used while scanning a user's summaries for deletion */
const DELETE_SCAN_PAGE_SIZE = 100;

function summaryPk(userId: string): string {
  return `${KEY_PREFIX.USER}${userId}`;
}

function summarySkPrefix(persona?: string): string {
  return persona ? `${KEY_PREFIX.SUMMARY}${persona}#` : KEY_PREFIX.SUMMARY;
}

function toPersistedSummary(item: unknown): PersistedSummary {
  const parsed = ContextSummaryItemSchema.parse(item);
  return {
    summaryId: parsed.summaryId,
    userId: parsed.userId,
    persona: parsed.persona,
    summaryText: parsed.summaryText,
    messageCount: parsed.messageCount,
    periodStart: new Date(parsed.periodStart),
    periodEnd: new Date(parsed.periodEnd),
    tokensSaved: parsed.tokensSaved,
    createdAt: new Date(parsed.createdAt),
  };
}

/**
 * DynamoDB-backed summary store
 */
export class ContextSummaryRepository implements SummaryStore {
  constructor(private db: DynamoDBClient) {}

  /**
   * Get the most recent summaries for a user and persona
   */
  async getLatest(userId: string, persona: string, limit: number): Promise<PersistedSummary[]> {
    if (limit <= 0) {
      return [];
    }

    const result = await this.db.query<DynamoDBItem>(
      summaryPk(userId),
      summarySkPrefix(PersonaSchema.parse(persona)),
      { limit, ascending: false }
    );

    return result.items.map(toPersistedSummary);
  }

  /**
   * Persist a new summary
   */
  async save(input: SaveSummaryInput): Promise<PersistedSummary> {
    const persona = PersonaSchema.parse(input.persona);
    const summary: PersistedSummary = {
      summaryId: ulid(),
      userId: input.userId,
      persona,
      summaryText: input.summaryText,
      messageCount: input.messageCount,
      periodStart: input.periodStart,
      periodEnd: input.periodEnd,
      tokensSaved: input.tokensSaved ?? 0,
      createdAt: new Date(),
    };

    const periodEnd = summary.periodEnd.toISOString();

    await this.db.put({
      PK: summaryPk(summary.userId),
      SK: `${summarySkPrefix(persona)}${periodEnd}#${summary.summaryId}`,
      summaryId: summary.summaryId,
      userId: summary.userId,
      persona,
      summaryText: summary.summaryText,
      messageCount: summary.messageCount,
      periodStart: summary.periodStart.toISOString(),
      periodEnd,
      tokensSaved: summary.tokensSaved,
      createdAt: summary.createdAt.toISOString(),
    });

    return summary;
  }

  /**
   * Delete summaries created before the cutoff, across all personas unless one is given
   *
   * @returns Number of summaries deleted
   */
  async deleteOlderThan(userId: string, cutoff: Date, persona?: string): Promise<number> {
    const pk = summaryPk(userId);
    const skPrefix = summarySkPrefix(persona === undefined ? undefined : PersonaSchema.parse(persona));
    const expired: Array<{ type: 'delete'; pk: string; sk: string }> = [];
    let exclusiveStartKey: Record<string, unknown> | undefined;

    do {
      const page = await this.db.query<Pick<DynamoDBItem, 'PK' | 'SK'>>(pk, skPrefix, {
        limit: DELETE_SCAN_PAGE_SIZE,
        ascending: true,
        exclusiveStartKey,
        projectionExpression: 'PK, SK',
        filterExpression: '#createdAt < :cutoff',
        expressionAttributeNames: { '#createdAt': 'createdAt' },
        additionalExpressionAttributeValues: { ':cutoff': cutoff.toISOString() },
      });

      for (const item of page.items) {
        expired.push({ type: 'delete', pk: item.PK, sk: item.SK });
      }
      exclusiveStartKey = page.lastKey;
    } while (exclusiveStartKey);

    await this.db.batchWriteAll(expired);
    return expired.length;
  }
}
