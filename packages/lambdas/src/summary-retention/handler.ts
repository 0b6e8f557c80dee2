/**
 * Summary retention Lambda
 *
 * Deletes persisted conversation summaries older than the retention period
 * for the users named in the event. A failing user is logged and reported;
 * the rest of the batch still runs.
 */

import { PersonaSchema, toError } from '@persona-chat/core';
import { ContextSummaryRepository, DynamoDBClient } from '@persona-chat/core/db';
import type { Context } from 'aws-lambda';
import { z } from 'zod';

import { getEnv, logger } from '../shared/context.js';
import type { SummaryRetentionInput, SummaryRetentionOutput } from '../shared/types.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const SummaryRetentionInputSchema = z.object({
  userIds: z.array(z.string().min(1)),
  persona: PersonaSchema.optional(),
  olderThanDays: z.number().int().nonnegative().optional(),
});

const RetentionDaysSchema = z.coerce.number().int().nonnegative();

export async function handler(
  event: SummaryRetentionInput,
  context: Context
): Promise<SummaryRetentionOutput> {
  logger.setContext(context);

  const input = SummaryRetentionInputSchema.parse(event);
  const env = getEnv();
  const olderThanDays = input.olderThanDays ?? RetentionDaysSchema.parse(env.SUMMARY_RETENTION_DAYS);
  const cutoff = new Date(Date.now() - olderThanDays * MS_PER_DAY);

  logger.info('Summary retention started', {
    users: input.userIds.length,
    persona: input.persona ?? 'all',
    olderThanDays,
    cutoff: cutoff.toISOString(),
  });

  const db = new DynamoDBClient(undefined, env.TABLE_NAME);
  const summaryRepo = new ContextSummaryRepository(db);

  const output: SummaryRetentionOutput = {
    cutoff: cutoff.toISOString(),
    deleted: 0,
    usersProcessed: 0,
    failures: [],
  };

  for (const userId of input.userIds) {
    try {
      const deleted = await summaryRepo.deleteOlderThan(userId, cutoff, input.persona);
      output.deleted += deleted;
      output.usersProcessed += 1;

      if (deleted > 0) {
        logger.info('Old summaries deleted', { userId, deleted });
      }
    } catch (error) {
      const cause = toError(error);
      logger.error('Summary retention failed for user', cause, { userId });
      output.failures.push({ userId, error: cause.message });
    }
  }

  logger.info('Summary retention completed', {
    deleted: output.deleted,
    usersProcessed: output.usersProcessed,
    failures: output.failures.length,
  });

  return output;
}
