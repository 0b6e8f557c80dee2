/**
 * Shared types for Lambda handlers
 */

/**
 * Input for the summary retention Lambda
 */
export interface SummaryRetentionInput {
  /** Users whose summaries are pruned */
  userIds: string[];
  /** Prune a single persona; all personas when omitted */
  persona?: string;
  /** Overrides SUMMARY_RETENTION_DAYS */
  olderThanDays?: number;
}

/**
 * Output from the summary retention Lambda
 */
export interface SummaryRetentionOutput {
  /** Summaries created before this instant were deleted */
  cutoff: string;
  /** Total summaries deleted across users */
  deleted: number;
  usersProcessed: number;
  failures: Array<{ userId: string; error: string }>;
}
