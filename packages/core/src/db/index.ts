/**
 * Database module
 *
 * DynamoDB access layer using AWS SDK v3.
 */

export { DynamoDBClient, DynamoDBError } from './client.js';
export type { BatchWriteOperation, QueryPageOptions } from './client.js';
export { ContextSummaryRepository } from './repositories/context-summary.js';
export type { DynamoDBItem } from './types.js';
