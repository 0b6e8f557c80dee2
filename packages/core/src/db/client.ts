/**
 * DynamoDB client wrapper
 *
 * Provides a consistent interface for DynamoDB operations with:
 * - Automatic retries with exponential backoff
 * - Error categorisation (code + retryable flag)
 */

import {
  DynamoDBClient as AWSDynamoDBClient,
  type DynamoDBClientConfig,
} from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  PutCommand,
  QueryCommand,
  BatchWriteCommand,
  type PutCommandInput,
  type QueryCommandInput,
  type BatchWriteCommandInput,
} from '@aws-sdk/lib-dynamodb';

import { TABLE_NAME } from '../constants.js';

/** Maximum number of retries for transient errors */
const MAX_RETRIES = 3;

/** Base delay in milliseconds for exponential backoff */
const BASE_DELAY_MS = 100;

/** Maximum delay in milliseconds between retries */
const MAX_DELAY_MS = 2000;

/** DynamoDB limit for one BatchWriteItem call */
const BATCH_WRITE_LIMIT = 25;

/**
 * Custom error class for DynamoDB operations
 */
export class DynamoDBError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = 'DynamoDBError';
  }
}

const RETRYABLE_ERRORS = new Set([
  'ProvisionedThroughputExceededException',
  'ThrottlingException',
  'RequestLimitExceeded',
  'InternalServerError',
  'ServiceUnavailable',
  'TransactionConflictException',
]);

function isRetryableError(error: unknown): boolean {
  return error instanceof Error && RETRYABLE_ERRORS.has(error.name);
}

function getErrorCode(error: unknown): string {
  if (error instanceof Error) {
    return error.name || 'UnknownError';
  }
  return 'UnknownError';
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Calculate delay with exponential backoff and jitter
 */
function calculateBackoffDelay(attempt: number): number {
  const exponentialDelay = BASE_DELAY_MS * Math.pow(2, attempt);
  const jitter = Math.random() * BASE_DELAY_MS;
  return Math.min(exponentialDelay + jitter, MAX_DELAY_MS);
}

export interface QueryPageOptions {
  limit?: number;
  ascending?: boolean;
  exclusiveStartKey?: Record<string, unknown>;
  /** Projection expression to limit returned attributes */
  projectionExpression?: string;
  /** Server-side filter applied after the key condition */
  filterExpression?: string;
  expressionAttributeNames?: Record<string, string>;
  /** Extra values referenced by the filter expression */
  additionalExpressionAttributeValues?: Record<string, unknown>;
}

export interface BatchWriteOperation {
  type: 'put' | 'delete';
  pk: string;
  sk: string;
  item?: Record<string, unknown>;
}

/**
 * DynamoDB client with document client wrapper
 */
export class DynamoDBClient {
  private client: DynamoDBDocumentClient;
  private tableName: string;

  constructor(config?: DynamoDBClientConfig, tableName?: string) {
    const baseClient = new AWSDynamoDBClient({
      ...config,
      maxAttempts: 1, // retries are handled by executeWithRetry
    });
    this.client = DynamoDBDocumentClient.from(baseClient, {
      marshallOptions: {
        removeUndefinedValues: true,
      },
      unmarshallOptions: {
        wrapNumbers: false,
      },
    });
    this.tableName = tableName ?? TABLE_NAME;
  }

  getTableName(): string {
    return this.tableName;
  }

  private async executeWithRetry<T>(
    operation: () => Promise<T>,
    operationName: string
  ): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        const retryable = isRetryableError(error);

        if (!retryable || attempt >= MAX_RETRIES) {
          throw new DynamoDBError(
            `${operationName} failed: ${cause.message}`,
            getErrorCode(error),
            retryable,
            cause
          );
        }

        await sleep(calculateBackoffDelay(attempt));
      }
    }
  }

  /**
   * Put an item
   */
  async put(item: Record<string, unknown>): Promise<void> {
    return this.executeWithRetry(async () => {
      const input: PutCommandInput = {
        TableName: this.tableName,
        Item: item,
      };

      await this.client.send(new PutCommand(input));
    }, 'PutItem');
  }

  /**
   * Query one page of items by partition key with optional sort key prefix
   */
  async query<T>(
    pk: string,
    skPrefix?: string,
    options?: QueryPageOptions
  ): Promise<{ items: T[]; lastKey?: Record<string, unknown> }> {
    return this.executeWithRetry(async () => {
      const expressionAttributeValues: Record<string, unknown> = skPrefix
        ? { ':pk': pk, ':skPrefix': skPrefix }
        : { ':pk': pk };

      if (options?.additionalExpressionAttributeValues) {
        Object.assign(expressionAttributeValues, options.additionalExpressionAttributeValues);
      }

      const input: QueryCommandInput = {
        TableName: this.tableName,
        KeyConditionExpression: skPrefix
          ? 'PK = :pk AND begins_with(SK, :skPrefix)'
          : 'PK = :pk',
        ExpressionAttributeValues: expressionAttributeValues,
        ExpressionAttributeNames: options?.expressionAttributeNames,
        ProjectionExpression: options?.projectionExpression,
        FilterExpression: options?.filterExpression,
        ScanIndexForward: options?.ascending ?? false,
        Limit: options?.limit,
        ExclusiveStartKey: options?.exclusiveStartKey,
      };

      const result = await this.client.send(new QueryCommand(input));
      return {
        items: (result.Items as T[] | undefined) ?? [],
        lastKey: result.LastEvaluatedKey,
      };
    }, 'Query');
  }

  /**
   * Batch write up to 25 items, retrying unprocessed items
   */
  async batchWrite(operations: BatchWriteOperation[]): Promise<void> {
    if (operations.length === 0) {
      return;
    }

    if (operations.length > BATCH_WRITE_LIMIT) {
      throw new DynamoDBError(
        `BatchWrite supports up to ${BATCH_WRITE_LIMIT} items per call. Use batchWriteAll for larger batches.`,
        'ValidationError',
        false
      );
    }

    return this.executeWithRetry(async () => {
      const writeRequests = operations.map((op) => {
        if (op.type === 'put' && op.item) {
          return { PutRequest: { Item: { ...op.item, PK: op.pk, SK: op.sk } } };
        }
        if (op.type === 'delete') {
          return { DeleteRequest: { Key: { PK: op.pk, SK: op.sk } } };
        }
        throw new Error(`Invalid batch write operation type: ${op.type}`);
      });

      const input: BatchWriteCommandInput = {
        RequestItems: {
          [this.tableName]: writeRequests,
        },
      };

      let response = await this.client.send(new BatchWriteCommand(input));

      let retryCount = 0;
      while (
        response.UnprocessedItems &&
        Object.keys(response.UnprocessedItems).length > 0 &&
        retryCount < MAX_RETRIES
      ) {
        await sleep(calculateBackoffDelay(retryCount));
        response = await this.client.send(
          new BatchWriteCommand({ RequestItems: response.UnprocessedItems })
        );
        retryCount++;
      }

      if (response.UnprocessedItems && Object.keys(response.UnprocessedItems).length > 0) {
        throw new DynamoDBError(
          `BatchWrite left unprocessed items after ${MAX_RETRIES} retries`,
          'UnprocessedItems',
          true
        );
      }
    }, 'BatchWrite');
  }

  /**
   * Batch write any number of items in sequential 25-item chunks
   */
  async batchWriteAll(operations: BatchWriteOperation[]): Promise<void> {
    for (let i = 0; i < operations.length; i += BATCH_WRITE_LIMIT) {
      await this.batchWrite(operations.slice(i, i + BATCH_WRITE_LIMIT));
    }
  }
}
