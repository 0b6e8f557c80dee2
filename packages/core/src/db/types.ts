/**
 * Database module types
 */

/**
 * DynamoDB item with standard keys
 */
export interface DynamoDBItem {
  PK: string;
  SK: string;
  [key: string]: unknown;
}
