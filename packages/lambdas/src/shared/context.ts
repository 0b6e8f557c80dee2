/**
 * Shared context and utilities for Lambda handlers
 */

import { DEFAULT_SUMMARY_RETENTION_DAYS, StructuredLogger, TABLE_NAME } from '@persona-chat/core';
import type { Context } from 'aws-lambda';

/**
 * Environment configuration
 */
export interface LambdaEnv {
  TABLE_NAME: string;
  ENVIRONMENT: string;
  LOG_LEVEL: string;
  SUMMARY_RETENTION_DAYS: string;
}

/**
 * Get environment configuration
 */
export function getEnv(): LambdaEnv {
  return {
    TABLE_NAME: process.env.TABLE_NAME ?? TABLE_NAME,
    ENVIRONMENT: process.env.ENVIRONMENT ?? 'dev',
    LOG_LEVEL: process.env.LOG_LEVEL ?? 'INFO',
    SUMMARY_RETENTION_DAYS:
      process.env.SUMMARY_RETENTION_DAYS ?? String(DEFAULT_SUMMARY_RETENTION_DAYS),
  };
}

/**
 * Structured logger that tags every line with the current invocation
 */
export class LambdaLogger extends StructuredLogger {
  setContext(context: Context): void {
    this.bindings = {
      ...this.bindings,
      requestId: context.awsRequestId,
      functionName: context.functionName,
    };
  }
}

export const logger = new LambdaLogger();
