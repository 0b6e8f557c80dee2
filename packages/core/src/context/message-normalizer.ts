/**
 * Message normalisation
 *
 * Converts raw persisted records into uniform Message objects. A malformed
 * record is skipped with a warning so one bad row never aborts a context build.
 */

import type { Logger } from '../logger.js';
import { toError } from '../logger.js';
import { MessageRoleSchema } from '../schemas/index.js';
import type { Message, MessageRole, RawMessageRecord } from '../types/index.js';

import { pickTimestampField, resolveTimestamp } from './timestamps.js';

export interface NormalizeOptions {
  /** Persona assigned to records that do not carry one */
  defaultPersona: string;
  logger: Logger;
}

function normalizeRole(value: unknown): MessageRole {
  if (value === undefined || value === null || value === '') {
    return 'user';
  }
  return MessageRoleSchema.parse(value);
}

function normalizeContent(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  throw new TypeError(`Unsupported content type: ${typeof value}`);
}

function normalizeMetadata(value: unknown): Record<string, unknown> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}

function recordId(record: RawMessageRecord): string {
  return record.id === undefined || record.id === null ? 'n/a' : String(record.id);
}

/**
 * Normalise one record; throws when the record is malformed
 */
export function normalizeMessage(record: RawMessageRecord, options: NormalizeOptions): Message {
  const role = normalizeRole(record.role);
  const content = normalizeContent(record.content);
  const metadata = normalizeMetadata(record.metadata);
  const persona =
    typeof record.persona === 'string' && record.persona ? record.persona : options.defaultPersona;

  const resolution = resolveTimestamp(pickTimestampField(record));
  let timestamp: Date;
  if (resolution.ok) {
    timestamp = resolution.date;
  } else {
    timestamp = new Date();
    metadata.timestampFallback = resolution.reason;
    options.logger.warn('Message timestamp unusable, using current time', {
      messageId: recordId(record),
      reason: resolution.reason,
    });
  }

  return { role, content, timestamp, persona, metadata };
}

/**
 * Normalise records in order, skipping the ones that cannot be normalised
 */
export function normalizeMessages(records: RawMessageRecord[], options: NormalizeOptions): Message[] {
  const messages: Message[] = [];

  for (const record of records) {
    try {
      messages.push(normalizeMessage(record, options));
    } catch (error) {
      options.logger.warn('Skipping malformed message record', {
        messageId: recordId(record),
        error: toError(error).message,
      });
    }
  }

  return messages;
}
