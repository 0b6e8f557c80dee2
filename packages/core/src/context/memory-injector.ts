/**
 * Long-term memory injection
 *
 * Memories arrive already selected and ranked; this module only decides where
 * they go. They become one system note placed after any summaries and before
 * the first dialogue turn.
 */

import { DEFAULT_MAX_INJECTED_MEMORIES, SYNTHETIC_MESSAGE_TYPE } from '../constants.js';
import type { Message } from '../types/index.js';

export const MEMORY_BLOCK_HEADER = '[Key facts and memories to keep in mind when replying]';

export interface MemoryInjectionOptions {
  persona: string;
  maxMemories?: number;
}

export function formatMemoryContent(memories: string[]): string {
  const lines = memories.map((memory, index) => `Fact ${index + 1}: ${memory}`);
  return [MEMORY_BLOCK_HEADER, ...lines].join('\n');
}

/**
 * Return a new sequence with `entry` placed before the first non-system message
 */
export function insertBeforeFirstDialogue(messages: Message[], entry: Message): Message[] {
  const index = messages.findIndex((message) => message.role !== 'system');
  const at = index === -1 ? messages.length : index;
  return [...messages.slice(0, at), entry, ...messages.slice(at)];
}

/**
 * Inject up to `maxMemories` memories as a synthetic system message
 */
export function injectMemories(
  messages: Message[],
  memories: readonly string[] | undefined,
  options: MemoryInjectionOptions
): Message[] {
  const selected = (memories ?? [])
    .filter((memory) => memory.trim() !== '')
    .slice(0, options.maxMemories ?? DEFAULT_MAX_INJECTED_MEMORIES);

  if (selected.length === 0) {
    return messages;
  }

  return insertBeforeFirstDialogue(messages, {
    role: 'system',
    content: formatMemoryContent(selected),
    timestamp: new Date(),
    persona: options.persona,
    metadata: {
      type: SYNTHETIC_MESSAGE_TYPE.INJECTED_MEMORIES,
      count: selected.length,
    },
  });
}
