/**
 * Sliding window over dialogue turns
 */

import type { Message, WireMessage } from '../types/index.js';

/**
 * Keep the most recent `maxTurns` dialogue messages; system messages are kept
 * in full and placed first, each partition in its original order.
 */
export function applySlidingWindow(messages: Message[], maxTurns: number): Message[] {
  const system = messages.filter((message) => message.role === 'system');
  const dialogue = messages.filter((message) => message.role !== 'system');
  const excess = dialogue.length - Math.max(0, maxTurns);

  return [...system, ...(excess > 0 ? dialogue.slice(excess) : dialogue)];
}

export function toWireMessages(messages: Message[]): WireMessage[] {
  return messages.map((message) => ({ role: message.role, content: message.content }));
}
