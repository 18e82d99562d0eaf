/**
 * Message content and ordering checks
 */

import { MAX_MESSAGE_LENGTH, characterLength, type Result, ok, err } from '../types/index.js';

/**
 * Trim and bound chat content
 *
 * @returns the trimmed content, or a user-facing reason it was rejected
 */
export function validateMessageFormat(content: unknown): Result<string, string> {
  if (typeof content !== 'string') {
    return err('Message content must be text');
  }
  const trimmed = content.trim();
  if (trimmed.length === 0) {
    return err('Message cannot be empty');
  }
  if (characterLength(trimmed) > MAX_MESSAGE_LENGTH) {
    return err(`Message cannot be longer than ${String(MAX_MESSAGE_LENGTH)} characters`);
  }
  return ok(trimmed);
}

interface Timestamped {
  id: number;
  createdAt: Date;
}

/**
 * True when creation timestamps never decrease
 */
export function validateMessageOrdering(messages: readonly Pick<Timestamped, 'createdAt'>[]): boolean {
  for (let i = 1; i < messages.length; i++) {
    const previous = messages[i - 1];
    const current = messages[i];
    if (previous && current && current.createdAt.getTime() < previous.createdAt.getTime()) {
      return false;
    }
  }
  return true;
}

/**
 * Restore chronological order after out-of-order arrival; ties break on id
 */
export function sortMessagesChronologically<T extends Timestamped>(messages: readonly T[]): T[] {
  return [...messages].sort(
    (a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id,
  );
}
