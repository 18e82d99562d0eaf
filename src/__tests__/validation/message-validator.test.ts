/**
 * Message content and ordering checks
 */

import { describe, it, expect } from 'vitest';
import {
  sortMessagesChronologically,
  validateMessageFormat,
  validateMessageOrdering,
} from '../../validation/message-validator.js';
import { MAX_MESSAGE_LENGTH } from '../../types/index.js';

describe('validateMessageFormat', () => {
  it('should trim content', () => {
    expect(validateMessageFormat('  hi there ')).toEqual({ ok: true, value: 'hi there' });
  });

  it('should reject non-text and blank content', () => {
    expect(validateMessageFormat(42)).toEqual({ ok: false, error: 'Message content must be text' });
    expect(validateMessageFormat(' \n ')).toEqual({ ok: false, error: 'Message cannot be empty' });
  });

  it('should measure length after trimming', () => {
    expect(validateMessageFormat(` ${'x'.repeat(MAX_MESSAGE_LENGTH)} `).ok).toBe(true);
    expect(validateMessageFormat('x'.repeat(MAX_MESSAGE_LENGTH + 1))).toEqual({
      ok: false,
      error: 'Message cannot be longer than 10000 characters',
    });
  });

  it('should count characters outside the basic plane once', () => {
    const emoji = '😀'.repeat(6000);

    expect(validateMessageFormat(emoji)).toEqual({ ok: true, value: emoji });
    expect(validateMessageFormat('😀'.repeat(MAX_MESSAGE_LENGTH + 1)).ok).toBe(false);
  });
});

describe('ordering', () => {
  const at = (second: number) => new Date(Date.UTC(2026, 0, 1, 0, 0, second));

  it('should detect out-of-order timestamps', () => {
    expect(validateMessageOrdering([{ createdAt: at(1) }, { createdAt: at(1) }, { createdAt: at(2) }])).toBe(true);
    expect(validateMessageOrdering([{ createdAt: at(2) }, { createdAt: at(1) }])).toBe(false);
    expect(validateMessageOrdering([])).toBe(true);
  });

  it('should sort by time then id without touching the input', () => {
    const input = [
      { id: 3, createdAt: at(5) },
      { id: 2, createdAt: at(1) },
      { id: 1, createdAt: at(1) },
    ];

    expect(sortMessagesChronologically(input).map((m) => m.id)).toEqual([1, 2, 3]);
    expect(input[0]?.id).toBe(3);
  });
});
