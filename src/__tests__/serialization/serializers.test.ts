/**
 * Serializer Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  errorFrame,
  getStatusIcon,
  serializeDate,
  serializeMessage,
  serializeUserStatus,
  toJsonString,
} from '../../serialization/serializers.js';
import type { Message } from '../../types/index.js';
import { alice, bob } from '../fixtures.js';

const createdAt = new Date('2026-06-01T12:00:00.000Z');

const message: Message = {
  id: 9,
  sender: alice,
  recipient: bob,
  content: 'hello',
  clientId: 'c-9',
  status: 'delivered',
  isRead: false,
  createdAt,
  sentAt: createdAt,
  deliveredAt: new Date('2026-06-01T12:00:01.000Z'),
  readAt: null,
  failedAt: null,
  retryCount: 0,
  lastError: null,
};

describe('serializeDate', () => {
  it('should write ISO strings and null for absent or invalid dates', () => {
    expect(serializeDate(createdAt)).toBe('2026-06-01T12:00:00.000Z');
    expect(serializeDate(null)).toBeNull();
    expect(serializeDate(undefined)).toBeNull();
    expect(serializeDate(new Date('nope'))).toBeNull();
  });
});

describe('serializeMessage', () => {
  it('should write the wire shape', () => {
    expect(serializeMessage(message)).toEqual({
      type: 'message',
      id: 9,
      sender: 'alice',
      sender_id: 1,
      recipient: 'bob',
      recipient_id: 2,
      content: 'hello',
      client_id: 'c-9',
      status: 'delivered',
      status_icon: 'check-double',
      created_at: '2026-06-01T12:00:00.000Z',
      is_read: false,
      read_at: null,
      delivered_at: '2026-06-01T12:00:01.000Z',
    });
  });

  it('should add retry and sequence ids only when given', () => {
    const frame = serializeMessage(message, { retryId: null, sequenceId: 4 });

    expect(frame.retry_id).toBeNull();
    expect(frame.sequence_id).toBe(4);
    expect('retry_id' in serializeMessage(message)).toBe(false);
  });
});

describe('serializeUserStatus', () => {
  it('should report unknown users as offline', () => {
    expect(serializeUserStatus(bob, null)).toMatchObject({
      type: 'user_status',
      user_id: 2,
      username: 'bob',
      is_online: false,
      last_seen: null,
    });
  });
});

describe('status icons', () => {
  it('should map every status', () => {
    expect(getStatusIcon('pending')).toBe('clock');
    expect(getStatusIcon('read')).toBe('check-double-blue');
    expect(getStatusIcon('failed')).toBe('exclamation-triangle');
  });
});

describe('toJsonString', () => {
  it('should encode an error frame with its extras', () => {
    const frame = errorFrame('Rate limit exceeded, slow down', { retry_id: 'r-1', retry_after: 2 });

    expect(JSON.parse(toJsonString(frame))).toEqual({
      type: 'error',
      error: 'Rate limit exceeded, slow down',
      retry_id: 'r-1',
      retry_after: 2,
      timestamp: frame.timestamp,
    });
  });

  it('should fall back to an error frame when encoding throws', () => {
    vi.spyOn(JSON, 'stringify').mockImplementationOnce(() => {
      throw new TypeError('Converting circular structure to JSON');
    });

    const parsed: unknown = JSON.parse(toJsonString(errorFrame('original')));

    expect(parsed).toMatchObject({ type: 'error', error: 'Serialization failed' });
    vi.restoreAllMocks();
  });
});
