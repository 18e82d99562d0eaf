/**
 * Status transition rules and expiry helpers
 */

import { describe, expect, it } from 'vitest';
import {
  applyStatusTransition,
  calculateExpiresAt,
  canTransition,
  daysFromNow,
  isExpired,
} from '../../storage/index.js';
import type { Message } from '../../types/index.js';
import { alice, bob } from '../fixtures.js';

const at = new Date('2026-05-01T08:00:00.000Z');

function pending(): Message {
  return {
    id: 1,
    sender: alice,
    recipient: bob,
    content: 'hi',
    clientId: null,
    status: 'pending',
    isRead: false,
    createdAt: at,
    sentAt: null,
    deliveredAt: null,
    readAt: null,
    failedAt: null,
    retryCount: 0,
    lastError: null,
  };
}

describe('status transitions', () => {
  it('should only move forward', () => {
    expect(canTransition('sent', 'delivered')).toBe(true);
    expect(canTransition('delivered', 'sent')).toBe(false);
    expect(canTransition('read', 'failed')).toBe(false);
    expect(canTransition('failed', 'sent')).toBe(true);
  });

  it('should fill the skipped timestamps when jumping straight to read', () => {
    const read = applyStatusTransition(pending(), 'read', at);

    expect(read).toMatchObject({ status: 'read', isRead: true, sentAt: at, deliveredAt: at, readAt: at });
  });

  it('should record the failure reason and count', () => {
    const failed = applyStatusTransition(pending(), 'failed', at, 'store unavailable');

    expect(failed).toMatchObject({ status: 'failed', failedAt: at, lastError: 'store unavailable', retryCount: 1 });
  });

  it('should refuse a disallowed transition', () => {
    expect(applyStatusTransition({ ...pending(), status: 'read' }, 'delivered', at)).toBeNull();
  });
});

describe('expiry helpers', () => {
  it('should add a TTL in seconds', () => {
    expect(calculateExpiresAt(90, at).toISOString()).toBe('2026-05-01T08:01:30.000Z');
    expect(daysFromNow(7, at).toISOString()).toBe('2026-05-08T08:00:00.000Z');
  });

  it('should treat the exact expiry instant as expired', () => {
    expect(isExpired(at, at)).toBe(true);
    expect(isExpired(calculateExpiresAt(1, at), at)).toBe(false);
  });
});
