/**
 * Storage Utilities
 *
 * Shared helpers for store implementations:
 * - Message status transition rules
 * - Expiry helpers
 */

import type { Message, MessageStatus } from '../types/index.js';

export const SECONDS_PER_DAY = 86400;

/**
 * Forward-only transitions; `failed` may re-enter the pipeline on retry
 */
const ALLOWED_TRANSITIONS: Record<MessageStatus, readonly MessageStatus[]> = {
  pending: ['sent', 'delivered', 'read', 'failed'],
  sent: ['delivered', 'read', 'failed'],
  delivered: ['read'],
  read: [],
  failed: ['sent', 'delivered', 'read'],
};

export function canTransition(from: MessageStatus, to: MessageStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Compute the message after a status transition, or null when the transition
 * is not allowed. `deliveredAt` is always set no later than `readAt`.
 */
export function applyStatusTransition(
  message: Message,
  to: MessageStatus,
  at: Date,
  error?: string,
): Message | null {
  if (!canTransition(message.status, to)) {
    return null;
  }

  const next: Message = { ...message, status: to };
  switch (to) {
    case 'sent':
      next.sentAt = message.sentAt ?? at;
      break;
    case 'delivered':
      next.sentAt = message.sentAt ?? at;
      next.deliveredAt = message.deliveredAt ?? at;
      break;
    case 'read': {
      const deliveredAt = message.deliveredAt ?? at;
      next.sentAt = message.sentAt ?? deliveredAt;
      next.deliveredAt = deliveredAt;
      next.isRead = true;
      next.readAt = at.getTime() < deliveredAt.getTime() ? deliveredAt : at;
      break;
    }
    case 'failed':
      next.failedAt = at;
      next.lastError = error ?? message.lastError;
      next.retryCount = message.retryCount + 1;
      break;
    case 'pending':
      break;
  }
  return next;
}

/**
 * Helper to compute an absolute expiry from a TTL
 */
export function calculateExpiresAt(ttlSeconds: number, from: Date = new Date()): Date {
  return new Date(from.getTime() + ttlSeconds * 1000);
}

export function daysFromNow(days: number, from: Date = new Date()): Date {
  return calculateExpiresAt(days * SECONDS_PER_DAY, from);
}

/**
 * Helper to check whether a value has expired
 */
export function isExpired(expiresAt: Date, now: Date = new Date()): boolean {
  return expiresAt.getTime() <= now.getTime();
}
