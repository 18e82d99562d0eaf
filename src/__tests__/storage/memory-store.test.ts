/**
 * InMemoryMessagingStore Tests
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { applyStatusTransition, canTransition, daysFromNow, isExpired } from '../../storage/index.js';
import { InMemoryMessagingStore } from '../../storage/memory-store.js';
import type { QueuePriority, UserRef } from '../../types/index.js';
import { alice, bob, carol, daysAgo } from '../fixtures.js';

describe('status transitions', () => {
  it('should only move forward', () => {
    expect(canTransition('sent', 'delivered')).toBe(true);
    expect(canTransition('delivered', 'sent')).toBe(false);
    expect(canTransition('read', 'delivered')).toBe(false);
    expect(canTransition('failed', 'sent')).toBe(true);
  });

  it('should never put readAt before deliveredAt', () => {
    const store = new InMemoryMessagingStore();
    const delivered = new Date('2026-03-01T10:00:00.000Z');
    const { message } = store.createMessage({
      sender: alice,
      recipient: bob,
      content: 'x',
      status: 'delivered',
      at: delivered,
    });

    const read = applyStatusTransition(message, 'read', new Date('2026-03-01T09:00:00.000Z'));

    expect(read?.readAt).toEqual(delivered);
    expect(read?.isRead).toBe(true);
  });

  it('should count a failure as a retry', () => {
    const store = new InMemoryMessagingStore();
    const { message } = store.createMessage({ sender: alice, recipient: bob, content: 'x' });

    const failed = applyStatusTransition(message, 'failed', new Date(), 'socket closed');

    expect(failed).toMatchObject({ status: 'failed', lastError: 'socket closed', retryCount: 1 });
  });
});

describe('expiry helpers', () => {
  it('should treat the expiry instant as expired', () => {
    const now = new Date('2026-05-01T00:00:00.000Z');
    expect(isExpired(now, now)).toBe(true);
    expect(isExpired(daysFromNow(1, now), now)).toBe(false);
  });
});

describe('InMemoryMessagingStore', () => {
  let store: InMemoryMessagingStore;

  beforeEach(() => {
    store = new InMemoryMessagingStore();
    for (const user of [alice, bob, carol]) store.saveUser(user);
  });

  describe('users', () => {
    it('should find users by username', () => {
      expect(store.findUserByUsername('bob')).toEqual(bob);
      expect(store.findUserByUsername('nobody')).toBeNull();
    });
  });

  describe('messages', () => {
    it('should default new messages to sent', () => {
      const { message, created } = store.createMessage({ sender: alice, recipient: bob, content: 'hi' });

      expect(created).toBe(true);
      expect(message).toMatchObject({ id: 1, status: 'sent', isRead: false, deliveredAt: null });
      expect(message.sentAt).toEqual(message.createdAt);
    });

    it('should return the existing message for a repeated client id', () => {
      const first = store.createMessage({ sender: alice, recipient: bob, content: 'hi', clientId: 'c-1' });
      const second = store.createMessage({ sender: alice, recipient: bob, content: 'hi again', clientId: 'c-1' });

      expect(second.created).toBe(false);
      expect(second.message.id).toBe(first.message.id);
      expect(second.message.content).toBe('hi');
    });

    it('should keep client ids scoped to the sender', () => {
      store.createMessage({ sender: alice, recipient: bob, content: 'a', clientId: 'same' });
      const other = store.createMessage({ sender: bob, recipient: alice, content: 'b', clientId: 'same' });

      expect(other.created).toBe(true);
    });

    it('should report a refused transition as unchanged', () => {
      const { message } = store.createMessage({ sender: alice, recipient: bob, content: 'hi' });
      store.transitionMessageStatus(message.id, 'read', new Date());

      const result = store.transitionMessageStatus(message.id, 'delivered', new Date());

      expect(result?.changed).toBe(false);
      expect(result?.message.status).toBe('read');
      expect(store.transitionMessageStatus(999, 'read', new Date())).toBeNull();
    });

    it('should not leak internal references', () => {
      const { message } = store.createMessage({ sender: alice, recipient: bob, content: 'hi' });
      message.content = 'changed';

      expect(store.getMessage(message.id)?.content).toBe('hi');
    });

    it('should return the newest messages of a conversation in order', () => {
      const base = new Date('2026-02-01T00:00:00.000Z');
      for (let i = 0; i < 4; i++) {
        store.createMessage({
          sender: i % 2 === 0 ? alice : bob,
          recipient: i % 2 === 0 ? bob : alice,
          content: `m${String(i)}`,
          at: new Date(base.getTime() + i * 1000),
        });
      }
      store.createMessage({ sender: alice, recipient: carol, content: 'elsewhere' });

      expect(store.getConversation(alice.id, bob.id, 2).map((m) => m.content)).toEqual(['m2', 'm3']);
    });

    it('should list unread ids from one sender', () => {
      const first = store.createMessage({ sender: alice, recipient: bob, content: 'a' }).message;
      const second = store.createMessage({ sender: alice, recipient: bob, content: 'b' }).message;
      store.createMessage({ sender: carol, recipient: bob, content: 'c' });
      store.markMessageRead(first.id, new Date());

      expect(store.getUnreadMessageIds(bob.id, alice.id)).toEqual([second.id]);
    });
  });

  describe('offline queue', () => {
    function queue(content: string, priority: QueuePriority, expiresAt: Date, sender: UserRef = alice) {
      return store.createQueuedMessage({
        sender,
        recipient: bob,
        content,
        clientId: null,
        queueType: 'incoming',
        priority,
        expiresAt,
        maxRetries: 3,
      });
    }

    it('should order deliverable entries by priority then age', () => {
      const now = new Date();
      const low = queue('low', 3, daysFromNow(7, now));
      const high = queue('high', 1, daysFromNow(7, now), carol);

      expect(store.listDeliverableQueuedMessages(bob.id, now).map((q) => q.id)).toEqual([high.id, low.id]);
    });

    it('should delete only expired entries', () => {
      const now = new Date();
      queue('old', 2, daysAgo(1, now));
      queue('fresh', 2, daysFromNow(1, now));

      expect(store.deleteExpiredQueuedMessages(now)).toBe(1);
      expect(store.countQueuedMessages(bob.id, now)).toMatchObject({
        totalQueued: 1,
        byQueueType: { outgoing: 0, incoming: 1, retry: 0 },
        byPriority: { '1': 0, '2': 1, '3': 0 },
      });
    });
  });

  describe('presence', () => {
    it('should stay online until the last connection closes', () => {
      const now = new Date();
      store.incrementConnections(alice, 'c1', {}, now);
      store.incrementConnections(alice, 'c2', {}, now);

      expect(store.decrementConnections(alice, now)).toMatchObject({ isOnline: true, activeConnections: 1 });
      expect(store.decrementConnections(alice, now)).toMatchObject({ isOnline: false, activeConnections: 0 });
      expect(store.decrementConnections(alice, now).activeConnections).toBe(0);
    });

    it('should reset statuses without a recent heartbeat', () => {
      const now = new Date();
      store.incrementConnections(alice, 'c1', {}, daysAgo(1, now));
      store.incrementConnections(bob, 'c2', {}, now);

      const reset = store.resetStaleUserStatuses(new Date(now.getTime() - 60_000), now);

      expect(reset.map((s) => s.user.id)).toEqual([alice.id]);
      expect(store.getUserStatus(bob.id)?.isOnline).toBe(true);
    });
  });

  describe('typing', () => {
    it('should report changes only', () => {
      const at = new Date();

      expect(store.upsertTypingStatus(alice, bob, false, at).changed).toBe(false);
      expect(store.upsertTypingStatus(alice, bob, true, at).changed).toBe(true);
      expect(store.upsertTypingStatus(alice, bob, true, at).changed).toBe(false);
      expect(store.listTypingToward(bob.id).map((t) => t.user.id)).toEqual([alice.id]);
    });
  });

  describe('notifications', () => {
    it('should mark read only for the recipient', () => {
      const n = store.createNotification({
        recipient: bob,
        notificationType: 'system_announcement',
        title: 'Hello',
        message: 'World',
      });

      expect(store.markNotificationRead(n.id, alice.id, new Date())).toBe(false);
      expect(store.markNotificationRead(n.id, bob.id, new Date())).toBe(true);
      expect(store.countUnreadNotifications(bob.id)).toBe(0);
    });

    it('should page newest first', () => {
      const base = new Date('2026-04-01T00:00:00.000Z');
      for (let i = 0; i < 3; i++) {
        store.createNotification({
          recipient: bob,
          notificationType: 'system_announcement',
          title: `t${String(i)}`,
          message: 'm',
          at: new Date(base.getTime() + i * 1000),
        });
      }

      const page = store.listNotifications(bob.id, { limit: 2, offset: 1, notificationType: null, unreadOnly: false });

      expect(page.map((n) => n.title)).toEqual(['t1', 't0']);
    });
  });
});
