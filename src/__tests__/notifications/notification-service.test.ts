/**
 * Notification Service Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  NotificationService,
  defaultPreference,
  formatGroupMessage,
  isInQuietHours,
  type FallbackNotifier,
} from '../../notifications/notification-service.js';
import { InMemoryChannelLayer } from '../../channels/channel-layer.js';
import type { InMemoryMessagingStore } from '../../storage/memory-store.js';
import type { OffloadedMessagingStore } from '../../storage/executor.js';
import { alice, bob, captureGroup, carol, createStores, daysAgo } from '../fixtures.js';

describe('NotificationService', () => {
  let sync: InMemoryMessagingStore;
  let store: OffloadedMessagingStore;
  let channelLayer: InMemoryChannelLayer;
  let notifications: NotificationService;

  beforeEach(() => {
    ({ sync, store } = createStores());
    channelLayer = new InMemoryChannelLayer();
    notifications = new NotificationService({}, { store, channelLayer });
  });

  describe('createAndSendNotification', () => {
    it('should persist, push with the unread count, and mark delivered', async () => {
      const received = await captureGroup(channelLayer, 'user_2');

      const created = await notifications.createAndSendNotification({
        recipient: bob,
        sender: alice,
        notificationType: 'mention',
        title: 'You were mentioned',
        message: 'alice mentioned you in a post',
        priority: 'high',
      });

      expect(created).toMatchObject({ isDelivered: true, groupCount: 1, isGrouped: false, priority: 'high' });
      expect(received).toHaveLength(1);
      expect(received[0]).toMatchObject({
        type: 'notification_message',
        payload: {
          type: 'notification',
          id: created?.id,
          notification_type: 'mention',
          sender: 'alice',
          unread_count: 1,
        },
      });
    });

    it('should return null when the type is disabled', async () => {
      sync.saveNotificationPreference({ userId: bob.id, notificationType: 'post_liked', isEnabled: false });

      const created = await notifications.createAndSendNotification({
        recipient: bob,
        notificationType: 'post_liked',
        title: 'Post Liked',
        message: 'alice liked your post',
      });

      expect(created).toBeNull();
      expect(sync.countUnreadNotifications(bob.id)).toBe(0);
    });

    it('should hold normal priority in quiet hours but let urgent through', async () => {
      sync.saveNotificationPreference({
        userId: bob.id,
        notificationType: 'security_alert',
        quietHoursStart: 0,
        quietHoursEnd: 24 * 60 - 1,
      });
      const base = { recipient: bob, notificationType: 'security_alert' as const, title: 'Sign-in', message: 'New sign-in' };

      await expect(notifications.createAndSendNotification(base)).resolves.toBeNull();
      await expect(notifications.createAndSendNotification({ ...base, priority: 'urgent' })).resolves.not.toBeNull();
    });

    it('should fold repeats into one group inside the window', async () => {
      const like = (sender: typeof alice) =>
        notifications.createAndSendNotification({
          recipient: bob,
          sender,
          notificationType: 'post_liked',
          title: 'Post Liked',
          message: `${sender.username} liked your post`,
          groupKey: 'post_likes_7',
        });

      const first = await like(alice);
      const second = await like(carol);

      expect(second?.id).toBe(first?.id);
      expect(second).toMatchObject({ groupCount: 2, message: '2 people liked your post', isRead: false });
      expect(sync.listNotifications(bob.id, { limit: 10, offset: 0 })).toHaveLength(1);
    });

    it('should start a new group once the window has passed', async () => {
      const old = sync.createNotification({
        recipient: bob,
        notificationType: 'post_liked',
        title: 'Post Liked',
        message: 'alice liked your post',
        groupKey: 'post_likes_7',
        at: new Date(Date.now() - 7 * 3600 * 1000),
      });

      const created = await notifications.createAndSendNotification({
        recipient: bob,
        notificationType: 'post_liked',
        title: 'Post Liked',
        message: 'carol liked your post',
        groupKey: 'post_likes_7',
      });

      expect(created?.id).not.toBe(old.id);
      expect(created?.groupCount).toBe(1);
    });

    it('should start a new group once the group is full', async () => {
      const full = sync.createNotification({
        recipient: bob,
        notificationType: 'job_application',
        title: 'New Job Application',
        message: 'applied',
        groupKey: 'job_applications_3',
      });
      sync.updateNotification(full.id, { groupCount: 5 });

      const created = await notifications.createAndSendNotification({
        recipient: bob,
        notificationType: 'job_application',
        title: 'New Job Application',
        message: 'carol applied',
        groupKey: 'job_applications_3',
      });

      expect(created?.id).not.toBe(full.id);
    });

    it('should use the default window for types without a rule', async () => {
      const short = new NotificationService({ defaultGroupWindowMinutes: 1 }, { store, channelLayer });
      sync.createNotification({
        recipient: bob,
        notificationType: 'post_commented',
        title: 'Comment',
        message: 'first',
        groupKey: 'comments_9',
        at: new Date(Date.now() - 5 * 60 * 1000),
      });

      const created = await short.createAndSendNotification({
        recipient: bob,
        notificationType: 'post_commented',
        title: 'Comment',
        message: 'second',
        groupKey: 'comments_9',
      });

      expect(created?.groupCount).toBe(1);
    });

    it('should hand email preferences to the fallback notifier', async () => {
      const deliver = vi.fn<FallbackNotifier['deliver']>().mockResolvedValue(undefined);
      const withFallback = new NotificationService({}, { store, channelLayer, fallbackNotifier: { deliver } });
      sync.saveNotificationPreference({ userId: bob.id, notificationType: 'new_follower', deliveryMethod: 'email' });
      const received = await captureGroup(channelLayer, 'user_2');

      const created = await withFallback.createAndSendNotification({
        recipient: bob,
        notificationType: 'new_follower',
        title: 'New Follower',
        message: 'alice started following you',
      });

      expect(deliver).toHaveBeenCalledTimes(1);
      expect(deliver.mock.calls[0]?.[0].id).toBe(created?.id);
      expect(received).toEqual([]);
    });

    it('should return null when the store fails', async () => {
      vi.spyOn(store, 'createNotification').mockRejectedValueOnce(new Error('disk full'));
      const created = await notifications.createAndSendNotification({
        recipient: bob,
        notificationType: 'mention',
        title: 't',
        message: 'm',
      });
      expect(created).toBeNull();
    });
  });

  describe('notifyNewMessage', () => {
    it('should preview long messages and group per conversation', async () => {
      const { message } = sync.createMessage({ sender: alice, recipient: bob, content: 'x'.repeat(150) });

      const created = await notifications.notifyNewMessage(alice, bob, message);

      expect(created?.message).toBe(`alice: ${'x'.repeat(100)}...`);
      expect(created?.groupKey).toBe('messages_1_2');
      expect(created?.actionUrl).toBe('/messages/chat/alice/');
    });

    it('should cut previews between characters, not inside an emoji', async () => {
      const long = sync.createMessage({ sender: alice, recipient: bob, content: `a${'😀'.repeat(120)}` });
      const exact = sync.createMessage({ sender: carol, recipient: bob, content: '😀'.repeat(100) });

      const cut = await notifications.notifyNewMessage(alice, bob, long.message);
      const whole = await notifications.notifyNewMessage(carol, bob, exact.message);

      expect(cut?.message).toBe(`alice: a${'😀'.repeat(99)}...`);
      expect(whole?.message).toBe(`carol: ${'😀'.repeat(100)}`);
    });
  });

  describe('reading', () => {
    it('should mark one notification read and push a badge update', async () => {
      const first = await notifications.createAndSendNotification({
        recipient: bob,
        notificationType: 'mention',
        title: 'a',
        message: 'a',
      });
      await notifications.createAndSendNotification({ recipient: bob, notificationType: 'mention', title: 'b', message: 'b' });
      const received = await captureGroup(channelLayer, 'user_2');

      await expect(notifications.markNotificationRead(first?.id ?? 0, bob.id)).resolves.toBe(true);

      expect(received).toHaveLength(1);
      expect(received[0]).toMatchObject({ type: 'badge_update', payload: { unread_count: 1 } });
    });

    it('should refuse to mark another user notification', async () => {
      const created = await notifications.createAndSendNotification({
        recipient: bob,
        notificationType: 'mention',
        title: 'a',
        message: 'a',
      });
      await expect(notifications.markNotificationRead(created?.id ?? 0, carol.id)).resolves.toBe(false);
    });

    it('should mark all read, optionally by type', async () => {
      for (const type of ['mention', 'mention', 'new_follower'] as const) {
        await notifications.createAndSendNotification({ recipient: bob, notificationType: type, title: 't', message: 'm' });
      }

      await expect(notifications.markAllRead(bob.id, 'mention')).resolves.toBe(2);
      await expect(notifications.getUnreadCount(bob.id)).resolves.toBe(1);
      await expect(notifications.markAllRead(bob.id)).resolves.toBe(1);
    });

    it('should page notifications newest first', async () => {
      sync.createNotification({ recipient: bob, notificationType: 'mention', title: 'old', message: 'm', at: daysAgo(2) });
      sync.createNotification({ recipient: bob, notificationType: 'mention', title: 'new', message: 'm', at: daysAgo(1) });

      const page = await notifications.getNotifications(bob.id, { limit: 1 });
      expect(page.map((item) => item.title)).toEqual(['new']);
      const unread = await notifications.getNotifications(bob.id, { unreadOnly: true, offset: 1 });
      expect(unread.map((item) => item.title)).toEqual(['old']);
    });
  });

  describe('cleanupOldNotifications', () => {
    it('should delete only read notifications past retention', async () => {
      const oldRead = sync.createNotification({ recipient: bob, notificationType: 'mention', title: 'a', message: 'm', at: daysAgo(40) });
      sync.markNotificationRead(oldRead.id, bob.id, new Date());
      sync.createNotification({ recipient: bob, notificationType: 'mention', title: 'b', message: 'm', at: daysAgo(40) });
      const recentRead = sync.createNotification({ recipient: bob, notificationType: 'mention', title: 'c', message: 'm', at: daysAgo(5) });
      sync.markNotificationRead(recentRead.id, bob.id, new Date());

      await expect(notifications.cleanupOldNotifications()).resolves.toBe(1);
      expect(sync.getNotification(oldRead.id)).toBeNull();
    });
  });

  describe('helpers', () => {
    it('should handle quiet hours that wrap midnight', () => {
      const preference = { ...defaultPreference(bob.id, 'mention'), quietHoursStart: 22 * 60, quietHoursEnd: 7 * 60 };
      expect(isInQuietHours(preference, new Date(2024, 0, 1, 23, 30))).toBe(true);
      expect(isInQuietHours(preference, new Date(2024, 0, 1, 6, 0))).toBe(true);
      expect(isInQuietHours(preference, new Date(2024, 0, 1, 12, 0))).toBe(false);
      expect(isInQuietHours(defaultPreference(bob.id, 'mention'))).toBe(false);
    });

    it('should fill group templates', () => {
      expect(formatGroupMessage('{count} new messages from {sender}', 3, alice)).toBe('3 new messages from alice');
    });
  });
});
