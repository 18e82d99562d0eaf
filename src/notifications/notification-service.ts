/**
 * Notification Service
 *
 * Creates notifications, folds repeats into a group inside a per-type window,
 * and dispatches them according to the recipient's preference: realtime and
 * push go to the user's group on the channel layer, email goes to the
 * fallback notifier.
 */

import type { ChannelLayer } from '../channels/channel-layer.js';
import { userGroupName } from '../channels/channel-layer.js';
import type { NotificationsConfig } from '../types/config.js';
import type {
  Message,
  MessagingStore,
  Notification,
  NotificationPreference,
  NotificationPriority,
  NotificationType,
  StructuredLogger,
  UserId,
  UserRef,
} from '../types/index.js';
import {
  MAX_NOTIFICATION_TITLE_LENGTH,
  NullLogger,
  characterLength,
  toError,
  truncateCharacters,
} from '../types/index.js';
import type { NotificationListItem } from '../serialization/frames.js';
import { nowIso, serializeNotification, serializeNotificationListItem } from '../serialization/serializers.js';
import { notificationsCounter } from '../metrics/index.js';

export const DEFAULT_NOTIFICATIONS_CONFIG: NotificationsConfig = {
  defaultGroupWindowMinutes: 60,
  retentionDays: 30,
};

export interface GroupingRule {
  windowMinutes: number;
  maxGroupSize: number;
  /** `{count}` and `{sender}` are substituted */
  template: string;
}

export const GROUPING_RULES: Partial<Record<NotificationType, GroupingRule>> = {
  connection_request: { windowMinutes: 24 * 60, maxGroupSize: 10, template: '{count} new connection requests' },
  post_liked: { windowMinutes: 6 * 60, maxGroupSize: 20, template: '{count} people liked your post' },
  new_follower: { windowMinutes: 12 * 60, maxGroupSize: 15, template: '{count} new followers' },
  job_application: { windowMinutes: 48 * 60, maxGroupSize: 5, template: '{count} new job applications' },
  new_message: { windowMinutes: 60, maxGroupSize: 5, template: '{count} new messages from {sender}' },
};

const MESSAGE_PREVIEW_LENGTH = 100;

/**
 * Delivery outside the socket layer (email and the like)
 */
export interface FallbackNotifier {
  deliver(notification: Notification, preference: NotificationPreference): Promise<void>;
}

export interface NotificationServiceDependencies {
  store: MessagingStore;
  channelLayer: ChannelLayer;
  logger?: StructuredLogger;
  fallbackNotifier?: FallbackNotifier;
}

export interface CreateNotificationRequest {
  recipient: UserRef;
  notificationType: NotificationType;
  title: string;
  message: string;
  sender?: UserRef | null;
  priority?: NotificationPriority;
  actionUrl?: string | null;
  groupKey?: string | null;
}

export interface NotificationListOptions {
  limit?: number;
  offset?: number;
  notificationType?: string | null;
  unreadOnly?: boolean;
}

/**
 * Quiet hours hold minutes since local midnight; a start after the end wraps
 */
export function isInQuietHours(preference: NotificationPreference, now: Date = new Date()): boolean {
  const { quietHoursStart: start, quietHoursEnd: end } = preference;
  if (start === null || end === null) return false;
  const minute = now.getHours() * 60 + now.getMinutes();
  if (start <= end) return minute >= start && minute <= end;
  return minute >= start || minute <= end;
}

export function defaultPreference(userId: UserId, notificationType: NotificationType): NotificationPreference {
  return {
    userId,
    notificationType,
    deliveryMethod: 'realtime',
    isEnabled: true,
    quietHoursStart: null,
    quietHoursEnd: null,
  };
}

export function formatGroupMessage(template: string, count: number, sender: UserRef | null | undefined): string {
  return template.replace('{count}', String(count)).replace('{sender}', sender?.username ?? 'someone');
}

export class NotificationService {
  private config: NotificationsConfig;
  private store: MessagingStore;
  private channelLayer: ChannelLayer;
  private logger: StructuredLogger;
  private fallbackNotifier: FallbackNotifier | null;

  constructor(config: Partial<NotificationsConfig>, deps: NotificationServiceDependencies) {
    this.config = { ...DEFAULT_NOTIFICATIONS_CONFIG, ...config };
    this.store = deps.store;
    this.channelLayer = deps.channelLayer;
    this.logger = deps.logger ?? new NullLogger();
    this.fallbackNotifier = deps.fallbackNotifier ?? null;
  }

  /**
   * Create (or fold into a group) and dispatch; null when suppressed or failed
   */
  async createAndSendNotification(request: CreateNotificationRequest): Promise<Notification | null> {
    const { recipient, notificationType } = request;
    const priority = request.priority ?? 'normal';
    try {
      const preference =
        (await this.store.getNotificationPreference(recipient.id, notificationType)) ??
        defaultPreference(recipient.id, notificationType);

      if (!preference.isEnabled) {
        notificationsCounter.inc({ outcome: 'disabled' });
        this.logger.debug('Notification disabled by preference', {
          userId: recipient.id,
          notificationType,
          action: 'notification_disabled',
        });
        return null;
      }
      if (isInQuietHours(preference) && priority !== 'high' && priority !== 'urgent') {
        notificationsCounter.inc({ outcome: 'quiet_hours' });
        this.logger.debug('Notification skipped in quiet hours', {
          userId: recipient.id,
          notificationType,
          action: 'notification_quiet_hours',
        });
        return null;
      }

      const notification = await this.persist(request, priority);
      await this.dispatch(notification, preference);

      const delivered = await this.store.updateNotification(notification.id, {
        isDelivered: true,
        deliveredAt: new Date(),
      });
      this.logger.info('Notification sent', {
        notificationId: notification.id,
        userId: recipient.id,
        notificationType,
        groupCount: notification.groupCount,
        action: 'notification_sent',
      });
      return delivered ?? notification;
    } catch (error) {
      notificationsCounter.inc({ outcome: 'failed' });
      this.logger.error('Failed to create notification', toError(error), {
        userId: recipient.id,
        notificationType,
        action: 'notification_failed',
      });
      return null;
    }
  }

  /**
   * New-message notification with a preview, grouped per conversation
   */
  async notifyNewMessage(sender: UserRef, recipient: UserRef, message: Message): Promise<Notification | null> {
    const preview =
      characterLength(message.content) > MESSAGE_PREVIEW_LENGTH
        ? `${truncateCharacters(message.content, MESSAGE_PREVIEW_LENGTH)}...`
        : message.content;
    return this.createAndSendNotification({
      recipient,
      sender,
      notificationType: 'new_message',
      title: 'New Message',
      message: `${sender.username}: ${preview}`,
      actionUrl: `/messages/chat/${sender.username}/`,
      groupKey: `messages_${String(sender.id)}_${String(recipient.id)}`,
    });
  }

  async markNotificationRead(notificationId: number, userId: UserId): Promise<boolean> {
    try {
      const marked = await this.store.markNotificationRead(notificationId, userId, new Date());
      if (!marked) {
        this.logger.warn('Notification not found for user', {
          notificationId,
          userId,
          action: 'notification_mark_read_missing',
        });
        return false;
      }
      await this.sendBadgeUpdate(userId);
      return true;
    } catch (error) {
      this.logger.error('Failed to mark notification read', toError(error), {
        notificationId,
        userId,
        action: 'notification_mark_read_failed',
      });
      return false;
    }
  }

  async markAllRead(userId: UserId, notificationType: string | null = null): Promise<number> {
    try {
      const count = await this.store.markAllNotificationsRead(userId, new Date(), notificationType);
      await this.sendBadgeUpdate(userId);
      this.logger.info('Marked notifications read', { userId, count, notificationType, action: 'notification_mark_all' });
      return count;
    } catch (error) {
      this.logger.error('Failed to mark all notifications read', toError(error), {
        userId,
        action: 'notification_mark_all_failed',
      });
      return 0;
    }
  }

  /**
   * Newest first
   */
  async getNotifications(userId: UserId, options: NotificationListOptions = {}): Promise<NotificationListItem[]> {
    try {
      const notifications = await this.store.listNotifications(userId, {
        limit: options.limit ?? 20,
        offset: options.offset ?? 0,
        notificationType: options.notificationType ?? null,
        unreadOnly: options.unreadOnly ?? false,
      });
      return notifications.map(serializeNotificationListItem);
    } catch (error) {
      this.logger.error('Failed to list notifications', toError(error), { userId, action: 'notification_list_failed' });
      return [];
    }
  }

  async getUnreadCount(userId: UserId): Promise<number> {
    try {
      return await this.store.countUnreadNotifications(userId);
    } catch (error) {
      this.logger.error('Failed to count unread notifications', toError(error), {
        userId,
        action: 'notification_count_failed',
      });
      return 0;
    }
  }

  async sendBadgeUpdate(userId: UserId): Promise<void> {
    const unreadCount = await this.getUnreadCount(userId);
    try {
      await this.channelLayer.groupSend(userGroupName(userId), {
        type: 'badge_update',
        payload: { type: 'badge_update', unread_count: unreadCount, timestamp: nowIso() },
      });
    } catch (error) {
      this.logger.warn('Badge update failed', {
        userId,
        error: toError(error).message,
        action: 'notification_badge_failed',
      });
    }
  }

  /**
   * Delete read notifications older than `days`; never throws
   */
  async cleanupOldNotifications(days = this.config.retentionDays): Promise<number> {
    try {
      const removed = await this.store.deleteReadNotificationsBefore(new Date(Date.now() - days * 86400 * 1000));
      if (removed > 0) {
        this.logger.info('Removed old notifications', { removed, days, action: 'notification_cleanup' });
      }
      return removed;
    } catch (error) {
      this.logger.error('Failed to clean up notifications', toError(error), { action: 'notification_cleanup_failed' });
      return 0;
    }
  }

  private async persist(request: CreateNotificationRequest, priority: NotificationPriority): Promise<Notification> {
    const now = new Date();
    const title = truncateCharacters(request.title, MAX_NOTIFICATION_TITLE_LENGTH);

    if (request.groupKey) {
      const rule = GROUPING_RULES[request.notificationType];
      const windowMinutes = rule?.windowMinutes ?? this.config.defaultGroupWindowMinutes;
      const existing = await this.store.findGroupedNotification(
        request.recipient.id,
        request.groupKey,
        new Date(now.getTime() - windowMinutes * 60 * 1000),
      );

      if (existing && (!rule || existing.groupCount < rule.maxGroupSize)) {
        const groupCount = existing.groupCount + 1;
        const updated = await this.store.updateNotification(existing.id, {
          groupCount,
          message: rule ? formatGroupMessage(rule.template, groupCount, request.sender) : request.message,
          sender: request.sender ?? existing.sender,
          createdAt: now,
          isRead: false,
          readAt: null,
        });
        if (updated) {
          notificationsCounter.inc({ outcome: 'grouped' });
          return updated;
        }
      }
    }

    notificationsCounter.inc({ outcome: 'created' });
    return this.store.createNotification({
      recipient: request.recipient,
      sender: request.sender ?? null,
      notificationType: request.notificationType,
      title,
      message: request.message,
      priority,
      actionUrl: request.actionUrl ?? null,
      groupKey: request.groupKey ?? null,
      at: now,
    });
  }

  private async dispatch(notification: Notification, preference: NotificationPreference): Promise<void> {
    switch (preference.deliveryMethod) {
      case 'realtime':
      case 'push':
        await this.sendRealtime(notification);
        return;
      case 'email':
        if (!this.fallbackNotifier) return;
        try {
          await this.fallbackNotifier.deliver(notification, preference);
        } catch (error) {
          this.logger.warn('Fallback notification failed', {
            notificationId: notification.id,
            error: toError(error).message,
            action: 'notification_fallback_failed',
          });
        }
        return;
      case 'none':
        return;
    }
  }

  private async sendRealtime(notification: Notification): Promise<void> {
    try {
      const unreadCount = await this.store.countUnreadNotifications(notification.recipient.id);
      await this.channelLayer.groupSend(userGroupName(notification.recipient.id), {
        type: 'notification_message',
        payload: serializeNotification(notification, unreadCount),
      });
    } catch (error) {
      this.logger.warn('Realtime notification failed', {
        notificationId: notification.id,
        error: toError(error).message,
        action: 'notification_realtime_failed',
      });
    }
  }
}
