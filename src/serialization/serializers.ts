/**
 * Serializers
 *
 * Map domain entities to outbound wire frames. Dates are written as ISO-8601
 * strings; absent dates as null.
 */

import type {
  Message,
  MessageStatus,
  Notification,
  QueuedMessage,
  UserRef,
  UserStatus,
} from '../types/index.js';
import type {
  ErrorFrame,
  MessageFrame,
  NotificationFrame,
  NotificationListItem,
  OutboundFrame,
  QueuedMessageFrame,
  UserStatusFrame,
} from './frames.js';

const STATUS_ICONS: Record<MessageStatus, string> = {
  pending: 'clock',
  sent: 'check',
  delivered: 'check-double',
  read: 'check-double-blue',
  failed: 'exclamation-triangle',
};

export function getStatusIcon(status: MessageStatus): string {
  return STATUS_ICONS[status];
}

export function serializeDate(date: Date | null | undefined): string | null {
  if (!date) return null;
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

export function nowIso(): string {
  return new Date().toISOString();
}

export function serializeMessage(
  message: Message,
  extras: { retryId?: string | null; sequenceId?: number } = {},
): MessageFrame {
  const frame: MessageFrame = {
    type: 'message',
    id: message.id,
    sender: message.sender.username,
    sender_id: message.sender.id,
    recipient: message.recipient.username,
    recipient_id: message.recipient.id,
    content: message.content,
    client_id: message.clientId,
    status: message.status,
    status_icon: getStatusIcon(message.status),
    created_at: message.createdAt.toISOString(),
    is_read: message.isRead,
    read_at: serializeDate(message.readAt),
    delivered_at: serializeDate(message.deliveredAt),
  };
  if (extras.retryId !== undefined) frame.retry_id = extras.retryId;
  if (extras.sequenceId !== undefined) frame.sequence_id = extras.sequenceId;
  return frame;
}

export function serializeQueuedMessage(queued: QueuedMessage): QueuedMessageFrame {
  return {
    type: 'queued_message',
    queued_id: queued.id,
    sender: queued.sender.username,
    recipient: queued.recipient.username,
    content: queued.content,
    client_id: queued.clientId,
    queue_type: queued.queueType,
    retry_count: queued.retryCount,
    created_at: queued.createdAt.toISOString(),
  };
}

export function serializeUserStatus(
  user: UserRef,
  status: Pick<UserStatus, 'isOnline' | 'lastSeen'> | null,
): UserStatusFrame {
  return {
    type: 'user_status',
    user_id: user.id,
    username: user.username,
    is_online: status?.isOnline ?? false,
    last_seen: serializeDate(status?.lastSeen),
    timestamp: nowIso(),
  };
}

export function serializeNotification(
  notification: Notification,
  unreadCount: number,
): NotificationFrame {
  return {
    type: 'notification',
    id: notification.id,
    notification_type: notification.notificationType,
    title: notification.title,
    message: notification.message,
    priority: notification.priority,
    sender: notification.sender?.username ?? null,
    created_at: notification.createdAt.toISOString(),
    action_url: notification.actionUrl,
    is_grouped: notification.isGrouped,
    group_count: notification.groupCount,
    unread_count: unreadCount,
  };
}

export function serializeNotificationListItem(notification: Notification): NotificationListItem {
  return {
    id: notification.id,
    notification_type: notification.notificationType,
    title: notification.title,
    message: notification.message,
    priority: notification.priority,
    sender: notification.sender?.username ?? null,
    created_at: notification.createdAt.toISOString(),
    action_url: notification.actionUrl,
    is_grouped: notification.isGrouped,
    group_count: notification.groupCount,
    is_read: notification.isRead,
    read_at: serializeDate(notification.readAt),
  };
}

export function errorFrame(
  error: string,
  extras: Omit<ErrorFrame, 'type' | 'error' | 'timestamp'> = {},
): ErrorFrame {
  return { type: 'error', error, timestamp: nowIso(), ...extras };
}

/**
 * Encode a frame for the wire; never throws
 */
export function toJsonString(frame: OutboundFrame): string {
  try {
    return JSON.stringify(frame);
  } catch {
    return JSON.stringify(errorFrame('Serialization failed'));
  }
}
