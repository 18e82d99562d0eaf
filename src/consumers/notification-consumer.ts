/**
 * Notification Consumer
 *
 * Session for `/ws/notifications/`: pushes realtime notifications and badge
 * counts from the user's personal group and answers list/mark-read requests.
 */

import { userGroupName } from '../channels/index.js';
import type { MessagingCore } from '../core.js';
import type { ChannelEvent } from '../serialization/frames.js';
import { errorFrame, nowIso } from '../serialization/serializers.js';
import type { UserRef } from '../types/index.js';
import type { ConnectionScopeResult, InboundFrame } from '../validation/connection-validator.js';
import { BaseConsumer, type ConsumerSocket } from './base-consumer.js';

export class NotificationConsumer extends BaseConsumer {
  constructor(core: MessagingCore, socket: ConsumerSocket) {
    super(core, socket, 'notifications');
  }

  protected async open(user: UserRef, scope: ConnectionScopeResult): Promise<boolean> {
    await this.joinGroup(userGroupName(user.id));
    this.accept();

    this.connectionId = await this.core.presence.userConnected(user, {
      route: 'notifications',
      userAgent: scope.headers['user-agent'] ?? null,
    });

    this.sendFrame({
      type: 'badge_update',
      unread_count: await this.core.notifications.getUnreadCount(user.id),
      timestamp: nowIso(),
    });
    return true;
  }

  protected async handleFrame(user: UserRef, frame: InboundFrame): Promise<void> {
    switch (frame.type) {
      case 'mark_read': {
        const success = await this.core.notifications.markNotificationRead(frame.notificationId, user.id);
        this.sendFrame({ type: 'mark_read_response', notification_id: frame.notificationId, success });
        return;
      }
      case 'mark_all_read': {
        const marked = await this.core.notifications.markAllRead(user.id, frame.notificationType);
        this.sendFrame({ type: 'mark_all_read_response', marked_count: marked });
        return;
      }
      case 'get_notifications': {
        const notifications = await this.core.notifications.getNotifications(user.id, {
          limit: frame.limit,
          offset: frame.offset,
          unreadOnly: frame.unreadOnly,
          notificationType: frame.notificationType,
        });
        this.sendFrame({
          type: 'notifications_list',
          notifications,
          limit: frame.limit,
          offset: frame.offset,
          unread_count: await this.core.notifications.getUnreadCount(user.id),
        });
        return;
      }
      case 'ping':
        if (this.connectionId) {
          await this.core.presence.updateHeartbeat(user.id, this.connectionId);
        }
        this.sendFrame({ type: 'pong', timestamp: frame.timestamp ?? nowIso() });
        return;
      default:
        this.sendFrame(errorFrame(`Unsupported message type for notifications: ${frame.type}`));
    }
  }

  protected handleEvent(_user: UserRef, event: ChannelEvent): Promise<void> {
    if (event.type === 'notification_message' || event.type === 'badge_update') {
      this.sendFrame(event.payload);
    }
    return Promise.resolve();
  }

  protected async teardown(user: UserRef): Promise<void> {
    const connectionId = this.connectionId;
    if (!connectionId) return;
    this.connectionId = null;
    await this.safely('presence_disconnect', async () => {
      await this.core.presence.userDisconnected(user, connectionId);
    });
  }
}
