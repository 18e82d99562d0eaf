/**
 * In-Memory Messaging Store
 *
 * Synchronous `SyncMessagingStore` backed by Maps. Counter updates happen in
 * a single synchronous step, so concurrent connects and disconnects cannot
 * interleave inside them. Entities are cloned on the way in and out.
 */

import type {
  CreateErrorRecordInput,
  CreateMessageInput,
  CreateMessageResult,
  CreateNotificationInput,
  CreateQueuedMessageInput,
  Message,
  MessagingErrorRecord,
  MessageStatus,
  Notification,
  NotificationPatch,
  NotificationPreference,
  NotificationPreferenceInput,
  NotificationQuery,
  NotificationType,
  PendingQueuedLookup,
  QueueCounts,
  QueuedMessage,
  QueuedMessagePatch,
  QueuePriority,
  StatusTransitionResult,
  SyncMessagingStore,
  TypingStatus,
  TypingUpdateResult,
  UserId,
  UserRef,
  UserStatus,
  UserStatusQuery,
} from '../types/index.js';
import { applyStatusTransition, isExpired } from './index.js';

function clone<T>(value: T): T {
  return structuredClone(value);
}

function byCreatedAt(a: { createdAt: Date; id: number }, b: { createdAt: Date; id: number }): number {
  return a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id;
}

const PRIORITY_KEYS = { 1: '1', 2: '2', 3: '3' } as const satisfies Record<QueuePriority, string>;

function byQueueOrder(a: QueuedMessage, b: QueuedMessage): number {
  return a.priority - b.priority || byCreatedAt(a, b);
}

export class InMemoryMessagingStore implements SyncMessagingStore {
  private users = new Map<UserId, UserRef>();
  private messages = new Map<number, Message>();
  private queued = new Map<number, QueuedMessage>();
  private notifications = new Map<number, Notification>();
  private preferences = new Map<string, NotificationPreference>();
  private statuses = new Map<UserId, UserStatus>();
  private typing = new Map<string, TypingStatus>();
  private errorRecords = new Map<number, MessagingErrorRecord>();
  private sequences = { message: 0, queued: 0, notification: 0, error: 0 };

  // Users

  saveUser(user: UserRef): UserRef {
    this.users.set(user.id, clone(user));
    return clone(user);
  }

  getUser(id: UserId): UserRef | null {
    const user = this.users.get(id);
    return user ? clone(user) : null;
  }

  findUserByUsername(username: string): UserRef | null {
    for (const user of this.users.values()) {
      if (user.username === username) return clone(user);
    }
    return null;
  }

  // Messages

  createMessage(input: CreateMessageInput): CreateMessageResult {
    const clientId = input.clientId ?? null;
    if (clientId !== null) {
      for (const existing of this.messages.values()) {
        if (existing.sender.id === input.sender.id && existing.clientId === clientId) {
          return { message: clone(existing), created: false };
        }
      }
    }

    const at = input.at ?? new Date();
    const status: MessageStatus = input.status ?? 'sent';
    const message: Message = {
      id: ++this.sequences.message,
      sender: clone(input.sender),
      recipient: clone(input.recipient),
      content: input.content,
      clientId,
      status,
      isRead: status === 'read',
      createdAt: at,
      sentAt: status === 'pending' ? null : at,
      deliveredAt: status === 'delivered' || status === 'read' ? at : null,
      readAt: status === 'read' ? at : null,
      failedAt: null,
      retryCount: 0,
      lastError: null,
    };
    this.messages.set(message.id, message);
    return { message: clone(message), created: true };
  }

  getMessage(id: number): Message | null {
    const message = this.messages.get(id);
    return message ? clone(message) : null;
  }

  getConversation(userA: UserId, userB: UserId, limit: number): Message[] {
    const conversation = [...this.messages.values()]
      .filter(
        (m) =>
          (m.sender.id === userA && m.recipient.id === userB) ||
          (m.sender.id === userB && m.recipient.id === userA),
      )
      .sort(byCreatedAt);
    return conversation.slice(Math.max(0, conversation.length - limit)).map(clone);
  }

  getMessagesForRecipient(recipientId: UserId, since: Date, limit: number): Message[] {
    return [...this.messages.values()]
      .filter((m) => m.recipient.id === recipientId && m.createdAt.getTime() >= since.getTime())
      .sort(byCreatedAt)
      .slice(0, limit)
      .map(clone);
  }

  getStatusUpdatesForSender(senderId: UserId, since: Date, limit: number): Message[] {
    const sinceMs = since.getTime();
    return [...this.messages.values()]
      .filter(
        (m) =>
          m.sender.id === senderId &&
          ((m.deliveredAt !== null && m.deliveredAt.getTime() >= sinceMs) ||
            (m.readAt !== null && m.readAt.getTime() >= sinceMs)),
      )
      .sort(byCreatedAt)
      .slice(0, limit)
      .map(clone);
  }

  getUnreadMessageIds(recipientId: UserId, senderId: UserId): number[] {
    return [...this.messages.values()]
      .filter((m) => m.recipient.id === recipientId && m.sender.id === senderId && !m.isRead)
      .sort(byCreatedAt)
      .map((m) => m.id);
  }

  transitionMessageStatus(
    id: number,
    status: MessageStatus,
    at: Date,
    error?: string,
  ): StatusTransitionResult | null {
    const current = this.messages.get(id);
    if (!current) return null;

    const next = applyStatusTransition(current, status, at, error);
    if (!next) {
      return { message: clone(current), changed: false };
    }
    this.messages.set(id, next);
    return { message: clone(next), changed: true };
  }

  markMessageRead(id: number, readAt: Date): boolean {
    return this.transitionMessageStatus(id, 'read', readAt)?.changed ?? false;
  }

  markMessageDelivered(id: number, deliveredAt: Date): boolean {
    return this.transitionMessageStatus(id, 'delivered', deliveredAt)?.changed ?? false;
  }

  // Offline queue

  createQueuedMessage(input: CreateQueuedMessageInput): QueuedMessage {
    const entry: QueuedMessage = {
      id: ++this.sequences.queued,
      sender: clone(input.sender),
      recipient: clone(input.recipient),
      content: input.content,
      clientId: input.clientId,
      queueType: input.queueType,
      priority: input.priority,
      createdAt: input.at ?? new Date(),
      expiresAt: input.expiresAt,
      nextRetryAt: input.nextRetryAt ?? null,
      lastRetryAt: null,
      retryCount: input.retryCount ?? 0,
      maxRetries: input.maxRetries,
      lastError: '',
      errorCount: 0,
      isProcessed: false,
      processedAt: null,
      originalMessageId: input.originalMessageId ?? null,
    };
    this.queued.set(entry.id, entry);
    return clone(entry);
  }

  getQueuedMessage(id: number): QueuedMessage | null {
    const entry = this.queued.get(id);
    return entry ? clone(entry) : null;
  }

  findPendingQueuedMessage(lookup: PendingQueuedLookup): QueuedMessage | null {
    for (const entry of this.queued.values()) {
      if (
        !entry.isProcessed &&
        entry.sender.id === lookup.senderId &&
        entry.clientId === lookup.clientId &&
        (lookup.recipientId === undefined || entry.recipient.id === lookup.recipientId) &&
        (lookup.queueType === undefined || entry.queueType === lookup.queueType)
      ) {
        return clone(entry);
      }
    }
    return null;
  }

  listDeliverableQueuedMessages(recipientId: UserId, now: Date): QueuedMessage[] {
    return [...this.queued.values()]
      .filter((q) => q.recipient.id === recipientId && !q.isProcessed && !isExpired(q.expiresAt, now))
      .sort(byQueueOrder)
      .map(clone);
  }

  listPendingOutgoingMessages(senderId: UserId, now: Date): QueuedMessage[] {
    return [...this.queued.values()]
      .filter(
        (q) =>
          q.sender.id === senderId &&
          !q.isProcessed &&
          (q.queueType === 'outgoing' || q.queueType === 'retry') &&
          !isExpired(q.expiresAt, now),
      )
      .sort(byCreatedAt)
      .map(clone);
  }

  listPendingRetries(now: Date, limit: number): QueuedMessage[] {
    return [...this.queued.values()]
      .filter(
        (q) =>
          !q.isProcessed &&
          q.nextRetryAt !== null &&
          q.nextRetryAt.getTime() <= now.getTime() &&
          q.retryCount < q.maxRetries,
      )
      .sort(
        (a, b) =>
          a.priority - b.priority ||
          (a.nextRetryAt?.getTime() ?? 0) - (b.nextRetryAt?.getTime() ?? 0) ||
          a.id - b.id,
      )
      .slice(0, limit)
      .map(clone);
  }

  updateQueuedMessage(id: number, patch: QueuedMessagePatch): QueuedMessage | null {
    const current = this.queued.get(id);
    if (!current) return null;
    const next: QueuedMessage = { ...current, ...patch };
    this.queued.set(id, next);
    return clone(next);
  }

  deleteExpiredQueuedMessages(now: Date): number {
    let removed = 0;
    for (const [id, entry] of this.queued) {
      if (entry.expiresAt.getTime() < now.getTime()) {
        this.queued.delete(id);
        removed++;
      }
    }
    return removed;
  }

  countQueuedMessages(userId: UserId | null, now: Date): QueueCounts {
    const counts: QueueCounts = {
      totalQueued: 0,
      totalProcessed: 0,
      byQueueType: { outgoing: 0, incoming: 0, retry: 0 },
      byPriority: { '1': 0, '2': 0, '3': 0 },
      pendingRetries: 0,
      expiredMessages: 0,
    };

    for (const entry of this.queued.values()) {
      const isDue =
        !entry.isProcessed &&
        entry.nextRetryAt !== null &&
        entry.nextRetryAt.getTime() <= now.getTime() &&
        entry.retryCount < entry.maxRetries;
      if (isDue) counts.pendingRetries++;

      if (userId !== null && entry.sender.id !== userId && entry.recipient.id !== userId) {
        continue;
      }
      if (entry.isProcessed) {
        counts.totalProcessed++;
      } else {
        counts.totalQueued++;
        counts.byQueueType[entry.queueType]++;
        counts.byPriority[PRIORITY_KEYS[entry.priority]]++;
      }
      if (entry.expiresAt.getTime() < now.getTime()) counts.expiredMessages++;
    }
    return counts;
  }

  // Notifications

  createNotification(input: CreateNotificationInput): Notification {
    const notification: Notification = {
      id: ++this.sequences.notification,
      recipient: clone(input.recipient),
      sender: input.sender ? clone(input.sender) : null,
      notificationType: input.notificationType,
      title: input.title,
      message: input.message,
      priority: input.priority ?? 'normal',
      actionUrl: input.actionUrl ?? null,
      groupKey: input.groupKey ?? null,
      isGrouped: Boolean(input.groupKey),
      groupCount: 1,
      isRead: false,
      readAt: null,
      isDelivered: false,
      deliveredAt: null,
      createdAt: input.at ?? new Date(),
    };
    this.notifications.set(notification.id, notification);
    return clone(notification);
  }

  getNotification(id: number): Notification | null {
    const notification = this.notifications.get(id);
    return notification ? clone(notification) : null;
  }

  findGroupedNotification(recipientId: UserId, groupKey: string, since: Date): Notification | null {
    let latest: Notification | null = null;
    for (const n of this.notifications.values()) {
      if (
        n.recipient.id === recipientId &&
        n.groupKey === groupKey &&
        n.isGrouped &&
        n.createdAt.getTime() >= since.getTime() &&
        (latest === null || n.createdAt.getTime() > latest.createdAt.getTime())
      ) {
        latest = n;
      }
    }
    return latest ? clone(latest) : null;
  }

  updateNotification(id: number, patch: NotificationPatch): Notification | null {
    const current = this.notifications.get(id);
    if (!current) return null;
    const next: Notification = { ...current, ...patch };
    this.notifications.set(id, next);
    return clone(next);
  }

  listNotifications(recipientId: UserId, query: NotificationQuery): Notification[] {
    return [...this.notifications.values()]
      .filter(
        (n) =>
          n.recipient.id === recipientId &&
          (!query.notificationType || n.notificationType === query.notificationType) &&
          (!query.unreadOnly || !n.isRead),
      )
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .slice(query.offset, query.offset + query.limit)
      .map(clone);
  }

  countUnreadNotifications(recipientId: UserId): number {
    let count = 0;
    for (const n of this.notifications.values()) {
      if (n.recipient.id === recipientId && !n.isRead) count++;
    }
    return count;
  }

  markNotificationRead(id: number, recipientId: UserId, readAt: Date): boolean {
    const current = this.notifications.get(id);
    if (!current || current.recipient.id !== recipientId) return false;
    if (!current.isRead) {
      this.notifications.set(id, { ...current, isRead: true, readAt });
    }
    return true;
  }

  markAllNotificationsRead(
    recipientId: UserId,
    readAt: Date,
    notificationType?: string | null,
  ): number {
    let marked = 0;
    for (const [id, n] of this.notifications) {
      if (
        n.recipient.id === recipientId &&
        !n.isRead &&
        (!notificationType || n.notificationType === notificationType)
      ) {
        this.notifications.set(id, { ...n, isRead: true, readAt });
        marked++;
      }
    }
    return marked;
  }

  deleteReadNotificationsBefore(cutoff: Date): number {
    let removed = 0;
    for (const [id, n] of this.notifications) {
      if (n.isRead && n.createdAt.getTime() < cutoff.getTime()) {
        this.notifications.delete(id);
        removed++;
      }
    }
    return removed;
  }

  getNotificationPreference(userId: UserId, type: NotificationType): NotificationPreference | null {
    const preference = this.preferences.get(`${String(userId)}:${type}`);
    return preference ? clone(preference) : null;
  }

  saveNotificationPreference(input: NotificationPreferenceInput): NotificationPreference {
    const key = `${String(input.userId)}:${input.notificationType}`;
    const current = this.preferences.get(key);
    const preference: NotificationPreference = {
      userId: input.userId,
      notificationType: input.notificationType,
      deliveryMethod: input.deliveryMethod ?? current?.deliveryMethod ?? 'realtime',
      isEnabled: input.isEnabled ?? current?.isEnabled ?? true,
      quietHoursStart:
        input.quietHoursStart !== undefined ? input.quietHoursStart : current?.quietHoursStart ?? null,
      quietHoursEnd:
        input.quietHoursEnd !== undefined ? input.quietHoursEnd : current?.quietHoursEnd ?? null,
    };
    this.preferences.set(key, preference);
    return clone(preference);
  }

  // Presence

  getUserStatus(userId: UserId): UserStatus | null {
    const status = this.statuses.get(userId);
    return status ? clone(status) : null;
  }

  private getOrCreateStatus(user: UserRef, at: Date): UserStatus {
    const existing = this.statuses.get(user.id);
    if (existing) return existing;
    const created: UserStatus = {
      user: clone(user),
      isOnline: false,
      activeConnections: 0,
      lastSeen: at,
      lastPing: null,
      connectionId: null,
      deviceInfo: {},
    };
    this.statuses.set(user.id, created);
    return created;
  }

  incrementConnections(
    user: UserRef,
    connectionId: string,
    deviceInfo: Record<string, unknown>,
    at: Date,
  ): UserStatus {
    const status = this.getOrCreateStatus(user, at);
    status.activeConnections += 1;
    status.isOnline = true;
    status.lastSeen = at;
    status.lastPing = status.lastPing && status.lastPing.getTime() > at.getTime() ? status.lastPing : at;
    status.connectionId = connectionId;
    status.deviceInfo = clone(deviceInfo);
    return clone(status);
  }

  decrementConnections(user: UserRef, at: Date): UserStatus {
    const status = this.getOrCreateStatus(user, at);
    status.activeConnections = Math.max(0, status.activeConnections - 1);
    status.isOnline = status.activeConnections > 0;
    status.lastSeen = at;
    if (!status.isOnline) status.connectionId = null;
    return clone(status);
  }

  touchUserStatus(userId: UserId, at: Date): UserStatus | null {
    const status = this.statuses.get(userId);
    if (!status) return null;
    if (!status.lastPing || status.lastPing.getTime() < at.getTime()) {
      status.lastPing = at;
    }
    return clone(status);
  }

  resetStaleUserStatuses(cutoff: Date, at: Date): UserStatus[] {
    const reset: UserStatus[] = [];
    for (const status of this.statuses.values()) {
      const stale = status.lastPing === null || status.lastPing.getTime() < cutoff.getTime();
      if (status.isOnline && stale) {
        status.isOnline = false;
        status.activeConnections = 0;
        status.connectionId = null;
        status.lastSeen = at;
        reset.push(clone(status));
      }
    }
    return reset;
  }

  forceUserOffline(userId: UserId, at: Date): UserStatus | null {
    const status = this.statuses.get(userId);
    if (!status) return null;
    status.isOnline = false;
    status.activeConnections = 0;
    status.connectionId = null;
    status.lastSeen = at;
    return clone(status);
  }

  listUserStatuses(query: UserStatusQuery = {}): UserStatus[] {
    const statuses = [...this.statuses.values()]
      .filter((s) => !query.onlineOnly || s.isOnline)
      .sort((a, b) => (b.lastPing?.getTime() ?? 0) - (a.lastPing?.getTime() ?? 0));
    return (query.limit === undefined ? statuses : statuses.slice(0, query.limit)).map(clone);
  }

  // Typing

  upsertTypingStatus(
    user: UserRef,
    partner: UserRef,
    isTyping: boolean,
    at: Date,
  ): TypingUpdateResult {
    const key = `${String(user.id)}:${String(partner.id)}`;
    const existing = this.typing.get(key);
    if (existing) {
      const changed = existing.isTyping !== isTyping;
      existing.isTyping = isTyping;
      existing.lastUpdated = at;
      return { status: clone(existing), changed };
    }
    const created: TypingStatus = {
      user: clone(user),
      chatPartner: clone(partner),
      isTyping,
      lastUpdated: at,
    };
    this.typing.set(key, created);
    return { status: clone(created), changed: isTyping };
  }

  listTypingToward(partnerId: UserId): TypingStatus[] {
    return [...this.typing.values()]
      .filter((t) => t.chatPartner.id === partnerId && t.isTyping)
      .map(clone);
  }

  resetStaleTypingStatuses(cutoff: Date, at: Date): TypingStatus[] {
    const reset: TypingStatus[] = [];
    for (const status of this.typing.values()) {
      if (status.isTyping && status.lastUpdated.getTime() < cutoff.getTime()) {
        status.isTyping = false;
        status.lastUpdated = at;
        reset.push(clone(status));
      }
    }
    return reset;
  }

  // Error audit log

  createErrorRecord(input: CreateErrorRecordInput): MessagingErrorRecord {
    const record: MessagingErrorRecord = {
      id: ++this.sequences.error,
      errorType: input.errorType,
      message: input.message,
      severity: input.severity,
      context: clone(input.context),
      userId: input.userId ?? null,
      createdAt: input.at ?? new Date(),
      resolved: false,
      resolvedAt: null,
      resolutionNotes: '',
    };
    this.errorRecords.set(record.id, record);
    return clone(record);
  }

  resolveErrorRecord(id: number, notes: string, at: Date): boolean {
    const record = this.errorRecords.get(id);
    if (!record) return false;
    this.errorRecords.set(id, { ...record, resolved: true, resolvedAt: at, resolutionNotes: notes });
    return true;
  }

  listErrorRecords(query: { resolved?: boolean; limit?: number } = {}): MessagingErrorRecord[] {
    const records = [...this.errorRecords.values()]
      .filter((r) => query.resolved === undefined || r.resolved === query.resolved)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id);
    return (query.limit === undefined ? records : records.slice(0, query.limit)).map(clone);
  }

  ping(): boolean {
    return true;
  }
}
