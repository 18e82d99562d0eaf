/**
 * Persistence contracts
 *
 * `SyncMessagingStore` is the synchronous store interface, for backends whose
 * calls complete without I/O (the in-memory store). It is never called from a
 * session directly: managers depend on `MessagingStore`, the promise returning
 * mirror produced by the store executor. Backends that do I/O implement
 * `MessagingStore` natively on an async driver.
 */

import type {
  DeliveryMethod,
  Message,
  MessageStatus,
  MessagingErrorRecord,
  Notification,
  NotificationPreference,
  NotificationPriority,
  NotificationType,
  QueuedMessage,
  QueuePriority,
  QueueType,
  TypingStatus,
  UserId,
  UserRef,
  UserStatus,
  ErrorRecordSeverity,
} from './index.js';

export interface CreateMessageInput {
  sender: UserRef;
  recipient: UserRef;
  content: string;
  clientId?: string | null;
  status?: MessageStatus;
  at?: Date;
}

export interface CreateMessageResult {
  message: Message;
  /** False when an existing (sender, clientId) row was returned */
  created: boolean;
}

export interface StatusTransitionResult {
  message: Message;
  changed: boolean;
}

export interface CreateQueuedMessageInput {
  sender: UserRef;
  recipient: UserRef;
  content: string;
  clientId: string | null;
  queueType: QueueType;
  priority: QueuePriority;
  expiresAt: Date;
  maxRetries: number;
  nextRetryAt?: Date | null;
  retryCount?: number;
  originalMessageId?: number | null;
  at?: Date;
}

export interface PendingQueuedLookup {
  senderId: UserId;
  clientId: string;
  recipientId?: UserId;
  queueType?: QueueType;
}

export type QueuedMessagePatch = Partial<
  Pick<
    QueuedMessage,
    | 'retryCount'
    | 'nextRetryAt'
    | 'lastRetryAt'
    | 'lastError'
    | 'errorCount'
    | 'isProcessed'
    | 'processedAt'
  >
>;

export interface QueueCounts {
  totalQueued: number;
  totalProcessed: number;
  byQueueType: Record<QueueType, number>;
  byPriority: Record<`${QueuePriority}`, number>;
  pendingRetries: number;
  expiredMessages: number;
}

export interface CreateNotificationInput {
  recipient: UserRef;
  sender?: UserRef | null;
  notificationType: NotificationType;
  title: string;
  message: string;
  priority?: NotificationPriority;
  actionUrl?: string | null;
  groupKey?: string | null;
  at?: Date;
}

export type NotificationPatch = Partial<
  Pick<
    Notification,
    | 'message'
    | 'title'
    | 'groupCount'
    | 'createdAt'
    | 'isRead'
    | 'readAt'
    | 'isDelivered'
    | 'deliveredAt'
    | 'sender'
  >
>;

export interface NotificationQuery {
  limit: number;
  offset: number;
  notificationType?: string | null;
  unreadOnly?: boolean;
}

export interface NotificationPreferenceInput {
  userId: UserId;
  notificationType: NotificationType;
  deliveryMethod?: DeliveryMethod;
  isEnabled?: boolean;
  quietHoursStart?: number | null;
  quietHoursEnd?: number | null;
}

export interface TypingUpdateResult {
  status: TypingStatus;
  changed: boolean;
}

export interface CreateErrorRecordInput {
  errorType: string;
  message: string;
  severity: ErrorRecordSeverity;
  context: Record<string, unknown>;
  userId?: UserId | null;
  at?: Date;
}

export interface UserStatusQuery {
  onlineOnly?: boolean;
  limit?: number;
}

export interface SyncMessagingStore {
  // Users
  saveUser(user: UserRef): UserRef;
  getUser(id: UserId): UserRef | null;
  findUserByUsername(username: string): UserRef | null;

  // Messages
  createMessage(input: CreateMessageInput): CreateMessageResult;
  getMessage(id: number): Message | null;
  /** Latest `limit` messages between two users, oldest first */
  getConversation(userA: UserId, userB: UserId, limit: number): Message[];
  /** Messages addressed to a user created at or after `since`, oldest first */
  getMessagesForRecipient(recipientId: UserId, since: Date, limit: number): Message[];
  /** Messages sent by a user that were delivered or read at or after `since` */
  getStatusUpdatesForSender(senderId: UserId, since: Date, limit: number): Message[];
  getUnreadMessageIds(recipientId: UserId, senderId: UserId): number[];
  /** Apply a forward-only status transition */
  transitionMessageStatus(
    id: number,
    status: MessageStatus,
    at: Date,
    error?: string,
  ): StatusTransitionResult | null;
  markMessageRead(id: number, readAt: Date): boolean;
  markMessageDelivered(id: number, deliveredAt: Date): boolean;

  // Offline queue
  createQueuedMessage(input: CreateQueuedMessageInput): QueuedMessage;
  getQueuedMessage(id: number): QueuedMessage | null;
  findPendingQueuedMessage(lookup: PendingQueuedLookup): QueuedMessage | null;
  /** Unprocessed, unexpired entries for a recipient ordered by (priority, createdAt) */
  listDeliverableQueuedMessages(recipientId: UserId, now: Date): QueuedMessage[];
  /** Unprocessed, unexpired outgoing entries from a sender ordered by createdAt */
  listPendingOutgoingMessages(senderId: UserId, now: Date): QueuedMessage[];
  /** Entries due for retry ordered by (priority, nextRetryAt) */
  listPendingRetries(now: Date, limit: number): QueuedMessage[];
  updateQueuedMessage(id: number, patch: QueuedMessagePatch): QueuedMessage | null;
  deleteExpiredQueuedMessages(now: Date): number;
  countQueuedMessages(userId: UserId | null, now: Date): QueueCounts;

  // Notifications
  createNotification(input: CreateNotificationInput): Notification;
  getNotification(id: number): Notification | null;
  findGroupedNotification(recipientId: UserId, groupKey: string, since: Date): Notification | null;
  updateNotification(id: number, patch: NotificationPatch): Notification | null;
  listNotifications(recipientId: UserId, query: NotificationQuery): Notification[];
  countUnreadNotifications(recipientId: UserId): number;
  markNotificationRead(id: number, recipientId: UserId, readAt: Date): boolean;
  markAllNotificationsRead(recipientId: UserId, readAt: Date, notificationType?: string | null): number;
  deleteReadNotificationsBefore(cutoff: Date): number;
  getNotificationPreference(userId: UserId, type: NotificationType): NotificationPreference | null;
  saveNotificationPreference(input: NotificationPreferenceInput): NotificationPreference;

  // Presence
  getUserStatus(userId: UserId): UserStatus | null;
  /** Atomic increment of the live-connection counter */
  incrementConnections(
    user: UserRef,
    connectionId: string,
    deviceInfo: Record<string, unknown>,
    at: Date,
  ): UserStatus;
  /** Atomic decrement, floored at zero; offline once the counter reaches zero */
  decrementConnections(user: UserRef, at: Date): UserStatus;
  /** Refresh lastPing; never moves it backwards */
  touchUserStatus(userId: UserId, at: Date): UserStatus | null;
  /** Force offline every online status whose lastPing is older than the cutoff */
  resetStaleUserStatuses(cutoff: Date, at: Date): UserStatus[];
  forceUserOffline(userId: UserId, at: Date): UserStatus | null;
  listUserStatuses(query?: UserStatusQuery): UserStatus[];

  // Typing
  upsertTypingStatus(user: UserRef, partner: UserRef, isTyping: boolean, at: Date): TypingUpdateResult;
  /** Rows where someone is typing to `partnerId` */
  listTypingToward(partnerId: UserId): TypingStatus[];
  /** Force not-typing on rows untouched since the cutoff */
  resetStaleTypingStatuses(cutoff: Date, at: Date): TypingStatus[];

  // Error audit log
  createErrorRecord(input: CreateErrorRecordInput): MessagingErrorRecord;
  resolveErrorRecord(id: number, notes: string, at: Date): boolean;
  listErrorRecords(query?: { resolved?: boolean; limit?: number }): MessagingErrorRecord[];

  /** Liveness probe */
  ping(): boolean;
}

/**
 * Promise-returning mirror of a synchronous interface
 */
export type Asyncify<T> = {
  [K in keyof T]: T[K] extends (...args: infer A) => infer R ? (...args: A) => Promise<R> : never;
};

export type MessagingStore = Asyncify<SyncMessagingStore>;
