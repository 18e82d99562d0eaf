/**
 * Shared Types
 *
 * Domain entities for the real-time messaging core: messages, offline queue
 * entries, notifications, presence and typing rows, and the error audit log.
 * Entities are owned by the persistence layer; managers only hold copies.
 */

export type UserId = number;

/**
 * Authenticated principal or a referenced account
 */
export interface UserRef {
  id: UserId;
  username: string;
}

export type MessageStatus = 'pending' | 'sent' | 'delivered' | 'read' | 'failed';

export interface Message {
  id: number;
  sender: UserRef;
  recipient: UserRef;
  /** Bounded to MAX_MESSAGE_LENGTH characters */
  content: string;
  /** Client-side idempotency token, unique per sender */
  clientId: string | null;
  status: MessageStatus;
  isRead: boolean;
  createdAt: Date;
  sentAt: Date | null;
  deliveredAt: Date | null;
  readAt: Date | null;
  failedAt: Date | null;
  retryCount: number;
  lastError: string | null;
}

export type QueueType = 'outgoing' | 'incoming' | 'retry';

/** 1 = high, 2 = normal, 3 = low */
export type QueuePriority = 1 | 2 | 3;

export interface QueuedMessage {
  id: number;
  sender: UserRef;
  recipient: UserRef;
  content: string;
  clientId: string | null;
  queueType: QueueType;
  priority: QueuePriority;
  createdAt: Date;
  expiresAt: Date;
  nextRetryAt: Date | null;
  lastRetryAt: Date | null;
  retryCount: number;
  maxRetries: number;
  lastError: string;
  errorCount: number;
  isProcessed: boolean;
  processedAt: Date | null;
  originalMessageId: number | null;
}

export type NotificationType =
  | 'connection_request'
  | 'connection_accepted'
  | 'connection_rejected'
  | 'new_message'
  | 'message_delivered'
  | 'message_read'
  | 'job_application'
  | 'application_status'
  | 'new_job_posted'
  | 'post_liked'
  | 'post_commented'
  | 'post_shared'
  | 'mention'
  | 'new_follower'
  | 'follow_accepted'
  | 'system_announcement'
  | 'security_alert';

export type NotificationPriority = 'low' | 'normal' | 'high' | 'urgent';

export interface Notification {
  id: number;
  recipient: UserRef;
  sender: UserRef | null;
  notificationType: NotificationType;
  title: string;
  message: string;
  priority: NotificationPriority;
  actionUrl: string | null;
  groupKey: string | null;
  isGrouped: boolean;
  groupCount: number;
  isRead: boolean;
  readAt: Date | null;
  isDelivered: boolean;
  deliveredAt: Date | null;
  createdAt: Date;
}

export type DeliveryMethod = 'realtime' | 'email' | 'push' | 'none';

/**
 * Quiet hours are minutes since local midnight; a start after the end spans midnight
 */
export interface NotificationPreference {
  userId: UserId;
  notificationType: NotificationType;
  deliveryMethod: DeliveryMethod;
  isEnabled: boolean;
  quietHoursStart: number | null;
  quietHoursEnd: number | null;
}

export interface UserStatus {
  user: UserRef;
  isOnline: boolean;
  activeConnections: number;
  lastSeen: Date;
  lastPing: Date | null;
  connectionId: string | null;
  deviceInfo: Record<string, unknown>;
}

export interface TypingStatus {
  user: UserRef;
  chatPartner: UserRef;
  isTyping: boolean;
  lastUpdated: Date;
}

export type ErrorRecordSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Append-only audit entry; only the resolution fields change after creation
 */
export interface MessagingErrorRecord {
  id: number;
  errorType: string;
  message: string;
  severity: ErrorRecordSeverity;
  context: Record<string, unknown>;
  userId: UserId | null;
  createdAt: Date;
  resolved: boolean;
  resolvedAt: Date | null;
  resolutionNotes: string;
}

/**
 * Outcome of an operation with an expected failure mode
 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export const MAX_MESSAGE_LENGTH = 10000;
export const MAX_NOTIFICATION_TITLE_LENGTH = 255;

/**
 * Length in Unicode code points; an emoji outside the BMP counts once
 */
export function characterLength(text: string): number {
  return [...text].length;
}

/**
 * First `limit` code points of `text`, never splitting a surrogate pair
 */
export function truncateCharacters(text: string, limit: number): string {
  return [...text].slice(0, limit).join('');
}

export * from './errors.js';
export type * from './store.js';

export {
  ConsoleStructuredLogger,
  NullLogger,
  LogLevel,
  type StructuredLogger,
  type LogContext,
} from '../logger/index.js';
