/**
 * Store Executor
 *
 * Turns a `SyncMessagingStore` into the promise-returning `MessagingStore`
 * the managers depend on:
 * - every call is deferred to a later event-loop turn before it touches the store
 * - calls run through an opossum circuit breaker (timeout, error threshold)
 * - latency is recorded per operation
 * - failures surface as StorageError, an open breaker as CircuitOpenError
 *
 * Results are structured clones, so callers never share references with
 * the backing store.
 *
 * Deferred calls still run on the event-loop thread. Only stores whose calls
 * finish without I/O belong behind this executor; a backend that does I/O
 * implements `MessagingStore` on an async driver instead (see
 * `MongoMessagingStore`). Calls that hold the loop longer than
 * `blockingWarnMs` are logged.
 */

import CircuitBreaker from 'opossum';
import type {
  CreateErrorRecordInput,
  CreateMessageInput,
  CreateMessageResult,
  CreateNotificationInput,
  CreateQueuedMessageInput,
  Message,
  MessageStatus,
  MessagingErrorRecord,
  MessagingStore,
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
  StatusTransitionResult,
  StructuredLogger,
  SyncMessagingStore,
  TypingStatus,
  TypingUpdateResult,
  UserId,
  UserRef,
  UserStatus,
  UserStatusQuery,
} from '../types/index.js';
import { CircuitOpenError, NullLogger, StorageError, TimeoutError, toError } from '../types/index.js';
import { circuitBreakerTransitionsCounter, storeLatencyHistogram } from '../metrics/index.js';

export type Scheduler = (callback: () => void) => void;

export interface StoreExecutorOptions {
  operationTimeoutMs: number;
  errorThresholdPercentage: number;
  resetTimeoutMs: number;
  /** Calls observed before the breaker may open */
  volumeThreshold: number;
  logger?: StructuredLogger;
  /** Defers each call; defaults to setImmediate */
  schedule?: Scheduler;
  /** Synchronous calls slower than this are logged as blocking */
  blockingWarnMs: number;
  /** Millisecond clock used to time synchronous calls */
  clock?: () => number;
}

export const DEFAULT_STORE_EXECUTOR_OPTIONS: StoreExecutorOptions = {
  operationTimeoutMs: 5000,
  errorThresholdPercentage: 50,
  resetTimeoutMs: 30000,
  volumeThreshold: 10,
  blockingWarnMs: 20,
};

function defaultSchedule(callback: () => void): void {
  setImmediate(callback);
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class OffloadedMessagingStore implements MessagingStore {
  private breaker: CircuitBreaker<[() => Promise<void>], void>;
  private options: StoreExecutorOptions;
  private logger: StructuredLogger;
  private schedule: Scheduler;
  private clock: () => number;

  constructor(
    private readonly sync: SyncMessagingStore,
    options: Partial<StoreExecutorOptions> = {},
  ) {
    this.options = { ...DEFAULT_STORE_EXECUTOR_OPTIONS, ...options };
    this.logger = this.options.logger ?? new NullLogger();
    this.schedule = this.options.schedule ?? defaultSchedule;
    this.clock = this.options.clock ?? (() => performance.now());

    this.breaker = new CircuitBreaker(async (task: () => Promise<void>) => task(), {
      timeout: this.options.operationTimeoutMs,
      errorThresholdPercentage: this.options.errorThresholdPercentage,
      resetTimeout: this.options.resetTimeoutMs,
      volumeThreshold: this.options.volumeThreshold,
      rollingCountTimeout: 10000,
      rollingCountBuckets: 10,
      name: 'store-executor',
    });

    this.breaker.on('open', () => {
      circuitBreakerTransitionsCounter.inc({ to_state: 'open' });
      this.logger.error('Store circuit breaker OPEN - failing fast', undefined, {
        action: 'store_breaker_open',
      });
    });
    this.breaker.on('halfOpen', () => {
      circuitBreakerTransitionsCounter.inc({ to_state: 'half_open' });
      this.logger.warn('Store circuit breaker HALF-OPEN - testing recovery', {
        action: 'store_breaker_half_open',
      });
    });
    this.breaker.on('close', () => {
      circuitBreakerTransitionsCounter.inc({ to_state: 'closed' });
      this.logger.info('Store circuit breaker CLOSED', { action: 'store_breaker_closed' });
    });
  }

  isCircuitOpen(): boolean {
    return this.breaker.opened;
  }

  getCircuitBreakerStats(): CircuitBreaker.Stats {
    return this.breaker.stats;
  }

  /**
   * Stop the breaker's rolling timers
   */
  close(): void {
    this.breaker.shutdown();
  }

  private defer<T>(operation: string, fn: () => T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.schedule(() => {
        const startedAt = this.clock();
        try {
          resolve(structuredClone(fn()));
        } catch (error) {
          reject(toError(error));
        } finally {
          this.reportBlocking(operation, this.clock() - startedAt);
        }
      });
    });
  }

  private reportBlocking(operation: string, elapsedMs: number): void {
    if (elapsedMs <= this.options.blockingWarnMs) return;
    this.logger.warn('Synchronous store call blocked the event loop', {
      operation,
      elapsedMs: Math.round(elapsedMs),
      thresholdMs: this.options.blockingWarnMs,
      action: 'store_call_blocking',
    });
  }

  private async run<T>(operation: string, fn: () => T): Promise<T> {
    const endTimer = storeLatencyHistogram.startTimer({ operation });
    try {
      const result = await new Promise<T>((resolve, reject) => {
        this.breaker
          .fire(async () => {
            resolve(await this.defer(operation, fn));
          })
          .catch(reject);
      });
      endTimer({ status: 'success' });
      return result;
    } catch (error) {
      endTimer({ status: 'error' });
      throw this.wrapError(operation, toError(error));
    }
  }

  private wrapError(operation: string, error: Error): Error {
    const code = errorCode(error);
    if (code === 'EOPENBREAKER') {
      return new CircuitOpenError('store-executor');
    }
    if (code === 'ETIMEDOUT') {
      return new TimeoutError(
        `Store operation ${operation} timed out`,
        operation,
        this.options.operationTimeoutMs,
      );
    }
    this.logger.error('Store operation failed', error, { operation, action: 'store_operation_failed' });
    return new StorageError(`Store operation ${operation} failed`, operation, error);
  }

  // Users

  saveUser(user: UserRef): Promise<UserRef> {
    return this.run('saveUser', () => this.sync.saveUser(user));
  }

  getUser(id: UserId): Promise<UserRef | null> {
    return this.run('getUser', () => this.sync.getUser(id));
  }

  findUserByUsername(username: string): Promise<UserRef | null> {
    return this.run('findUserByUsername', () => this.sync.findUserByUsername(username));
  }

  // Messages

  createMessage(input: CreateMessageInput): Promise<CreateMessageResult> {
    return this.run('createMessage', () => this.sync.createMessage(input));
  }

  getMessage(id: number): Promise<Message | null> {
    return this.run('getMessage', () => this.sync.getMessage(id));
  }

  getConversation(userA: UserId, userB: UserId, limit: number): Promise<Message[]> {
    return this.run('getConversation', () => this.sync.getConversation(userA, userB, limit));
  }

  getMessagesForRecipient(recipientId: UserId, since: Date, limit: number): Promise<Message[]> {
    return this.run('getMessagesForRecipient', () =>
      this.sync.getMessagesForRecipient(recipientId, since, limit),
    );
  }

  getStatusUpdatesForSender(senderId: UserId, since: Date, limit: number): Promise<Message[]> {
    return this.run('getStatusUpdatesForSender', () =>
      this.sync.getStatusUpdatesForSender(senderId, since, limit),
    );
  }

  getUnreadMessageIds(recipientId: UserId, senderId: UserId): Promise<number[]> {
    return this.run('getUnreadMessageIds', () => this.sync.getUnreadMessageIds(recipientId, senderId));
  }

  transitionMessageStatus(
    id: number,
    status: MessageStatus,
    at: Date,
    error?: string,
  ): Promise<StatusTransitionResult | null> {
    return this.run('transitionMessageStatus', () =>
      this.sync.transitionMessageStatus(id, status, at, error),
    );
  }

  markMessageRead(id: number, readAt: Date): Promise<boolean> {
    return this.run('markMessageRead', () => this.sync.markMessageRead(id, readAt));
  }

  markMessageDelivered(id: number, deliveredAt: Date): Promise<boolean> {
    return this.run('markMessageDelivered', () => this.sync.markMessageDelivered(id, deliveredAt));
  }

  // Offline queue

  createQueuedMessage(input: CreateQueuedMessageInput): Promise<QueuedMessage> {
    return this.run('createQueuedMessage', () => this.sync.createQueuedMessage(input));
  }

  getQueuedMessage(id: number): Promise<QueuedMessage | null> {
    return this.run('getQueuedMessage', () => this.sync.getQueuedMessage(id));
  }

  findPendingQueuedMessage(lookup: PendingQueuedLookup): Promise<QueuedMessage | null> {
    return this.run('findPendingQueuedMessage', () => this.sync.findPendingQueuedMessage(lookup));
  }

  listDeliverableQueuedMessages(recipientId: UserId, now: Date): Promise<QueuedMessage[]> {
    return this.run('listDeliverableQueuedMessages', () =>
      this.sync.listDeliverableQueuedMessages(recipientId, now),
    );
  }

  listPendingOutgoingMessages(senderId: UserId, now: Date): Promise<QueuedMessage[]> {
    return this.run('listPendingOutgoingMessages', () =>
      this.sync.listPendingOutgoingMessages(senderId, now),
    );
  }

  listPendingRetries(now: Date, limit: number): Promise<QueuedMessage[]> {
    return this.run('listPendingRetries', () => this.sync.listPendingRetries(now, limit));
  }

  updateQueuedMessage(id: number, patch: QueuedMessagePatch): Promise<QueuedMessage | null> {
    return this.run('updateQueuedMessage', () => this.sync.updateQueuedMessage(id, patch));
  }

  deleteExpiredQueuedMessages(now: Date): Promise<number> {
    return this.run('deleteExpiredQueuedMessages', () => this.sync.deleteExpiredQueuedMessages(now));
  }

  countQueuedMessages(userId: UserId | null, now: Date): Promise<QueueCounts> {
    return this.run('countQueuedMessages', () => this.sync.countQueuedMessages(userId, now));
  }

  // Notifications

  createNotification(input: CreateNotificationInput): Promise<Notification> {
    return this.run('createNotification', () => this.sync.createNotification(input));
  }

  getNotification(id: number): Promise<Notification | null> {
    return this.run('getNotification', () => this.sync.getNotification(id));
  }

  findGroupedNotification(
    recipientId: UserId,
    groupKey: string,
    since: Date,
  ): Promise<Notification | null> {
    return this.run('findGroupedNotification', () =>
      this.sync.findGroupedNotification(recipientId, groupKey, since),
    );
  }

  updateNotification(id: number, patch: NotificationPatch): Promise<Notification | null> {
    return this.run('updateNotification', () => this.sync.updateNotification(id, patch));
  }

  listNotifications(recipientId: UserId, query: NotificationQuery): Promise<Notification[]> {
    return this.run('listNotifications', () => this.sync.listNotifications(recipientId, query));
  }

  countUnreadNotifications(recipientId: UserId): Promise<number> {
    return this.run('countUnreadNotifications', () => this.sync.countUnreadNotifications(recipientId));
  }

  markNotificationRead(id: number, recipientId: UserId, readAt: Date): Promise<boolean> {
    return this.run('markNotificationRead', () =>
      this.sync.markNotificationRead(id, recipientId, readAt),
    );
  }

  markAllNotificationsRead(
    recipientId: UserId,
    readAt: Date,
    notificationType?: string | null,
  ): Promise<number> {
    return this.run('markAllNotificationsRead', () =>
      this.sync.markAllNotificationsRead(recipientId, readAt, notificationType),
    );
  }

  deleteReadNotificationsBefore(cutoff: Date): Promise<number> {
    return this.run('deleteReadNotificationsBefore', () =>
      this.sync.deleteReadNotificationsBefore(cutoff),
    );
  }

  getNotificationPreference(
    userId: UserId,
    type: NotificationType,
  ): Promise<NotificationPreference | null> {
    return this.run('getNotificationPreference', () =>
      this.sync.getNotificationPreference(userId, type),
    );
  }

  saveNotificationPreference(input: NotificationPreferenceInput): Promise<NotificationPreference> {
    return this.run('saveNotificationPreference', () => this.sync.saveNotificationPreference(input));
  }

  // Presence

  getUserStatus(userId: UserId): Promise<UserStatus | null> {
    return this.run('getUserStatus', () => this.sync.getUserStatus(userId));
  }

  incrementConnections(
    user: UserRef,
    connectionId: string,
    deviceInfo: Record<string, unknown>,
    at: Date,
  ): Promise<UserStatus> {
    return this.run('incrementConnections', () =>
      this.sync.incrementConnections(user, connectionId, deviceInfo, at),
    );
  }

  decrementConnections(user: UserRef, at: Date): Promise<UserStatus> {
    return this.run('decrementConnections', () => this.sync.decrementConnections(user, at));
  }

  touchUserStatus(userId: UserId, at: Date): Promise<UserStatus | null> {
    return this.run('touchUserStatus', () => this.sync.touchUserStatus(userId, at));
  }

  resetStaleUserStatuses(cutoff: Date, at: Date): Promise<UserStatus[]> {
    return this.run('resetStaleUserStatuses', () => this.sync.resetStaleUserStatuses(cutoff, at));
  }

  forceUserOffline(userId: UserId, at: Date): Promise<UserStatus | null> {
    return this.run('forceUserOffline', () => this.sync.forceUserOffline(userId, at));
  }

  listUserStatuses(query?: UserStatusQuery): Promise<UserStatus[]> {
    return this.run('listUserStatuses', () => this.sync.listUserStatuses(query));
  }

  // Typing

  upsertTypingStatus(
    user: UserRef,
    partner: UserRef,
    isTyping: boolean,
    at: Date,
  ): Promise<TypingUpdateResult> {
    return this.run('upsertTypingStatus', () =>
      this.sync.upsertTypingStatus(user, partner, isTyping, at),
    );
  }

  listTypingToward(partnerId: UserId): Promise<TypingStatus[]> {
    return this.run('listTypingToward', () => this.sync.listTypingToward(partnerId));
  }

  resetStaleTypingStatuses(cutoff: Date, at: Date): Promise<TypingStatus[]> {
    return this.run('resetStaleTypingStatuses', () => this.sync.resetStaleTypingStatuses(cutoff, at));
  }

  // Error audit log

  createErrorRecord(input: CreateErrorRecordInput): Promise<MessagingErrorRecord> {
    return this.run('createErrorRecord', () => this.sync.createErrorRecord(input));
  }

  resolveErrorRecord(id: number, notes: string, at: Date): Promise<boolean> {
    return this.run('resolveErrorRecord', () => this.sync.resolveErrorRecord(id, notes, at));
  }

  listErrorRecords(query?: { resolved?: boolean; limit?: number }): Promise<MessagingErrorRecord[]> {
    return this.run('listErrorRecords', () => this.sync.listErrorRecords(query));
  }

  ping(): Promise<boolean> {
    return this.run('ping', () => this.sync.ping());
  }
}

/**
 * Wrap a non-blocking synchronous store so it can be called from connection handlers
 */
export function offloadStore(
  sync: SyncMessagingStore,
  options: Partial<StoreExecutorOptions> = {},
): OffloadedMessagingStore {
  return new OffloadedMessagingStore(sync, options);
}
