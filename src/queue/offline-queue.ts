/**
 * Offline Queue Manager
 *
 * Durable queue for messages that could not be delivered immediately:
 * - incoming entries wait for an offline recipient
 * - outgoing entries wait for an offline sender to come back
 * - retry entries re-deliver a persisted message whose broadcast failed
 *
 * Entries are delivered in (priority, createdAt) order, never after they
 * expire, and rescheduled with exponential backoff until `maxRetries`.
 * Deliveries for one user are serialized so two sessions coming online at
 * the same time cannot deliver the same entry twice.
 */

import { Mutex } from 'async-mutex';
import type { ChannelLayer } from '../channels/channel-layer.js';
import { userGroupName } from '../channels/channel-layer.js';
import type { QueueConfig } from '../types/config.js';
import type {
  Message,
  MessagingStore,
  QueueCounts,
  QueuedMessage,
  QueuedMessagePatch,
  QueuePriority,
  StructuredLogger,
  UserId,
  UserRef,
} from '../types/index.js';
import { NullLogger, toError } from '../types/index.js';
import { ErrorCategory } from '../errors/hierarchy.js';
import { getCircuitKey, type MessagingErrorHandler } from '../errors/error-handler.js';
import { daysFromNow } from '../storage/index.js';
import { serializeMessage } from '../serialization/serializers.js';
import {
  maintenanceLatencyHistogram,
  messagesQueuedCounter,
  queuedDeliveriesCounter,
} from '../metrics/index.js';

export const DEFAULT_QUEUE_CONFIG: QueueConfig = {
  offlineExpiryDays: 7,
  retryExpiryDays: 1,
  maxRetries: 3,
  baseDelaySeconds: 2,
  backoffMultiplier: 2,
  maxDelaySeconds: 300,
  retryBatchSize: 50,
  sweepIntervalMs: 60000,
};

const QUEUE_CIRCUIT = { category: ErrorCategory.DATABASE, context: { operation: 'offline_queue' } };

export interface OfflineQueueDependencies {
  store: MessagingStore;
  channelLayer: ChannelLayer;
  logger?: StructuredLogger;
  errorHandler?: MessagingErrorHandler;
}

export interface QueueMessageInput {
  sender: UserRef;
  recipient: UserRef;
  content: string;
  clientId?: string | null;
  priority?: QueuePriority;
  /** Stored message the entry stands for, when it was already persisted */
  originalMessageId?: number | null;
}

export interface QueueRetryInput {
  originalMessageId: number;
  sender: UserRef;
  recipient: UserRef;
  content: string;
  error: string;
  clientId?: string | null;
}

export interface DeliveredMessageSummary {
  id: number;
  sender: string;
  content: string;
  createdAt: string;
  clientId: string | null;
}

export interface DeliveryReport {
  userId: UserId;
  deliveredCount: number;
  failedCount: number;
  totalProcessed: number;
  /** Delivered messages in delivery order */
  messages: DeliveredMessageSummary[];
  timestamp: string;
  error?: string;
}

export interface RetryQueueReport {
  processedCount: number;
  failedCount: number;
  totalProcessed: number;
  /** True when the queue circuit was open and nothing was attempted */
  skipped: boolean;
  timestamp: string;
}

export type QueueStatistics = QueueCounts & { timestamp: string };

/**
 * Backoff before the retry numbered `retryCount` (1-based)
 */
export function calculateRetryDelaySeconds(
  retryCount: number,
  config: Pick<QueueConfig, 'baseDelaySeconds' | 'backoffMultiplier' | 'maxDelaySeconds'>,
): number {
  const exponent = Math.max(0, retryCount - 1);
  return Math.min(config.baseDelaySeconds * Math.pow(config.backoffMultiplier, exponent), config.maxDelaySeconds);
}

export function canRetryQueuedMessage(entry: QueuedMessage, now: Date = new Date()): boolean {
  if (entry.isProcessed) return false;
  if (entry.retryCount >= entry.maxRetries) return false;
  return now.getTime() <= entry.expiresAt.getTime();
}

export class OfflineQueueManager {
  private config: QueueConfig;
  private store: MessagingStore;
  private channelLayer: ChannelLayer;
  private logger: StructuredLogger;
  private errorHandler: MessagingErrorHandler | null;
  private deliveryMutexes = new Map<UserId, Mutex>();
  private sweepInterval: NodeJS.Timeout | null = null;

  constructor(config: Partial<QueueConfig>, deps: OfflineQueueDependencies) {
    this.config = { ...DEFAULT_QUEUE_CONFIG, ...config };
    this.store = deps.store;
    this.channelLayer = deps.channelLayer;
    this.logger = deps.logger ?? new NullLogger();
    this.errorHandler = deps.errorHandler ?? null;
  }

  /**
   * Queue a message for a recipient who is offline; returns the entry id
   */
  async queueMessageForOfflineRecipient(input: QueueMessageInput): Promise<number | null> {
    const clientId = input.clientId ?? null;
    try {
      if (clientId !== null) {
        const existing = await this.store.findPendingQueuedMessage({
          senderId: input.sender.id,
          recipientId: input.recipient.id,
          clientId,
        });
        if (existing) {
          this.logger.warn('Duplicate queued message ignored', {
            queuedId: existing.id,
            clientId,
            action: 'queue_duplicate',
          });
          return existing.id;
        }
      }

      const entry = await this.store.createQueuedMessage({
        sender: input.sender,
        recipient: input.recipient,
        content: input.content,
        clientId,
        queueType: 'incoming',
        priority: input.priority ?? 2,
        expiresAt: daysFromNow(this.config.offlineExpiryDays),
        maxRetries: this.config.maxRetries,
        originalMessageId: input.originalMessageId ?? null,
      });
      messagesQueuedCounter.inc({ queue_type: 'incoming' });
      this.logger.info('Message queued for offline recipient', {
        queuedId: entry.id,
        senderId: input.sender.id,
        recipientId: input.recipient.id,
        action: 'message_queued',
      });
      return entry.id;
    } catch (error) {
      this.logger.error('Failed to queue message for offline recipient', error, {
        senderId: input.sender.id,
        recipientId: input.recipient.id,
        action: 'queue_failed',
      });
      return null;
    }
  }

  /**
   * Queue a message whose sender dropped before it could be persisted
   */
  async queueOutgoingMessageForOfflineSender(input: QueueMessageInput): Promise<number | null> {
    const clientId = input.clientId ?? null;
    try {
      if (clientId !== null) {
        const existing = await this.store.findPendingQueuedMessage({ senderId: input.sender.id, clientId });
        if (existing) {
          this.logger.warn('Duplicate outgoing message ignored', {
            queuedId: existing.id,
            clientId,
            action: 'queue_duplicate',
          });
          return existing.id;
        }
      }

      const entry = await this.store.createQueuedMessage({
        sender: input.sender,
        recipient: input.recipient,
        content: input.content,
        clientId,
        queueType: 'outgoing',
        priority: input.priority ?? 2,
        expiresAt: daysFromNow(this.config.offlineExpiryDays),
        maxRetries: this.config.maxRetries,
      });
      messagesQueuedCounter.inc({ queue_type: 'outgoing' });
      this.logger.info('Outgoing message queued', {
        queuedId: entry.id,
        senderId: input.sender.id,
        recipientId: input.recipient.id,
        action: 'message_queued',
      });
      return entry.id;
    } catch (error) {
      this.logger.error('Failed to queue outgoing message', error, {
        senderId: input.sender.id,
        recipientId: input.recipient.id,
        action: 'queue_failed',
      });
      return null;
    }
  }

  /**
   * Queue a stored message whose live delivery failed; the first retry is
   * scheduled immediately
   */
  async queueMessageForRetry(input: QueueRetryInput): Promise<number | null> {
    const now = new Date();
    try {
      const entry = await this.store.createQueuedMessage({
        sender: input.sender,
        recipient: input.recipient,
        content: input.content,
        clientId: input.clientId ?? null,
        queueType: 'retry',
        priority: 1,
        expiresAt: daysFromNow(this.config.retryExpiryDays, now),
        maxRetries: this.config.maxRetries,
        originalMessageId: input.originalMessageId,
        retryCount: 1,
        nextRetryAt: new Date(now.getTime() + calculateRetryDelaySeconds(1, this.config) * 1000),
        at: now,
      });
      await this.store.updateQueuedMessage(entry.id, { lastError: input.error });
      messagesQueuedCounter.inc({ queue_type: 'retry' });
      this.logger.info('Message queued for retry', {
        queuedId: entry.id,
        originalMessageId: input.originalMessageId,
        action: 'message_queued_for_retry',
      });
      return entry.id;
    } catch (error) {
      this.logger.error('Failed to queue message for retry', error, {
        originalMessageId: input.originalMessageId,
        action: 'queue_failed',
      });
      return null;
    }
  }

  /**
   * Deliver every pending entry addressed to a user who just came online
   */
  async deliverQueuedMessagesForUser(userId: UserId): Promise<DeliveryReport> {
    const mutex = this.getMutex(userId);
    try {
      return await mutex.runExclusive(() => this.deliverPending(userId));
    } finally {
      this.releaseMutex(userId, mutex);
    }
  }

  /**
   * Users with a delivery running or waiting
   */
  getActiveDeliveryCount(): number {
    return this.deliveryMutexes.size;
  }

  private async deliverPending(userId: UserId): Promise<DeliveryReport> {
    const report: DeliveryReport = {
      userId,
      deliveredCount: 0,
      failedCount: 0,
      totalProcessed: 0,
      messages: [],
      timestamp: new Date().toISOString(),
    };

    let entries: QueuedMessage[];
    try {
      entries = await this.store.listDeliverableQueuedMessages(userId, new Date());
    } catch (error) {
      const cause = toError(error);
      this.logger.error('Failed to load queued messages', cause, {
        userId,
        action: 'queue_delivery_failed',
      });
      report.error = cause.message;
      return report;
    }

    for (const entry of entries) {
      try {
        const message = await this.materialize(entry);
        await this.sendToUser(userId, message);
        await this.store.updateQueuedMessage(entry.id, {
          isProcessed: true,
          processedAt: new Date(),
          lastError: '',
        });
        report.deliveredCount++;
        report.messages.push({
          id: message.id,
          sender: message.sender.username,
          content: message.content,
          createdAt: message.createdAt.toISOString(),
          clientId: entry.clientId,
        });
        queuedDeliveriesCounter.inc({ status: 'delivered' });
      } catch (error) {
        report.failedCount++;
        queuedDeliveriesCounter.inc({ status: 'failed' });
        this.logger.error('Failed to deliver queued message', error, {
          queuedId: entry.id,
          userId,
          action: 'queued_message_delivery_failed',
        });
        await this.markFailed(entry, toError(error).message);
      }
    }

    report.totalProcessed = report.deliveredCount + report.failedCount;
    if (report.totalProcessed > 0) {
      this.logger.info('Delivered queued messages', {
        userId,
        delivered: report.deliveredCount,
        failed: report.failedCount,
        action: 'queued_messages_delivered',
      });
    }
    return report;
  }

  /**
   * Re-attempt entries whose scheduled retry time has arrived
   */
  async processRetryQueue(): Promise<RetryQueueReport> {
    const report: RetryQueueReport = {
      processedCount: 0,
      failedCount: 0,
      totalProcessed: 0,
      skipped: false,
      timestamp: new Date().toISOString(),
    };

    if (this.isCircuitOpen()) {
      this.logger.warn('Queue circuit open, retry sweep skipped', { action: 'retry_queue_skipped' });
      report.skipped = true;
      return report;
    }

    const now = new Date();
    let due: QueuedMessage[];
    try {
      due = await this.store.listPendingRetries(now, this.config.retryBatchSize);
    } catch (error) {
      this.recordStoreFailure();
      this.logger.error('Failed to load pending retries', error, { action: 'retry_queue_failed' });
      return report;
    }

    for (const entry of due) {
      if (!canRetryQueuedMessage(entry, now)) continue;
      try {
        const delivered = await this.retryEntry(entry);
        if (delivered) {
          await this.store.updateQueuedMessage(entry.id, {
            isProcessed: true,
            processedAt: new Date(),
            lastError: '',
          });
          report.processedCount++;
          queuedDeliveriesCounter.inc({ status: 'delivered' });
        } else {
          await this.markFailed(entry, 'Retry attempt failed');
          report.failedCount++;
        }
      } catch (error) {
        this.logger.error('Error retrying queued message', error, {
          queuedId: entry.id,
          action: 'retry_queue_entry_failed',
        });
        await this.markFailed(entry, toError(error).message);
        report.failedCount++;
      }
    }

    report.totalProcessed = report.processedCount + report.failedCount;
    if (report.totalProcessed > 0) {
      this.logger.info('Processed retry queue', {
        processed: report.processedCount,
        failed: report.failedCount,
        action: 'retry_queue_processed',
      });
    }
    return report;
  }

  /**
   * Remove entries past their expiry; returns the number removed
   */
  async cleanupExpiredMessages(): Promise<number> {
    if (this.isCircuitOpen()) return 0;
    try {
      const removed = await this.store.deleteExpiredQueuedMessages(new Date());
      if (removed > 0) {
        this.logger.info('Cleaned up expired queued messages', {
          removed,
          action: 'queue_cleanup',
        });
      }
      return removed;
    } catch (error) {
      this.recordStoreFailure();
      this.logger.error('Failed to clean up expired queued messages', error, {
        action: 'queue_cleanup_failed',
      });
      return 0;
    }
  }

  /**
   * Aggregate counts, optionally restricted to entries a user sent or receives
   */
  async getQueueStatistics(userId?: UserId): Promise<QueueStatistics> {
    const now = new Date();
    const counts = await this.store.countQueuedMessages(userId ?? null, now);
    return { ...counts, timestamp: now.toISOString() };
  }

  /**
   * Start the periodic cleanup and retry sweep
   */
  start(): void {
    if (this.sweepInterval) return;
    this.sweepInterval = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        this.logger.error('Queue sweep failed', error, { action: 'queue_sweep_failed' });
      });
    }, this.config.sweepIntervalMs);
    this.logger.debug('Offline queue sweeper started', {
      intervalMs: this.config.sweepIntervalMs,
      action: 'queue_sweeper_start',
    });
  }

  stop(): void {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
      this.logger.debug('Offline queue sweeper stopped', { action: 'queue_sweeper_stop' });
    }
  }

  async sweep(): Promise<{ expired: number; retries: RetryQueueReport }> {
    const end = maintenanceLatencyHistogram.startTimer({ task: 'offline_queue' });
    try {
      const expired = await this.cleanupExpiredMessages();
      const retries = await this.processRetryQueue();
      end({ status: 'success' });
      return { expired, retries };
    } catch (error) {
      end({ status: 'error' });
      throw error;
    }
  }

  private async retryEntry(entry: QueuedMessage): Promise<boolean> {
    if (entry.queueType === 'retry') {
      if (entry.originalMessageId === null) return false;
      const result = await this.store.transitionMessageStatus(entry.originalMessageId, 'sent', new Date());
      if (!result) return false;
      await this.sendToUser(entry.recipient.id, result.message);
      return true;
    }

    const status = await this.store.getUserStatus(entry.recipient.id);
    if (!status?.isOnline) return false;
    const message = await this.materialize(entry);
    await this.sendToUser(entry.recipient.id, message);
    return true;
  }

  /**
   * Persist the chat message behind a queued entry; the (sender, clientId)
   * pair keeps a repeated attempt from creating a second row. Entries linked
   * to a stored message only move it to delivered.
   */
  private async materialize(entry: QueuedMessage): Promise<Message> {
    if (entry.originalMessageId !== null) {
      const delivered = await this.store.transitionMessageStatus(entry.originalMessageId, 'delivered', new Date());
      if (!delivered) throw new Error(`Message ${String(entry.originalMessageId)} no longer exists`);
      return delivered.message;
    }
    const result = await this.store.createMessage({
      sender: entry.sender,
      recipient: entry.recipient,
      content: entry.content,
      clientId: entry.clientId,
      status: 'delivered',
    });
    return result.message;
  }

  private async sendToUser(userId: UserId, message: Message): Promise<void> {
    await this.channelLayer.groupSend(userGroupName(userId), {
      type: 'chat_message',
      payload: serializeMessage(message),
    });
  }

  private async markFailed(entry: QueuedMessage, errorMessage: string): Promise<void> {
    const now = new Date();
    const patch: QueuedMessagePatch = {
      lastError: errorMessage,
      errorCount: entry.errorCount + 1,
      lastRetryAt: now,
    };
    if (canRetryQueuedMessage(entry, now)) {
      const retryCount = entry.retryCount + 1;
      patch.retryCount = retryCount;
      patch.nextRetryAt = new Date(now.getTime() + calculateRetryDelaySeconds(retryCount, this.config) * 1000);
    } else {
      patch.isProcessed = true;
      patch.processedAt = now;
    }

    try {
      await this.store.updateQueuedMessage(entry.id, patch);
    } catch (error) {
      this.recordStoreFailure();
      this.logger.error('Failed to record queued message failure', error, {
        queuedId: entry.id,
        action: 'queue_mark_failed_failed',
      });
    }
  }

  private isCircuitOpen(): boolean {
    return this.errorHandler?.isCircuitBreakerOpen(getCircuitKey(QUEUE_CIRCUIT.category, QUEUE_CIRCUIT.context)) ?? false;
  }

  private recordStoreFailure(): void {
    this.errorHandler?.recordFailure(QUEUE_CIRCUIT.category, QUEUE_CIRCUIT.context);
  }

  private getMutex(userId: UserId): Mutex {
    let mutex = this.deliveryMutexes.get(userId);
    if (!mutex) {
      mutex = new Mutex();
      this.deliveryMutexes.set(userId, mutex);
    }
    return mutex;
  }

  private releaseMutex(userId: UserId, mutex: Mutex): void {
    if (!mutex.isLocked() && this.deliveryMutexes.get(userId) === mutex) {
      this.deliveryMutexes.delete(userId);
    }
  }
}
