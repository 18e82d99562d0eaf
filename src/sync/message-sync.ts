/**
 * Message Sync Manager
 *
 * Builds the catch-up payload for a session that comes back after a
 * disconnect: missed incoming messages, the user's own pending outgoing
 * entries, and delivery/read updates on messages the user sent, merged in
 * timestamp order.
 */

import type { SyncConfig } from '../types/config.js';
import type { Message, MessagingStore, StructuredLogger, UserId } from '../types/index.js';
import { NullLogger, toError } from '../types/index.js';
import type { OfflineQueueManager } from '../queue/offline-queue.js';
import type { SyncMessageEntry, SyncResponseFrame } from '../serialization/frames.js';
import { serializeMessage, serializeQueuedMessage } from '../serialization/serializers.js';

export const DEFAULT_SYNC_CONFIG: SyncConfig = {
  maxSyncWindowDays: 7,
  batchSize: 50,
  fetchLimit: 5000,
};

export interface MessageSyncDependencies {
  store: MessagingStore;
  offlineQueue: OfflineQueueManager;
  logger?: StructuredLogger;
}

export interface SyncBatch {
  userId: UserId;
  offset: number;
  batchSize: number;
  messages: SyncMessageEntry[];
  total: number;
  hasMore: boolean;
  nextBatchOffset: number | null;
  /** A category held more rows than `fetchLimit`; the newest were left out */
  truncated: boolean;
}

export interface OfflineQueueResult {
  userId: UserId;
  processedCount: number;
  failedCount: number;
  totalCount: number;
  success: boolean;
  timestamp: string;
}

interface CollectedSync {
  entries: SyncMessageEntry[];
  incomingCount: number;
  outgoingCount: number;
  statusUpdateCount: number;
  truncated: boolean;
}

/**
 * Timestamp order; ties broken by sync priority (incoming, outgoing, status)
 */
export function orderSyncEntries(entries: SyncMessageEntry[]): SyncMessageEntry[] {
  return [...entries].sort((a, b) => {
    if (a.sort_timestamp !== b.sort_timestamp) return a.sort_timestamp < b.sort_timestamp ? -1 : 1;
    return a.sync_priority - b.sync_priority;
  });
}

/**
 * Earliest delivery or read time at or after `since`
 */
function statusUpdateTime(message: Message, since: Date): Date | null {
  const candidates = [message.deliveredAt, message.readAt].filter(
    (date): date is Date => date !== null && date.getTime() >= since.getTime(),
  );
  if (candidates.length === 0) return null;
  return candidates.reduce((earliest, date) => (date.getTime() < earliest.getTime() ? date : earliest));
}

export class MessageSyncManager {
  private config: SyncConfig;
  private store: MessagingStore;
  private offlineQueue: OfflineQueueManager;
  private logger: StructuredLogger;

  constructor(config: Partial<SyncConfig>, deps: MessageSyncDependencies) {
    this.config = { ...DEFAULT_SYNC_CONFIG, ...config };
    this.store = deps.store;
    this.offlineQueue = deps.offlineQueue;
    this.logger = deps.logger ?? new NullLogger();
  }

  /**
   * Everything the user missed since `lastDisconnectTime`, first batch
   * starting at `offset`
   */
  async synchronizeMessagesOnReconnection(
    userId: UserId,
    lastDisconnectTime: Date,
    connectionId: string,
    offset = 0,
  ): Promise<SyncResponseFrame> {
    const now = new Date();
    const collected = await this.collect(userId, lastDisconnectTime, now);
    const batch = this.slice(userId, collected, offset, this.config.batchSize);

    this.logger.info('Message sync completed', {
      userId,
      connectionId,
      incoming: collected.incomingCount,
      outgoing: collected.outgoingCount,
      statusUpdates: collected.statusUpdateCount,
      action: 'message_sync',
    });
    if (collected.truncated) {
      this.logger.warn('Sync backlog exceeds the fetch limit', {
        userId,
        connectionId,
        fetchLimit: this.config.fetchLimit,
        action: 'sync_truncated',
      });
    }

    return {
      type: 'sync_response',
      connection_id: connectionId,
      user_id: userId,
      sync_timestamp: now.toISOString(),
      incoming_count: collected.incomingCount,
      outgoing_count: collected.outgoingCount,
      status_update_count: collected.statusUpdateCount,
      total_messages: collected.entries.length,
      messages: batch.messages,
      has_more: batch.hasMore,
      next_batch_offset: batch.nextBatchOffset,
    };
  }

  async getNextSyncBatch(
    userId: UserId,
    since: Date,
    offset: number,
    batchSize: number = this.config.batchSize,
  ): Promise<SyncBatch> {
    const collected = await this.collect(userId, since, new Date());
    return this.slice(userId, collected, offset, batchSize);
  }

  /**
   * Deliver the user's incoming backlog from the offline queue
   */
  async processOfflineMessageQueue(userId: UserId): Promise<OfflineQueueResult> {
    const report = await this.offlineQueue.deliverQueuedMessagesForUser(userId);
    return {
      userId,
      processedCount: report.deliveredCount,
      failedCount: report.failedCount,
      totalCount: report.totalProcessed,
      success: report.failedCount === 0 && report.error === undefined,
      timestamp: report.timestamp,
    };
  }

  /**
   * Mark synced incoming messages delivered; returns how many changed
   */
  async markMessagesAsSynchronized(userId: UserId, messageIds: number[]): Promise<number> {
    let changed = 0;
    const now = new Date();
    for (const id of messageIds) {
      try {
        const message = await this.store.getMessage(id);
        if (message?.recipient.id !== userId) continue;
        const result = await this.store.transitionMessageStatus(id, 'delivered', now);
        if (result?.changed) changed++;
      } catch (error) {
        this.logger.warn('Failed to mark synced message delivered', {
          userId,
          messageId: id,
          error: toError(error).message,
          action: 'sync_mark_failed',
        });
      }
    }
    return changed;
  }

  private async collect(userId: UserId, since: Date, now: Date): Promise<CollectedSync> {
    const windowStart = new Date(now.getTime() - this.config.maxSyncWindowDays * 86400 * 1000);
    const effectiveSince = since.getTime() > windowStart.getTime() ? since : windowStart;

    // One extra row tells a full page from a cut-off one
    const limit = this.config.fetchLimit;
    const [fetchedIncoming, outgoing, fetchedSent] = await Promise.all([
      this.store.getMessagesForRecipient(userId, effectiveSince, limit + 1),
      this.store.listPendingOutgoingMessages(userId, now),
      this.store.getStatusUpdatesForSender(userId, effectiveSince, limit + 1),
    ]);
    const truncated = fetchedIncoming.length > limit || fetchedSent.length > limit;
    const incoming = fetchedIncoming.slice(0, limit);
    const sent = fetchedSent.slice(0, limit);

    const entries: SyncMessageEntry[] = [];
    for (const message of incoming) {
      entries.push({
        sync_type: 'incoming_message',
        sync_priority: 1,
        sort_timestamp: message.createdAt.toISOString(),
        message: serializeMessage(message),
      });
    }
    for (const queued of outgoing) {
      entries.push({
        sync_type: 'outgoing_message',
        sync_priority: 2,
        sort_timestamp: queued.createdAt.toISOString(),
        message: serializeQueuedMessage(queued),
      });
    }
    let statusUpdateCount = 0;
    for (const message of sent) {
      const updatedAt = statusUpdateTime(message, effectiveSince);
      if (!updatedAt) continue;
      statusUpdateCount++;
      entries.push({
        sync_type: 'status_update',
        sync_priority: 3,
        sort_timestamp: updatedAt.toISOString(),
        message: serializeMessage(message),
      });
    }

    return {
      entries: orderSyncEntries(entries),
      incomingCount: incoming.length,
      outgoingCount: outgoing.length,
      statusUpdateCount,
      truncated,
    };
  }

  private slice(userId: UserId, collected: CollectedSync, offset: number, batchSize: number): SyncBatch {
    const { entries, truncated } = collected;
    const start = Math.max(0, offset);
    const end = start + batchSize;
    const remaining = entries.length > end;
    return {
      userId,
      offset: start,
      batchSize,
      messages: entries.slice(start, end),
      total: entries.length,
      hasMore: remaining || truncated,
      nextBatchOffset: remaining ? end : null,
      truncated,
    };
  }
}
