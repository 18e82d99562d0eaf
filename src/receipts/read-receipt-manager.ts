/**
 * Read-Receipt Manager
 *
 * Moves messages to `read` and tells the sender, exactly once per message.
 * The store transition is atomic, so only one of several concurrent callers
 * observes the change and sends the receipt; a TTL cache keyed by
 * (message, reader) short-circuits repeats before they reach the store.
 */

import { LRUCache } from 'lru-cache';
import type { ChannelLayer } from '../channels/channel-layer.js';
import { userGroupName } from '../channels/channel-layer.js';
import type { ReceiptsConfig } from '../types/config.js';
import type { Message, MessagingStore, StructuredLogger, UserId } from '../types/index.js';
import { NullLogger, toError } from '../types/index.js';
import { getStatusIcon, serializeDate } from '../serialization/serializers.js';
import { readReceiptsCounter } from '../metrics/index.js';

export const DEFAULT_RECEIPTS_CONFIG: ReceiptsConfig = {
  cacheTtlMs: 5 * 60 * 1000,
  cacheMaxSize: 10000,
};

export interface ReadReceiptDependencies {
  store: MessagingStore;
  channelLayer: ChannelLayer;
  logger?: StructuredLogger;
}

export interface BulkReadResult {
  processedCount: number;
  failedCount: number;
  alreadyReadCount: number;
  /** Messages this call moved to read */
  messageIds: number[];
  timestamp: string;
}

type ReadOutcome = { kind: 'read'; message: Message } | { kind: 'already_read' } | { kind: 'failed' };

export class ReadReceiptManager {
  private config: ReceiptsConfig;
  private store: MessagingStore;
  private channelLayer: ChannelLayer;
  private logger: StructuredLogger;
  private processed: LRUCache<string, boolean>;

  constructor(config: Partial<ReceiptsConfig>, deps: ReadReceiptDependencies) {
    this.config = { ...DEFAULT_RECEIPTS_CONFIG, ...config };
    this.store = deps.store;
    this.channelLayer = deps.channelLayer;
    this.logger = deps.logger ?? new NullLogger();
    this.processed = new LRUCache<string, boolean>({
      max: this.config.cacheMaxSize,
      ttl: this.config.cacheTtlMs,
    });
  }

  /**
   * Mark one message read by its recipient and notify the sender.
   * Resolves true when the message is read after the call.
   */
  async markMessageAsRead(messageId: number, readerId: UserId, readAt: Date = new Date()): Promise<boolean> {
    const key = this.cacheKey(messageId, readerId);
    if (this.isRecentlyProcessed(key)) {
      readReceiptsCounter.inc({ outcome: 'duplicate' });
      return true;
    }

    const outcome = await this.applyRead(messageId, readerId, readAt);
    switch (outcome.kind) {
      case 'read':
        this.addToCache(key);
        await this.sendReceipt(outcome.message, readerId, readAt);
        this.logger.info('Message marked as read', { messageId, readerId, action: 'message_read' });
        return true;
      case 'already_read':
        this.addToCache(key);
        return true;
      case 'failed':
        return false;
    }
  }

  /**
   * Mark a batch read; one failure never aborts the rest. Senders receive
   * one bulk receipt each.
   */
  async markMultipleMessagesAsRead(
    messageIds: number[],
    readerId: UserId,
    readAt: Date = new Date(),
  ): Promise<BulkReadResult> {
    const result: BulkReadResult = {
      processedCount: 0,
      failedCount: 0,
      alreadyReadCount: 0,
      messageIds: [],
      timestamp: readAt.toISOString(),
    };
    const bySender = new Map<UserId, Message[]>();

    for (const messageId of new Set(messageIds)) {
      const key = this.cacheKey(messageId, readerId);
      if (this.isRecentlyProcessed(key)) {
        result.alreadyReadCount++;
        readReceiptsCounter.inc({ outcome: 'duplicate' });
        continue;
      }

      const outcome = await this.applyRead(messageId, readerId, readAt);
      if (outcome.kind === 'failed') {
        result.failedCount++;
        continue;
      }
      this.addToCache(key);
      if (outcome.kind === 'already_read') {
        result.alreadyReadCount++;
        continue;
      }

      result.processedCount++;
      result.messageIds.push(messageId);
      const senderMessages = bySender.get(outcome.message.sender.id) ?? [];
      senderMessages.push(outcome.message);
      bySender.set(outcome.message.sender.id, senderMessages);
    }

    for (const [senderId, messages] of bySender) {
      await this.sendBulkReceipt(senderId, messages, readerId, readAt);
    }

    if (result.processedCount > 0) {
      this.logger.info('Bulk marked messages as read', {
        readerId,
        processed: result.processedCount,
        failed: result.failedCount,
        action: 'messages_bulk_read',
      });
    }
    return result;
  }

  /**
   * Mark what the reader can see of a conversation; without ids, every
   * unread message from the partner
   */
  async markVisibleMessagesAsRead(
    userId: UserId,
    partnerId: UserId,
    visibleIds?: number[] | null,
  ): Promise<BulkReadResult> {
    let unread: number[];
    try {
      unread = await this.store.getUnreadMessageIds(userId, partnerId);
    } catch (error) {
      this.logger.error('Failed to load unread messages', error, {
        userId,
        partnerId,
        action: 'visible_read_failed',
      });
      return {
        processedCount: 0,
        failedCount: visibleIds?.length ?? 0,
        alreadyReadCount: 0,
        messageIds: [],
        timestamp: new Date().toISOString(),
      };
    }

    const visible = visibleIds && visibleIds.length > 0 ? new Set(visibleIds) : null;
    const targets = visible ? unread.filter((id) => visible.has(id)) : unread;
    return this.markMultipleMessagesAsRead(targets, userId);
  }

  isRecentlyProcessed(key: string): boolean {
    return this.processed.has(key);
  }

  addToCache(key: string): void {
    this.processed.set(key, true);
  }

  getCacheSize(): number {
    return this.processed.size;
  }

  clearCache(): void {
    this.processed.clear();
  }

  private cacheKey(messageId: number, readerId: UserId): string {
    return `${String(messageId)}_${String(readerId)}`;
  }

  private async applyRead(messageId: number, readerId: UserId, readAt: Date): Promise<ReadOutcome> {
    try {
      const message = await this.store.getMessage(messageId);
      if (!message || message.recipient.id !== readerId) {
        this.logger.warn('Read receipt for unknown message or wrong reader', {
          messageId,
          readerId,
          action: 'read_receipt_rejected',
        });
        readReceiptsCounter.inc({ outcome: 'failed' });
        return { kind: 'failed' };
      }
      if (message.isRead) {
        readReceiptsCounter.inc({ outcome: 'already_read' });
        return { kind: 'already_read' };
      }

      const transition = await this.store.transitionMessageStatus(messageId, 'read', readAt);
      if (!transition) {
        readReceiptsCounter.inc({ outcome: 'failed' });
        return { kind: 'failed' };
      }
      if (!transition.changed) {
        readReceiptsCounter.inc({ outcome: 'already_read' });
        return { kind: 'already_read' };
      }
      readReceiptsCounter.inc({ outcome: 'read' });
      return { kind: 'read', message: transition.message };
    } catch (error) {
      readReceiptsCounter.inc({ outcome: 'failed' });
      this.logger.error('Failed to mark message as read', toError(error), {
        messageId,
        readerId,
        action: 'read_receipt_failed',
      });
      return { kind: 'failed' };
    }
  }

  private async sendReceipt(message: Message, readerId: UserId, readAt: Date): Promise<void> {
    try {
      await this.channelLayer.groupSend(userGroupName(message.sender.id), {
        type: 'read_receipt',
        payload: {
          type: 'read_receipt',
          message_id: message.id,
          client_id: message.clientId,
          read_by: message.recipient.username,
          read_by_id: readerId,
          read_at: serializeDate(message.readAt) ?? readAt.toISOString(),
          status: 'read',
          status_icon: getStatusIcon('read'),
        },
      });
    } catch (error) {
      this.logger.warn('Read receipt broadcast failed', {
        messageId: message.id,
        error: toError(error).message,
        action: 'read_receipt_broadcast_failed',
      });
    }
  }

  private async sendBulkReceipt(
    senderId: UserId,
    messages: Message[],
    readerId: UserId,
    readAt: Date,
  ): Promise<void> {
    const first = messages[0];
    if (!first) return;
    try {
      await this.channelLayer.groupSend(userGroupName(senderId), {
        type: 'bulk_read_receipt',
        payload: {
          type: 'bulk_read_receipt',
          message_ids: messages.map((message) => message.id),
          read_by: first.recipient.username,
          read_by_id: readerId,
          read_at: readAt.toISOString(),
          count: messages.length,
        },
      });
    } catch (error) {
      this.logger.warn('Bulk read receipt broadcast failed', {
        senderId,
        count: messages.length,
        error: toError(error).message,
        action: 'read_receipt_broadcast_failed',
      });
    }
  }
}
