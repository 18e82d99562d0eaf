/**
 * Offline Queue Manager Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  OfflineQueueManager,
  calculateRetryDelaySeconds,
  canRetryQueuedMessage,
} from '../../queue/offline-queue.js';
import { InMemoryChannelLayer } from '../../channels/channel-layer.js';
import { MessagingErrorHandler } from '../../errors/error-handler.js';
import { ErrorCategory } from '../../errors/hierarchy.js';
import { daysFromNow } from '../../storage/index.js';
import type { InMemoryMessagingStore } from '../../storage/memory-store.js';
import type { OffloadedMessagingStore } from '../../storage/executor.js';
import { alice, bob, captureGroup, carol, createStores, daysAgo } from '../fixtures.js';

const SECOND_MS = 1000;

describe('OfflineQueueManager', () => {
  let sync: InMemoryMessagingStore;
  let store: OffloadedMessagingStore;
  let channelLayer: InMemoryChannelLayer;
  let queue: OfflineQueueManager;

  beforeEach(() => {
    ({ sync, store } = createStores());
    channelLayer = new InMemoryChannelLayer();
    queue = new OfflineQueueManager({}, { store, channelLayer });
  });

  describe('calculateRetryDelaySeconds', () => {
    const config = { baseDelaySeconds: 2, backoffMultiplier: 2, maxDelaySeconds: 300 };

    it('should double the delay for each retry', () => {
      expect([1, 2, 3, 4].map((count) => calculateRetryDelaySeconds(count, config))).toEqual([2, 4, 8, 16]);
    });

    it('should cap the delay', () => {
      expect(calculateRetryDelaySeconds(10, config)).toBe(300);
    });
  });

  describe('queueMessageForOfflineRecipient', () => {
    it('should queue with normal priority and a 7 day expiry', async () => {
      const before = Date.now();
      const id = await queue.queueMessageForOfflineRecipient({
        sender: alice,
        recipient: bob,
        content: 'hello',
        clientId: 'c1',
      });

      expect(id).not.toBeNull();
      const entry = sync.getQueuedMessage(id ?? 0);
      expect(entry?.queueType).toBe('incoming');
      expect(entry?.priority).toBe(2);
      expect(entry?.isProcessed).toBe(false);
      const expiresAt = entry?.expiresAt.getTime() ?? 0;
      expect(expiresAt).toBeGreaterThanOrEqual(before + 7 * 86400 * SECOND_MS);
      expect(expiresAt).toBeLessThanOrEqual(Date.now() + 7 * 86400 * SECOND_MS);
    });

    it('should return the pending entry for a repeated client id', async () => {
      const first = await queue.queueMessageForOfflineRecipient({
        sender: alice,
        recipient: bob,
        content: 'hello',
        clientId: 'c1',
      });
      const second = await queue.queueMessageForOfflineRecipient({
        sender: alice,
        recipient: bob,
        content: 'hello',
        clientId: 'c1',
      });

      expect(second).toBe(first);
      expect((await queue.getQueueStatistics()).totalQueued).toBe(1);
    });

    it('should return null when the store fails', async () => {
      vi.spyOn(store, 'createQueuedMessage').mockRejectedValue(new Error('disk full'));
      await expect(
        queue.queueMessageForOfflineRecipient({ sender: alice, recipient: bob, content: 'hello' }),
      ).resolves.toBeNull();
    });
  });

  describe('queueOutgoingMessageForOfflineSender', () => {
    it('should queue an outgoing entry', async () => {
      const id = await queue.queueOutgoingMessageForOfflineSender({
        sender: alice,
        recipient: bob,
        content: 'later',
        clientId: 'o1',
      });
      const entry = sync.getQueuedMessage(id ?? 0);
      expect(entry?.queueType).toBe('outgoing');
      expect(entry?.priority).toBe(2);
    });
  });

  describe('queueMessageForRetry', () => {
    it('should queue with high priority and schedule the first retry', async () => {
      const before = Date.now();
      const id = await queue.queueMessageForRetry({
        originalMessageId: 42,
        sender: alice,
        recipient: bob,
        content: 'hello',
        error: 'broadcast failed',
      });

      const entry = sync.getQueuedMessage(id ?? 0);
      expect(entry?.queueType).toBe('retry');
      expect(entry?.priority).toBe(1);
      expect(entry?.retryCount).toBe(1);
      expect(entry?.lastError).toBe('broadcast failed');
      expect(entry?.originalMessageId).toBe(42);
      expect(entry?.nextRetryAt?.getTime()).toBeGreaterThanOrEqual(before + 2 * SECOND_MS);
      expect(entry?.expiresAt.getTime()).toBeLessThanOrEqual(Date.now() + 86400 * SECOND_MS);
    });
  });

  describe('deliverQueuedMessagesForUser', () => {
    it('should deliver a queued message once the recipient comes online', async () => {
      const received = await captureGroup(channelLayer, 'user_2');
      await queue.queueMessageForOfflineRecipient({
        sender: alice,
        recipient: bob,
        content: 'hello',
        clientId: 'c1',
      });

      const report = await queue.deliverQueuedMessagesForUser(bob.id);

      expect(report.deliveredCount).toBe(1);
      expect(report.failedCount).toBe(0);
      expect(report.totalProcessed).toBe(1);
      expect(report.messages.map((m) => m.content)).toEqual(['hello']);
      expect(report.messages[0]?.clientId).toBe('c1');
      expect(received).toHaveLength(1);
      expect(received[0]?.type).toBe('chat_message');

      const stats = await queue.getQueueStatistics(bob.id);
      expect(stats.totalQueued).toBe(0);
      expect(stats.totalProcessed).toBe(1);
    });

    it('should mark a linked stored message delivered instead of creating another', async () => {
      const { message } = sync.createMessage({ sender: alice, recipient: bob, content: 'stored', clientId: null });
      await queue.queueMessageForOfflineRecipient({
        sender: alice,
        recipient: bob,
        content: 'stored',
        originalMessageId: message.id,
      });

      const report = await queue.deliverQueuedMessagesForUser(bob.id);

      expect(report.deliveredCount).toBe(1);
      expect(report.messages[0]?.id).toBe(message.id);
      expect(sync.getConversation(alice.id, bob.id, 10)).toHaveLength(1);
      expect(sync.getMessage(message.id)?.status).toBe('delivered');
    });

    it('should deliver in priority then chronological order', async () => {
      const now = new Date();
      const base = {
        sender: alice,
        recipient: bob,
        clientId: null,
        queueType: 'incoming' as const,
        expiresAt: daysFromNow(7, now),
        maxRetries: 3,
      };
      sync.createQueuedMessage({ ...base, content: 'low', priority: 3, at: new Date(now.getTime() - 3000) });
      sync.createQueuedMessage({ ...base, content: 'normal-late', priority: 2, at: new Date(now.getTime() - 1000) });
      sync.createQueuedMessage({ ...base, content: 'normal-early', priority: 2, at: new Date(now.getTime() - 2000) });
      sync.createQueuedMessage({ ...base, content: 'urgent', priority: 1, at: now });

      const report = await queue.deliverQueuedMessagesForUser(bob.id);

      expect(report.messages.map((m) => m.content)).toEqual(['urgent', 'normal-early', 'normal-late', 'low']);
    });

    it('should never deliver the same entry twice under concurrent calls', async () => {
      await queue.queueMessageForOfflineRecipient({ sender: alice, recipient: bob, content: 'once' });

      const [first, second] = await Promise.all([
        queue.deliverQueuedMessagesForUser(bob.id),
        queue.deliverQueuedMessagesForUser(bob.id),
      ]);

      expect(first.deliveredCount + second.deliveredCount).toBe(1);
      expect(sync.getConversation(alice.id, bob.id, 10)).toHaveLength(1);
    });

    it('should drop per-user delivery locks once deliveries finish', async () => {
      await queue.queueMessageForOfflineRecipient({ sender: alice, recipient: bob, content: 'once' });

      const pending = Promise.all([
        queue.deliverQueuedMessagesForUser(bob.id),
        queue.deliverQueuedMessagesForUser(bob.id),
        queue.deliverQueuedMessagesForUser(carol.id),
      ]);
      expect(queue.getActiveDeliveryCount()).toBe(2);

      await pending;
      expect(queue.getActiveDeliveryCount()).toBe(0);
    });

    it('should skip expired entries', async () => {
      const created = daysAgo(8);
      sync.createQueuedMessage({
        sender: alice,
        recipient: bob,
        content: 'stale',
        clientId: null,
        queueType: 'incoming',
        priority: 2,
        expiresAt: daysFromNow(7, created),
        maxRetries: 3,
        at: created,
      });

      const report = await queue.deliverQueuedMessagesForUser(bob.id);
      expect(report.deliveredCount).toBe(0);
      expect(report.messages).toEqual([]);
    });

    it('should reschedule an entry whose broadcast fails', async () => {
      const id = await queue.queueMessageForOfflineRecipient({ sender: alice, recipient: bob, content: 'hi' });
      vi.spyOn(channelLayer, 'groupSend').mockRejectedValueOnce(new Error('layer down'));

      const before = Date.now();
      const report = await queue.deliverQueuedMessagesForUser(bob.id);

      expect(report.failedCount).toBe(1);
      const entry = sync.getQueuedMessage(id ?? 0);
      expect(entry?.isProcessed).toBe(false);
      expect(entry?.retryCount).toBe(1);
      expect(entry?.errorCount).toBe(1);
      expect(entry?.lastError).toBe('layer down');
      expect(entry?.nextRetryAt?.getTime()).toBeGreaterThanOrEqual(before + 2 * SECOND_MS);
    });
  });

  describe('cleanupExpiredMessages', () => {
    it('should remove entries older than 7 days and keep 6 day old ones', async () => {
      for (const [content, age] of [
        ['old', 8],
        ['recent', 6],
      ] as const) {
        const created = daysAgo(age);
        sync.createQueuedMessage({
          sender: alice,
          recipient: bob,
          content,
          clientId: null,
          queueType: 'incoming',
          priority: 2,
          expiresAt: daysFromNow(7, created),
          maxRetries: 3,
          at: created,
        });
      }

      await expect(queue.cleanupExpiredMessages()).resolves.toBe(1);
      const report = await queue.deliverQueuedMessagesForUser(bob.id);
      expect(report.messages.map((m) => m.content)).toEqual(['recent']);
    });
  });

  describe('processRetryQueue', () => {
    it('should re-deliver a stored message queued for retry', async () => {
      const received = await captureGroup(channelLayer, 'user_2');
      const { message } = sync.createMessage({ sender: alice, recipient: bob, content: 'retry me', status: 'failed' });
      const id = await queue.queueMessageForRetry({
        originalMessageId: message.id,
        sender: alice,
        recipient: bob,
        content: 'retry me',
        error: 'broadcast failed',
      });
      sync.updateQueuedMessage(id ?? 0, { nextRetryAt: new Date(Date.now() - 1000) });

      const report = await queue.processRetryQueue();

      expect(report).toMatchObject({ processedCount: 1, failedCount: 0, totalProcessed: 1, skipped: false });
      expect(sync.getMessage(message.id)?.status).toBe('sent');
      expect(sync.getQueuedMessage(id ?? 0)?.isProcessed).toBe(true);
      expect(received.map((event) => event.type)).toEqual(['chat_message']);
    });

    it('should reschedule outgoing entries while the recipient is offline', async () => {
      const id = await queue.queueOutgoingMessageForOfflineSender({ sender: alice, recipient: bob, content: 'wait' });
      sync.updateQueuedMessage(id ?? 0, { nextRetryAt: new Date(Date.now() - 1000) });

      const report = await queue.processRetryQueue();

      expect(report.failedCount).toBe(1);
      const entry = sync.getQueuedMessage(id ?? 0);
      expect(entry?.retryCount).toBe(1);
      expect(entry?.lastError).toBe('Retry attempt failed');
      expect(entry?.isProcessed).toBe(false);
    });

    it('should deliver outgoing entries once the recipient is online', async () => {
      const id = await queue.queueOutgoingMessageForOfflineSender({ sender: alice, recipient: bob, content: 'now' });
      sync.updateQueuedMessage(id ?? 0, { nextRetryAt: new Date(Date.now() - 1000) });
      sync.incrementConnections(bob, 'conn_2_abcdef12', {}, new Date());

      const report = await queue.processRetryQueue();

      expect(report.processedCount).toBe(1);
      expect(sync.getConversation(alice.id, bob.id, 10).map((m) => m.content)).toEqual(['now']);
    });

    it('should mark the entry processed once its retries are used up', async () => {
      const id = await queue.queueOutgoingMessageForOfflineSender({ sender: alice, recipient: bob, content: 'never' });
      sync.updateQueuedMessage(id ?? 0, { nextRetryAt: new Date(Date.now() - 1000), retryCount: 2 });

      await queue.processRetryQueue();

      const entry = sync.getQueuedMessage(id ?? 0);
      expect(entry?.retryCount).toBe(3);
      expect(entry && canRetryQueuedMessage(entry)).toBe(false);

      sync.updateQueuedMessage(id ?? 0, { nextRetryAt: new Date(Date.now() - 1000) });
      const report = await queue.processRetryQueue();
      expect(report.totalProcessed).toBe(0);
    });

    it('should skip the sweep while the queue circuit is open', async () => {
      const errorHandler = new MessagingErrorHandler({ failureThreshold: 1 });
      errorHandler.recordFailure(ErrorCategory.DATABASE, { operation: 'offline_queue' });
      const guarded = new OfflineQueueManager({}, { store, channelLayer, errorHandler });
      const listSpy = vi.spyOn(store, 'listPendingRetries');

      const report = await guarded.processRetryQueue();

      expect(report.skipped).toBe(true);
      expect(listSpy).not.toHaveBeenCalled();
    });
  });

  describe('getQueueStatistics', () => {
    it('should aggregate by queue type and priority without mutating', async () => {
      await queue.queueMessageForOfflineRecipient({ sender: alice, recipient: bob, content: 'a', priority: 1 });
      await queue.queueOutgoingMessageForOfflineSender({ sender: alice, recipient: bob, content: 'b' });

      const first = await queue.getQueueStatistics();
      const second = await queue.getQueueStatistics();

      expect(first.totalQueued).toBe(2);
      expect(first.byQueueType).toEqual({ outgoing: 1, incoming: 1, retry: 0 });
      expect(first.byPriority).toEqual({ '1': 1, '2': 1, '3': 0 });
      expect(first.pendingRetries).toBe(0);
      expect({ ...second, timestamp: first.timestamp }).toEqual(first);
    });
  });

  describe('sweeper', () => {
    it('should run cleanup and retries on the configured interval', async () => {
      vi.useFakeTimers();
      const swept = new OfflineQueueManager({ sweepIntervalMs: 1000 }, { store, channelLayer });
      const sweepSpy = vi.spyOn(swept, 'sweep');

      swept.start();
      await vi.advanceTimersByTimeAsync(2500);
      swept.stop();
      await vi.advanceTimersByTimeAsync(2000);

      expect(sweepSpy).toHaveBeenCalledTimes(2);
      vi.useRealTimers();
    });
  });
});
