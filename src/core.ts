/**
 * Messaging Core
 *
 * Composition root: builds every manager once and shares them by reference
 * with the consumers. Sessions never construct managers of their own.
 */

import { RoomSequencer, type ChannelLayer } from './channels/index.js';
import { MessagingErrorHandler } from './errors/error-handler.js';
import { NullLogger, type StructuredLogger } from './logger/index.js';
import { NotificationService, type FallbackNotifier } from './notifications/index.js';
import { PresenceManager, TypingManager } from './presence/index.js';
import { OfflineQueueManager } from './queue/index.js';
import { ConnectionRateLimiter } from './rate-limit/index.js';
import { ReadReceiptManager } from './receipts/index.js';
import { ConnectionRecoveryManager } from './recovery/index.js';
import { RetryEngine } from './retry/index.js';
import { MessageSyncManager } from './sync/index.js';
import type { MessagingConfig } from './types/config.js';
import type { MessagingStore } from './types/index.js';
import { ConnectionValidator } from './validation/connection-validator.js';

export interface MessagingCoreOptions {
  config: MessagingConfig;
  store: MessagingStore;
  channelLayer: ChannelLayer;
  logger?: StructuredLogger;
  /** Receives notifications whose preference asks for email or push */
  fallbackNotifier?: FallbackNotifier;
}

export interface MessagingCore {
  readonly config: MessagingConfig;
  readonly store: MessagingStore;
  readonly channelLayer: ChannelLayer;
  readonly logger: StructuredLogger;
  readonly validator: ConnectionValidator;
  readonly errorHandler: MessagingErrorHandler;
  readonly retryEngine: RetryEngine;
  readonly offlineQueue: OfflineQueueManager;
  readonly presence: PresenceManager;
  readonly typing: TypingManager;
  readonly receipts: ReadReceiptManager;
  readonly messageSync: MessageSyncManager;
  readonly recovery: ConnectionRecoveryManager;
  readonly notifications: NotificationService;
  readonly rateLimiter: ConnectionRateLimiter;
  readonly sequencer: RoomSequencer;
  /** Stop background timers owned by the managers */
  stop(): void;
}

export function createMessagingCore(options: MessagingCoreOptions): MessagingCore {
  const { config, store, channelLayer } = options;
  const logger = options.logger ?? new NullLogger();

  const errorHandler = new MessagingErrorHandler(config.errors, { logger, store });
  const retryEngine = new RetryEngine(config.retry, { logger, errorHandler, store });
  const offlineQueue = new OfflineQueueManager(config.queue, { store, channelLayer, logger, errorHandler });
  const messageSync = new MessageSyncManager(config.sync, { store, offlineQueue, logger });
  const recovery = new ConnectionRecoveryManager(config.recovery, { messageSync, logger });

  return {
    config,
    store,
    channelLayer,
    logger,
    validator: new ConnectionValidator(logger),
    errorHandler,
    retryEngine,
    offlineQueue,
    presence: new PresenceManager(config.presence, { store, channelLayer, logger }),
    typing: new TypingManager(config.typing, { store, channelLayer, logger }),
    receipts: new ReadReceiptManager(config.receipts, { store, channelLayer, logger }),
    messageSync,
    recovery,
    notifications: new NotificationService(config.notifications, {
      store,
      channelLayer,
      logger,
      fallbackNotifier: options.fallbackNotifier,
    }),
    rateLimiter: new ConnectionRateLimiter(config.server.rateLimit),
    sequencer: new RoomSequencer(),
    stop() {
      offlineQueue.stop();
      recovery.shutdown();
    },
  };
}
