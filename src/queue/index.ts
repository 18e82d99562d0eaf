/**
 * Offline queue
 */

export {
  DEFAULT_QUEUE_CONFIG,
  OfflineQueueManager,
  calculateRetryDelaySeconds,
  canRetryQueuedMessage,
  type DeliveredMessageSummary,
  type DeliveryReport,
  type OfflineQueueDependencies,
  type QueueMessageInput,
  type QueueRetryInput,
  type QueueStatistics,
  type RetryQueueReport,
} from './offline-queue.js';
