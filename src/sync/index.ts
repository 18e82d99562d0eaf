/**
 * Message sync
 */

export {
  DEFAULT_SYNC_CONFIG,
  MessageSyncManager,
  orderSyncEntries,
  type MessageSyncDependencies,
  type OfflineQueueResult,
  type SyncBatch,
} from './message-sync.js';
