/**
 * MongoDB Module
 *
 * Durable messaging store:
 * - Numeric ids from a counters collection
 * - Atomic presence counters and forward-only status transitions
 * - Unique (sender, client id) index for idempotent sends
 */

export { MongoMessagingStore, createMongoStore } from './store.js';
export type { MongoMessagingStoreConfig } from './store.js';
