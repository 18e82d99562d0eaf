/**
 * Read receipts
 */

export {
  DEFAULT_RECEIPTS_CONFIG,
  ReadReceiptManager,
  type BulkReadResult,
  type ReadReceiptDependencies,
} from './read-receipt-manager.js';
