/**
 * realtime-messaging-core
 *
 * Real-time chat and notification core:
 * - WebSocket chat and notification sessions (ws)
 * - Persistence behind a circuit-broken async boundary (memory or MongoDB)
 * - Retries with backoff and an offline queue with expiry
 * - Presence, typing indicators and read receipts
 * - Connection recovery and catch-up sync
 * - Notifications with grouping and quiet hours
 * - Per-domain circuit breakers and error statistics
 */

// ========== Types ==========
export type {
  UserId,
  UserRef,
  Message,
  MessageStatus,
  QueuedMessage,
  QueueType,
  QueuePriority,
  Notification,
  NotificationType,
  NotificationPriority,
  NotificationPreference,
  DeliveryMethod,
  UserStatus,
  TypingStatus,
  MessagingErrorRecord,
  Result,
  MessagingStore,
  SyncMessagingStore,
} from './types/index.js';

export {
  MessagingError,
  StorageError,
  NotFoundError,
  ValidationError,
  ConfigError,
  TransmissionError,
  AuthenticationError,
  RateLimitError,
  TimeoutError,
  CircuitOpenError,
  MaxRetriesExceededError,
  MAX_MESSAGE_LENGTH,
  toError,
} from './types/index.js';

export type { MessagingConfig } from './types/config.js';

// ========== Configuration ==========
export {
  DEVELOPMENT,
  PRODUCTION,
  TESTING,
  PRESETS,
  getPreset,
  isPresetName,
  createConfigFromPreset,
  loadConfigFromEnv,
} from './config/index.js';
export type { PresetName, ConfigEnv } from './config/index.js';

export { MessagingConfigSchema } from './validation/schemas.js';
export { validateAndReportConfig, validatePreset } from './validation/reporter.js';
export type { ConfigIssue, ValidationReport } from './validation/reporter.js';

// ========== Logging & Context ==========
export { ConsoleStructuredLogger, NullLogger, LogLevel, createLogger } from './logger/index.js';
export type { StructuredLogger, LogEnvironment } from './logger/index.js';
export { withContext, getContext, getCorrelationId } from './context/execution-context.js';

// ========== Errors ==========
export {
  ErrorCategory,
  ErrorSeverity,
  ErrorCode,
  getErrorMetadata,
  getRetryDelay,
  isRetryable,
} from './errors/hierarchy.js';
export { MessagingErrorHandler } from './errors/error-handler.js';
export type { HandledError, ErrorStatistics } from './errors/error-handler.js';
export { CategoryCircuitBreaker, CircuitState } from './errors/circuit-breaker.js';

// ========== Storage ==========
export { InMemoryMessagingStore } from './storage/memory-store.js';
export { OffloadedMessagingStore, offloadStore } from './storage/executor.js';
export { MongoMessagingStore, createMongoStore } from './mongodb/index.js';
export type { MongoMessagingStoreConfig } from './mongodb/index.js';

// ========== Channels ==========
export { InMemoryChannelLayer, RoomSequencer, chatRoomName, userGroupName } from './channels/index.js';
export type { ChannelLayer, ChannelHandler } from './channels/index.js';
export { RedisChannelLayer } from './redis/index.js';
export type { RedisChannelLayerConfig } from './redis/index.js';

// ========== Managers ==========
export { RetryEngine } from './retry/index.js';
export { OfflineQueueManager } from './queue/index.js';
export { PresenceManager, TypingManager } from './presence/index.js';
export { ReadReceiptManager } from './receipts/index.js';
export { ConnectionRecoveryManager } from './recovery/index.js';
export { MessageSyncManager } from './sync/index.js';
export { NotificationService } from './notifications/index.js';
export type { FallbackNotifier } from './notifications/index.js';
export { ConnectionRateLimiter, TokenBucket } from './rate-limit/index.js';

// ========== Sessions ==========
export { ChatConsumer, NotificationConsumer, CloseCode } from './consumers/index.js';
export type { ConnectRequest, ConsumerSocket } from './consumers/index.js';
export { createMessagingCore } from './core.js';
export type { MessagingCore, MessagingCoreOptions } from './core.js';
export { MessagingGateway, trustedHeaderAuthenticate } from './gateway.js';
export type { Authenticate, MaintenanceReport } from './gateway.js';
export { createMessagingServer } from './server.js';
export type { MessagingServer, MessagingServerOptions } from './server.js';

// ========== Wire Frames ==========
export type { ChannelEvent, OutboundFrame, MessageFrame, SyncResponseFrame } from './serialization/frames.js';
export type { InboundFrame } from './validation/connection-validator.js';

// ========== Health & Metrics ==========
export { performHealthCheck, isReady, isLive } from './health/health-check.js';
export type { HealthStatus, ComponentHealth } from './health/health-check.js';
export { metricsRegistry, getMetricsText, resetMetrics } from './metrics/index.js';
