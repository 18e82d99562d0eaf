/**
 * Connection recovery
 */

export {
  ConnectionRecoveryManager,
  DEFAULT_RECOVERY_CONFIG,
  type ConnectionRecoveryDependencies,
  type ConnectionStatusInfo,
  type ConnectionStatusUpdate,
  type ReconnectCallback,
  type RecoveryHooks,
  type RecoveryState,
  type StatusCallback,
} from './connection-recovery.js';
