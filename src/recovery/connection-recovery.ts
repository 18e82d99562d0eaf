/**
 * Connection Recovery Manager
 *
 * Per-connection reconnect orchestration. A lost connection is retried with
 * backoff (2, 4, 8, 16, 32 s by default) until `maxRetries`; after that it is
 * marked FAILED and then OFFLINE and nothing else is scheduled. Every state
 * change goes through `updateConnectionState`, which notifies the status
 * callbacks registered for the connection.
 */

import type { RecoveryConfig } from '../types/config.js';
import type { StructuredLogger, UserId } from '../types/index.js';
import { NullLogger, toError } from '../types/index.js';
import type { SyncResponseFrame } from '../serialization/frames.js';
import type { MessageSyncManager } from '../sync/message-sync.js';

export const DEFAULT_RECOVERY_CONFIG: RecoveryConfig = {
  retryDelaysSeconds: [2, 4, 8, 16, 32],
  maxRetries: 5,
  reconnectTimeoutMs: 10000,
  staleTimeoutMinutes: 30,
};

export type RecoveryState = 'connected' | 'connecting' | 'reconnecting' | 'disconnected' | 'failed' | 'offline';

/** Resolves true when the connection is usable again */
export type ReconnectCallback = () => Promise<boolean>;

export interface ConnectionStatusUpdate {
  connectionId: string;
  state: RecoveryState;
  previousState: RecoveryState;
  retryCount: number;
  nextRetryAt: Date | null;
  errorMessage: string | null;
  timestamp: Date;
}

export type StatusCallback = (update: ConnectionStatusUpdate) => void | Promise<void>;

export interface RecoveryHooks {
  /** Receives the catch-up payload after a successful reconnection */
  onSync?: (frame: SyncResponseFrame) => Promise<void>;
  /** Sends frames queued while the connection was down */
  flushQueued?: (messages: Record<string, unknown>[]) => Promise<void>;
}

export interface ConnectionStatusInfo {
  connectionId: string;
  userId: UserId;
  url: string;
  state: RecoveryState;
  retryCount: number;
  maxRetries: number;
  connectedAt: Date | null;
  lastPing: Date;
  nextRetryAt: Date | null;
  missedMessagesCount: number;
  queuedMessagesCount: number;
}

interface ManagedConnection {
  userId: UserId;
  url: string;
  reconnect: ReconnectCallback;
  hooks: RecoveryHooks;
  state: RecoveryState;
  retryCount: number;
  connectedAt: Date | null;
  lastPing: Date;
  lastDisconnectAt: Date | null;
  nextRetryAt: Date | null;
  missedMessagesCount: number;
  queued: Record<string, unknown>[];
  callbacks: Set<StatusCallback>;
  timer: NodeJS.Timeout | null;
}

export interface ConnectionRecoveryDependencies {
  messageSync?: MessageSyncManager;
  logger?: StructuredLogger;
}

export class ConnectionRecoveryManager {
  private config: RecoveryConfig;
  private connections = new Map<string, ManagedConnection>();
  private messageSync?: MessageSyncManager;
  private logger: StructuredLogger;

  constructor(config: Partial<RecoveryConfig> = {}, deps: ConnectionRecoveryDependencies = {}) {
    this.config = { ...DEFAULT_RECOVERY_CONFIG, ...config };
    this.messageSync = deps.messageSync;
    this.logger = deps.logger ?? new NullLogger();
  }

  registerConnection(
    connectionId: string,
    userId: UserId,
    url: string,
    reconnectCallback: ReconnectCallback,
    hooks: RecoveryHooks = {},
  ): void {
    const now = new Date();
    this.unregisterConnection(connectionId);
    this.connections.set(connectionId, {
      userId,
      url,
      reconnect: reconnectCallback,
      hooks,
      state: 'connected',
      retryCount: 0,
      connectedAt: now,
      lastPing: now,
      lastDisconnectAt: null,
      nextRetryAt: null,
      missedMessagesCount: 0,
      queued: [],
      callbacks: new Set(),
      timer: null,
    });
    this.logger.debug('Connection registered for recovery', { connectionId, userId, action: 'recovery_register' });
  }

  unregisterConnection(connectionId: string): void {
    const connection = this.connections.get(connectionId);
    if (!connection) return;
    this.clearTimer(connection);
    this.connections.delete(connectionId);
    this.logger.debug('Connection unregistered from recovery', { connectionId, action: 'recovery_unregister' });
  }

  /**
   * Subscribe to state changes; returns the unsubscribe function
   */
  addStatusCallback(connectionId: string, callback: StatusCallback): () => void {
    const connection = this.connections.get(connectionId);
    if (!connection) return () => undefined;
    connection.callbacks.add(callback);
    return () => {
      connection.callbacks.delete(callback);
    };
  }

  /**
   * Single mutation point for connection state
   */
  updateConnectionState(connectionId: string, state: RecoveryState, errorMessage: string | null = null): void {
    const connection = this.connections.get(connectionId);
    if (!connection) return;

    const previousState = connection.state;
    const now = new Date();
    connection.state = state;
    if (state === 'connected') {
      connection.connectedAt = now;
      connection.retryCount = 0;
      connection.nextRetryAt = null;
      connection.lastPing = now;
    } else if (state === 'disconnected') {
      connection.lastDisconnectAt = now;
    }

    const update: ConnectionStatusUpdate = {
      connectionId,
      state,
      previousState,
      retryCount: connection.retryCount,
      nextRetryAt: connection.nextRetryAt,
      errorMessage,
      timestamp: now,
    };
    for (const callback of [...connection.callbacks]) {
      this.notify(callback, update);
    }

    this.logger.info('Connection state changed', {
      connectionId,
      from: previousState,
      to: state,
      retryCount: connection.retryCount,
      action: 'recovery_state_change',
    });
  }

  handleConnectionLost(connectionId: string, reason: string | null = null): void {
    const connection = this.connections.get(connectionId);
    if (!connection) return;

    this.clearTimer(connection);
    this.updateConnectionState(connectionId, 'disconnected', reason);
    if (connection.retryCount < this.config.maxRetries) {
      this.scheduleReconnection(connectionId, connection);
    } else {
      this.switchToOffline(connectionId, 'Maximum retry attempts exceeded');
    }
  }

  /**
   * Delay before the next attempt; the last configured delay repeats
   */
  getRetryDelaySeconds(retryCount: number): number {
    const delays = this.config.retryDelaysSeconds;
    return delays[Math.min(retryCount, delays.length - 1)] ?? 0;
  }

  /**
   * Drop the retry budget and attempt right away
   */
  async forceReconnect(connectionId: string): Promise<boolean> {
    const connection = this.connections.get(connectionId);
    if (!connection) return false;

    this.clearTimer(connection);
    connection.retryCount = 0;
    connection.nextRetryAt = null;
    this.logger.info('Forced reconnection', { connectionId, action: 'recovery_force_reconnect' });
    await this.attemptReconnection(connectionId);
    return this.connections.get(connectionId)?.state === 'connected';
  }

  queueMessageForRetry(connectionId: string, message: Record<string, unknown>): boolean {
    const connection = this.connections.get(connectionId);
    if (!connection) return false;
    connection.queued.push(message);
    return true;
  }

  updateHeartbeat(connectionId: string): boolean {
    const connection = this.connections.get(connectionId);
    if (!connection) return false;
    connection.lastPing = new Date();
    return true;
  }

  /**
   * Unregister connections without a heartbeat for `timeoutMinutes`
   */
  cleanupStaleConnections(timeoutMinutes = this.config.staleTimeoutMinutes): number {
    const cutoff = Date.now() - timeoutMinutes * 60 * 1000;
    const stale = [...this.connections.entries()]
      .filter(([, connection]) => connection.lastPing.getTime() < cutoff)
      .map(([connectionId]) => connectionId);

    for (const connectionId of stale) {
      this.unregisterConnection(connectionId);
    }
    if (stale.length > 0) {
      this.logger.info('Cleaned up stale recovery entries', { count: stale.length, action: 'recovery_cleanup' });
    }
    return stale.length;
  }

  getConnectionStatus(connectionId: string): ConnectionStatusInfo | null {
    const connection = this.connections.get(connectionId);
    if (!connection) return null;
    return {
      connectionId,
      userId: connection.userId,
      url: connection.url,
      state: connection.state,
      retryCount: connection.retryCount,
      maxRetries: this.config.maxRetries,
      connectedAt: connection.connectedAt,
      lastPing: connection.lastPing,
      nextRetryAt: connection.nextRetryAt,
      missedMessagesCount: connection.missedMessagesCount,
      queuedMessagesCount: connection.queued.length,
    };
  }

  getAllConnectionsStatus(): ConnectionStatusInfo[] {
    const statuses: ConnectionStatusInfo[] = [];
    for (const connectionId of this.connections.keys()) {
      const status = this.getConnectionStatus(connectionId);
      if (status) statuses.push(status);
    }
    return statuses;
  }

  /**
   * Cancel every pending retry
   */
  shutdown(): void {
    for (const connection of this.connections.values()) {
      this.clearTimer(connection);
    }
    this.connections.clear();
  }

  private scheduleReconnection(connectionId: string, connection: ManagedConnection): void {
    const delaySeconds = this.getRetryDelaySeconds(connection.retryCount);
    connection.nextRetryAt = new Date(Date.now() + delaySeconds * 1000);
    connection.retryCount++;
    this.updateConnectionState(connectionId, 'reconnecting');

    connection.timer = setTimeout(() => {
      connection.timer = null;
      this.attemptReconnection(connectionId).catch((error: unknown) => {
        this.logger.error('Reconnection attempt crashed', toError(error), {
          connectionId,
          action: 'recovery_attempt_failed',
        });
      });
    }, delaySeconds * 1000);

    this.logger.info('Reconnection scheduled', {
      connectionId,
      delaySeconds,
      attempt: connection.retryCount,
      action: 'recovery_scheduled',
    });
  }

  private async attemptReconnection(connectionId: string): Promise<void> {
    if (!this.connections.has(connectionId)) return;
    this.updateConnectionState(connectionId, 'connecting');

    const success = await this.executeReconnection(connectionId);
    const connection = this.connections.get(connectionId);
    if (!connection) return;

    if (success) {
      const disconnectedAt = connection.lastDisconnectAt;
      this.updateConnectionState(connectionId, 'connected');
      await this.synchronizeMissedMessages(connectionId, connection, disconnectedAt);
      await this.flushQueuedMessages(connectionId, connection);
      return;
    }

    if (connection.retryCount < this.config.maxRetries) {
      this.scheduleReconnection(connectionId, connection);
    } else {
      this.switchToOffline(connectionId, 'Reconnection failed after maximum attempts');
    }
  }

  private async executeReconnection(connectionId: string): Promise<boolean> {
    const connection = this.connections.get(connectionId);
    if (!connection) return false;

    let timeout: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timeout = setTimeout(() => {
        this.logger.warn('Reconnection timed out', {
          connectionId,
          timeoutMs: this.config.reconnectTimeoutMs,
          action: 'recovery_timeout',
        });
        resolve(false);
      }, this.config.reconnectTimeoutMs);
    });

    try {
      return await Promise.race([connection.reconnect(), timedOut]);
    } catch (error) {
      this.logger.warn('Reconnection callback failed', {
        connectionId,
        error: toError(error).message,
        action: 'recovery_callback_failed',
      });
      return false;
    } finally {
      clearTimeout(timeout);
    }
  }

  private async synchronizeMissedMessages(
    connectionId: string,
    connection: ManagedConnection,
    since: Date | null,
  ): Promise<void> {
    if (!this.messageSync || !since) return;
    try {
      const frame = await this.messageSync.synchronizeMessagesOnReconnection(connection.userId, since, connectionId);
      connection.missedMessagesCount = frame.incoming_count;
      if (connection.hooks.onSync) await connection.hooks.onSync(frame);
    } catch (error) {
      this.logger.error('Failed to synchronize missed messages', toError(error), {
        connectionId,
        userId: connection.userId,
        action: 'recovery_sync_failed',
      });
    }
  }

  private async flushQueuedMessages(connectionId: string, connection: ManagedConnection): Promise<void> {
    if (connection.queued.length === 0 || !connection.hooks.flushQueued) return;
    const messages = connection.queued;
    connection.queued = [];
    try {
      await connection.hooks.flushQueued(messages);
      this.logger.info('Flushed queued frames', { connectionId, count: messages.length, action: 'recovery_flush' });
    } catch (error) {
      connection.queued = [...messages, ...connection.queued];
      this.logger.error('Failed to flush queued frames', toError(error), {
        connectionId,
        action: 'recovery_flush_failed',
      });
    }
  }

  private switchToOffline(connectionId: string, reason: string): void {
    const connection = this.connections.get(connectionId);
    if (!connection) return;
    this.clearTimer(connection);
    connection.nextRetryAt = null;
    this.updateConnectionState(connectionId, 'failed', reason);
    this.updateConnectionState(connectionId, 'offline', 'Switched to offline mode');
  }

  private clearTimer(connection: ManagedConnection): void {
    if (connection.timer) {
      clearTimeout(connection.timer);
      connection.timer = null;
    }
  }

  private notify(callback: StatusCallback, update: ConnectionStatusUpdate): void {
    const onError = (error: unknown): void => {
      this.logger.error('Status callback failed', toError(error), {
        connectionId: update.connectionId,
        state: update.state,
        action: 'recovery_callback_error',
      });
    };
    try {
      const result = callback(update);
      if (result instanceof Promise) result.catch(onError);
    } catch (error) {
      onError(error);
    }
  }
}
