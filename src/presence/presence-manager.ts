/**
 * Presence Manager
 *
 * Online/offline state per user, derived from a reference count of live
 * sockets kept atomically by the store. Status changes are broadcast to the
 * user's personal group only on online/offline transitions, so a second tab
 * does not announce the user again.
 */

import { randomBytes } from 'node:crypto';
import type { ChannelLayer } from '../channels/channel-layer.js';
import { userGroupName } from '../channels/channel-layer.js';
import type { PresenceConfig } from '../types/config.js';
import type { MessagingStore, StructuredLogger, UserId, UserRef, UserStatus } from '../types/index.js';
import { NullLogger } from '../types/index.js';
import { serializeDate, serializeUserStatus } from '../serialization/serializers.js';

export const DEFAULT_PRESENCE_CONFIG: PresenceConfig = {
  staleTimeoutSeconds: 30,
};

const RECENT_ACTIVITY_MS = 5 * 60 * 1000;

export interface PresenceDependencies {
  store: MessagingStore;
  channelLayer: ChannelLayer;
  logger?: StructuredLogger;
}

export interface UserPresence {
  userId: UserId;
  username: string;
  isOnline: boolean;
  lastSeen: string | null;
  lastSeenDisplay: string;
  activeConnections: number;
  lastPing: string | null;
  connectionStale: boolean;
  deviceInfo: Record<string, unknown>;
}

export interface OnlineUser {
  userId: UserId;
  username: string;
  activeConnections: number;
  lastPing: string | null;
  deviceInfo: Record<string, unknown>;
}

export interface PresenceSummary {
  totalUsers: number;
  onlineUsers: number;
  offlineUsers: number;
  onlinePercentage: number;
  totalConnections: number;
  avgConnectionsPerOnlineUser: number;
  recentActivityCount: number;
  timestamp: string;
}

const TIME_UNITS: [string, number][] = [
  ['year', 365 * 86400000],
  ['month', 30 * 86400000],
  ['week', 7 * 86400000],
  ['day', 86400000],
  ['hour', 3600000],
  ['minute', 60000],
];

/**
 * Largest whole unit of an elapsed time, e.g. "3 hours"
 */
export function formatElapsed(elapsedMs: number): string {
  for (const [unit, size] of TIME_UNITS) {
    const count = Math.floor(elapsedMs / size);
    if (count >= 1) return `${String(count)} ${unit}${count === 1 ? '' : 's'}`;
  }
  return '0 minutes';
}

export function getLastSeenDisplay(status: UserStatus | null, now: Date = new Date()): string {
  if (!status) return 'Never';
  if (status.isOnline) return 'Online';
  return `Last seen ${formatElapsed(now.getTime() - status.lastSeen.getTime())} ago`;
}

export function isConnectionStale(status: UserStatus | null, timeoutSeconds: number, now: Date = new Date()): boolean {
  if (!status?.lastPing) return true;
  return status.lastPing.getTime() < now.getTime() - timeoutSeconds * 1000;
}

export class PresenceManager {
  private config: PresenceConfig;
  private store: MessagingStore;
  private channelLayer: ChannelLayer;
  private logger: StructuredLogger;

  constructor(config: Partial<PresenceConfig>, deps: PresenceDependencies) {
    this.config = { ...DEFAULT_PRESENCE_CONFIG, ...config };
    this.store = deps.store;
    this.channelLayer = deps.channelLayer;
    this.logger = deps.logger ?? new NullLogger();
  }

  /**
   * Count a new socket for the user; returns its connection id
   */
  async userConnected(user: UserRef, deviceInfo: Record<string, unknown> = {}): Promise<string> {
    const connectionId = `conn_${String(user.id)}_${randomBytes(4).toString('hex')}`;
    const status = await this.store.incrementConnections(user, connectionId, deviceInfo, new Date());

    this.logger.info('User connected', {
      userId: user.id,
      connectionId,
      activeConnections: status.activeConnections,
      action: 'presence_connected',
    });

    if (status.activeConnections === 1) {
      await this.broadcastPresence(user, status);
    }
    return connectionId;
  }

  /**
   * Release one socket; the user goes offline when none is left
   */
  async userDisconnected(user: UserRef, connectionId?: string): Promise<UserStatus> {
    const previous = await this.store.getUserStatus(user.id);
    const status = await this.store.decrementConnections(user, new Date());

    this.logger.info('User disconnected', {
      userId: user.id,
      connectionId,
      activeConnections: status.activeConnections,
      action: 'presence_disconnected',
    });

    if (previous?.isOnline && !status.isOnline) {
      await this.broadcastPresence(user, status);
    }
    return status;
  }

  /**
   * Refresh the heartbeat; false when the user has no status yet
   */
  async updateHeartbeat(userId: UserId, connectionId?: string): Promise<boolean> {
    const status = await this.store.touchUserStatus(userId, new Date());
    if (!status) {
      this.logger.debug('Heartbeat for unknown user', { userId, connectionId, action: 'presence_heartbeat_unknown' });
      return false;
    }
    return true;
  }

  /**
   * Force offline every online user without a recent heartbeat; never throws
   */
  async cleanupStaleConnections(timeoutSeconds = this.config.staleTimeoutSeconds): Promise<number> {
    const now = new Date();
    try {
      const reset = await this.store.resetStaleUserStatuses(
        new Date(now.getTime() - timeoutSeconds * 1000),
        now,
      );
      for (const status of reset) {
        await this.broadcastPresence(status.user, status);
      }
      if (reset.length > 0) {
        this.logger.info('Cleaned up stale presence', {
          count: reset.length,
          timeoutSeconds,
          action: 'presence_cleanup',
        });
      }
      return reset.length;
    } catch (error) {
      this.logger.error('Failed to clean up stale presence', error, { action: 'presence_cleanup_failed' });
      return 0;
    }
  }

  async getUserPresence(user: UserRef): Promise<UserPresence> {
    const now = new Date();
    const status = await this.store.getUserStatus(user.id);
    return {
      userId: user.id,
      username: user.username,
      isOnline: status?.isOnline ?? false,
      lastSeen: serializeDate(status?.lastSeen),
      lastSeenDisplay: getLastSeenDisplay(status, now),
      activeConnections: status?.activeConnections ?? 0,
      lastPing: serializeDate(status?.lastPing),
      connectionStale: isConnectionStale(status, this.config.staleTimeoutSeconds, now),
      deviceInfo: status?.deviceInfo ?? {},
    };
  }

  /**
   * Online users, most recent heartbeat first
   */
  async getOnlineUsers(limit = 100): Promise<OnlineUser[]> {
    const statuses = await this.store.listUserStatuses({ onlineOnly: true, limit });
    return statuses.map((status) => ({
      userId: status.user.id,
      username: status.user.username,
      activeConnections: status.activeConnections,
      lastPing: serializeDate(status.lastPing),
      deviceInfo: status.deviceInfo,
    }));
  }

  /**
   * Drop every connection of a user; false when the user was not online
   */
  async forceUserOffline(user: UserRef): Promise<boolean> {
    try {
      const previous = await this.store.getUserStatus(user.id);
      if (!previous?.isOnline) return false;
      const status = await this.store.forceUserOffline(user.id, new Date());
      if (!status) return false;
      await this.broadcastPresence(user, status);
      this.logger.info('User forced offline', { userId: user.id, action: 'presence_forced_offline' });
      return true;
    } catch (error) {
      this.logger.error('Failed to force user offline', error, {
        userId: user.id,
        action: 'presence_force_offline_failed',
      });
      return false;
    }
  }

  async getPresenceSummary(): Promise<PresenceSummary> {
    const now = new Date();
    const statuses = await this.store.listUserStatuses();
    const online = statuses.filter((status) => status.isOnline);
    const totalConnections = statuses.reduce((sum, status) => sum + status.activeConnections, 0);
    const onlineConnections = online.reduce((sum, status) => sum + status.activeConnections, 0);
    const recentCutoff = now.getTime() - RECENT_ACTIVITY_MS;

    return {
      totalUsers: statuses.length,
      onlineUsers: online.length,
      offlineUsers: statuses.length - online.length,
      onlinePercentage: statuses.length > 0 ? (online.length / statuses.length) * 100 : 0,
      totalConnections,
      avgConnectionsPerOnlineUser:
        online.length > 0 ? Math.round((onlineConnections / online.length) * 100) / 100 : 0,
      recentActivityCount: statuses.filter(
        (status) => status.lastPing !== null && status.lastPing.getTime() >= recentCutoff,
      ).length,
      timestamp: now.toISOString(),
    };
  }

  /**
   * Push a user's status to their personal group; a failed broadcast is logged
   */
  private async broadcastPresence(user: UserRef, status: UserStatus): Promise<void> {
    try {
      await this.channelLayer.groupSend(userGroupName(user.id), {
        type: 'user_status',
        payload: serializeUserStatus(user, status),
      });
    } catch (error) {
      this.logger.warn('Presence broadcast failed', {
        userId: user.id,
        error: error instanceof Error ? error.message : String(error),
        action: 'presence_broadcast_failed',
      });
    }
  }
}
