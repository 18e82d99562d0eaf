/**
 * Messaging Gateway
 *
 * Binds `ws` connections to consumers by route, resolves the principal with
 * the injected `authenticate` hook, detects dead sockets with protocol pings,
 * and runs the periodic maintenance sweep.
 */

import type { IncomingMessage } from 'node:http';
import type { RawData, WebSocket, WebSocketServer } from 'ws';
import { z } from 'zod';
import {
  ChatConsumer,
  CloseCode,
  NotificationConsumer,
  type BaseConsumer,
  type ConnectRequest,
  type ConsumerSocket,
} from './consumers/index.js';
import type { MessagingCore } from './core.js';
import { maintenanceLatencyHistogram } from './metrics/index.js';
import type { RetryQueueReport } from './queue/index.js';
import { toError, type MessagingStore, type UserRef } from './types/index.js';

/** Resolves the principal behind an upgrade request; null rejects it */
export type Authenticate = (
  request: IncomingMessage,
  store: MessagingStore,
) => Promise<UserRef | null> | UserRef | null;

const TrustedHeadersSchema = z.object({
  'x-user-id': z.coerce.number().int().positive(),
  'x-username': z.string().trim().min(1),
});

/**
 * Trusts `x-user-id` and `x-username` set by an authenticating proxy in
 * front of the server, and records the user in the store
 */
export const trustedHeaderAuthenticate: Authenticate = async (request, store) => {
  const parsed = TrustedHeadersSchema.safeParse(request.headers);
  if (!parsed.success) return null;
  return store.saveUser({ id: parsed.data['x-user-id'], username: parsed.data['x-username'] });
};

export interface MessagingGatewayOptions {
  wss: WebSocketServer;
  core: MessagingCore;
  authenticate: Authenticate;
  /** Defaults to `server.heartbeatIntervalMs` */
  heartbeatIntervalMs?: number;
  /** Defaults to `server.maintenanceIntervalMs` */
  maintenanceIntervalMs?: number;
}

export interface MaintenanceReport {
  stalePresence: number;
  staleTyping: number;
  expiredQueued: number;
  retries: RetryQueueReport | null;
  staleRecovery: number;
  timestamp: string;
}

const NOTIFICATIONS_PREFIX = '/ws/notifications';

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function toConsumerSocket(ws: WebSocket): ConsumerSocket {
  return {
    get isOpen() {
      return ws.readyState === ws.OPEN;
    },
    send: (data) => ws.send(data),
    close: (code, reason) => ws.close(code, reason),
  };
}

export class MessagingGateway {
  private readonly wss: WebSocketServer;
  private readonly core: MessagingCore;
  private readonly authenticate: Authenticate;
  private readonly sessions = new Map<WebSocket, BaseConsumer>();
  private readonly alive = new WeakSet<WebSocket>();
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private maintenanceTimer: NodeJS.Timeout | null = null;
  private closing = false;

  constructor(options: MessagingGatewayOptions) {
    this.wss = options.wss;
    this.core = options.core;
    this.authenticate = options.authenticate;

    this.wss.on('connection', (ws, request) => this.handleConnection(ws, request));

    const server = this.core.config.server;
    this.heartbeatTimer = setInterval(() => this.heartbeat(), options.heartbeatIntervalMs ?? server.heartbeatIntervalMs);
    this.maintenanceTimer = setInterval(() => {
      this.runMaintenance().catch((error: unknown) => {
        this.core.logger.error('Maintenance sweep failed', error, { action: 'maintenance_failed' });
      });
    }, options.maintenanceIntervalMs ?? server.maintenanceIntervalMs);
  }

  getActiveConnections(): number {
    return this.sessions.size;
  }

  getSessions(): BaseConsumer[] {
    return [...this.sessions.values()];
  }

  /**
   * Reset stale presence and typing rows, expire and retry queued messages,
   * and drop recovery entries without a heartbeat. Never throws.
   */
  async runMaintenance(): Promise<MaintenanceReport> {
    const report: MaintenanceReport = {
      stalePresence: 0,
      staleTyping: 0,
      expiredQueued: 0,
      retries: null,
      staleRecovery: 0,
      timestamp: new Date().toISOString(),
    };

    await this.runTask('presence', async () => {
      report.stalePresence = await this.core.presence.cleanupStaleConnections();
    });
    await this.runTask('typing', async () => {
      report.staleTyping = await this.core.typing.cleanupStaleTypingStatuses();
    });
    await this.runTask('queue', async () => {
      const swept = await this.core.offlineQueue.sweep();
      report.expiredQueued = swept.expired;
      report.retries = swept.retries;
    });
    await this.runTask('recovery', () => {
      report.staleRecovery = this.core.recovery.cleanupStaleConnections();
      return Promise.resolve();
    });

    this.core.logger.debug('Maintenance sweep completed', {
      stalePresence: report.stalePresence,
      staleTyping: report.staleTyping,
      expiredQueued: report.expiredQueued,
      staleRecovery: report.staleRecovery,
      action: 'maintenance_completed',
    });
    return report;
  }

  /**
   * Stop timers, close every session, then the WebSocket server
   */
  async close(): Promise<void> {
    if (this.closing) return;
    this.closing = true;

    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    if (this.maintenanceTimer) {
      clearInterval(this.maintenanceTimer);
      this.maintenanceTimer = null;
    }

    const sessions = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(sessions.map((session) => session.close(CloseCode.GOING_AWAY, 'Server shutting down')));

    await new Promise<void>((resolve) => this.wss.close(() => resolve()));
    this.core.logger.info('Gateway closed', { sessions: sessions.length, action: 'gateway_closed' });
  }

  private handleConnection(ws: WebSocket, request: IncomingMessage): void {
    if (this.closing) {
      ws.close(CloseCode.GOING_AWAY, 'Server shutting down');
      return;
    }

    const path = request.url ?? '/';
    const socket = toConsumerSocket(ws);
    const consumer = path.startsWith(NOTIFICATIONS_PREFIX)
      ? new NotificationConsumer(this.core, socket)
      : new ChatConsumer(this.core, socket);

    this.sessions.set(ws, consumer);
    this.alive.add(ws);

    ws.on('pong', () => {
      this.alive.add(ws);
    });

    ws.on('message', (data: RawData) => {
      consumer.receive(rawDataToString(data)).catch((error: unknown) => {
        this.core.logger.error('Frame processing failed', error, {
          route: consumer.route,
          connectionId: consumer.currentConnectionId,
          action: 'frame_processing_failed',
        });
      });
    });

    ws.on('close', () => {
      this.sessions.delete(ws);
      consumer.close().catch((error: unknown) => {
        this.core.logger.error('Session close failed', error, {
          route: consumer.route,
          action: 'session_close_failed',
        });
      });
    });

    ws.on('error', (error: Error) => {
      this.core.logger.warn('WebSocket error', {
        route: consumer.route,
        error: error.message,
        action: 'websocket_error',
      });
    });

    // Queued before any frame so early frames wait for the handshake
    consumer.connect(this.resolveRequest(request, path)).catch((error: unknown) => {
      this.core.logger.error('Handshake failed', error, { path, action: 'handshake_failed' });
    });
  }

  private async resolveRequest(request: IncomingMessage, path: string): Promise<ConnectRequest> {
    let user: UserRef | null = null;
    try {
      user = await this.authenticate(request, this.core.store);
    } catch (error) {
      this.core.logger.warn('Authentication hook failed', {
        path,
        error: toError(error).message,
        action: 'authentication_failed',
      });
    }
    return { user, path, headers: request.headers };
  }

  private heartbeat(): void {
    for (const ws of this.sessions.keys()) {
      if (!this.alive.has(ws)) {
        this.core.logger.debug('Terminating unresponsive socket', { action: 'heartbeat_timeout' });
        ws.terminate();
        continue;
      }
      this.alive.delete(ws);
      ws.ping();
    }
  }

  private async runTask(task: string, run: () => Promise<void>): Promise<void> {
    const end = maintenanceLatencyHistogram.startTimer({ task });
    try {
      await run();
      end({ status: 'success' });
    } catch (error) {
      end({ status: 'error' });
      this.core.logger.error('Maintenance task failed', error, { task, action: 'maintenance_task_failed' });
    }
  }
}
