/**
 * Consumer base
 *
 * A consumer owns one WebSocket session: `connecting → open → closed`. It
 * registers a channel name with the channel layer, joins groups, decodes
 * inbound frames and writes outbound frames. Inbound frames and the handshake
 * run one at a time through a mutex, so a session handles its frames in
 * arrival order.
 */

import { randomBytes } from 'node:crypto';
import { Mutex } from 'async-mutex';
import type { MessagingCore } from '../core.js';
import { withContext } from '../context/execution-context.js';
import type { StructuredLogger } from '../logger/index.js';
import { activeConnectionsGauge } from '../metrics/index.js';
import type { ChannelEvent, OutboundFrame } from '../serialization/frames.js';
import { errorFrame, toJsonString } from '../serialization/serializers.js';
import { toError, type UserRef } from '../types/index.js';
import type { ConnectionScopeResult, InboundFrame } from '../validation/connection-validator.js';

export type ConsumerRoute = 'chat' | 'notifications';

export type ConsumerState = 'connecting' | 'open' | 'closed';

/**
 * Transport the consumer writes to; the gateway adapts a `ws` socket
 */
export interface ConsumerSocket {
  readonly isOpen: boolean;
  send(data: string): void;
  close(code: number, reason: string): void;
}

export interface ConnectRequest {
  /** Principal resolved by the authenticate hook, null when anonymous */
  user: UserRef | null;
  /** Request path including the query string */
  path: string;
  headers?: Record<string, string | string[] | undefined>;
}

export const CloseCode = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  INTERNAL_ERROR: 1011,
  UNAUTHORIZED: 4401,
  NOT_FOUND: 4404,
} as const;

export abstract class BaseConsumer {
  protected state: ConsumerState = 'connecting';
  protected user: UserRef | null = null;
  protected connectionId: string | null = null;
  protected readonly channelName: string;
  protected readonly logger: StructuredLogger;
  private readonly inbox = new Mutex();
  private readonly groups = new Set<string>();
  private detach: (() => void) | null = null;
  private counted = false;

  constructor(
    protected readonly core: MessagingCore,
    protected readonly socket: ConsumerSocket,
    readonly route: ConsumerRoute,
  ) {
    this.channelName = `${route}.${randomBytes(8).toString('hex')}`;
    this.logger = core.logger;
  }

  get currentState(): ConsumerState {
    return this.state;
  }

  get currentUser(): UserRef | null {
    return this.user;
  }

  get currentConnectionId(): string | null {
    return this.connectionId;
  }

  /** Route-specific setup; false rejects the handshake */
  protected abstract open(user: UserRef, scope: ConnectionScopeResult): Promise<boolean>;

  protected abstract handleFrame(user: UserRef, frame: InboundFrame): Promise<void>;

  protected abstract handleEvent(user: UserRef, event: ChannelEvent): Promise<void>;

  /** Release route-specific resources; may run after a partial open */
  protected abstract teardown(user: UserRef): Promise<void>;

  /**
   * Run the handshake; resolves true when the session is open.
   * Queued on the inbox at once, so frames received while `request` is
   * still pending run after it
   */
  connect(request: ConnectRequest | Promise<ConnectRequest>): Promise<boolean> {
    return this.inbox.runExclusive(async () => this.runHandshake(await request));
  }

  /**
   * Handle one raw text frame from the socket
   */
  receive(text: string): Promise<void> {
    return this.inbox.runExclusive(async () => {
      const user = this.user;
      if (this.state !== 'open' || !user) return;

      await withContext({ connectionId: this.connectionId ?? undefined, userId: user.id }, async () => {
        let raw: unknown;
        try {
          raw = JSON.parse(text);
        } catch {
          this.sendFrame(errorFrame('Invalid JSON format'));
          return;
        }
        await this.dispatchRaw(user, raw);
      });
    });
  }

  /**
   * Close the session; safe to call more than once
   */
  async close(code: number = CloseCode.NORMAL, reason = ''): Promise<void> {
    if (this.state === 'closed') return;
    this.state = 'closed';
    await this.cleanup();
    if (this.socket.isOpen) {
      this.socket.close(code, reason);
    }
    this.logger.debug('Consumer closed', {
      route: this.route,
      channelName: this.channelName,
      userId: this.user?.id,
      code,
      action: 'consumer_closed',
    });
  }

  /**
   * Validate and dispatch an already decoded frame
   */
  protected async dispatchRaw(user: UserRef, raw: unknown): Promise<void> {
    const validation = this.core.validator.validateMessageData(raw);
    if (!validation.isValid || !validation.frame) {
      this.sendFrame(this.core.validator.generateErrorResponse(validation.errors));
      return;
    }

    const frame = validation.frame;
    try {
      await this.handleFrame(user, frame);
    } catch (error) {
      await this.reportFailure(user, error, frame.type);
    }
  }

  protected sendFrame(frame: OutboundFrame): void {
    if (this.state !== 'open' || !this.socket.isOpen) return;
    this.socket.send(toJsonString(frame));
  }

  /** Mark the handshake accepted; frames flow from here on */
  protected accept(): void {
    if (this.state !== 'connecting') {
      throw new Error('Connection closed during setup');
    }
    this.state = 'open';
    this.counted = true;
    activeConnectionsGauge.inc({ route: this.route });
  }

  protected async joinGroup(group: string): Promise<void> {
    if (!this.detach) {
      this.detach = this.core.channelLayer.register(this.channelName, (event) => this.onChannelEvent(event));
    }
    await this.core.channelLayer.groupAdd(group, this.channelName);
    this.groups.add(group);
  }

  /** Re-enter every joined group, e.g. after the channel backend recovered */
  protected async rejoinGroups(): Promise<void> {
    for (const group of this.groups) {
      await this.core.channelLayer.groupAdd(group, this.channelName);
    }
  }

  /**
   * Run a cleanup step; failures are logged and never stop the next step
   */
  protected async safely(action: string, step: () => Promise<void> | void): Promise<void> {
    try {
      await step();
    } catch (error) {
      this.logger.warn('Cleanup step failed', {
        route: this.route,
        userId: this.user?.id,
        step: action,
        error: toError(error).message,
        action: 'consumer_cleanup_failed',
      });
    }
  }

  private async runHandshake(request: ConnectRequest): Promise<boolean> {
    if (!this.hasState('connecting')) return false;

    const scope = this.core.validator.validateConnectionScope(request);
    const user = scope.user;
    if (!user) {
      await this.close(CloseCode.UNAUTHORIZED, 'Authentication required');
      return false;
    }
    if (!scope.isValid || scope.route?.kind !== this.route) {
      await this.close(CloseCode.NOT_FOUND, scope.errors[0] ?? 'Route not served here');
      return false;
    }

    this.user = user;
    let accepted = false;
    let failed = false;
    try {
      accepted = await withContext({ userId: user.id }, () => this.open(user, scope));
    } catch (error) {
      failed = true;
      this.logger.error('Connection setup failed', error, {
        route: this.route,
        userId: user.id,
        action: 'consumer_connect_failed',
      });
    }

    // The socket may have dropped while setup was running
    if (this.hasState('closed')) {
      await this.cleanup();
      return false;
    }
    if (failed) {
      await this.close(CloseCode.INTERNAL_ERROR, 'Connection setup failed');
      return false;
    }
    if (!accepted) {
      await this.close(CloseCode.NOT_FOUND, 'Conversation partner not found');
      return false;
    }

    this.logger.info('Consumer connected', {
      route: this.route,
      userId: user.id,
      connectionId: this.connectionId,
      action: 'consumer_connected',
    });
    return true;
  }

  private hasState(state: ConsumerState): boolean {
    return this.state === state;
  }

  private async cleanup(): Promise<void> {
    const user = this.user;
    if (user) {
      await this.teardown(user);
    }
    for (const group of [...this.groups]) {
      await this.safely('group_discard', () => this.core.channelLayer.groupDiscard(group, this.channelName));
      this.groups.delete(group);
    }
    if (this.detach) {
      this.detach();
      this.detach = null;
    }
    if (this.counted) {
      this.counted = false;
      activeConnectionsGauge.dec({ route: this.route });
    }
  }

  private async onChannelEvent(event: ChannelEvent): Promise<void> {
    const user = this.user;
    if (this.state !== 'open' || !user) return;
    try {
      await this.handleEvent(user, event);
    } catch (error) {
      this.logger.error('Channel event handling failed', error, {
        route: this.route,
        userId: user.id,
        eventType: event.type,
        action: 'consumer_event_failed',
      });
    }
  }

  private async reportFailure(user: UserRef, error: unknown, frameType: string): Promise<void> {
    const handled = await this.core.errorHandler.handleError(error, {
      context: { operation: `${this.route}_${frameType}`, connectionId: this.connectionId },
      userId: user.id,
    });
    const frame = errorFrame(handled.userMessage, {
      error_id: handled.errorId,
      suggested_actions: handled.suggestedActions.map((action) => action.label),
    });
    if (handled.retryAfterSeconds !== undefined) {
      frame.retry_after = handled.retryAfterSeconds;
    }
    this.sendFrame(frame);
  }
}
