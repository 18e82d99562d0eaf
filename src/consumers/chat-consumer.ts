/**
 * Chat Consumer
 *
 * Session for `/ws/chat/<peer-username>/`. Joins the room shared with the
 * peer and the user's personal group, then handles chat frames:
 * - message: persist with retries, broadcast with a room sequence number,
 *   queue on failure
 * - typing, read receipts, heartbeat pings
 * - connection status, forced reconnection and catch-up sync
 */

import { chatRoomName, userGroupName } from '../channels/index.js';
import { messagesSentCounter } from '../metrics/index.js';
import type { BulkReadResult } from '../receipts/index.js';
import type { ConnectionStatusInfo, ConnectionStatusUpdate } from '../recovery/index.js';
import type {
  ChannelEvent,
  ConnectionStatusFrame,
  MessageFrame,
  ReadReceiptResultFrame,
} from '../serialization/frames.js';
import {
  errorFrame,
  getStatusIcon,
  nowIso,
  serializeDate,
  serializeMessage,
  serializeUserStatus,
} from '../serialization/serializers.js';
import type { UserRef } from '../types/index.js';
import type { ConnectionScopeResult, InboundFrame } from '../validation/connection-validator.js';
import { validateMessageFormat } from '../validation/message-validator.js';
import { BaseConsumer, type ConsumerSocket } from './base-consumer.js';
import type { MessagingCore } from '../core.js';

type ChatMessageFrame = Extract<InboundFrame, { type: 'message' }>;

function statusFrame(info: ConnectionStatusInfo): ConnectionStatusFrame {
  return {
    type: 'connection_status',
    connection_id: info.connectionId,
    state: info.state,
    previous_state: null,
    retry_count: info.retryCount,
    next_retry_at: serializeDate(info.nextRetryAt),
    error_message: null,
    timestamp: nowIso(),
  };
}

function statusUpdateFrame(update: ConnectionStatusUpdate): ConnectionStatusFrame {
  return {
    type: 'connection_status',
    connection_id: update.connectionId,
    state: update.state,
    previous_state: update.previousState,
    retry_count: update.retryCount,
    next_retry_at: serializeDate(update.nextRetryAt),
    error_message: update.errorMessage,
    timestamp: update.timestamp.toISOString(),
  };
}

function readResultFrame(type: ReadReceiptResultFrame['type'], result: BulkReadResult): ReadReceiptResultFrame {
  return {
    type,
    processed_count: result.processedCount,
    failed_count: result.failedCount,
    already_read_count: result.alreadyReadCount,
    message_ids: result.messageIds,
    timestamp: result.timestamp,
  };
}

export class ChatConsumer extends BaseConsumer {
  private peer: UserRef | null = null;
  private room: string | null = null;
  private removeStatusCallback: (() => void) | null = null;

  constructor(core: MessagingCore, socket: ConsumerSocket) {
    super(core, socket, 'chat');
  }

  get currentPeer(): UserRef | null {
    return this.peer;
  }

  get currentRoom(): string | null {
    return this.room;
  }

  protected async open(user: UserRef, scope: ConnectionScopeResult): Promise<boolean> {
    if (scope.route?.kind !== 'chat') return false;

    const peer = await this.core.store.findUserByUsername(scope.route.peerUsername);
    if (!peer || peer.id === user.id) {
      this.logger.info('Chat peer rejected', {
        userId: user.id,
        peerUsername: scope.route.peerUsername,
        action: 'chat_peer_rejected',
      });
      return false;
    }

    this.peer = peer;
    this.room = chatRoomName(user.id, peer.id);
    await this.joinGroup(this.room);
    await this.joinGroup(userGroupName(user.id));
    this.accept();

    const connectionId = await this.core.presence.userConnected(user, {
      route: 'chat',
      peer: peer.username,
      userAgent: scope.headers['user-agent'] ?? null,
    });
    this.connectionId = connectionId;
    this.registerRecovery(user, connectionId, scope.path);

    await this.core.channelLayer.groupSend(userGroupName(peer.id), {
      type: 'user_status',
      payload: serializeUserStatus(user, { isOnline: true, lastSeen: new Date() }),
    });
    this.sendFrame(serializeUserStatus(peer, await this.core.store.getUserStatus(peer.id)));

    await this.core.offlineQueue.deliverQueuedMessagesForUser(user.id);
    return true;
  }

  protected async handleFrame(user: UserRef, frame: InboundFrame): Promise<void> {
    const peer = this.peer;
    const connectionId = this.connectionId;
    if (!peer || !connectionId) return;

    switch (frame.type) {
      case 'message':
        await this.handleChatMessage(user, peer, connectionId, frame);
        return;
      case 'typing':
        await this.core.typing.updateTypingStatus(user, peer, frame.isTyping);
        return;
      case 'read_receipt':
        await this.core.receipts.markMessageAsRead(frame.messageId, user.id);
        return;
      case 'bulk_read_receipt': {
        const result = await this.core.receipts.markMultipleMessagesAsRead(frame.messageIds, user.id);
        this.sendFrame(readResultFrame('bulk_read_receipt_result', result));
        return;
      }
      case 'mark_chat_read': {
        const result = await this.core.receipts.markVisibleMessagesAsRead(user.id, peer.id, frame.messageIds);
        this.sendFrame(readResultFrame('mark_chat_read_result', result));
        return;
      }
      case 'ping':
        await this.core.presence.updateHeartbeat(user.id, connectionId);
        this.core.recovery.updateHeartbeat(connectionId);
        this.sendFrame({ type: 'pong', timestamp: frame.timestamp ?? nowIso() });
        return;
      case 'get_connection_status':
        this.sendConnectionStatus(connectionId);
        return;
      case 'force_reconnect':
        await this.core.recovery.forceReconnect(connectionId);
        this.sendConnectionStatus(connectionId);
        return;
      case 'sync_request': {
        // Without a client cursor, sync the whole window
        const since = frame.since ?? new Date(0);
        this.sendFrame(
          await this.core.messageSync.synchronizeMessagesOnReconnection(user.id, since, connectionId, frame.offset),
        );
        return;
      }
      default:
        this.sendFrame(errorFrame(`Unsupported message type for chat: ${frame.type}`));
    }
  }

  protected async handleEvent(user: UserRef, event: ChannelEvent): Promise<void> {
    const peer = this.peer;
    if (!peer) return;

    switch (event.type) {
      case 'chat_message': {
        const payload = event.payload;
        const participants = [payload.sender_id, payload.recipient_id];
        if (!participants.includes(user.id) || !participants.includes(peer.id)) return;
        this.sendFrame(await this.markDelivered(user, payload));
        return;
      }
      case 'typing_indicator':
        if (event.payload.user_id !== user.id) this.sendFrame(event.payload);
        return;
      case 'read_receipt':
      case 'bulk_read_receipt':
        if (event.payload.read_by_id === peer.id) this.sendFrame(event.payload);
        return;
      case 'user_status':
        if (event.payload.user_id === peer.id) this.sendFrame(event.payload);
        return;
      default:
        // Notifications and badges belong to the notification session
        return;
    }
  }

  protected async teardown(user: UserRef): Promise<void> {
    const peer = this.peer;
    const connectionId = this.connectionId;

    if (this.removeStatusCallback) {
      this.removeStatusCallback();
      this.removeStatusCallback = null;
    }
    if (!connectionId) return;
    this.connectionId = null;

    this.core.recovery.unregisterConnection(connectionId);
    this.core.rateLimiter.release(connectionId);

    await this.safely('presence_disconnect', async () => {
      const status = await this.core.presence.userDisconnected(user, connectionId);
      if (peer && !status.isOnline) {
        await this.core.channelLayer.groupSend(userGroupName(peer.id), {
          type: 'user_status',
          payload: serializeUserStatus(user, status),
        });
      }
    });
    if (peer) {
      await this.safely('typing_reset', async () => {
        await this.core.typing.updateTypingStatus(user, peer, false);
      });
    }
  }

  private async handleChatMessage(
    user: UserRef,
    peer: UserRef,
    connectionId: string,
    frame: ChatMessageFrame,
  ): Promise<void> {
    const room = chatRoomName(user.id, peer.id);

    const decision = this.core.rateLimiter.consume(connectionId);
    if (!decision.allowed) {
      this.sendFrame(
        errorFrame('Rate limit exceeded, slow down', {
          retry_id: frame.retryId,
          retry_after: decision.retryAfterSeconds,
        }),
      );
      return;
    }

    const content = validateMessageFormat(frame.message);
    if (!content.ok) {
      this.sendFrame(errorFrame(content.error, { retry_id: frame.retryId }));
      return;
    }

    // Frames arriving while the channel backend is being recovered wait for the flush
    const recoveryState = this.core.recovery.getConnectionStatus(connectionId)?.state;
    if (recoveryState === 'disconnected' || recoveryState === 'reconnecting') {
      this.core.recovery.queueMessageForRetry(connectionId, {
        type: 'message',
        message: content.value,
        retry_id: frame.retryId,
        client_id: frame.clientId,
      });
      this.sendQueued(frame.retryId, null);
      return;
    }

    const outcome = await this.core.retryEngine.retryMessageCreation(user, peer, content.value, frame.clientId);
    if (!outcome.ok) {
      const queuedId = await this.core.offlineQueue.queueOutgoingMessageForOfflineSender({
        sender: user,
        recipient: peer,
        content: content.value,
        clientId: frame.clientId,
      });
      if (queuedId === null) {
        this.sendFrame(errorFrame('Failed to send message', { retry_id: frame.retryId }));
      } else {
        this.sendQueued(frame.retryId, queuedId);
      }
      return;
    }

    const message = outcome.message;
    const payload = serializeMessage(message, {
      retryId: frame.retryId,
      sequenceId: this.core.sequencer.next(room),
    });
    const broadcast = await this.core.retryEngine.retryWebsocketTransmission(
      () => this.core.channelLayer.groupSend(room, { type: 'chat_message', payload }),
      room,
    );
    if (!broadcast) {
      const queuedId = await this.core.offlineQueue.queueMessageForRetry({
        originalMessageId: message.id,
        sender: user,
        recipient: peer,
        content: message.content,
        error: 'Broadcast failed',
        clientId: message.clientId,
      });
      this.core.recovery.handleConnectionLost(connectionId, 'Broadcast failed');
      this.sendQueued(frame.retryId, queuedId);
      return;
    }
    messagesSentCounter.inc();

    const peerStatus = await this.core.store.getUserStatus(peer.id);
    if (!peerStatus?.isOnline) {
      await this.core.offlineQueue.queueMessageForOfflineRecipient({
        sender: user,
        recipient: peer,
        content: message.content,
        clientId: message.clientId,
        originalMessageId: message.id,
      });
    }
    await this.core.notifications.notifyNewMessage(user, peer, message);
  }

  /**
   * Recipient side: the first session to see a message marks it delivered
   */
  private async markDelivered(user: UserRef, payload: MessageFrame): Promise<MessageFrame> {
    if (payload.recipient_id !== user.id || payload.delivered_at !== null) return payload;
    const result = await this.core.store.transitionMessageStatus(payload.id, 'delivered', new Date());
    if (!result) return payload;
    return {
      ...payload,
      status: result.message.status,
      status_icon: getStatusIcon(result.message.status),
      delivered_at: serializeDate(result.message.deliveredAt),
    };
  }

  private registerRecovery(user: UserRef, connectionId: string, path: string): void {
    this.core.recovery.registerConnection(
      connectionId,
      user.id,
      path,
      async () => {
        if (!this.socket.isOpen) return false;
        await this.rejoinGroups();
        return true;
      },
      {
        onSync: (frame) => {
          this.sendFrame(frame);
          return Promise.resolve();
        },
        flushQueued: async (messages) => {
          for (const message of messages) {
            await this.dispatchRaw(user, message);
          }
        },
      },
    );
    this.removeStatusCallback = this.core.recovery.addStatusCallback(connectionId, (update) => {
      this.sendFrame(statusUpdateFrame(update));
    });
  }

  private sendConnectionStatus(connectionId: string): void {
    const info = this.core.recovery.getConnectionStatus(connectionId);
    if (info) {
      this.sendFrame(statusFrame(info));
    } else {
      this.sendFrame(errorFrame('Connection is not tracked for recovery'));
    }
  }

  private sendQueued(retryId: string | null, queuedId: number | null): void {
    this.sendFrame({
      type: 'message_queued',
      retry_id: retryId,
      queued_id: queuedId,
      message: 'Message queued for delivery',
      timestamp: nowIso(),
    });
  }
}
