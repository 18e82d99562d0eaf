/**
 * Typing Manager
 *
 * Ephemeral typing indicators, one row per (user, partner) pair. Indicators
 * are broadcast to the pair's room only when the state flips, and rows left
 * untouched past the timeout are reset to not-typing.
 */

import type { ChannelLayer } from '../channels/channel-layer.js';
import { chatRoomName } from '../channels/channel-layer.js';
import type { TypingConfig } from '../types/config.js';
import type { MessagingStore, StructuredLogger, TypingStatus, UserRef } from '../types/index.js';
import { NullLogger } from '../types/index.js';
import { nowIso } from '../serialization/serializers.js';

export const DEFAULT_TYPING_CONFIG: TypingConfig = {
  staleTimeoutSeconds: 5,
};

export interface TypingDependencies {
  store: MessagingStore;
  channelLayer: ChannelLayer;
  logger?: StructuredLogger;
}

export class TypingManager {
  private config: TypingConfig;
  private store: MessagingStore;
  private channelLayer: ChannelLayer;
  private logger: StructuredLogger;

  constructor(config: Partial<TypingConfig>, deps: TypingDependencies) {
    this.config = { ...DEFAULT_TYPING_CONFIG, ...config };
    this.store = deps.store;
    this.channelLayer = deps.channelLayer;
    this.logger = deps.logger ?? new NullLogger();
  }

  /**
   * Upsert the pair's row; returns whether the state changed
   */
  async updateTypingStatus(user: UserRef, partner: UserRef, isTyping: boolean): Promise<boolean> {
    const { changed } = await this.store.upsertTypingStatus(user, partner, isTyping, new Date());
    if (changed) {
      await this.broadcast(user, partner, isTyping);
    }
    return changed;
  }

  /**
   * Users currently typing to `user`
   */
  async getTypingUsersForChat(user: UserRef): Promise<UserRef[]> {
    const rows = await this.store.listTypingToward(user.id);
    return rows.map((row) => row.user);
  }

  /**
   * Reset rows idle past the timeout; never throws
   */
  async cleanupStaleTypingStatuses(timeoutSeconds = this.config.staleTimeoutSeconds): Promise<number> {
    const now = new Date();
    try {
      const reset = await this.store.resetStaleTypingStatuses(
        new Date(now.getTime() - timeoutSeconds * 1000),
        now,
      );
      await Promise.all(reset.map((row: TypingStatus) => this.broadcast(row.user, row.chatPartner, false)));
      if (reset.length > 0) {
        this.logger.debug('Reset stale typing indicators', { count: reset.length, action: 'typing_cleanup' });
      }
      return reset.length;
    } catch (error) {
      this.logger.error('Failed to clean up typing indicators', error, { action: 'typing_cleanup_failed' });
      return 0;
    }
  }

  private async broadcast(user: UserRef, partner: UserRef, isTyping: boolean): Promise<void> {
    try {
      await this.channelLayer.groupSend(chatRoomName(user.id, partner.id), {
        type: 'typing_indicator',
        payload: {
          type: 'typing',
          user_id: user.id,
          username: user.username,
          is_typing: isTyping,
          timestamp: nowIso(),
        },
      });
    } catch (error) {
      this.logger.warn('Typing broadcast failed', {
        userId: user.id,
        partnerId: partner.id,
        error: error instanceof Error ? error.message : String(error),
        action: 'typing_broadcast_failed',
      });
    }
  }
}
