/**
 * Channel Layer
 *
 * Group broadcast between sessions. Each session registers a unique channel
 * name with a handler, joins groups, and receives every event sent to a group
 * it belongs to.
 */

import type { ChannelEvent } from '../serialization/frames.js';
import type { StructuredLogger, UserId } from '../types/index.js';
import { NullLogger } from '../types/index.js';

export type ChannelHandler = (event: ChannelEvent) => void | Promise<void>;

export interface ChannelLayer {
  /** Attach a handler to a channel name; returns the detach function */
  register(channelName: string, handler: ChannelHandler): () => void;
  groupAdd(group: string, channelName: string): Promise<void>;
  groupDiscard(group: string, channelName: string): Promise<void>;
  groupSend(group: string, event: ChannelEvent): Promise<void>;
  close(): Promise<void>;
}

/**
 * Room shared by two users, independent of who opened it
 */
export function chatRoomName(userA: UserId, userB: UserId): string {
  const [low, high] = userA < userB ? [userA, userB] : [userB, userA];
  return `chat_${String(low)}_${String(high)}`;
}

/**
 * Personal group reaching every session of a user
 */
export function userGroupName(userId: UserId): string {
  return `user_${String(userId)}`;
}

/**
 * Process-local membership and dispatch, shared by every layer
 */
export abstract class LocalChannelRegistry implements ChannelLayer {
  protected handlers = new Map<string, ChannelHandler>();
  protected groups = new Map<string, Set<string>>();
  protected logger: StructuredLogger;

  constructor(logger?: StructuredLogger) {
    this.logger = logger ?? new NullLogger();
  }

  register(channelName: string, handler: ChannelHandler): () => void {
    this.handlers.set(channelName, handler);
    return () => {
      if (this.handlers.get(channelName) === handler) {
        this.handlers.delete(channelName);
      }
    };
  }

  groupAdd(group: string, channelName: string): Promise<void> {
    let members = this.groups.get(group);
    if (!members) {
      members = new Set();
      this.groups.set(group, members);
    }
    members.add(channelName);
    return Promise.resolve();
  }

  groupDiscard(group: string, channelName: string): Promise<void> {
    const members = this.groups.get(group);
    if (members) {
      members.delete(channelName);
      if (members.size === 0) this.groups.delete(group);
    }
    return Promise.resolve();
  }

  abstract groupSend(group: string, event: ChannelEvent): Promise<void>;

  close(): Promise<void> {
    this.handlers.clear();
    this.groups.clear();
    return Promise.resolve();
  }

  /** Local members of a group */
  getGroupMembers(group: string): string[] {
    return [...(this.groups.get(group) ?? [])];
  }

  /**
   * Deliver to local members; a failing handler never blocks the others
   */
  protected async dispatchLocal(group: string, event: ChannelEvent): Promise<number> {
    const members = this.getGroupMembers(group);
    const results = await Promise.allSettled(
      members.map(async (channelName) => {
        const handler = this.handlers.get(channelName);
        if (handler) await handler(event);
      }),
    );

    let failures = 0;
    for (const result of results) {
      if (result.status === 'rejected') {
        failures++;
        this.logger.error('Channel handler failed', result.reason, {
          group,
          eventType: event.type,
          action: 'channel_handler_failed',
        });
      }
    }
    return members.length - failures;
  }
}

/**
 * Single-process channel layer
 */
export class InMemoryChannelLayer extends LocalChannelRegistry {
  async groupSend(group: string, event: ChannelEvent): Promise<void> {
    await this.dispatchLocal(group, event);
  }
}
