/**
 * Redis Channel Layer
 *
 * Cross-process group broadcast over Redis pub/sub
 * - Group membership stays local to the process
 * - One Redis channel per group, subscribed while the group has local members
 * - Events are validated against the channel event schema on arrival
 */

import { Redis, type RedisOptions } from 'ioredis';
import { LocalChannelRegistry } from '../channels/channel-layer.js';
import { ChannelEventSchema, type ChannelEvent } from '../serialization/frames.js';
import type { StructuredLogger } from '../types/index.js';
import { StorageError, TransmissionError, toError } from '../types/index.js';

export interface RedisChannelLayerConfig {
  redisUrl?: string;
  host?: string;
  port?: number;
  password?: string;
  /** Prefix of every pub/sub channel */
  keyPrefix?: string;
  /** Reconnection attempts before giving up */
  maxReconnectAttempts?: number;
  logger?: StructuredLogger;
}

const DEFAULT_KEY_PREFIX = 'messaging:group:';

export class RedisChannelLayer extends LocalChannelRegistry {
  private publisher: Redis;
  private subscriber: Redis;
  private keyPrefix: string;

  constructor(config: RedisChannelLayerConfig = {}) {
    super(config.logger);
    this.keyPrefix = config.keyPrefix ?? DEFAULT_KEY_PREFIX;
    const maxAttempts = config.maxReconnectAttempts ?? 10;

    const options: RedisOptions = {
      host: config.host ?? 'localhost',
      port: config.port ?? 6379,
      password: config.password,
      retryStrategy: (times: number) => {
        if (times > maxAttempts) {
          this.logger.error('Maximum Redis reconnection attempts reached', undefined, {
            action: 'redis_max_reconnection_attempts',
          });
          return null;
        }
        return Math.min(100 * Math.pow(2, times), 30000);
      },
    };

    this.publisher = config.redisUrl ? new Redis(config.redisUrl, options) : new Redis(options);
    this.subscriber = this.publisher.duplicate();

    this.publisher.on('error', (err: Error) => {
      this.logger.error('Redis publisher error', err, { action: 'redis_publisher_error' });
    });
    this.subscriber.on('error', (err: Error) => {
      this.logger.error('Redis subscriber error', err, { action: 'redis_subscriber_error' });
    });
    this.subscriber.on('message', (channel: string, payload: string) => {
      this.handleIncoming(channel, payload).catch((error: unknown) => {
        this.logger.error('Failed to dispatch Redis event', error, {
          channel,
          action: 'redis_dispatch_failed',
        });
      });
    });
  }

  /**
   * Verify both connections answer
   */
  async connect(): Promise<void> {
    try {
      await Promise.all([this.publisher.ping(), this.subscriber.ping()]);
      this.logger.info('Redis channel layer connected', { action: 'redis_channel_layer_connected' });
    } catch (error) {
      throw new StorageError('Failed to connect to Redis', 'redis', toError(error));
    }
  }

  async ping(): Promise<boolean> {
    return (await this.publisher.ping()) === 'PONG';
  }

  override async groupAdd(group: string, channelName: string): Promise<void> {
    const isFirstMember = this.getGroupMembers(group).length === 0;
    await super.groupAdd(group, channelName);
    if (isFirstMember) {
      await this.subscriber.subscribe(this.channelFor(group));
    }
  }

  override async groupDiscard(group: string, channelName: string): Promise<void> {
    await super.groupDiscard(group, channelName);
    if (this.getGroupMembers(group).length === 0) {
      await this.subscriber.unsubscribe(this.channelFor(group));
    }
  }

  async groupSend(group: string, event: ChannelEvent): Promise<void> {
    try {
      await this.publisher.publish(this.channelFor(group), JSON.stringify(event));
    } catch (error) {
      throw new TransmissionError(`Failed to publish to ${group}`, group, toError(error));
    }
  }

  override async close(): Promise<void> {
    await super.close();
    await Promise.all([this.subscriber.quit(), this.publisher.quit()]);
  }

  private channelFor(group: string): string {
    return `${this.keyPrefix}${group}`;
  }

  private async handleIncoming(channel: string, payload: string): Promise<void> {
    if (!channel.startsWith(this.keyPrefix)) return;
    const group = channel.slice(this.keyPrefix.length);

    let raw: unknown;
    try {
      raw = JSON.parse(payload);
    } catch (error) {
      this.logger.warn('Dropping malformed Redis event', {
        group,
        error: toError(error).message,
        action: 'redis_event_malformed',
      });
      return;
    }

    const parsed = ChannelEventSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('Dropping Redis event with unexpected shape', {
        group,
        issues: parsed.error.issues.map((issue) => issue.message),
        action: 'redis_event_invalid',
      });
      return;
    }

    await this.dispatchLocal(group, parsed.data);
  }
}
