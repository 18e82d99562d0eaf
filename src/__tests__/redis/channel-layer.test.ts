/**
 * RedisChannelLayer Tests
 *
 * ioredis is replaced by an in-process pub/sub bus shared by every client
 */

import { afterEach, describe, expect, it, vi } from 'vitest';

const bus = vi.hoisted(() => {
  type Deliver = (channel: string, payload: string) => void;
  const subscriptions = new Map<string, Set<Deliver>>();
  const published: Array<{ channel: string; payload: string }> = [];
  const state = { failPublish: false };
  return { subscriptions, published, state };
});

vi.mock('ioredis', () => {
  type Listener = (...args: string[]) => void;

  class FakeRedis {
    private messageListeners: Listener[] = [];
    private readonly deliver = (channel: string, payload: string): void => {
      for (const listener of this.messageListeners) listener(channel, payload);
    };

    on(event: string, listener: Listener): this {
      if (event === 'message') this.messageListeners.push(listener);
      return this;
    }

    duplicate(): FakeRedis {
      return new FakeRedis();
    }

    ping(): Promise<string> {
      return Promise.resolve('PONG');
    }

    subscribe(channel: string): Promise<number> {
      let listeners = bus.subscriptions.get(channel);
      if (!listeners) {
        listeners = new Set();
        bus.subscriptions.set(channel, listeners);
      }
      listeners.add(this.deliver);
      return Promise.resolve(listeners.size);
    }

    unsubscribe(channel: string): Promise<number> {
      bus.subscriptions.get(channel)?.delete(this.deliver);
      return Promise.resolve(0);
    }

    publish(channel: string, payload: string): Promise<number> {
      if (bus.state.failPublish) return Promise.reject(new Error('connection reset'));
      bus.published.push({ channel, payload });
      const listeners = [...(bus.subscriptions.get(channel) ?? [])];
      for (const listener of listeners) listener(channel, payload);
      return Promise.resolve(listeners.length);
    }

    quit(): Promise<string> {
      return Promise.resolve('OK');
    }
  }

  return { Redis: FakeRedis };
});

import { RedisChannelLayer } from '../../redis/channel-layer.js';
import type { ChannelEvent } from '../../serialization/frames.js';
import { TransmissionError } from '../../types/index.js';
import { createMockLogger } from '../fixtures.js';

const badge: ChannelEvent = {
  type: 'badge_update',
  payload: { type: 'badge_update', unread_count: 4, timestamp: '2026-01-01T00:00:00.000Z' },
};

describe('RedisChannelLayer', () => {
  const layers: RedisChannelLayer[] = [];

  function createLayer(logger = createMockLogger()): RedisChannelLayer {
    const layer = new RedisChannelLayer({ keyPrefix: 'test:group:', logger });
    layers.push(layer);
    return layer;
  }

  afterEach(async () => {
    await Promise.all(layers.splice(0).map((layer) => layer.close()));
    bus.subscriptions.clear();
    bus.published.length = 0;
    bus.state.failPublish = false;
  });

  it('should connect when both clients answer', async () => {
    const layer = createLayer();

    await expect(layer.connect()).resolves.toBeUndefined();
    expect(await layer.ping()).toBe(true);
  });

  it('should publish events under the prefixed group channel', async () => {
    const layer = createLayer();

    await layer.groupSend('user_1', badge);

    expect(bus.published).toEqual([{ channel: 'test:group:user_1', payload: JSON.stringify(badge) }]);
  });

  it('should deliver events across layers to local members', async () => {
    const sender = createLayer();
    const receiver = createLayer();
    const handler = vi.fn();
    receiver.register('session-a', handler);
    await receiver.groupAdd('user_1', 'session-a');

    await sender.groupSend('user_1', badge);

    await vi.waitFor(() => expect(handler).toHaveBeenCalledWith(badge));
  });

  it('should subscribe once per group and unsubscribe with the last member', async () => {
    const layer = createLayer();
    layer.register('a', vi.fn());
    layer.register('b', vi.fn());

    await layer.groupAdd('room', 'a');
    await layer.groupAdd('room', 'b');
    expect(bus.subscriptions.get('test:group:room')?.size).toBe(1);

    await layer.groupDiscard('room', 'a');
    expect(bus.subscriptions.get('test:group:room')?.size).toBe(1);

    await layer.groupDiscard('room', 'b');
    expect(bus.subscriptions.get('test:group:room')?.size).toBe(0);
  });

  it('should drop payloads that are not channel events', async () => {
    const logger = createMockLogger();
    const layer = createLayer(logger);
    const handler = vi.fn();
    layer.register('a', handler);
    await layer.groupAdd('room', 'a');
    const publisher = createLayer();

    // Raw publish through the shared bus
    const channel = bus.subscriptions.get('test:group:room');
    for (const deliver of channel ?? []) {
      deliver('test:group:room', '{broken');
      deliver('test:group:room', JSON.stringify({ type: 'badge_update', payload: { unread_count: 'many' } }));
    }
    await publisher.groupSend('room', badge);

    await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(1));
    expect(logger.warn).toHaveBeenCalledWith(
      'Dropping malformed Redis event',
      expect.objectContaining({ group: 'room', action: 'redis_event_malformed' }),
    );
    expect(logger.warn).toHaveBeenCalledWith(
      'Dropping Redis event with unexpected shape',
      expect.objectContaining({ group: 'room', action: 'redis_event_invalid' }),
    );
  });

  it('should wrap publish failures in a TransmissionError', async () => {
    const layer = createLayer();
    bus.state.failPublish = true;

    const sent = layer.groupSend('user_9', badge);

    await expect(sent).rejects.toBeInstanceOf(TransmissionError);
    await expect(sent).rejects.toThrow('Failed to publish to user_9');
  });
});
