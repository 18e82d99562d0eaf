/**
 * InMemoryChannelLayer and RoomSequencer Tests
 */

import { describe, expect, it, vi } from 'vitest';
import { InMemoryChannelLayer, chatRoomName, userGroupName } from '../../channels/channel-layer.js';
import { RoomSequencer } from '../../channels/room-sequencer.js';
import type { ChannelEvent } from '../../serialization/frames.js';
import { createMockLogger } from '../fixtures.js';

const badge: ChannelEvent = {
  type: 'badge_update',
  payload: { type: 'badge_update', unread_count: 3, timestamp: '2026-01-01T00:00:00.000Z' },
};

describe('group names', () => {
  it('should name a room the same from either side', () => {
    expect(chatRoomName(7, 3)).toBe('chat_3_7');
    expect(chatRoomName(3, 7)).toBe('chat_3_7');
  });

  it('should name the personal group', () => {
    expect(userGroupName(42)).toBe('user_42');
  });
});

describe('InMemoryChannelLayer', () => {
  it('should deliver to every member of a group', async () => {
    const layer = new InMemoryChannelLayer();
    const first = vi.fn();
    const second = vi.fn();
    layer.register('a', first);
    layer.register('b', second);
    await layer.groupAdd('user_1', 'a');
    await layer.groupAdd('user_1', 'b');

    await layer.groupSend('user_1', badge);

    expect(first).toHaveBeenCalledWith(badge);
    expect(second).toHaveBeenCalledWith(badge);
  });

  it('should stop delivering after discard', async () => {
    const layer = new InMemoryChannelLayer();
    const handler = vi.fn();
    layer.register('a', handler);
    await layer.groupAdd('user_1', 'a');
    await layer.groupDiscard('user_1', 'a');

    await layer.groupSend('user_1', badge);

    expect(handler).not.toHaveBeenCalled();
    expect(layer.getGroupMembers('user_1')).toEqual([]);
  });

  it('should keep delivering when one handler fails', async () => {
    const logger = createMockLogger();
    const layer = new InMemoryChannelLayer(logger);
    const healthy = vi.fn();
    layer.register('broken', () => Promise.reject(new Error('boom')));
    layer.register('healthy', healthy);
    await layer.groupAdd('room', 'broken');
    await layer.groupAdd('room', 'healthy');

    await layer.groupSend('room', badge);

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      'Channel handler failed',
      expect.any(Error),
      expect.objectContaining({ group: 'room', action: 'channel_handler_failed' }),
    );
  });

  it('should only detach the handler it registered', async () => {
    const layer = new InMemoryChannelLayer();
    const old = vi.fn();
    const replacement = vi.fn();
    const detachOld = layer.register('a', old);
    layer.register('a', replacement);
    await layer.groupAdd('g', 'a');

    detachOld();
    await layer.groupSend('g', badge);

    expect(old).not.toHaveBeenCalled();
    expect(replacement).toHaveBeenCalledTimes(1);
  });
});

describe('RoomSequencer', () => {
  it('should count per room from 1', () => {
    const sequencer = new RoomSequencer();

    expect(sequencer.next('chat_1_2')).toBe(1);
    expect(sequencer.next('chat_1_2')).toBe(2);
    expect(sequencer.next('chat_1_3')).toBe(1);
    expect(sequencer.current('chat_1_2')).toBe(2);
    expect(sequencer.size).toBe(2);
  });

  it('should restart a room after reset', () => {
    const sequencer = new RoomSequencer();
    sequencer.next('chat_1_2');

    sequencer.reset('chat_1_2');

    expect(sequencer.current('chat_1_2')).toBe(0);
    expect(sequencer.next('chat_1_2')).toBe(1);
  });
});
