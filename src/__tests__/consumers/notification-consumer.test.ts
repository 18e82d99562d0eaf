/**
 * NotificationConsumer Tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InMemoryChannelLayer } from '../../channels/channel-layer.js';
import { createConfigFromPreset } from '../../config/presets.js';
import { CloseCode, NotificationConsumer } from '../../consumers/index.js';
import { createMessagingCore, type MessagingCore } from '../../core.js';
import { NullLogger } from '../../logger/index.js';
import type { InMemoryMessagingStore } from '../../storage/memory-store.js';
import { alice, bob, createStores } from '../fixtures.js';
import { FakeSocket } from './fake-socket.js';

describe('NotificationConsumer', () => {
  let core: MessagingCore;
  let sync: InMemoryMessagingStore;
  let layer: InMemoryChannelLayer;

  beforeEach(() => {
    const stores = createStores();
    sync = stores.sync;
    layer = new InMemoryChannelLayer();
    core = createMessagingCore({
      config: createConfigFromPreset('TESTING'),
      store: stores.store,
      channelLayer: layer,
      logger: new NullLogger(),
    });
  });

  afterEach(async () => {
    core.stop();
    await layer.close();
  });

  async function openNotifications() {
    const socket = new FakeSocket();
    const consumer = new NotificationConsumer(core, socket);
    const accepted = await consumer.connect({ user: bob, path: '/ws/notifications/' });
    return { socket, consumer, accepted };
  }

  async function notifyBob(content: string) {
    const { message } = sync.createMessage({ sender: alice, recipient: bob, content, clientId: null });
    return core.notifications.notifyNewMessage(alice, bob, message);
  }

  it('should send the unread badge on connect', async () => {
    await notifyBob('before connecting');

    const { socket, accepted } = await openNotifications();

    expect(accepted).toBe(true);
    expect(socket.frames()).toHaveLength(1);
    expect(socket.frames()[0]).toMatchObject({ type: 'badge_update', unread_count: 1 });
  });

  it('should refuse chat routes', async () => {
    const socket = new FakeSocket();
    const consumer = new NotificationConsumer(core, socket);

    expect(await consumer.connect({ user: bob, path: '/ws/chat/alice/' })).toBe(false);
    expect(socket.closedWith).toEqual({ code: CloseCode.NOT_FOUND, reason: 'Route not served here' });
  });

  it('should push realtime notifications', async () => {
    const { socket } = await openNotifications();

    await notifyBob('hi bob');

    const pushed = socket.framesOfType('notification');
    expect(pushed).toHaveLength(1);
    expect(pushed[0]).toMatchObject({
      notification_type: 'new_message',
      title: 'New Message',
      message: 'alice: hi bob',
      sender: 'alice',
      action_url: '/messages/chat/alice/',
      unread_count: 1,
    });
  });

  it('should list notifications', async () => {
    await notifyBob('first');
    const { socket, consumer } = await openNotifications();

    await consumer.receive(JSON.stringify({ type: 'get_notifications', limit: 500 }));

    const list = socket.framesOfType('notifications_list')[0];
    expect(list).toMatchObject({ limit: 100, offset: 0, unread_count: 1 });
    expect(Array.isArray(list?.notifications)).toBe(true);
  });

  it('should mark one notification read and refresh the badge', async () => {
    const notification = await notifyBob('read me');
    expect(notification).not.toBeNull();
    if (!notification) return;
    const { socket, consumer } = await openNotifications();

    await consumer.receive(JSON.stringify({ type: 'mark_read', notification_id: notification.id }));

    expect(socket.framesOfType('mark_read_response')[0]).toMatchObject({
      notification_id: notification.id,
      success: true,
    });
    const badges = socket.framesOfType('badge_update');
    expect(badges[badges.length - 1]).toMatchObject({ unread_count: 0 });
    expect(sync.countUnreadNotifications(bob.id)).toBe(0);
  });

  it('should report a missing notification as not marked', async () => {
    const { socket, consumer } = await openNotifications();

    await consumer.receive(JSON.stringify({ type: 'mark_read', notification_id: 404 }));

    expect(socket.framesOfType('mark_read_response')[0]).toMatchObject({ notification_id: 404, success: false });
  });

  it('should mark every notification read', async () => {
    await notifyBob('one');
    const { socket, consumer } = await openNotifications();

    await consumer.receive(JSON.stringify({ type: 'mark_all_read' }));

    expect(socket.framesOfType('mark_all_read_response')[0]).toMatchObject({ marked_count: 1 });
  });

  it('should refuse chat frames', async () => {
    const { socket, consumer } = await openNotifications();

    await consumer.receive(JSON.stringify({ type: 'typing', is_typing: true }));

    expect(socket.framesOfType('error')[0]).toMatchObject({
      error: 'Unsupported message type for notifications: typing',
    });
  });

  it('should release presence on close', async () => {
    const { consumer } = await openNotifications();
    expect(sync.getUserStatus(bob.id)?.isOnline).toBe(true);

    await consumer.close();

    expect(sync.getUserStatus(bob.id)?.isOnline).toBe(false);
    expect(layer.getGroupMembers('user_2')).toEqual([]);
  });
});
