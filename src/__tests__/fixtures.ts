/**
 * Shared test fixtures
 */

import { vi } from 'vitest';
import { InMemoryChannelLayer } from '../channels/channel-layer.js';
import type { ChannelEvent } from '../serialization/frames.js';
import { offloadStore } from '../storage/executor.js';
import { InMemoryMessagingStore } from '../storage/memory-store.js';
import type { StructuredLogger, UserRef } from '../types/index.js';

export const alice: UserRef = { id: 1, username: 'alice' };
export const bob: UserRef = { id: 2, username: 'bob' };
export const carol: UserRef = { id: 3, username: 'carol' };

export function createMockLogger(): StructuredLogger {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * In-memory store behind the executor, with calls run inline
 */
export function createStores() {
  const sync = new InMemoryMessagingStore();
  for (const user of [alice, bob, carol]) sync.saveUser(user);
  const store = offloadStore(sync, { schedule: (callback) => callback() });
  return { sync, store };
}

/**
 * Join a listening channel to a group and collect what it receives
 */
export async function captureGroup(layer: InMemoryChannelLayer, group: string): Promise<ChannelEvent[]> {
  const received: ChannelEvent[] = [];
  const channelName = `capture-${group}-${String(Math.random())}`;
  layer.register(channelName, (event) => {
    received.push(event);
  });
  await layer.groupAdd(group, channelName);
  return received;
}

export function daysAgo(days: number, from: Date = new Date()): Date {
  return new Date(from.getTime() - days * 86400 * 1000);
}
