/**
 * Channels
 *
 * Exports:
 * - ChannelLayer contract and room naming helpers
 * - InMemoryChannelLayer (single process)
 * - RoomSequencer for per-room broadcast ordering
 */

export {
  InMemoryChannelLayer,
  LocalChannelRegistry,
  chatRoomName,
  userGroupName,
  type ChannelHandler,
  type ChannelLayer,
} from './channel-layer.js';
export { RoomSequencer } from './room-sequencer.js';
