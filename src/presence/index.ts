/**
 * Presence
 *
 * Exports:
 * - PresenceManager (online state by connection count)
 * - TypingManager (typing indicators)
 */

export {
  DEFAULT_PRESENCE_CONFIG,
  PresenceManager,
  formatElapsed,
  getLastSeenDisplay,
  isConnectionStale,
  type OnlineUser,
  type PresenceDependencies,
  type PresenceSummary,
  type UserPresence,
} from './presence-manager.js';
export { DEFAULT_TYPING_CONFIG, TypingManager, type TypingDependencies } from './typing-manager.js';
