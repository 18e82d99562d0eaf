/**
 * Consumers
 *
 * Exports:
 * - BaseConsumer and the socket contract
 * - ChatConsumer (`/ws/chat/<peer-username>/`)
 * - NotificationConsumer (`/ws/notifications/`)
 */

export {
  BaseConsumer,
  CloseCode,
  type ConnectRequest,
  type ConsumerRoute,
  type ConsumerSocket,
  type ConsumerState,
} from './base-consumer.js';
export { ChatConsumer } from './chat-consumer.js';
export { NotificationConsumer } from './notification-consumer.js';
