/**
 * Redis Adapter
 *
 * Exports:
 * - RedisChannelLayer (pub/sub fan-out across processes)
 */

export { RedisChannelLayer, type RedisChannelLayerConfig } from './channel-layer.js';
