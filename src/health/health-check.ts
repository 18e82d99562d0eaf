/**
 * Health Check Utilities
 *
 * Health check utilities for production monitoring and Kubernetes probes
 */

import { toError } from '../types/errors.js';

/**
 * Health status of a component
 */
export interface ComponentHealth {
  component: string;
  healthy: boolean;
  /** Additional status details */
  status?: string;
  /** Last check timestamp */
  timestamp?: number;
}

/**
 * Overall health status
 */
export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  components: ComponentHealth[];
  metadata?: {
    activeConnections?: number;
    openCircuits?: string[];
    storeCircuitState?: 'closed' | 'open';
  };
}

/**
 * Health check configuration
 */
export interface HealthCheckConfig {
  /** Round trip to the store */
  checkStore: () => Promise<boolean>;
  /** Round trip to the channel layer backend, when it has one */
  checkChannelLayer?: () => Promise<boolean>;
  /** Breaker guarding store calls */
  storeCircuit?: { isCircuitOpen(): boolean };
  /** Open per-domain circuits from the error handler */
  getOpenCircuits?: () => string[];
  getActiveConnections?: () => number;
}

async function probe(component: string, check: () => Promise<boolean>): Promise<ComponentHealth> {
  try {
    const healthy = await check();
    return {
      component,
      healthy,
      status: healthy ? 'connected' : 'disconnected',
      timestamp: Date.now(),
    };
  } catch (error) {
    return {
      component,
      healthy: false,
      status: `error: ${toError(error).message}`,
      timestamp: Date.now(),
    };
  }
}

/**
 * Perform health check
 *
 * A dead store is unhealthy; an open circuit or a dead channel backend only
 * degrades service.
 *
 * @example
 * ```typescript
 * const health = await performHealthCheck({
 *   checkStore: () => mongoStore.ping(),
 *   checkChannelLayer: () => redis.ping().then((reply) => reply === 'PONG'),
 *   storeCircuit: offloadedStore,
 *   getOpenCircuits: () => errorHandler.getOpenCircuits(),
 * });
 * ```
 */
export async function performHealthCheck(config: HealthCheckConfig): Promise<HealthStatus> {
  const timestamp = new Date().toISOString();
  const components: ComponentHealth[] = [await probe('store', config.checkStore)];

  let channelHealthy = true;
  if (config.checkChannelLayer) {
    const channel = await probe('channel-layer', config.checkChannelLayer);
    channelHealthy = channel.healthy;
    components.push(channel);
  }

  const storeCircuitOpen = config.storeCircuit?.isCircuitOpen() ?? false;
  if (config.storeCircuit) {
    components.push({
      component: 'store-circuit-breaker',
      healthy: !storeCircuitOpen,
      status: storeCircuitOpen ? 'open' : 'closed',
      timestamp: Date.now(),
    });
  }

  const openCircuits = config.getOpenCircuits?.() ?? [];
  const storeHealthy = components[0]?.healthy ?? false;

  let status: HealthStatus['status'];
  if (!storeHealthy) {
    status = 'unhealthy';
  } else if (!channelHealthy || storeCircuitOpen || openCircuits.length > 0) {
    status = 'degraded';
  } else {
    status = 'healthy';
  }

  const metadata: NonNullable<HealthStatus['metadata']> = {};
  if (config.getActiveConnections) {
    metadata.activeConnections = config.getActiveConnections();
  }
  if (config.getOpenCircuits) {
    metadata.openCircuits = openCircuits;
  }
  if (config.storeCircuit) {
    metadata.storeCircuitState = storeCircuitOpen ? 'open' : 'closed';
  }

  return {
    status,
    timestamp,
    components,
    metadata,
  };
}

/**
 * Ready for traffic: the store answers
 */
export function isReady(health: HealthStatus): boolean {
  return health.components.some((c) => c.component === 'store' && c.healthy);
}

/**
 * Alive: not crashed, possibly degraded
 */
export function isLive(health: HealthStatus): boolean {
  return health.status !== 'unhealthy';
}
