/**
 * Prometheus Metrics
 *
 * Everything registers on `metricsRegistry`, which the server exposes at
 * `/metrics` when observability metrics are enabled.
 */

import { Counter, Gauge, Histogram, Registry } from 'prom-client';

/**
 * Global metrics registry
 * Can be scraped by Prometheus at /metrics endpoint
 */
export const metricsRegistry = new Registry();

/**
 * Chat messages persisted and broadcast
 */
export const messagesSentCounter = new Counter({
  name: 'messaging_messages_sent_total',
  help: 'Total number of chat messages persisted and broadcast',
  registers: [metricsRegistry],
});

/**
 * Messages written to the offline queue, by queue type
 */
export const messagesQueuedCounter = new Counter({
  name: 'messaging_messages_queued_total',
  help: 'Total number of messages written to the offline queue',
  labelNames: ['queue_type'],
  registers: [metricsRegistry],
});

/**
 * Queued messages delivered on reconnection or retry
 */
export const queuedDeliveriesCounter = new Counter({
  name: 'messaging_queued_deliveries_total',
  help: 'Total number of queued messages delivered',
  labelNames: ['status'],
  registers: [metricsRegistry],
});

/**
 * Retry attempts made by the retry engine
 */
export const retryAttemptsCounter = new Counter({
  name: 'messaging_retry_attempts_total',
  help: 'Total number of retry attempts',
  labelNames: ['outcome'],
  registers: [metricsRegistry],
});

/**
 * Errors classified by the error handler
 */
export const errorsCounter = new Counter({
  name: 'messaging_errors_total',
  help: 'Total number of handled errors',
  labelNames: ['category', 'severity'],
  registers: [metricsRegistry],
});

/**
 * Circuit breaker state changes
 */
export const circuitBreakerTransitionsCounter = new Counter({
  name: 'messaging_circuit_breaker_transitions_total',
  help: 'Total number of circuit breaker state transitions',
  labelNames: ['to_state'],
  registers: [metricsRegistry],
});

/**
 * Read receipts processed, by outcome
 */
export const readReceiptsCounter = new Counter({
  name: 'messaging_read_receipts_total',
  help: 'Total number of read receipt requests',
  labelNames: ['outcome'],
  registers: [metricsRegistry],
});

/**
 * Notifications by outcome
 */
export const notificationsCounter = new Counter({
  name: 'messaging_notifications_total',
  help: 'Total number of notification requests',
  labelNames: ['outcome'],
  registers: [metricsRegistry],
});

/**
 * Open WebSocket sessions by route
 */
export const activeConnectionsGauge = new Gauge({
  name: 'messaging_active_connections',
  help: 'Number of open WebSocket sessions',
  labelNames: ['route'],
  registers: [metricsRegistry],
});

/**
 * Store operation latency histogram
 */
export const storeLatencyHistogram = new Histogram({
  name: 'messaging_store_operation_latency_seconds',
  help: 'Latency of persistence operations',
  labelNames: ['operation', 'status'],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
  registers: [metricsRegistry],
});

/**
 * Maintenance sweep latency histogram
 */
export const maintenanceLatencyHistogram = new Histogram({
  name: 'messaging_maintenance_latency_seconds',
  help: 'Latency of periodic maintenance sweeps',
  labelNames: ['task', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [metricsRegistry],
});

/**
 * Helper to get metrics in text format for Prometheus scraping
 */
export async function getMetricsText(): Promise<string> {
  return await metricsRegistry.metrics();
}

/**
 * Zero every metric in the registry
 */
export function resetMetrics(): void {
  metricsRegistry.resetMetrics();
}
