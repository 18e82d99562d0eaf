#!/usr/bin/env node
/**
 * Messaging Server
 *
 * HTTP server hosting the WebSocket gateway plus `/health`, `/ready` and
 * `/metrics`. Run directly, it reads its configuration from the environment
 * and trusts identity headers set by an authenticating proxy.
 */

import { realpathSync } from 'node:fs';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { pathToFileURL } from 'node:url';
import { WebSocketServer } from 'ws';
import { InMemoryChannelLayer, type ChannelLayer } from './channels/index.js';
import { loadConfigFromEnv } from './config/env.js';
import { createMessagingCore, type MessagingCore } from './core.js';
import { MessagingGateway, trustedHeaderAuthenticate, type Authenticate } from './gateway.js';
import { isLive, isReady, performHealthCheck, type HealthStatus } from './health/health-check.js';
import { createLogger, NullLogger, type StructuredLogger } from './logger/index.js';
import { getMetricsText, metricsRegistry } from './metrics/index.js';
import { createMongoStore } from './mongodb/index.js';
import type { FallbackNotifier } from './notifications/index.js';
import { RedisChannelLayer } from './redis/index.js';
import { offloadStore } from './storage/executor.js';
import { InMemoryMessagingStore } from './storage/memory-store.js';
import type { MessagingConfig } from './types/config.js';
import { ConfigError, toError, type MessagingStore } from './types/index.js';

export interface MessagingServerOptions {
  config: MessagingConfig;
  authenticate: Authenticate;
  /** Built from `config.storage` when omitted */
  store?: MessagingStore;
  /** Redis when `server.redisUrl` is set, in-memory otherwise */
  channelLayer?: ChannelLayer;
  logger?: StructuredLogger;
  fallbackNotifier?: FallbackNotifier;
}

export interface MessagingServer {
  readonly core: MessagingCore;
  readonly gateway: MessagingGateway;
  readonly httpServer: Server;
  listen(port?: number, host?: string): Promise<AddressInfo>;
  health(): Promise<HealthStatus>;
  close(): Promise<void>;
}

interface OpenedStore {
  store: MessagingStore;
  circuit?: { isCircuitOpen(): boolean };
  release: () => Promise<void>;
}

interface OpenedChannelLayer {
  channelLayer: ChannelLayer;
  check?: () => Promise<boolean>;
  release: () => Promise<void>;
}

async function openStore(config: MessagingConfig, logger: StructuredLogger): Promise<OpenedStore> {
  const storage = config.storage;
  if (storage.backend === 'mongodb') {
    if (!storage.mongoUrl) {
      throw new ConfigError('mongoUrl is required when backend is "mongodb"', ['storage.mongoUrl']);
    }
    const store = await createMongoStore({ mongoUrl: storage.mongoUrl, databaseName: storage.mongoDatabase, logger });
    return { store, release: () => store.disconnect() };
  }

  const store = offloadStore(new InMemoryMessagingStore(), {
    operationTimeoutMs: storage.operationTimeoutMs,
    errorThresholdPercentage: storage.errorThresholdPercentage,
    resetTimeoutMs: storage.resetTimeoutMs,
    volumeThreshold: storage.volumeThreshold,
    logger,
  });
  return {
    store,
    circuit: store,
    release: () => {
      store.close();
      return Promise.resolve();
    },
  };
}

async function openChannelLayer(config: MessagingConfig, logger: StructuredLogger): Promise<OpenedChannelLayer> {
  if (config.server.redisUrl) {
    const layer = new RedisChannelLayer({ redisUrl: config.server.redisUrl, logger });
    await layer.connect();
    return { channelLayer: layer, check: () => layer.ping(), release: () => layer.close() };
  }
  const layer = new InMemoryChannelLayer(logger);
  return { channelLayer: layer, release: () => layer.close() };
}

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { 'content-type': 'application/json' });
  res.end(JSON.stringify(body));
}

/**
 * Build the core, the HTTP server and the gateway. Stores and channel layers
 * passed in stay owned by the caller; the ones built here are released on
 * close.
 */
export async function createMessagingServer(options: MessagingServerOptions): Promise<MessagingServer> {
  const { config } = options;
  const logger = options.logger ?? new NullLogger();

  const opened: OpenedStore = options.store
    ? { store: options.store, release: () => Promise.resolve() }
    : await openStore(config, logger);
  const channel: OpenedChannelLayer = options.channelLayer
    ? { channelLayer: options.channelLayer, release: () => Promise.resolve() }
    : await openChannelLayer(config, logger);

  const core = createMessagingCore({
    config,
    store: opened.store,
    channelLayer: channel.channelLayer,
    logger,
    fallbackNotifier: options.fallbackNotifier,
  });

  let gateway: MessagingGateway | null = null;

  const health = (): Promise<HealthStatus> =>
    performHealthCheck({
      checkStore: () => opened.store.ping(),
      checkChannelLayer: channel.check,
      storeCircuit: opened.circuit,
      getOpenCircuits: () => core.errorHandler.getOpenCircuits(),
      getActiveConnections: () => gateway?.getActiveConnections() ?? 0,
    });

  const handleRequest = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const pathname = (req.url ?? '/').split('?', 1)[0];
    switch (pathname) {
      case '/health': {
        const status = await health();
        sendJson(res, isLive(status) ? 200 : 503, status);
        return;
      }
      case '/ready': {
        const status = await health();
        sendJson(res, isReady(status) ? 200 : 503, { ready: isReady(status), status: status.status });
        return;
      }
      case '/metrics':
        if (!config.observability.enableMetrics) {
          sendJson(res, 404, { error: 'Metrics are disabled' });
          return;
        }
        res.writeHead(200, { 'content-type': metricsRegistry.contentType });
        res.end(await getMetricsText());
        return;
      default:
        sendJson(res, 404, { error: 'Not found' });
    }
  };

  const httpServer = createServer((req, res) => {
    handleRequest(req, res).catch((error: unknown) => {
      logger.error('HTTP request failed', error, { url: req.url, action: 'http_request_failed' });
      if (!res.headersSent) sendJson(res, 500, { error: 'Internal server error' });
      else res.end();
    });
  });

  const wss = new WebSocketServer({ server: httpServer });
  gateway = new MessagingGateway({ wss, core, authenticate: options.authenticate });
  const activeGateway = gateway;

  let closed = false;

  return {
    core,
    gateway: activeGateway,
    httpServer,
    health,

    listen(port = config.server.port, host = config.server.host): Promise<AddressInfo> {
      return new Promise((resolve, reject) => {
        httpServer.once('error', reject);
        httpServer.listen(port, host, () => {
          httpServer.off('error', reject);
          const address = httpServer.address();
          if (address === null || typeof address === 'string') {
            reject(new Error('Server is not listening on a TCP port'));
            return;
          }
          resolve(address);
        });
      });
    },

    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      await activeGateway.close();
      core.stop();
      if (httpServer.listening) {
        httpServer.closeAllConnections();
        await new Promise<void>((resolve, reject) => {
          httpServer.close((error) => (error ? reject(error) : resolve()));
        });
      }
      await channel.release();
      await opened.release();
      logger.info('Messaging server closed', { action: 'server_closed' });
    },
  };
}

async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const logger = createLogger(config.observability.environment, config.observability.logLevel);
  const server = await createMessagingServer({ config, logger, authenticate: trustedHeaderAuthenticate });
  const address = await server.listen();
  logger.info('Messaging server listening', {
    host: address.address,
    port: address.port,
    action: 'server_listening',
  });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal, action: 'server_shutdown' });
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', toError(error), { action: 'server_shutdown_failed' });
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    const cause = toError(error);
    process.stderr.write(`Failed to start messaging server: ${cause.message}\n`);
    process.exit(1);
  });
}
