/**
 * Per-connection and per-frame scope on AsyncLocalStorage
 *
 * A consumer opens one scope for the connection and a nested one for each
 * inbound frame; the logger reads the innermost scope when it writes.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes, randomUUID } from 'node:crypto';

export interface ExecutionContext {
  /** Shared by every frame of one logical exchange */
  correlationId: string;
  /** Unique per scope */
  requestId: string;
  connectionId?: string;
  userId?: number;
  startTime: number;
  environment: 'development' | 'production' | 'test';
  metadata?: Record<string, string>;
}

const storage = new AsyncLocalStorage<ExecutionContext>();

export function getContext(): ExecutionContext | undefined {
  return storage.getStore();
}

/**
 * Run `fn` inside a new scope
 *
 * Fields missing from `context` are inherited from the enclosing scope, so a
 * frame handler nested in a connection scope keeps its connection id. The
 * request id and start time are always fresh.
 */
export function withContext<T>(context: Partial<ExecutionContext>, fn: () => T): T {
  const parent = storage.getStore();
  const scope: ExecutionContext = {
    correlationId: context.correlationId ?? parent?.correlationId ?? randomUUID(),
    requestId: context.requestId ?? nextRequestId(),
    connectionId: context.connectionId ?? parent?.connectionId,
    userId: context.userId ?? parent?.userId,
    startTime: Date.now(),
    environment: context.environment ?? parent?.environment ?? 'production',
    metadata: context.metadata ?? parent?.metadata,
  };
  return storage.run(scope, fn);
}

function nextRequestId(): string {
  return `req_${Date.now().toString(36)}_${randomBytes(4).toString('hex')}`;
}

export function getCorrelationId(): string | undefined {
  return storage.getStore()?.correlationId;
}

export function getRequestId(): string | undefined {
  return storage.getStore()?.requestId;
}

export function getConnectionId(): string | undefined {
  return storage.getStore()?.connectionId;
}

/** Milliseconds since the innermost scope opened */
export function getOperationDuration(): number | undefined {
  const scope = storage.getStore();
  return scope ? Date.now() - scope.startTime : undefined;
}
