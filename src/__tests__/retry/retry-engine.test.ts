/**
 * Retry Engine Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { RetryEngine } from '../../retry/retry-engine.js';
import { MessagingErrorHandler } from '../../errors/error-handler.js';
import { ErrorCategory } from '../../errors/hierarchy.js';
import { InMemoryMessagingStore } from '../../storage/memory-store.js';
import { offloadStore } from '../../storage/executor.js';
import { CircuitOpenError } from '../../types/index.js';

const alice = { id: 1, username: 'alice' };
const bob = { id: 2, username: 'bob' };

function createSleep() {
  return vi.fn((_ms: number) => Promise.resolve());
}

function createStore() {
  return offloadStore(new InMemoryMessagingStore(), { schedule: (callback) => callback() });
}

describe('RetryEngine', () => {
  describe('calculateDelay', () => {
    it('should grow exponentially and cap at maxDelay', () => {
      const engine = new RetryEngine({ initialDelayMs: 1000, backoffMultiplier: 2, maxDelayMs: 5000 });
      expect([0, 1, 2, 3].map((attempt) => engine.calculateDelay(attempt))).toEqual([
        1000, 2000, 4000, 5000,
      ]);
    });

    it('should grow linearly', () => {
      const engine = new RetryEngine({ strategy: 'linear', initialDelayMs: 500 });
      expect([0, 1, 2].map((attempt) => engine.calculateDelay(attempt))).toEqual([500, 1000, 1500]);
    });

    it('should keep a fixed delay', () => {
      const engine = new RetryEngine({ strategy: 'fixed', initialDelayMs: 750 });
      expect(engine.calculateDelay(0)).toBe(750);
      expect(engine.calculateDelay(4)).toBe(750);
    });
  });

  describe('retryAsyncOperation', () => {
    it('should return the result of the first success', async () => {
      const sleep = createSleep();
      const engine = new RetryEngine({ maxAttempts: 3 }, { sleep });
      const operation = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new Error('transient'))
        .mockResolvedValueOnce('done');

      await expect(engine.retryAsyncOperation(operation, 'op-1')).resolves.toBe('done');
      expect(operation).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(1000);
    });

    it('should record the exponential backoff sequence between attempts', async () => {
      const sleep = createSleep();
      const engine = new RetryEngine(
        { maxAttempts: 6, initialDelayMs: 2, backoffMultiplier: 2, maxDelayMs: 32 },
        { sleep },
      );
      const operation = vi.fn(() => Promise.reject(new Error('always fails')));

      await expect(engine.retryAsyncOperation(operation, 'op-backoff')).rejects.toThrow('always fails');
      expect(operation).toHaveBeenCalledTimes(6);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2, 4, 8, 16, 32]);
    });

    it('should cap the backoff sequence at maxDelay', async () => {
      const sleep = createSleep();
      const engine = new RetryEngine(
        { maxAttempts: 5, initialDelayMs: 2, backoffMultiplier: 2, maxDelayMs: 8 },
        { sleep },
      );

      await expect(
        engine.retryAsyncOperation(() => Promise.reject(new Error('x')), 'op-capped'),
      ).rejects.toThrow('x');
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2, 4, 8, 8]);
    });

    it('should rethrow the last error after exhausting attempts', async () => {
      const engine = new RetryEngine({ maxAttempts: 3 }, { sleep: createSleep() });
      let call = 0;
      const operation = () => {
        call++;
        return Promise.reject(new Error(`failure ${String(call)}`));
      };

      await expect(engine.retryAsyncOperation(operation, 'op-last')).rejects.toThrow('failure 3');
    });

    it('should track attempts while running and clear them afterwards', async () => {
      const engine = new RetryEngine({ maxAttempts: 3 }, { sleep: createSleep() });
      const seen: number[] = [];
      let call = 0;
      const operation = () => {
        call++;
        seen.push(engine.getOperationAttempts('op-tracked'));
        return call < 3 ? Promise.reject(new Error('again')) : Promise.resolve('ok');
      };

      await engine.retryAsyncOperation(operation, 'op-tracked');
      expect(seen).toEqual([1, 2, 3]);
      expect(engine.getOperationAttempts('op-tracked')).toBe(0);
      expect(engine.getActiveOperations()).toEqual([]);
    });

    it('should clear tracking after terminal failure', async () => {
      const engine = new RetryEngine({ maxAttempts: 2 }, { sleep: createSleep() });
      await expect(
        engine.retryAsyncOperation(() => Promise.reject(new Error('no')), 'op-failed'),
      ).rejects.toThrow('no');
      expect(engine.getActiveOperations()).toEqual([]);
    });

    it('should fail fast without calling the operation when the circuit is open', async () => {
      const errorHandler = new MessagingErrorHandler({ failureThreshold: 2 });
      const circuit = { category: ErrorCategory.DATABASE, context: { operation: 'create_message' } };
      errorHandler.recordFailure(circuit.category, circuit.context);
      errorHandler.recordFailure(circuit.category, circuit.context);

      const engine = new RetryEngine({}, { errorHandler, sleep: createSleep() });
      const operation = vi.fn(() => Promise.resolve('never'));

      await expect(engine.retryAsyncOperation(operation, 'op-open', { circuit })).rejects.toBeInstanceOf(
        CircuitOpenError,
      );
      expect(operation).not.toHaveBeenCalled();
    });

    it('should feed failures into the guarding circuit until it opens', async () => {
      const errorHandler = new MessagingErrorHandler({ failureThreshold: 2 });
      const circuit = { category: ErrorCategory.WEBSOCKET, context: { room: 'chat_1_2' } };
      const engine = new RetryEngine({ maxAttempts: 3 }, { errorHandler, sleep: createSleep() });
      const operation = vi.fn(() => Promise.reject(new Error('socket closed')));

      await expect(engine.retryAsyncOperation(operation, 'op-feed', { circuit })).rejects.toBeInstanceOf(
        CircuitOpenError,
      );
      expect(operation).toHaveBeenCalledTimes(2);
      expect(errorHandler.isCircuitBreakerOpen('circuit_websocket_chat_1_2')).toBe(true);
    });
  });

  describe('retryMessageCreation', () => {
    it('should persist the message', async () => {
      const store = createStore();
      const engine = new RetryEngine({}, { store, sleep: createSleep() });

      const outcome = await engine.retryMessageCreation(alice, bob, 'hello', 'c1');

      expect(outcome.ok).toBe(true);
      if (outcome.ok) {
        expect(outcome.message.content).toBe('hello');
        expect(outcome.message.clientId).toBe('c1');
        expect(outcome.created).toBe(true);
      }
    });

    it('should return the existing message for a repeated client id', async () => {
      const store = createStore();
      const engine = new RetryEngine({}, { store, sleep: createSleep() });

      const first = await engine.retryMessageCreation(alice, bob, 'hello', 'c1');
      const second = await engine.retryMessageCreation(alice, bob, 'hello', 'c1');

      expect(first.ok && second.ok).toBe(true);
      if (first.ok && second.ok) {
        expect(second.message.id).toBe(first.message.id);
        expect(second.created).toBe(false);
      }
    });

    it('should return the queue sentinel instead of throwing after exhaustion', async () => {
      const store = createStore();
      vi.spyOn(store, 'createMessage').mockRejectedValue(new Error('database unavailable'));
      const sleep = createSleep();
      const engine = new RetryEngine({ maxAttempts: 3 }, { store, sleep });

      const outcome = await engine.retryMessageCreation(alice, bob, 'hello');

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.shouldQueue).toBe(true);
        expect(outcome.error.message).toBe('database unavailable');
      }
      expect(store.createMessage).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledTimes(2);
    });
  });

  describe('retryWebsocketTransmission', () => {
    it('should report success after a transient failure', async () => {
      const engine = new RetryEngine({}, { sleep: createSleep() });
      const send = vi
        .fn<() => Promise<void>>()
        .mockRejectedValueOnce(new Error('busy'))
        .mockResolvedValueOnce(undefined);

      await expect(engine.retryWebsocketTransmission(send, 'chat_1_2')).resolves.toBe(true);
      expect(send).toHaveBeenCalledTimes(2);
    });

    it('should report failure without throwing', async () => {
      const engine = new RetryEngine({ maxAttempts: 2 }, { sleep: createSleep() });
      const send = vi.fn(() => Promise.reject(new Error('gone')));

      await expect(engine.retryWebsocketTransmission(send, 'chat_1_2')).resolves.toBe(false);
      expect(send).toHaveBeenCalledTimes(2);
    });
  });
});
