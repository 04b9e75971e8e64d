/**
 * Event emitter tests.
 *
 * Verifies that MediatorEventEmitter emits lifecycle events with proper
 * payloads.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MediatorEventEmitter } from '../../../src/events/event-emitter.js';
import { RequestEventNames } from '../../../src/events/event-names.js';

describe('MediatorEventEmitter', () => {
  let emitter: MediatorEventEmitter;

  beforeEach(() => {
    emitter = new MediatorEventEmitter();
  });

  describe('event subscription', () => {
    it('allows subscribing and unsubscribing', () => {
      const handler = vi.fn();
      emitter.on(RequestEventNames.REQUEST_COMPLETED, handler);
      expect(emitter.listenerCount(RequestEventNames.REQUEST_COMPLETED)).toBe(1);

      emitter.off(RequestEventNames.REQUEST_COMPLETED, handler);
      expect(emitter.listenerCount(RequestEventNames.REQUEST_COMPLETED)).toBe(0);
    });

    it('once listeners fire a single time', () => {
      const handler = vi.fn();
      emitter.once(RequestEventNames.REQUEST_DISPATCHED, handler);

      emitter.emitDispatched('d-1', 'EchoQuery', 'EchoHandler');
      emitter.emitDispatched('d-2', 'EchoQuery', 'EchoHandler');

      expect(handler).toHaveBeenCalledTimes(1);
    });
  });

  describe('payloads', () => {
    it('emitDispatched', () => {
      const handler = vi.fn();
      emitter.on('request.dispatched', handler);

      emitter.emitDispatched('d-1', 'EchoQuery', 'EchoHandler');

      expect(handler).toHaveBeenCalledWith({
        dispatchId: 'd-1',
        requestType: 'EchoQuery',
        handlerName: 'EchoHandler',
        dispatchedAt: expect.any(Date),
      });
    });

    it('emitCompleted', () => {
      const handler = vi.fn();
      emitter.on('request.completed', handler);

      emitter.emitCompleted('d-1', 'EchoQuery', 'EchoHandler', 12);

      expect(handler).toHaveBeenCalledWith({
        dispatchId: 'd-1',
        requestType: 'EchoQuery',
        handlerName: 'EchoHandler',
        durationMs: 12,
        completedAt: expect.any(Date),
      });
    });

    it('emitFailed', () => {
      const handler = vi.fn();
      const error = new Error('boom');
      emitter.on('request.failed', handler);

      emitter.emitFailed('d-1', 'FailQuery', 'FailHandler', error, 3);

      expect(handler).toHaveBeenCalledWith({
        dispatchId: 'd-1',
        requestType: 'FailQuery',
        handlerName: 'FailHandler',
        error,
        durationMs: 3,
        failedAt: expect.any(Date),
      });
    });

    it('emitCancelled', () => {
      const handler = vi.fn();
      const reason = new Error('shutting down');
      emitter.on('request.cancelled', handler);

      emitter.emitCancelled('d-1', 'WaitForSignalQuery', 'WaitForSignalHandler', reason, 7);

      expect(handler).toHaveBeenCalledWith({
        dispatchId: 'd-1',
        requestType: 'WaitForSignalQuery',
        handlerName: 'WaitForSignalHandler',
        reason,
        durationMs: 7,
        cancelledAt: expect.any(Date),
      });
    });
  });

  describe('event names', () => {
    it('exposes every request event', () => {
      expect(Object.values(RequestEventNames)).toEqual([
        'request.dispatched',
        'request.completed',
        'request.failed',
        'request.cancelled',
      ]);
    });
  });
});
