/**
 * Typed event emitter for dispatch lifecycle events.
 *
 * Observers only: listeners cannot alter or intercept a dispatch.
 */

import { EventEmitter } from 'eventemitter3';
import { RequestEventNames } from './event-names.js';

/**
 * Event payload types
 */
export interface RequestDispatchedPayload {
  dispatchId: string;
  requestType: string;
  handlerName: string;
  dispatchedAt: Date;
}

export interface RequestCompletedPayload {
  dispatchId: string;
  requestType: string;
  handlerName: string;
  durationMs: number;
  completedAt: Date;
}

export interface RequestFailedPayload {
  dispatchId: string;
  requestType: string;
  handlerName: string;
  error: unknown;
  durationMs: number;
  failedAt: Date;
}

export interface RequestCancelledPayload {
  dispatchId: string;
  requestType: string;
  handlerName: string;
  reason: unknown;
  durationMs: number;
  cancelledAt: Date;
}

/**
 * Event map for type-safe event handling
 */
export interface MediatorEventMap {
  'request.dispatched': [RequestDispatchedPayload];
  'request.completed': [RequestCompletedPayload];
  'request.failed': [RequestFailedPayload];
  'request.cancelled': [RequestCancelledPayload];
}

/**
 * Type-safe event emitter for mediator events
 */
export class MediatorEventEmitter extends EventEmitter<MediatorEventMap> {
  /**
   * Emit a request dispatched event
   */
  emitDispatched(dispatchId: string, requestType: string, handlerName: string): void {
    this.emit(RequestEventNames.REQUEST_DISPATCHED, {
      dispatchId,
      requestType,
      handlerName,
      dispatchedAt: new Date(),
    });
  }

  /**
   * Emit a request completed event
   */
  emitCompleted(
    dispatchId: string,
    requestType: string,
    handlerName: string,
    durationMs: number
  ): void {
    this.emit(RequestEventNames.REQUEST_COMPLETED, {
      dispatchId,
      requestType,
      handlerName,
      durationMs,
      completedAt: new Date(),
    });
  }

  /**
   * Emit a request failed event
   */
  emitFailed(
    dispatchId: string,
    requestType: string,
    handlerName: string,
    error: unknown,
    durationMs: number
  ): void {
    this.emit(RequestEventNames.REQUEST_FAILED, {
      dispatchId,
      requestType,
      handlerName,
      error,
      durationMs,
      failedAt: new Date(),
    });
  }

  /**
   * Emit a request cancelled event
   */
  emitCancelled(
    dispatchId: string,
    requestType: string,
    handlerName: string,
    reason: unknown,
    durationMs: number
  ): void {
    this.emit(RequestEventNames.REQUEST_CANCELLED, {
      dispatchId,
      requestType,
      handlerName,
      reason,
      durationMs,
      cancelledAt: new Date(),
    });
  }
}
