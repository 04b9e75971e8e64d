/**
 * The mediator: routes one request to its one handler.
 *
 * @example
 * ```typescript
 * const services = new ServiceCollection();
 * addMediator(services, [userHandlers]);
 *
 * const mediator = services.getRequired(MEDIATOR);
 * const user = await mediator.send(new GetUserQuery('u-1'));
 * ```
 */

import { randomUUID } from 'node:crypto';
import { ServiceToken } from '../container/service-token.js';
import type { ServiceProvider } from '../container/types.js';
import type { MediatorEventEmitter } from '../events/event-emitter.js';
import { type RequestEventName, RequestEventNames } from '../events/event-names.js';
import { handlerNameOf } from '../handler/base.js';
import { handlerTokenFor } from '../handler/handler-token.js';
import { createLogger } from '../logging/index.js';
import {
  HandlerInvocationError,
  HandlerNotFoundError,
  InvalidArgumentError,
} from '../registry/errors.js';
import { type Request, requestTypeName } from '../types/request.js';
import { isCancellation } from './cancellation.js';
import { HandlerInvoker } from './handler-invoker.js';

const log = createLogger({ component: 'mediator' });

/** Token under which the mediator is registered. */
export const MEDIATOR: ServiceToken<Mediator> = new ServiceToken<Mediator>('Mediator');

/** Optional token for the emitter that container-built mediators report to. */
export const MEDIATOR_EVENTS: ServiceToken<MediatorEventEmitter> =
  new ServiceToken<MediatorEventEmitter>('MediatorEventEmitter');

/**
 * Options for a mediator instance.
 */
export interface MediatorOptions {
  /** Emitter notified of each dispatch (default: MEDIATOR_EVENTS from the provider, if any) */
  events?: MediatorEventEmitter;
}

/**
 * Replace an invocation envelope with the failure it carries.
 */
export function unwrapInvocationError(error: unknown): unknown {
  return error instanceof HandlerInvocationError ? error.cause : error;
}

/**
 * Default mediator implementation.
 *
 * Instances are cheap: they hold the provider they were built with, and all
 * of them share one process-wide invoker cache.
 */
export class Mediator {
  private static readonly invokers: Map<ServiceToken<unknown>, HandlerInvoker> = new Map();

  private readonly provider: ServiceProvider;
  private readonly events: MediatorEventEmitter | undefined;

  /**
   * @param provider - Container the handlers are resolved from
   * @throws InvalidArgumentError if provider is missing
   */
  constructor(provider: ServiceProvider, options: MediatorOptions = {}) {
    if (!provider) {
      throw new InvalidArgumentError('provider', 'A service provider is required');
    }
    this.provider = provider;
    this.events = options.events ?? provider.resolve(MEDIATOR_EVENTS);
  }

  /**
   * Number of cached invokers across all mediators.
   */
  static cachedInvokerCount(): number {
    return Mediator.invokers.size;
  }

  /**
   * Clear the invoker cache.
   *
   * This is primarily for testing.
   *
   * @internal
   */
  static resetInvokerCache(): void {
    Mediator.invokers.clear();
  }

  private static invokerFor(token: ServiceToken<unknown>, requestType: string): HandlerInvoker {
    let invoker = Mediator.invokers.get(token);
    if (!invoker) {
      invoker = new HandlerInvoker(requestType);
      Mediator.invokers.set(token, invoker);
      log.debug('Cached handler invoker', { request_type: requestType });
    }
    return invoker;
  }

  /**
   * Send a request to its handler.
   *
   * @param request - The request to dispatch
   * @param signal - Cancellation signal passed through to the handler
   * @returns The handler's response, unchanged
   * @throws InvalidArgumentError if request is null or undefined
   * @throws HandlerNotFoundError if no handler is registered for the request type
   * @throws HandlerContractError if the resolved handler breaks the handler contract
   * @throws The signal's abort reason if the signal is already aborted, or
   *   whatever the handler throws, unwrapped
   */
  async send<TResponse>(request: Request<TResponse>, signal?: AbortSignal): Promise<TResponse> {
    if (request === null || request === undefined) {
      throw new InvalidArgumentError('request', 'Request must not be null or undefined');
    }

    signal?.throwIfAborted();

    const requestType = requestTypeName(request);
    const token = handlerTokenFor(request);
    const handler = token ? this.provider.resolve(token) : undefined;
    if (!token || !handler) {
      throw new HandlerNotFoundError(requestType);
    }

    const invoker = Mediator.invokerFor(token, requestType);
    const handlerName = handlerNameOf(handler);
    const dispatchId = randomUUID();
    const startTime = Date.now();

    this.notify(RequestEventNames.REQUEST_DISPATCHED, (events) =>
      events.emitDispatched(dispatchId, requestType, handlerName)
    );

    let response: TResponse;
    try {
      response = await invoker.invoke(handler, request, signal ?? new AbortController().signal);
    } catch (error) {
      const failure = unwrapInvocationError(error);
      const durationMs = Date.now() - startTime;

      if (isCancellation(failure, signal)) {
        log.debug('Request cancelled', { request_type: requestType, handler: handlerName });
        this.notify(RequestEventNames.REQUEST_CANCELLED, (events) =>
          events.emitCancelled(dispatchId, requestType, handlerName, failure, durationMs)
        );
      } else {
        log.debug('Request failed', {
          request_type: requestType,
          handler: handlerName,
          error_message: failure instanceof Error ? failure.message : String(failure),
        });
        this.notify(RequestEventNames.REQUEST_FAILED, (events) =>
          events.emitFailed(dispatchId, requestType, handlerName, failure, durationMs)
        );
      }

      throw failure;
    }

    this.notify(RequestEventNames.REQUEST_COMPLETED, (events) =>
      events.emitCompleted(dispatchId, requestType, handlerName, Date.now() - startTime)
    );
    return response;
  }

  /**
   * Run an emit against the configured emitter.
   *
   * Listener failures are logged and dropped; they never reach the caller.
   */
  private notify(event: RequestEventName, emit: (events: MediatorEventEmitter) => void): void {
    if (!this.events) {
      return;
    }
    try {
      emit(this.events);
    } catch (error) {
      log.warn('Event listener failed', {
        event,
        error_message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
