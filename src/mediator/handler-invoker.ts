/**
 * Type-erased entry point for one capability key.
 *
 * The mediator builds one invoker per request type and caches it for the
 * life of the process. Handler failures come back wrapped in
 * HandlerInvocationError so the mediator can tell them apart from its own
 * errors; the mediator unwraps them before they reach the caller.
 */

import { handlerNameOf, type RequestHandler } from '../handler/base.js';
import { HandlerContractError, HandlerInvocationError } from '../registry/errors.js';
import type { Request } from '../types/request.js';

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

export class HandlerInvoker {
  /** Request type this invoker was built for */
  readonly requestType: string;

  /** Method invoked on the handler */
  readonly methodName = 'handle';

  constructor(requestType: string) {
    this.requestType = requestType;
  }

  /**
   * Call the handler's `handle` method and await its result.
   *
   * @throws HandlerContractError if the handler has no `handle` method or it
   *   does not return a promise
   * @throws HandlerInvocationError wrapping anything the handler throws
   */
  async invoke<TResponse>(
    handler: RequestHandler<Request<TResponse>, TResponse>,
    request: Request<TResponse>,
    signal: AbortSignal
  ): Promise<TResponse> {
    const handlerName = handlerNameOf(handler);
    // Instances come from an external container and may not match the key
    if (typeof handler.handle !== 'function') {
      throw new HandlerContractError(handlerName, `does not have method '${this.methodName}'`);
    }

    let pending: Promise<TResponse>;
    try {
      pending = handler.handle(request, signal);
    } catch (error) {
      throw new HandlerInvocationError(this.requestType, handlerName, error);
    }

    if (!isThenable(pending)) {
      throw new HandlerContractError(
        handlerName,
        `did not return a promise for request type ${this.requestType}`
      );
    }

    try {
      return await pending;
    } catch (error) {
      throw new HandlerInvocationError(this.requestType, handlerName, error);
    }
  }

  toString(): string {
    return `HandlerInvoker(request=${this.requestType}, method=${this.methodName})`;
  }
}
