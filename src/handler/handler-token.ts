/**
 * Capability keys: one service token per request type.
 *
 * The token for a request class is created on first use and reused for the
 * lifetime of the class, so registration and dispatch always agree on the key.
 */

import { ServiceToken } from '../container/service-token.js';
import type { Request, RequestClass } from '../types/request.js';
import type { AnyRequestHandler, RequestHandler } from './base.js';

const tokens: WeakMap<object, ServiceToken<AnyRequestHandler>> = new WeakMap();

function tokenForType(requestType: object, name: string): ServiceToken<AnyRequestHandler> {
  let token = tokens.get(requestType);
  if (!token) {
    token = new ServiceToken<AnyRequestHandler>(`RequestHandler<${name}>`);
    tokens.set(requestType, token);
  }
  return token;
}

/**
 * Token under which the handler for a request class is registered.
 *
 * @example
 * ```typescript
 * services.addTransient(handlerToken(GetUserQuery), GetUserHandler);
 * ```
 */
export function handlerToken<TResponse>(
  requestClass: RequestClass<Request<TResponse>>
): ServiceToken<RequestHandler<Request<TResponse>, TResponse>> {
  // The response type is erased at runtime; the request class fixes it
  return tokenForType(requestClass, requestClass.name) as ServiceToken<
    RequestHandler<Request<TResponse>, TResponse>
  >;
}

/**
 * Token for the runtime type of a request instance.
 *
 * @returns The token, or null if the value has no constructor to key on
 */
export function handlerTokenFor<TResponse>(
  request: Request<TResponse>
): ServiceToken<RequestHandler<Request<TResponse>, TResponse>> | null {
  const requestType: unknown = request.constructor;
  if (typeof requestType !== 'function') {
    return null;
  }
  return tokenForType(requestType, requestType.name) as ServiceToken<
    RequestHandler<Request<TResponse>, TResponse>
  >;
}
