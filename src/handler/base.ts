import type { ServiceProvider } from '../container/types.js';
import type { Request } from '../types/request.js';

/**
 * Handler capability for one (request, response) pair.
 *
 * The request type must declare the response type it is handled with, so a
 * handler for `GetUserQuery extends Request<UserDto>` must produce `UserDto`.
 *
 * @example
 * ```typescript
 * class GetUserHandler implements RequestHandler<GetUserQuery, UserDto> {
 *   static readonly handles = [GetUserQuery];
 *
 *   async handle(query: GetUserQuery, signal: AbortSignal): Promise<UserDto> {
 *     signal.throwIfAborted();
 *     return { id: query.id, name: 'Ada' };
 *   }
 * }
 * ```
 */
export interface RequestHandler<TRequest extends Request<TResponse>, TResponse> {
  /**
   * Produce the response for a request.
   *
   * @param request - The request being dispatched
   * @param signal - Cancellation signal from the caller; never undefined
   */
  handle(request: TRequest, signal: AbortSignal): Promise<TResponse>;
}

/**
 * A handler with its request and response types erased.
 */
export type AnyRequestHandler = RequestHandler<Request<unknown>, unknown>;

/**
 * Static shape of a handler class discovered by the registry.
 *
 * A class serving several request types lists each of them in `handles` and
 * declares one `handle` overload per request type.
 *
 * @example
 * ```typescript
 * class CounterHandler
 *   implements RequestHandler<Increment, number>, RequestHandler<Reset, Unit>
 * {
 *   static readonly handles = [Increment, Reset];
 *
 *   constructor(provider: ServiceProvider) {
 *     this.store = provider.resolve(COUNTER_STORE);
 *   }
 *
 *   handle(request: Increment, signal: AbortSignal): Promise<number>;
 *   handle(request: Reset, signal: AbortSignal): Promise<Unit>;
 *   async handle(request: Increment | Reset): Promise<number | Unit> {
 *     ...
 *   }
 * }
 * ```
 */
export interface RequestHandlerClass {
  /**
   * Request classes this handler serves.
   *
   * Only concrete classes declare it. A list inherited from a base class does
   * not count, so abstract bases leave it off and each subclass names its own
   * requests.
   */
  readonly handles: readonly unknown[];

  readonly name: string;

  new (provider: ServiceProvider): AnyRequestHandler;
}

/**
 * Check if a value is a concrete handler class.
 *
 * The class must declare `handles` itself and carry a `handle` method.
 * Abstract classes are rejected when `handle` is abstract (abstract members
 * are never emitted) or when they declare no `handles` of their own.
 */
export function isHandlerClass(value: unknown): value is RequestHandlerClass {
  return (
    typeof value === 'function' &&
    Object.hasOwn(value, 'handles') &&
    'handles' in value &&
    Array.isArray(value.handles) &&
    typeof value.prototype?.handle === 'function'
  );
}

/**
 * Display name of a handler instance.
 */
export function handlerNameOf(handler: object): string {
  const ctor: unknown = handler.constructor;
  if (typeof ctor === 'function' && ctor.name) {
    return ctor.name;
  }
  return 'anonymous';
}
