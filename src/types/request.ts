/**
 * Request base class and type helpers.
 *
 * A request is an immutable value that names, at the type level, the
 * response its handler produces. Only the class identity travels at runtime.
 *
 * @example
 * ```typescript
 * class GetUserQuery extends Request<UserDto> {
 *   constructor(readonly id: string) {
 *     super();
 *   }
 * }
 *
 * const user = await mediator.send(new GetUserQuery('u-1')); // UserDto
 * ```
 */

declare const responseType: unique symbol;

/**
 * Base class for every request sent through the mediator.
 */
export abstract class Request<TResponse> {
  /** Carries TResponse for inference. Never assigned, never emitted. */
  declare readonly [responseType]?: TResponse;
}

/**
 * Response type declared by a request type.
 */
export type ResponseOf<TRequest> = TRequest extends Request<infer TResponse> ? TResponse : never;

/**
 * Constructor of a request type.
 */
export type RequestClass<TRequest extends Request<unknown> = Request<unknown>> = abstract new (
  ...args: never[]
) => TRequest;

/**
 * Check if a value is a request class (a constructor extending Request).
 */
export function isRequestClass(value: unknown): value is RequestClass {
  return typeof value === 'function' && value.prototype instanceof Request;
}

/**
 * Name of a request's runtime type, for messages and logs.
 */
export function requestTypeName(request: object): string {
  const ctor: unknown = request.constructor;
  if (typeof ctor === 'function' && ctor.name) {
    return ctor.name;
  }
  return 'Object';
}
