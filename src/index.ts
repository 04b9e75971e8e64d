/**
 * In-process request/handler mediator.
 *
 * Requests declare their response type; handler classes declare the request
 * types they serve; the mediator routes each request to its one handler.
 *
 * @packageDocumentation
 */

// =============================================================================
// Requests, responses and handlers
// =============================================================================
export {
  isRequestClass,
  Request,
  type RequestClass,
  requestTypeName,
  type ResponseOf,
  Unit,
  unit,
} from './types/index.js';

export {
  type AnyRequestHandler,
  handlerNameOf,
  handlerToken,
  handlerTokenFor,
  isHandlerClass,
  type RequestHandler,
  type RequestHandlerClass,
} from './handler/index.js';

// =============================================================================
// Dispatch
// =============================================================================
export {
  HandlerInvoker,
  isCancellation,
  MEDIATOR,
  MEDIATOR_EVENTS,
  Mediator,
  type MediatorOptions,
  unwrapInvocationError,
} from './mediator/index.js';

// =============================================================================
// Registration and errors
// =============================================================================
export * from './registry/index.js';

// =============================================================================
// Container
// =============================================================================
export * from './container/index.js';

// =============================================================================
// Ambient: configuration, logging, events
// =============================================================================
export * from './config/index.js';
export * from './events/index.js';
export { type ComponentLogger, createLogger, getRootLogger, type LogFields, setRootLogger } from './logging/index.js';
