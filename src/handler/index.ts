/**
 * Handler contracts and capability keys.
 *
 * @module handler
 */

export {
  type AnyRequestHandler,
  handlerNameOf,
  isHandlerClass,
  type RequestHandler,
  type RequestHandlerClass,
} from './base.js';
export { handlerToken, handlerTokenFor } from './handler-token.js';
