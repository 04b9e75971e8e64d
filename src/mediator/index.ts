export { isCancellation } from './cancellation.js';
export { HandlerInvoker } from './handler-invoker.js';
export {
  MEDIATOR,
  MEDIATOR_EVENTS,
  Mediator,
  type MediatorOptions,
  unwrapInvocationError,
} from './mediator.js';
