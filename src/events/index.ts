/**
 * Dispatch lifecycle events.
 */

export {
  MediatorEventEmitter,
  type MediatorEventMap,
  type RequestCancelledPayload,
  type RequestCompletedPayload,
  type RequestDispatchedPayload,
  type RequestFailedPayload,
} from './event-emitter.js';
export { type RequestEventName, RequestEventNames } from './event-names.js';
