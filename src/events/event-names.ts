/**
 * Standard event names for dispatch observation.
 */

/**
 * Event names for the request dispatch lifecycle
 */
export const RequestEventNames = {
  /** Emitted when a handler has been resolved and is about to run */
  REQUEST_DISPATCHED: 'request.dispatched',

  /** Emitted when a handler returns a response */
  REQUEST_COMPLETED: 'request.completed',

  /** Emitted when a handler fails with anything other than cancellation */
  REQUEST_FAILED: 'request.failed',

  /** Emitted when a handler stops because the caller's signal was aborted */
  REQUEST_CANCELLED: 'request.cancelled',
} as const;

export type RequestEventName = (typeof RequestEventNames)[keyof typeof RequestEventNames];
