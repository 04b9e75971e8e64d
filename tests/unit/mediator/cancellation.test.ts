/**
 * Cancellation detection tests.
 */

import { describe, expect, it } from 'vitest';
import { isCancellation } from '../../../src/mediator/cancellation.js';

describe('isCancellation', () => {
  it('recognizes the reason of an aborted signal', () => {
    const controller = new AbortController();
    const reason = new Error('shutting down');
    controller.abort(reason);

    expect(isCancellation(reason, controller.signal)).toBe(true);
  });

  it('recognizes the default abort reason', () => {
    const controller = new AbortController();
    controller.abort();

    expect(isCancellation(controller.signal.reason)).toBe(true);
  });

  it('recognizes timeout errors', () => {
    expect(isCancellation(new DOMException('timed out', 'TimeoutError'))).toBe(true);
  });

  it('does not treat ordinary errors as cancellation', () => {
    const controller = new AbortController();

    expect(isCancellation(new Error('boom'), controller.signal)).toBe(false);
  });

  it('ignores the signal until it is aborted', () => {
    const controller = new AbortController();

    expect(isCancellation(undefined, controller.signal)).toBe(false);
  });

  it('does not treat non-objects as cancellation', () => {
    expect(isCancellation('AbortError')).toBe(false);
    expect(isCancellation(null)).toBe(false);
  });
});
