/**
 * HandlerInvoker tests.
 *
 * The invoker envelopes handler failures; the mediator unwraps them.
 */

import { describe, expect, it } from 'vitest';
import type { RequestHandler } from '../../../src/handler/base.js';
import { HandlerInvoker } from '../../../src/mediator/handler-invoker.js';
import { unwrapInvocationError } from '../../../src/mediator/mediator.js';
import { HandlerInvocationError } from '../../../src/registry/errors.js';
import { EchoHandler, EchoQuery } from '../../fixtures/handlers/user-handlers.js';

class RejectingHandler implements RequestHandler<EchoQuery, string> {
  constructor(private readonly error: unknown) {}

  async handle(_query: EchoQuery): Promise<string> {
    throw this.error;
  }
}

describe('HandlerInvoker', () => {
  const signal = new AbortController().signal;

  it('returns the handler result', async () => {
    const invoker = new HandlerInvoker('EchoQuery');

    await expect(invoker.invoke(new EchoHandler(), new EchoQuery('hi'), signal)).resolves.toBe('hi');
  });

  it('wraps handler failures in HandlerInvocationError', async () => {
    const invoker = new HandlerInvoker('EchoQuery');
    const cause = new Error('boom');

    const error = await invoker
      .invoke(new RejectingHandler(cause), new EchoQuery('hi'), signal)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HandlerInvocationError);
    expect(error).toMatchObject({
      message: "Handler 'RejectingHandler' failed for request type EchoQuery",
      requestType: 'EchoQuery',
      handlerName: 'RejectingHandler',
      cause,
    });
  });

  it('wraps non-Error rejections as well', async () => {
    const invoker = new HandlerInvoker('EchoQuery');

    const error = await invoker
      .invoke(new RejectingHandler('plain string'), new EchoQuery('hi'), signal)
      .catch((e: unknown) => e);

    expect(unwrapInvocationError(error)).toBe('plain string');
  });

  it('describes itself', () => {
    expect(String(new HandlerInvoker('EchoQuery'))).toBe(
      'HandlerInvoker(request=EchoQuery, method=handle)'
    );
  });
});

describe('unwrapInvocationError', () => {
  it('returns the cause of an envelope', () => {
    const cause = new TypeError('bad');

    expect(unwrapInvocationError(new HandlerInvocationError('EchoQuery', 'EchoHandler', cause))).toBe(
      cause
    );
  });

  it('returns other errors unchanged', () => {
    const error = new Error('other');

    expect(unwrapInvocationError(error)).toBe(error);
  });
});
