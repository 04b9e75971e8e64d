/**
 * Error hierarchy tests.
 */

import { describe, expect, it } from 'vitest';
import {
  ConfigurationError,
  DuplicateHandlerError,
  HandlerContractError,
  HandlerInvocationError,
  HandlerNotFoundError,
  InvalidArgumentError,
  MediatorError,
  ModuleLoadError,
  ServiceNotFoundError,
} from '../../../src/registry/errors.js';

describe('MediatorError hierarchy', () => {
  const errors: MediatorError[] = [
    new InvalidArgumentError('request', 'Request must not be null or undefined'),
    new HandlerNotFoundError('EchoQuery'),
    new DuplicateHandlerError('EchoQuery', 'EchoHandler', 'ReverseEchoHandler'),
    new HandlerContractError('EchoHandler', "does not have method 'handle'"),
    new HandlerInvocationError('EchoQuery', 'EchoHandler', new Error('boom')),
    new ModuleLoadError('file:///handlers.js', new Error('missing')),
    new ServiceNotFoundError('Clock'),
    new ConfigurationError('MEDIATOR_ENV', 'x', ['a', 'b']),
  ];

  it('every error extends MediatorError and Error', () => {
    for (const error of errors) {
      expect(error).toBeInstanceOf(MediatorError);
      expect(error).toBeInstanceOf(Error);
    }
  });

  it('every error names its own class', () => {
    expect(errors.map((error) => error.name)).toEqual([
      'InvalidArgumentError',
      'HandlerNotFoundError',
      'DuplicateHandlerError',
      'HandlerContractError',
      'HandlerInvocationError',
      'ModuleLoadError',
      'ServiceNotFoundError',
      'ConfigurationError',
    ]);
  });
});

describe('HandlerNotFoundError', () => {
  it('names the request type', () => {
    const error = new HandlerNotFoundError('GetUserQuery');

    expect(error.message).toBe('No handler registered for request type GetUserQuery');
    expect(error.requestType).toBe('GetUserQuery');
  });
});

describe('HandlerContractError', () => {
  it('prefixes the handler name', () => {
    const error = new HandlerContractError('EchoHandler', 'did not return a promise for request type EchoQuery');

    expect(error.message).toBe(
      "Handler 'EchoHandler' did not return a promise for request type EchoQuery"
    );
    expect(error.handlerName).toBe('EchoHandler');
  });
});

describe('ModuleLoadError', () => {
  it('keeps the import failure as cause', () => {
    const cause = new Error('missing');
    const error = new ModuleLoadError('file:///handlers.js', cause);

    expect(error.message).toBe("Failed to import handler module 'file:///handlers.js'");
    expect(error.moduleUrl).toBe('file:///handlers.js');
    expect(error.cause).toBe(cause);
  });
});

describe('InvalidArgumentError', () => {
  it('records the argument name', () => {
    expect(new InvalidArgumentError('modules', 'empty').argumentName).toBe('modules');
  });
});
