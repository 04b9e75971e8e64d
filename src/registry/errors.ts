/**
 * Error types for handler registration and request dispatch.
 *
 * Callers tell the failure kinds apart with `instanceof`; messages are for
 * humans only.
 */

/**
 * Base error class for every failure raised by the mediator itself.
 */
export class MediatorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MediatorError';
  }
}

/**
 * Error thrown when a required argument is missing or empty.
 */
export class InvalidArgumentError extends MediatorError {
  readonly argumentName: string;

  constructor(argumentName: string, message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
    this.argumentName = argumentName;
  }
}

/**
 * Error thrown when no handler is registered for a request type.
 */
export class HandlerNotFoundError extends MediatorError {
  readonly requestType: string;

  constructor(requestType: string) {
    super(`No handler registered for request type ${requestType}`);
    this.name = 'HandlerNotFoundError';
    this.requestType = requestType;
  }
}

/**
 * Error thrown when a second handler class claims a request type that is
 * already taken.
 */
export class DuplicateHandlerError extends MediatorError {
  readonly requestType: string;
  readonly existing: string;
  readonly incoming: string;

  constructor(requestType: string, existing: string, incoming: string) {
    super(
      `Request type ${requestType} is already handled by ${existing}; cannot register ${incoming}`
    );
    this.name = 'DuplicateHandlerError';
    this.requestType = requestType;
    this.existing = existing;
    this.incoming = incoming;
  }
}

/**
 * Error thrown when a resolved handler does not honour the handler contract.
 */
export class HandlerContractError extends MediatorError {
  readonly handlerName: string;

  constructor(handlerName: string, detail: string) {
    super(`Handler '${handlerName}' ${detail}`);
    this.name = 'HandlerContractError';
    this.handlerName = handlerName;
  }
}

/**
 * Envelope around a failure raised inside a handler.
 *
 * Produced by the invoker and always unwrapped by the mediator before the
 * caller sees it.
 */
export class HandlerInvocationError extends MediatorError {
  readonly requestType: string;
  readonly handlerName: string;

  constructor(requestType: string, handlerName: string, cause: unknown) {
    super(`Handler '${handlerName}' failed for request type ${requestType}`, { cause });
    this.name = 'HandlerInvocationError';
    this.requestType = requestType;
    this.handlerName = handlerName;
  }
}

/**
 * Error thrown when a handler module cannot be imported.
 */
export class ModuleLoadError extends MediatorError {
  readonly moduleUrl: string;

  constructor(moduleUrl: string, cause: unknown) {
    super(`Failed to import handler module '${moduleUrl}'`, { cause });
    this.name = 'ModuleLoadError';
    this.moduleUrl = moduleUrl;
  }
}

/**
 * Error thrown when a required service is missing from a container.
 */
export class ServiceNotFoundError extends MediatorError {
  readonly token: string;

  constructor(token: string) {
    super(`Service not registered: '${token}'`);
    this.name = 'ServiceNotFoundError';
    this.token = token;
  }
}

/**
 * Error thrown when an environment variable holds an unsupported value.
 */
export class ConfigurationError extends MediatorError {
  readonly variable: string;

  constructor(variable: string, value: string, allowed: readonly string[]) {
    super(`Invalid value '${value}' for ${variable}. Expected one of: ${allowed.join(', ')}`);
    this.name = 'ConfigurationError';
    this.variable = variable;
  }
}
