/**
 * Handler registry: discovery of handler classes and composition of the
 * mediator into a container.
 *
 * - `addMediator`: registers the mediator plus every handler in the given modules
 * - `addMediatorFromModule`: same, for one module imported by URL
 * - `registerHandlers`: handler discovery only
 * - `registerMediator`: mediator registration only
 */

export {
  addMediator,
  addMediatorFromModule,
  registerMediator,
} from './composition.js';
export {
  ConfigurationError,
  DuplicateHandlerError,
  HandlerContractError,
  HandlerInvocationError,
  HandlerNotFoundError,
  InvalidArgumentError,
  MediatorError,
  ModuleLoadError,
  ServiceNotFoundError,
} from './errors.js';
export {
  assertModules,
  collectCandidates,
  type HandlerModule,
  type RegistrationOptions,
  registerHandlers,
} from './handler-scanner.js';
