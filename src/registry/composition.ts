/**
 * Composition API: wires the mediator and every discovered handler into a
 * container.
 *
 * @example
 * ```typescript
 * import * as handlers from './handlers/index.js';
 *
 * const services = addMediator(new ServiceCollection(), [handlers]);
 * const mediator = services.getRequired(MEDIATOR);
 * ```
 *
 * @example Scanning one module by URL
 * ```typescript
 * const services = await addMediatorFromModule(
 *   new ServiceCollection(),
 *   new URL('./handlers/index.js', import.meta.url)
 * );
 * ```
 */

import type { ServiceRegistry } from '../container/types.js';
import { createLogger } from '../logging/index.js';
import { MEDIATOR, Mediator } from '../mediator/mediator.js';
import { InvalidArgumentError, ModuleLoadError } from './errors.js';
import {
  assertModules,
  type HandlerModule,
  type RegistrationOptions,
  registerHandlers,
} from './handler-scanner.js';

const log = createLogger({ component: 'registry' });

/**
 * Register the mediator with a transient lifetime.
 *
 * Does nothing if a mediator is already registered.
 */
export function registerMediator(services: ServiceRegistry): void {
  if (services.find(MEDIATOR)) {
    return;
  }
  services.add({ token: MEDIATOR, lifetime: 'transient', implementation: Mediator });
}

/**
 * Register the mediator and every handler found in the given modules.
 *
 * @param services - Container to register into
 * @param modules - Modules to scan for handlers
 * @param options - Registration options
 * @returns The same container, for chaining
 * @throws InvalidArgumentError if no modules are given
 * @throws DuplicateHandlerError under the "error" policy, see registerHandlers()
 */
export function addMediator<TServices extends ServiceRegistry>(
  services: TServices,
  modules: readonly HandlerModule[],
  options: RegistrationOptions = {}
): TServices {
  assertModules(modules);

  registerMediator(services);
  const added = registerHandlers(services, modules, options);

  log.info('Mediator registered', { modules: modules.length, handlers: added });
  return services;
}

/**
 * Import a single module and register the mediator plus the handlers it
 * exports.
 *
 * @param services - Container to register into
 * @param moduleUrl - URL (or specifier) of the module to import
 * @param options - Registration options
 * @returns The same container, for chaining
 * @throws InvalidArgumentError if moduleUrl is empty
 * @throws ModuleLoadError if the import fails
 */
export async function addMediatorFromModule<TServices extends ServiceRegistry>(
  services: TServices,
  moduleUrl: URL | string,
  options: RegistrationOptions = {}
): Promise<TServices> {
  const specifier = moduleUrl instanceof URL ? moduleUrl.href : moduleUrl;
  if (!specifier) {
    throw new InvalidArgumentError('moduleUrl', 'A module URL must be provided to scan for handlers');
  }

  let module: HandlerModule;
  try {
    module = await import(specifier);
  } catch (error) {
    throw new ModuleLoadError(specifier, error);
  }

  return addMediator(services, [module], options);
}
