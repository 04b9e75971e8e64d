/**
 * Handler discovery: turns module exports into container registrations.
 *
 * Every export of every scanned module is a candidate. A candidate is
 * registered when it is a concrete handler class (see isHandlerClass); each
 * request class in its static `handles` list becomes one transient
 * registration under that request's capability key.
 *
 * @example
 * ```typescript
 * import * as userHandlers from './users/handlers.js';
 * import * as orderHandlers from './orders/handlers.js';
 *
 * const services = new ServiceCollection();
 * registerHandlers(services, [userHandlers, orderHandlers]);
 * ```
 */

import { loadConfig } from '../config/load-config.js';
import type { DuplicateHandlerPolicy } from '../config/types.js';
import type { ServiceDescriptor, ServiceRegistry } from '../container/types.js';
import { isHandlerClass, type RequestHandlerClass } from '../handler/base.js';
import { handlerToken } from '../handler/handler-token.js';
import { createLogger } from '../logging/index.js';
import { isRequestClass } from '../types/request.js';
import { DuplicateHandlerError, InvalidArgumentError } from './errors.js';

const log = createLogger({ component: 'registry' });

/**
 * A module namespace (`import * as handlers from ...`) or any object whose
 * property values are candidate exports.
 */
export type HandlerModule = object;

/**
 * Options for handler registration.
 */
export interface RegistrationOptions {
  /** Duplicate registration policy (default: from loadConfig()) */
  duplicateHandlers?: DuplicateHandlerPolicy;
}

/**
 * Throw unless at least one module was given.
 *
 * @throws InvalidArgumentError if modules is missing or empty
 */
export function assertModules(modules: readonly HandlerModule[] | null | undefined): void {
  if (!modules || modules.length === 0) {
    throw new InvalidArgumentError(
      'modules',
      'At least one module must be provided to scan for handlers'
    );
  }
}

/**
 * Collect the distinct exports of the given modules, in module then export
 * order.
 */
export function collectCandidates(modules: readonly HandlerModule[]): unknown[] {
  const seen = new Set<unknown>();
  for (const module of modules) {
    const exported: unknown[] = Object.values(module);
    for (const candidate of exported) {
      seen.add(candidate);
    }
  }
  return Array.from(seen);
}

function describeRegistration(descriptor: ServiceDescriptor<unknown>): string {
  if ('implementation' in descriptor) {
    return descriptor.implementation.name;
  }
  return 'factory' in descriptor ? 'factory' : 'instance';
}

function registerHandlerClass(
  services: ServiceRegistry,
  handlerClass: RequestHandlerClass,
  policy: DuplicateHandlerPolicy
): number {
  let added = 0;

  for (const entry of handlerClass.handles) {
    if (!isRequestClass(entry)) {
      log.warn('Skipping handles entry that is not a request class', {
        handler: handlerClass.name,
        entry: typeof entry === 'function' ? entry.name : typeof entry,
      });
      continue;
    }

    const token = handlerToken(entry);
    const existing = services.find(token);

    if (existing) {
      if ('implementation' in existing && existing.implementation === handlerClass) {
        continue;
      }

      const current = describeRegistration(existing);
      if (policy === 'error') {
        throw new DuplicateHandlerError(entry.name, current, handlerClass.name);
      }
      log.warn('Overwriting existing handler', {
        request_type: entry.name,
        existing: current,
        handler: handlerClass.name,
      });
    }

    services.add({ token, lifetime: 'transient', implementation: handlerClass });
    added++;
    log.debug('Registered handler', { request_type: entry.name, handler: handlerClass.name });
  }

  return added;
}

/**
 * Scan modules for handler classes and register them.
 *
 * Abstract classes, request classes and any other export are skipped
 * silently. Registering the same class twice for a request type is a no-op.
 *
 * @param services - Container to register into
 * @param modules - Modules to scan
 * @param options - Registration options
 * @returns Number of registrations added
 * @throws InvalidArgumentError if no modules are given
 * @throws DuplicateHandlerError if a request type is claimed by a second class
 *   under the "error" policy
 */
export function registerHandlers(
  services: ServiceRegistry,
  modules: readonly HandlerModule[],
  options: RegistrationOptions = {}
): number {
  assertModules(modules);

  const policy = options.duplicateHandlers ?? loadConfig().duplicateHandlers;
  let added = 0;

  for (const candidate of collectCandidates(modules)) {
    if (isHandlerClass(candidate)) {
      added += registerHandlerClass(services, candidate, policy);
    }
  }

  return added;
}
