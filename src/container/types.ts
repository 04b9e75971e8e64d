/**
 * Container contracts consumed by the mediator and the handler registry.
 *
 * The mediator only needs ServiceProvider; the registry needs
 * ServiceRegistry. ServiceCollection implements both, and applications may
 * adapt any other container to these interfaces.
 */

import type { ServiceToken } from './service-token.js';

/**
 * Service lifetimes.
 *
 * - transient: a new instance on every resolve
 * - singleton: one instance per container, created on first resolve
 */
export type ServiceLifetime = 'transient' | 'singleton';

/**
 * Class constructed by the container.
 *
 * The constructor receives the provider so the service can resolve its own
 * collaborators.
 */
export type ServiceClass<T> = new (provider: ServiceProvider) => T;

/**
 * Factory invoked by the container.
 */
export type ServiceFactory<T> = (provider: ServiceProvider) => T;

/**
 * One registration: a token, a lifetime and exactly one way to produce the
 * service.
 */
export type ServiceDescriptor<T> =
  | {
      readonly token: ServiceToken<T>;
      readonly lifetime: ServiceLifetime;
      readonly implementation: ServiceClass<T>;
    }
  | {
      readonly token: ServiceToken<T>;
      readonly lifetime: ServiceLifetime;
      readonly factory: ServiceFactory<T>;
    }
  | {
      readonly token: ServiceToken<T>;
      readonly lifetime: 'singleton';
      readonly instance: T;
    };

/**
 * Read side of a container.
 *
 * Implementations must tolerate concurrent resolution.
 */
export interface ServiceProvider {
  /**
   * Resolve a service.
   *
   * @returns The service, or undefined if nothing is registered for the token
   */
  resolve<T>(token: ServiceToken<T>): T | undefined;
}

/**
 * Write side of a container, used at composition time.
 */
export interface ServiceRegistry {
  /** Add or replace the registration for descriptor.token. */
  add<T>(descriptor: ServiceDescriptor<T>): void;

  /** Look up the registration for a token. */
  find<T>(token: ServiceToken<T>): ServiceDescriptor<T> | undefined;
}
