import { createLogger } from '../logging/index.js';
import { ServiceNotFoundError } from '../registry/errors.js';
import type { ServiceToken } from './service-token.js';
import type {
  ServiceClass,
  ServiceDescriptor,
  ServiceFactory,
  ServiceLifetime,
  ServiceProvider,
  ServiceRegistry,
} from './types.js';

const log = createLogger({ component: 'container' });

interface Registration<T> {
  readonly descriptor: ServiceDescriptor<T>;
  singleton?: { readonly value: T };
}

/**
 * In-process service container.
 *
 * Supports registering:
 * - Classes (constructed with the provider on resolve)
 * - Factory functions (called with the provider on resolve)
 * - Instances (returned directly)
 *
 * @example
 * ```typescript
 * const services = new ServiceCollection();
 *
 * services.addSingleton(USER_REPOSITORY, InMemoryUserRepository);
 * services.addTransient(REPORT_BUILDER, ReportBuilder);
 * services.addInstance(CLOCK, systemClock);
 * services.addFactory(MAILER, (provider) => new Mailer(provider.resolve(CLOCK)));
 *
 * const repository = services.getRequired(USER_REPOSITORY);
 * ```
 */
export class ServiceCollection implements ServiceProvider, ServiceRegistry {
  private readonly registrations: Map<ServiceToken<unknown>, Registration<unknown>> = new Map();

  /**
   * Add or replace a registration.
   *
   * Replacing a registration discards any singleton already created for it.
   */
  add<T>(descriptor: ServiceDescriptor<T>): void {
    const registration: Registration<T> = { descriptor };
    if ('instance' in descriptor) {
      registration.singleton = { value: descriptor.instance };
    }
    this.registrations.set(descriptor.token, registration);
  }

  /**
   * Register a class with a new instance per resolve.
   */
  addTransient<T>(token: ServiceToken<T>, implementation: ServiceClass<T>): this {
    this.add({ token, lifetime: 'transient', implementation });
    return this;
  }

  /**
   * Register a class constructed once, on first resolve.
   */
  addSingleton<T>(token: ServiceToken<T>, implementation: ServiceClass<T>): this {
    this.add({ token, lifetime: 'singleton', implementation });
    return this;
  }

  /**
   * Register an existing instance.
   */
  addInstance<T>(token: ServiceToken<T>, instance: T): this {
    this.add({ token, lifetime: 'singleton', instance });
    return this;
  }

  /**
   * Register a factory function.
   *
   * @param lifetime - Whether the factory runs on every resolve (default) or once
   */
  addFactory<T>(
    token: ServiceToken<T>,
    factory: ServiceFactory<T>,
    lifetime: ServiceLifetime = 'transient'
  ): this {
    this.add({ token, lifetime, factory });
    return this;
  }

  find<T>(token: ServiceToken<T>): ServiceDescriptor<T> | undefined {
    return this.registration(token)?.descriptor;
  }

  /**
   * Remove a registration.
   *
   * @returns True if one was removed
   */
  remove<T>(token: ServiceToken<T>): boolean {
    return this.registrations.delete(token);
  }

  has<T>(token: ServiceToken<T>): boolean {
    return this.registrations.has(token);
  }

  resolve<T>(token: ServiceToken<T>): T | undefined {
    const registration = this.registration(token);
    if (!registration) {
      return undefined;
    }

    if (registration.singleton) {
      return registration.singleton.value;
    }

    const value = this.create(registration.descriptor);
    if (registration.descriptor.lifetime === 'singleton') {
      registration.singleton = { value };
    }
    return value;
  }

  /**
   * Resolve a service that must be registered.
   *
   * @throws ServiceNotFoundError if nothing is registered for the token
   */
  getRequired<T>(token: ServiceToken<T>): T {
    const value = this.resolve(token);
    if (value === undefined) {
      throw new ServiceNotFoundError(token.description);
    }
    return value;
  }

  /**
   * All registrations, in insertion order.
   */
  descriptors(): ServiceDescriptor<unknown>[] {
    return Array.from(this.registrations.values(), (registration) => registration.descriptor);
  }

  /**
   * Number of registrations.
   */
  get size(): number {
    return this.registrations.size;
  }

  /**
   * Remove every registration.
   */
  clear(): void {
    this.registrations.clear();
  }

  /**
   * Get debug information about the container.
   *
   * @returns Object mapping token descriptions to lifetime and source
   */
  debugInfo(): Record<string, unknown> {
    const services: Record<string, string> = {};
    for (const { descriptor } of this.registrations.values()) {
      services[descriptor.token.description] = `${descriptor.lifetime}:${describeSource(descriptor)}`;
    }

    return {
      serviceCount: this.registrations.size,
      services,
    };
  }

  private registration<T>(token: ServiceToken<T>): Registration<T> | undefined {
    // add() always stores a registration under its own descriptor's token
    return this.registrations.get(token) as Registration<T> | undefined;
  }

  private create<T>(descriptor: ServiceDescriptor<T>): T {
    try {
      if ('implementation' in descriptor) {
        return new descriptor.implementation(this);
      }
      if ('factory' in descriptor) {
        return descriptor.factory(this);
      }
      return descriptor.instance;
    } catch (error) {
      log.error('Failed to create service', {
        token: descriptor.token.description,
        error_message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}

function describeSource(descriptor: ServiceDescriptor<unknown>): string {
  if ('implementation' in descriptor) {
    return descriptor.implementation.name;
  }
  if ('factory' in descriptor) {
    return 'factory';
  }
  return 'instance';
}
