/**
 * Typed identity under which a container stores a registration.
 *
 * Tokens compare by reference; the description is only for messages.
 *
 * @example
 * ```typescript
 * const USER_REPOSITORY = new ServiceToken<UserRepository>('UserRepository');
 * services.addSingleton(USER_REPOSITORY, new InMemoryUserRepository());
 * ```
 */
export class ServiceToken<T> {
  /** Carries T for inference. Never assigned, never emitted. */
  declare readonly service?: T;

  readonly description: string;

  constructor(description: string) {
    this.description = description;
  }

  toString(): string {
    return `ServiceToken(${this.description})`;
  }
}
