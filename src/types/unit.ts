/**
 * The zero-information response.
 *
 * Use Unit as the response type of command-style requests that perform an
 * action without returning data. There is exactly one Unit value.
 *
 * @example
 * ```typescript
 * class DeleteUserCommand extends Request<Unit> {
 *   constructor(readonly id: string) {
 *     super();
 *   }
 * }
 *
 * class DeleteUserHandler implements RequestHandler<DeleteUserCommand, Unit> {
 *   static readonly handles = [DeleteUserCommand];
 *
 *   async handle(command: DeleteUserCommand): Promise<Unit> {
 *     await users.delete(command.id);
 *     return Unit.value;
 *   }
 * }
 * ```
 */
export class Unit {
  static readonly value: Unit = Object.freeze(new Unit());

  private constructor() {}

  equals(other: unknown): boolean {
    return other instanceof Unit;
  }

  compareTo(_other: Unit): number {
    return 0;
  }

  hashCode(): number {
    return 0;
  }

  toString(): string {
    return '()';
  }

  toJSON(): string {
    return '()';
  }
}

/** Shorthand for Unit.value. */
export const unit: Unit = Unit.value;
