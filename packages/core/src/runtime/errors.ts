/**
 * Errors raised by the metadata layer itself.
 *
 * These are not lookup failures: the accessor lets them through unchanged so
 * callers can tell an invalid call apart from an absent member.
 */

/**
 * More than one method matches a lookup that does not name a signature.
 */
export class AmbiguousMatchError extends Error {
  override readonly name = "AmbiguousMatchError";

  constructor(
    readonly typeName: string,
    readonly memberName: string,
    readonly candidateCount: number
  ) {
    super(
      `Ambiguous match found: ${candidateCount} methods named '${typeName}.${memberName}'.`
    );
  }
}

/**
 * A member was called with a different number of arguments than it declares.
 */
export class TargetParameterCountError extends Error {
  override readonly name = "TargetParameterCountError";

  constructor(
    readonly memberName: string,
    readonly expected: number,
    readonly actual: number
  ) {
    super(
      `Parameter count mismatch for '${memberName}': expected ${expected}, got ${actual}.`
    );
  }
}

/**
 * A described member cannot be read, written or called on the given target.
 */
export class MemberAccessError extends Error {
  override readonly name = "MemberAccessError";

  constructor(message: string) {
    super(message);
  }
}
