/**
 * Errors thrown by the `getExpected*`, read, write and invoke helpers
 */

import {
  type Diagnostic,
  categoryOf,
  formatDiagnostic,
} from "../types/diagnostic.js";

/**
 * Base class of every failure the accessor raises itself. The diagnostic
 * keeps the code and message for callers that report or match on them.
 */
export class ReflectionError extends Error {
  override readonly name: string = "ReflectionError";

  constructor(readonly diagnostic: Diagnostic) {
    super(diagnostic.message);
  }

  get code(): Diagnostic["code"] {
    return this.diagnostic.code;
  }

  format(): string {
    return formatDiagnostic(this.diagnostic);
  }
}

/**
 * No type or member with the requested name, scope or signature.
 */
export class MemberNotFoundError extends ReflectionError {
  override readonly name: string = "MemberNotFoundError";
}

/**
 * More than one loaded module defines the requested type name.
 */
export class AmbiguousTypeNameError extends ReflectionError {
  override readonly name: string = "AmbiguousTypeNameError";
}

/**
 * An argument that must be non-null was null or undefined.
 */
export class NullArgumentError extends ReflectionError {
  override readonly name: string = "NullArgumentError";
}

export const toReflectionError = (diagnostic: Diagnostic): ReflectionError => {
  switch (categoryOf(diagnostic.code)) {
    case "not-found":
      return new MemberNotFoundError(diagnostic);
    case "ambiguous-type-name":
      return new AmbiguousTypeNameError(diagnostic);
    case "null-argument":
      return new NullArgumentError(diagnostic);
    case "metadata":
      return new ReflectionError(diagnostic);
  }
};
