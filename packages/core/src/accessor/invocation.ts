import { type TypeRef, typeRefOf } from "../runtime/type-ref.js";
import { type Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { type Result, error, ok } from "../types/result.js";

/**
 * Derive a call signature from argument values, one concrete run-time type
 * per argument. Fails on the first null or undefined argument.
 */
export const inferParameterTypes = (
  args: readonly unknown[]
): Result<readonly TypeRef[], Diagnostic> => {
  const types: TypeRef[] = [];
  for (const [index, arg] of args.entries()) {
    if (arg === null || arg === undefined) {
      return error(
        createDiagnostic(
          "RFL3001",
          `All arguments must be non-null (argument at index ${index} is ${arg}).`,
          "Pass explicit parameter types to pick an overload when an argument is null."
        )
      );
    }
    types.push(typeRefOf(arg));
  }
  return ok(types);
};
