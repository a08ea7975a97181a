/**
 * Static (class) access - read, write and invoke public static members
 */

import type { TypeInfo } from "../runtime/type-info.js";
import type { TypeRef } from "../runtime/type-ref.js";
import { flatMap, unwrapOrThrow } from "../types/result.js";
import { toReflectionError } from "./errors.js";
import { inferParameterTypes } from "./invocation.js";
import {
  getExpectedFieldOrProperty,
  getExpectedMethod,
  getExpectedMethodWithSignature,
  tryGetMethodWithSignature,
} from "./member-search.js";

/**
 * Value of the static field or property named `memberName`.
 */
export const readStatic = (type: TypeInfo, memberName: string): unknown =>
  getExpectedFieldOrProperty(type, memberName, "static").getValue();

export const writeStatic = (
  type: TypeInfo,
  memberName: string,
  value: unknown
): void => {
  getExpectedFieldOrProperty(type, memberName, "static").setValue(
    undefined,
    value
  );
};

/**
 * Invoke a static method by name alone. Fails with AmbiguousMatchError when
 * the name is overloaded, whatever the number of arguments.
 */
export const invokeStatic = (
  type: TypeInfo,
  methodName: string,
  ...args: unknown[]
): unknown => getExpectedMethod(type, methodName, "static").invoke(undefined, args);

/**
 * Invoke the static overload whose parameter types are `parameterTypes`.
 */
export const invokeStaticWithSignature = (
  type: TypeInfo,
  methodName: string,
  parameterTypes: readonly TypeRef[],
  args: readonly unknown[]
): unknown =>
  getExpectedMethodWithSignature(
    type,
    methodName,
    parameterTypes,
    "static"
  ).invoke(undefined, args);

/**
 * Invoke the static overload matching the run-time types of `args`.
 * Every argument must be non-null.
 */
export const invokeStaticWithNonNullArguments = (
  type: TypeInfo,
  methodName: string,
  ...args: unknown[]
): unknown => {
  const method = unwrapOrThrow(
    flatMap(inferParameterTypes(args), (parameterTypes) =>
      tryGetMethodWithSignature(type, methodName, parameterTypes, "static")
    ),
    toReflectionError
  );
  return method.invoke(undefined, args);
};
