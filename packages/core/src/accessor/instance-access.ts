/**
 * Instance (object) access - read, write and invoke public instance members
 * of a described object.
 */

import type { TypeRef } from "../runtime/type-ref.js";
import { flatMap, unwrapOrThrow } from "../types/result.js";
import { toReflectionError } from "./errors.js";
import { inferParameterTypes } from "./invocation.js";
import {
  getExpectedFieldOrProperty,
  getExpectedIndexer,
  getExpectedMethod,
  getExpectedMethodWithSignature,
  tryGetMethodWithSignature,
} from "./member-search.js";
import { getExpectedTypeOf, tryGetTypeOf } from "./type-search.js";

export const readMember = (instance: object, memberName: string): unknown =>
  getExpectedFieldOrProperty(getExpectedTypeOf(instance), memberName).getValue(
    instance
  );

export const writeMember = (
  instance: object,
  memberName: string,
  value: unknown
): void => {
  getExpectedFieldOrProperty(getExpectedTypeOf(instance), memberName).setValue(
    instance,
    value
  );
};

export const readIndexer = (instance: object, ...indexes: unknown[]): unknown =>
  getExpectedIndexer(getExpectedTypeOf(instance)).getValue(instance, indexes);

/**
 * Set a value through the object's indexer. The value comes first, then the
 * index arguments.
 */
export const writeIndexer = (
  instance: object,
  value: unknown,
  ...indexes: unknown[]
): void => {
  getExpectedIndexer(getExpectedTypeOf(instance)).setValue(
    instance,
    value,
    indexes
  );
};

/**
 * Invoke the overload whose parameter types are `parameterTypes`.
 *
 * The most precise variant: it works for any overload set, at the cost of
 * spelling out the signature.
 */
export const invokeMethodWithSignature = (
  instance: object,
  methodName: string,
  parameterTypes: readonly TypeRef[],
  args: readonly unknown[]
): unknown =>
  getExpectedMethodWithSignature(
    getExpectedTypeOf(instance),
    methodName,
    parameterTypes
  ).invoke(instance, args);

/**
 * Invoke a method by name alone. Cannot be used on an overloaded name.
 */
export const invokeMethod = (
  instance: object,
  methodName: string,
  ...args: unknown[]
): unknown =>
  getExpectedMethod(getExpectedTypeOf(instance), methodName).invoke(
    instance,
    args
  );

/**
 * Invoke the overload matching the run-time types of `args`. Picks between
 * overloads of equal length, provided no argument is null or undefined.
 */
export const invokeMethodWithNonNullArguments = (
  instance: object,
  methodName: string,
  ...args: unknown[]
): unknown => {
  const method = unwrapOrThrow(
    flatMap(inferParameterTypes(args), (parameterTypes) =>
      flatMap(tryGetTypeOf(instance), (type) =>
        tryGetMethodWithSignature(type, methodName, parameterTypes)
      )
    ),
    toReflectionError
  );
  return method.invoke(instance, args);
};
