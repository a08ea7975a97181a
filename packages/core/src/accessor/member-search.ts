/**
 * Member search - field, property, indexer and method lookups that report
 * an absent member instead of returning nothing.
 *
 * Every lookup comes as `tryGetX`, returning a Result, and `getExpectedX`,
 * which throws the matching ReflectionError.
 */

import type { BindingScope } from "../runtime/declarations.js";
import type { FieldInfo, MethodInfo, PropertyInfo } from "../runtime/members.js";
import type { TypeInfo } from "../runtime/type-info.js";
import { type TypeRef, formatSignature } from "../runtime/type-ref.js";
import { type Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import {
  type Result,
  error,
  firstOk,
  ok,
  unwrapOrThrow,
} from "../types/result.js";
import { DEFAULT_SCOPE, describeScope } from "./binding.js";
import { toReflectionError } from "./errors.js";

export type FieldOrPropertyInfo = FieldInfo | PropertyInfo;

const found = <T>(
  member: T | undefined,
  onMissing: () => Diagnostic
): Result<T, Diagnostic> =>
  member === undefined ? error(onMissing()) : ok(member);

export const tryGetField = (
  type: TypeInfo,
  fieldName: string,
  scope: BindingScope = DEFAULT_SCOPE
): Result<FieldInfo, Diagnostic> =>
  found(type.getField(fieldName, scope), () =>
    createDiagnostic(
      "RFL2001",
      `Type '${type.name}' has no field named '${fieldName}' for binding ${describeScope(scope)}.`
    )
  );

export const getExpectedField = (
  type: TypeInfo,
  fieldName: string,
  scope: BindingScope = DEFAULT_SCOPE
): FieldInfo =>
  unwrapOrThrow(tryGetField(type, fieldName, scope), toReflectionError);

export const tryGetProperty = (
  type: TypeInfo,
  propertyName: string,
  scope: BindingScope = DEFAULT_SCOPE
): Result<PropertyInfo, Diagnostic> =>
  found(type.getProperty(propertyName, scope), () =>
    createDiagnostic(
      "RFL2002",
      `Type '${type.name}' has no property named '${propertyName}' for binding ${describeScope(scope)}.`
    )
  );

export const getExpectedProperty = (
  type: TypeInfo,
  propertyName: string,
  scope: BindingScope = DEFAULT_SCOPE
): PropertyInfo =>
  unwrapOrThrow(tryGetProperty(type, propertyName, scope), toReflectionError);

/**
 * Fields win over properties of the same name.
 */
export const tryGetFieldOrProperty = (
  type: TypeInfo,
  memberName: string,
  scope: BindingScope = DEFAULT_SCOPE
): Result<FieldOrPropertyInfo, Diagnostic> =>
  firstOk<FieldOrPropertyInfo, Diagnostic>(
    [
      () => tryGetField(type, memberName, scope),
      () => tryGetProperty(type, memberName, scope),
    ],
    () =>
      createDiagnostic(
        "RFL2003",
        `Type '${type.name}' has no field or property named '${memberName}' for binding ${describeScope(scope)}.`
      )
  );

export const getExpectedFieldOrProperty = (
  type: TypeInfo,
  memberName: string,
  scope: BindingScope = DEFAULT_SCOPE
): FieldOrPropertyInfo =>
  unwrapOrThrow(
    tryGetFieldOrProperty(type, memberName, scope),
    toReflectionError
  );

/**
 * The first public property that takes index parameters.
 */
export const tryGetIndexer = (
  type: TypeInfo
): Result<PropertyInfo, Diagnostic> =>
  found(
    type.getProperties().find((property) => property.isIndexer),
    () =>
      createDiagnostic("RFL2004", `Type '${type.name}' has no indexer property.`)
  );

export const getExpectedIndexer = (type: TypeInfo): PropertyInfo =>
  unwrapOrThrow(tryGetIndexer(type), toReflectionError);

/**
 * Find a method by name alone.
 *
 * An overloaded name is not an absent member: the metadata layer's
 * AmbiguousMatchError is thrown through, even from the `try` form.
 */
export const tryGetMethod = (
  type: TypeInfo,
  methodName: string,
  scope: BindingScope = DEFAULT_SCOPE
): Result<MethodInfo, Diagnostic> =>
  found(type.getMethod(methodName, scope), () =>
    createDiagnostic(
      "RFL2005",
      `Method '${type.name}.${methodName}' not found for binding ${describeScope(scope)}.`
    )
  );

export const getExpectedMethod = (
  type: TypeInfo,
  methodName: string,
  scope: BindingScope = DEFAULT_SCOPE
): MethodInfo =>
  unwrapOrThrow(tryGetMethod(type, methodName, scope), toReflectionError);

/**
 * Find the overload whose parameter types are exactly `parameterTypes`.
 */
export const tryGetMethodWithSignature = (
  type: TypeInfo,
  methodName: string,
  parameterTypes: readonly TypeRef[],
  scope: BindingScope = DEFAULT_SCOPE
): Result<MethodInfo, Diagnostic> =>
  found(type.getMethodWithSignature(methodName, scope, parameterTypes), () =>
    createDiagnostic(
      "RFL2006",
      `Method '${type.name}.${formatSignature(methodName, parameterTypes)}' not found for binding ${describeScope(scope)}.`
    )
  );

export const getExpectedMethodWithSignature = (
  type: TypeInfo,
  methodName: string,
  parameterTypes: readonly TypeRef[],
  scope: BindingScope = DEFAULT_SCOPE
): MethodInfo =>
  unwrapOrThrow(
    tryGetMethodWithSignature(type, methodName, parameterTypes, scope),
    toReflectionError
  );
