/**
 * Type search - find a type descriptor by full name or from an instance
 */

import type { ModuleInfo } from "../runtime/module-info.js";
import { type TypeInfo, findTypeOf } from "../runtime/type-info.js";
import { typeRefName, typeRefOf } from "../runtime/type-ref.js";
import { type Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { type Result, error, ok, unwrapOrThrow } from "../types/result.js";
import { toReflectionError } from "./errors.js";

/**
 * Search every module of `modules` for a type named `typeName`.
 *
 * Succeeds only when exactly one module defines the name.
 *
 * @param modules - The modules to treat as loaded, e.g. `catalog.snapshot()`
 */
export const tryGetType = (
  typeName: string,
  modules: Iterable<ModuleInfo>
): Result<TypeInfo, Diagnostic> => {
  const matches: ModuleInfo[] = [];
  let found: TypeInfo | undefined;

  for (const module of modules) {
    const type = module.getType(typeName);
    if (type !== undefined) {
      matches.push(module);
      found = type;
    }
  }

  if (found === undefined) {
    return error(
      createDiagnostic(
        "RFL1001",
        `Type '${typeName}' not found in any loaded module.`
      )
    );
  }

  if (matches.length > 1) {
    return error(
      createDiagnostic(
        "RFL1002",
        `More than one type named '${typeName}' in loaded modules.`,
        `Defined in: ${matches.map((module) => module.name).join(", ")}. Search a single module instead.`
      )
    );
  }

  return ok(found);
};

export const getExpectedType = (
  typeName: string,
  modules: Iterable<ModuleInfo>
): TypeInfo => unwrapOrThrow(tryGetType(typeName, modules), toReflectionError);

/**
 * Find a type in one module. A single module cannot hold two types with the
 * same full name, so there is no ambiguity to report here.
 */
export const tryGetModuleType = (
  module: ModuleInfo,
  typeName: string
): Result<TypeInfo, Diagnostic> => {
  const type = module.getType(typeName);
  return type === undefined
    ? error(
        createDiagnostic(
          "RFL1003",
          `Type '${typeName}' not found in module '${module.location}'.`
        )
      )
    : ok(type);
};

export const getExpectedModuleType = (
  module: ModuleInfo,
  typeName: string
): TypeInfo => unwrapOrThrow(tryGetModuleType(module, typeName), toReflectionError);

/**
 * The type descriptor of an instance's class.
 */
export const tryGetTypeOf = (instance: object): Result<TypeInfo, Diagnostic> => {
  const type = findTypeOf(instance);
  return type === undefined
    ? error(
        createDiagnostic(
          "RFL1004",
          `Class '${typeRefName(typeRefOf(instance))}' has no type metadata.`,
          "Describe the class with defineType before accessing its members."
        )
      )
    : ok(type);
};

export const getExpectedTypeOf = (instance: object): TypeInfo =>
  unwrapOrThrow(tryGetTypeOf(instance), toReflectionError);
