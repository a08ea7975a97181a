/**
 * Run-time type references used in member signatures
 */

export type PrimitiveTypeName =
  | "string"
  | "number"
  | "bigint"
  | "boolean"
  | "symbol";

/**
 * Any class constructor, abstract or concrete.
 */
export type Constructor = abstract new (...args: never[]) => unknown;

/**
 * A primitive type name or a class constructor. Two references match only
 * when they are identical.
 */
export type TypeRef = PrimitiveTypeName | Constructor;

export type ReturnTypeRef = TypeRef | "void";

const primitiveTypeNames: readonly PrimitiveTypeName[] = [
  "string",
  "number",
  "bigint",
  "boolean",
  "symbol",
];

export const isPrimitiveTypeName = (name: string): name is PrimitiveTypeName =>
  primitiveTypeNames.some((primitive) => primitive === name);

export const typeRefName = (ref: ReturnTypeRef): string =>
  typeof ref === "string" ? ref : ref.name;

export const sameTypeRefs = (
  left: readonly TypeRef[],
  right: readonly TypeRef[]
): boolean =>
  left.length === right.length && left.every((ref, i) => ref === right[i]);

/**
 * Format a signature the way lookup messages show it: "name(type1,type2)".
 */
export const formatSignature = (
  name: string,
  parameterTypes: readonly TypeRef[]
): string => `${name}(${parameterTypes.map(typeRefName).join(",")})`;

export const isConstructor = (value: unknown): value is Constructor =>
  typeof value === "function";

/**
 * The concrete run-time type of a non-null value.
 *
 * Objects report their own constructor, not a base class; an object without
 * a prototype reports `Object`.
 */
export const typeRefOf = (value: NonNullable<unknown>): TypeRef => {
  const kind = typeof value;
  if (isPrimitiveTypeName(kind)) {
    return kind;
  }
  if (kind === "function") {
    return Function;
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto !== "object" || proto === null) {
    return Object;
  }
  const ctor: unknown = Reflect.get(proto, "constructor");
  return isConstructor(ctor) ? ctor : Object;
};
