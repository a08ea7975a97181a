/**
 * Type descriptors - the metadata a described class exposes to lookups
 */

import type { BindingScope, TypeDeclaration } from "./declarations.js";
import { AmbiguousMatchError } from "./errors.js";
import { FieldInfo, MethodInfo, PropertyInfo } from "./members.js";
import {
  type Constructor,
  type TypeRef,
  formatSignature,
  isConstructor,
  sameTypeRefs,
  typeRefOf,
} from "./type-ref.js";

/**
 * Describes one class: its names and its declared members.
 *
 * Lookups return `undefined` when nothing matches. The only lookup that
 * throws is `getMethod`, when a name-only search finds several overloads.
 *
 * Instance lookups also see the public instance members of the nearest
 * described ancestor class, and its ancestors in turn. A member redeclared
 * with the same name (or, for methods and indexers, the same signature)
 * hides the inherited one. Static members are never inherited.
 */
export class TypeInfo {
  readonly name: string;
  readonly namespace: string;
  readonly fullName: string;
  private readonly fields: readonly FieldInfo[];
  private readonly properties: readonly PropertyInfo[];
  private readonly methods: readonly MethodInfo[];

  constructor(
    readonly runtimeClass: Constructor,
    declaration: TypeDeclaration = {}
  ) {
    this.name = declaration.name ?? runtimeClass.name;
    this.namespace = declaration.namespace ?? "";
    this.fullName =
      this.namespace === "" ? this.name : `${this.namespace}.${this.name}`;

    this.fields = (declaration.fields ?? []).map(
      (field) => new FieldInfo(this, field)
    );
    this.properties = [
      ...(declaration.properties ?? []).map((property) =>
        PropertyInfo.fromProperty(this, property)
      ),
      ...(declaration.indexers ?? []).map((indexer) =>
        PropertyInfo.fromIndexer(this, indexer)
      ),
    ];
    this.methods = (declaration.methods ?? []).map(
      (method) => new MethodInfo(this, method)
    );

    this.checkUniqueMembers();
  }

  /**
   * The description of the closest ancestor class that has one.
   */
  get baseType(): TypeInfo | undefined {
    let parent: unknown = Object.getPrototypeOf(this.runtimeClass);
    while (isConstructor(parent)) {
      const described = typesByClass.get(parent);
      if (described !== undefined) {
        return described;
      }
      parent = Object.getPrototypeOf(parent);
    }
    return undefined;
  }

  getFields(scope: BindingScope): readonly FieldInfo[] {
    const own = this.fields.filter((field) => field.matches(scope));
    return scope === "instance"
      ? withInherited(own, this.baseType?.getFields(scope), fieldKey)
      : own;
  }

  getField(name: string, scope: BindingScope): FieldInfo | undefined {
    return this.getFields(scope).find((field) => field.name === name);
  }

  /**
   * Public instance properties, indexers included. Own properties come
   * first, in declaration order.
   */
  getProperties(): readonly PropertyInfo[] {
    return withInherited(
      this.properties.filter((property) => property.matches("instance")),
      this.baseType?.getProperties(),
      propertyKey
    );
  }

  getProperty(name: string, scope: BindingScope): PropertyInfo | undefined {
    const candidates =
      scope === "instance"
        ? this.getProperties()
        : this.properties.filter((property) => property.matches(scope));
    return candidates.find(
      (property) => !property.isIndexer && property.name === name
    );
  }

  getMethods(scope: BindingScope): readonly MethodInfo[] {
    const own = this.methods.filter((method) => method.matches(scope));
    return scope === "instance"
      ? withInherited(own, this.baseType?.getMethods(scope), methodKey)
      : own;
  }

  /**
   * Find a method by name alone.
   *
   * @throws AmbiguousMatchError when the name is overloaded
   */
  getMethod(name: string, scope: BindingScope): MethodInfo | undefined {
    const candidates = this.getMethods(scope).filter(
      (method) => method.name === name
    );
    if (candidates.length > 1) {
      throw new AmbiguousMatchError(this.name, name, candidates.length);
    }
    return candidates[0];
  }

  /**
   * Find the overload whose parameter types equal `parameterTypes`
   * element by element. No assignability: a subclass does not match its base.
   */
  getMethodWithSignature(
    name: string,
    scope: BindingScope,
    parameterTypes: readonly TypeRef[]
  ): MethodInfo | undefined {
    return this.getMethods(scope).find(
      (method) =>
        method.name === name &&
        sameTypeRefs(method.parameterTypes, parameterTypes)
    );
  }

  toString(): string {
    return this.fullName;
  }

  private checkUniqueMembers(): void {
    const seen = new Set<string>();
    const keys = [
      ...this.fields.map(fieldKey),
      ...this.properties.map(propertyKey),
      ...this.methods.map(methodKey),
    ];
    for (const key of keys) {
      if (seen.has(key)) {
        throw new Error(`Type '${this.fullName}' declares '${key}' twice.`);
      }
      seen.add(key);
    }
  }
}

const fieldKey = (field: FieldInfo): string => field.name;

const propertyKey = (property: PropertyInfo): string =>
  property.isIndexer
    ? `[${formatSignature(property.name, property.indexParameters)}]`
    : property.name;

const methodKey = (method: MethodInfo): string =>
  formatSignature(method.name, method.parameterTypes);

/**
 * Own members followed by the inherited ones they do not hide.
 */
const withInherited = <T>(
  own: readonly T[],
  inherited: readonly T[] | undefined,
  key: (member: T) => string
): readonly T[] => {
  if (inherited === undefined || inherited.length === 0) {
    return own;
  }
  const hidden = new Set(own.map(key));
  return [...own, ...inherited.filter((member) => !hidden.has(key(member)))];
};

const typesByClass = new WeakMap<Constructor, TypeInfo>();

/**
 * Remember a built descriptor so `findTypeOf` can answer for its class.
 * A class can be described once.
 */
export const registerType = (type: TypeInfo): TypeInfo => {
  if (typesByClass.has(type.runtimeClass)) {
    throw new Error(`Class '${type.runtimeClass.name}' is already described.`);
  }
  typesByClass.set(type.runtimeClass, type);
  return type;
};

export const defineType = (
  runtimeClass: Constructor,
  declaration: TypeDeclaration = {}
): TypeInfo => registerType(new TypeInfo(runtimeClass, declaration));

export const findTypeOfClass = (
  runtimeClass: Constructor
): TypeInfo | undefined => typesByClass.get(runtimeClass);

/**
 * The description of the instance's exact class, if it has one.
 */
export const findTypeOf = (instance: object): TypeInfo | undefined => {
  const ref = typeRefOf(instance);
  return typeof ref === "string" ? undefined : typesByClass.get(ref);
};
