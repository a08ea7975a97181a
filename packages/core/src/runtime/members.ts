/**
 * Member descriptors - fields, properties (indexers included) and methods
 */

import type {
  Accessibility,
  BindingScope,
  FieldDeclaration,
  IndexerDeclaration,
  MethodDeclaration,
  PropertyDeclaration,
} from "./declarations.js";
import { MemberAccessError, TargetParameterCountError } from "./errors.js";
import type { TypeInfo } from "./type-info.js";
import type { ReturnTypeRef, TypeRef } from "./type-ref.js";

export type MemberKind = "field" | "property" | "method";

/**
 * State shared by every member descriptor.
 */
abstract class MemberInfoBase {
  abstract readonly kind: MemberKind;

  protected constructor(
    readonly declaringType: TypeInfo,
    readonly name: string,
    readonly isStatic: boolean,
    readonly accessibility: Accessibility
  ) {}

  /**
   * Whether a lookup with the given scope may match this member.
   */
  matches(scope: BindingScope): boolean {
    return (
      this.accessibility === "public" &&
      this.isStatic === (scope === "static")
    );
  }

  toString(): string {
    return `${this.declaringType.name}.${this.name}`;
  }

  /**
   * The object a read, write or call runs against: the class for static
   * members, the given instance otherwise.
   */
  protected resolveTarget(target: object | undefined): object {
    const runtimeClass = this.declaringType.runtimeClass;
    if (this.isStatic) {
      return runtimeClass;
    }
    if (target === undefined) {
      throw new MemberAccessError(
        `Non-static ${this.kind} '${this}' requires a target instance.`
      );
    }
    if (!(target instanceof runtimeClass)) {
      throw new MemberAccessError(
        `${this.kind} '${this}' is not defined on the target object.`
      );
    }
    return target;
  }
}

export class FieldInfo extends MemberInfoBase {
  readonly kind = "field";
  readonly fieldType: TypeRef;

  constructor(declaringType: TypeInfo, declaration: FieldDeclaration) {
    super(
      declaringType,
      declaration.name,
      declaration.isStatic ?? false,
      declaration.accessibility ?? "public"
    );
    this.fieldType = declaration.type;
  }

  getValue(target?: object): unknown {
    return Reflect.get(this.resolveTarget(target), this.name);
  }

  setValue(target: object | undefined, value: unknown): void {
    assignValue(this.resolveTarget(target), this, value);
  }
}

/**
 * A property, or an indexer when `indexParameters` is non-empty.
 */
export class PropertyInfo extends MemberInfoBase {
  readonly kind = "property";
  readonly propertyType: TypeRef;
  readonly indexParameters: readonly TypeRef[];
  readonly canWrite: boolean;
  private readonly getter: string | undefined;
  private readonly setter: string | undefined;

  private constructor(
    declaringType: TypeInfo,
    name: string,
    isStatic: boolean,
    accessibility: Accessibility,
    propertyType: TypeRef,
    indexParameters: readonly TypeRef[],
    canWrite: boolean,
    accessors?: { readonly getter: string; readonly setter?: string }
  ) {
    super(declaringType, name, isStatic, accessibility);
    this.propertyType = propertyType;
    this.indexParameters = indexParameters;
    this.canWrite = canWrite;
    this.getter = accessors?.getter;
    this.setter = accessors?.setter;
  }

  static fromProperty(
    declaringType: TypeInfo,
    declaration: PropertyDeclaration
  ): PropertyInfo {
    return new PropertyInfo(
      declaringType,
      declaration.name,
      declaration.isStatic ?? false,
      declaration.accessibility ?? "public",
      declaration.type,
      [],
      declaration.readonly !== true
    );
  }

  static fromIndexer(
    declaringType: TypeInfo,
    declaration: IndexerDeclaration
  ): PropertyInfo {
    return new PropertyInfo(
      declaringType,
      declaration.name ?? "Item",
      false,
      declaration.accessibility ?? "public",
      declaration.type,
      declaration.parameters,
      declaration.setter !== undefined,
      declaration.setter === undefined
        ? { getter: declaration.getter }
        : { getter: declaration.getter, setter: declaration.setter }
    );
  }

  get isIndexer(): boolean {
    return this.indexParameters.length > 0;
  }

  getValue(target?: object, indexes: readonly unknown[] = []): unknown {
    const resolved = this.resolveTarget(target);
    this.checkIndexCount(indexes);
    if (this.getter === undefined) {
      return Reflect.get(resolved, this.name);
    }
    return callAccessor(resolved, this.getter, this, indexes);
  }

  setValue(
    target: object | undefined,
    value: unknown,
    indexes: readonly unknown[] = []
  ): void {
    const resolved = this.resolveTarget(target);
    this.checkIndexCount(indexes);
    if (!this.canWrite) {
      throw new MemberAccessError(`Property '${this}' has no setter.`);
    }
    if (this.setter === undefined) {
      assignValue(resolved, this, value);
      return;
    }
    callAccessor(resolved, this.setter, this, [...indexes, value]);
  }

  private checkIndexCount(indexes: readonly unknown[]): void {
    if (indexes.length !== this.indexParameters.length) {
      throw new TargetParameterCountError(
        this.toString(),
        this.indexParameters.length,
        indexes.length
      );
    }
  }
}

export class MethodInfo extends MemberInfoBase {
  readonly kind = "method";
  readonly parameterTypes: readonly TypeRef[];
  readonly returnType: ReturnTypeRef;
  readonly implementation: string;

  constructor(declaringType: TypeInfo, declaration: MethodDeclaration) {
    super(
      declaringType,
      declaration.name,
      declaration.isStatic ?? false,
      declaration.accessibility ?? "public"
    );
    this.parameterTypes = declaration.parameters ?? [];
    this.returnType = declaration.returnType ?? "void";
    this.implementation = declaration.implementation ?? declaration.name;
  }

  /**
   * Call the method. Whatever the implementation throws propagates as is.
   * A method declared `void` always yields `undefined`.
   */
  invoke(target: object | undefined, args: readonly unknown[] = []): unknown {
    const resolved = this.resolveTarget(target);
    if (args.length !== this.parameterTypes.length) {
      throw new TargetParameterCountError(
        this.toString(),
        this.parameterTypes.length,
        args.length
      );
    }
    const result = callAccessor(resolved, this.implementation, this, args);
    return this.returnType === "void" ? undefined : result;
  }
}

const assignValue = (
  target: object,
  member: MemberInfoBase,
  value: unknown
): void => {
  if (!Reflect.set(target, member.name, value)) {
    throw new MemberAccessError(`'${member}' cannot be assigned on the target.`);
  }
};

const callAccessor = (
  target: object,
  functionName: string,
  member: MemberInfoBase,
  args: readonly unknown[]
): unknown => {
  const fn: unknown = Reflect.get(target, functionName);
  if (typeof fn !== "function") {
    throw new MemberAccessError(
      `'${member}' is implemented by '${functionName}', which is not a function on the target.`
    );
  }
  return Reflect.apply(fn, target, args);
};

export type MemberInfo = FieldInfo | PropertyInfo | MethodInfo;
