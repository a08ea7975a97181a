/**
 * Declarations used to describe a class to the metadata layer
 */

import type { ReturnTypeRef, TypeRef } from "./type-ref.js";

export type Accessibility = "public" | "private";

/**
 * Which members a lookup may match. Only public members are ever eligible.
 */
export type BindingScope = "instance" | "static";

export type FieldDeclaration = {
  readonly name: string;
  readonly type: TypeRef;
  readonly isStatic?: boolean;
  readonly accessibility?: Accessibility;
};

export type PropertyDeclaration = FieldDeclaration & {
  readonly readonly?: boolean;
};

/**
 * An indexed property. JavaScript has no indexers, so reads and writes go
 * through the named getter and setter methods of the instance; the setter
 * receives the index arguments followed by the value.
 */
export type IndexerDeclaration = {
  readonly name?: string;
  readonly parameters: readonly TypeRef[];
  readonly type: TypeRef;
  readonly getter: string;
  readonly setter?: string;
  readonly accessibility?: Accessibility;
};

/**
 * One method overload. `implementation` names the function that runs it and
 * defaults to `name`; overloads sharing a name point at different functions.
 */
export type MethodDeclaration = {
  readonly name: string;
  readonly parameters?: readonly TypeRef[];
  readonly returnType?: ReturnTypeRef;
  readonly implementation?: string;
  readonly isStatic?: boolean;
  readonly accessibility?: Accessibility;
};

export type TypeDeclaration = {
  readonly namespace?: string;
  readonly name?: string;
  readonly fields?: readonly FieldDeclaration[];
  readonly properties?: readonly PropertyDeclaration[];
  readonly indexers?: readonly IndexerDeclaration[];
  readonly methods?: readonly MethodDeclaration[];
};
