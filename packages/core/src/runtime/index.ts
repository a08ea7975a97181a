/**
 * Metadata layer - Public API
 */

export type {
  Accessibility,
  BindingScope,
  FieldDeclaration,
  PropertyDeclaration,
  IndexerDeclaration,
  MethodDeclaration,
  TypeDeclaration,
} from "./declarations.js";

export {
  AmbiguousMatchError,
  TargetParameterCountError,
  MemberAccessError,
} from "./errors.js";

export { FieldInfo, PropertyInfo, MethodInfo } from "./members.js";
export type { MemberInfo, MemberKind } from "./members.js";

export {
  TypeInfo,
  defineType,
  registerType,
  findTypeOf,
  findTypeOfClass,
} from "./type-info.js";

export { ModuleInfo, ModuleCatalog, defineModule } from "./module-info.js";
export type { ModuleDefinition } from "./module-info.js";

export {
  typeRefName,
  typeRefOf,
  formatSignature,
  isPrimitiveTypeName,
} from "./type-ref.js";
export type {
  Constructor,
  PrimitiveTypeName,
  ReturnTypeRef,
  TypeRef,
} from "./type-ref.js";
