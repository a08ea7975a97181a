/**
 * Reflective member accessor - Public API
 */

export {
  ReflectionError,
  MemberNotFoundError,
  AmbiguousTypeNameError,
  NullArgumentError,
  toReflectionError,
} from "./errors.js";

export { describeScope } from "./binding.js";
export { inferParameterTypes } from "./invocation.js";

export {
  tryGetType,
  getExpectedType,
  tryGetModuleType,
  getExpectedModuleType,
  tryGetTypeOf,
  getExpectedTypeOf,
} from "./type-search.js";

export {
  tryGetField,
  getExpectedField,
  tryGetProperty,
  getExpectedProperty,
  tryGetFieldOrProperty,
  getExpectedFieldOrProperty,
  tryGetIndexer,
  getExpectedIndexer,
  tryGetMethod,
  getExpectedMethod,
  tryGetMethodWithSignature,
  getExpectedMethodWithSignature,
} from "./member-search.js";
export type { FieldOrPropertyInfo } from "./member-search.js";

export {
  readStatic,
  writeStatic,
  invokeStatic,
  invokeStaticWithSignature,
  invokeStaticWithNonNullArguments,
} from "./static-access.js";

export {
  readMember,
  writeMember,
  readIndexer,
  writeIndexer,
  invokeMethod,
  invokeMethodWithSignature,
  invokeMethodWithNonNullArguments,
} from "./instance-access.js";
