/**
 * Bind validated metadata entries to the classes a module exports
 */

import type {
  FieldDeclaration,
  IndexerDeclaration,
  MethodDeclaration,
  PropertyDeclaration,
  TypeDeclaration,
} from "../runtime/declarations.js";
import { type ModuleInfo, defineModule } from "../runtime/module-info.js";
import {
  TypeInfo,
  findTypeOfClass,
  registerType,
} from "../runtime/type-info.js";
import {
  type Constructor,
  type ReturnTypeRef,
  type TypeRef,
  isPrimitiveTypeName,
} from "../runtime/type-ref.js";
import { type Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { type Result, map } from "../types/result.js";
import type { FieldEntry, MetadataFile, TypeEntry } from "./types.js";

const builtinTypes: ReadonlyMap<string, Constructor> = new Map<
  string,
  Constructor
>([
  ["Object", Object],
  ["Array", Array],
  ["Date", Date],
  ["Map", Map],
  ["Set", Set],
  ["RegExp", RegExp],
  ["Function", Function],
  ["Error", Error],
  ["Promise", Promise],
]);

const isConstructor = (value: unknown): value is Constructor =>
  typeof value === "function" && "prototype" in value;

/**
 * Resolves the string type references of one file. Unknown names are
 * recorded as diagnostics and resolve to `Object` so binding can go on
 * collecting errors.
 */
class TypeRefResolver {
  constructor(
    private readonly localTypes: ReadonlyMap<string, Constructor>,
    private readonly diagnostics: Diagnostic[]
  ) {}

  resolve(name: string, context: string): TypeRef {
    if (isPrimitiveTypeName(name)) {
      return name;
    }
    const ctor = this.localTypes.get(name) ?? builtinTypes.get(name);
    if (ctor !== undefined) {
      return ctor;
    }
    this.diagnostics.push(
      createDiagnostic(
        "RFL9009",
        `Unknown type reference '${name}' in ${context}`,
        "Use a primitive name, a built-in class name or the full name of a type in the same file."
      )
    );
    return Object;
  }

  resolveReturn(name: string | undefined, context: string): ReturnTypeRef {
    return name === undefined || name === "void"
      ? "void"
      : this.resolve(name, context);
  }

  resolveAll(names: readonly string[], context: string): readonly TypeRef[] {
    return names.map((name) => this.resolve(name, context));
  }
}

const splitFullName = (
  fullName: string
): { readonly namespace: string; readonly name: string } => {
  const dot = fullName.lastIndexOf(".");
  return dot < 0
    ? { namespace: "", name: fullName }
    : { namespace: fullName.slice(0, dot), name: fullName.slice(dot + 1) };
};

const toDeclaration = (
  entry: TypeEntry,
  resolver: TypeRefResolver
): TypeDeclaration => {
  const context = `type '${entry.fullName}'`;
  const field = (member: FieldEntry): FieldDeclaration => ({
    name: member.name,
    type: resolver.resolve(member.type, `${context} member '${member.name}'`),
    isStatic: member.isStatic,
    accessibility: member.accessibility,
  });

  return {
    ...splitFullName(entry.fullName),
    fields: (entry.fields ?? []).map(field),
    properties: (entry.properties ?? []).map(
      (property): PropertyDeclaration => ({
        ...field(property),
        readonly: property.readonly,
      })
    ),
    indexers: (entry.indexers ?? []).map(
      (indexer): IndexerDeclaration => ({
        name: indexer.name,
        parameters: resolver.resolveAll(
          indexer.parameters,
          `${context} indexer`
        ),
        type: resolver.resolve(indexer.type, `${context} indexer`),
        getter: indexer.getter,
        setter: indexer.setter,
        accessibility: indexer.accessibility,
      })
    ),
    methods: (entry.methods ?? []).map((method): MethodDeclaration => {
      const methodContext = `${context} method '${method.name}'`;
      return {
        name: method.name,
        parameters: resolver.resolveAll(method.parameters ?? [], methodContext),
        returnType: resolver.resolveReturn(method.returnType, methodContext),
        implementation: method.implementation,
        isStatic: method.isStatic,
        accessibility: method.accessibility,
      };
    }),
  };
};

/**
 * A module built from a metadata file whose types are not registered yet.
 */
export type BoundModule = {
  readonly module: ModuleInfo;
  readonly types: readonly TypeInfo[];
};

/**
 * Describe every type of a metadata file with the class exported under its
 * `export` name, and group them into a module. Nothing is registered.
 *
 * @param exports - The module namespace object holding the classes
 * @param defaultLocation - Location used when the file names none
 */
export const buildModule = (
  file: MetadataFile,
  exports: object,
  defaultLocation: string = file.module
): Result<BoundModule, Diagnostic[]> => {
  const diagnostics: Diagnostic[] = [];
  const classes = new Map<string, Constructor>();

  for (const entry of file.types) {
    const exported: unknown = Reflect.get(exports, entry.export);
    if (!isConstructor(exported)) {
      diagnostics.push(
        createDiagnostic(
          "RFL9010",
          `Export '${entry.export}' for type '${entry.fullName}' is missing or not a class`
        )
      );
      continue;
    }
    if (
      findTypeOfClass(exported) !== undefined ||
      Array.from(classes.values()).includes(exported)
    ) {
      diagnostics.push(alreadyDescribed(exported, entry.fullName));
      continue;
    }
    classes.set(entry.fullName, exported);
  }

  const resolver = new TypeRefResolver(classes, diagnostics);
  const types: TypeInfo[] = [];

  for (const entry of file.types) {
    const runtimeClass = classes.get(entry.fullName);
    if (runtimeClass === undefined) {
      continue;
    }
    const declaration = toDeclaration(entry, resolver);
    try {
      types.push(new TypeInfo(runtimeClass, declaration));
    } catch (error) {
      diagnostics.push(
        createDiagnostic(
          "RFL9008",
          `Invalid type '${entry.fullName}': ${error instanceof Error ? error.message : String(error)}`
        )
      );
    }
  }

  if (diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }

  try {
    const module = defineModule({
      name: file.module,
      location: file.location ?? defaultLocation,
      types,
    });
    return { ok: true, value: { module, types } };
  } catch (error) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "RFL9007",
          `Invalid module '${file.module}': ${error instanceof Error ? error.message : String(error)}`
        ),
      ],
    };
  }
};

export const alreadyDescribed = (
  runtimeClass: Constructor,
  fullName: string
): Diagnostic =>
  createDiagnostic(
    "RFL9013",
    `Class '${runtimeClass.name}' for type '${fullName}' is already described`
  );

/**
 * Register the types of built modules so `findTypeOf` answers for them.
 */
export const registerModules = (
  bound: readonly BoundModule[]
): ModuleInfo[] => {
  bound.forEach(({ types }) => types.forEach(registerType));
  return bound.map(({ module }) => module);
};

/**
 * Build a module from a metadata file and register its types, or register
 * nothing when any type fails to bind.
 */
export const bindMetadata = (
  file: MetadataFile,
  exports: object,
  defaultLocation: string = file.module
): Result<ModuleInfo, Diagnostic[]> =>
  map(buildModule(file, exports, defaultLocation), (bound) => {
    registerModules([bound]);
    return bound.module;
  });
