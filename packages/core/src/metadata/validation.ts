/**
 * Structural validation of parsed .metadata.json content
 */

import * as path from "node:path";
import type { Accessibility } from "../runtime/declarations.js";
import {
  type Diagnostic,
  type DiagnosticCode,
  createDiagnostic,
} from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import type {
  FieldEntry,
  IndexerEntry,
  MetadataFile,
  MethodEntry,
  PropertyEntry,
  TypeEntry,
} from "./types.js";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const isAccessibility = (value: unknown): value is Accessibility =>
  value === "public" || value === "private";

/**
 * Reads typed values out of one JSON object, recording a diagnostic for
 * every field that is missing or has the wrong shape.
 */
class EntryReader {
  constructor(
    private readonly record: Record<string, unknown>,
    private readonly context: string,
    private readonly code: DiagnosticCode,
    private readonly diagnostics: Diagnostic[]
  ) {}

  string(key: string): string {
    const value = this.record[key];
    if (typeof value === "string" && value !== "") {
      return value;
    }
    this.report(`missing or invalid '${key}'`);
    return "";
  }

  optionalString(key: string): string | undefined {
    const value = this.record[key];
    if (value === undefined || typeof value === "string") {
      return value;
    }
    this.report(`'${key}' must be a string`);
    return undefined;
  }

  optionalBoolean(key: string): boolean | undefined {
    const value = this.record[key];
    if (value === undefined || typeof value === "boolean") {
      return value;
    }
    this.report(`'${key}' must be a boolean`);
    return undefined;
  }

  stringArray(key: string): readonly string[] {
    const value = this.record[key];
    if (isStringArray(value)) {
      return value;
    }
    this.report(`'${key}' must be an array of strings`);
    return [];
  }

  optionalStringArray(key: string): readonly string[] | undefined {
    return this.record[key] === undefined ? undefined : this.stringArray(key);
  }

  optionalAccessibility(key: string): Accessibility | undefined {
    const value = this.record[key];
    if (value === undefined || isAccessibility(value)) {
      return value;
    }
    this.report(`'${key}' must be "public" or "private"`);
    return undefined;
  }

  /**
   * An optional array whose items are read by `readItem`.
   */
  optionalList<T>(
    key: string,
    readItem: (item: unknown, context: string) => T | undefined
  ): readonly T[] | undefined {
    const value = this.record[key];
    if (value === undefined) {
      return undefined;
    }
    if (!Array.isArray(value)) {
      this.report(`'${key}' must be an array`);
      return undefined;
    }
    const items: T[] = [];
    value.forEach((item: unknown, index) => {
      const read = readItem(item, `${this.context} ${key}[${index}]`);
      if (read !== undefined) {
        items.push(read);
      }
    });
    return items;
  }

  private report(problem: string): void {
    this.diagnostics.push(
      createDiagnostic(this.code, `Invalid ${this.context}: ${problem}`)
    );
  }
}

/**
 * Validate that parsed JSON matches the MetadataFile shape.
 *
 * @param data - Parsed JSON data
 * @param filePath - File path for error messages
 */
export const validateMetadataFile = (
  data: unknown,
  filePath: string
): Result<MetadataFile, Diagnostic[]> => {
  const fileName = path.basename(filePath);

  if (!isRecord(data)) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "RFL9004",
          `Metadata file must be an object, got ${Array.isArray(data) ? "array" : typeof data}`
        ),
      ],
    };
  }

  const diagnostics: Diagnostic[] = [];

  const moduleName = typeof data.module === "string" ? data.module : "";
  if (moduleName === "") {
    diagnostics.push(
      createDiagnostic(
        "RFL9005",
        `Missing or invalid 'module' field in ${fileName}`
      )
    );
  }

  const location =
    typeof data.location === "string" ? data.location : undefined;
  if (data.location !== undefined && location === undefined) {
    diagnostics.push(
      createDiagnostic("RFL9005", `'location' must be a string in ${fileName}`)
    );
  }

  const types: TypeEntry[] = [];
  if (!Array.isArray(data.types)) {
    diagnostics.push(
      createDiagnostic(
        "RFL9006",
        `Missing or invalid 'types' field in ${fileName}`
      )
    );
  } else {
    data.types.forEach((entry: unknown, index) => {
      const type = readTypeEntry(
        entry,
        `type ${index} in ${fileName}`,
        diagnostics
      );
      if (type !== undefined) {
        types.push(type);
      }
    });
  }

  if (diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }

  return {
    ok: true,
    value: { module: moduleName, location, types },
  };
};

const readTypeEntry = (
  data: unknown,
  context: string,
  diagnostics: Diagnostic[]
): TypeEntry | undefined => {
  if (!isRecord(data)) {
    diagnostics.push(
      createDiagnostic("RFL9007", `Invalid ${context}: must be an object`)
    );
    return undefined;
  }

  const reader = new EntryReader(data, context, "RFL9007", diagnostics);
  const memberReader =
    <T>(read: (reader: EntryReader) => T) =>
    (item: unknown, itemContext: string): T | undefined => {
      if (!isRecord(item)) {
        diagnostics.push(
          createDiagnostic("RFL9008", `Invalid ${itemContext}: must be an object`)
        );
        return undefined;
      }
      return read(new EntryReader(item, itemContext, "RFL9008", diagnostics));
    };

  return {
    fullName: reader.string("fullName"),
    export: reader.string("export"),
    fields: reader.optionalList("fields", memberReader(readField)),
    properties: reader.optionalList("properties", memberReader(readProperty)),
    indexers: reader.optionalList("indexers", memberReader(readIndexer)),
    methods: reader.optionalList("methods", memberReader(readMethod)),
  };
};

const readField = (reader: EntryReader): FieldEntry => ({
  name: reader.string("name"),
  type: reader.string("type"),
  isStatic: reader.optionalBoolean("isStatic"),
  accessibility: reader.optionalAccessibility("accessibility"),
});

const readProperty = (reader: EntryReader): PropertyEntry => ({
  ...readField(reader),
  readonly: reader.optionalBoolean("readonly"),
});

const readIndexer = (reader: EntryReader): IndexerEntry => ({
  name: reader.optionalString("name"),
  parameters: reader.stringArray("parameters"),
  type: reader.string("type"),
  getter: reader.string("getter"),
  setter: reader.optionalString("setter"),
  accessibility: reader.optionalAccessibility("accessibility"),
});

const readMethod = (reader: EntryReader): MethodEntry => ({
  name: reader.string("name"),
  parameters: reader.optionalStringArray("parameters"),
  returnType: reader.optionalString("returnType"),
  implementation: reader.optionalString("implementation"),
  isStatic: reader.optionalBoolean("isStatic"),
  accessibility: reader.optionalAccessibility("accessibility"),
});
