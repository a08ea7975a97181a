/**
 * Metadata JSON loader - Reads .metadata.json files and binds them to the
 * classes of an already imported module.
 *
 * Loading code is the caller's business: the loader only reads the JSON
 * and describes the classes it is handed.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { ModuleInfo } from "../runtime/module-info.js";
import type { Constructor } from "../runtime/type-ref.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { type Result, flatMap } from "../types/result.js";
import {
  type BoundModule,
  alreadyDescribed,
  bindMetadata,
  buildModule,
  registerModules,
} from "./binder.js";
import type { LoaderOptions, MetadataFile } from "./types.js";
import { validateMetadataFile } from "./validation.js";

const METADATA_SUFFIX = ".metadata.json";

const readMetadataFile = (
  filePath: string,
  options: LoaderOptions
): Result<MetadataFile, Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return {
      ok: false,
      error: [
        {
          code: "RFL9001",
          message: `Metadata file not found: ${filePath}`,
          severity: "error",
        },
      ],
    };
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    return {
      ok: false,
      error: [
        {
          code: "RFL9002",
          message: `Failed to read metadata file: ${error}`,
          severity: "error",
        },
      ],
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return {
      ok: false,
      error: [
        {
          code: "RFL9003",
          message: `Invalid JSON in metadata file: ${error}`,
          severity: "error",
        },
      ],
    };
  }

  const validation = validateMetadataFile(parsed, filePath);
  if (!validation.ok) {
    return validation;
  }

  if (options.verbose) {
    console.log(
      `[Metadata] ${path.basename(filePath)}: ${validation.value.types.length} types in module ${validation.value.module}`
    );
  }

  return validation;
};

/**
 * Load a metadata file and describe the classes in `exports` with it.
 *
 * @param filePath - Path to the .metadata.json file
 * @param exports - The module namespace object holding the described classes
 * @returns Result containing the module descriptor or diagnostics
 */
export const loadMetadataFile = (
  filePath: string,
  exports: object,
  options: LoaderOptions = {}
): Result<ModuleInfo, Diagnostic[]> =>
  flatMap(readMetadataFile(filePath, options), (file) =>
    bindMetadata(file, exports, filePath)
  );

/**
 * Classes bound by more than one file of the same load.
 */
const findSharedClasses = (bound: readonly BoundModule[]): Diagnostic[] => {
  const seen = new Set<Constructor>();
  const diagnostics: Diagnostic[] = [];
  for (const { types } of bound) {
    for (const type of types) {
      if (seen.has(type.runtimeClass)) {
        diagnostics.push(alreadyDescribed(type.runtimeClass, type.fullName));
      }
      seen.add(type.runtimeClass);
    }
  }
  return diagnostics;
};

/**
 * Load every .metadata.json file of a directory.
 *
 * Each file is bound to the exports registered under the base name of the
 * file, e.g. `shapes.metadata.json` to `exportsByFile.shapes`.
 *
 * Types are registered only once every file has bound, so a failed load
 * leaves no class described.
 *
 * @returns Result containing every module, or the diagnostics of all files
 */
export const loadMetadataDirectory = (
  directoryPath: string,
  exportsByFile: Readonly<Record<string, object>>,
  options: LoaderOptions = {}
): Result<ModuleInfo[], Diagnostic[]> => {
  if (
    !fs.existsSync(directoryPath) ||
    !fs.statSync(directoryPath).isDirectory()
  ) {
    return {
      ok: false,
      error: [
        {
          code: "RFL9011",
          message: `Metadata directory not found: ${directoryPath}`,
          severity: "error",
        },
      ],
    };
  }

  const files = fs
    .readdirSync(directoryPath)
    .filter((file) => file.endsWith(METADATA_SUFFIX))
    .sort();

  if (files.length === 0) {
    return {
      ok: false,
      error: [
        {
          code: "RFL9012",
          message: `No ${METADATA_SUFFIX} files found in ${directoryPath}`,
          severity: "warning",
        },
      ],
    };
  }

  if (options.verbose) {
    console.log(
      `[Metadata] Loading ${files.length} metadata files from ${directoryPath}`
    );
  }

  const bound: BoundModule[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const file of files) {
    const key = file.slice(0, -METADATA_SUFFIX.length);
    const exports = exportsByFile[key];
    if (exports === undefined) {
      diagnostics.push({
        code: "RFL9010",
        message: `No exports supplied for ${file}`,
        severity: "error",
      });
      continue;
    }

    const filePath = path.join(directoryPath, file);
    const result = flatMap(readMetadataFile(filePath, options), (metadata) =>
      buildModule(metadata, exports, filePath)
    );
    if (result.ok) {
      bound.push(result.value);
    } else {
      diagnostics.push(...result.error);
    }
  }

  diagnostics.push(...findSharedClasses(bound));
  if (diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }

  return { ok: true, value: registerModules(bound) };
};
