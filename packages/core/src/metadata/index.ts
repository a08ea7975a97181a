/**
 * Metadata file loading - Public API
 */

export { loadMetadataFile, loadMetadataDirectory } from "./loader.js";
export { validateMetadataFile } from "./validation.js";
export { bindMetadata, buildModule, registerModules } from "./binder.js";
export type { BoundModule } from "./binder.js";
export type {
  MetadataFile,
  TypeEntry,
  FieldEntry,
  PropertyEntry,
  IndexerEntry,
  MethodEntry,
  LoaderOptions,
} from "./types.js";
