/**
 * Shape of a .metadata.json file
 *
 * Type references are strings: a primitive name ("number"), a built-in
 * constructor name ("Date") or the full name of a type in the same file.
 */

import type { Accessibility } from "../runtime/declarations.js";

export type FieldEntry = {
  readonly name: string;
  readonly type: string;
  readonly isStatic?: boolean;
  readonly accessibility?: Accessibility;
};

export type PropertyEntry = FieldEntry & {
  readonly readonly?: boolean;
};

export type IndexerEntry = {
  readonly name?: string;
  readonly parameters: readonly string[];
  readonly type: string;
  readonly getter: string;
  readonly setter?: string;
  readonly accessibility?: Accessibility;
};

export type MethodEntry = {
  readonly name: string;
  readonly parameters?: readonly string[];
  readonly returnType?: string;
  readonly implementation?: string;
  readonly isStatic?: boolean;
  readonly accessibility?: Accessibility;
};

export type TypeEntry = {
  readonly fullName: string;
  /** Name of the export holding the class */
  readonly export: string;
  readonly fields?: readonly FieldEntry[];
  readonly properties?: readonly PropertyEntry[];
  readonly indexers?: readonly IndexerEntry[];
  readonly methods?: readonly MethodEntry[];
};

export type MetadataFile = {
  readonly module: string;
  readonly location?: string;
  readonly types: readonly TypeEntry[];
};

export type LoaderOptions = {
  /** Print progress lines prefixed with "[Metadata]" */
  readonly verbose?: boolean;
};
