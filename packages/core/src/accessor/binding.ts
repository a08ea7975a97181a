import type { BindingScope } from "../runtime/declarations.js";

export const DEFAULT_SCOPE: BindingScope = "instance";

/**
 * Render a scope the way lookup messages name it, e.g. "[Public|Instance]".
 */
export const describeScope = (scope: BindingScope): string =>
  scope === "static" ? "[Public|Static]" : "[Public|Instance]";
