/**
 * reflectkit - named member lookup and invocation over described classes
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type DiagnosticCategory,
  type Diagnostic,
  createDiagnostic,
  categoryOf,
  formatDiagnostic,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./runtime/index.js";
export * from "./metadata/index.js";
export * from "./accessor/index.js";
