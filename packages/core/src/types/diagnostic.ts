/**
 * Diagnostic types for lookup and metadata failures
 */

export type DiagnosticSeverity = "error" | "warning";

export type DiagnosticCode =
  // Type search (RFL1001-RFL1004)
  | "RFL1001" // Type not found in any loaded module
  | "RFL1002" // More than one loaded module defines the type name
  | "RFL1003" // Type not found in module
  | "RFL1004" // Class has no type metadata
  // Member search (RFL2001-RFL2006)
  | "RFL2001" // Field not found
  | "RFL2002" // Property not found
  | "RFL2003" // Field or property not found
  | "RFL2004" // Indexer not found
  | "RFL2005" // Method not found
  | "RFL2006" // Method with signature not found
  // Invocation (RFL3001)
  | "RFL3001" // Null argument where a non-null one is required
  // Metadata loading (RFL9001-RFL9013)
  | "RFL9001" // Metadata file not found
  | "RFL9002" // Failed to read metadata file
  | "RFL9003" // Invalid JSON in metadata file
  | "RFL9004" // Metadata file must be an object
  | "RFL9005" // Missing or invalid 'module' field
  | "RFL9006" // Missing or invalid 'types' field
  | "RFL9007" // Invalid type entry
  | "RFL9008" // Invalid member entry
  | "RFL9009" // Unknown type reference
  | "RFL9010" // Export missing or not a class
  | "RFL9011" // Metadata directory not found
  | "RFL9012" // No .metadata.json files found
  | "RFL9013"; // Class already described

export type DiagnosticCategory =
  | "not-found"
  | "ambiguous-type-name"
  | "null-argument"
  | "metadata";

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  message: string,
  hint?: string
): Diagnostic =>
  hint === undefined
    ? { code, severity: "error", message }
    : { code, severity: "error", message, hint };

export const categoryOf = (code: DiagnosticCode): DiagnosticCategory => {
  switch (code) {
    case "RFL1002":
      return "ambiguous-type-name";
    case "RFL3001":
      return "null-argument";
    case "RFL1001":
    case "RFL1003":
    case "RFL1004":
    case "RFL2001":
    case "RFL2002":
    case "RFL2003":
    case "RFL2004":
    case "RFL2005":
    case "RFL2006":
      return "not-found";
    default:
      return "metadata";
  }
};

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts = [`${diagnostic.severity} ${diagnostic.code}:`, diagnostic.message];

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
