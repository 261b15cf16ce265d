/**
 * Diagnostic types for sigbridge
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  | "SGB1001" // Source file not found
  | "SGB1002" // Syntax error in source file
  | "SGB2001" // Generic function cannot be projected
  | "SGB2002" // Rest parameter cannot be projected
  | "SGB2003" // Parameter without type annotation
  | "SGB2004" // Overloaded function (only the first declaration is kept)
  | "SGB2005" // Missing return type annotation (printed as void)
  | "SGB2006" // Multi-value (tuple) parameter or return type
  | "SGB2007" // Parameter with no value (void, undefined, never)
  // Header assembly (SGB3001-SGB3005)
  | "SGB3001" // Declaration omitted: unrepresentable type
  | "SGB3002" // Declaration emitted with placeholder
  | "SGB3003" // Unrepresentable type (unsupported: error)
  | "SGB3004" // Optionality dropped for non-nullable target type
  | "SGB3005" // Duplicate declaration name
  // Known-type table loading (SGB9001-SGB9007)
  | "SGB9001" // Known-type file not found
  | "SGB9002" // Failed to read known-type file
  | "SGB9003" // Invalid JSON in known-type file
  | "SGB9004" // Known-type file must be an object
  | "SGB9005" // Unsupported 'version' field
  | "SGB9006" // Missing or invalid 'types' field
  | "SGB9007"; // Invalid known-type entry

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (): DiagnosticsCollector => ({
  diagnostics: [],
  hasErrors: false,
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});

export const mergeDiagnostics = (
  collector1: DiagnosticsCollector,
  collector2: DiagnosticsCollector
): DiagnosticsCollector => ({
  diagnostics: [...collector1.diagnostics, ...collector2.diagnostics],
  hasErrors: collector1.hasErrors || collector2.hasErrors,
});
