/**
 * Diagnostics reported to users of classforge tooling
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  | "CFG1001" // Config file not found
  | "CFG1002" // Config file unreadable or not valid JSON
  | "CFG1003" // Config root must be an object
  | "CFG1004"; // Config field has the wrong type

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly file?: string;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  file?: string,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  ...(file !== undefined ? { file } : {}),
  ...(hint !== undefined ? { hint } : {}),
});

export const isErrorDiagnostic = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.file) {
    parts.push(`${diagnostic.file}:`);
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
