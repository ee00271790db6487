export enum Severity {
  Error = "error",
  Warning = "warning",
  Info = "info",
}

export interface SourceLocation {
  file: string;
  line: number;
  column: number;
  offset: number;
}

export interface Diagnostic {
  severity: Severity;
  message: string;
  location: SourceLocation;
}

/** Location used for problems that have no position in any header. */
export const NO_LOCATION: SourceLocation = Object.freeze({
  file: "",
  line: 0,
  column: 0,
  offset: 0,
});

export function errorAt(location: SourceLocation, message: string): Diagnostic {
  return { severity: Severity.Error, message, location };
}

export function warningAt(location: SourceLocation, message: string): Diagnostic {
  return { severity: Severity.Warning, message, location };
}

export function isError(diag: Diagnostic): boolean {
  return diag.severity === Severity.Error;
}

/** `file:line:col` prefix, or just the file when the location has no line. */
export function describeLocation(location: SourceLocation): string {
  const file = location.file || "<unknown>";
  if (location.line === 0) return file;
  return `${file}:${location.line}:${location.column}`;
}
