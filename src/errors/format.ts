import type { SourceFile } from "../utils/source.ts";
import type { Diagnostic } from "./diagnostic.ts";
import { describeLocation } from "./diagnostic.ts";

/** Format a diagnostic with source context: file:line:col, message, source line, caret. */
export function formatDiagnostic(diag: Diagnostic, source?: SourceFile): string {
  const header = `${describeLocation(diag.location)}: ${diag.severity}: ${diag.message}`;
  if (!source || diag.location.line === 0) return header;

  const srcLine = source.lineText(diag.location.line);
  if (srcLine === null) return header;

  const caret = `${" ".repeat(Math.max(0, diag.location.column - 1))}^`;
  return `${header}\n  ${srcLine}\n  ${caret}`;
}

/** Format every diagnostic, looking up each one's source by file name when a map is given. */
export function formatDiagnostics(
  diagnostics: ReadonlyArray<Diagnostic>,
  sources?: ReadonlyMap<string, SourceFile>
): string[] {
  return diagnostics.map((diag) => formatDiagnostic(diag, sources?.get(diag.location.file)));
}
