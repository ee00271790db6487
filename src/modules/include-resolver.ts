/**
 * Include resolution for header sets.
 *
 * Starting from one or more entry headers, follows `#include "file.h"`
 * directives through a {@link SourceProvider}, parses every reachable file
 * exactly once and returns the headers with each include ahead of the file
 * that includes it. `#include <...>` directives never reach this module;
 * the parser drops them.
 */

import type { HeaderFile } from "../ast/nodes.ts";
import { type Diagnostic, warningAt } from "../errors/diagnostic.ts";
import { CircularDependencyError, MissingSourceError } from "../errors/errors.ts";
import { parseSource } from "../parser/index.ts";
import { SourceFile } from "../utils/source.ts";

// ─── Source Provider ──────────────────────────────────────────────────────────

/** Where header text comes from. The core never touches the file system itself. */
export interface SourceProvider {
  /**
   * Turns an include path into the key `read` understands. `fromFile` is the
   * resolved path of the including header, or `null` for entry paths.
   */
  resolve(path: string, fromFile: string | null): string;
  /** Header text, or `null` when nothing exists at `path`. */
  read(path: string): string | null;
}

/** Result of include resolution; warnings are collected, not thrown. */
export interface IncludeResult {
  /** Parsed headers, dependencies first. */
  headers: HeaderFile[];
  /** Source text of every parsed header, keyed by resolved path. */
  sources: Map<string, SourceFile>;
  /** Quoted includes that could not be found. */
  diagnostics: Diagnostic[];
}

// ─── Resolver ─────────────────────────────────────────────────────────────────

export class IncludeResolver {
  private provider: SourceProvider;
  private parsed: Map<string, HeaderFile> = new Map();
  private inProgress: string[] = [];
  private headers: HeaderFile[] = [];
  private sources: Map<string, SourceFile> = new Map();
  private diagnostics: Diagnostic[] = [];

  constructor(provider: SourceProvider) {
    this.provider = provider;
  }

  /**
   * Parses every entry and everything it includes.
   *
   * @throws MissingSourceError if an entry header cannot be read.
   * @throws CircularDependencyError if a header includes itself, directly or
   *   through other headers.
   * @throws StructSyntaxError if any reachable header fails to parse.
   */
  resolve(entryPaths: ReadonlyArray<string>): IncludeResult {
    for (const entry of entryPaths) {
      const path = this.provider.resolve(entry, null);
      if (this.parsed.has(path)) continue;
      const content = this.provider.read(path);
      if (content === null) {
        throw new MissingSourceError(entry);
      }
      this.visit(path, content);
    }
    return { headers: this.headers, sources: this.sources, diagnostics: this.diagnostics };
  }

  private visit(path: string, content: string): void {
    this.inProgress.push(path);

    const source = new SourceFile(path, content);
    this.sources.set(path, source);
    const header = parseSource(source);

    for (const include of header.includes) {
      const target = this.provider.resolve(include.path, path);
      if (this.inProgress.includes(target)) {
        const cycle = this.inProgress.slice(this.inProgress.indexOf(target)).concat(target);
        throw new CircularDependencyError("include", cycle);
      }
      if (this.parsed.has(target)) continue;

      const text = this.provider.read(target);
      if (text === null) {
        this.diagnostics.push(
          warningAt(include.location, `cannot find included header '${include.path}'; skipping it`)
        );
        continue;
      }
      this.visit(target, text);
    }

    this.inProgress.pop();
    this.parsed.set(path, header);
    this.headers.push(header);
  }
}
