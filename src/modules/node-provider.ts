/**
 * File system access for header sets: a provider that reads from disk and
 * directory listing for the CLI.
 */

import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import type { SourceProvider } from "./include-resolver.ts";

export class NodeSourceProvider implements SourceProvider {
  resolve(path: string, fromFile: string | null): string {
    return fromFile === null ? resolve(path) : resolve(dirname(fromFile), path);
  }

  read(path: string): string | null {
    if (!existsSync(path) || !statSync(path).isFile()) return null;
    return readFileSync(path, "utf-8");
  }
}

/** Every `*.h` file directly inside `dir`, sorted by name. */
export function listHeaders(dir: string): string[] {
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(".h"))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(dir, name));
}
