import { posix } from "node:path";
import type { SourceProvider } from "./include-resolver.ts";

/**
 * Serves headers from a map of POSIX-style paths, e.g. `{"net/packet.h": "..."}`.
 * Includes resolve relative to the including header's directory.
 */
export class MemorySourceProvider implements SourceProvider {
  private files: Map<string, string>;

  constructor(files: Readonly<Record<string, string>>) {
    this.files = new Map(Object.entries(files).map(([path, content]) => [posix.normalize(path), content]));
  }

  resolve(path: string, fromFile: string | null): string {
    if (fromFile === null) return posix.normalize(path);
    return posix.join(posix.dirname(fromFile), path);
  }

  read(path: string): string | null {
    return this.files.get(path) ?? null;
  }
}
