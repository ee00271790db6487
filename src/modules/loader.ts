import type { Diagnostic } from "../errors/diagnostic.ts";
import { Registry } from "../registry/registry.ts";
import type { SourceFile } from "../utils/source.ts";
import { IncludeResolver, type SourceProvider } from "./include-resolver.ts";
import { listHeaders, NodeSourceProvider } from "./node-provider.ts";

export interface LoadResult {
  registry: Registry;
  /** Warnings from include resolution. */
  diagnostics: Diagnostic[];
  sources: Map<string, SourceFile>;
}

/** Follows includes from `entryPaths` and builds one registry from every header reached. */
export function buildRegistryFromFiles(
  entryPaths: ReadonlyArray<string>,
  provider: SourceProvider
): LoadResult {
  const { headers, sources, diagnostics } = new IncludeResolver(provider).resolve(entryPaths);
  return { registry: Registry.fromHeaders(headers), diagnostics, sources };
}

/** Treats every `*.h` file in `dir` as an entry point. */
export function loadHeaderDirectory(dir: string, provider: SourceProvider = new NodeSourceProvider()): LoadResult {
  return buildRegistryFromFiles(listHeaders(dir), provider);
}
