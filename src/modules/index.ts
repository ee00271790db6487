export { type IncludeResult, IncludeResolver, type SourceProvider } from "./include-resolver.ts";
export { buildRegistryFromFiles, loadHeaderDirectory, type LoadResult } from "./loader.ts";
export { MemorySourceProvider } from "./memory-provider.ts";
export { listHeaders, NodeSourceProvider } from "./node-provider.ts";
