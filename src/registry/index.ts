export { buildRegistry, Registry, type SourceInput } from "./registry.ts";
