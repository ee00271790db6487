/**
 * Packed C struct layouts and a binary codec for them.
 *
 * @example
 * const registry = buildRegistry([
 *   "typedef struct { uint32_t count; float values[4]; } Sample;",
 * ]);
 * const bytes = registry.pack({ count: 1, values: [1.5] }, "Sample");
 * registry.unpack(bytes, "Sample"); // { count: 1, values: [1.5, 0, 0, 0] }
 */

export type * from "./ast/nodes.ts";
export {
  bitWidthOf,
  isPrimitiveName,
  lookupPrimitive,
  type NumericKind,
  type PrimitiveType,
  primitiveNames,
} from "./catalog/index.ts";
export {
  type FieldValue,
  pack,
  type Scalar,
  type StructInput,
  type StructValue,
  unpack,
} from "./codec/index.ts";
export { DEFAULT_ENDIANNESS, type Endianness } from "./config.ts";
export * from "./errors/index.ts";
export {
  computeLayout,
  type BitField,
  type FieldLayout,
  LayoutCalculator,
  type PrimitiveField,
  type StructField,
  type StructLayout,
} from "./layout/index.ts";
export {
  buildRegistryFromFiles,
  IncludeResolver,
  type IncludeResult,
  listHeaders,
  loadHeaderDirectory,
  type LoadResult,
  MemorySourceProvider,
  NodeSourceProvider,
  type SourceProvider,
} from "./modules/index.ts";
export { parseHeader, parseSource } from "./parser/index.ts";
export { formatEntry, type LayoutEntry, printLayout, walkLayout } from "./printer/index.ts";
export { buildRegistry, Registry, type SourceInput } from "./registry/index.ts";
export { resolveDeclarations, resolveOrder, type ResolvedType, TypeScope } from "./resolver/index.ts";
export { SourceFile } from "./utils/source.ts";
