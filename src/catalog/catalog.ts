/**
 * Primitive C type catalog.
 *
 * Maps every supported primitive spelling (legacy `char/short/int/long`
 * families, `float/double`, and the stdint exact/least/fast/max/pointer
 * widths) to its byte size and numeric kind. Multi-word spellings are stored
 * in their normalized form (`unsigned long long`), which is what the parser
 * produces from a keyword sequence.
 *
 * @module catalog
 */

import table from "./primitives.json";

export type NumericKind = "signed" | "unsigned" | "float";

export interface PrimitiveType {
  readonly name: string;
  /** Size in bytes: 1, 2, 4 or 8. */
  readonly size: number;
  readonly kind: NumericKind;
}

const NUMERIC_KINDS: ReadonlySet<string> = new Set(["signed", "unsigned", "float"]);
const INTEGER_SIZES: ReadonlySet<number> = new Set([1, 2, 4, 8]);

function isNumericKind(kind: string): kind is NumericKind {
  return NUMERIC_KINDS.has(kind);
}

function loadCatalog(): ReadonlyMap<string, PrimitiveType> {
  const catalog = new Map<string, PrimitiveType>();
  for (const [name, entry] of Object.entries(table)) {
    if (!isNumericKind(entry.kind)) {
      throw new Error(`primitives.json: '${name}' has unknown kind '${entry.kind}'`);
    }
    const validSize =
      entry.kind === "float" ? entry.size === 4 || entry.size === 8 : INTEGER_SIZES.has(entry.size);
    if (!validSize) {
      throw new Error(`primitives.json: '${name}' has unsupported size ${entry.size}`);
    }
    catalog.set(name, Object.freeze({ name, size: entry.size, kind: entry.kind }));
  }
  return catalog;
}

const CATALOG = loadCatalog();

/** Returns the primitive registered under `name`, or `undefined`. */
export function lookupPrimitive(name: string): PrimitiveType | undefined {
  return CATALOG.get(name);
}

export function isPrimitiveName(name: string): boolean {
  return CATALOG.has(name);
}

export function primitiveNames(): string[] {
  return [...CATALOG.keys()];
}

/** Width of the type in bits; for bit-fields this is the storage unit width. */
export function bitWidthOf(type: PrimitiveType): number {
  return type.size * 8;
}

export function isUnsignedInteger(type: PrimitiveType): boolean {
  return type.kind === "unsigned";
}

/** 64-bit integers are carried as `bigint`; everything narrower as `number`. */
export function usesBigInt(type: PrimitiveType): boolean {
  return type.kind !== "float" && type.size === 8;
}
