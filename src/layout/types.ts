// ─── Layout Types ───────────────────────────────────────────────────────────

import type { PrimitiveType } from "../catalog/index.ts";
import type { SourceLocation } from "../errors/diagnostic.ts";

interface FieldBase {
  name: string;
  /** Byte offset from the start of the enclosing struct. */
  offset: number;
  /** Bytes the field occupies; for bit-fields, the size of the storage unit. */
  size: number;
  location: SourceLocation;
}

/** A numeric field, scalar or array. */
export interface PrimitiveField extends FieldBase {
  kind: "primitive";
  type: PrimitiveType;
  /** Declared dimensions, outermost first; empty for scalars. */
  dimensions: ReadonlyArray<number>;
  /** Product of `dimensions`, 1 for scalars. */
  count: number;
  elementSize: number;
}

/** A nested struct, scalar or array. */
export interface StructField extends FieldBase {
  kind: "struct";
  layout: StructLayout;
  dimensions: ReadonlyArray<number>;
  count: number;
  elementSize: number;
}

/**
 * A bit range inside a shared storage unit. `offset` and `size` describe the
 * unit, which every bit-field allocated in it repeats.
 */
export interface BitField extends FieldBase {
  kind: "bitfield";
  type: PrimitiveType;
  /** Position of the field's least significant bit within the unit. */
  bitOffset: number;
  bitWidth: number;
}

export type FieldLayout = PrimitiveField | StructField | BitField;

export interface StructLayout {
  name: string;
  fields: ReadonlyArray<FieldLayout>;
  /** Total packed size in bytes. */
  size: number;
}

export function isArrayField(field: FieldLayout): field is PrimitiveField | StructField {
  return field.kind !== "bitfield" && field.dimensions.length > 0;
}
