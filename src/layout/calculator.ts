/**
 * Packed layout computation.
 *
 * Fields are placed back to back in declaration order with no alignment
 * padding. Consecutive bit-fields share a storage unit the size of their
 * base type and are allocated least significant bit first; a unit closes
 * when the next width would overflow it, when the next bit-field has a
 * different storage size, or when an ordinary member follows. No field may
 * end past {@link MAX_STRUCT_SIZE}.
 */

import type { FieldDecl, StructDecl } from "../ast/nodes.ts";
import { bitWidthOf, isUnsignedInteger, type PrimitiveType } from "../catalog/index.ts";
import {
  CircularDependencyError,
  InvalidBitFieldError,
  MAX_STRUCT_SIZE,
  StructTooLargeError,
  UnknownTypeError,
} from "../errors/errors.ts";
import type { ResolvedType, TypeScope } from "../resolver/scope.ts";
import type { BitField, FieldLayout, StructLayout } from "./types.ts";

interface OpenUnit {
  offset: number;
  size: number;
  bitsUsed: number;
}

/**
 * Lays out one struct. Every struct it references must already be present
 * in `resolved`, which holds for declarations taken in resolution order.
 */
export function computeLayout(
  decl: StructDecl,
  scope: TypeScope,
  resolved: ReadonlyMap<string, StructLayout>
): StructLayout {
  const fields: FieldLayout[] = [];
  let cursor = 0;
  let unit: OpenUnit | null = null;

  for (const field of decl.fields) {
    const type = scope.resolveField(decl, field);

    if (field.bitWidth !== null) {
      const base = checkBitField(decl, field, type, field.bitWidth);
      if (unit !== null && (unit.size !== base.size || unit.bitsUsed + field.bitWidth > bitWidthOf(base))) {
        cursor += unit.size;
        unit = null;
      }
      if (unit === null) {
        checkEnd(decl, field, cursor + base.size);
        unit = { offset: cursor, size: base.size, bitsUsed: 0 };
      }

      const bitField: BitField = {
        kind: "bitfield",
        name: field.name,
        type: base,
        offset: unit.offset,
        size: unit.size,
        bitOffset: unit.bitsUsed,
        bitWidth: field.bitWidth,
        location: field.location,
      };
      fields.push(Object.freeze(bitField));
      unit.bitsUsed += field.bitWidth;
      continue;
    }

    if (unit !== null) {
      cursor += unit.size;
      unit = null;
    }

    const dimensions = Object.freeze([...field.dimensions]);
    const count = dimensions.reduce((product, dim) => product * dim, 1);

    if (type.kind === "primitive") {
      checkEnd(decl, field, cursor + count * type.type.size);
      fields.push(
        Object.freeze({
          kind: "primitive",
          name: field.name,
          type: type.type,
          dimensions,
          count,
          elementSize: type.type.size,
          offset: cursor,
          size: count * type.type.size,
          location: field.location,
        } satisfies FieldLayout)
      );
      cursor += count * type.type.size;
    } else {
      const nested = resolved.get(type.decl.name);
      if (nested === undefined) {
        throw new UnknownTypeError(
          type.decl.name,
          `struct '${type.decl.name}' used by field '${field.name}' in struct '${decl.name}' has no layout yet`,
          field.location
        );
      }
      checkEnd(decl, field, cursor + count * nested.size);
      fields.push(
        Object.freeze({
          kind: "struct",
          name: field.name,
          layout: nested,
          dimensions,
          count,
          elementSize: nested.size,
          offset: cursor,
          size: count * nested.size,
          location: field.location,
        } satisfies FieldLayout)
      );
      cursor += count * nested.size;
    }
  }

  if (unit !== null) {
    cursor += unit.size;
  }

  return Object.freeze({ name: decl.name, fields: Object.freeze(fields), size: cursor });
}

function checkEnd(decl: StructDecl, field: FieldDecl, end: number): void {
  if (end > MAX_STRUCT_SIZE) {
    throw new StructTooLargeError(decl.name, field.name, field.location);
  }
}

function checkBitField(
  decl: StructDecl,
  field: FieldDecl,
  type: ResolvedType,
  width: number
): PrimitiveType {
  const fail = (reason: string): never => {
    throw new InvalidBitFieldError(decl.name, field.name, reason, field.location);
  };

  if (type.kind !== "primitive" || !isUnsignedInteger(type.type)) {
    return fail(`base type '${field.typeName}' is not an unsigned integer type`);
  }
  if (field.dimensions.length > 0) {
    return fail("bit-fields cannot be arrays");
  }
  if (width === 0) {
    return fail("width must be at least 1");
  }
  if (width > bitWidthOf(type.type)) {
    return fail(`width ${width} exceeds the ${bitWidthOf(type.type)} bits of '${field.typeName}'`);
  }
  return type.type;
}

// ─── Memoized calculator ────────────────────────────────────────────────────

/**
 * Computes and caches layouts by struct name. Referenced structs are laid
 * out on demand, so declarations can be requested in any order.
 */
export class LayoutCalculator {
  private scope: TypeScope;
  private cache = new Map<string, StructLayout>();
  private inProgress: string[] = [];

  constructor(scope: TypeScope) {
    this.scope = scope;
  }

  layoutOf(decl: StructDecl): StructLayout {
    const cached = this.cache.get(decl.name);
    if (cached !== undefined) return cached;

    if (this.inProgress.includes(decl.name)) {
      const cycle = this.inProgress.slice(this.inProgress.indexOf(decl.name)).concat(decl.name);
      throw new CircularDependencyError("struct", cycle);
    }

    this.inProgress.push(decl.name);
    try {
      for (const field of decl.fields) {
        const type = this.scope.resolveField(decl, field);
        if (type.kind === "struct") this.layoutOf(type.decl);
      }
    } finally {
      this.inProgress.pop();
    }

    const layout = computeLayout(decl, this.scope, this.cache);
    this.cache.set(decl.name, layout);
    return layout;
  }

  /** Lays out every declaration, returning layouts in the given order. */
  layoutAll(ordered: ReadonlyArray<StructDecl>): StructLayout[] {
    return ordered.map((decl) => this.layoutOf(decl));
  }

  get cachedCount(): number {
    return this.cache.size;
  }
}
