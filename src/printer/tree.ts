/**
 * Layout tree: a read-only walk of a StructLayout and its text rendering.
 *
 *   DeviceStatus (29 bytes)
 *     timestamp : uint32_t [0-3] 4 bytes
 *     primary_sensor : SensorData [4-13] 10 bytes
 *       temperature : float [4-7] 4 bytes
 *       ...
 *
 * Offsets are absolute within the root struct; ranges are inclusive.
 */

import type { FieldLayout, StructLayout } from "../layout/types.ts";

export interface LayoutEntry {
  /** 0 for members of the root struct, one more per nesting level. */
  depth: number;
  /** Dotted access path from the root, e.g. `readings[1].pressure`. */
  path: string;
  /** Member name, or `name[i]` for one element of a struct array. */
  name: string;
  typeLabel: string;
  /** Flattened element count; 0 for scalars. */
  arrayLength: number;
  start: number;
  /** Last byte, inclusive. */
  end: number;
  size: number;
  /** Bit range inside the storage unit, for bit-fields. */
  bits: { low: number; high: number } | null;
}

export function walkLayout(layout: StructLayout): LayoutEntry[] {
  const entries: LayoutEntry[] = [];
  walkFields(layout, 0, 0, "", entries);
  return entries;
}

function walkFields(
  layout: StructLayout,
  base: number,
  depth: number,
  prefix: string,
  out: LayoutEntry[]
): void {
  for (const field of layout.fields) {
    const path = prefix + field.name;
    const start = base + field.offset;
    out.push({
      depth,
      path,
      name: field.name,
      typeLabel: typeLabel(field),
      arrayLength: field.kind === "bitfield" || field.dimensions.length === 0 ? 0 : field.count,
      start,
      end: start + field.size - 1,
      size: field.size,
      bits:
        field.kind === "bitfield"
          ? { low: field.bitOffset, high: field.bitOffset + field.bitWidth - 1 }
          : null,
    });

    if (field.kind !== "struct") continue;

    if (field.dimensions.length === 0) {
      walkFields(field.layout, start, depth + 1, `${path}.`, out);
      continue;
    }
    for (let i = 0; i < field.count; i++) {
      const elementStart = start + i * field.elementSize;
      const elementName = `${field.name}[${i}]`;
      out.push({
        depth: depth + 1,
        path: `${prefix}${elementName}`,
        name: elementName,
        typeLabel: field.layout.name,
        arrayLength: 0,
        start: elementStart,
        end: elementStart + field.elementSize - 1,
        size: field.elementSize,
        bits: null,
      });
      walkFields(field.layout, elementStart, depth + 2, `${prefix}${elementName}.`, out);
    }
  }
}

function typeLabel(field: FieldLayout): string {
  switch (field.kind) {
    case "bitfield":
      return `${field.type.name}:${field.bitWidth}`;
    case "primitive":
      return field.type.name + field.dimensions.map((d) => `[${d}]`).join("");
    case "struct":
      return field.layout.name + field.dimensions.map((d) => `[${d}]`).join("");
  }
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

export function formatEntry(entry: LayoutEntry): string {
  const indent = "  ".repeat(entry.depth + 1);
  let line = `${indent}${entry.name} : ${entry.typeLabel} [${entry.start}-${entry.end}] ${plural(entry.size, "byte")}`;
  if (entry.bits !== null) {
    line += ` bits ${entry.bits.low}-${entry.bits.high}`;
  }
  return line;
}

export function printLayout(layout: StructLayout): string {
  const lines = [`${layout.name} (${plural(layout.size, "byte")})`];
  for (const entry of walkLayout(layout)) {
    lines.push(formatEntry(entry));
  }
  return lines.join("\n");
}
