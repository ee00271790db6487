/**
 * Binary codec: converts between struct values and their packed bytes.
 *
 * Packing never fails on missing fields or mismatched array lengths: absent
 * values encode as zero, short arrays are zero-padded and long arrays are
 * cut to the declared length. Values that cannot be represented in their
 * field raise {@link InvalidValueError}, except bit-fields, which are masked
 * to their width.
 */

import { usesBigInt } from "../catalog/index.ts";
import { DEFAULT_ENDIANNESS, type Endianness } from "../config.ts";
import { BufferTooSmallError, InvalidValueError } from "../errors/errors.ts";
import type { BitField, StructField, StructLayout } from "../layout/types.ts";
import { expectScalar, readScalar, readUnit, toInteger, writeScalar, writeUnit } from "./scalars.ts";
import {
  describeValue,
  type FieldValue,
  flattenInput,
  isMissing,
  isStructInput,
  type StructInput,
  type StructValue,
} from "./values.ts";

/** Encodes `value`; the result is always exactly `layout.size` bytes. */
export function pack(
  value: StructInput,
  layout: StructLayout,
  endianness: Endianness = DEFAULT_ENDIANNESS
): Uint8Array {
  const bytes = new Uint8Array(layout.size);
  const view = new DataView(bytes.buffer);
  packStruct(view, 0, layout, value, endianness === "little", layout.name);
  return bytes;
}

/**
 * Decodes the first `layout.size` bytes of `bytes`. Anything past that is
 * ignored.
 *
 * @throws BufferTooSmallError if fewer than `layout.size` bytes are given.
 */
export function unpack(
  bytes: Uint8Array,
  layout: StructLayout,
  endianness: Endianness = DEFAULT_ENDIANNESS
): StructValue {
  if (bytes.length < layout.size) {
    throw new BufferTooSmallError(layout.name, layout.size, bytes.length);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return unpackStruct(view, 0, layout, endianness === "little");
}

// ─── Packing ─────────────────────────────────────────────────────────────────

function packStruct(
  view: DataView,
  base: number,
  layout: StructLayout,
  value: StructInput,
  littleEndian: boolean,
  path: string
): void {
  for (const field of layout.fields) {
    // Inherited keys such as `constructor` are not values
    const raw = Object.hasOwn(value, field.name) ? value[field.name] : undefined;
    if (isMissing(raw)) continue;
    const fieldPath = `${path}.${field.name}`;

    switch (field.kind) {
      case "bitfield":
        packBitField(view, base, field, raw, littleEndian, fieldPath);
        break;

      case "primitive": {
        if (field.dimensions.length === 0) {
          writeScalar(view, base + field.offset, field.type, expectScalar(raw, fieldPath), littleEndian, fieldPath);
          break;
        }
        const elements = flattenInput(raw, field.dimensions, fieldPath);
        const n = Math.min(field.count, elements.length);
        for (let i = 0; i < n; i++) {
          const element = elements[i];
          if (isMissing(element)) continue;
          const elementPath = `${fieldPath}[${i}]`;
          writeScalar(
            view,
            base + field.offset + i * field.elementSize,
            field.type,
            expectScalar(element, elementPath),
            littleEndian,
            elementPath
          );
        }
        break;
      }

      case "struct": {
        if (field.dimensions.length === 0) {
          packNested(view, base + field.offset, field, raw, littleEndian, fieldPath);
          break;
        }
        const elements = flattenInput(raw, field.dimensions, fieldPath);
        const n = Math.min(field.count, elements.length);
        for (let i = 0; i < n; i++) {
          const element = elements[i];
          if (isMissing(element)) continue;
          packNested(view, base + field.offset + i * field.elementSize, field, element, littleEndian, `${fieldPath}[${i}]`);
        }
        break;
      }
    }
  }
}

function packNested(
  view: DataView,
  offset: number,
  field: StructField,
  raw: unknown,
  littleEndian: boolean,
  path: string
): void {
  if (!isStructInput(raw)) {
    throw new InvalidValueError(
      path,
      `expected an object for struct '${field.layout.name}', got ${describeValue(raw)}`
    );
  }
  packStruct(view, offset, field.layout, raw, littleEndian, path);
}

function packBitField(
  view: DataView,
  base: number,
  field: BitField,
  raw: unknown,
  littleEndian: boolean,
  path: string
): void {
  const value = toInteger(expectScalar(raw, path), path);
  const mask = (1n << BigInt(field.bitWidth)) - 1n;
  const offset = base + field.offset;
  const unit = readUnit(view, offset, field.size, littleEndian);
  const updated = (unit & ~(mask << BigInt(field.bitOffset))) | ((value & mask) << BigInt(field.bitOffset));
  writeUnit(view, offset, field.size, updated, littleEndian);
}

// ─── Unpacking ───────────────────────────────────────────────────────────────

function unpackStruct(view: DataView, base: number, layout: StructLayout, littleEndian: boolean): StructValue {
  const out: StructValue = {};

  for (const field of layout.fields) {
    switch (field.kind) {
      case "bitfield": {
        const unit = readUnit(view, base + field.offset, field.size, littleEndian);
        const bits = (unit >> BigInt(field.bitOffset)) & ((1n << BigInt(field.bitWidth)) - 1n);
        setField(out, field.name, usesBigInt(field.type) ? bits : Number(bits));
        break;
      }

      case "primitive": {
        if (field.dimensions.length === 0) {
          setField(out, field.name, readScalar(view, base + field.offset, field.type, littleEndian));
          break;
        }
        const elements: FieldValue[] = [];
        for (let i = 0; i < field.count; i++) {
          elements.push(readScalar(view, base + field.offset + i * field.elementSize, field.type, littleEndian));
        }
        setField(out, field.name, elements);
        break;
      }

      case "struct": {
        if (field.dimensions.length === 0) {
          setField(out, field.name, unpackStruct(view, base + field.offset, field.layout, littleEndian));
          break;
        }
        const elements: FieldValue[] = [];
        for (let i = 0; i < field.count; i++) {
          elements.push(unpackStruct(view, base + field.offset + i * field.elementSize, field.layout, littleEndian));
        }
        setField(out, field.name, elements);
        break;
      }
    }
  }
  return out;
}

/** Defines `name` as an own key, so field names like `__proto__` stay data. */
function setField(out: StructValue, name: string, value: FieldValue): void {
  Object.defineProperty(out, name, { value, enumerable: true, writable: true, configurable: true });
}
