/**
 * Encoding of single primitive values through a DataView.
 */

import { bitWidthOf, type PrimitiveType } from "../catalog/index.ts";
import { InvalidValueError } from "../errors/errors.ts";
import { describeValue, isScalar, type Scalar } from "./values.ts";

export interface IntegerRange {
  min: bigint;
  max: bigint;
}

export function integerRange(type: PrimitiveType): IntegerRange {
  const bits = BigInt(bitWidthOf(type));
  if (type.kind === "signed") {
    return { min: -(1n << (bits - 1n)), max: (1n << (bits - 1n)) - 1n };
  }
  return { min: 0n, max: (1n << bits) - 1n };
}

/** Checks that `value` is a number or bigint. */
export function expectScalar(value: unknown, path: string): Scalar {
  if (!isScalar(value)) {
    throw new InvalidValueError(path, `expected a number, got ${describeValue(value)}`);
  }
  return value;
}

export function toInteger(value: Scalar, path: string): bigint {
  if (typeof value === "bigint") return value;
  if (!Number.isInteger(value)) {
    throw new InvalidValueError(path, `${value} is not an integer`);
  }
  return BigInt(value);
}

export function writeScalar(
  view: DataView,
  offset: number,
  type: PrimitiveType,
  value: Scalar,
  littleEndian: boolean,
  path: string
): void {
  if (type.kind === "float") {
    const n = typeof value === "bigint" ? Number(value) : value;
    if (type.size === 4) {
      view.setFloat32(offset, n, littleEndian);
    } else {
      view.setFloat64(offset, n, littleEndian);
    }
    return;
  }

  const int = toInteger(value, path);
  const { min, max } = integerRange(type);
  if (int < min || int > max) {
    throw new InvalidValueError(path, `${value} is out of range for ${type.name} (${min} to ${max})`);
  }

  const signed = type.kind === "signed";
  switch (type.size) {
    case 1:
      if (signed) view.setInt8(offset, Number(int));
      else view.setUint8(offset, Number(int));
      break;
    case 2:
      if (signed) view.setInt16(offset, Number(int), littleEndian);
      else view.setUint16(offset, Number(int), littleEndian);
      break;
    case 4:
      if (signed) view.setInt32(offset, Number(int), littleEndian);
      else view.setUint32(offset, Number(int), littleEndian);
      break;
    default:
      if (signed) view.setBigInt64(offset, int, littleEndian);
      else view.setBigUint64(offset, int, littleEndian);
  }
}

export function readScalar(
  view: DataView,
  offset: number,
  type: PrimitiveType,
  littleEndian: boolean
): Scalar {
  if (type.kind === "float") {
    return type.size === 4 ? view.getFloat32(offset, littleEndian) : view.getFloat64(offset, littleEndian);
  }

  const signed = type.kind === "signed";
  switch (type.size) {
    case 1:
      return signed ? view.getInt8(offset) : view.getUint8(offset);
    case 2:
      return signed ? view.getInt16(offset, littleEndian) : view.getUint16(offset, littleEndian);
    case 4:
      return signed ? view.getInt32(offset, littleEndian) : view.getUint32(offset, littleEndian);
    default:
      return signed ? view.getBigInt64(offset, littleEndian) : view.getBigUint64(offset, littleEndian);
  }
}

// ─── Bit-field storage units ─────────────────────────────────────────────────

/** Reads a storage unit as an unsigned integer. */
export function readUnit(view: DataView, offset: number, size: number, littleEndian: boolean): bigint {
  switch (size) {
    case 1:
      return BigInt(view.getUint8(offset));
    case 2:
      return BigInt(view.getUint16(offset, littleEndian));
    case 4:
      return BigInt(view.getUint32(offset, littleEndian));
    default:
      return view.getBigUint64(offset, littleEndian);
  }
}

export function writeUnit(
  view: DataView,
  offset: number,
  size: number,
  value: bigint,
  littleEndian: boolean
): void {
  switch (size) {
    case 1:
      view.setUint8(offset, Number(value));
      break;
    case 2:
      view.setUint16(offset, Number(value), littleEndian);
      break;
    case 4:
      view.setUint32(offset, Number(value), littleEndian);
      break;
    default:
      view.setBigUint64(offset, value, littleEndian);
  }
}
