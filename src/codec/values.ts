// ─── Value Model ────────────────────────────────────────────────────────────

import { InvalidValueError } from "../errors/errors.ts";

/** 64-bit integers are `bigint`; every other number is a `number`. */
export type Scalar = number | bigint;

export type FieldValue = Scalar | StructValue | FieldValue[];

/** A decoded struct: one entry per field, in declaration order. */
export interface StructValue {
  [field: string]: FieldValue;
}

/**
 * What `pack` accepts. Values are checked while encoding, so loosely typed
 * input such as parsed JSON can be passed straight through.
 */
export interface StructInput {
  readonly [field: string]: unknown;
}

export function isStructInput(value: unknown): value is StructInput {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isScalar(value: unknown): value is Scalar {
  return typeof value === "number" || typeof value === "bigint";
}

/** `null` and `undefined` both mean "not supplied". */
export function isMissing(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Lays array input out row-major against the declared dimensions.
 *
 * Flat input is returned as given. Nested input is read one dimension at a
 * time: each row is cut or padded (with `undefined`) to its declared length,
 * so `[[1], [3, 4]]` for `[2][2]` becomes `[1, undefined, 3, 4]`.
 */
export function flattenInput(value: unknown, dimensions: ReadonlyArray<number>, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new InvalidValueError(path, `expected an array, got ${describeValue(value)}`);
  }
  if (dimensions.length <= 1 || !value.some((item) => Array.isArray(item))) {
    return value;
  }

  const out: unknown[] = [];
  const last = dimensions.length - 1;
  const walk = (items: ReadonlyArray<unknown>, depth: number, rowPath: string): void => {
    const length = dimensions[depth] ?? 0;
    const rowSize = dimensions.slice(depth + 1).reduce((product, dim) => product * dim, 1);
    for (let i = 0; i < length; i++) {
      const item = items[i];
      if (depth === last) {
        out.push(item);
        continue;
      }
      if (isMissing(item)) {
        for (let j = 0; j < rowSize; j++) out.push(undefined);
        continue;
      }
      const itemPath = `${rowPath}[${i}]`;
      if (!Array.isArray(item)) {
        throw new InvalidValueError(itemPath, `expected an array, got ${describeValue(item)}`);
      }
      walk(item, depth + 1, itemPath);
    }
  };
  walk(value, 0, path);
  return out;
}

export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  switch (typeof value) {
    case "string":
      return `string ${JSON.stringify(value)}`;
    case "number":
    case "bigint":
      return String(value);
    case "object":
      return "an object";
    default:
      return typeof value;
  }
}
