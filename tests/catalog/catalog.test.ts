/**
 * Tests for the primitive type catalog
 */

import { describe, expect, test } from "vitest";
import {
  bitWidthOf,
  isPrimitiveName,
  isUnsignedInteger,
  lookupPrimitive,
  primitiveNames,
  usesBigInt,
} from "../../src/catalog/index.ts";

function primitive(name: string) {
  const type = lookupPrimitive(name);
  if (type === undefined) throw new Error(`missing primitive '${name}'`);
  return type;
}

describe("Type catalog", () => {
  test.each([
    ["char", 1, "signed"],
    ["unsigned char", 1, "unsigned"],
    ["short", 2, "signed"],
    ["int", 4, "signed"],
    ["long", 4, "signed"],
    ["unsigned long", 4, "unsigned"],
    ["long long", 8, "signed"],
    ["float", 4, "float"],
    ["double", 8, "float"],
    ["long double", 8, "float"],
    ["uint16_t", 2, "unsigned"],
    ["int_least32_t", 4, "signed"],
    ["uint_fast64_t", 8, "unsigned"],
    ["intptr_t", 8, "signed"],
    ["uintmax_t", 8, "unsigned"],
  ])("%s is %d bytes, %s", (name, size, kind) => {
    expect(primitive(name)).toEqual({ name, size, kind });
  });

  test("should list the legacy and stdint families", () => {
    const names = primitiveNames();
    expect(names).toHaveLength(42);
    expect(names).toContain("signed char");
    expect(names).toContain("uint_least8_t");
  });

  test("should not know non-primitive names", () => {
    expect(lookupPrimitive("bool")).toBeUndefined();
    expect(lookupPrimitive("size_t")).toBeUndefined();
    expect(isPrimitiveName("unsigned")).toBe(false);
    expect(isPrimitiveName("unsigned int")).toBe(true);
  });

  test("should return frozen entries", () => {
    expect(Object.isFrozen(primitive("int32_t"))).toBe(true);
  });

  test("should derive bit widths and signedness", () => {
    expect(bitWidthOf(primitive("uint16_t"))).toBe(16);
    expect(bitWidthOf(primitive("double"))).toBe(64);
    expect(isUnsignedInteger(primitive("uint8_t"))).toBe(true);
    expect(isUnsignedInteger(primitive("int8_t"))).toBe(false);
    expect(isUnsignedInteger(primitive("float"))).toBe(false);
  });

  test("should carry only 64-bit integers as bigint", () => {
    expect(usesBigInt(primitive("uint64_t"))).toBe(true);
    expect(usesBigInt(primitive("long long"))).toBe(true);
    expect(usesBigInt(primitive("double"))).toBe(false);
    expect(usesBigInt(primitive("uint32_t"))).toBe(false);
  });
});
