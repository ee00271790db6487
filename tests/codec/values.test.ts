/**
 * Tests for value checking while packing
 */

import { describe, expect, test } from "vitest";
import { flattenInput, integerRange, isStructInput, pack } from "../../src/codec/index.ts";
import { InvalidValueError } from "../../src/errors/index.ts";
import { lookupPrimitive } from "../../src/catalog/index.ts";
import { layoutFrom, SENSOR_HEADER, thrownBy } from "./helpers.ts";

function packError(text: string, name: string, value: Record<string, unknown>): InvalidValueError {
  const err = thrownBy(() => pack(value, layoutFrom(text, name)));
  if (!(err instanceof InvalidValueError)) throw new Error(`expected InvalidValueError, got ${String(err)}`);
  return err;
}

describe("Invalid values", () => {
  const SCALARS = "typedef struct { uint8_t v; int32_t x; float f; uint8_t list[2]; } S;";

  test("should reject integers outside the field's range", () => {
    const err = packError(SCALARS, "S", { v: 256 });
    expect(err.path).toBe("S.v");
    expect(err.message).toBe("S.v: 256 is out of range for uint8_t (0 to 255)");
    expect(err.code).toBe("InvalidValueError");
  });

  test("should reject negative values for unsigned fields", () => {
    expect(packError(SCALARS, "S", { v: -1 }).message).toBe("S.v: -1 is out of range for uint8_t (0 to 255)");
  });

  test("should reject fractional integers", () => {
    expect(packError(SCALARS, "S", { x: 1.5 }).message).toBe("S.x: 1.5 is not an integer");
  });

  test("should reject non-numbers", () => {
    expect(packError(SCALARS, "S", { f: "12" }).message).toBe('S.f: expected a number, got string "12"');
    expect(packError(SCALARS, "S", { x: true }).message).toBe("S.x: expected a number, got boolean");
    expect(packError(SCALARS, "S", { x: [1] }).message).toBe("S.x: expected a number, got an array");
  });

  test("should point at the offending array element", () => {
    expect(packError(SCALARS, "S", { list: [1, "x"] }).message).toBe('S.list[1]: expected a number, got string "x"');
    expect(packError(SCALARS, "S", { list: 3 }).message).toBe("S.list: expected an array, got 3");
  });

  test("should give the full path into nested struct arrays", () => {
    const err = packError(SENSOR_HEADER, "Station", { readings: [{}, {}, { pressure: 2 ** 40 }] });
    expect(err.path).toBe("Station.readings[2].pressure");
    expect(err.message).toBe(
      "Station.readings[2].pressure: 1099511627776 is out of range for int32_t (-2147483648 to 2147483647)"
    );
  });

  test("should require objects for nested structs", () => {
    expect(packError(SENSOR_HEADER, "DeviceStatus", { primary_sensor: 5 }).message).toBe(
      "DeviceStatus.primary_sensor: expected an object for struct 'SensorData', got 5"
    );
    expect(packError(SENSOR_HEADER, "Station", { readings: [{}, 5] }).message).toBe(
      "Station.readings[1]: expected an object for struct 'SensorData', got 5"
    );
  });

  test("should reject fractional bit-field values", () => {
    const text = "typedef struct { uint8_t bit : 1; } B;";
    expect(packError(text, "B", { bit: 0.5 }).message).toBe("B.bit: 0.5 is not an integer");
  });
});

describe("Value helpers", () => {
  test("integerRange covers signed and unsigned types", () => {
    const int8 = lookupPrimitive("int8_t");
    const uint64 = lookupPrimitive("uint64_t");
    if (int8 === undefined || uint64 === undefined) throw new Error("catalog incomplete");

    expect(integerRange(int8)).toEqual({ min: -128n, max: 127n });
    expect(integerRange(uint64)).toEqual({ min: 0n, max: 18446744073709551615n });
  });

  test("flattenInput keeps flat input as given", () => {
    expect(flattenInput([1, 2, 3], [2, 2], "p")).toEqual([1, 2, 3]);
    expect(flattenInput([1, 2, 3, 4, 5], [4], "p")).toEqual([1, 2, 3, 4, 5]);
    expect(() => flattenInput({}, [2], "T.p")).toThrow("T.p: expected an array, got an object");
  });

  test("flattenInput pads and cuts each row to its declared length", () => {
    expect(flattenInput([[1], [3, 4]], [2, 2], "p")).toEqual([1, undefined, 3, 4]);
    expect(flattenInput([[1, 2, 9], [3]], [2, 2], "p")).toEqual([1, 2, 3, undefined]);
    expect(flattenInput([[1, 2]], [2, 2], "p")).toEqual([1, 2, undefined, undefined]);
    expect(flattenInput([[1, 2], null, [5, 6]], [3, 2], "p")).toEqual([1, 2, undefined, undefined, 5, 6]);
    expect(flattenInput([[1], [2], [3]], [2, 1], "p")).toEqual([1, 2]);
  });

  test("flattenInput follows every dimension", () => {
    expect(flattenInput([[[1], [2]], [[3, 4]]], [2, 2, 2], "p")).toEqual([
      1,
      undefined,
      2,
      undefined,
      3,
      4,
      undefined,
      undefined,
    ]);
  });

  test("flattenInput rejects scalars where a row is expected", () => {
    expect(() => flattenInput([[1, 2], 3], [2, 2], "G.grid")).toThrow("G.grid[1]: expected an array, got 3");
  });

  test("isStructInput accepts only plain objects", () => {
    expect(isStructInput({})).toBe(true);
    expect(isStructInput([])).toBe(false);
    expect(isStructInput(null)).toBe(false);
    expect(isStructInput("s")).toBe(false);
  });
});
