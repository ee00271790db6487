/**
 * Tests for syntax errors and recovery
 */

import { describe, expect, test } from "vitest";
import { StructSyntaxError } from "../../src/errors/index.ts";
import { describeFields, errorMessages, parse, parseWithDiagnostics, structs } from "./helpers.ts";

describe("Rejected members", () => {
  test.each([
    ["typedef struct S { int *p; } S;", "pointer members are not supported (member of struct 'S')"],
    [
      "typedef struct S { void (*cb)(int); } S;",
      "'void' is not a valid member type",
    ],
    ["struct U { union { int a; } u; };", "unions are not supported (member of struct 'U')"],
    ["struct E { enum { A, B } e; };", "enum members are not supported (member of struct 'E')"],
    [
      "typedef struct Outer { struct { int a; } inner; } Outer;",
      "nested struct definitions are not supported (member of struct 'Outer'); declare the struct separately",
    ],
    ["struct F { int n; int data[]; };", "flexible array member 'data' is not supported"],
    ["struct Z { int a[0]; };", "Array dimension of 'a' must be positive"],
    ["struct D { int a[N]; };", "Array dimension of 'a' must be an integer literal, found 'N'"],
    ["struct B { uint8_t f : W; };", "Bit-field width of 'f' must be an integer literal, found 'W'"],
    ["struct S { unsigned float x; };", "Invalid type specifier 'unsigned float'"],
    ["struct S { long long long x; };", "Invalid type specifier 'long long long'"],
    ["struct S { void v; };", "'void' is not a valid member type"],
    ["struct M { int a int b; };", "Expected ';' but found 'int'"],
  ])("%s", (text, message) => {
    expect(errorMessages(text)[0]).toBe(message);
  });

  test("should reject function pointer members", () => {
    expect(errorMessages("typedef struct S { uint8_t (*cb)(void); } S;")[0]).toBe(
      "function pointer members are not supported (member of struct 'S')"
    );
  });

  test("should reject empty structs", () => {
    expect(errorMessages("struct Empty {};")).toEqual(["struct 'Empty' has no members"]);
  });

  test("should report an unterminated struct body", () => {
    expect(errorMessages("struct U { int a;")).toEqual(["Unterminated body of struct 'U' (opened at 1:10)"]);
  });
});

describe("Recovery", () => {
  test("should keep parsing members after a bad one", () => {
    const { header, diagnostics } = parseWithDiagnostics(
      "typedef struct S { int *p; int ok; float *q; } S;"
    );

    expect(diagnostics).toHaveLength(2);
    expect(describeFields(structs(header)[0])).toEqual(["ok:int"]);
  });

  test("should keep parsing declarations after a bad struct", () => {
    const { header, diagnostics } = parseWithDiagnostics(
      "struct Z { int a[0]; };\ntypedef struct { int b; } Good;"
    );
    expect(diagnostics).toHaveLength(1);
    expect(structs(header).map((s) => s.name)).toEqual(["Z", "Good"]);
  });
});

describe("parseHeader", () => {
  test("should throw one StructSyntaxError with every error", () => {
    let caught: unknown;
    try {
      parse("struct Empty {};\nstruct P { int *p; };");
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(StructSyntaxError);
    if (!(caught instanceof StructSyntaxError)) return;
    expect(caught.code).toBe("SyntaxError");
    expect(caught.diagnostics).toHaveLength(2);
    expect(caught.message).toBe(
      "test.h:1:14: struct 'Empty' has no members\n" +
        "test.h:2:16: pointer members are not supported (member of struct 'P')"
    );
  });

  test("should include lexer errors", () => {
    expect(() => parse("typedef struct { int a; } S; @")).toThrow("test.h:1:30: Unexpected character '@'");
  });

  test("should not throw for warnings-free valid input", () => {
    expect(parse("typedef struct { int a; } S;").declarations).toHaveLength(1);
  });
});
