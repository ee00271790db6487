/**
 * Tests for the merged type namespace
 */

import { describe, expect, test } from "vitest";
import {
  CircularDependencyError,
  DuplicateDeclarationError,
  UnknownTypeError,
} from "../../src/errors/index.ts";
import { scopeOf, thrownBy } from "./helpers.ts";

describe("TypeScope lookups", () => {
  test("should resolve primitives before declared names", () => {
    const scope = scopeOf("typedef struct { int a; } S;");
    expect(scope.resolveName("uint8_t")).toMatchObject({ kind: "primitive", type: { name: "uint8_t" } });
    expect(scope.resolveName("S")).toMatchObject({ kind: "struct", decl: { name: "S" } });
    expect(scope.resolveName("T")).toBeUndefined();
  });

  test("should follow alias chains to a primitive", () => {
    const scope = scopeOf("typedef uint16_t word_t;\ntypedef word_t reg_t;");
    expect(scope.resolveName("reg_t")).toMatchObject({ kind: "primitive", type: { name: "uint16_t", size: 2 } });
  });

  test("should find structs by name or tag", () => {
    const scope = scopeOf("typedef struct point_s { int x; } Point;");
    expect(scope.lookupStruct("Point")?.name).toBe("Point");
    expect(scope.lookupStruct("point_s")?.name).toBe("Point");
    expect(scope.lookupStruct("point")).toBeUndefined();
  });

  test("should accept a typedef that re-exports a tag under the same name", () => {
    const scope = scopeOf("struct Point { int x; };\ntypedef struct Point Point;");
    expect(scope.aliasDecls()).toHaveLength(0);
    expect(scope.resolveName("Point")).toMatchObject({ kind: "struct", decl: { name: "Point" } });
  });

  test("should list structs in declaration order", () => {
    const scope = scopeOf("typedef struct { int a; } Z;", "typedef struct { int b; } A;");
    expect(scope.structDecls().map((d) => d.name)).toEqual(["Z", "A"]);
  });
});

describe("TypeScope errors", () => {
  test("should reject a struct declared in two sources", () => {
    const err = thrownBy(() => scopeOf("typedef struct { int a; } S;", "typedef struct { int b; } S;"));

    expect(err).toBeInstanceOf(DuplicateDeclarationError);
    if (!(err instanceof DuplicateDeclarationError)) return;
    expect(err.declarationName).toBe("S");
    expect(err.message).toBe("h1.h:1:9: struct 'S' is already declared at h0.h:1:9");
  });

  test("should reject duplicate field names", () => {
    const err = thrownBy(() => scopeOf("typedef struct { int a; float a; } S;"));
    expect(err).toBeInstanceOf(DuplicateDeclarationError);
    if (!(err instanceof DuplicateDeclarationError)) return;
    expect(err.message).toBe("test.h:1:31: field 'S.a' is already declared at test.h:1:22");
  });

  test("should reject redefining a primitive", () => {
    const err = thrownBy(() => scopeOf("typedef struct { int a; } uint8_t;"));
    expect(err).toBeInstanceOf(DuplicateDeclarationError);
    if (!(err instanceof DuplicateDeclarationError)) return;
    expect(err.message).toBe("test.h:1:9: struct 'uint8_t' is already declared at <builtin>");
  });

  test("should reject a reused struct tag", () => {
    const err = thrownBy(() => scopeOf("struct P { int a; }; typedef struct P { int b; } Q;"));
    expect(err).toBeInstanceOf(DuplicateDeclarationError);
    if (!(err instanceof DuplicateDeclarationError)) return;
    expect(err.message).toBe("test.h:1:30: struct tag 'P' is already declared at test.h:1:1");
  });

  test("should reject a typedef that clashes with a struct", () => {
    const err = thrownBy(() => scopeOf("typedef struct { int a; } S;\ntypedef int S;"));
    expect(err).toBeInstanceOf(DuplicateDeclarationError);
  });

  test("should report aliases of unknown types", () => {
    const err = thrownBy(() => scopeOf("typedef Missing alias_t;"));
    expect(err).toBeInstanceOf(UnknownTypeError);
    if (!(err instanceof UnknownTypeError)) return;
    expect(err.message).toBe("unknown type 'Missing' in typedef 'alias_t'");
  });

  test("should report alias cycles", () => {
    const err = thrownBy(() => scopeOf("typedef b_t a_t;\ntypedef a_t b_t;"));
    expect(err).toBeInstanceOf(CircularDependencyError);
    if (!(err instanceof CircularDependencyError)) return;
    expect(err.message).toBe("Circular typedef dependency detected: a_t -> b_t -> a_t");
  });
});
