/**
 * Tests for error handling and recovery in the lexer
 */

import { describe, expect, test } from "vitest";
import { Severity } from "../../src/errors/index.ts";
import { TokenKind } from "../../src/lexer/index.ts";
import { lex } from "./helpers.ts";

describe("Error handling", () => {
  test("should report invalid characters and keep going", () => {
    for (const char of ["@", "$", "`"]) {
      const { tokens, diagnostics } = lex(`int ${char} x;`);

      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0].severity).toBe(Severity.Error);
      expect(diagnostics[0].message).toBe(`Unexpected character '${char}'`);
      expect(diagnostics[0].location.line).toBe(1);
      expect(diagnostics[0].location.column).toBe(5);

      expect(tokens.map((t) => t.kind)).toEqual([
        TokenKind.Int,
        TokenKind.Error,
        TokenKind.Identifier,
        TokenKind.Semicolon,
        TokenKind.Eof,
      ]);
    }
  });

  test("should record the file and offset of each diagnostic", () => {
    const { diagnostics } = lex("int a;\n  @");
    expect(diagnostics[0].location).toEqual({ file: "test.h", line: 2, column: 3, offset: 9 });
  });

  test("should reset diagnostics on every tokenize call", () => {
    const { diagnostics } = lex("@ @");
    expect(diagnostics).toHaveLength(2);
  });
});
