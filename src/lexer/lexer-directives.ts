/**
 * Preprocessor line and quoted literal scanning methods for Lexer.
 *
 * `#include "x.h"` and `#include <x.h>` become include tokens whose `value`
 * is the path. Every other directive (`#define`, `#pragma`, `#ifndef`, ...)
 * is skipped together with its backslash-continued lines; no macro is ever
 * evaluated.
 */

import { Severity } from "../errors/index.ts";
import type { Lexer } from "./lexer.ts";
import { isAlpha, isAlphaNumeric } from "./lexer.ts";
import type { Token } from "./token.ts";
import { TokenKind } from "./token.ts";

// ─── Directives ───────────────────────────────────────────────────────────

/** Reads the directive at `pos` (a `#`); returns a token for includes, `null` otherwise. */
export function readDirective(this: Lexer): Token | null {
  const start = this.pos;
  this.pos++; // skip #
  while (this.peek() === " " || this.peek() === "\t") this.pos++;

  const nameStart = this.pos;
  if (isAlpha(this.peek())) {
    while (isAlphaNumeric(this.peek())) this.pos++;
  }
  const name = this.source.content.slice(nameStart, this.pos);

  if (name === "include") {
    return this.readInclude(start);
  }

  this.skipDirectiveLine();
  return null;
}

export function readInclude(this: Lexer, start: number): Token | null {
  while (this.peek() === " " || this.peek() === "\t") this.pos++;

  const open = this.peek();
  const close = open === '"' ? '"' : open === "<" ? ">" : null;
  if (close === null) {
    this.addDiagnostic(Severity.Error, "Expected \"file\" or <file> after #include", start);
    this.skipDirectiveLine();
    return null;
  }

  this.pos++;
  const pathStart = this.pos;
  while (this.pos < this.source.length && this.peek() !== close) {
    const ch = this.peek();
    if (ch === "\n" || ch === "\r") break;
    this.pos++;
  }
  if (this.peek() !== close) {
    this.addDiagnostic(Severity.Error, "Unterminated #include path", start);
    this.skipDirectiveLine();
    return null;
  }

  const path = this.source.content.slice(pathStart, this.pos);
  this.pos++;
  const kind = close === '"' ? TokenKind.Include : TokenKind.SystemInclude;
  const token: Token = { ...this.makeToken(kind, start, this.pos), value: path };
  this.skipDirectiveLine();
  return token;
}

/** Skips to the end of the directive, following `\` line continuations and block comments. */
export function skipDirectiveLine(this: Lexer): void {
  while (this.pos < this.source.length) {
    const ch = this.peek();
    if (ch === "\\" && (this.peek(1) === "\n" || this.peek(1) === "\r")) {
      this.pos += this.peek(1) === "\r" && this.peek(2) === "\n" ? 3 : 2;
      continue;
    }
    if (ch === "/" && this.peek(1) === "*") {
      this.skipMultiLineComment();
      continue;
    }
    if (ch === "/" && this.peek(1) === "/") {
      this.skipSingleLineComment();
      return;
    }
    if (ch === "\n" || ch === "\r") return;
    this.pos++;
  }
}

// ─── Quoted literals ──────────────────────────────────────────────────────

/** Reads a string or character literal; the header only ever skips these. */
export function readQuoted(this: Lexer, quote: string): Token {
  const start = this.pos;
  this.pos++; // skip opening quote
  const kind = quote === '"' ? TokenKind.StringLiteral : TokenKind.CharLiteral;

  while (this.pos < this.source.length) {
    const ch = this.peek();
    if (ch === "\\") {
      this.pos += 2;
      continue;
    }
    if (ch === quote) {
      this.pos++;
      return this.makeToken(kind, start, this.pos);
    }
    if (ch === "\n" || ch === "\r") break;
    this.pos++;
  }

  const what = quote === '"' ? "string" : "character";
  this.addDiagnostic(Severity.Error, `Unterminated ${what} literal`, start);
  return this.makeToken(TokenKind.Error, start, this.pos);
}
