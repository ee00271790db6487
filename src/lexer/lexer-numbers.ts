/**
 * Number literal scanning methods for Lexer.
 *
 * Integer literals follow C: decimal, `0x` hex, leading-`0` octal and `0b`
 * binary, with any mix of `u`/`l` suffixes. Floating literals are recognized
 * so that skipped initializers lex cleanly, but carry no value.
 */

import { Severity } from "../errors/index.ts";
import type { Lexer } from "./lexer.ts";
import { isAlphaNumeric, isBinaryDigit, isDigit, isHexDigit, isOctalDigit } from "./lexer.ts";
import type { Token } from "./token.ts";
import { TokenKind } from "./token.ts";

// ─── Number scanning ──────────────────────────────────────────────────────

export function readNumber(this: Lexer): Token {
  const start = this.pos;

  if (this.peek() === ".") {
    return this.readFloatTail(start);
  }

  if (this.peek() === "0") {
    const next = this.peek(1);
    if (next === "x" || next === "X") {
      this.pos += 2;
      const digitsStart = this.pos;
      this.consumeDigits(isHexDigit);
      return this.makeIntToken(start, digitsStart, 16);
    }
    if (next === "b" || next === "B") {
      this.pos += 2;
      const digitsStart = this.pos;
      this.consumeDigits(isBinaryDigit);
      return this.makeIntToken(start, digitsStart, 2);
    }
  }

  this.consumeDigits(isDigit);

  const ch = this.peek();
  if (ch === "." || ch === "e" || ch === "E") {
    return this.readFloatTail(start);
  }

  const digits = this.source.content.slice(start, this.pos);
  if (digits.length > 1 && digits.startsWith("0")) {
    if (![...digits].every(isOctalDigit)) {
      this.addDiagnostic(Severity.Error, `Invalid digit in octal literal '${digits}'`, start);
      this.consumeSuffix("uUlL");
      return this.makeToken(TokenKind.Error, start, this.pos);
    }
    return this.makeIntToken(start, start + 1, 8);
  }
  return this.makeIntToken(start, start, 10);
}

/** Scans the fraction, exponent and suffix of a floating literal starting at `start`. */
export function readFloatTail(this: Lexer, start: number): Token {
  if (this.peek() === ".") {
    this.pos++;
    this.consumeDigits(isDigit);
  }
  if (this.peek() === "e" || this.peek() === "E") {
    this.pos++;
    if (this.peek() === "+" || this.peek() === "-") this.pos++;
    if (!isDigit(this.peek())) {
      this.addDiagnostic(Severity.Error, "Expected digit in exponent", start);
      return this.makeToken(TokenKind.Error, start, this.pos);
    }
    this.consumeDigits(isDigit);
  }
  this.consumeSuffix("fFlL");
  return this.makeToken(TokenKind.FloatLiteral, start, this.pos);
}

export function consumeDigits(this: Lexer, predicate: (ch: string) => boolean): void {
  while (this.pos < this.source.length && predicate(this.peek())) {
    this.pos++;
  }
}

export function consumeSuffix(this: Lexer, allowed: string): void {
  while (this.pos < this.source.length && allowed.includes(this.peek())) {
    this.pos++;
  }
}

/**
 * Finishes an integer literal whose digits run from `digitsStart` to the
 * current position, then consumes its `u`/`l` suffix.
 */
export function makeIntToken(this: Lexer, start: number, digitsStart: number, radix: number): Token {
  const digits = this.source.content.slice(digitsStart, this.pos);
  this.consumeSuffix("uUlL");

  if (isAlphaNumeric(this.peek())) {
    this.consumeDigits(isAlphaNumeric);
    const lexeme = this.source.content.slice(start, this.pos);
    this.addDiagnostic(Severity.Error, `Invalid integer literal '${lexeme}'`, start);
    return this.makeToken(TokenKind.Error, start, this.pos);
  }

  if (digits.length === 0) {
    const lexeme = this.source.content.slice(start, this.pos);
    this.addDiagnostic(Severity.Error, `Integer literal '${lexeme}' has no digits`, start);
    return this.makeToken(TokenKind.Error, start, this.pos);
  }

  const value = Number.parseInt(digits, radix);
  if (value > Number.MAX_SAFE_INTEGER) {
    const lexeme = this.source.content.slice(start, this.pos);
    this.addDiagnostic(Severity.Error, `Integer literal '${lexeme}' is out of range`, start);
    return this.makeToken(TokenKind.Error, start, this.pos);
  }
  return { ...this.makeToken(TokenKind.IntLiteral, start, this.pos), value };
}
