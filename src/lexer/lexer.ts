/**
 * Lexer for C header files.
 *
 * Converts a {@link SourceFile} into a stream of {@link Token}s. Comments are
 * dropped, preprocessor lines are either turned into include tokens or
 * skipped, and everything else is tokenized. The lexer performs error
 * recovery: on an invalid character or malformed literal it emits a
 * {@link TokenKind.Error} token, records a diagnostic, and keeps scanning.
 *
 * Method implementations are split across:
 *   - lexer-numbers.ts     (integer and floating literal scanning)
 *   - lexer-directives.ts  (preprocessor lines, string and char literals)
 */

import { type Diagnostic, Severity } from "../errors/index.ts";
import type { SourceFile } from "../utils/source.ts";
import * as directiveMethods from "./lexer-directives.ts";
import * as numberMethods from "./lexer-numbers.ts";
import { lookupKeyword, type Token, TokenKind } from "./token.ts";

// ─── Character helpers ────────────────────────────────────────────────────

const CHAR_0 = 48; // '0'
const CHAR_9 = 57; // '9'
const CHAR_7 = 55;
const CHAR_a = 97;
const CHAR_f = 102;
const CHAR_A = 65;
const CHAR_F = 70;
const CHAR_UNDERSCORE = 95;

export function isDigit(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code >= CHAR_0 && code <= CHAR_9;
}

export function isAlpha(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return (
    (code >= CHAR_a && code <= 122) || (code >= CHAR_A && code <= 90) || code === CHAR_UNDERSCORE
  );
}

export function isAlphaNumeric(ch: string): boolean {
  return isAlpha(ch) || isDigit(ch);
}

export function isHexDigit(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return (
    (code >= CHAR_0 && code <= CHAR_9) ||
    (code >= CHAR_a && code <= CHAR_f) ||
    (code >= CHAR_A && code <= CHAR_F)
  );
}

export function isOctalDigit(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code >= CHAR_0 && code <= CHAR_7;
}

export function isBinaryDigit(ch: string): boolean {
  return ch === "0" || ch === "1";
}

const OPERATOR_CHARS: ReadonlySet<string> = new Set([
  "=", "+", "-", "/", "%", "&", "|", "^", "~", "!", "<", ">", "?", ".",
]);

// ─── Lexer class ──────────────────────────────────────────────────────────

export class Lexer {
  source: SourceFile;
  pos: number;
  diagnostics: Diagnostic[];

  constructor(source: SourceFile) {
    this.source = source;
    this.pos = 0;
    this.diagnostics = [];
  }

  /** Returns all diagnostics accumulated during the most recent tokenization. */
  getDiagnostics(): ReadonlyArray<Diagnostic> {
    return this.diagnostics;
  }

  /**
   * Scans the entire source file and returns an array of tokens.
   *
   * The returned array always ends with a {@link TokenKind.Eof} token.
   * Calling this method resets the lexer position and diagnostics.
   */
  tokenize(): Token[] {
    const tokens: Token[] = [];
    this.pos = 0;
    this.diagnostics = [];
    let token = this.nextToken();
    while (token.kind !== TokenKind.Eof) {
      tokens.push(token);
      token = this.nextToken();
    }
    tokens.push(token);
    return tokens;
  }

  /** Scans and returns the next token, skipping directives that produce none. */
  nextToken(): Token {
    for (;;) {
      this.skipWhitespaceAndComments();

      if (this.pos >= this.source.length) {
        return this.makeToken(TokenKind.Eof, this.pos, this.pos);
      }

      const ch = this.peek();

      if (ch === "#" && this.atLineStart()) {
        const directive = this.readDirective();
        if (directive) return directive;
        continue;
      }

      if (isAlpha(ch)) {
        return this.readIdentifierOrKeyword();
      }

      if (isDigit(ch) || (ch === "." && isDigit(this.peek(1)))) {
        return this.readNumber();
      }

      if (ch === '"' || ch === "'") {
        return this.readQuoted(ch);
      }

      return this.readPunctuation();
    }
  }

  peek(offset = 0): string {
    return this.source.charAt(this.pos + offset);
  }

  advance(): string {
    const ch = this.source.charAt(this.pos);
    this.pos++;
    return ch;
  }

  /** True when only spaces or tabs separate `pos` from the start of its line. */
  atLineStart(): boolean {
    for (let idx = this.pos - 1; idx >= 0; idx--) {
      const ch = this.source.charAt(idx);
      if (ch === "\n" || ch === "\r") return true;
      if (ch !== " " && ch !== "\t") return false;
    }
    return true;
  }

  private skipWhitespaceAndComments(): void {
    while (this.pos < this.source.length) {
      const ch = this.peek();

      if (ch === " " || ch === "\t" || ch === "\n" || ch === "\r" || ch === "\f" || ch === "\v") {
        this.pos++;
        continue;
      }

      if (ch === "/" && this.peek(1) === "/") {
        this.skipSingleLineComment();
        continue;
      }

      if (ch === "/" && this.peek(1) === "*") {
        this.skipMultiLineComment();
        continue;
      }

      break;
    }
  }

  skipSingleLineComment(): void {
    this.pos += 2; // skip //
    while (this.pos < this.source.length) {
      const ch = this.peek();
      if (ch === "\n" || ch === "\r") {
        break;
      }
      this.pos++;
    }
  }

  skipMultiLineComment(): void {
    const start = this.pos;
    this.pos += 2; // skip /*
    while (this.pos < this.source.length) {
      if (this.peek() === "*" && this.peek(1) === "/") {
        this.pos += 2;
        return;
      }
      this.pos++;
    }
    const { line, column } = this.source.lineCol(start);
    this.addDiagnostic(
      Severity.Error,
      `Unterminated multi-line comment (started at ${line}:${column})`,
      start
    );
  }

  private readIdentifierOrKeyword(): Token {
    const start = this.pos;
    while (this.pos < this.source.length && isAlphaNumeric(this.peek())) {
      this.pos++;
    }
    const lexeme = this.source.content.slice(start, this.pos);
    return this.makeToken(lookupKeyword(lexeme) ?? TokenKind.Identifier, start, this.pos);
  }

  private readPunctuation(): Token {
    const start = this.pos;
    const ch = this.advance();

    switch (ch) {
      case "{":
        return this.makeToken(TokenKind.LeftBrace, start, this.pos);
      case "}":
        return this.makeToken(TokenKind.RightBrace, start, this.pos);
      case "(":
        return this.makeToken(TokenKind.LeftParen, start, this.pos);
      case ")":
        return this.makeToken(TokenKind.RightParen, start, this.pos);
      case "[":
        return this.makeToken(TokenKind.LeftBracket, start, this.pos);
      case "]":
        return this.makeToken(TokenKind.RightBracket, start, this.pos);
      case ";":
        return this.makeToken(TokenKind.Semicolon, start, this.pos);
      case ":":
        return this.makeToken(TokenKind.Colon, start, this.pos);
      case ",":
        return this.makeToken(TokenKind.Comma, start, this.pos);
      case "*":
        return this.makeToken(TokenKind.Star, start, this.pos);
      default:
        if (OPERATOR_CHARS.has(ch)) {
          return this.makeToken(TokenKind.Operator, start, this.pos);
        }
        this.addDiagnostic(Severity.Error, `Unexpected character '${ch}'`, start);
        return this.makeToken(TokenKind.Error, start, this.pos);
    }
  }

  makeToken(kind: TokenKind, start: number, end: number): Token {
    const { line, column } = this.source.lineCol(start);
    return {
      kind,
      lexeme: this.source.content.slice(start, end),
      span: { start, end },
      line,
      column,
    };
  }

  addDiagnostic(severity: Severity, message: string, offset: number): void {
    this.diagnostics.push({
      severity,
      message,
      location: this.source.locate(offset),
    });
  }

  // ─── Number scanning methods (from lexer-numbers.ts) ──────────────────────
  declare readNumber: typeof numberMethods.readNumber;
  declare readFloatTail: typeof numberMethods.readFloatTail;
  declare consumeDigits: typeof numberMethods.consumeDigits;
  declare consumeSuffix: typeof numberMethods.consumeSuffix;
  declare makeIntToken: typeof numberMethods.makeIntToken;

  // ─── Directive and quoted literal scanning (from lexer-directives.ts) ─────
  declare readDirective: typeof directiveMethods.readDirective;
  declare readInclude: typeof directiveMethods.readInclude;
  declare skipDirectiveLine: typeof directiveMethods.skipDirectiveLine;
  declare readQuoted: typeof directiveMethods.readQuoted;
}

// ─── Attach extracted methods to Lexer prototype ──────────────────────────────

Lexer.prototype.readNumber = numberMethods.readNumber;
Lexer.prototype.readFloatTail = numberMethods.readFloatTail;
Lexer.prototype.consumeDigits = numberMethods.consumeDigits;
Lexer.prototype.consumeSuffix = numberMethods.consumeSuffix;
Lexer.prototype.makeIntToken = numberMethods.makeIntToken;

Lexer.prototype.readDirective = directiveMethods.readDirective;
Lexer.prototype.readInclude = directiveMethods.readInclude;
Lexer.prototype.skipDirectiveLine = directiveMethods.skipDirectiveLine;
Lexer.prototype.readQuoted = directiveMethods.readQuoted;
