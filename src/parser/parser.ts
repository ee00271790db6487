/**
 * Recursive descent parser for C header declarations.
 *
 * Struct, typedef and member parsing lives in decl-parser.ts, type specifier
 * normalization in type-spec.ts. Both operate on the ParserContext interface
 * implemented by the Parser class below.
 */

import type { Declaration, HeaderFile, IncludeDirective } from "../ast/nodes.ts";
import type { Diagnostic, SourceLocation } from "../errors/diagnostic.ts";
import { Severity } from "../errors/diagnostic.ts";
import type { Token } from "../lexer/token.ts";
import { TokenKind } from "../lexer/token.ts";
import { parseTopLevel } from "./decl-parser.ts";
import { ParseError } from "./parse-error.ts";

/** Tokens that start a construct the top-level loop can resume at after an error */
const SYNC_KINDS: ReadonlySet<TokenKind> = new Set([
  TokenKind.Typedef,
  TokenKind.Struct,
  TokenKind.Include,
  TokenKind.SystemInclude,
]);

/**
 * Interface exposed to the extracted declaration parsers.
 * Keeps the extracted modules decoupled from the Parser class internals.
 */
export interface ParserContext {
  current(): Token;
  previous(): Token;
  peekNext(): Token | undefined;
  peekAt(offset: number): Token | undefined;
  isAtEnd(): boolean;
  check(kind: TokenKind): boolean;
  advance(): Token;
  match(...kinds: TokenKind[]): boolean;
  expect(kind: TokenKind): Token;
  expectIdentifier(): Token;
  addError(message: string, token: Token): void;
  throwParseError(): never;
  locationOf(token: Token): SourceLocation;

  // Position save/restore for speculative parsing
  savePos(): number;
  restorePos(pos: number): void;
  saveDiagnosticsLength(): number;
  restoreDiagnosticsLength(len: number): void;

  /** Skips the rest of a broken struct member, stopping before `}`. */
  synchronizeMember(): void;

  // `extern "C" { ... }` blocks, whose contents parse as top-level items
  openLinkageBlock(brace: Token): void;
  /** Closes the innermost open block; false if none is open. */
  closeLinkageBlock(): boolean;
}

export class Parser implements ParserContext {
  private tokens: Token[];
  private filename: string;
  private pos: number;
  private diagnostics: Diagnostic[];
  private linkageBlocks: Token[] = [];

  constructor(tokens: Token[], filename = "") {
    if (tokens.length === 0) {
      throw new Error("Parser requires a token stream ending in EOF");
    }
    this.tokens = tokens;
    this.filename = filename;
    this.pos = 0;
    this.diagnostics = [];
  }

  getDiagnostics(): ReadonlyArray<Diagnostic> {
    return this.diagnostics;
  }

  parse(): HeaderFile {
    const includes: IncludeDirective[] = [];
    const declarations: Declaration[] = [];
    const startToken = this.current();

    while (!this.isAtEnd()) {
      try {
        const item = parseTopLevel(this);
        if (item === null) continue;
        if (item.kind === "IncludeDirective") {
          includes.push(item);
        } else {
          declarations.push(item);
        }
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        this.synchronize();
      }
    }

    for (const brace of this.linkageBlocks) {
      this.addError(`Unterminated extern block (opened at ${brace.line}:${brace.column})`, brace);
    }

    return {
      kind: "HeaderFile",
      filename: this.filename,
      includes,
      declarations,
      span: { start: startToken.span.start, end: this.previous().span.end },
      location: this.locationOf(startToken),
    };
  }

  // ─── Helpers (ParserContext implementation) ────────────────────────

  current(): Token {
    return this.tokens[this.pos] ?? this.eof();
  }

  previous(): Token {
    return this.tokens[this.pos > 0 ? this.pos - 1 : 0] ?? this.eof();
  }

  peekNext(): Token | undefined {
    return this.tokens[this.pos + 1];
  }

  peekAt(offset: number): Token | undefined {
    return this.tokens[this.pos + offset];
  }

  isAtEnd(): boolean {
    return this.current().kind === TokenKind.Eof;
  }

  check(kind: TokenKind): boolean {
    return this.current().kind === kind;
  }

  advance(): Token {
    const token = this.current();
    if (!this.isAtEnd()) {
      this.pos++;
    }
    return token;
  }

  match(...kinds: TokenKind[]): boolean {
    for (const kind of kinds) {
      if (this.check(kind)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  expect(kind: TokenKind): Token {
    if (this.check(kind)) {
      return this.advance();
    }
    const token = this.current();
    this.addError(`Expected '${kind}' but found ${describeToken(token)}`, token);
    throw new ParseError();
  }

  expectIdentifier(): Token {
    if (this.check(TokenKind.Identifier)) {
      return this.advance();
    }
    const token = this.current();
    this.addError(`Expected identifier but found ${describeToken(token)}`, token);
    throw new ParseError();
  }

  addError(message: string, token: Token): void {
    this.diagnostics.push({
      severity: Severity.Error,
      message,
      location: this.locationOf(token),
    });
  }

  throwParseError(): never {
    throw new ParseError();
  }

  locationOf(token: Token): SourceLocation {
    return {
      file: this.filename,
      line: token.line,
      column: token.column,
      offset: token.span.start,
    };
  }

  savePos(): number {
    return this.pos;
  }

  restorePos(pos: number): void {
    this.pos = pos;
  }

  saveDiagnosticsLength(): number {
    return this.diagnostics.length;
  }

  restoreDiagnosticsLength(len: number): void {
    this.diagnostics.length = len;
  }

  synchronizeMember(): void {
    while (!this.isAtEnd() && !this.check(TokenKind.RightBrace)) {
      if (this.advance().kind === TokenKind.Semicolon) return;
    }
  }

  openLinkageBlock(brace: Token): void {
    this.linkageBlocks.push(brace);
  }

  closeLinkageBlock(): boolean {
    return this.linkageBlocks.pop() !== undefined;
  }

  private synchronize(): void {
    this.advance();
    while (!this.isAtEnd()) {
      if (this.previous().kind === TokenKind.Semicolon) return;
      if (this.previous().kind === TokenKind.RightBrace) return;
      if (SYNC_KINDS.has(this.current().kind)) return;
      this.advance();
    }
  }

  private eof(): Token {
    const last = this.tokens[this.tokens.length - 1];
    if (last === undefined) throw new Error("empty token stream");
    return last;
  }
}

/** `'foo'` for tokens with text, `end of file` for EOF. */
export function describeToken(token: Token): string {
  if (token.kind === TokenKind.Eof) return "end of file";
  return `'${token.lexeme}'`;
}
