/**
 * Declaration parsing for C headers.
 * Split out of parser.ts; every function operates on a ParserContext.
 *
 * Only struct definitions, typedef aliases and quoted includes produce nodes.
 * Everything else at top level (prototypes, enums, unions, globals, function
 * bodies) is skipped up to its terminating `;` or closing brace. Linkage
 * blocks (`extern "C" { ... }`) are transparent.
 */

import type {
  Declaration,
  FieldDecl,
  IncludeDirective,
  StructDecl,
  TypeAliasDecl,
} from "../ast/nodes.ts";
import type { Token } from "../lexer/token.ts";
import { TokenKind } from "../lexer/token.ts";
import { ParseError } from "./parse-error.ts";
import type { ParserContext } from "./parser.ts";
import { describeToken } from "./parser.ts";
import { parseTypeSpec, startsTypeSpec, type TypeSpec } from "./type-spec.ts";

export type TopLevelItem = Declaration | IncludeDirective;

export function parseTopLevel(ctx: ParserContext): TopLevelItem | null {
  const token = ctx.current();

  switch (token.kind) {
    case TokenKind.Include:
      ctx.advance();
      return {
        kind: "IncludeDirective",
        path: typeof token.value === "string" ? token.value : token.lexeme,
        span: token.span,
        location: ctx.locationOf(token),
      };
    case TokenKind.SystemInclude:
    case TokenKind.Semicolon:
      ctx.advance();
      return null;
    case TokenKind.Typedef:
      return parseTypedef(ctx);
    case TokenKind.Struct:
      return parseTaggedStruct(ctx);
    case TokenKind.Extern:
      if (ctx.peekNext()?.kind !== TokenKind.StringLiteral) break;
      parseLinkageSpec(ctx);
      return null;
    case TokenKind.RightBrace:
      if (!ctx.closeLinkageBlock()) break;
      ctx.advance();
      return null;
  }

  skipDeclaration(ctx);
  return null;
}

/**
 * `extern "C" {` opens a block whose items are parsed as if at top level;
 * `extern "C" <decl>` applies to the one declaration that follows.
 */
function parseLinkageSpec(ctx: ParserContext): void {
  ctx.expect(TokenKind.Extern);
  ctx.expect(TokenKind.StringLiteral);
  if (ctx.check(TokenKind.LeftBrace)) {
    ctx.openLinkageBlock(ctx.advance());
  }
}

// ─── typedef ──────────────────────────────────────────────────────────────

function parseTypedef(ctx: ParserContext): TopLevelItem | null {
  const start = ctx.expect(TokenKind.Typedef);
  skipQualifiers(ctx);

  if (ctx.check(TokenKind.Struct)) {
    const structToken = ctx.advance();
    let tag: string | null = null;
    if (ctx.check(TokenKind.Identifier)) {
      tag = ctx.advance().lexeme;
    }

    if (ctx.check(TokenKind.LeftBrace)) {
      const fields = parseStructBody(ctx, tag ?? "anonymous struct");
      const name = ctx.expectIdentifier();
      const end = ctx.expect(TokenKind.Semicolon);
      return {
        kind: "StructDecl",
        name: name.lexeme,
        tag,
        fields,
        span: { start: start.span.start, end: end.span.end },
        location: ctx.locationOf(structToken),
      };
    }

    // typedef struct Tag Alias;
    if (tag !== null && ctx.check(TokenKind.Identifier) && ctx.peekNext()?.kind === TokenKind.Semicolon) {
      return finishAlias(ctx, start, { typeName: tag, isStructRef: true });
    }

    skipDeclaration(ctx);
    return null;
  }

  if (!startsTypeSpec(ctx)) {
    skipDeclaration(ctx);
    return null;
  }

  const pos = ctx.savePos();
  const diagnosticsLength = ctx.saveDiagnosticsLength();
  const spec = parseTypeSpec(ctx);
  skipQualifiers(ctx);
  if (ctx.check(TokenKind.Identifier) && ctx.peekNext()?.kind === TokenKind.Semicolon) {
    return finishAlias(ctx, start, spec);
  }

  // Array, pointer and function typedefs are not aliases we can use
  ctx.restorePos(pos);
  ctx.restoreDiagnosticsLength(diagnosticsLength);
  skipDeclaration(ctx);
  return null;
}

function finishAlias(ctx: ParserContext, start: Token, spec: TypeSpec): TypeAliasDecl {
  const name = ctx.expectIdentifier();
  const end = ctx.expect(TokenKind.Semicolon);
  return {
    kind: "TypeAliasDecl",
    name: name.lexeme,
    typeName: spec.typeName,
    isStructRef: spec.isStructRef,
    span: { start: start.span.start, end: end.span.end },
    location: ctx.locationOf(name),
  };
}

// ─── struct Tag { ... }; ──────────────────────────────────────────────────

function parseTaggedStruct(ctx: ParserContext): StructDecl | null {
  const start = ctx.current();
  if (ctx.peekNext()?.kind !== TokenKind.Identifier || ctx.peekAt(2)?.kind !== TokenKind.LeftBrace) {
    // Forward declaration, variable of struct type, or anonymous struct variable
    skipDeclaration(ctx);
    return null;
  }

  ctx.expect(TokenKind.Struct);
  const tag = ctx.expectIdentifier().lexeme;
  const fields = parseStructBody(ctx, tag);
  const decl: StructDecl = {
    kind: "StructDecl",
    name: tag,
    tag,
    fields,
    span: { start: start.span.start, end: ctx.previous().span.end },
    location: ctx.locationOf(start),
  };

  if (ctx.check(TokenKind.Semicolon)) {
    decl.span.end = ctx.advance().span.end;
  } else {
    // `struct Tag { ... } instance;` also defines a variable, which we skip
    skipDeclaration(ctx);
  }
  return decl;
}

// ─── Struct bodies ────────────────────────────────────────────────────────

function parseStructBody(ctx: ParserContext, owner: string): FieldDecl[] {
  const open = ctx.expect(TokenKind.LeftBrace);
  const diagnosticsBefore = ctx.saveDiagnosticsLength();
  const fields: FieldDecl[] = [];

  while (!ctx.check(TokenKind.RightBrace)) {
    if (ctx.isAtEnd()) {
      ctx.addError(
        `Unterminated body of struct '${owner}' (opened at ${open.line}:${open.column})`,
        open
      );
      ctx.throwParseError();
    }
    try {
      fields.push(...parseMember(ctx, owner));
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      ctx.synchronizeMember();
    }
  }
  ctx.expect(TokenKind.RightBrace);

  if (fields.length === 0 && ctx.saveDiagnosticsLength() === diagnosticsBefore) {
    ctx.addError(`struct '${owner}' has no members`, open);
  }
  return fields;
}

function parseMember(ctx: ParserContext, owner: string): FieldDecl[] {
  skipQualifiers(ctx);
  const token = ctx.current();

  if (token.kind === TokenKind.Union) {
    ctx.addError(`unions are not supported (member of struct '${owner}')`, token);
    ctx.throwParseError();
  }
  if (token.kind === TokenKind.Enum) {
    ctx.addError(`enum members are not supported (member of struct '${owner}')`, token);
    ctx.throwParseError();
  }
  if (
    token.kind === TokenKind.Struct &&
    (ctx.peekNext()?.kind === TokenKind.LeftBrace || ctx.peekAt(2)?.kind === TokenKind.LeftBrace)
  ) {
    ctx.addError(
      `nested struct definitions are not supported (member of struct '${owner}'); declare the struct separately`,
      token
    );
    ctx.throwParseError();
  }

  const spec = parseTypeSpec(ctx);
  skipQualifiers(ctx);

  const fields: FieldDecl[] = [];
  do {
    fields.push(parseDeclarator(ctx, spec, owner));
  } while (ctx.match(TokenKind.Comma));
  ctx.expect(TokenKind.Semicolon);
  return fields;
}

function parseDeclarator(ctx: ParserContext, spec: TypeSpec, owner: string): FieldDecl {
  const token = ctx.current();
  if (token.kind === TokenKind.Star) {
    ctx.addError(`pointer members are not supported (member of struct '${owner}')`, token);
    ctx.throwParseError();
  }
  if (token.kind === TokenKind.LeftParen) {
    ctx.addError(`function pointer members are not supported (member of struct '${owner}')`, token);
    ctx.throwParseError();
  }

  const nameToken = ctx.expectIdentifier();
  const name = nameToken.lexeme;

  const dimensions: number[] = [];
  while (ctx.match(TokenKind.LeftBracket)) {
    dimensions.push(parseDimension(ctx, name));
    ctx.expect(TokenKind.RightBracket);
  }

  let bitWidth: number | null = null;
  if (ctx.match(TokenKind.Colon)) {
    const widthToken = ctx.current();
    if (widthToken.kind !== TokenKind.IntLiteral || typeof widthToken.value !== "number") {
      ctx.addError(
        `Bit-field width of '${name}' must be an integer literal, found ${describeToken(widthToken)}`,
        widthToken
      );
      ctx.throwParseError();
    }
    ctx.advance();
    bitWidth = widthToken.value;
  }

  return {
    kind: "FieldDecl",
    name,
    typeName: spec.typeName,
    isStructRef: spec.isStructRef,
    dimensions,
    bitWidth,
    span: { start: nameToken.span.start, end: ctx.previous().span.end },
    location: ctx.locationOf(nameToken),
  };
}

function parseDimension(ctx: ParserContext, name: string): number {
  const token = ctx.current();
  if (token.kind === TokenKind.RightBracket) {
    ctx.addError(`flexible array member '${name}' is not supported`, token);
    ctx.throwParseError();
  }
  if (token.kind !== TokenKind.IntLiteral || typeof token.value !== "number") {
    ctx.addError(
      `Array dimension of '${name}' must be an integer literal, found ${describeToken(token)}`,
      token
    );
    ctx.throwParseError();
  }
  if (token.value <= 0) {
    ctx.addError(`Array dimension of '${name}' must be positive`, token);
    ctx.throwParseError();
  }
  ctx.advance();
  return token.value;
}

// ─── Skipping ─────────────────────────────────────────────────────────────

function skipQualifiers(ctx: ParserContext): void {
  while (ctx.match(TokenKind.Const, TokenKind.Volatile)) {
    // qualifiers do not affect layout
  }
}

/**
 * Skips one top-level construct: up to a `;` at brace depth 0, or to the
 * closing brace of a function body.
 */
function skipDeclaration(ctx: ParserContext): void {
  const start = ctx.current();
  const openBraces: Token[] = [];

  while (!ctx.isAtEnd()) {
    const token = ctx.current();
    if (openBraces.length === 0 && token !== start && isDirective(token)) return;
    ctx.advance();

    if (token.kind === TokenKind.LeftBrace) {
      openBraces.push(token);
    } else if (token.kind === TokenKind.RightBrace) {
      if (openBraces.pop() === undefined) {
        ctx.addError("Unmatched '}'", token);
        return;
      }
      if (openBraces.length === 0 && !continuesDeclaration(ctx.current())) return;
    } else if (token.kind === TokenKind.Semicolon && openBraces.length === 0) {
      return;
    }
  }

  const unclosed = openBraces[0];
  if (unclosed !== undefined) {
    ctx.addError(`Unterminated block (opened at ${unclosed.line}:${unclosed.column})`, unclosed);
  }
}

function isDirective(token: Token): boolean {
  return token.kind === TokenKind.Include || token.kind === TokenKind.SystemInclude;
}

/** After a closing brace, these mean the declaration goes on (`} name;`, `} *ptr;`). */
function continuesDeclaration(token: Token): boolean {
  return (
    token.kind === TokenKind.Semicolon ||
    token.kind === TokenKind.Identifier ||
    token.kind === TokenKind.Star ||
    token.kind === TokenKind.Comma
  );
}
