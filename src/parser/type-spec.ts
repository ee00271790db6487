/**
 * Type specifier parsing: turns `unsigned long int`, `struct Tag` or a plain
 * identifier into the type name the catalog and resolver look up.
 */

import { type Token, TokenKind, TYPE_SPECIFIER_KEYWORDS } from "../lexer/token.ts";
import type { ParserContext } from "./parser.ts";
import { describeToken } from "./parser.ts";

export interface TypeSpec {
  typeName: string;
  /** Written with the `struct` keyword. */
  isStructRef: boolean;
}

/** True if the current token can begin a type specifier. */
export function startsTypeSpec(ctx: ParserContext): boolean {
  const kind = ctx.current().kind;
  return kind === TokenKind.Identifier || kind === TokenKind.Struct || TYPE_SPECIFIER_KEYWORDS.has(kind);
}

export function parseTypeSpec(ctx: ParserContext): TypeSpec {
  const token = ctx.current();

  if (ctx.match(TokenKind.Struct)) {
    return { typeName: ctx.expectIdentifier().lexeme, isStructRef: true };
  }

  if (TYPE_SPECIFIER_KEYWORDS.has(token.kind)) {
    const words: Token[] = [];
    while (TYPE_SPECIFIER_KEYWORDS.has(ctx.current().kind)) {
      words.push(ctx.advance());
    }
    const typeName = normalizeSpecifiers(words.map((w) => w.kind));
    if (typeName === null) {
      ctx.addError(`Invalid type specifier '${words.map((w) => w.lexeme).join(" ")}'`, token);
      ctx.throwParseError();
    }
    return { typeName, isStructRef: false };
  }

  if (token.kind === TokenKind.Identifier) {
    ctx.advance();
    return { typeName: token.lexeme, isStructRef: false };
  }

  if (token.kind === TokenKind.Void) {
    ctx.addError("'void' is not a valid member type", token);
  } else {
    ctx.addError(`Expected type name but found ${describeToken(token)}`, token);
  }
  ctx.throwParseError();
}

/**
 * Maps a sequence of C type specifier keywords, in any order, to the
 * catalog's spelling. Returns `null` for combinations C rejects.
 *
 * `unsigned` → `unsigned int`, `long int` → `long`, `signed char` stays
 * distinct from `char`.
 */
export function normalizeSpecifiers(kinds: ReadonlyArray<TokenKind>): string | null {
  const count = (kind: TokenKind): number => kinds.filter((k) => k === kind).length;
  const signed = count(TokenKind.Signed);
  const unsigned = count(TokenKind.Unsigned);
  const longs = count(TokenKind.Long);
  const shorts = count(TokenKind.Short);
  const chars = count(TokenKind.Char);
  const ints = count(TokenKind.Int);
  const floats = count(TokenKind.Float);
  const doubles = count(TokenKind.Double);

  if (
    signed + unsigned > 1 ||
    shorts > 1 ||
    chars > 1 ||
    ints > 1 ||
    floats > 1 ||
    doubles > 1 ||
    longs > 2
  ) {
    return null;
  }

  if (floats > 0 || doubles > 0) {
    if (signed + unsigned + shorts + chars + ints > 0) return null;
    if (floats > 0) return longs === 0 && doubles === 0 ? "float" : null;
    if (longs === 0) return "double";
    return longs === 1 ? "long double" : null;
  }

  const sign = unsigned > 0 ? "unsigned " : "";

  if (chars > 0) {
    if (shorts + longs + ints > 0) return null;
    if (signed > 0) return "signed char";
    return `${sign}char`;
  }

  if (shorts > 0) {
    return longs > 0 ? null : `${sign}short`;
  }

  if (longs === 2) return `${sign}long long`;
  if (longs === 1) return `${sign}long`;
  return `${sign}int`;
}
