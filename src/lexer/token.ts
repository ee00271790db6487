/**
 * Token types and keyword lookup tables for the C header lexer.
 *
 * Only the part of C that matters for struct declarations gets its own token
 * kind; every other operator character is lexed as {@link TokenKind.Operator}
 * so the parser can skip declarations it does not understand.
 *
 * @module token
 */

/** Byte-offset range within source text (half-open: `[start, end)`). */
export interface Span {
  start: number;
  end: number;
}

/** Discriminator for every token the lexer can produce. */
export enum TokenKind {
  // Special tokens
  Eof = "EOF",
  Error = "Error",

  // Literals
  IntLiteral = "IntLiteral",
  FloatLiteral = "FloatLiteral",
  StringLiteral = "StringLiteral",
  CharLiteral = "CharLiteral",

  // Identifiers
  Identifier = "Identifier",

  // Preprocessor
  Include = "#include",
  SystemInclude = "#include <>",

  // Declaration keywords
  Typedef = "typedef",
  Struct = "struct",
  Union = "union",
  Enum = "enum",
  Const = "const",
  Volatile = "volatile",
  Static = "static",
  Extern = "extern",

  // Type specifier keywords
  Void = "void",
  Char = "char",
  Short = "short",
  Int = "int",
  Long = "long",
  Float = "float",
  Double = "double",
  Signed = "signed",
  Unsigned = "unsigned",

  // Punctuation
  LeftBrace = "{",
  RightBrace = "}",
  LeftParen = "(",
  RightParen = ")",
  LeftBracket = "[",
  RightBracket = "]",
  Semicolon = ";",
  Colon = ":",
  Comma = ",",
  Star = "*",

  // Any other operator character (`=`, `+`, `<<`, ...)
  Operator = "Operator",
}

/**
 * A single lexical token produced by the {@link Lexer}.
 *
 * Literals and include directives carry a pre-parsed `value`: the integer for
 * an int literal, the path for an include.
 */
export interface Token {
  kind: TokenKind;
  /** Raw source text that was consumed to produce this token. */
  lexeme: string;
  span: Span;
  /** 1-based line number where the token starts. */
  line: number;
  /** 1-based column number where the token starts. */
  column: number;
  value?: number | string;
}

const KEYWORD_MAP: ReadonlyMap<string, TokenKind> = new Map([
  ["typedef", TokenKind.Typedef],
  ["struct", TokenKind.Struct],
  ["union", TokenKind.Union],
  ["enum", TokenKind.Enum],
  ["const", TokenKind.Const],
  ["volatile", TokenKind.Volatile],
  ["static", TokenKind.Static],
  ["extern", TokenKind.Extern],
  ["void", TokenKind.Void],
  ["char", TokenKind.Char],
  ["short", TokenKind.Short],
  ["int", TokenKind.Int],
  ["long", TokenKind.Long],
  ["float", TokenKind.Float],
  ["double", TokenKind.Double],
  ["signed", TokenKind.Signed],
  ["unsigned", TokenKind.Unsigned],
]);

/** Keywords that may appear in a primitive type specifier sequence. */
export const TYPE_SPECIFIER_KEYWORDS: ReadonlySet<TokenKind> = new Set([
  TokenKind.Char,
  TokenKind.Short,
  TokenKind.Int,
  TokenKind.Long,
  TokenKind.Float,
  TokenKind.Double,
  TokenKind.Signed,
  TokenKind.Unsigned,
]);

/** Returns the keyword {@link TokenKind} for `identifier`, or `undefined` if it is not a keyword. */
export function lookupKeyword(identifier: string): TokenKind | undefined {
  return KEYWORD_MAP.get(identifier);
}
