export { Lexer } from "./lexer.ts";
export { lookupKeyword, type Span, TYPE_SPECIFIER_KEYWORDS, type Token, TokenKind } from "./token.ts";
