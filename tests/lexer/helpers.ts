import type { Diagnostic } from "../../src/errors/index.ts";
import { Lexer, type Token, TokenKind } from "../../src/lexer/index.ts";
import { SourceFile } from "../../src/utils/source.ts";

export function lex(text: string): { tokens: Token[]; diagnostics: ReadonlyArray<Diagnostic> } {
  const lexer = new Lexer(new SourceFile("test.h", text));
  const tokens = lexer.tokenize();
  return { tokens, diagnostics: lexer.getDiagnostics() };
}

/** Token kinds without the trailing EOF. */
export function kinds(text: string): TokenKind[] {
  return lex(text)
    .tokens.filter((t) => t.kind !== TokenKind.Eof)
    .map((t) => t.kind);
}
