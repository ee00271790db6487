import type { HeaderFile } from "../ast/nodes.ts";
import { isError } from "../errors/diagnostic.ts";
import { StructSyntaxError } from "../errors/errors.ts";
import { Lexer } from "../lexer/index.ts";
import { SourceFile } from "../utils/source.ts";
import { Parser } from "./parser.ts";

export { Parser, type ParserContext } from "./parser.ts";
export { normalizeSpecifiers } from "./type-spec.ts";

/**
 * Lex and parse one header.
 *
 * @throws StructSyntaxError carrying every lexer and parser error diagnostic,
 *   if there were any.
 */
export function parseHeader(content: string, filename = "<input>"): HeaderFile {
  return parseSource(new SourceFile(filename, content));
}

export function parseSource(source: SourceFile): HeaderFile {
  const lexer = new Lexer(source);
  const tokens = lexer.tokenize();
  const parser = new Parser(tokens, source.filename);
  const header = parser.parse();

  const diagnostics = [...lexer.getDiagnostics(), ...parser.getDiagnostics()];
  if (diagnostics.some(isError)) {
    throw new StructSyntaxError(diagnostics);
  }
  return header;
}
