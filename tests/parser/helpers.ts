import type { FieldDecl, HeaderFile, StructDecl } from "../../src/ast/nodes.ts";
import type { Diagnostic } from "../../src/errors/index.ts";
import { Lexer } from "../../src/lexer/index.ts";
import { Parser, parseHeader } from "../../src/parser/index.ts";
import { SourceFile } from "../../src/utils/source.ts";

export function parse(text: string): HeaderFile {
  return parseHeader(text, "test.h");
}

/** Parses without throwing, returning every parser diagnostic. */
export function parseWithDiagnostics(text: string): {
  header: HeaderFile;
  diagnostics: ReadonlyArray<Diagnostic>;
} {
  const lexer = new Lexer(new SourceFile("test.h", text));
  const parser = new Parser(lexer.tokenize(), "test.h");
  const header = parser.parse();
  return { header, diagnostics: parser.getDiagnostics() };
}

export function errorMessages(text: string): string[] {
  return parseWithDiagnostics(text).diagnostics.map((d) => d.message);
}

export function structs(header: HeaderFile): StructDecl[] {
  return header.declarations.filter((d): d is StructDecl => d.kind === "StructDecl");
}

export function onlyStruct(text: string): StructDecl {
  const found = structs(parse(text));
  if (found.length !== 1) {
    throw new Error(`expected one struct, found ${found.length}`);
  }
  return found[0];
}

/** `name:type[dims]:width` summary of each field, for compact assertions. */
export function describeFields(decl: StructDecl): string[] {
  return decl.fields.map((f: FieldDecl) => {
    const dims = f.dimensions.map((d) => `[${d}]`).join("");
    const width = f.bitWidth === null ? "" : `:${f.bitWidth}`;
    const struct = f.isStructRef ? "struct " : "";
    return `${f.name}:${struct}${f.typeName}${dims}${width}`;
  });
}
