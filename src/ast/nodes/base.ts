import type { SourceLocation } from "../../errors/diagnostic.ts";
import type { Span } from "../../lexer/token.ts";

/** Common fields shared by all AST nodes. */
export interface BaseNode {
  kind: string;
  span: Span;
  /** Where the node starts; declarations from several headers are merged, so each keeps its file. */
  location: SourceLocation;
}
