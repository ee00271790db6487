export type { BaseNode } from "./base.ts";

export type { Declaration, FieldDecl, StructDecl, TypeAliasDecl } from "./declarations.ts";

export type { HeaderFile, IncludeDirective } from "./header.ts";
