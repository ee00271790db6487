import type { BaseNode } from "./base.ts";

/**
 * One declarator of a struct member line.
 *
 * `uint8_t a, b[2][3] : 4;` yields two fields sharing `typeName`.
 */
export interface FieldDecl extends BaseNode {
  kind: "FieldDecl";
  name: string;
  /** Normalized type name: a catalog spelling, an alias, or a struct name/tag. */
  typeName: string;
  /** Written as `struct Tag name;`. */
  isStructRef: boolean;
  /** Array dimensions, outermost first; empty for scalars. */
  dimensions: number[];
  bitWidth: number | null;
}

/**
 * `typedef struct [Tag] { ... } Name;` or `struct Tag { ... };`.
 * For the tag-only form, `name` and `tag` are equal.
 */
export interface StructDecl extends BaseNode {
  kind: "StructDecl";
  name: string;
  tag: string | null;
  fields: FieldDecl[];
}

/** `typedef <type> Name;` where the target is a primitive, another alias, or a struct. */
export interface TypeAliasDecl extends BaseNode {
  kind: "TypeAliasDecl";
  name: string;
  typeName: string;
  isStructRef: boolean;
}

export type Declaration = StructDecl | TypeAliasDecl;
