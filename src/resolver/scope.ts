/**
 * Type scope: the merged namespace of every parsed header.
 *
 * Struct names, struct tags and typedef aliases from all sources land here.
 * Lookups follow C's split between the tag namespace (`struct Tag`) and the
 * ordinary identifier namespace (`Name`), with one relaxation: a bare
 * identifier that only exists as a tag still resolves, since headers in the
 * wild often rely on compilers that accept it.
 */

import type { Declaration, FieldDecl, HeaderFile, StructDecl, TypeAliasDecl } from "../ast/nodes.ts";
import { type PrimitiveType, lookupPrimitive } from "../catalog/index.ts";
import type { SourceLocation } from "../errors/diagnostic.ts";
import {
  CircularDependencyError,
  DuplicateDeclarationError,
  UnknownTypeError,
} from "../errors/errors.ts";

export type ResolvedType =
  | { kind: "primitive"; type: PrimitiveType }
  | { kind: "struct"; decl: StructDecl };

export class TypeScope {
  private structs = new Map<string, StructDecl>();
  private tags = new Map<string, StructDecl>();
  private aliases = new Map<string, TypeAliasDecl>();
  private order: StructDecl[] = [];

  static fromHeaders(headers: ReadonlyArray<HeaderFile>): TypeScope {
    return TypeScope.fromDeclarations(headers.flatMap((h) => h.declarations));
  }

  static fromDeclarations(declarations: ReadonlyArray<Declaration>): TypeScope {
    const scope = new TypeScope();
    for (const decl of declarations) {
      if (decl.kind === "StructDecl") {
        scope.declareStruct(decl);
      } else {
        scope.declareAlias(decl);
      }
    }
    // Surface unknown or cyclic alias targets even when no field uses them
    for (const alias of scope.aliases.values()) {
      scope.resolveAlias(alias, []);
    }
    return scope;
  }

  /** Struct declarations in source order. */
  structDecls(): ReadonlyArray<StructDecl> {
    return this.order;
  }

  aliasDecls(): ReadonlyArray<TypeAliasDecl> {
    return [...this.aliases.values()];
  }

  /** Finds a struct by its typedef name or its tag. */
  lookupStruct(name: string): StructDecl | undefined {
    return this.structs.get(name) ?? this.tags.get(name);
  }

  /** Resolves a bare type name the way a field declared with it would. */
  resolveName(name: string): ResolvedType | undefined {
    return this.lookup(name, false, []);
  }

  /** Resolves the type a field is declared with. */
  resolveField(owner: StructDecl, field: FieldDecl): ResolvedType {
    const resolved = this.lookup(field.typeName, field.isStructRef, []);
    if (resolved === undefined) {
      throw new UnknownTypeError(
        field.typeName,
        `unknown type '${field.typeName}' for field '${field.name}' in struct '${owner.name}'`,
        field.location
      );
    }
    return resolved;
  }

  // ─── Declaration ─────────────────────────────────────────────────────────

  private declareStruct(decl: StructDecl): void {
    this.checkOrdinaryName(decl.name, "struct", decl.location);

    if (decl.tag !== null) {
      const previous = this.tags.get(decl.tag);
      if (previous !== undefined) {
        throw new DuplicateDeclarationError(decl.tag, "struct tag", decl.location, previous.location);
      }
      this.tags.set(decl.tag, decl);
    }

    const seen = new Map<string, FieldDecl>();
    for (const field of decl.fields) {
      const previous = seen.get(field.name);
      if (previous !== undefined) {
        throw new DuplicateDeclarationError(
          `${decl.name}.${field.name}`,
          "field",
          field.location,
          previous.location
        );
      }
      seen.set(field.name, field);
    }

    this.structs.set(decl.name, decl);
    this.order.push(decl);
  }

  private declareAlias(decl: TypeAliasDecl): void {
    // `typedef struct Point Point;` names the tag in the ordinary namespace
    if (decl.isStructRef && decl.typeName === decl.name) return;

    this.checkOrdinaryName(decl.name, "typedef", decl.location);
    this.aliases.set(decl.name, decl);
  }

  private checkOrdinaryName(name: string, what: string, location: SourceLocation): void {
    if (lookupPrimitive(name) !== undefined) {
      throw new DuplicateDeclarationError(name, what, location, {
        file: "<builtin>",
        line: 0,
        column: 0,
        offset: 0,
      });
    }
    const previous = this.structs.get(name) ?? this.aliases.get(name);
    if (previous !== undefined) {
      throw new DuplicateDeclarationError(name, what, location, previous.location);
    }
  }

  // ─── Lookup ──────────────────────────────────────────────────────────────

  private lookup(name: string, isStructRef: boolean, chain: string[]): ResolvedType | undefined {
    if (isStructRef) {
      const decl = this.tags.get(name) ?? this.structs.get(name);
      return decl === undefined ? undefined : { kind: "struct", decl };
    }

    const primitive = lookupPrimitive(name);
    if (primitive !== undefined) return { kind: "primitive", type: primitive };

    const alias = this.aliases.get(name);
    if (alias !== undefined) return this.resolveAlias(alias, chain);

    const decl = this.structs.get(name) ?? this.tags.get(name);
    return decl === undefined ? undefined : { kind: "struct", decl };
  }

  private resolveAlias(alias: TypeAliasDecl, chain: string[]): ResolvedType {
    if (chain.includes(alias.name)) {
      const cycle = chain.slice(chain.indexOf(alias.name)).concat(alias.name);
      throw new CircularDependencyError("typedef", cycle);
    }
    const resolved = this.lookup(alias.typeName, alias.isStructRef, [...chain, alias.name]);
    if (resolved === undefined) {
      throw new UnknownTypeError(
        alias.typeName,
        `unknown type '${alias.typeName}' in typedef '${alias.name}'`,
        alias.location
      );
    }
    return resolved;
  }
}
