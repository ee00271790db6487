/**
 * Dependency resolution for struct declarations.
 *
 * A struct depends on every struct its fields reference, directly or
 * through a typedef. The resolver orders declarations so that each struct
 * comes after its dependencies, which is the order the layout calculator
 * needs.
 */

import type { Declaration, StructDecl } from "../ast/nodes.ts";
import { CircularDependencyError } from "../errors/errors.ts";
import { TypeScope } from "./scope.ts";

/**
 * Depth-first topological sort of the struct reference graph.
 *
 * Returns structs dependencies first; among independent structs, source
 * order is kept. A reference back into the current traversal path raises
 * {@link CircularDependencyError} with the cycle spelled out, e.g.
 * `A -> B -> A`.
 */
export function resolveOrder(scope: TypeScope): StructDecl[] {
  const sorted: StructDecl[] = [];
  const visited = new Set<StructDecl>();
  const inStack = new Set<StructDecl>();

  const visit = (decl: StructDecl, path: string[]): void => {
    if (inStack.has(decl)) {
      const cycleStart = path.indexOf(decl.name);
      const cycle = path.slice(cycleStart).concat(decl.name);
      throw new CircularDependencyError("struct", cycle);
    }
    if (visited.has(decl)) return;

    inStack.add(decl);
    for (const field of decl.fields) {
      const type = scope.resolveField(decl, field);
      if (type.kind === "struct") {
        visit(type.decl, [...path, decl.name]);
      }
    }
    inStack.delete(decl);
    visited.add(decl);
    sorted.push(decl);
  };

  for (const decl of scope.structDecls()) {
    visit(decl, []);
  }
  return sorted;
}

/** Builds a scope from bare declarations and orders its structs. */
export function resolveDeclarations(declarations: ReadonlyArray<Declaration>): StructDecl[] {
  return resolveOrder(TypeScope.fromDeclarations(declarations));
}
