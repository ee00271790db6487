export { resolveDeclarations, resolveOrder } from "./resolver.ts";
export { type ResolvedType, TypeScope } from "./scope.ts";
