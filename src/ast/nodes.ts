/**
 * AST node types for C header declarations.
 * Uses discriminated unions with a `kind` field.
 */

export * from "./nodes/index.ts";
