import { parseHeader } from "../../src/parser/index.ts";
import { resolveOrder } from "../../src/resolver/index.ts";
import { TypeScope } from "../../src/resolver/scope.ts";

export function scopeOf(...sources: string[]): TypeScope {
  return TypeScope.fromHeaders(sources.map((text, i) => parseHeader(text, sources.length === 1 ? "test.h" : `h${i}.h`)));
}

export function orderOf(...sources: string[]): string[] {
  return resolveOrder(scopeOf(...sources)).map((decl) => decl.name);
}

/** Runs `fn` and returns what it threw. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected an error to be thrown");
}
