/**
 * The struct registry: every layout from a set of headers, built once and
 * read-only afterwards.
 */

import type { HeaderFile } from "../ast/nodes.ts";
import { pack, unpack } from "../codec/codec.ts";
import type { StructInput, StructValue } from "../codec/values.ts";
import { DEFAULT_ENDIANNESS, type Endianness } from "../config.ts";
import { UnknownTypeError } from "../errors/errors.ts";
import { LayoutCalculator } from "../layout/calculator.ts";
import type { StructLayout } from "../layout/types.ts";
import { parseHeader } from "../parser/index.ts";
import { resolveOrder } from "../resolver/resolver.ts";
import { TypeScope } from "../resolver/scope.ts";

/** A header handed over in memory. */
export interface SourceInput {
  filename: string;
  content: string;
}

export class Registry {
  private readonly layouts: ReadonlyMap<string, StructLayout>;
  private readonly names: ReadonlyArray<string>;

  private constructor(layouts: ReadonlyMap<string, StructLayout>, names: ReadonlyArray<string>) {
    this.layouts = layouts;
    this.names = names;
  }

  /**
   * Resolves and lays out every struct declared across `headers`.
   * Struct tags become additional keys for the same layout.
   */
  static fromHeaders(headers: ReadonlyArray<HeaderFile>): Registry {
    const scope = TypeScope.fromHeaders(headers);
    const ordered = resolveOrder(scope);
    const calculator = new LayoutCalculator(scope);
    calculator.layoutAll(ordered);

    const layouts = new Map<string, StructLayout>();
    for (const decl of scope.structDecls()) {
      const layout = calculator.layoutOf(decl);
      layouts.set(decl.name, layout);
      if (decl.tag !== null && !layouts.has(decl.tag)) {
        layouts.set(decl.tag, layout);
      }
    }
    // Aliases of structs (`typedef struct Tag Alias;`) are lookups too
    for (const alias of scope.aliasDecls()) {
      const target = scope.resolveName(alias.name);
      if (target?.kind === "struct" && !layouts.has(alias.name)) {
        layouts.set(alias.name, calculator.layoutOf(target.decl));
      }
    }

    return new Registry(layouts, Object.freeze(scope.structDecls().map((d) => d.name)));
  }

  /** @throws UnknownTypeError if no struct is registered under `name`. */
  layoutOf(name: string): StructLayout {
    const layout = this.layouts.get(name);
    if (layout === undefined) {
      throw new UnknownTypeError(name, `unknown struct '${name}'`);
    }
    return layout;
  }

  has(name: string): boolean {
    return this.layouts.has(name);
  }

  /** Declared struct names in source order; tags and aliases are not listed. */
  structNames(): ReadonlyArray<string> {
    return this.names;
  }

  sizeOf(name: string): number {
    return this.layoutOf(name).size;
  }

  pack(value: StructInput, name: string, endianness: Endianness = DEFAULT_ENDIANNESS): Uint8Array {
    return pack(value, this.layoutOf(name), endianness);
  }

  unpack(bytes: Uint8Array, name: string, endianness: Endianness = DEFAULT_ENDIANNESS): StructValue {
    return unpack(bytes, this.layoutOf(name), endianness);
  }
}

/**
 * Parses each source and builds one registry from all of them. Includes are
 * not followed here; use `buildRegistryFromFiles` for that.
 */
export function buildRegistry(sources: ReadonlyArray<string | SourceInput>): Registry {
  const headers = sources.map((source, i) =>
    typeof source === "string"
      ? parseHeader(source, `<source ${i}>`)
      : parseHeader(source.content, source.filename)
  );
  return Registry.fromHeaders(headers);
}
