/**
 * Tests for include resolution over in-memory headers
 */

import { describe, expect, test } from "vitest";
import {
  CircularDependencyError,
  MissingSourceError,
  StructSyntaxError,
} from "../../src/errors/index.ts";
import { buildRegistryFromFiles, IncludeResolver, MemorySourceProvider } from "../../src/modules/index.ts";

function resolveFiles(files: Record<string, string>, entries: string[]) {
  return new IncludeResolver(new MemorySourceProvider(files)).resolve(entries);
}

describe("IncludeResolver", () => {
  test("should parse includes before the including header", () => {
    const result = resolveFiles(
      {
        "main.h": '#include "types.h"\ntypedef struct { Vec v; } Body;',
        "types.h": "typedef struct { int8_t x; int8_t y; int8_t z; } Vec;",
      },
      ["main.h"]
    );
    expect(result.headers.map((h) => h.filename)).toEqual(["types.h", "main.h"]);
    expect([...result.sources.keys()]).toEqual(["main.h", "types.h"]);
    expect(result.diagnostics).toEqual([]);
  });

  test("should resolve includes relative to the including header", () => {
    const result = resolveFiles(
      {
        "net/packet.h": '#include "../common/ids.h"\ntypedef struct { DeviceId id; } Packet;',
        "common/ids.h": "typedef struct { uint16_t value; } DeviceId;",
      },
      ["net/packet.h"]
    );
    expect(result.headers.map((h) => h.filename)).toEqual(["common/ids.h", "net/packet.h"]);
  });

  test("should parse a shared include once", () => {
    const result = resolveFiles(
      {
        "a.h": '#include "common.h"\ntypedef struct { Common c; } A;',
        "b.h": '#include "common.h"\ntypedef struct { Common c; } B;',
        "common.h": "typedef struct { uint8_t v; } Common;",
      },
      ["a.h", "b.h", "a.h"]
    );
    expect(result.headers.map((h) => h.filename)).toEqual(["common.h", "a.h", "b.h"]);
  });

  test("should warn about missing includes and carry on", () => {
    const result = resolveFiles(
      { "main.h": '#include <stdint.h>\n#include "gone.h"\ntypedef struct { uint8_t v; } M;' },
      ["main.h"]
    );
    expect(result.headers).toHaveLength(1);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({
      severity: "warning",
      message: "cannot find included header 'gone.h'; skipping it",
      location: { file: "main.h", line: 2 },
    });
  });

  test("should reject a missing entry header", () => {
    expect(() => resolveFiles({}, ["nope.h"])).toThrow(MissingSourceError);
    expect(() => resolveFiles({}, ["nope.h"])).toThrow("cannot read header 'nope.h'");
  });

  test("should reject include cycles", () => {
    const files = { "a.h": '#include "b.h"\n', "b.h": '#include "a.h"\n' };
    expect(() => resolveFiles(files, ["a.h"])).toThrow(CircularDependencyError);
    expect(() => resolveFiles(files, ["a.h"])).toThrow("Circular include dependency detected: a.h -> b.h -> a.h");
  });

  test("should reject a header that includes itself", () => {
    expect(() => resolveFiles({ "self.h": '#include "self.h"\n' }, ["self.h"])).toThrow(
      "Circular include dependency detected: self.h -> self.h"
    );
  });

  test("should report syntax errors in included headers by file", () => {
    const files = { "main.h": '#include "bad.h"\n', "bad.h": "struct Bad {};" };
    expect(() => resolveFiles(files, ["main.h"])).toThrow(StructSyntaxError);
    expect(() => resolveFiles(files, ["main.h"])).toThrow("bad.h:1:12: struct 'Bad' has no members");
  });
});

describe("buildRegistryFromFiles", () => {
  test("should build layouts from every reachable header", () => {
    const { registry, diagnostics, sources } = buildRegistryFromFiles(
      ["main.h"],
      new MemorySourceProvider({
        "main.h": '#include "types.h"\ntypedef struct { Vec v; uint8_t flags; } Body;',
        "types.h": "typedef struct { int8_t x; int8_t y; int8_t z; } Vec;",
      })
    );
    expect(registry.structNames()).toEqual(["Vec", "Body"]);
    expect(registry.sizeOf("Body")).toBe(4);
    expect(diagnostics).toEqual([]);
    expect(sources.get("types.h")?.lineText(1)).toBe("typedef struct { int8_t x; int8_t y; int8_t z; } Vec;");
  });
});
