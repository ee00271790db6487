/**
 * Command-line front end: load headers, print layouts, convert between
 * binary dumps and JSON.
 */

import { existsSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { isStructInput, type StructValue } from "../codec/values.ts";
import { DEFAULT_ENDIANNESS, type Endianness, isEndianness } from "../config.ts";
import type { Diagnostic } from "../errors/diagnostic.ts";
import { StructError } from "../errors/errors.ts";
import { formatDiagnostic } from "../errors/format.ts";
import { buildRegistryFromFiles, type LoadResult, loadHeaderDirectory } from "../modules/loader.ts";
import { NodeSourceProvider } from "../modules/node-provider.ts";
import { printLayout } from "../printer/tree.ts";
import type { Registry } from "../registry/registry.ts";
import { SourceFile } from "../utils/source.ts";

export const VERSION = "0.1.0";

/** Flags followed by a value. */
const VALUE_FLAGS = new Set(["--struct", "--unpack", "--pack", "-o", "--output", "--endian"]);
const SWITCH_FLAGS = new Set(["--tree", "--help", "-h", "--version", "-V"]);

export interface CliOutput {
  log(text: string): void;
  error(text: string): void;
}

const consoleOutput: CliOutput = {
  log: (text) => console.log(text),
  error: (text) => console.error(text),
};

export interface CliOptions {
  input: string | null;
  struct: string | null;
  tree: boolean;
  unpack: string | null;
  pack: string | null;
  output: string | null;
  endianness: Endianness;
  help: boolean;
  version: boolean;
}

export class UsageError extends Error {}

// ─── Argument parsing ────────────────────────────────────────────────────────

export function parseArgs(args: ReadonlyArray<string>): CliOptions {
  const options: CliOptions = {
    input: null,
    struct: null,
    tree: false,
    unpack: null,
    pack: null,
    output: null,
    endianness: DEFAULT_ENDIANNESS,
    help: false,
    version: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    if (!arg.startsWith("-")) {
      if (options.input !== null) {
        throw new UsageError(`unexpected argument '${arg}'`);
      }
      options.input = arg;
      continue;
    }

    if (SWITCH_FLAGS.has(arg)) {
      if (arg === "--tree") options.tree = true;
      else if (arg === "--help" || arg === "-h") options.help = true;
      else options.version = true;
      continue;
    }

    if (!VALUE_FLAGS.has(arg)) {
      throw new UsageError(`unknown flag '${arg}'`);
    }
    const value = args[i + 1];
    if (value === undefined) {
      throw new UsageError(`flag '${arg}' needs a value`);
    }
    i++;

    switch (arg) {
      case "--struct":
        options.struct = value;
        break;
      case "--unpack":
        options.unpack = value;
        break;
      case "--pack":
        options.pack = value;
        break;
      case "--endian":
        if (!isEndianness(value)) {
          throw new UsageError(`--endian must be 'little' or 'big', got '${value}'`);
        }
        options.endianness = value;
        break;
      default:
        options.output = value;
    }
  }

  if (options.unpack !== null && options.pack !== null) {
    throw new UsageError("--unpack and --pack cannot be combined");
  }
  return options;
}

function helpText(): string {
  return `cstruct ${VERSION}: packed C struct layouts and binary codec

Usage: cstruct <header.h | header-dir> [options]

Options:
  --struct <name>     Struct to print, pack or unpack
  --tree              Print full layout trees instead of sizes
  --unpack <file>     Decode a binary file to JSON
  --pack <file>       Encode a JSON file to binary
  -o, --output <file> Write the result to a file
  --endian <order>    Byte order: little (default) or big
  --help, -h          Show this help message
  --version, -V       Show the version

Without --unpack or --pack, every struct (or just --struct) is listed.

Examples:
  cstruct include/ --tree
  cstruct proto.h --struct Packet --unpack dump.bin
  cstruct proto.h --struct Packet --pack packet.json -o packet.bin`;
}

// ─── JSON helpers ────────────────────────────────────────────────────────────

/** Decimal strings become bigints so 64-bit values survive JSON. */
export function parseValueJson(text: string): unknown {
  return JSON.parse(text, (_key: string, value: unknown) =>
    typeof value === "string" && /^-?\d+$/.test(value) ? BigInt(value) : value
  );
}

export function stringifyValue(value: StructValue): string {
  return JSON.stringify(value, (_key: string, v: unknown) => (typeof v === "bigint" ? v.toString() : v), 2);
}

export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(" ");
}

// ─── Commands ────────────────────────────────────────────────────────────────

function loadInput(input: string): LoadResult {
  if (!existsSync(input)) {
    throw new UsageError(`no such file or directory '${input}'`);
  }
  if (statSync(input).isDirectory()) {
    return loadHeaderDirectory(input);
  }
  return buildRegistryFromFiles([input], new NodeSourceProvider());
}

function readInputFile(path: string): Buffer {
  if (!existsSync(path) || !statSync(path).isFile()) {
    throw new UsageError(`could not read file '${path}'`);
  }
  return readFileSync(path);
}

function requireStruct(options: CliOptions, registry: Registry, command: string): string {
  if (options.struct === null) {
    throw new UsageError(`${command} needs --struct <name>`);
  }
  // Fails with the registry's own error for unknown names
  registry.layoutOf(options.struct);
  return options.struct;
}

function runUnpack(options: CliOptions, registry: Registry, file: string, out: CliOutput): void {
  const name = requireStruct(options, registry, "--unpack");
  const value = registry.unpack(readInputFile(file), name, options.endianness);
  const json = stringifyValue(value);
  if (options.output !== null) {
    writeFileSync(options.output, `${json}\n`);
    out.log(`Wrote ${options.output}`);
  } else {
    out.log(json);
  }
}

function runPack(options: CliOptions, registry: Registry, file: string, out: CliOutput): void {
  const name = requireStruct(options, registry, "--pack");
  const text = readInputFile(file).toString("utf-8");

  let parsed: unknown;
  try {
    parsed = parseValueJson(text);
  } catch (err) {
    if (!(err instanceof SyntaxError)) throw err;
    throw new UsageError(`invalid JSON in '${file}': ${err.message}`);
  }
  if (!isStructInput(parsed)) {
    throw new UsageError(`'${file}' must hold a JSON object`);
  }

  const bytes = registry.pack(parsed, name, options.endianness);
  if (options.output !== null) {
    writeFileSync(options.output, bytes);
    out.log(`Wrote ${bytes.length} bytes to ${options.output}`);
  } else {
    out.log(toHex(bytes));
  }
}

function runList(options: CliOptions, registry: Registry, out: CliOutput): void {
  const names = options.struct !== null ? [options.struct] : registry.structNames();
  if (names.length === 0) {
    out.log("No structs found.");
    return;
  }
  if (options.tree) {
    out.log(names.map((name) => printLayout(registry.layoutOf(name))).join("\n\n"));
  } else {
    for (const name of names) {
      out.log(`${name}: ${registry.sizeOf(name)} bytes`);
    }
  }
}

// ─── Error reporting ─────────────────────────────────────────────────────────

function reportDiagnostics(diagnostics: ReadonlyArray<Diagnostic>, out: CliOutput): void {
  const provider = new NodeSourceProvider();
  const sources = new Map<string, SourceFile | undefined>();
  for (const diag of diagnostics) {
    const file = diag.location.file;
    if (!sources.has(file)) {
      const content = file === "" ? null : provider.read(file);
      sources.set(file, content === null ? undefined : new SourceFile(file, content));
    }
    out.error(formatDiagnostic(diag, sources.get(file)));
  }
}

/** Runs the CLI and returns the process exit code. */
export function main(args: ReadonlyArray<string>, out: CliOutput = consoleOutput): number {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    out.error(`error: ${err.message}`);
    out.error("Run with --help to see available options.");
    return 1;
  }

  if (options.help) {
    out.log(helpText());
    return 0;
  }
  if (options.version) {
    out.log(`cstruct ${VERSION}`);
    return 0;
  }
  if (options.input === null) {
    out.error("error: no header file or directory provided\n");
    out.log(helpText());
    return 1;
  }

  try {
    const loaded = loadInput(options.input);
    reportDiagnostics(loaded.diagnostics, out);

    if (options.unpack !== null) {
      runUnpack(options, loaded.registry, options.unpack, out);
    } else if (options.pack !== null) {
      runPack(options, loaded.registry, options.pack, out);
    } else {
      runList(options, loaded.registry, out);
    }
    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      out.error(`error: ${err.message}`);
      return 1;
    }
    if (!(err instanceof StructError)) throw err;
    if (err.diagnostics.length > 0 && err.diagnostics.some((d) => d.location.line > 0)) {
      reportDiagnostics(err.diagnostics, out);
    } else {
      out.error(`error: ${err.message}`);
    }
    return 1;
  }
}
