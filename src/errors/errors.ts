/**
 * Error taxonomy for header parsing, layout computation and the binary codec.
 *
 * Every failure surfaces as a subclass of {@link StructError}. Parsing and
 * resolution errors keep the {@link Diagnostic}s that caused them so callers
 * can render them with source context; codec errors carry none.
 */

import {
  type Diagnostic,
  describeLocation,
  errorAt,
  isError,
  NO_LOCATION,
  type SourceLocation,
} from "./diagnostic.ts";

/** Largest packed struct size in bytes; offsets must fit a signed 32-bit int. */
export const MAX_STRUCT_SIZE = 2 ** 31 - 1;

export type ErrorCode =
  | "SyntaxError"
  | "UnknownTypeError"
  | "CircularDependencyError"
  | "DuplicateDeclarationError"
  | "BufferTooSmallError"
  | "InvalidBitFieldError"
  | "StructTooLargeError"
  | "InvalidValueError"
  | "MissingSourceError";

export abstract class StructError extends Error {
  abstract readonly code: ErrorCode;
  readonly diagnostics: ReadonlyArray<Diagnostic>;

  constructor(message: string, diagnostics: ReadonlyArray<Diagnostic> = []) {
    super(message);
    this.name = new.target.name;
    this.diagnostics = diagnostics;
  }
}

/** Malformed struct body, unterminated block, or unparseable member line. */
export class StructSyntaxError extends StructError {
  readonly code = "SyntaxError";

  constructor(diagnostics: ReadonlyArray<Diagnostic>) {
    const errors = diagnostics.filter(isError);
    const lines = errors.map((d) => `${describeLocation(d.location)}: ${d.message}`);
    super(lines.length > 0 ? lines.join("\n") : "syntax error", diagnostics);
  }
}

export class UnknownTypeError extends StructError {
  readonly code = "UnknownTypeError";
  readonly typeName: string;

  constructor(typeName: string, message: string, location: SourceLocation = NO_LOCATION) {
    super(message, [errorAt(location, message)]);
    this.typeName = typeName;
  }
}

/** A cycle in the struct reference graph, the typedef chain, or the include graph. */
export class CircularDependencyError extends StructError {
  readonly code = "CircularDependencyError";
  /** Cycle members in traversal order; the first member is repeated at the end. */
  readonly cycle: ReadonlyArray<string>;

  constructor(kind: "struct" | "typedef" | "include", cycle: ReadonlyArray<string>) {
    const message = `Circular ${kind} dependency detected: ${cycle.join(" -> ")}`;
    super(message, [errorAt(NO_LOCATION, message)]);
    this.cycle = cycle;
  }
}

export class DuplicateDeclarationError extends StructError {
  readonly code = "DuplicateDeclarationError";
  readonly declarationName: string;

  constructor(name: string, what: string, location: SourceLocation, previous: SourceLocation) {
    const message = `${what} '${name}' is already declared at ${describeLocation(previous)}`;
    super(`${describeLocation(location)}: ${message}`, [errorAt(location, message)]);
    this.declarationName = name;
  }
}

export class InvalidBitFieldError extends StructError {
  readonly code = "InvalidBitFieldError";

  constructor(structName: string, fieldName: string, reason: string, location: SourceLocation) {
    const message = `bit-field '${structName}.${fieldName}': ${reason}`;
    super(`${describeLocation(location)}: ${message}`, [errorAt(location, message)]);
  }
}

/** A struct whose packed size would pass {@link MAX_STRUCT_SIZE}. */
export class StructTooLargeError extends StructError {
  readonly code = "StructTooLargeError";
  readonly structName: string;

  constructor(structName: string, fieldName: string, location: SourceLocation) {
    const message = `struct '${structName}' exceeds ${MAX_STRUCT_SIZE} bytes at field '${fieldName}'`;
    super(`${describeLocation(location)}: ${message}`, [errorAt(location, message)]);
    this.structName = structName;
  }
}

/** Unpack input shorter than the target struct. */
export class BufferTooSmallError extends StructError {
  readonly code = "BufferTooSmallError";
  readonly required: number;
  readonly actual: number;

  constructor(structName: string, required: number, actual: number) {
    super(`'${structName}' needs ${required} bytes but the buffer holds ${actual}`);
    this.required = required;
    this.actual = actual;
  }
}

/** A value handed to `pack` that cannot be encoded into its field. */
export class InvalidValueError extends StructError {
  readonly code = "InvalidValueError";
  /** Dotted path of the offending field, e.g. `DeviceStatus.readings[2].pressure`. */
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`${path}: ${reason}`);
    this.path = path;
  }
}

/** An entry header that the source provider could not read. */
export class MissingSourceError extends StructError {
  readonly code = "MissingSourceError";

  constructor(path: string) {
    super(`cannot read header '${path}'`);
  }
}
