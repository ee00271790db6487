export {
  type Diagnostic,
  describeLocation,
  errorAt,
  isError,
  NO_LOCATION,
  Severity,
  type SourceLocation,
  warningAt,
} from "./diagnostic.ts";
export {
  BufferTooSmallError,
  CircularDependencyError,
  DuplicateDeclarationError,
  type ErrorCode,
  InvalidBitFieldError,
  InvalidValueError,
  MAX_STRUCT_SIZE,
  MissingSourceError,
  StructError,
  StructSyntaxError,
  StructTooLargeError,
  UnknownTypeError,
} from "./errors.ts";
export { formatDiagnostic, formatDiagnostics } from "./format.ts";
