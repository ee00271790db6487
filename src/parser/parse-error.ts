/** Thrown to unwind to the nearest recovery point; the diagnostic is recorded before throwing. */
export class ParseError extends Error {
  constructor() {
    super("Parse error");
  }
}
