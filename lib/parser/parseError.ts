/**
 * Parse error definitions.
 *
 * @module
 */
export class ParseError extends Error {
  constructor(
    message: string,
    /** Offset into the source where parsing failed, when known. */
    public readonly offset?: number,
  ) {
    super(offset === undefined ? message : `${message} at offset ${offset}`);
    this.name = "ParseError";
  }
}
