/**
 * Errors raised by the syntax toolkit
 */

/**
 * Base class for failures reported by the toolkit. The harness prints the
 * message as-is.
 */
export class CollaboratorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CollaboratorError';
  }
}

/**
 * The payload is not a valid tree in the declared serialization format
 */
export class DeserializationError extends CollaboratorError {
  /** Location inside the payload, e.g. "$.layout[2].tokenKind" or "byte 12" */
  readonly location: string;

  constructor(location: string, message: string) {
    super(`Failed to deserialize syntax tree at ${location}: ${message}`);
    this.name = 'DeserializationError';
    this.location = location;
  }
}

/**
 * The compiler could not be found, could not be run, or produced unusable output
 */
export class ParserInvocationError extends CollaboratorError {
  readonly executable: string;

  constructor(executable: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ParserInvocationError';
    this.executable = executable;
  }
}
