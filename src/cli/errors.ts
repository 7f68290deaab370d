/**
 * Errors raised while interpreting the command line
 */

export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

export class MissingRequiredArgumentError extends ArgumentError {
  constructor(readonly flag: string) {
    super(`Missing required argument: ${flag}`);
    this.name = 'MissingRequiredArgumentError';
  }
}

export class InvalidArgumentValueError extends ArgumentError {
  constructor(
    readonly flag: string,
    readonly value: string,
    readonly allowed: readonly string[] = []
  ) {
    super(
      `"${value}" is not a valid value for ${flag}` +
        (allowed.length > 0 ? ` (expected one of: ${allowed.join(', ')})` : '')
    );
    this.name = 'InvalidArgumentValueError';
  }
}

/** A value-bearing flag was not followed by a value */
export class MalformedArgumentError extends ArgumentError {
  constructor(readonly flag: string) {
    super(`Missing value for argument ${flag}`);
    this.name = 'MalformedArgumentError';
  }
}

/** A value appeared without a flag in front of it */
export class UnkeyedArgumentError extends ArgumentError {
  constructor(readonly token: string) {
    super(`Unexpected argument "${token}" without a preceding flag`);
    this.name = 'UnkeyedArgumentError';
  }
}

export class NoActionSpecifiedError extends ArgumentError {
  constructor() {
    super('No action specified.');
    this.name = 'NoActionSpecifiedError';
  }
}

/**
 * A broken internal assumption. The driver does not treat this as an ordinary
 * failure; it propagates to the entry point.
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
  }
}
