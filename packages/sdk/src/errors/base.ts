/**
 * Error hierarchy for flag definition and parsing.
 *
 * Errors carry the raw offending data (tokens, flag names, counts) as
 * properties, so callers can branch on structure instead of message text.
 */

import { ErrorCode, type ErrorCodeValue } from "./codes.js";

export class FlagError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCodeValue,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = "FlagError";
  }
}

/** A token could not be converted by a FlagValue. */
export class ValueError extends FlagError {
  constructor(
    public readonly token: string,
    message: string,
    code: ErrorCodeValue,
  ) {
    super(message, code);
    this.name = "ValueError";
  }
}

/** Setup-time misuse: duplicate names, policy conflicts, bad definitions. */
export class ConfigError extends FlagError {
  constructor(
    message: string,
    options?: { cause?: Error; code?: ErrorCodeValue },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}

/**
 * Signals that the help flag was given. Not a failure: callers should print
 * usage and stop.
 */
export class HelpRequested extends FlagError {
  constructor(public readonly token: string) {
    super("help requested", ErrorCode.HELP_REQUESTED);
    this.name = "HelpRequested";
  }
}

/** Base for every failure raised during the token pass or its finalization. */
export abstract class ParseError extends FlagError {
  constructor(
    message: string,
    code: ErrorCodeValue,
    options?: { cause?: Error },
  ) {
    super(message, code, options);
    this.name = "ParseError";
  }
}

export class AlreadyParsedError extends ParseError {
  constructor() {
    super("parse() already called on this flag set", ErrorCode.ALREADY_PARSED);
    this.name = "AlreadyParsedError";
  }
}

export class UnknownFlagError extends ParseError {
  constructor(
    /** Flag as written by the user, e.g. "--colour" or "-q". */
    public readonly flag: string,
    public readonly token: string,
  ) {
    super(
      flag === token ? `unknown flag ${flag}` : `unknown flag ${flag} (in ${token})`,
      ErrorCode.UNKNOWN_FLAG,
    );
    this.name = "UnknownFlagError";
  }
}

export class MissingArgumentError extends ParseError {
  constructor(
    public readonly flag: string,
    public readonly token: string,
  ) {
    super(`flag needs an argument: ${flag}`, ErrorCode.MISSING_ARGUMENT);
    this.name = "MissingArgumentError";
  }
}

export class InvalidValueError extends ParseError {
  constructor(
    public readonly flag: string,
    public readonly value: string,
    cause: ValueError,
  ) {
    super(`invalid value "${value}" for flag ${flag}: ${cause.message}`, ErrorCode.INVALID_VALUE, { cause });
    this.name = "InvalidValueError";
  }
}

export class BooleanWithValueError extends ParseError {
  constructor(
    public readonly flag: string,
    public readonly value: string,
  ) {
    super(`boolean flag ${flag} cannot have value "${value}"`, ErrorCode.BOOLEAN_WITH_VALUE);
    this.name = "BooleanWithValueError";
  }
}

export class CombinedNonBooleanError extends ParseError {
  constructor(
    public readonly flag: string,
    public readonly token: string,
  ) {
    super(
      `flag ${flag} requires a value and can only be last in ${token}`,
      ErrorCode.COMBINED_NON_BOOLEAN,
    );
    this.name = "CombinedNonBooleanError";
  }
}

export class InvalidShortFormError extends ParseError {
  constructor(public readonly token: string) {
    super(`invalid short flag format ${token}`, ErrorCode.INVALID_SHORT_FORM);
    this.name = "InvalidShortFormError";
  }
}

export class UnexpectedArgumentError extends ParseError {
  constructor(public readonly tokens: readonly string[]) {
    super(
      tokens.length === 1
        ? `unexpected argument "${tokens[0]}"`
        : `unexpected arguments: ${tokens.join(" ")}`,
      ErrorCode.UNEXPECTED_ARGUMENT,
    );
    this.name = "UnexpectedArgumentError";
  }
}

/** Non-flag tokens after a flag while only leading positionals are allowed. */
export class TrailingPositionalsError extends ParseError {
  constructor(public readonly tokens: readonly string[]) {
    super(
      `non-flag arguments found after flags when only leading positionals are allowed: ${tokens.join(" ")}`,
      ErrorCode.TRAILING_POSITIONALS,
    );
    this.name = "TrailingPositionalsError";
  }
}

/** Mandatory positionals were found at the start and more turned up at the end. */
export class PositionalConflictError extends ParseError {
  constructor(
    public readonly leading: readonly string[],
    public readonly trailing: readonly string[],
  ) {
    super(
      `${leading.length} leading positional arguments already found, unexpected trailing arguments: ${trailing.join(" ")}`,
      ErrorCode.POSITIONAL_CONFLICT,
    );
    this.name = "PositionalConflictError";
  }
}

export class CountMismatchError extends ParseError {
  constructor(
    public readonly expected: number,
    public readonly found: number,
    public readonly tokens: readonly string[],
  ) {
    super(
      `expected exactly ${expected} trailing positional arguments, found ${found}`,
      ErrorCode.COUNT_MISMATCH,
    );
    this.name = "CountMismatchError";
  }
}
