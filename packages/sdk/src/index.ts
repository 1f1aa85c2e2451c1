// Types
export type { ValueKind, FlagValue } from "./types/value.js";
export type { Flag, FlagOptions, FlagVisitor } from "./types/flag.js";
export type { PositionalPolicy } from "./types/policy.js";
export type { ParseResult } from "./types/result.js";

// Errors
export {
  FlagError,
  ValueError,
  ConfigError,
  HelpRequested,
  ParseError,
  AlreadyParsedError,
  UnknownFlagError,
  MissingArgumentError,
  InvalidValueError,
  BooleanWithValueError,
  CombinedNonBooleanError,
  InvalidShortFormError,
  UnexpectedArgumentError,
  TrailingPositionalsError,
  PositionalConflictError,
  CountMismatchError,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
