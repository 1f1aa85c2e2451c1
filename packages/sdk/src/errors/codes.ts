/**
 * Error code constants.
 */

export const ErrorCode = {
  // Values
  INVALID_BOOLEAN: "INVALID_BOOLEAN",
  INVALID_INTEGER: "INVALID_INTEGER",

  // Configuration
  CONFIG_ERROR: "CONFIG_ERROR",
  INVALID_FLAG_DEFINITION: "INVALID_FLAG_DEFINITION",
  INVALID_OPTIONS: "INVALID_OPTIONS",
  DUPLICATE_FLAG: "DUPLICATE_FLAG",
  DUPLICATE_SHORTHAND: "DUPLICATE_SHORTHAND",
  RESERVED_FLAG: "RESERVED_FLAG",
  POLICY_CONFLICT: "POLICY_CONFLICT",
  POLICY_LOCKED: "POLICY_LOCKED",
  NEGATIVE_COUNT: "NEGATIVE_COUNT",
  INVALID_COUNT: "INVALID_COUNT",

  // Parsing
  ALREADY_PARSED: "ALREADY_PARSED",
  UNKNOWN_FLAG: "UNKNOWN_FLAG",
  MISSING_ARGUMENT: "MISSING_ARGUMENT",
  INVALID_VALUE: "INVALID_VALUE",
  BOOLEAN_WITH_VALUE: "BOOLEAN_WITH_VALUE",
  COMBINED_NON_BOOLEAN: "COMBINED_NON_BOOLEAN",
  INVALID_SHORT_FORM: "INVALID_SHORT_FORM",
  UNEXPECTED_ARGUMENT: "UNEXPECTED_ARGUMENT",
  TRAILING_POSITIONALS: "TRAILING_POSITIONALS",
  POSITIONAL_CONFLICT: "POSITIONAL_CONFLICT",
  COUNT_MISMATCH: "COUNT_MISMATCH",

  // Not a failure
  HELP_REQUESTED: "HELP_REQUESTED",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
