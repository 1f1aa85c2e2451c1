export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export {
  FlagNameSchema,
  ShorthandSchema,
  FlagDefinitionSchema,
  FlagSetOptionsSchema,
} from "./utils/flag-schema.js";
