// FlagSet
export { FlagSet } from "./flagset/flag-set.js";
export type { FlagSetOptions, DefinitionOptions } from "./flagset/flag-set.js";
export { createParseResult } from "./flagset/parse-result.js";

// Values
export { BooleanValue, StringValue, StringListValue, IntValue } from "./values/index.js";

// Infrastructure
export { createFlagRegistry, createPositionalPolicy } from "./infrastructure/index.js";
export type { FlagRegistry, PositionalPolicyConfigurator } from "./infrastructure/index.js";

// Parser
export { parseTokens } from "./parser/state-machine.js";
export type { ParserContext, ParseOutput } from "./parser/state-machine.js";
export { looksLikeFlag, isNumericToken, TERMINATOR, HELP_NAME, HELP_SHORTHAND } from "./parser/tokens.js";

// Usage
export { formatUsage, formatUsageLine, formatDefaults, formatFlagRow } from "./usage/usage.js";
export type { FlagRow } from "./usage/usage.js";
