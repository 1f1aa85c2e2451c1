export { createFlagRegistry } from "./flag-registry.js";
export type { FlagRegistry } from "./flag-registry.js";

export { createPositionalPolicy } from "./positional-policy.js";
export type { PositionalPolicyConfigurator } from "./positional-policy.js";
