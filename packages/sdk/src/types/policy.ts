/**
 * Positional argument policies.
 */

/**
 * - `none`: no positional tokens are tolerated
 * - `arbitrary-leading`: any number, only before the first flag
 * - `mandatory`: exactly `count`, all before the first flag or all at the end
 */
export type PositionalPolicy =
  | { mode: "none" }
  | { mode: "arbitrary-leading" }
  | { mode: "mandatory"; count: number };
