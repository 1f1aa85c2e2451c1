/**
 * Parse outcome surface.
 */

import type { FlagVisitor } from "./flag.js";

/** Read-only view over a successful parse. */
export interface ParseResult {
  /** Positional arguments resolved by the active policy. */
  readonly args: readonly string[];
  readonly nArg: number;
  /** Positional argument at `index`, or undefined when out of range. */
  arg(index: number): string | undefined;
  /** Whether the flag with this long name was supplied on the command line. */
  changed(name: string): boolean;
  /** Visit the flags supplied on the command line, in name order. */
  visit(fn: FlagVisitor): void;
}
