/**
 * Flag record and definition types.
 */

import type { FlagValue } from "./value.js";

/** A defined flag. Owned by the registry for one configure-and-parse cycle. */
export interface Flag<T = unknown> {
  readonly name: string;
  readonly shorthand?: string;
  readonly usage: string;
  /** Rendering of the initial value. */
  readonly defaultText: string;
  readonly value: FlagValue<T>;
  readonly isGreedy: boolean;
  readonly isBoolean: boolean;
  /** True once the flag was supplied on the command line. Only the parser sets it. */
  changed: boolean;
}

/** Options accepted by every flag definition helper. */
export interface FlagOptions<T> {
  shorthand?: string;
  usage?: string;
  default?: T;
}

/** Visitor used by FlagSet.visitAll and ParseResult.visit. */
export type FlagVisitor = (flag: Flag) => void;
