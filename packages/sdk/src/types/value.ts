/**
 * Flag value contract.
 */

/**
 * How the state machine treats a value.
 *
 * - `boolean`: set to `true` by its bare flag, never consumes a following token
 * - `scalar`: takes exactly one value, inline or from the next token
 * - `greedy`: appends every following non-flag token until interrupted
 */
export type ValueKind = "boolean" | "scalar" | "greedy";

/** The value stored behind a flag. */
export interface FlagValue<T = unknown> {
  readonly kind: ValueKind;
  /** Type name shown in usage output (e.g. "string", "int"). */
  readonly typeName: string;
  /** Current typed value. Lists are returned as copies. */
  get(): T;
  /** Update the value from a command-line token. Throws ValueError on bad input. */
  set(token: string): void;
  /** Text rendering, used for default values in usage output. */
  render(): string;
}
