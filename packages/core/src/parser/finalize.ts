/**
 * Terminal step of the parse: reconcile the leading and trailing non-flag
 * tokens with the positional policy.
 */

import type { PositionalPolicy } from "@greedyflags/sdk";
import {
  CountMismatchError,
  PositionalConflictError,
  TrailingPositionalsError,
  UnexpectedArgumentError,
} from "@greedyflags/sdk";

export interface PositionalState {
  policy: PositionalPolicy;
  /** Tokens before the first flag. Under `mandatory` without a leading match, a partial run. */
  leading: readonly string[];
  /** Tokens after the first flag (mandatory only) and everything after `--`. */
  trailing: readonly string[];
  /** The mandatory leading attempt succeeded. */
  leadingMatched: boolean;
}

export function resolvePositionals(state: PositionalState): string[] {
  const { policy, leading, trailing } = state;

  switch (policy.mode) {
    case "none":
      if (leading.length > 0 || trailing.length > 0) {
        throw new UnexpectedArgumentError([...leading, ...trailing]);
      }
      return [];

    case "arbitrary-leading":
      if (trailing.length > 0) {
        throw new TrailingPositionalsError(trailing);
      }
      return [...leading];

    case "mandatory":
      if (state.leadingMatched) {
        if (trailing.length > 0 && policy.count === 0) {
          throw new UnexpectedArgumentError(trailing);
        }
        if (trailing.length > 0) {
          throw new PositionalConflictError(leading, trailing);
        }
        return [...leading];
      }
      // A partial leading run never counts towards n.
      if (trailing.length !== policy.count) {
        throw new CountMismatchError(policy.count, trailing.length, trailing);
      }
      if (leading.length > 0) {
        throw new UnexpectedArgumentError(leading);
      }
      return [...trailing];
  }
}
