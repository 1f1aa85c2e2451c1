/**
 * PositionalPolicyConfigurator: selects how leftover non-flag tokens are
 * treated. The policy is chosen once and locked as soon as the first flag is
 * defined.
 */

import type { PositionalPolicy } from "@greedyflags/sdk";
import { ConfigError, ErrorCode } from "@greedyflags/sdk";
import { createLogger } from "@greedyflags/shared";

const logger = createLogger("PositionalPolicy");

export interface PositionalPolicyConfigurator {
  setNone(): void;
  setArbitraryLeading(): void;
  setMandatory(count: number): void;
  /** Called by the flag set when the first flag is defined. */
  lock(): void;
  current(): PositionalPolicy;
}

function describe(policy: PositionalPolicy): string {
  return policy.mode === "mandatory" ? `mandatory(${policy.count})` : policy.mode;
}

function samePolicy(a: PositionalPolicy, b: PositionalPolicy): boolean {
  if (a.mode === "mandatory" && b.mode === "mandatory") return a.count === b.count;
  return a.mode === b.mode;
}

export function createPositionalPolicy(): PositionalPolicyConfigurator {
  let policy: PositionalPolicy = { mode: "none" };
  let selected = false;
  let locked = false;

  function select(next: PositionalPolicy): void {
    if (locked) {
      throw new ConfigError(
        "cannot change positional argument mode after flags have been defined",
        { code: ErrorCode.POLICY_LOCKED },
      );
    }
    if (selected && !samePolicy(policy, next)) {
      throw new ConfigError(
        `cannot set multiple positional argument modes (current: ${describe(policy)}, new: ${describe(next)})`,
        { code: ErrorCode.POLICY_CONFLICT },
      );
    }
    policy = next;
    selected = true;
    logger.debug(`Positional mode set: ${describe(next)}`);
  }

  return {
    setNone(): void {
      select({ mode: "none" });
    },

    setArbitraryLeading(): void {
      select({ mode: "arbitrary-leading" });
    },

    setMandatory(count: number): void {
      if (!Number.isInteger(count)) {
        throw new ConfigError(`number of mandatory args must be an integer, got ${count}`, {
          code: ErrorCode.INVALID_COUNT,
        });
      }
      if (count < 0) {
        throw new ConfigError("number of mandatory args cannot be negative", {
          code: ErrorCode.NEGATIVE_COUNT,
        });
      }
      select({ mode: "mandatory", count });
    },

    lock(): void {
      locked = true;
    },

    current(): PositionalPolicy {
      return policy;
    },
  };
}
