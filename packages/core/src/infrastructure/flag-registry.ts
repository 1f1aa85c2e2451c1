/**
 * FlagRegistry: owns the flags of one FlagSet.
 *
 * Flags are indexed by long name and by shorthand; both must be unique.
 * Duplicates are configuration errors raised at definition time, never parse
 * errors.
 */

import type { Flag } from "@greedyflags/sdk";
import { ConfigError, ErrorCode } from "@greedyflags/sdk";
import { createLogger, FlagDefinitionSchema, validateInput } from "@greedyflags/shared";

const logger = createLogger("FlagRegistry");

export interface FlagRegistry {
  define(flag: Flag): void;
  lookupLong(name: string): Flag | undefined;
  lookupShort(shorthand: string): Flag | undefined;
  /** All flags, sorted by long name. */
  all(): Flag[];
}

export function createFlagRegistry(): FlagRegistry {
  const byName = new Map<string, Flag>();
  const byShorthand = new Map<string, Flag>();

  return {
    define(flag: Flag): void {
      const validation = validateInput(FlagDefinitionSchema, {
        name: flag.name,
        shorthand: flag.shorthand,
        usage: flag.usage,
      });
      if (!validation.success) {
        throw new ConfigError(`invalid flag definition "${flag.name}": ${validation.error}`, {
          code: ErrorCode.INVALID_FLAG_DEFINITION,
        });
      }
      if (byName.has(flag.name)) {
        throw new ConfigError(`flag redefined: ${flag.name}`, { code: ErrorCode.DUPLICATE_FLAG });
      }
      if (flag.shorthand !== undefined) {
        if (byShorthand.has(flag.shorthand)) {
          throw new ConfigError(`flag shorthand redefined: -${flag.shorthand}`, {
            code: ErrorCode.DUPLICATE_SHORTHAND,
          });
        }
        byShorthand.set(flag.shorthand, flag);
      }
      byName.set(flag.name, flag);
      logger.debug(`Defined flag --${flag.name}`, {
        shorthand: flag.shorthand,
        kind: flag.value.kind,
      });
    },

    lookupLong(name: string): Flag | undefined {
      return byName.get(name);
    },

    lookupShort(shorthand: string): Flag | undefined {
      return byShorthand.get(shorthand);
    },

    all(): Flag[] {
      return [...byName.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    },
  };
}
