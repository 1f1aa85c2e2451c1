/**
 * Read-only projection of a finished parse.
 */

import type { FlagVisitor, ParseResult } from "@greedyflags/sdk";
import type { FlagRegistry } from "../infrastructure/flag-registry.js";

export function createParseResult(positionals: readonly string[], registry: FlagRegistry): ParseResult {
  const args: readonly string[] = Object.freeze([...positionals]);

  return {
    args,
    nArg: args.length,

    arg(index: number): string | undefined {
      return args[index];
    },

    changed(name: string): boolean {
      return registry.lookupLong(name)?.changed ?? false;
    },

    visit(fn: FlagVisitor): void {
      for (const flag of registry.all()) {
        if (flag.changed) fn(flag);
      }
    },
  };
}
