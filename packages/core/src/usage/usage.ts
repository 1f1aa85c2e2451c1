/**
 * Usage text rendering. Pure formatting over read-only flag records.
 */

import type { Flag, PositionalPolicy } from "@greedyflags/sdk";

/** Column where usage text starts. */
const USAGE_COLUMN = 24;
const CONTINUATION = "\n    \t";

/** Default texts that are not worth printing. */
const ZERO_DEFAULTS = new Set(["", "[]", "false", "0"]);

/** Row describing a flag in the defaults table. */
export interface FlagRow {
  name: string;
  shorthand?: string;
  usage: string;
  defaultText: string;
  typeName: string;
  isBoolean: boolean;
  isGreedy: boolean;
}

export function toRow(flag: Flag): FlagRow {
  return {
    name: flag.name,
    shorthand: flag.shorthand,
    usage: flag.usage,
    defaultText: flag.defaultText,
    typeName: flag.value.typeName,
    isBoolean: flag.isBoolean,
    isGreedy: flag.isGreedy,
  };
}

/** Row for the built-in help flag, shown while help handling is on. */
export function helpRow(shorthand: string | undefined): FlagRow {
  return {
    name: "help",
    shorthand,
    usage: "Display this help message",
    defaultText: "false",
    typeName: "bool",
    isBoolean: true,
    isGreedy: false,
  };
}

function positionalPlaceholders(count: number): string {
  return Array.from({ length: count }, (_, i) => `<arg${i + 1}>`).join(" ");
}

/** The first line(s): `Usage: prog ...`, depending on the positional policy. */
export function formatUsageLine(program: string, policy: PositionalPolicy, hasFlags: boolean): string {
  switch (policy.mode) {
    case "none":
      return hasFlags ? `Usage: ${program} [flags]` : `Usage: ${program}`;
    case "arbitrary-leading":
      return hasFlags
        ? `Usage: ${program} [pos_args...] [flags]`
        : `Usage: ${program} [pos_args...]`;
    case "mandatory": {
      const args = positionalPlaceholders(policy.count);
      return `Usage: ${program} ${args} [flags]\n   or: ${program} [flags] ${args}`;
    }
  }
}

export function formatFlagRow(row: FlagRow): string {
  let line = "  ";
  line += row.shorthand !== undefined ? `-${row.shorthand}, --${row.name}` : `    --${row.name}`;

  if (!row.isBoolean) {
    line += row.isGreedy ? ` ${row.typeName}...` : ` ${row.typeName}`;
  }

  line += line.length < USAGE_COLUMN ? " ".repeat(USAGE_COLUMN - line.length) : CONTINUATION;
  line += row.usage.replaceAll("\n", CONTINUATION + " ".repeat(USAGE_COLUMN));

  if (!row.isBoolean && !ZERO_DEFAULTS.has(row.defaultText)) {
    line += ` (default ${row.defaultText})`;
  }
  return line;
}

/** The `Flags:` table, rows sorted by long name. */
export function formatDefaults(rows: readonly FlagRow[]): string {
  const sorted = [...rows].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  return ["Flags:", ...sorted.map(formatFlagRow)].join("\n");
}

export function formatUsage(program: string, policy: PositionalPolicy, rows: readonly FlagRow[]): string {
  const usageLine = formatUsageLine(program, policy, rows.length > 0);
  if (rows.length === 0) return usageLine;
  return `${usageLine}\n\n${formatDefaults(rows)}`;
}
