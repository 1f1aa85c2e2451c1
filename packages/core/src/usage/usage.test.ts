import { describe, it, expect } from "vitest";
import { formatDefaults, formatFlagRow, formatUsage, formatUsageLine, helpRow, type FlagRow } from "./usage.js";

function row(overrides: Partial<FlagRow> & { name: string }): FlagRow {
  return {
    usage: "",
    defaultText: "",
    typeName: "string",
    isBoolean: false,
    isGreedy: false,
    ...overrides,
  };
}

const verbose = row({ name: "verbose", shorthand: "v", usage: "Print more", typeName: "bool", isBoolean: true, defaultText: "false" });
const extensions = row({ name: "extensions", shorthand: "e", usage: "Extensions to match", isGreedy: true, defaultText: "[]" });
const name = row({ name: "name", usage: "Name", defaultText: "anon" });
const depth = row({ name: "depth", usage: "Depth", typeName: "int", defaultText: "0" });

describe("formatUsageLine", () => {
  it("describes each policy", () => {
    expect(formatUsageLine("demo", { mode: "none" }, true)).toBe("Usage: demo [flags]");
    expect(formatUsageLine("demo", { mode: "none" }, false)).toBe("Usage: demo");
    expect(formatUsageLine("demo", { mode: "arbitrary-leading" }, true)).toBe(
      "Usage: demo [pos_args...] [flags]",
    );
    expect(formatUsageLine("demo", { mode: "arbitrary-leading" }, false)).toBe("Usage: demo [pos_args...]");
    expect(formatUsageLine("demo", { mode: "mandatory", count: 2 }, true)).toBe(
      "Usage: demo <arg1> <arg2> [flags]\n   or: demo [flags] <arg1> <arg2>",
    );
  });
});

describe("formatFlagRow", () => {
  it("aligns usage text at column 24", () => {
    expect(formatFlagRow(verbose)).toBe("  -v, --verbose         Print more");
    expect(formatFlagRow(depth)).toBe("      --depth int       Depth");
  });

  it("prints non-zero defaults for value flags", () => {
    expect(formatFlagRow(name)).toBe("      --name string     Name (default anon)");
  });

  it("marks greedy flags and wraps long name columns", () => {
    expect(formatFlagRow(extensions)).toBe("  -e, --extensions string...\n    \tExtensions to match");
  });

  it("indents continuation lines of multi-line usage", () => {
    const multi = row({ name: "x", usage: "first\nsecond", typeName: "bool", isBoolean: true });
    expect(formatFlagRow(multi)).toBe(`      --x               first\n    \t${" ".repeat(24)}second`);
  });

  it("renders the help row", () => {
    expect(formatFlagRow(helpRow("h"))).toBe("  -h, --help            Display this help message");
    expect(formatFlagRow(helpRow(undefined))).toBe("      --help            Display this help message");
  });
});

describe("formatDefaults", () => {
  it("sorts rows by name under a heading", () => {
    expect(formatDefaults([verbose, depth])).toBe(
      ["Flags:", "      --depth int       Depth", "  -v, --verbose         Print more"].join("\n"),
    );
  });
});

describe("formatUsage", () => {
  it("omits the flags table when there are no flags", () => {
    expect(formatUsage("demo", { mode: "none" }, [])).toBe("Usage: demo");
  });

  it("joins the usage line and the table with a blank line", () => {
    expect(formatUsage("demo", { mode: "none" }, [verbose])).toBe(
      "Usage: demo [flags]\n\nFlags:\n  -v, --verbose         Print more",
    );
  });
});
