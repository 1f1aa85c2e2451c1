/**
 * FlagSet: the entry point CLI authors use.
 *
 * Each FlagSet owns its registry and positional policy; there is no
 * process-wide state. Configure it (policy first, then flags), call parse()
 * once, read the values back through the objects the definition helpers
 * returned.
 *
 * Example:
 *   const flags = new FlagSet({ name: "scan" });
 *   flags.setMandatoryArgs(2);
 *   const verbose = flags.bool("verbose", { shorthand: "v" });
 *   const extensions = flags.stringList("extensions", { shorthand: "e" });
 *   const result = flags.parse(["src", "out", "-v", "-e", "go", "mod"]);
 *   result.args        → ["src", "out"]
 *   extensions.get()   → ["go", "mod"]
 */

import type { Flag, FlagOptions, FlagValue, FlagVisitor, ParseResult, PositionalPolicy } from "@greedyflags/sdk";
import { AlreadyParsedError, ConfigError, ErrorCode } from "@greedyflags/sdk";
import { createLogger, formatZodError, FlagSetOptionsSchema, type Logger } from "@greedyflags/shared";
import { createFlagRegistry, type FlagRegistry } from "../infrastructure/flag-registry.js";
import { createPositionalPolicy, type PositionalPolicyConfigurator } from "../infrastructure/positional-policy.js";
import { parseTokens } from "../parser/state-machine.js";
import { HELP_NAME, HELP_SHORTHAND } from "../parser/tokens.js";
import { formatDefaults, formatUsage, helpRow, toRow, type FlagRow } from "../usage/usage.js";
import { BooleanValue, IntValue, StringListValue, StringValue } from "../values/index.js";
import { createParseResult } from "./parse-result.js";

export interface FlagSetOptions {
  /** Program name used in usage output and log context. Defaults to "command". */
  name?: string;
  /** Handle --help / -h automatically. Defaults to true. */
  helpFlag?: boolean;
  logger?: Logger;
}

export type DefinitionOptions = Omit<FlagOptions<unknown>, "default">;

export class FlagSet {
  readonly name: string;
  private readonly helpEnabled: boolean;
  private readonly registry: FlagRegistry = createFlagRegistry();
  private readonly positional: PositionalPolicyConfigurator = createPositionalPolicy();
  private readonly logger: Logger;
  private parseAttempted = false;

  constructor(options: FlagSetOptions = {}) {
    const validated = FlagSetOptionsSchema.safeParse({ name: options.name, helpFlag: options.helpFlag });
    if (!validated.success) {
      throw new ConfigError(`invalid flag set options: ${formatZodError(validated.error)}`, {
        code: ErrorCode.INVALID_OPTIONS,
      });
    }
    this.name = validated.data.name;
    this.helpEnabled = validated.data.helpFlag;
    this.logger = (options.logger ?? createLogger("FlagSet")).child("Parser");
    this.logger.setContext({ program: this.name });
  }

  // --- Positional policy ---

  /** No positional arguments (the default). */
  disallowPositionals(): void {
    this.positional.setNone();
  }

  /** Accept any number of positional arguments before the first flag. */
  allowArbitraryLeadingPositionals(): void {
    this.positional.setArbitraryLeading();
  }

  /** Require exactly `count` positionals, all before the first flag or all after the last. */
  setMandatoryArgs(count: number): void {
    this.positional.setMandatory(count);
  }

  get policy(): PositionalPolicy {
    return this.positional.current();
  }

  // --- Flag definitions ---

  bool(name: string, options: FlagOptions<boolean> = {}): BooleanValue {
    return this.var(name, new BooleanValue(options.default ?? false), options);
  }

  string(name: string, options: FlagOptions<string> = {}): StringValue {
    return this.var(name, new StringValue(options.default ?? ""), options);
  }

  int(name: string, options: FlagOptions<number> = {}): IntValue {
    return this.var(name, new IntValue(options.default ?? 0), options);
  }

  /** Greedy flag: `-e a b c` appends a, b and c. */
  stringList(name: string, options: FlagOptions<readonly string[]> = {}): StringListValue {
    return this.var(name, new StringListValue(options.default ?? []), options);
  }

  /** Define a flag backed by any FlagValue. Non-boolean, non-greedy kinds parse as scalars. */
  var<V extends FlagValue>(name: string, value: V, options: DefinitionOptions = {}): V {
    if (this.parseAttempted) {
      throw new ConfigError(`cannot define flag "${name}" after parse()`);
    }
    if (this.helpEnabled && name === HELP_NAME) {
      throw new ConfigError(`flag name "${HELP_NAME}" is reserved while the help flag is enabled`, {
        code: ErrorCode.RESERVED_FLAG,
      });
    }

    const flag: Flag = {
      name,
      shorthand: options.shorthand,
      usage: options.usage ?? "",
      defaultText: value.render(),
      value,
      isGreedy: value.kind === "greedy",
      isBoolean: value.kind === "boolean",
      changed: false,
    };
    this.registry.define(flag);
    this.positional.lock();
    return value;
  }

  // --- Parsing ---

  /**
   * Parse the tokens (process arguments without the program name by default).
   * Throws ParseError subclasses on bad input and HelpRequested for --help.
   * May be called only once.
   */
  parse(tokens: readonly string[] = process.argv.slice(2)): ParseResult {
    if (this.parseAttempted) {
      throw new AlreadyParsedError();
    }
    this.parseAttempted = true;

    const output = parseTokens(tokens, {
      registry: this.registry,
      policy: this.positional.current(),
      help: this.helpEnabled,
      logger: this.logger,
    });
    return createParseResult(output.positionals, this.registry);
  }

  // --- Inspection ---

  lookup(name: string): Flag | undefined {
    return this.registry.lookupLong(name);
  }

  /** Visit every defined flag in name order. */
  visitAll(fn: FlagVisitor): void {
    for (const flag of this.registry.all()) fn(flag);
  }

  // --- Help ---

  usage(): string {
    return formatUsage(this.name, this.positional.current(), this.rows());
  }

  defaults(): string {
    return formatDefaults(this.rows());
  }

  private rows(): FlagRow[] {
    const rows = this.registry.all().map(toRow);
    if (this.helpEnabled) {
      rows.push(helpRow(this.registry.lookupShort(HELP_SHORTHAND) ? undefined : HELP_SHORTHAND));
    }
    return rows;
  }
}
