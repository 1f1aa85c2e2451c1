/**
 * Token-processing state machine.
 *
 * One synchronous left-to-right pass over the tokens:
 *
 *   Phase A  mandatory policy only: try to take exactly n positionals from
 *            the start of the input.
 *   Phase B  classify each token, resolve flags, feed the active greedy flag
 *            and buffer leftover non-flag tokens.
 *   Phase C  resolve the buffered tokens against the positional policy.
 *
 * A single bad token aborts the whole pass. Short clusters are validated
 * before any flag in them is touched.
 */

import type { Flag, PositionalPolicy } from "@greedyflags/sdk";
import {
  BooleanWithValueError,
  CombinedNonBooleanError,
  HelpRequested,
  InvalidShortFormError,
  InvalidValueError,
  MissingArgumentError,
  UnexpectedArgumentError,
  UnknownFlagError,
  ValueError,
} from "@greedyflags/sdk";
import type { Logger } from "@greedyflags/shared";
import type { FlagRegistry } from "../infrastructure/flag-registry.js";
import { resolvePositionals } from "./finalize.js";
import { matchLeadingPositionals } from "./leading.js";
import {
  HELP_NAME,
  HELP_SHORTHAND,
  TERMINATOR,
  looksLikeFlag,
  splitInline,
} from "./tokens.js";

export interface ParserContext {
  registry: FlagRegistry;
  policy: PositionalPolicy;
  /** Treat --help (and an unclaimed -h) as a help request. */
  help: boolean;
  logger: Logger;
}

export interface ParseOutput {
  positionals: string[];
}

class TokenStateMachine {
  private stream: readonly string[] = [];
  private index = 0;
  private activeGreedy: Flag | undefined;
  private flagsSeen = false;
  private terminatorHit = false;
  private leadingMatched = false;
  private readonly leading: string[] = [];
  private readonly trailing: string[] = [];

  constructor(private readonly ctx: ParserContext) {}

  run(tokens: readonly string[]): ParseOutput {
    const stop = this.ctx.logger.time("parse");
    try {
      return this.process(tokens);
    } finally {
      stop();
    }
  }

  private process(tokens: readonly string[]): ParseOutput {
    const { logger, policy } = this.ctx;
    this.stream = tokens;

    if (policy.mode === "mandatory") {
      const match = matchLeadingPositionals(tokens, policy.count);
      if (match.matched) {
        logger.debug("Found mandatory leading positional arguments", {
          count: policy.count,
          args: match.collected,
        });
        this.leading.push(...match.collected);
        this.stream = match.remaining;
        this.leadingMatched = true;
        this.flagsSeen = true;
      } else {
        logger.debug("Mandatory leading positional arguments not matched", {
          needed: policy.count,
          foundBeforeFlag: match.collected.length,
        });
      }
    }

    while (this.index < this.stream.length) {
      const token = this.stream[this.index];
      this.index += 1;
      this.step(token);
    }

    const positionals = resolvePositionals({
      policy,
      leading: this.leading,
      trailing: this.trailing,
      leadingMatched: this.leadingMatched,
    });
    logger.debug("Resolved positional arguments", { mode: policy.mode, args: positionals });
    return { positionals };
  }

  private step(token: string): void {
    const { logger } = this.ctx;

    if (this.terminatorHit) {
      this.trailing.push(token);
      return;
    }

    if (token === TERMINATOR) {
      logger.debug("Flag parsing stopped by terminator");
      this.terminatorHit = true;
      this.activeGreedy = undefined;
      return;
    }

    const flagLike = looksLikeFlag(token);

    if (this.activeGreedy) {
      if (!flagLike) {
        logger.debug("Consumed by greedy flag", { token, flag: this.activeGreedy.name });
        this.assign(this.activeGreedy, `--${this.activeGreedy.name}`, token);
        return;
      }
      logger.debug("Greedy consumption stopped by flag", {
        token,
        flag: this.activeGreedy.name,
      });
      this.activeGreedy = undefined;
    }

    if (flagLike) {
      this.flagsSeen = true;
      if (token.startsWith("--")) {
        this.longFlag(token);
      } else if (token.includes("=")) {
        this.shortInline(token);
      } else {
        this.shortCluster(token);
      }
      return;
    }

    this.placeNonFlag(token);
  }

  /** `--name` or `--name=value`. */
  private longFlag(token: string): void {
    const { name, value } = splitInline(token.slice(2));
    if (this.ctx.help && name === HELP_NAME) {
      throw new HelpRequested(token);
    }

    const flag = this.ctx.registry.lookupLong(name);
    const display = `--${name}`;
    if (!flag) {
      throw new UnknownFlagError(display, token);
    }

    switch (flag.value.kind) {
      case "boolean":
        this.assign(flag, display, value ?? "true");
        break;
      case "greedy":
        if (value !== undefined) {
          this.assign(flag, display, value);
        } else {
          this.activate(flag);
        }
        break;
      case "scalar":
        this.assign(flag, display, value ?? this.takeArgument(display, token));
        break;
    }
  }

  /** `-x=value`: one shorthand, one value, never greedy activation. */
  private shortInline(token: string): void {
    const { name, value = "" } = splitInline(token.slice(1));
    if ([...name].length !== 1) {
      throw new InvalidShortFormError(token);
    }

    const flag = this.resolveShort(name, token);
    const display = `-${name}`;
    if (flag.value.kind === "boolean") {
      throw new BooleanWithValueError(display, value);
    }
    this.assign(flag, display, value);
  }

  /** `-x` or `-xyz`: everything before the last character must be boolean. */
  private shortCluster(token: string): void {
    const chars = [...token.slice(1)];
    const last = chars.length - 1;
    const flags = chars.map((char, i) => {
      const flag = this.resolveShort(char, token);
      if (i < last && flag.value.kind !== "boolean") {
        throw new CombinedNonBooleanError(`-${char}`, token);
      }
      return flag;
    });

    const final = flags[last];
    const finalDisplay = `-${chars[last]}`;
    switch (final.value.kind) {
      case "boolean":
        this.assign(final, finalDisplay, "true");
        break;
      case "greedy":
        this.activate(final);
        break;
      case "scalar":
        this.assign(final, finalDisplay, this.takeArgument(finalDisplay, token));
        break;
    }

    for (let i = 0; i < last; i++) {
      this.assign(flags[i], `-${chars[i]}`, "true");
    }
  }

  private resolveShort(char: string, token: string): Flag {
    const flag = this.ctx.registry.lookupShort(char);
    if (flag) return flag;
    if (this.ctx.help && token === `-${HELP_SHORTHAND}`) {
      throw new HelpRequested(token);
    }
    throw new UnknownFlagError(`-${char}`, token);
  }

  /** Next whole token as a flag value. "--" looks like a flag, so it is refused too. */
  private takeArgument(display: string, token: string): string {
    if (this.index >= this.stream.length || looksLikeFlag(this.stream[this.index])) {
      throw new MissingArgumentError(display, token);
    }
    const value = this.stream[this.index];
    this.index += 1;
    return value;
  }

  private activate(flag: Flag): void {
    flag.changed = true;
    this.activeGreedy = flag;
    this.ctx.logger.debug("Greedy mode activated", { flag: flag.name });
  }

  private assign(flag: Flag, display: string, text: string): void {
    try {
      flag.value.set(text);
    } catch (err) {
      if (err instanceof ValueError) {
        throw new InvalidValueError(display, text, err);
      }
      throw err;
    }
    flag.changed = true;
  }

  private placeNonFlag(token: string): void {
    const { logger, policy } = this.ctx;

    if (policy.mode === "arbitrary-leading" && !this.flagsSeen) {
      logger.debug("Collected leading positional", { token });
      this.leading.push(token);
      return;
    }

    if (policy.mode === "mandatory" && !this.leadingMatched) {
      if (this.flagsSeen) {
        logger.debug("Buffering potential trailing positional", { token });
        this.trailing.push(token);
      } else {
        logger.debug("Collected partial leading positional", { token });
        this.leading.push(token);
      }
      return;
    }

    throw new UnexpectedArgumentError([token]);
  }
}

/** Run one parse. Mutates flag values and `changed` markers through the registry. */
export function parseTokens(tokens: readonly string[], ctx: ParserContext): ParseOutput {
  return new TokenStateMachine(ctx).run(tokens);
}
