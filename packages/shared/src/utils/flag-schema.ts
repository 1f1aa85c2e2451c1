/**
 * Zod schemas for flag definitions and FlagSet options.
 *
 * Checked at definition time so that misconfiguration surfaces before any
 * token is read.
 */

import { z } from "zod";

export const FlagNameSchema = z
  .string()
  .min(1, "Flag name must not be empty")
  .refine((name) => !name.startsWith("-"), "Flag name must not start with '-'")
  .refine((name) => !name.includes("="), "Flag name must not contain '='")
  .refine((name) => !/\s/.test(name), "Flag name must not contain whitespace");

export const ShorthandSchema = z
  .string()
  .refine((s) => [...s].length === 1, "Flag shorthand must be exactly one character")
  .refine((s) => s !== "-" && s !== "=", "Flag shorthand must not be '-' or '='");

export const FlagDefinitionSchema = z.object({
  name: FlagNameSchema,
  shorthand: ShorthandSchema.optional(),
  usage: z.string().default(""),
});

export const FlagSetOptionsSchema = z.object({
  /** Program name shown in the usage line. */
  name: z.string().min(1, "Program name must not be empty").default("command"),
  /** Handle --help (and -h when unclaimed) automatically. */
  helpFlag: z.boolean().default(true),
});
