/**
 * Token classification shared by every phase of the parser.
 */

export const TERMINATOR = "--";

const SIGNED_INTEGER = /^-?\d+$/;

/** `-5`, `-42`, `17`: tokens that stay values even though they may start with '-'. */
export function isNumericToken(token: string): boolean {
  return SIGNED_INTEGER.test(token);
}

/**
 * A token looks like a flag when it starts with '-', is longer than one
 * character and is not a signed integer. A bare "-" therefore never does.
 */
export function looksLikeFlag(token: string): boolean {
  return token.startsWith("-") && token.length > 1 && !isNumericToken(token);
}

/** Split `name=value` at the first '='. */
export function splitInline(body: string): { name: string; value?: string } {
  const eq = body.indexOf("=");
  if (eq === -1) return { name: body };
  return { name: body.slice(0, eq), value: body.slice(eq + 1) };
}

/** Reserved long name that requests usage output. */
export const HELP_NAME = "help";
/** Short form of the help flag, honoured only while no flag claims it. */
export const HELP_SHORTHAND = "h";
