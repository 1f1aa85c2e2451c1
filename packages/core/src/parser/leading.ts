/**
 * Leading attempt for the mandatory positional policy.
 *
 * Collects the non-flag tokens at the very start of the input. The attempt
 * succeeds only when exactly `count` of them precede the first flag-looking
 * token (or make up the whole input).
 */

import { looksLikeFlag } from "./tokens.js";

export interface LeadingMatch {
  matched: boolean;
  /** Tokens before the first flag-looking token. */
  collected: string[];
  /** Tokens left for the main pass: the rest on success, everything otherwise. */
  remaining: readonly string[];
}

export function matchLeadingPositionals(tokens: readonly string[], count: number): LeadingMatch {
  const firstFlag = tokens.findIndex(looksLikeFlag);
  const collected = tokens.slice(0, firstFlag === -1 ? tokens.length : firstFlag);

  // collected.length === count implies the next token is flag-looking or the
  // input ends right there.
  if (collected.length === count) {
    return { matched: true, collected, remaining: tokens.slice(count) };
  }
  return { matched: false, collected, remaining: tokens };
}
