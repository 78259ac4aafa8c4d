/**
 * Alignment token parsing
 *
 * Tokens are matched case-insensitively after trimming, so `"LEFT"` and
 * `" right "` are both accepted.
 */

import { AlignmentError } from "../../errors";
import type { ParseResult } from "../../types";
import { ALIGNMENT_TOKENS } from "./constants";
import type { Alignment } from "./types";

export function isAlignment(value: unknown): value is Alignment {
  return typeof value === "string" && ALIGNMENT_TOKENS.some((token) => token === value);
}

/**
 * Parse an alignment token without throwing
 */
export function tryParseAlignment(token: string): ParseResult<Alignment, AlignmentError> {
  const normalized = token.trim().toLowerCase();
  if (isAlignment(normalized)) {
    return { success: true, value: normalized };
  }
  return { success: false, error: new AlignmentError(token) };
}

/**
 * Parse an alignment token
 *
 * @throws {AlignmentError} If the token is neither "left" nor "right"
 */
export function parseAlignment(token: string): Alignment {
  const result = tryParseAlignment(token);
  if (!result.success) {
    throw result.error;
  }
  return result.value;
}
