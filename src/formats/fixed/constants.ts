/**
 * Fixed-width format constants
 */

import type { Alignment } from "./types";

/** Alignment given to fields that do not set one */
export const DEFAULT_ALIGNMENT: Alignment = "left";

/** Padding character given to fields that do not set one */
export const DEFAULT_PADDING = " ";

/** Line terminator used by the writer */
export const DEFAULT_LINE_ENDING = "\n";

/** Format identifier used in error messages and warnings */
export const FORMAT_NAME = "FIXED";

/** Accepted alignment tokens, after trimming and lower-casing */
export const ALIGNMENT_TOKENS = ["left", "right"] as const;
