/**
 * Fixed-width string primitives
 *
 * Pure functions shared by `Layout.parse` and `Layout.format`. Widths are
 * counted in Unicode code points, never UTF-16 code units, so a character
 * outside the Basic Multilingual Plane takes one column.
 */

import type { Alignment } from "./types";

// ============================================================================
// CODE POINT COUNTING
// ============================================================================

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * UTF-16 offset just past the first `count` code points of `s`, or
 * `s.length` when `s` is shorter
 */
function codeUnitOffset(s: string, count: number): number {
  let offset = 0;
  for (let seen = 0; seen < count && offset < s.length; seen++) {
    offset +=
      isHighSurrogate(s.charCodeAt(offset)) &&
      offset + 1 < s.length &&
      isLowSurrogate(s.charCodeAt(offset + 1))
        ? 2
        : 1;
  }
  return offset;
}

/**
 * Number of code points in `s`
 *
 * @performance O(n), no allocation
 */
export function scalarLength(s: string): number {
  let count = 0;
  for (let offset = 0; offset < s.length; offset++) {
    if (
      isHighSurrogate(s.charCodeAt(offset)) &&
      offset + 1 < s.length &&
      isLowSurrogate(s.charCodeAt(offset + 1))
    ) {
      offset++;
    }
    count++;
  }
  return count;
}

// ============================================================================
// PADDING AND TRUNCATION
// ============================================================================

/**
 * First `width` code points of `s`; `s` itself when it already fits
 */
export function truncate(s: string, width: number): string {
  const offset = codeUnitOffset(s, width);
  return offset >= s.length ? s : s.slice(0, offset);
}

/**
 * Pad `s` with `padChar` up to `width` code points. Left alignment pads on the
 * right, right alignment on the left. Strings at or over `width` are returned
 * unchanged.
 */
export function pad(s: string, width: number, alignment: Alignment, padChar: string): string {
  return padToWidth(s, width, alignment, padChar, scalarLength(s));
}

/**
 * Exactly `width` code points: truncated when longer, padded when shorter
 */
export function fixedWidth(
  s: string,
  width: number,
  alignment: Alignment,
  padChar: string
): string {
  const length = scalarLength(s);
  if (length > width) {
    return truncate(s, width);
  }
  if (length < width) {
    return padToWidth(s, width, alignment, padChar, length);
  }
  return s;
}

/**
 * Remove the padding `pad` would have added: the trailing run of `padChar`
 * for left alignment, the leading run for right alignment.
 *
 * A value that genuinely ends (or starts) with `padChar` loses those
 * characters too; the format cannot tell them apart from padding.
 */
export function stripPadding(s: string, alignment: Alignment, padChar: string): string {
  if (padChar.length === 0) {
    return s;
  }

  if (alignment === "left") {
    let end = s.length;
    while (end >= padChar.length && s.startsWith(padChar, end - padChar.length)) {
      end -= padChar.length;
    }
    return end === s.length ? s : s.slice(0, end);
  }

  let start = 0;
  while (start < s.length && s.startsWith(padChar, start)) {
    start += padChar.length;
  }
  return start === 0 ? s : s.slice(start);
}

function padToWidth(
  s: string,
  width: number,
  alignment: Alignment,
  padChar: string,
  length: number
): string {
  if (length >= width) {
    return s;
  }
  const fill = padChar.repeat(width - length);
  return alignment === "left" ? s + fill : fill + s;
}
