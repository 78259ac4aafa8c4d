/**
 * Fixed-width format type definitions
 */

import type { ParserOptions, WarningHandler } from "../../types";
import type { Layout } from "./layout";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Which side of a field absorbs padding. `Left` keeps the value at the start
 * of the slot and pads on the right; `Right` pads on the left.
 */
export const Alignment = {
  Left: "left",
  Right: "right",
} as const;

export type Alignment = (typeof Alignment)[keyof typeof Alignment];

/**
 * One field declaration while a layout is being built. A spacer has no name.
 */
export interface FieldSpec {
  name?: string;
  start?: number;
  width?: number;
  alignment: Alignment;
  /** Exactly one character */
  padding: string;
}

/**
 * A resolved, positioned field. Covers columns `[start, end)`.
 */
export interface Field {
  readonly index: number;
  readonly name?: string;
  readonly start: number;
  readonly width: number;
  readonly end: number;
  readonly alignment: Alignment;
  readonly padding: string;
}

/**
 * Field name to text value. Spacers never produce keys.
 */
export type FixedRecord = Record<string, string>;

/**
 * Record accepted by `Layout.format`; absent names render as padding
 */
export type FixedRecordInput = Readonly<Record<string, string | undefined>>;

/**
 * One line to parse: a string, an array of characters, or any iterable of
 * characters (whose length is unknown in advance)
 */
export type LineInput = string | readonly string[] | Iterable<string>;

/**
 * Plain-object field declaration for `LayoutBuilder.fromDefinitions`
 */
export interface FieldDefinition {
  name?: string;
  start?: number;
  width?: number;
  /** Exclusive end column; with `start` forms a range */
  end?: number;
  alignment?: Alignment | string;
  padding?: string;
}

// =============================================================================
// OPTIONS
// =============================================================================

/**
 * Layout builder options
 */
export interface LayoutBuilderOptions {
  /** Alignment for fields that do not set one (default: left) */
  defaultAlignment?: Alignment | string;
  /** Padding for fields that do not set one (default: space) */
  defaultPadding?: string;
  /** Receives diagnostics such as ignored alignment tokens */
  onWarning?: WarningHandler;
}

/**
 * Fixed-width record reader options
 */
export interface FixedWidthParserOptions extends ParserOptions {
  layout: Layout;
  /** Skip lines with no characters (default: true) */
  skipEmptyLines?: boolean;
  /** Text encoding of streams and files (default: utf8) */
  encoding?: "utf8" | "binary";
}

/**
 * Fixed-width record writer options
 */
export interface FixedWidthWriterOptions {
  layout: Layout;
  lineEnding?: "\n" | "\r\n" | "\r";
}
