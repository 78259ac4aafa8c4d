/**
 * Central format module exports
 *
 * @example
 * ```typescript
 * import { FixedWidthParser, LayoutBuilder } from '../formats';
 * ```
 */

export { AbstractParser } from "./abstract-parser";

export * from "./fixed";
