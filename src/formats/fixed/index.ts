/**
 * @module formats/fixed
 * @description Fixed-width flat-file records
 *
 * Fields are declared with a {@link LayoutBuilder}, resolved once into an
 * immutable {@link Layout}, and then used to parse lines into records and
 * format records back into lines.
 *
 * @example Building and using a layout
 * ```typescript
 * import { LayoutBuilder } from './formats/fixed';
 *
 * const layout = new LayoutBuilder()
 *   .field("code").width(4).append()
 *   .spacer(4, 5).append()
 *   .field("amount").width(5).alignment("right").padding("0").append()
 *   .build();
 *
 * layout.format({ code: "ABCD", amount: "1234" }); // "ABCD 01234"
 * ```
 *
 * @example Reading a file
 * ```typescript
 * import { FixedWidthParser } from './formats/fixed';
 *
 * const parser = new FixedWidthParser({ layout });
 * for await (const record of parser.parseFile('ledger.dat')) {
 *   console.log(record.code, record.amount);
 * }
 * ```
 */

// =============================================================================
// RE-EXPORTS - TYPES
// =============================================================================

export type {
  Field,
  FieldDefinition,
  FieldSpec,
  FixedRecord,
  FixedRecordInput,
  FixedWidthParserOptions,
  FixedWidthWriterOptions,
  LayoutBuilderOptions,
  LineInput,
} from "./types";

export { Alignment } from "./types";

// =============================================================================
// RE-EXPORTS - MAIN CLASSES
// =============================================================================

export { FieldBuilder, LayoutBuilder, resolveFields } from "./builder";

export { Layout } from "./layout";

export { FixedWidthParser, parseFixedWidth } from "./parser";

export { FixedWidthWriter } from "./writer";

// =============================================================================
// RE-EXPORTS - PRIMITIVES
// =============================================================================

export { fixedWidth, pad, scalarLength, stripPadding, truncate } from "./primitives";

export { isAlignment, parseAlignment, tryParseAlignment } from "./alignment";

// =============================================================================
// RE-EXPORTS - VALIDATION
// =============================================================================

export {
  FieldDefinitionListSchema,
  FieldDefinitionSchema,
  FixedWidthParserOptionsSchema,
  FixedWidthWriterOptionsSchema,
  LayoutBuilderOptionsSchema,
  PaddingSchema,
  PositionSchema,
  WidthSchema,
} from "./validation";

// =============================================================================
// RE-EXPORTS - CONSTANTS
// =============================================================================

export {
  ALIGNMENT_TOKENS,
  DEFAULT_ALIGNMENT,
  DEFAULT_LINE_ENDING,
  DEFAULT_PADDING,
  FORMAT_NAME,
} from "./constants";
