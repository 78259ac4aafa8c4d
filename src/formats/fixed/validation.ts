/**
 * @module formats/fixed/validation
 * @description ArkType schemas for fixed-width declarations and options
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import { scalarLength } from "./primitives";

// =============================================================================
// SCALAR SCHEMAS
// =============================================================================

/**
 * Field width: a positive integer
 */
export const WidthSchema = type("number>=1").narrow(
  (width, ctx) => Number.isInteger(width) || ctx.reject({ expected: "an integer", actual: String(width) })
);

/**
 * Column position: a non-negative integer
 */
export const PositionSchema = type("number>=0").narrow(
  (position, ctx) =>
    Number.isInteger(position) || ctx.reject({ expected: "an integer", actual: String(position) })
);

/**
 * Padding: exactly one character (one code point)
 */
export const PaddingSchema = type("string").narrow(
  (padding, ctx) =>
    scalarLength(padding) === 1 ||
    ctx.reject({ expected: "a single character", actual: JSON.stringify(padding) })
);

// =============================================================================
// DECLARATION SCHEMAS
// =============================================================================

/**
 * Plain-object field declaration
 */
export const FieldDefinitionSchema = type({
  "name?": "string",
  "start?": PositionSchema,
  "width?": WidthSchema,
  "end?": PositionSchema,
  "alignment?": "string",
  "padding?": PaddingSchema,
}).narrow((definition, ctx) => {
  if (definition.end === undefined) {
    return true;
  }
  if (definition.start === undefined) {
    return ctx.reject({ path: ["end"], expected: "end together with start", actual: "end without start" });
  }
  if (definition.end <= definition.start) {
    return ctx.reject({
      path: ["end"],
      expected: `end greater than start (${definition.start})`,
      actual: String(definition.end),
    });
  }
  if (definition.width !== undefined && definition.width !== definition.end - definition.start) {
    return ctx.reject({
      path: ["width"],
      expected: `width matching end - start (${definition.end - definition.start})`,
      actual: String(definition.width),
    });
  }
  return true;
});

export const FieldDefinitionListSchema = FieldDefinitionSchema.array();

// =============================================================================
// OPTION SCHEMAS
// =============================================================================

export const LayoutBuilderOptionsSchema = type({
  "defaultAlignment?": "string",
  "defaultPadding?": PaddingSchema,
  "onWarning?": "unknown",
});

export const FixedWidthParserOptionsSchema = type({
  layout: "object",
  "skipEmptyLines?": "boolean",
  "maxLineLength?": "number>=1",
  "encoding?": '"utf8"|"binary"',
  "signal?": "unknown",
  "onError?": "unknown",
  "onWarning?": "unknown",
});

export const FixedWidthWriterOptionsSchema = type({
  layout: "object",
  "lineEnding?": "string",
}).narrow(
  (options, ctx) =>
    options.lineEnding === undefined ||
    ["\n", "\r\n", "\r"].includes(options.lineEnding) ||
    ctx.reject({ path: ["lineEnding"], expected: "\\n, \\r\\n or \\r", actual: JSON.stringify(options.lineEnding) })
);

// =============================================================================
// ASSERTIONS
// =============================================================================

/**
 * @throws {ValidationError} If `width` is not a positive integer
 */
export function validateWidth(width: number, label = "width"): number {
  const result = WidthSchema(width);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid ${label}: ${result.summary}`);
  }
  return result;
}

/**
 * @throws {ValidationError} If `position` is not a non-negative integer
 */
export function validatePosition(position: number, label = "position"): number {
  const result = PositionSchema(position);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid ${label}: ${result.summary}`);
  }
  return result;
}

/**
 * @throws {ValidationError} If `padding` is not exactly one character
 */
export function validatePadding(padding: string): string {
  const result = PaddingSchema(padding);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid padding: ${result.summary}`);
  }
  return result;
}
