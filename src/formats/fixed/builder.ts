/**
 * @module formats/fixed/builder
 * @description Field declaration and layout resolution
 *
 * Fields are declared left to right with any mix of width, start position or
 * range. A field may leave its width open when the next declaration gives an
 * explicit position; the gap between the two starts becomes its width.
 *
 * @example
 * ```typescript
 * const layout = new LayoutBuilder({ defaultPadding: " " })
 *   .field("account").width(10).append()
 *   .spacer(10, 12).append()
 *   .field("holder").append()                // width inferred from the next start
 *   .field("balance").position(40).width(12).alignment("right").padding("0").append()
 *   .build();
 * ```
 */

import { type } from "arktype";
import { MissingSpecificationError, OrderingError, ValidationError } from "../../errors";
import type { WarningHandler } from "../../types";
import { parseAlignment, tryParseAlignment } from "./alignment";
import { DEFAULT_ALIGNMENT, DEFAULT_PADDING, FORMAT_NAME } from "./constants";
import { Layout } from "./layout";
import type {
  Alignment,
  Field,
  FieldDefinition,
  FieldSpec,
  LayoutBuilderOptions,
} from "./types";
import {
  FieldDefinitionListSchema,
  LayoutBuilderOptionsSchema,
  validatePadding,
  validatePosition,
  validateWidth,
} from "./validation";

// =============================================================================
// RESOLUTION
// =============================================================================

interface DraftField {
  index: number;
  name?: string;
  start: number;
  width?: number;
  alignment: Alignment;
  padding: string;
}

/**
 * Resolve declarations into positioned fields in one left-to-right pass
 *
 * @throws {OrderingError} If a declared start precedes the end of the field before it
 * @throws {MissingSpecificationError} If a width can be neither read nor inferred
 */
export function resolveFields(specs: readonly FieldSpec[]): Field[] {
  const drafts: DraftField[] = [];
  let position = 0;

  specs.forEach((spec, index) => {
    const previous = drafts.at(-1);
    const open = previous !== undefined && previous.width === undefined ? previous : undefined;

    if (spec.start !== undefined) {
      if (spec.start < position) {
        throw new OrderingError(index, spec.name, spec.start, position);
      }
      position = spec.start;

      if (open !== undefined) {
        if (position === open.start) {
          throw new MissingSpecificationError(
            open.index,
            open.name,
            `no columns left before the next field at ${position}`
          );
        }
        open.width = position - open.start;
      }
    } else if (open !== undefined) {
      throw new MissingSpecificationError(
        open.index,
        open.name,
        "a width is required when the next field has no explicit position"
      );
    }

    drafts.push({
      index,
      name: spec.name,
      start: position,
      width: spec.width,
      alignment: spec.alignment,
      padding: spec.padding,
    });

    if (spec.width !== undefined) {
      position += spec.width;
    }
  });

  return drafts.map((draft) => {
    if (draft.width === undefined) {
      throw new MissingSpecificationError(
        draft.index,
        draft.name,
        "either a width or the next field's position must be specified"
      );
    }
    return {
      index: draft.index,
      name: draft.name,
      start: draft.start,
      width: draft.width,
      end: draft.start + draft.width,
      alignment: draft.alignment,
      padding: draft.padding,
    };
  });
}

// =============================================================================
// BUILDERS
// =============================================================================

/**
 * Accumulates field declarations and freezes them into a {@link Layout}
 *
 * The builder is consumed by a successful `build()`; any later call throws.
 */
export class LayoutBuilder {
  private readonly specs: FieldSpec[] = [];
  private alignmentDefault: Alignment;
  private paddingDefault: string;
  private readonly onWarning: WarningHandler;
  private consumed = false;

  constructor(options: LayoutBuilderOptions = {}) {
    const validation = LayoutBuilderOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid layout builder options: ${validation.summary}`);
    }

    this.alignmentDefault =
      options.defaultAlignment === undefined
        ? DEFAULT_ALIGNMENT
        : parseAlignment(options.defaultAlignment);
    this.paddingDefault = options.defaultPadding ?? DEFAULT_PADDING;
    this.onWarning =
      options.onWarning ??
      ((warning: string): void => {
        console.warn(`${FORMAT_NAME} Warning: ${warning}`);
      });
  }

  /**
   * Build a layout from plain field definitions
   *
   * @throws {ValidationError} If a definition is malformed
   * @throws {OrderingError | MissingSpecificationError} If the definitions do not resolve
   *
   * @example
   * ```typescript
   * const layout = LayoutBuilder.fromDefinitions([
   *   { name: "id", width: 5, alignment: "right", padding: "0" },
   *   { start: 5, end: 7 },
   *   { name: "name", width: 20 },
   * ]);
   * ```
   */
  static fromDefinitions(
    definitions: readonly FieldDefinition[],
    options: LayoutBuilderOptions = {}
  ): Layout {
    const validation = FieldDefinitionListSchema(definitions);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid field definitions: ${validation.summary}`);
    }

    const builder = new LayoutBuilder(options);
    for (const definition of definitions) {
      const field = builder.declare(definition.name);

      if (definition.start !== undefined && definition.end !== undefined) {
        field.range(definition.start, definition.end);
      } else {
        if (definition.start !== undefined) field.position(definition.start);
        if (definition.width !== undefined) field.width(definition.width);
      }
      if (definition.alignment !== undefined) field.alignment(definition.alignment);
      if (definition.padding !== undefined) field.padding(definition.padding);

      field.append();
    }
    return builder.build();
  }

  /**
   * Alignment and padding that new declarations start from
   */
  get defaults(): { readonly alignment: Alignment; readonly padding: string } {
    return { alignment: this.alignmentDefault, padding: this.paddingDefault };
  }

  /**
   * Declarations in their current order
   */
  get declarations(): readonly Readonly<FieldSpec>[] {
    return this.specs.map((spec) => ({ ...spec }));
  }

  /**
   * Set the alignment for fields declared after this call
   *
   * @throws {AlignmentError} If the token is neither "left" nor "right"
   */
  defaultAlignment(alignment: Alignment | string): this {
    this.assertOpen();
    this.alignmentDefault = parseAlignment(alignment);
    return this;
  }

  /**
   * Set the padding for fields declared after this call
   *
   * @throws {ValidationError} If `padding` is not exactly one character
   */
  defaultPadding(padding: string): this {
    this.assertOpen();
    this.paddingDefault = validatePadding(padding);
    return this;
  }

  /**
   * Start declaring a named field
   */
  field(name: string): FieldBuilder {
    return this.declare(name);
  }

  /**
   * Start declaring an anonymous field over columns `[start, end)`
   */
  spacer(start: number, end: number): FieldBuilder {
    return this.declare(undefined).range(start, end);
  }

  /**
   * Resolve the declarations into a layout
   *
   * Columns between fields are filled with the current default padding when
   * formatting.
   *
   * @throws {OrderingError} If a declared start precedes the end of the previous field
   * @throws {MissingSpecificationError} If a width can be neither read nor inferred
   */
  build(): Layout {
    this.assertOpen();
    const fields = resolveFields(this.specs);
    this.consumed = true;
    return new Layout(fields, this.paddingDefault);
  }

  /**
   * @internal Used by {@link FieldBuilder}
   */
  addDeclaration(spec: FieldSpec, index?: number): this {
    this.assertOpen();
    if (index === undefined) {
      this.specs.push(spec);
      return this;
    }
    if (!Number.isInteger(index) || index < 0 || index > this.specs.length) {
      throw new ValidationError(
        `Insert index ${index} is out of range for ${this.specs.length} declarations`
      );
    }
    this.specs.splice(index, 0, spec);
    return this;
  }

  private declare(name: string | undefined): FieldBuilder {
    this.assertOpen();
    return new FieldBuilder(this, name, this.alignmentDefault, this.paddingDefault, this.onWarning);
  }

  private assertOpen(): void {
    if (this.consumed) {
      throw new ValidationError("Layout builder has already been built");
    }
  }
}

/**
 * Declares one field, then hands it back to its {@link LayoutBuilder}
 */
export class FieldBuilder {
  private declaredStart?: number;
  private declaredWidth?: number;
  private fieldAlignment: Alignment;
  private fieldPadding: string;

  constructor(
    private readonly parent: LayoutBuilder,
    private readonly name: string | undefined,
    alignment: Alignment,
    padding: string,
    private readonly onWarning: WarningHandler
  ) {
    this.fieldAlignment = alignment;
    this.fieldPadding = padding;
  }

  /**
   * @throws {ValidationError} If `width` is not a positive integer
   */
  width(width: number): this {
    this.declaredWidth = validateWidth(width);
    return this;
  }

  /**
   * Fix the field's start column
   *
   * @throws {ValidationError} If `position` is not a non-negative integer
   */
  position(position: number): this {
    this.declaredStart = validatePosition(position);
    return this;
  }

  /**
   * Occupy columns `[start, end)`
   *
   * @throws {ValidationError} If the range is empty or not made of integers
   */
  range(start: number, end: number): this {
    validatePosition(start, "range start");
    validatePosition(end, "range end");
    if (end <= start) {
      throw new ValidationError(`Invalid range: end ${end} must be greater than start ${start}`);
    }
    this.declaredStart = start;
    this.declaredWidth = end - start;
    return this;
  }

  /**
   * Set the field's alignment. An unrecognized token is reported as a
   * warning and the field keeps its current alignment.
   */
  alignment(alignment: Alignment | string): this {
    const result = tryParseAlignment(alignment);
    if (result.success) {
      this.fieldAlignment = result.value;
    } else {
      this.onWarning(
        `${result.error.message}; ${this.describe()} keeps alignment "${this.fieldAlignment}"`
      );
    }
    return this;
  }

  /**
   * @throws {ValidationError} If `padding` is not exactly one character
   */
  padding(padding: string): this {
    this.fieldPadding = validatePadding(padding);
    return this;
  }

  /**
   * Add the field after all current declarations
   */
  append(): LayoutBuilder {
    return this.parent.addDeclaration(this.toSpec());
  }

  /**
   * Add the field before the declaration currently at `index`
   *
   * @throws {ValidationError} If `index` is past the end of the declarations
   */
  insert(index: number): LayoutBuilder {
    return this.parent.addDeclaration(this.toSpec(), index);
  }

  private toSpec(): FieldSpec {
    return {
      name: this.name,
      start: this.declaredStart,
      width: this.declaredWidth,
      alignment: this.fieldAlignment,
      padding: this.fieldPadding,
    };
  }

  private describe(): string {
    return this.name === undefined ? "spacer" : `field "${this.name}"`;
  }
}
