/**
 * @module formats/fixed/layout
 * @description Resolved fixed-width layout and its record codec
 *
 * A layout is built once by {@link LayoutBuilder} and then shared read-only:
 * `parse` and `format` keep all state local to the call.
 */

import { InsufficientBufferError, OrderingError, ValidationError } from "../../errors";
import type { ParseResult } from "../../types";
import { DEFAULT_PADDING } from "./constants";
import { fixedWidth, scalarLength, stripPadding } from "./primitives";
import type { Field, FixedRecord, FixedRecordInput, LineInput } from "./types";

/**
 * Immutable ordered set of positioned fields plus the total record width
 *
 * @example
 * ```typescript
 * const layout = new LayoutBuilder()
 *   .field("id").width(5).alignment("right").padding("0").append()
 *   .field("name").width(10).append()
 *   .build();
 *
 * layout.format({ id: "42", name: "Ada" }); // "00042Ada       "
 * layout.parse("00042Ada       ");          // { success: true, value: { id: "42", name: "Ada" } }
 * ```
 */
export class Layout {
  readonly fields: readonly Field[];
  readonly totalWidth: number;
  /** Character written to columns that belong to no field */
  readonly fill: string;

  /**
   * Layouts normally come from {@link LayoutBuilder}.
   *
   * @throws {ValidationError} If a field's width or end is inconsistent
   * @throws {OrderingError} If fields overlap or are out of order
   */
  constructor(fields: readonly Field[], fill: string = DEFAULT_PADDING) {
    assertPositioned(fields);
    this.fields = Object.freeze(fields.map((field) => Object.freeze({ ...field })));
    this.totalWidth = fields.reduce((width, field) => Math.max(width, field.end), 0);
    this.fill = fill;
    Object.freeze(this);
  }

  /**
   * Distinct field names in layout order
   */
  get names(): string[] {
    const names: string[] = [];
    for (const field of this.fields) {
      if (field.name !== undefined && !names.includes(field.name)) {
        names.push(field.name);
      }
    }
    return names;
  }

  /**
   * First field carrying `name`
   */
  getField(name: string): Field | undefined {
    return this.fields.find((field) => field.name === name);
  }

  /**
   * Extract a record from one line
   *
   * Fails with {@link InsufficientBufferError} when the line holds fewer
   * characters than `totalWidth`, or when its length cannot be known up front
   * (a bare iterable). Characters past `totalWidth` are ignored. When two
   * fields share a name the first one's value is kept.
   */
  parse(line: LineInput): ParseResult<FixedRecord, InsufficientBufferError> {
    if (this.totalWidth > 0) {
      const available = availableLength(line);
      if (available === undefined || available < this.totalWidth) {
        return { success: false, error: new InsufficientBufferError(this.totalWidth, available) };
      }
    }

    const entries: Array<[string, string]> = [];
    const seen = new Set<string>();
    const characters = line[Symbol.iterator]();
    let cursor = 0;

    for (const field of this.fields) {
      for (; cursor < field.start; cursor++) {
        characters.next();
      }

      let slot = "";
      for (; cursor < field.end; cursor++) {
        const next = characters.next();
        if (next.done === true) break;
        slot += next.value;
      }

      if (field.name !== undefined && !seen.has(field.name)) {
        seen.add(field.name);
        entries.push([field.name, stripPadding(slot, field.alignment, field.padding)]);
      }
    }

    const record: FixedRecord = Object.fromEntries(entries);
    return { success: true, value: record };
  }

  /**
   * Render a record as one line of exactly `totalWidth` characters
   *
   * Values are padded or truncated to their field's width. Absent names and
   * spacers render as the field's padding.
   */
  format(record: FixedRecordInput): string {
    let line = "";
    let cursor = 0;

    for (const field of this.fields) {
      if (field.start > cursor) {
        line += this.fill.repeat(field.start - cursor);
      }
      const value =
        field.name !== undefined && Object.hasOwn(record, field.name)
          ? (record[field.name] ?? "")
          : "";
      line += fixedWidth(value, field.width, field.alignment, field.padding);
      cursor = field.end;
    }

    return line;
  }
}

function assertPositioned(fields: readonly Field[]): void {
  let position = 0;
  for (const field of fields) {
    if (!Number.isInteger(field.start) || !Number.isInteger(field.width) || field.width < 1) {
      throw new ValidationError(
        `Invalid field at index ${field.index}: start ${field.start}, width ${field.width}`
      );
    }
    if (field.end !== field.start + field.width) {
      throw new ValidationError(
        `Invalid field at index ${field.index}: end ${field.end} is not start + width`
      );
    }
    if (field.start < position) {
      throw new OrderingError(field.index, field.name, field.start, position);
    }
    position = field.end;
  }
}

function availableLength(line: LineInput): number | undefined {
  if (typeof line === "string") {
    return scalarLength(line);
  }
  if (Array.isArray(line)) {
    return line.length;
  }
  return undefined;
}
