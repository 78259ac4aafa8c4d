/**
 * @module formats/fixed/parser
 * @description Line reader producing fixed-width records
 *
 * Feeds a {@link Layout} one line at a time from strings, iterables, web
 * streams or files. A line that cannot be parsed is reported with its line
 * number and skipped, so one malformed record never stops the rest.
 */

import type { ReadableStream } from "node:stream/web";
import { type } from "arktype";
import { ParseError, ValidationError } from "../../errors";
import { createStream } from "../../io/file-reader";
import { readLines, splitLines } from "../../io/stream-utils";
import type { ErrorHandler, FileReaderOptions, ParseResult } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { FORMAT_NAME } from "./constants";
import type { Layout } from "./layout";
import { scalarLength } from "./primitives";
import type { FixedRecord, FixedWidthParserOptions } from "./types";
import { FixedWidthParserOptionsSchema } from "./validation";

/**
 * Reads fixed-width records line by line
 *
 * @example
 * ```typescript
 * const parser = new FixedWidthParser({ layout });
 * for await (const record of parser.parseFile("accounts.dat")) {
 *   console.log(record.account, record.balance);
 * }
 * ```
 *
 * @example Fail on the first bad line
 * ```typescript
 * const parser = new FixedWidthParser({
 *   layout,
 *   onError: (message, line) => {
 *     throw new Error(`line ${line}: ${message}`);
 *   },
 * });
 * ```
 */
export class FixedWidthParser extends AbstractParser<FixedRecord, FixedWidthParserOptions> {
  private readonly layout: Layout;
  private readonly skipEmptyLines: boolean;
  private readonly maxLineLength: number | undefined;

  constructor(options: FixedWidthParserOptions) {
    const validation = FixedWidthParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid fixed-width parser options: ${validation.summary}`);
    }

    super(options);
    this.layout = options.layout;
    this.skipEmptyLines = options.skipEmptyLines ?? true;
    this.maxLineLength = options.maxLineLength;
  }

  protected getFormatName(): string {
    return FORMAT_NAME;
  }

  /**
   * Report bad lines as warnings and keep going
   */
  protected override getDefaultErrorHandler(): ErrorHandler {
    return (error: string, lineNumber?: number): void => {
      this.onWarning(`Skipped record: ${error}`, lineNumber);
    };
  }

  /**
   * Parse a single line
   *
   * Failures carry `lineNumber` when one is given.
   */
  parseLine(line: string, lineNumber?: number): ParseResult<FixedRecord, ParseError> {
    if (this.maxLineLength !== undefined) {
      const length = scalarLength(line);
      if (length > this.maxLineLength) {
        return {
          success: false,
          error: new ParseError(
            `Line length ${length} exceeds maximum ${this.maxLineLength}`,
            FORMAT_NAME,
            lineNumber
          ),
        };
      }
    }

    const result = this.layout.parse(line);
    if (!result.success && lineNumber !== undefined) {
      return { success: false, error: result.error.atLine(lineNumber) };
    }
    return result;
  }

  /**
   * Parse records from lines, numbering them from 1
   */
  async *parseLines(lines: Iterable<string> | AsyncIterable<string>): AsyncIterable<FixedRecord> {
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      this.throwIfAborted(`record parsing at line ${lineNumber}`);

      if (this.skipEmptyLines && line.length === 0) {
        continue;
      }

      const result = this.parseLine(line, lineNumber);
      if (result.success) {
        yield result.value;
      } else {
        this.onError(result.error.message, lineNumber);
      }
    }
  }

  async *parseString(data: string): AsyncIterable<FixedRecord> {
    yield* this.parseLines(splitLines(data));
  }

  async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<FixedRecord> {
    yield* this.parseLines(readLines(stream, this.options.encoding ?? "utf8"));
  }

  /**
   * Parse records from a file. `options.encoding` takes precedence over the
   * parser's own encoding.
   */
  async *parseFile(filePath: string, options: FileReaderOptions = {}): AsyncIterable<FixedRecord> {
    const encoding = options.encoding ?? this.options.encoding ?? "utf8";
    const stream = await createStream(filePath, { ...options, encoding });
    yield* this.parseLines(readLines(stream, encoding));
  }
}

/**
 * Collect every record of an in-memory string
 */
export async function parseFixedWidth(
  data: string,
  options: FixedWidthParserOptions
): Promise<FixedRecord[]> {
  const records: FixedRecord[] = [];
  for await (const record of new FixedWidthParser(options).parseString(data)) {
    records.push(record);
  }
  return records;
}
