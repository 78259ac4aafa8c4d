/**
 * @module formats/fixed/writer
 * @description Renders records as fixed-width lines
 */

import type { WritableStream } from "node:stream/web";
import { type } from "arktype";
import { StreamError, ValidationError } from "../../errors";
import { openForWriting } from "../../io/file-writer";
import type { WriteOptions } from "../../types";
import { DEFAULT_LINE_ENDING } from "./constants";
import type { Layout } from "./layout";
import type { FixedRecordInput, FixedWidthWriterOptions } from "./types";
import { FixedWidthWriterOptionsSchema } from "./validation";

/**
 * Writes records through a {@link Layout}
 *
 * @example
 * ```typescript
 * const writer = new FixedWidthWriter({ layout, lineEnding: "\r\n" });
 * await writer.writeToFile("accounts.dat", records);
 * ```
 */
export class FixedWidthWriter {
  private readonly layout: Layout;
  private readonly lineEnding: string;

  constructor(options: FixedWidthWriterOptions) {
    const validation = FixedWidthWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid fixed-width writer options: ${validation.summary}`);
    }

    this.layout = options.layout;
    this.lineEnding = options.lineEnding ?? DEFAULT_LINE_ENDING;
  }

  /**
   * Format a single record, without a line terminator
   */
  formatRecord(record: FixedRecordInput): string {
    return this.layout.format(record);
  }

  /**
   * Format records as lines joined by the line ending
   */
  formatRecords(records: Iterable<FixedRecordInput>): string {
    return Array.from(records, (record) => this.formatRecord(record)).join(this.lineEnding);
  }

  /**
   * Write records to a WritableStream, each followed by the line ending
   *
   * @throws {StreamError} If the stream rejects a write
   */
  async writeToStream(
    records: Iterable<FixedRecordInput> | AsyncIterable<FixedRecordInput>,
    stream: WritableStream<Uint8Array>
  ): Promise<void> {
    const writer = stream.getWriter();
    const encoder = new TextEncoder();
    let bytesWritten = 0;

    try {
      for await (const record of records) {
        const bytes = encoder.encode(this.formatRecord(record) + this.lineEnding);
        await writer.write(bytes);
        bytesWritten += bytes.length;
      }
    } catch (error) {
      throw new StreamError(
        `Record writing failed: ${error instanceof Error ? error.message : String(error)}`,
        "write",
        bytesWritten
      );
    } finally {
      writer.releaseLock();
    }
  }

  /**
   * Write records to a file, each followed by the line ending
   *
   * @throws {FileError} If the file cannot be opened or written
   */
  async writeToFile(
    path: string,
    records: Iterable<FixedRecordInput> | AsyncIterable<FixedRecordInput>,
    options: WriteOptions = {}
  ): Promise<void> {
    await openForWriting(
      path,
      async (handle) => {
        for await (const record of records) {
          await handle.writeString(this.formatRecord(record) + this.lineEnding);
        }
      },
      options
    );
  }
}
