/**
 * Stream processing utilities for line-oriented text
 *
 * Turns byte streams into complete lines regardless of how chunks split
 * lines or multi-byte characters.
 */

import type { ReadableStream } from "node:stream/web";
import { BufferError, StreamError } from "../errors";
import type { LineProcessingResult } from "../types";

const MAX_LINE_LENGTH = 1_000_000;
const MAX_BUFFER_SIZE = 10_485_760;

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Line terminators (`\n`, `\r\n`, `\r`) are removed. A final line without a
 * terminator is still yielded, even when it holds only whitespace, since a
 * fixed-width line may consist entirely of padding.
 *
 * @throws {StreamError} If stream processing fails
 * @throws {BufferError} If a line is too long
 * @example
 * ```typescript
 * const stream = await createStream('/data/accounts.dat');
 * for await (const line of readLines(stream)) {
 *   console.log(line);
 * }
 * ```
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  encoding: "utf8" | "binary" = "utf8"
): AsyncIterable<string> {
  const reader = stream.getReader();
  // 'iso-8859-1' is the standard label for latin1
  const decoder = new TextDecoder(encoding === "binary" ? "iso-8859-1" : "utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      totalBytesProcessed += value.length;

      const result = processBuffer(buffer);
      buffer = result.remainder;

      for (const line of result.lines) {
        yield line;
      }

      if (buffer.length > MAX_BUFFER_SIZE) {
        throw new BufferError(
          `Buffer overflow: ${buffer.length} characters exceeds maximum ${MAX_BUFFER_SIZE}`,
          buffer.length,
          "overflow"
        );
      }
    }

    buffer += decoder.decode();
    const result = processBuffer(buffer);
    for (const line of result.lines) {
      yield line;
    }
    const last = result.remainder.endsWith("\r")
      ? result.remainder.slice(0, -1)
      : result.remainder;
    if (last.length > 0) {
      yield last;
    }
  } catch (error) {
    if (error instanceof BufferError) {
      throw error;
    }
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      totalBytesProcessed
    );
  } finally {
    reader.releaseLock();
  }
}

/**
 * Process text buffer to extract complete lines
 *
 * Handles `\n`, `\r\n` and `\r` line endings and keeps the incomplete tail
 * for the next cycle. A trailing `\r` stays in the remainder until the next
 * character shows whether it starts a `\r\n` pair.
 *
 * @throws {BufferError} If a single line exceeds maximum length
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  for (let position = 0; position < buffer.length; position++) {
    const char = buffer[position];

    if (char === "\n") {
      const lineEnd = position > lineStart && buffer[position - 1] === "\r" ? position - 1 : position;
      lines.push(checkLineLength(buffer.slice(lineStart, lineEnd)));
      lineStart = position + 1;
    } else if (char === "\r" && position + 1 < buffer.length && buffer[position + 1] !== "\n") {
      lines.push(checkLineLength(buffer.slice(lineStart, position)));
      lineStart = position + 1;
    }
  }

  const remainder = buffer.slice(lineStart);
  if (remainder.length > MAX_LINE_LENGTH) {
    throw new BufferError(
      `Incomplete line too long: ${remainder.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
      remainder.length,
      "overflow",
      "This might indicate a file without proper line endings"
    );
  }

  return { lines, remainder };
}

/**
 * Split an in-memory string into lines with the same rules as {@link readLines}
 */
export function splitLines(data: string): string[] {
  const { lines, remainder } = processBuffer(data);
  const last = remainder.endsWith("\r") ? remainder.slice(0, -1) : remainder;
  return last.length > 0 ? [...lines, last] : lines;
}

function checkLineLength(line: string): string {
  if (line.length > MAX_LINE_LENGTH) {
    throw new BufferError(
      `Line too long: ${line.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
      line.length,
      "overflow",
      `Line starts with: ${line.slice(0, 100)}...`
    );
  }
  return line;
}

export const StreamUtils = {
  readLines,
  processBuffer,
  splitLines,
} as const;
