/**
 * Shared types for parsers and the file I/O layer
 *
 * Format-specific types live beside their format under `formats/`.
 */

import { type } from "arktype";

// =============================================================================
// PARSING
// =============================================================================

/**
 * Discriminated union encoding success or failure states.
 *
 * @example
 * ```ts
 * const result = layout.parse(line);
 * if (result.success) {
 *   console.log(result.value);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export type ParseResult<T, E = Error> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: E };

/**
 * Handler invoked for a recoverable parsing problem
 */
export type ErrorHandler = (error: string, lineNumber?: number) => void;

/**
 * Handler invoked for diagnostics that never interrupt processing
 */
export type WarningHandler = (warning: string, lineNumber?: number) => void;

/**
 * Options shared by every line-oriented parser
 */
export interface ParserOptions {
  /** Maximum line length (in characters) before the line is rejected */
  maxLineLength?: number;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom error handler */
  onError?: ErrorHandler;
  /** Custom warning handler */
  onWarning?: WarningHandler;
}

// =============================================================================
// FILE I/O
// =============================================================================

/**
 * Validated file path
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

/**
 * File reading configuration options
 */
export interface FileReaderOptions {
  /** Buffer size for streaming reads (default: 64KB) */
  readonly bufferSize?: number;
  /** Text encoding for file content (default: 'utf8') */
  readonly encoding?: "utf8" | "binary";
  /** Maximum file size in bytes (default: 100MB) */
  readonly maxFileSize?: number;
}

/**
 * File writing configuration options
 */
export interface WriteOptions {
  /** Append to the file instead of replacing it (default: false) */
  readonly append?: boolean;
}

/**
 * File metadata gathered before streaming
 */
export interface FileMetadata {
  readonly path: FilePath;
  /** File size in bytes */
  readonly size: number;
  readonly lastModified: Date;
  /** File extension, including the leading dot, or "" */
  readonly extension: string;
}

/**
 * Line processing result for streaming text files
 */
export interface LineProcessingResult {
  /** Complete lines extracted from buffer */
  readonly lines: string[];
  /** Incomplete line remainder to carry forward */
  readonly remainder: string;
}

// =============================================================================
// SCHEMAS
// =============================================================================

/**
 * File path validation schema producing a branded {@link FilePath}
 */
export const FilePathSchema = type("string>0")
  .narrow((path, ctx) => {
    if (path.includes("\0")) {
      return ctx.reject({ expected: "a path without null characters", actual: JSON.stringify(path) });
    }
    if (/[<>"|*?]/.test(path)) {
      return ctx.reject({ expected: "a path without <>\"|*? characters", actual: path });
    }
    return true;
  })
  .pipe((path) => path as FilePath);

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "1024<=number<=1048576",
  "encoding?": '"utf8"|"binary"',
  "maxFileSize?": "number>=0",
});
