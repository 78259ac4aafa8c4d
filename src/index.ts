/**
 * fixedline - fixed-width flat-file records for TypeScript
 *
 * Declare fields by width, position or range, resolve them into an immutable
 * layout, and convert lines to records and back. Widths count Unicode code
 * points.
 */

// Error types
export {
  AlignmentError,
  BufferError,
  ERROR_SUGGESTIONS,
  FileError,
  FixedLineError,
  getErrorSuggestion,
  InsufficientBufferError,
  LayoutError,
  MissingSpecificationError,
  OrderingError,
  ParseError,
  StreamError,
  ValidationError,
} from "./errors";
// Fixed-width format
export * from "./formats";
// File I/O
export {
  createStream,
  exists,
  FileReader,
  getMetadata,
  getSize,
  readToString,
} from "./io/file-reader";
export { type FileWriteHandle, FileWriter, openForWriting, writeString } from "./io/file-writer";
export { processBuffer, readLines, splitLines, StreamUtils } from "./io/stream-utils";
// Shared types
export type {
  ErrorHandler,
  FileMetadata,
  FilePath,
  FileReaderOptions,
  LineProcessingResult,
  ParseResult,
  ParserOptions,
  WarningHandler,
  WriteOptions,
} from "./types";
export { FilePathSchema, FileReaderOptionsSchema } from "./types";
