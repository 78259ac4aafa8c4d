/**
 * Error handling for fixed-width record processing
 *
 * Layout construction errors are thrown and abort the build. Codec errors are
 * returned to the caller of `Layout.parse` as typed failures so one bad line
 * never stops a stream of records.
 */

/**
 * Base error class for all fixedline errors
 */
export class FixedLineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "FixedLineError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed declarations, options or arguments
 */
export class ValidationError extends FixedLineError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Unrecognized alignment token
 */
export class AlignmentError extends ValidationError {
  constructor(public readonly token: string) {
    super(`Unknown alignment "${token}", expected "left" or "right"`);
    this.name = "AlignmentError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends FixedLineError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * The input line holds fewer scalars than the layout needs, or its length
 * cannot be known without reading it
 */
export class InsufficientBufferError extends ParseError {
  constructor(
    public readonly required: number,
    public readonly available?: number,
    lineNumber?: number
  ) {
    super(
      available === undefined
        ? `Undefined buffer size, required ${required}`
        : `Insufficient buffer size, required ${required} only ${available} available`,
      "FIXED",
      lineNumber
    );
    this.name = "InsufficientBufferError";
  }

  /**
   * Same failure, attributed to a line of a larger input
   */
  atLine(lineNumber: number): InsufficientBufferError {
    return new InsufficientBufferError(this.required, this.available, lineNumber);
  }
}

/**
 * Base class for errors raised while resolving field declarations
 */
export class LayoutError extends FixedLineError {
  constructor(
    message: string,
    code: string,
    public readonly fieldIndex: number,
    public readonly fieldName?: string
  ) {
    super(message, code, undefined, describeField(fieldIndex, fieldName));
    this.name = "LayoutError";
  }
}

/**
 * A declaration starts before the end of the field resolved before it
 */
export class OrderingError extends LayoutError {
  constructor(
    fieldIndex: number,
    fieldName: string | undefined,
    public readonly start: number,
    public readonly position: number
  ) {
    super(
      `${describeField(fieldIndex, fieldName)} starts at ${start}, before the current position ${position}`,
      "ORDERING_ERROR",
      fieldIndex,
      fieldName
    );
    this.name = "OrderingError";
  }
}

/**
 * A declaration whose width can neither be read nor inferred
 */
export class MissingSpecificationError extends LayoutError {
  constructor(fieldIndex: number, fieldName: string | undefined, detail: string) {
    super(
      `${describeField(fieldIndex, fieldName)}: ${detail}`,
      "MISSING_SPECIFICATION",
      fieldIndex,
      fieldName
    );
    this.name = "MissingSpecificationError";
  }
}

/**
 * File I/O errors with operation context
 */
export class FileError extends FixedLineError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open" | "close",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    if (systemError instanceof FileError) {
      return systemError;
    }
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("emfile") || msg.includes("too many open files")) {
      return "Close unused file handles or raise the open file limit";
    }

    return undefined;
  }
}

/**
 * Stream processing errors
 */
export class StreamError extends FixedLineError {
  constructor(
    message: string,
    public readonly streamType: "read" | "write",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Buffer overflow while assembling lines
 */
export class BufferError extends FixedLineError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly operation: "overflow",
    context?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}

export const ERROR_SUGGESTIONS = {
  SHORT_LINE: "Lines must be at least as long as the layout's total width; check for trimmed trailing padding",
  FIELD_ORDER: "Declare fields left to right; an explicit position may not precede the previous field's end",
  MISSING_WIDTH: "Give the field a width or range, or give the next field an explicit position",
  ALIGNMENT: 'Alignment must be "left" or "right"',
  MALFORMED_LINE: "Check for extra whitespace, special characters, or encoding issues",
} as const;

/**
 * Suggest a fix for a fixedline error
 */
export function getErrorSuggestion(error: FixedLineError): string | undefined {
  if (error instanceof InsufficientBufferError) {
    return ERROR_SUGGESTIONS.SHORT_LINE;
  }
  if (error instanceof OrderingError) {
    return ERROR_SUGGESTIONS.FIELD_ORDER;
  }
  if (error instanceof MissingSpecificationError) {
    return ERROR_SUGGESTIONS.MISSING_WIDTH;
  }
  if (error instanceof AlignmentError) {
    return ERROR_SUGGESTIONS.ALIGNMENT;
  }
  if (error instanceof ParseError) {
    return ERROR_SUGGESTIONS.MALFORMED_LINE;
  }
  return undefined;
}

function describeField(index: number, name: string | undefined): string {
  return name === undefined ? `Spacer (index ${index})` : `Field "${name}" (index ${index})`;
}
