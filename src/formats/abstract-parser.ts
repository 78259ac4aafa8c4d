/**
 * Abstract base parser with shared error, warning and interrupt handling
 *
 * Concrete parsers keep their own parsing logic; this class only settles the
 * handlers every line-oriented parser reports through and the AbortSignal
 * support.
 */

import type { ReadableStream } from "node:stream/web";
import { ParseError } from "../errors";
import type { ErrorHandler, FileReaderOptions, ParserOptions, WarningHandler } from "../types";

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions;
  protected readonly onError: ErrorHandler;
  protected readonly onWarning: WarningHandler;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    this.options = options;
    this.onWarning =
      options.onWarning ??
      ((warning: string, lineNumber?: number): void => {
        const where = lineNumber === undefined ? "" : ` (line ${lineNumber})`;
        console.warn(`${this.getFormatName()} Warning${where}: ${warning}`);
      });
    this.onError = options.onError ?? this.getDefaultErrorHandler();
    this.interruptHandler = new InterruptHandler(options.signal);
  }

  /**
   * Error handler used when the caller supplies none. Throws a
   * {@link ParseError} unless a format overrides it.
   */
  protected getDefaultErrorHandler(): ErrorHandler {
    return (error: string, lineNumber?: number): void => {
      throw new ParseError(error, this.getFormatName(), lineNumber);
    };
  }

  /**
   * Throw if the parsing operation has been aborted
   */
  protected throwIfAborted(context: string): void {
    this.interruptHandler.throwIfAborted(`${this.getFormatName()} ${context}`);
  }

  /**
   * Parse records from an in-memory string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file
   */
  abstract parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<T>;

  /**
   * Parse records from a byte stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format identifier for error messages and logging
   */
  protected abstract getFormatName(): string;
}

/**
 * AbortSignal integration for parsing loops
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If the operation was aborted
   */
  throwIfAborted(context: string): void {
    if (this.signal?.aborted === true) {
      throw new ParseError(`Operation aborted during ${context}`, "ABORTED");
    }
  }
}
