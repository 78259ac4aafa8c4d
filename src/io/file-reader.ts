/**
 * File reading utilities
 *
 * Each operation is an Effect program over `node:fs` with failures typed as
 * {@link FileError}; the public API exposes them as Promises.
 */

import { createReadStream } from "node:fs";
import { readFile, stat } from "node:fs/promises";
import { extname } from "node:path";
import { Readable } from "node:stream";
import type { ReadableStream } from "node:stream/web";
import { type } from "arktype";
import { Effect, Either } from "effect";
import { FileError } from "../errors";
import type { FileMetadata, FilePath, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536,
  encoding: "utf8",
  maxFileSize: 104_857_600, // 100MB
};

/**
 * Run a file program, rejecting with its typed failure
 */
export async function runFileProgram<A>(program: Effect.Effect<A, FileError>): Promise<A> {
  const result = await Effect.runPromise(Effect.either(program));
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}

const statFile = (path: FilePath) =>
  Effect.tryPromise({
    try: () => stat(path),
    catch: (error) => FileError.fromSystemError("stat", path, error),
  });

/**
 * Check if a file exists and is a regular file
 *
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = statFile(validatedPath).pipe(
    Effect.map((info) => info.isFile()),
    Effect.orElseSucceed(() => false)
  );

  return runFileProgram(program);
}

/**
 * Get file size in bytes
 *
 * @throws {FileError} If file cannot be accessed or doesn't exist
 */
export async function getSize(path: string): Promise<number> {
  const validatedPath = validatePath(path);
  return runFileProgram(statFile(validatedPath).pipe(Effect.map((info) => info.size)));
}

/**
 * Get file metadata
 *
 * @throws {FileError} If file cannot be accessed
 */
export async function getMetadata(path: string): Promise<FileMetadata> {
  const validatedPath = validatePath(path);

  const program = statFile(validatedPath).pipe(
    Effect.map(
      (info): FileMetadata => ({
        path: validatedPath,
        size: info.size,
        lastModified: info.mtime,
        extension: extname(validatedPath),
      })
    )
  );

  return runFileProgram(program);
}

/**
 * Create a streaming reader for a file
 *
 * @throws {FileError} If the file is missing, not a regular file, or too large
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const program = Effect.gen(function* () {
    yield* checkReadable(validatedPath, mergedOptions);
    return yield* Effect.try({
      try: (): ReadableStream<Uint8Array> =>
        Readable.toWeb(createReadStream(validatedPath, { highWaterMark: mergedOptions.bufferSize })),
      catch: (error) => FileError.fromSystemError("open", validatedPath, error),
    });
  });

  return runFileProgram(program);
}

/**
 * Read entire file to string (with size limits for safety)
 *
 * @throws {FileError} If file cannot be read or is too large
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const program = Effect.gen(function* () {
    yield* checkReadable(validatedPath, mergedOptions);
    return yield* Effect.tryPromise({
      try: () => readFile(validatedPath, mergedOptions.encoding === "binary" ? "latin1" : "utf8"),
      catch: (error) => FileError.fromSystemError("read", validatedPath, error),
    });
  });

  return runFileProgram(program);
}

export const FileReader = {
  exists,
  getSize,
  getMetadata,
  createStream,
  readToString,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function checkReadable(
  path: FilePath,
  options: Required<FileReaderOptions>
): Effect.Effect<void, FileError> {
  return statFile(path).pipe(
    Effect.flatMap((info) => {
      if (!info.isFile()) {
        return Effect.fail(new FileError("Path is not a regular file", path, "stat"));
      }
      if (info.size > options.maxFileSize) {
        return Effect.fail(
          new FileError(
            `File too large: ${info.size} bytes exceeds limit of ${options.maxFileSize} bytes`,
            path,
            "read"
          )
        );
      }
      return Effect.void;
    })
  );
}

/**
 * Validate file path using ArkType and return branded type
 */
function validatePath(path: string): FilePath {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

/**
 * Merge user options with defaults
 */
function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const validationResult = FileReaderOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return { ...DEFAULT_OPTIONS, ...validationResult };
}
