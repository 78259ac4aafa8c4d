/**
 * File writing operations
 *
 * Effect programs over `node:fs/promises`, exposed as Promise APIs. Failures
 * surface as {@link FileError}.
 *
 * @module file-writer
 */

import { appendFile, open, writeFile } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { type } from "arktype";
import { Effect } from "effect";
import { FileError } from "../errors";
import type { FilePath, WriteOptions } from "../types";
import { FilePathSchema } from "../types";
import { runFileProgram } from "./file-reader";

/**
 * Handle for writing to a file multiple times within a scope
 *
 * The file is automatically closed when the callback completes or throws.
 */
export interface FileWriteHandle {
  /**
   * Write string content to the file
   */
  writeString(content: string): Promise<void>;

  /**
   * Write binary data to the file
   */
  writeBytes(content: Uint8Array): Promise<void>;
}

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @throws {FileError} When write operation fails or path is invalid
 *
 * @example
 * ```typescript
 * await writeString("accounts.dat", layout.format(record) + "\n");
 * ```
 */
export async function writeString(
  path: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  const validatedPath = validatePath(path);

  const program = Effect.tryPromise({
    try: () =>
      options.append === true
        ? appendFile(validatedPath, content, "utf8")
        : writeFile(validatedPath, content, "utf8"),
    catch: (error) => FileError.fromSystemError("write", validatedPath, error),
  });

  return runFileProgram(program);
}

/**
 * Open a file for writing and run `fn` with a handle to it
 *
 * The file is created or truncated (or appended to with `append: true`) and
 * closed once `fn` settles.
 *
 * @throws {FileError} When the file cannot be opened or a write fails
 *
 * @example
 * ```typescript
 * await openForWriting("out.dat", async (handle) => {
 *   for (const record of records) {
 *     await handle.writeString(layout.format(record) + "\n");
 *   }
 * });
 * ```
 */
export async function openForWriting<A>(
  path: string,
  fn: (handle: FileWriteHandle) => Promise<A>,
  options: WriteOptions = {}
): Promise<A> {
  const validatedPath = validatePath(path);

  const program = Effect.acquireUseRelease(
    Effect.tryPromise({
      try: () => open(validatedPath, options.append === true ? "a" : "w"),
      catch: (error) => FileError.fromSystemError("open", validatedPath, error),
    }),
    (fileHandle) =>
      Effect.tryPromise({
        try: () => fn(createWriteHandle(fileHandle)),
        catch: (error) => FileError.fromSystemError("write", validatedPath, error),
      }),
    (fileHandle) => Effect.promise(() => fileHandle.close())
  );

  return runFileProgram(program);
}

export const FileWriter = {
  writeString,
  openForWriting,
} as const;

function createWriteHandle(fileHandle: FileHandle): FileWriteHandle {
  return {
    async writeString(content: string): Promise<void> {
      await fileHandle.write(content, null, "utf8");
    },
    async writeBytes(content: Uint8Array): Promise<void> {
      await fileHandle.write(content);
    },
  };
}

function validatePath(path: string): FilePath {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "write");
  }
  return validationResult;
}
