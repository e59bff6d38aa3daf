/**
 * File System Utilities
 * Whole-file reads and writes with errors that name the file and the step
 */

import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";
import { ErrorCode, IOError } from "../core/errors.js";

/**
 * Read a whole file into memory
 *
 * @param step - What the caller was doing, carried into the error message
 */
export async function readBinaryFile(filePath: string, step: string): Promise<Uint8Array> {
  try {
    return await fsPromises.readFile(filePath);
  } catch (error) {
    const code = isErrnoException(error) && error.code === "ENOENT"
      ? ErrorCode.IO_NOT_FOUND
      : ErrorCode.IO_READ_FAILED;
    throw new IOError(`${step}: ${describe(error)}`, code, { filePath, step });
  }
}

/**
 * Write a whole file. In-place writes go through a sibling temp file and a rename
 * so a failed write never leaves the input truncated.
 */
export async function writeBinaryFile(
  filePath: string,
  data: Uint8Array,
  step: string
): Promise<void> {
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.tmp`
  );
  try {
    await fsPromises.writeFile(tempPath, data);
    await fsPromises.rename(tempPath, filePath);
  } catch (error) {
    await fsPromises.rm(tempPath, { force: true });
    throw new IOError(`${step}: ${describe(error)}`, ErrorCode.IO_WRITE_FAILED, {
      filePath,
      step,
    });
  }
}

/**
 * Read a UTF-8 text file
 */
export async function readTextFile(filePath: string, step: string): Promise<string> {
  try {
    return await fsPromises.readFile(filePath, { encoding: "utf-8" });
  } catch (error) {
    throw new IOError(`${step}: ${describe(error)}`, ErrorCode.IO_READ_FAILED, {
      filePath,
      step,
    });
  }
}

/**
 * List files directly inside a directory matching an extension, sorted by name.
 * Subdirectories (such as a WIT package's deps/) are not descended into.
 */
export async function listFilesWithExtension(dirPath: string, extension: string): Promise<string[]> {
  const stats = await fsPromises.stat(dirPath).catch((error: unknown) => {
    throw new IOError(`reading directory: ${describe(error)}`, ErrorCode.IO_NOT_FOUND, {
      filePath: dirPath,
    });
  });
  if (!stats.isDirectory()) {
    throw new IOError("not a directory", ErrorCode.IO_READ_FAILED, { filePath: dirPath });
  }

  const files = await fg(`*${extension}`, {
    cwd: dirPath,
    absolute: true,
    onlyFiles: true,
    deep: 1,
  });
  return files.sort();
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
