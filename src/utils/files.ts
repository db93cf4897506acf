/**
 * File helpers shared by the pipeline and the audits.
 */

import { createHash } from "crypto";
import { createReadStream } from "fs";
import { access, constants, copyFile, readdir, rename, unlink } from "fs/promises";
import path from "path";

/**
 * SHA-256 hex digest of a file, streamed.
 */
export async function hashFile(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash("sha256");
    const stream = createReadStream(filePath);

    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("end", () => resolve(hash.digest("hex")));
    stream.on("error", (err) => reject(err));
  });
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Moves a file into place. Falls back to copy + unlink when the staging
 * directory lives on another device.
 */
export async function moveFile(source: string, destination: string): Promise<void> {
  try {
    await rename(source, destination);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "EXDEV") {
      throw error;
    }
    await copyFile(source, destination);
    await unlink(source);
  }
}

/**
 * Base names (extension stripped) of every `*.<ext>` file directly inside `dir`.
 * A missing directory yields an empty list.
 */
export async function listBasenames(dir: string, ext: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }

  const suffix = `.${ext}`;
  return entries
    .filter((name) => name.endsWith(suffix) && name.length > suffix.length)
    .map((name) => path.basename(name, suffix))
    .sort();
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
