/**
 * File I/O for the dictionary source and the index cache
 *
 * Invariants:
 * - Cache writes are atomic: readers never observe a partial file
 * - Temp files reside in the same directory as the target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths, and leftovers from killed processes on the next write
 * - Source reads are byte-exact so the fingerprint covers exactly what is indexed
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { createHash, randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import {
  CacheWriteError,
  SourceEmptyError,
  SourceNotFoundError,
  SourceReadError,
} from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

/**
 * Content fingerprint of the dictionary source
 */
export interface Fingerprint {
  /** Hex SHA-256 of the raw bytes */
  sha256: string;
  /** Size in bytes */
  bytes: number;
}

/**
 * A dictionary source loaded into memory
 */
export interface SourceText {
  path: string;
  /** Decoded UTF-8 text with any byte order mark removed */
  text: string;
  fingerprint: Fingerprint;
}

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Compute the fingerprint of raw source bytes
 */
export function fingerprintOf(bytes: Uint8Array): Fingerprint {
  return {
    sha256: createHash("sha256").update(bytes).digest("hex"),
    bytes: bytes.byteLength,
  };
}

export function sameFingerprint(a: Fingerprint, b: Fingerprint): boolean {
  return a.sha256 === b.sha256 && a.bytes === b.bytes;
}

/**
 * Read the dictionary source and fingerprint it
 * @throws SourceNotFoundError if the file doesn't exist
 * @throws SourceEmptyError if the file is zero bytes
 * @throws SourceReadError for other read failures
 */
export async function readSourceText(filePath: string): Promise<SourceText> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      throw new SourceNotFoundError(filePath, { cause: err });
    }
    throw new SourceReadError(filePath, { cause: err });
  }

  if (bytes.byteLength === 0) {
    throw new SourceEmptyError(filePath);
  }

  const decoded = bytes.toString("utf-8");
  const text = decoded.charCodeAt(0) === 0xfeff ? decoded.slice(1) : decoded;
  return { path: filePath, text, fingerprint: fingerprintOf(bytes) };
}

/**
 * Read a UTF-8 file, or null when it does not exist
 */
export async function readOptionalFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return null;
    }
    throw err;
  }
}

/**
 * Remove a file (idempotent - no error if it doesn't exist)
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (err) {
    if (errorCode(err) !== "ENOENT") {
      throw err;
    }
  }
}

/**
 * List files in a directory
 * @returns Sorted array of filenames (not full paths); empty if the directory doesn't exist
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && !entry.isSymbolicLink())
      .map((entry) => entry.name)
      .sort();
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return [];
    }
    throw err;
  }
}

function tempPrefix(filePath: string): string {
  return `.${basename(filePath)}.`;
}

/**
 * Delete temp files left next to `filePath` by writes that never reached the rename
 * @returns Number of files removed
 */
export async function removeStaleTempFiles(filePath: string): Promise<number> {
  const dir = dirname(filePath);
  const prefix = tempPrefix(filePath);
  let removed = 0;

  for (const name of await listFiles(dir)) {
    if (name.startsWith(prefix) && name.endsWith(".tmp")) {
      await removeFile(join(dir, name));
      removed++;
    }
  }

  if (removed > 0) {
    logger.info("cache.tmp.cleanup", { path: filePath, details: { removed } });
  }
  return removed;
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 * @throws CacheWriteError if any step fails
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `${tempPrefix(filePath)}${randomUUID()}.tmp`);

  let fileHandle: fs.FileHandle | null = null;

  try {
    await fs.mkdir(dir, { recursive: true });

    // Write to temp file
    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content, "utf-8");

    // Sync file data to disk (prefer datasync for performance, fall back to sync)
    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      const code = errorCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    // Close the file handle before rename
    await fileHandle.close();
    fileHandle = null;

    // Atomic rename (last-writer-wins for concurrent writes)
    try {
      await fs.rename(tmp, filePath);
    } catch (err) {
      // On Windows, rename may fail transiently when antivirus or indexing grabs the file
      const code = errorCode(err);
      if ((code === "EPERM" || code === "EACCES" || code === "EBUSY") && process.platform === "win32") {
        await new Promise((resolve) => setTimeout(resolve, 10));
        await fs.rename(tmp, filePath);
      } else {
        throw err;
      }
    }

    // Optionally fsync parent directory for maximum durability (best-effort)
    if (ENABLE_DIR_FSYNC) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("cache.write.close", { path: tmp, message: String(closeErr) });
      });
    }

    // Best-effort cleanup of temp file
    await removeFile(tmp).catch((unlinkErr: unknown) => {
      logger.debug("cache.write.unlink", { path: tmp, message: String(unlinkErr) });
    });

    throw new CacheWriteError(filePath, { cause: err });
  }
}

async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // Platforms without directory fsync report EINVAL, ENOTSUP or EBADF
    const code = errorCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR") {
      logger.debug("cache.write.dirsync", { path: dir, message: String(err) });
    }
  }
}
