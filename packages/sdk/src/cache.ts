/**
 * Persisted index cache with fingerprint-based invalidation
 *
 * The cache file is trusted only when its format tag, its structure, the
 * fingerprint of the current source text and the entry marker all check out. Anything else is
 * treated as "no cache": the index is rebuilt from the source text and the
 * file replaced atomically. Only an unusable source text is fatal.
 */

import { CacheFormatError } from "./errors.js";
import {
  atomicWrite,
  readOptionalFile,
  readSourceText,
  removeFile,
  removeStaleTempFiles,
  sameFingerprint,
  type SourceText,
} from "./io.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { headwordMarker, type HeadwordMarker } from "./segment.js";
import { buildSnapshot, parsePersistedIndex, restoreSnapshot, type IndexSnapshot } from "./snapshot.js";
import type { IndexOptions, LoadReason, SnapshotOrigin } from "./types.js";

/**
 * Outcome of {@link loadIndex}
 */
export interface LoadReport {
  snapshot: IndexSnapshot;
  origin: SnapshotOrigin;
  reason: LoadReason;
  /** Whether a freshly built snapshot reached the cache file */
  persisted: boolean;
}

export interface LoadIndexOptions extends IndexOptions {
  /** Ignore any existing cache file and rebuild */
  force?: boolean;
}

type CacheProbe =
  | { status: "hit"; snapshot: IndexSnapshot }
  | { status: "missing" | "stale" | "corrupt" };

async function probeCache(
  cachePath: string,
  source: SourceText,
  marker: HeadwordMarker
): Promise<CacheProbe> {
  const startTime = performance.now();

  let json: string | null;
  try {
    json = await readOptionalFile(cachePath);
  } catch (err) {
    logger.warn("cache.corrupt", { path: cachePath, message: `unreadable: ${String(err)}` });
    return { status: "corrupt" };
  }

  if (json === null) {
    logger.info("cache.miss", { path: cachePath });
    return { status: "missing" };
  }

  try {
    const data = parsePersistedIndex(json, cachePath);
    if (!sameFingerprint(data.fingerprint, source.fingerprint)) {
      logger.warn("cache.stale", {
        path: cachePath,
        message: "source text changed since the index was written; rebuilding",
        details: { cached: data.fingerprint, current: source.fingerprint },
      });
      return { status: "stale" };
    }
    if (data.marker.source !== marker.source || data.marker.flags !== marker.flags) {
      logger.warn("cache.stale", {
        path: cachePath,
        message: "entry marker changed since the index was written; rebuilding",
        details: { cached: data.marker, current: marker },
      });
      return { status: "stale" };
    }

    const snapshot = restoreSnapshot(data, source, cachePath);
    const durationMs = performance.now() - startTime;
    metrics.recordLoadTime(durationMs);
    logger.info("cache.hit", {
      path: cachePath,
      details: { entries: snapshot.entries.length, durationMs: Math.round(durationMs) },
    });
    return { status: "hit", snapshot };
  } catch (err) {
    if (err instanceof CacheFormatError) {
      logger.warn("cache.corrupt", { path: cachePath, message: `${err.message}; rebuilding` });
      return { status: "corrupt" };
    }
    throw err;
  }
}

/**
 * Persist a snapshot; failures are logged, never thrown
 */
export async function persistSnapshot(snapshot: IndexSnapshot, cachePath: string): Promise<boolean> {
  try {
    await removeStaleTempFiles(cachePath);
    await atomicWrite(cachePath, snapshot.serialize());
    logger.info("cache.write", { path: cachePath, details: { entries: snapshot.entries.length } });
    return true;
  } catch (err) {
    logger.error("cache.write.failed", {
      path: cachePath,
      message: err instanceof Error ? `${err.message}: ${String(err.cause)}` : String(err),
    });
    return false;
  }
}

/**
 * Load the snapshot for `sourcePath` from `cachePath`, or build and persist a new one
 * @throws SourceTextError if the source text is missing, empty or unreadable
 */
export async function loadIndex(
  sourcePath: string,
  cachePath: string,
  options: LoadIndexOptions = {}
): Promise<LoadReport> {
  const source = await readSourceText(sourcePath);
  logger.debug("source.read", { path: sourcePath, details: { ...source.fingerprint } });

  let reason: LoadReason = "forced";
  if (!options.force) {
    const probe = await probeCache(cachePath, source, headwordMarker(options.headwordPattern));
    if (probe.status === "hit") {
      return { snapshot: probe.snapshot, origin: "cache", reason: "hit", persisted: true };
    }
    reason = probe.status;
  } else {
    await removeFile(cachePath);
  }

  const snapshot = buildSnapshot(source, options);
  const persisted = await persistSnapshot(snapshot, cachePath);
  return { snapshot, origin: "build", reason, persisted };
}

/**
 * Build or load the index snapshot; call once at process start
 */
export async function buildOrLoadIndex(
  sourcePath: string,
  cachePath: string,
  options: IndexOptions = {}
): Promise<IndexSnapshot> {
  const { snapshot } = await loadIndex(sourcePath, cachePath, options);
  return snapshot;
}
