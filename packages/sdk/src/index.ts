/**
 * Lexicon SDK
 *
 * Staged headword, full-text and fuzzy lookup over a dictionary text,
 * with a fingerprinted on-disk index cache
 */

// Re-export types
export type {
  Entry,
  HeadwordMatch,
  FullTextMatch,
  FuzzyHeadwordMatch,
  LookupResult,
  LookupLimits,
  LookupOptions,
  FuzzyOptions,
  IndexOptions,
  LexiconOptions,
  SnapshotOrigin,
  LoadReason,
  SnapshotStats,
} from "./types.js";

// Lifecycle
export { openLexicon } from "./lexicon.js";
export type { Lexicon, LexiconStats, ReloadOptions } from "./lexicon.js";

// Query engine
export { QueryEngine, DEFAULT_FUZZY_K, DEFAULT_MAX_DISTANCE } from "./engine.js";

// Index building and persistence
export { loadIndex, buildOrLoadIndex, persistSnapshot } from "./cache.js";
export type { LoadReport, LoadIndexOptions } from "./cache.js";
export {
  IndexSnapshot,
  buildSnapshot,
  parsePersistedIndex,
  restoreSnapshot,
  INDEX_FORMAT,
  INDEX_VERSION,
} from "./snapshot.js";
export type { PersistedIndex } from "./snapshot.js";

// Text processing
export { segmentEntries, headwordMarker, DEFAULT_HEADWORD_PATTERN } from "./segment.js";
export type { HeadwordMarker, RawEntry, SegmentOptions } from "./segment.js";
export { normalize, foldCase } from "./normalize.js";
export { tokenize, countTokens } from "./tokenize.js";

// Indexes
export { HeadwordIndex } from "./headwords.js";
export type { HeadwordRow } from "./headwords.js";
export { FullTextIndex, FullTextIndexBuilder } from "./fulltext.js";
export type { Posting } from "./fulltext.js";
export { FuzzyIndex, editDistance } from "./fuzzy.js";
export type { FuzzyMatch } from "./fuzzy.js";

// Utilities
export { stableStringify } from "./format.js";
export { readSourceText, fingerprintOf, atomicWrite } from "./io.js";
export type { Fingerprint, SourceText } from "./io.js";

// Observability
export { logger } from "./observability/logs.js";
export type { LogLevel } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { LookupStage, LookupMetrics } from "./observability/metrics.js";

// Errors
export {
  LexiconError,
  SourceTextError,
  SourceNotFoundError,
  SourceEmptyError,
  SourceReadError,
  CacheFormatError,
  CacheWriteError,
  EntryNotFoundError,
} from "./errors.js";
