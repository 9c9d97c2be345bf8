/**
 * Immutable index snapshot: entries plus the headword, full-text and fuzzy indexes
 *
 * A snapshot is built in one pass over the source text, or restored from its
 * persisted JSON form, and is never modified afterwards. Serialization is
 * deterministic: the same source text always produces the same bytes.
 */

import AjvModule from "ajv";
import type { ValidateFunction } from "ajv";
import { CacheFormatError } from "./errors.js";
import { stableStringify } from "./format.js";
import { FullTextIndex, FullTextIndexBuilder, type FullTextData } from "./fulltext.js";
import { FuzzyIndex, GRAM_SIZE, type FuzzyData } from "./fuzzy.js";
import { HeadwordIndex, type HeadwordData } from "./headwords.js";
import type { Fingerprint, SourceText } from "./io.js";
import { normalize } from "./normalize.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { headwordMarker, segmentEntries, type HeadwordMarker } from "./segment.js";
import { countTokens } from "./tokenize.js";
import type { Entry, IndexOptions, SnapshotStats } from "./types.js";

export const INDEX_FORMAT = "lexicon-index";
export const INDEX_VERSION = 2;

/**
 * On-disk form of a snapshot. Entry bodies are not stored: they are sliced
 * back out of the source text, whose fingerprint must match.
 */
export interface PersistedIndex {
  format: string;
  version: number;
  fingerprint: Fingerprint;
  /** Entry marker the entries were segmented with */
  marker: HeadwordMarker;
  /** [headword, start, end] per entry, in id order */
  entries: [string, number, number][];
  headwords: HeadwordData;
  fullText: FullTextData;
  fuzzy: FuzzyData;
}

const persistedIndexSchema = {
  type: "object",
  required: ["format", "version", "fingerprint", "marker", "entries", "headwords", "fullText", "fuzzy"],
  additionalProperties: false,
  properties: {
    format: { type: "string", const: INDEX_FORMAT },
    version: { type: "integer", const: INDEX_VERSION },
    fingerprint: {
      type: "object",
      required: ["sha256", "bytes"],
      additionalProperties: false,
      properties: {
        sha256: { type: "string", pattern: "^[0-9a-f]{64}$" },
        bytes: { type: "integer", minimum: 1 },
      },
    },
    marker: {
      type: "object",
      required: ["source", "flags"],
      additionalProperties: false,
      properties: {
        source: { type: "string", minLength: 1 },
        flags: { type: "string" },
      },
    },
    entries: {
      type: "array",
      items: {
        type: "array",
        items: [{ type: "string" }, { type: "integer", minimum: 0 }, { type: "integer", minimum: 0 }],
        minItems: 3,
        additionalItems: false,
      },
    },
    headwords: {
      type: "object",
      additionalProperties: {
        type: "array",
        minItems: 1,
        items: { type: "integer", minimum: 0 },
      },
    },
    fullText: {
      type: "object",
      additionalProperties: {
        type: "array",
        minItems: 2,
        items: { type: "integer", minimum: 0 },
      },
    },
    fuzzy: {
      type: "object",
      required: ["gramSize", "terms"],
      additionalProperties: false,
      properties: {
        gramSize: { type: "integer" },
        terms: { type: "array", items: { type: "string" } },
      },
    },
  },
};

// ajv is published as CommonJS; its default export is the module object
const Ajv = AjvModule.default;
let validator: ValidateFunction<PersistedIndex> | null = null;

function getValidator(): ValidateFunction<PersistedIndex> {
  if (!validator) {
    validator = new Ajv({ allErrors: false, strict: true }).compile<PersistedIndex>(
      persistedIndexSchema
    );
  }
  return validator;
}

export class IndexSnapshot {
  constructor(
    readonly fingerprint: Fingerprint,
    readonly marker: HeadwordMarker,
    readonly entries: readonly Entry[],
    readonly headwords: HeadwordIndex,
    readonly fullText: FullTextIndex,
    readonly fuzzy: FuzzyIndex
  ) {
    Object.freeze(this.marker);
    Object.freeze(this.entries);
    Object.freeze(this);
  }

  /**
   * Entry by id, or undefined
   */
  entry(id: number): Entry | undefined {
    return Number.isInteger(id) ? this.entries[id] : undefined;
  }

  stats(): SnapshotStats {
    return {
      entries: this.entries.length,
      headwords: this.headwords.size,
      tokens: this.fullText.size,
      postings: this.fullText.postingCount,
      fingerprint: { ...this.fingerprint },
    };
  }

  toPersisted(): PersistedIndex {
    return {
      format: INDEX_FORMAT,
      version: INDEX_VERSION,
      fingerprint: { ...this.fingerprint },
      marker: { ...this.marker },
      entries: this.entries.map((e): [string, number, number] => [e.headword, e.start, e.end]),
      headwords: this.headwords.toJSON(),
      fullText: this.fullText.toJSON(),
      fuzzy: this.fuzzy.toJSON(),
    };
  }

  /**
   * Canonical JSON for the cache file
   */
  serialize(): string {
    return stableStringify(this.toPersisted());
  }
}

/**
 * Segment, normalize and index the whole source text in one pass
 */
export function buildSnapshot(source: Omit<SourceText, "path">, options: IndexOptions = {}): IndexSnapshot {
  const startTime = performance.now();
  logger.info("index.build.start", { details: { bytes: source.fingerprint.bytes } });

  const entries: Entry[] = [];
  const fullText = new FullTextIndexBuilder();

  for (const raw of segmentEntries(source.text, { headwordPattern: options.headwordPattern })) {
    const id = entries.length;
    entries.push(
      Object.freeze({
        id,
        headword: raw.headword,
        normalizedHeadword: normalize(raw.headword),
        body: raw.body,
        start: raw.start,
        end: raw.end,
      })
    );
    fullText.addEntry(id, countTokens(raw.body));
  }

  const headwords = HeadwordIndex.fromPairs(entries.map((e) => [e.normalizedHeadword, e.id] as const));
  const fuzzy = new FuzzyIndex(headwords.keys().filter((key) => key.length > 0));
  const marker = headwordMarker(options.headwordPattern);
  const snapshot = new IndexSnapshot(source.fingerprint, marker, entries, headwords, fullText.build(), fuzzy);

  const durationMs = performance.now() - startTime;
  metrics.recordBuildTime(durationMs);

  if (entries.length === 0) {
    logger.warn("index.build.empty", { message: "no entry markers found in source text" });
  }
  logger.info("index.build.end", {
    details: {
      entries: entries.length,
      headwords: headwords.size,
      tokens: snapshot.fullText.size,
      durationMs: Math.round(durationMs),
    },
  });

  return snapshot;
}

/**
 * Parse and validate cache file contents
 * @throws CacheFormatError on invalid JSON, an unknown format/version tag, or a schema mismatch
 */
export function parsePersistedIndex(json: string, cachePath: string): PersistedIndex {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw new CacheFormatError(cachePath, "not valid JSON (truncated?)", { cause: err });
  }

  if (!data || typeof data !== "object" || Array.isArray(data)) {
    throw new CacheFormatError(cachePath, "not a JSON object");
  }
  const format = "format" in data ? data.format : undefined;
  const version = "version" in data ? data.version : undefined;
  if (format !== INDEX_FORMAT || version !== INDEX_VERSION) {
    throw new CacheFormatError(
      cachePath,
      `unrecognized format tag ${JSON.stringify(format)}@${JSON.stringify(version)}`
    );
  }

  const validate = getValidator();
  if (!validate(data)) {
    const first = validate.errors?.[0];
    const where = first ? `${first.instancePath || "/"} ${first.message ?? ""}`.trim() : "schema mismatch";
    throw new CacheFormatError(cachePath, where);
  }
  return data;
}

/**
 * Rebuild a snapshot from its persisted form and the matching source text
 * @throws CacheFormatError if the persisted structures are inconsistent with each other or the text
 */
export function restoreSnapshot(
  data: PersistedIndex,
  source: Omit<SourceText, "path">,
  cachePath: string
): IndexSnapshot {
  const text = source.text;
  const entries: Entry[] = [];
  let previousEnd = 0;

  for (const [headword, start, end] of data.entries) {
    if (start < previousEnd || end <= start || end > text.length) {
      throw new CacheFormatError(cachePath, `entry #${entries.length} has an invalid range`);
    }
    const body = text.slice(start, end);
    if (!body.includes(headword)) {
      throw new CacheFormatError(cachePath, `entry #${entries.length} does not match the source text`);
    }
    entries.push(
      Object.freeze({
        id: entries.length,
        headword,
        normalizedHeadword: normalize(headword),
        body,
        start,
        end,
      })
    );
    previousEnd = end;
  }

  // Every entry must own exactly one headword row under its own key
  const seen = new Set<number>();
  for (const [key, ids] of Object.entries(data.headwords)) {
    for (const id of ids) {
      if (seen.has(id) || entries[id]?.normalizedHeadword !== key) {
        throw new CacheFormatError(cachePath, `headword row "${key}" is inconsistent`);
      }
      seen.add(id);
    }
  }
  if (seen.size !== entries.length) {
    throw new CacheFormatError(cachePath, "headword index does not cover every entry");
  }

  if (data.fuzzy.gramSize !== GRAM_SIZE) {
    throw new CacheFormatError(cachePath, `unsupported fuzzy gram size ${data.fuzzy.gramSize}`);
  }

  // Fuzzy terms are exactly the non-empty headword keys, in the same sorted order
  const terms = Object.keys(data.headwords)
    .filter((key) => key.length > 0)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  if (
    terms.length !== data.fuzzy.terms.length ||
    terms.some((term, i) => term !== data.fuzzy.terms[i])
  ) {
    throw new CacheFormatError(cachePath, "fuzzy terms do not match the headword index");
  }

  try {
    return new IndexSnapshot(
      { ...data.fingerprint },
      { ...data.marker },
      entries,
      HeadwordIndex.fromJSON(data.headwords),
      FullTextIndex.fromJSON(data.fullText, entries.length),
      FuzzyIndex.fromJSON(data.fuzzy)
    );
  } catch (err) {
    throw new CacheFormatError(cachePath, err instanceof Error ? err.message : String(err), { cause: err });
  }
}
