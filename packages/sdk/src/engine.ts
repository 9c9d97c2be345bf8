/**
 * Staged lookup over an immutable index snapshot
 *
 * Stages run in order and the first non-empty one wins:
 * 1. headword prefix
 * 2. full-text token
 * 3. fuzzy headword
 */

import { normalize } from "./normalize.js";
import { metrics, type LookupStage } from "./observability/metrics.js";
import type { IndexSnapshot } from "./snapshot.js";
import type {
  Entry,
  FullTextMatch,
  FuzzyHeadwordMatch,
  FuzzyOptions,
  HeadwordMatch,
  LookupOptions,
  LookupResult,
} from "./types.js";

export const DEFAULT_FUZZY_K = 8;
export const DEFAULT_MAX_DISTANCE = 2;

function emptyResult(): LookupResult {
  return { exactPrefixMatches: [], fullTextMatches: [], fuzzyMatches: [] };
}

function capOf(limit: number | undefined): number {
  return limit === undefined || Number.isNaN(limit) ? Infinity : Math.max(0, Math.floor(limit));
}

export class QueryEngine {
  readonly #snapshot: IndexSnapshot;
  readonly #k: number;
  readonly #maxDistance: number;

  constructor(snapshot: IndexSnapshot, fuzzy: FuzzyOptions = {}) {
    this.#snapshot = snapshot;
    this.#k = fuzzy.k ?? DEFAULT_FUZZY_K;
    this.#maxDistance = fuzzy.maxDistance ?? DEFAULT_MAX_DISTANCE;
  }

  get snapshot(): IndexSnapshot {
    return this.#snapshot;
  }

  /**
   * Staged lookup; at most one of the three lists is non-empty, and a later
   * stage runs only when every earlier stage has no match at all
   */
  lookup(query: string, options: LookupOptions = {}): LookupResult {
    const startTime = performance.now();
    const { result, stage } = this.#run(normalize(query), options);
    metrics.recordLookup(stage, performance.now() - startTime);
    return result;
  }

  /**
   * Raw text of an entry, by id or by headword (first of a homograph group)
   * @returns null when no such entry exists
   */
  getEntry(idOrHeadword: number | string): string | null {
    if (typeof idOrHeadword === "number") {
      return this.#snapshot.entry(idOrHeadword)?.body ?? null;
    }
    return this.getEntries(idOrHeadword)[0]?.body ?? null;
  }

  /**
   * Every entry whose normalized headword equals normalize(headword), in source order
   */
  getEntries(headword: string): Entry[] {
    const key = normalize(headword);
    if (!key) return [];
    return this.#expand(this.#snapshot.headwords.get(key));
  }

  #run(q: string, options: LookupOptions): { result: LookupResult; stage: LookupStage } {
    const result = emptyResult();
    if (!q) return { result, stage: "none" };

    // A stage is decided by whether it has matches, before any limit applies
    if (this.#snapshot.headwords.withPrefix(q, 1).length > 0) {
      result.exactPrefixMatches = this.#prefix(q, capOf(options.limits?.prefix));
      return { result, stage: "prefix" };
    }

    if (this.#snapshot.fullText.has(q)) {
      result.fullTextMatches = this.#fullText(q, capOf(options.limits?.fullText));
      return { result, stage: "fullText" };
    }

    result.fuzzyMatches = this.#fuzzy(q);
    return { result, stage: result.fuzzyMatches.length > 0 ? "fuzzy" : "none" };
  }

  #prefix(q: string, limit: number): HeadwordMatch[] {
    const out: HeadwordMatch[] = [];
    for (const row of this.#snapshot.headwords.withPrefix(q)) {
      for (const entry of this.#expand(row.entryIds)) {
        if (out.length >= limit) return out;
        out.push({ headword: row.key, original: entry.headword, entryId: entry.id });
      }
    }
    return out;
  }

  #fullText(q: string, limit: number): FullTextMatch[] {
    const matches: FullTextMatch[] = [];
    for (const { entryId, count } of this.#snapshot.fullText.postings(q)) {
      const entry = this.#snapshot.entry(entryId);
      if (!entry) continue;
      matches.push({
        headword: entry.normalizedHeadword,
        original: entry.headword,
        entryId,
        count,
      });
    }

    matches.sort(
      (a, b) =>
        b.count - a.count ||
        (a.headword < b.headword ? -1 : a.headword > b.headword ? 1 : 0) ||
        a.entryId - b.entryId
    );
    return matches.slice(0, limit);
  }

  #fuzzy(q: string): FuzzyHeadwordMatch[] {
    const out: FuzzyHeadwordMatch[] = [];
    for (const { headword, score } of this.#snapshot.fuzzy.topK(q, this.#k, this.#maxDistance)) {
      for (const entry of this.#expand(this.#snapshot.headwords.get(headword))) {
        if (out.length >= this.#k) return out;
        out.push({ headword, original: entry.headword, entryId: entry.id, score });
      }
    }
    return out;
  }

  #expand(ids: readonly number[]): Entry[] {
    const out: Entry[] = [];
    for (const id of ids) {
      const entry = this.#snapshot.entry(id);
      if (entry) out.push(entry);
    }
    return out;
  }
}
