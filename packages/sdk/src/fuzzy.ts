/**
 * Fuzzy headword matching
 *
 * Reference semantics: optimal string alignment distance (Damerau–Levenshtein
 * restricted to non-overlapping transpositions), bounded by a maximum distance.
 * Two filters narrow the candidates before any distance is computed:
 *
 * - length window: |len(a) - len(b)| <= d
 * - bigram count: with one padding character on each side a string of length n
 *   has n + 1 bigram positions, and one edit breaks at most three of them
 *   (a transposition; substitutions and deletions break two, insertions one).
 *   After d edits at least |distinct bigrams(q)| - 3d distinct bigrams of q
 *   survive in the target, so candidates sharing fewer are skipped. When that
 *   bound is <= 0 the whole length window is scanned instead.
 *
 * Neither filter can drop a term within distance d of the query.
 */

export const GRAM_SIZE = 2;
const PAD = "\u0002";
/** Bigram positions a single edit can break */
const GRAMS_PER_EDIT = GRAM_SIZE + 1;

export interface FuzzyMatch {
  headword: string;
  /** Edit distance to the query; lower is closer */
  score: number;
}

export interface FuzzyData {
  gramSize: number;
  terms: string[];
}

/**
 * Optimal string alignment distance between two strings, compared by code point.
 * @param max - Stop early and return `max + 1` once the distance must exceed it
 */
export function editDistance(a: string, b: string, max = Infinity): number {
  const s = Array.from(a);
  const t = Array.from(b);
  const n = s.length;
  const m = t.length;

  if (Math.abs(n - m) > max) return max + 1;
  if (n === 0) return m;
  if (m === 0) return n;

  let before = new Array<number>(m + 1).fill(0);
  let prev = Array.from({ length: m + 1 }, (_, j) => j);
  let cur = new Array<number>(m + 1).fill(0);

  for (let i = 1; i <= n; i++) {
    cur[0] = i;
    let rowMin = i;

    for (let j = 1; j <= m; j++) {
      const cost = s[i - 1] === t[j - 1] ? 0 : 1;
      let v = Math.min(prev[j] + 1, cur[j - 1] + 1, prev[j - 1] + cost);
      if (i > 1 && j > 1 && s[i - 1] === t[j - 2] && s[i - 2] === t[j - 1]) {
        v = Math.min(v, before[j - 2] + 1);
      }
      cur[j] = v;
      if (v < rowMin) rowMin = v;
    }

    // Row minima never decrease, so nothing below can come back under the bound
    if (rowMin > max) return max + 1;

    [before, prev, cur] = [prev, cur, before];
  }

  const distance = prev[m];
  return distance > max ? max + 1 : distance;
}

/**
 * Distinct padded bigrams of a term
 */
export function bigrams(term: string): Set<string> {
  const chars = [PAD, ...Array.from(term), PAD];
  const out = new Set<string>();
  for (let i = 0; i + 1 < chars.length; i++) {
    out.add(chars[i] + chars[i + 1]);
  }
  return out;
}

function compareMatches(a: FuzzyMatch, b: FuzzyMatch): number {
  if (a.score !== b.score) return a.score - b.score;
  return a.headword < b.headword ? -1 : a.headword > b.headword ? 1 : 0;
}

export class FuzzyIndex {
  readonly #terms: readonly string[];
  readonly #lengths: readonly number[];
  readonly #byLength = new Map<number, number[]>();
  readonly #postings = new Map<string, number[]>();

  constructor(terms: Iterable<string>) {
    const sorted = [...new Set(terms)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    this.#terms = Object.freeze(sorted);
    this.#lengths = sorted.map((t) => Array.from(t).length);

    sorted.forEach((term, idx) => {
      const len = this.#lengths[idx] ?? 0;
      const bucket = this.#byLength.get(len);
      if (bucket) {
        bucket.push(idx);
      } else {
        this.#byLength.set(len, [idx]);
      }

      for (const gram of bigrams(term)) {
        const list = this.#postings.get(gram);
        if (list) {
          list.push(idx);
        } else {
          this.#postings.set(gram, [idx]);
        }
      }
    });
  }

  /**
   * Rebuild from the persisted form
   * @throws RangeError on an unsupported gram size or unsorted terms
   */
  static fromJSON(data: FuzzyData): FuzzyIndex {
    if (data.gramSize !== GRAM_SIZE) {
      throw new RangeError(`Unsupported gram size ${data.gramSize}`);
    }
    for (let i = 1; i < data.terms.length; i++) {
      if (!((data.terms[i - 1] ?? "") < (data.terms[i] ?? ""))) {
        throw new RangeError("Fuzzy terms must be sorted and distinct");
      }
    }
    return new FuzzyIndex(data.terms);
  }

  get size(): number {
    return this.#terms.length;
  }

  terms(): readonly string[] {
    return this.#terms;
  }

  /**
   * The `k` terms closest to `query` within `maxDistance` edits,
   * by ascending distance then headword
   * @param query - Normalized query
   */
  topK(query: string, k: number, maxDistance = 2): FuzzyMatch[] {
    if (!query || k <= 0 || maxDistance < 0) return [];

    const queryLength = Array.from(query).length;
    const matches: FuzzyMatch[] = [];

    for (const idx of this.#candidates(query, queryLength, maxDistance)) {
      const term = this.#terms[idx];
      const length = this.#lengths[idx];
      if (term === undefined || length === undefined) continue;
      if (Math.abs(length - queryLength) > maxDistance) continue;

      const score = editDistance(query, term, maxDistance);
      if (score <= maxDistance) {
        matches.push({ headword: term, score });
      }
    }

    return matches.sort(compareMatches).slice(0, k);
  }

  /**
   * Reference implementation without filters, for verification
   */
  bruteForceTopK(query: string, k: number, maxDistance = 2): FuzzyMatch[] {
    if (!query || k <= 0 || maxDistance < 0) return [];

    const matches: FuzzyMatch[] = [];
    for (const term of this.#terms) {
      const score = editDistance(query, term);
      if (score <= maxDistance) matches.push({ headword: term, score });
    }
    return matches.sort(compareMatches).slice(0, k);
  }

  toJSON(): FuzzyData {
    return { gramSize: GRAM_SIZE, terms: [...this.#terms] };
  }

  #candidates(query: string, queryLength: number, maxDistance: number): Iterable<number> {
    const queryGrams = bigrams(query);
    const threshold = queryGrams.size - GRAMS_PER_EDIT * maxDistance;

    if (threshold <= 0) {
      const out: number[] = [];
      for (let len = queryLength - maxDistance; len <= queryLength + maxDistance; len++) {
        out.push(...(this.#byLength.get(len) ?? []));
      }
      return out;
    }

    const shared = new Map<number, number>();
    for (const gram of queryGrams) {
      for (const idx of this.#postings.get(gram) ?? []) {
        shared.set(idx, (shared.get(idx) ?? 0) + 1);
      }
    }

    const out: number[] = [];
    for (const [idx, count] of shared) {
      if (count >= threshold) out.push(idx);
    }
    return out;
  }
}
