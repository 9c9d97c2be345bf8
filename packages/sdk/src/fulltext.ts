/**
 * Inverted index from normalized token to per-entry occurrence counts
 *
 * Invariants:
 * - Every stored count is >= 1; tokens that never occur are absent
 * - Postings are sorted by entry id
 * - Persisted postings are flat `[id, count, id, count, ...]` arrays
 */

export type FullTextData = Record<string, number[]>;

export interface Posting {
  entryId: number;
  count: number;
}

/**
 * Accumulates counts during the build pass
 */
export class FullTextIndexBuilder {
  readonly #postings = new Map<string, Map<number, number>>();

  /**
   * Add every token occurrence of one entry
   */
  addEntry(entryId: number, counts: ReadonlyMap<string, number>): void {
    for (const [token, count] of counts) {
      if (count < 1) continue;
      let perEntry = this.#postings.get(token);
      if (!perEntry) {
        perEntry = new Map();
        this.#postings.set(token, perEntry);
      }
      perEntry.set(entryId, (perEntry.get(entryId) ?? 0) + count);
    }
  }

  build(): FullTextIndex {
    const flat = new Map<string, number[]>();
    for (const [token, perEntry] of this.#postings) {
      const ids = [...perEntry.keys()].sort((a, b) => a - b);
      const row: number[] = [];
      for (const id of ids) {
        row.push(id, perEntry.get(id) ?? 0);
      }
      flat.set(token, row);
    }
    return new FullTextIndex(flat);
  }
}

export class FullTextIndex {
  readonly #postings: ReadonlyMap<string, readonly number[]>;

  constructor(postings: Map<string, number[]>) {
    this.#postings = postings;
  }

  /**
   * Rebuild from the persisted form
   * @throws RangeError if a row is malformed or names an unknown entry
   */
  static fromJSON(data: FullTextData, entryCount: number): FullTextIndex {
    const postings = new Map<string, number[]>();
    for (const [token, row] of Object.entries(data)) {
      if (row.length === 0 || row.length % 2 !== 0) {
        throw new RangeError(`Malformed postings for token "${token}"`);
      }
      let previous = -1;
      for (let i = 0; i < row.length; i += 2) {
        const id = row[i] ?? -1;
        const count = row[i + 1] ?? 0;
        if (id <= previous || id >= entryCount || count < 1) {
          throw new RangeError(`Invalid posting for token "${token}" at offset ${i}`);
        }
        previous = id;
      }
      postings.set(token, row);
    }
    return new FullTextIndex(postings);
  }

  /** Number of distinct tokens */
  get size(): number {
    return this.#postings.size;
  }

  /** Total number of (token, entry) pairs */
  get postingCount(): number {
    let total = 0;
    for (const row of this.#postings.values()) {
      total += row.length / 2;
    }
    return total;
  }

  has(token: string): boolean {
    return this.#postings.has(token);
  }

  /**
   * Postings for an exact token, sorted by entry id
   */
  postings(token: string): Posting[] {
    const row = this.#postings.get(token);
    if (!row) return [];

    const out: Posting[] = [];
    for (let i = 0; i < row.length; i += 2) {
      out.push({ entryId: row[i] ?? 0, count: row[i + 1] ?? 0 });
    }
    return out;
  }

  toJSON(): FullTextData {
    const out: FullTextData = {};
    const tokens = [...this.#postings.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    for (const token of tokens) {
      out[token] = [...(this.#postings.get(token) ?? [])];
    }
    return out;
  }
}
