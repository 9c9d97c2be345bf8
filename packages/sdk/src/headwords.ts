/**
 * Sorted headword index with prefix search
 *
 * Keys are normalized headwords in code-unit order; each key maps to the ids
 * of every entry carrying it (homographs), in source order.
 */

export type HeadwordData = Record<string, number[]>;

export interface HeadwordRow {
  key: string;
  entryIds: readonly number[];
}

/**
 * First index whose key is >= target
 */
function lowerBound(keys: readonly string[], target: string): number {
  let lo = 0;
  let hi = keys.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if ((keys[mid] ?? "") < target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

export class HeadwordIndex {
  readonly #keys: readonly string[];
  readonly #ids: readonly (readonly number[])[];

  private constructor(rows: Map<string, number[]>) {
    const keys = [...rows.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    this.#keys = Object.freeze(keys);
    this.#ids = Object.freeze(keys.map((k) => Object.freeze([...(rows.get(k) ?? [])])));
  }

  /**
   * Build from (normalized headword, entry id) pairs in source order
   */
  static fromPairs(pairs: Iterable<readonly [string, number]>): HeadwordIndex {
    const rows = new Map<string, number[]>();
    for (const [key, id] of pairs) {
      const ids = rows.get(key);
      if (ids) {
        ids.push(id);
      } else {
        rows.set(key, [id]);
      }
    }
    return new HeadwordIndex(rows);
  }

  /**
   * Rebuild from the persisted form
   */
  static fromJSON(data: HeadwordData): HeadwordIndex {
    return new HeadwordIndex(new Map(Object.entries(data)));
  }

  /** Number of distinct normalized headwords */
  get size(): number {
    return this.#keys.length;
  }

  /** Distinct normalized headwords, sorted */
  keys(): readonly string[] {
    return this.#keys;
  }

  /**
   * Entry ids for an exact normalized headword (empty when absent)
   */
  get(key: string): readonly number[] {
    const i = lowerBound(this.#keys, key);
    return this.#keys[i] === key ? (this.#ids[i] ?? []) : [];
  }

  /**
   * All rows whose key starts with `prefix`, in key order
   * @param prefix - Normalized prefix; the empty prefix matches nothing
   * @param limit - Maximum number of rows
   */
  withPrefix(prefix: string, limit = Infinity): HeadwordRow[] {
    const out: HeadwordRow[] = [];
    if (!prefix) return out;

    for (let i = lowerBound(this.#keys, prefix); i < this.#keys.length && out.length < limit; i++) {
      const key = this.#keys[i] ?? "";
      if (!key.startsWith(prefix)) break;
      out.push({ key, entryIds: this.#ids[i] ?? [] });
    }
    return out;
  }

  toJSON(): HeadwordData {
    const out: HeadwordData = {};
    this.#keys.forEach((key, i) => {
      out[key] = [...(this.#ids[i] ?? [])];
    });
    return out;
  }
}
