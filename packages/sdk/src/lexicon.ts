/**
 * Lexicon: the two-phase lifecycle around a query engine
 *
 * `openLexicon` resolves once a snapshot is ready. Lookups run synchronously
 * against the current engine; `reload` builds or loads a new snapshot under a
 * mutex and swaps the engine reference only when it is complete.
 */

import { loadIndex, type LoadIndexOptions } from "./cache.js";
import { QueryEngine } from "./engine.js";
import { Mutex } from "./mutex.js";
import { logger } from "./observability/logs.js";
import { metrics, type LookupMetrics } from "./observability/metrics.js";
import type { IndexSnapshot } from "./snapshot.js";
import type {
  Entry,
  LexiconOptions,
  LoadReason,
  LookupOptions,
  LookupResult,
  SnapshotOrigin,
  SnapshotStats,
} from "./types.js";

export interface LexiconStats extends SnapshotStats {
  origin: SnapshotOrigin;
  reason: LoadReason;
  sourcePath: string;
  cachePath: string;
  metrics: LookupMetrics & { p95LookupTimeMs: number };
}

export interface ReloadOptions {
  /** Discard the cache file and rebuild from the source text */
  force?: boolean;
}

export interface Lexicon {
  readonly snapshot: IndexSnapshot;
  lookup(query: string, options?: LookupOptions): LookupResult;
  getEntry(idOrHeadword: number | string): string | null;
  getEntries(headword: string): Entry[];
  reload(options?: ReloadOptions): Promise<LexiconStats>;
  stats(): LexiconStats;
}

interface LoadedState {
  engine: QueryEngine;
  origin: SnapshotOrigin;
  reason: LoadReason;
}

class LexiconImpl implements Lexicon {
  readonly #options: LexiconOptions;
  readonly #mutex = new Mutex();
  #state: LoadedState;

  constructor(options: LexiconOptions, state: LoadedState) {
    this.#options = options;
    this.#state = state;
  }

  get snapshot(): IndexSnapshot {
    return this.#state.engine.snapshot;
  }

  lookup(query: string, options?: LookupOptions): LookupResult {
    return this.#state.engine.lookup(query, options);
  }

  getEntry(idOrHeadword: number | string): string | null {
    return this.#state.engine.getEntry(idOrHeadword);
  }

  getEntries(headword: string): Entry[] {
    return this.#state.engine.getEntries(headword);
  }

  async reload(options: ReloadOptions = {}): Promise<LexiconStats> {
    return this.#mutex.withLock(async () => {
      const state = await loadState(this.#options, { force: options.force });
      this.#state = state;
      logger.info("lexicon.reload", {
        path: this.#options.sourcePath,
        details: { origin: state.origin, reason: state.reason, entries: state.engine.snapshot.entries.length },
      });
      return this.stats();
    });
  }

  stats(): LexiconStats {
    const { engine, origin, reason } = this.#state;
    return {
      ...engine.snapshot.stats(),
      origin,
      reason,
      sourcePath: this.#options.sourcePath,
      cachePath: this.#options.cachePath,
      metrics: { ...metrics.getMetrics(), p95LookupTimeMs: metrics.getP95LookupTime() },
    };
  }
}

async function loadState(options: LexiconOptions, extra: Pick<LoadIndexOptions, "force"> = {}): Promise<LoadedState> {
  const report = await loadIndex(options.sourcePath, options.cachePath, {
    headwordPattern: options.headwordPattern,
    force: extra.force,
  });
  return {
    engine: new QueryEngine(report.snapshot, options.fuzzy),
    origin: report.origin,
    reason: report.reason,
  };
}

/**
 * Open a lexicon over a dictionary text, loading or building its index
 * @throws SourceTextError if the source text is missing, empty or unreadable
 */
export async function openLexicon(options: LexiconOptions): Promise<Lexicon> {
  return new LexiconImpl(options, await loadState(options));
}
