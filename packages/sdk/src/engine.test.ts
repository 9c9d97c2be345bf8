import { describe, it, expect } from "vitest";
import { QueryEngine } from "./engine.js";
import { fingerprintOf } from "./io.js";
import { metrics } from "./observability/metrics.js";
import { buildSnapshot } from "./snapshot.js";
import type { FuzzyOptions, LookupResult } from "./types.js";

function engineFor(text: string, fuzzy?: FuzzyOptions): QueryEngine {
  return new QueryEngine(buildSnapshot({ text, fingerprint: fingerprintOf(Buffer.from(text, "utf-8")) }), fuzzy);
}

const TEXT = [
  "ăbăcus, i, m., a sideboard; texit texit.",
  "ăbălĭēno, āvi, ātum, to alienate.",
  "1. ăb, ā, abs, prep., away from.",
  "2. ăb, interj., an exclamation.",
  "tĕgo, xi, ctum, to cover; texit texit texit texit texit.",
  "vĕnio, vēni, ventum, to come; texit texit.",
].join("\n");

function nonEmptyLists(result: LookupResult): number {
  return [result.exactPrefixMatches, result.fullTextMatches, result.fuzzyMatches].filter((l) => l.length > 0)
    .length;
}

describe("QueryEngine.lookup", () => {
  const engine = engineFor(TEXT);

  it("should find a single entry by its headword without diacritics", () => {
    const single = engineFor("abalieno — to alienate, to estrange.\n");
    const result = single.lookup("abalieno");

    expect(result.exactPrefixMatches.map((m) => m.headword)).toEqual(["abalieno"]);
    expect(result.fullTextMatches).toEqual([]);
    expect(result.fuzzyMatches).toEqual([]);
  });

  it("should match prefixes regardless of case and diacritics", () => {
    const result = engine.lookup("ĂBĂ");
    expect(result.exactPrefixMatches).toEqual([
      { headword: "abacus", original: "ăbăcus", entryId: 0 },
      { headword: "abalieno", original: "ăbălĭēno", entryId: 1 },
    ]);
  });

  it("should list every homograph, sorted by headword then id", () => {
    const result = engine.lookup("a");
    expect(result.exactPrefixMatches.map((m) => [m.headword, m.entryId])).toEqual([
      ["ab", 2],
      ["ab", 3],
      ["abacus", 0],
      ["abalieno", 1],
    ]);
  });

  it("should fall back to full text ordered by count, then headword", () => {
    const result = engine.lookup("texit");

    expect(result.exactPrefixMatches).toEqual([]);
    expect(result.fullTextMatches).toEqual([
      { headword: "tego", original: "tĕgo", entryId: 4, count: 5 },
      { headword: "abacus", original: "ăbăcus", entryId: 0, count: 2 },
      { headword: "venio", original: "vĕnio", entryId: 5, count: 2 },
    ]);
    expect(result.fuzzyMatches).toEqual([]);
  });

  it("should break full-text count ties alphabetically", () => {
    expect(engine.lookup("to").fullTextMatches.map((m) => m.headword)).toEqual(["abalieno", "tego", "venio"]);
  });

  it("should fall back to fuzzy headwords", () => {
    const result = engine.lookup("vĕnyo");

    expect(result.exactPrefixMatches).toEqual([]);
    expect(result.fullTextMatches).toEqual([]);
    expect(result.fuzzyMatches).toEqual([{ headword: "venio", original: "vĕnio", entryId: 5, score: 1 }]);
  });

  it("should rank a misspelled headword first among fuzzy matches", () => {
    const weaving = engineFor("texit, he weaves.\ntexo, to weave.\ntego, to cover.\n");
    const result = weaving.lookup("texxit");

    expect(result.exactPrefixMatches).toEqual([]);
    expect(result.fullTextMatches).toEqual([]);
    expect(result.fuzzyMatches[0]).toEqual({ headword: "texit", original: "texit", entryId: 0, score: 1 });
  });

  it("should expand fuzzy homographs and cap them at k", () => {
    expect(engine.lookup("abx").fuzzyMatches.map((m) => m.entryId)).toEqual([2, 3]);

    const narrow = engineFor(TEXT, { k: 1 });
    expect(narrow.lookup("abx").fuzzyMatches.map((m) => m.entryId)).toEqual([2]);
  });

  it("should honour the fuzzy distance budget", () => {
    const strict = engineFor(TEXT, { maxDistance: 0 });
    expect(strict.lookup("venyo").fuzzyMatches).toEqual([]);
  });

  it("should return three empty lists for an empty query", () => {
    for (const query of ["", "   ", ",;-"]) {
      expect(engine.lookup(query)).toEqual({ exactPrefixMatches: [], fullTextMatches: [], fuzzyMatches: [] });
    }
  });

  it("should return three empty lists when nothing is close", () => {
    expect(engine.lookup("zzzzzzzz")).toEqual({ exactPrefixMatches: [], fullTextMatches: [], fuzzyMatches: [] });
  });

  it("should apply per-call limits", () => {
    expect(engine.lookup("a", { limits: { prefix: 3 } }).exactPrefixMatches).toHaveLength(3);
    expect(engine.lookup("texit", { limits: { fullText: 1 } }).fullTextMatches.map((m) => m.entryId)).toEqual([4]);
  });

  it("should not run later stages when a limit hides every match", () => {
    // "a" is a prefix of four headwords and also a token of the abacus entry
    expect(engine.lookup("a", { limits: { prefix: 0 } })).toEqual({
      exactPrefixMatches: [],
      fullTextMatches: [],
      fuzzyMatches: [],
    });

    // "to" occurs in the text and is two edits from "tego"
    expect(engine.lookup("to").fullTextMatches.map((m) => m.headword)).toEqual(["abalieno", "tego", "venio"]);
    expect(engine.lookup("to", { limits: { fullText: 0 } })).toEqual({
      exactPrefixMatches: [],
      fullTextMatches: [],
      fuzzyMatches: [],
    });
  });

  it("should record the stage that had matches even when limited to none", () => {
    metrics.reset();
    engine.lookup("a", { limits: { prefix: 0 } });
    engine.lookup("to", { limits: { fullText: 0 } });
    expect(metrics.getMetrics().stageCounts).toEqual({ prefix: 1, fullText: 1, fuzzy: 0, none: 0 });
  });

  it("should fill at most one list for any query", () => {
    for (const query of ["a", "ab", "abx", "texit", "to", "venyo", "zz", "x", "t", "ăbălĭēno", "from"]) {
      const result = engine.lookup(query);
      expect(nonEmptyLists(result)).toBeLessThanOrEqual(1);
    }
  });

  it("should record the resolving stage of each lookup", () => {
    metrics.reset();
    engine.lookup("a");
    engine.lookup("texit");
    engine.lookup("venyo");
    engine.lookup("zzzzzzzz");
    engine.lookup("");

    const recorded = metrics.getMetrics();
    expect(recorded.stageCounts).toEqual({ prefix: 1, fullText: 1, fuzzy: 1, none: 2 });
    expect(recorded.lookupTimeMs).toHaveLength(5);
  });
});

describe("QueryEngine.getEntry", () => {
  const engine = engineFor(TEXT);

  it("should return the raw entry by id", () => {
    expect(engine.getEntry(1)).toBe("ăbălĭēno, āvi, ātum, to alienate.");
  });

  it("should return the raw entry by headword, normalized", () => {
    expect(engine.getEntry("abacus")).toBe("ăbăcus, i, m., a sideboard; texit texit.");
    expect(engine.getEntry("TĔGO")).toBe("tĕgo, xi, ctum, to cover; texit texit texit texit texit.");
  });

  it("should return the first entry of a homograph group", () => {
    expect(engine.getEntry("ab")).toBe("1. ăb, ā, abs, prep., away from.");
  });

  it("should return null for unknown entries", () => {
    expect(engine.getEntry("nonexistent")).toBeNull();
    expect(engine.getEntry("")).toBeNull();
    expect(engine.getEntry(99)).toBeNull();
    expect(engine.getEntry(-1)).toBeNull();
  });

  it("should list all homographs", () => {
    expect(engine.getEntries("ăb").map((e) => e.id)).toEqual([2, 3]);
    expect(engine.getEntries("nonexistent")).toEqual([]);
  });
});
