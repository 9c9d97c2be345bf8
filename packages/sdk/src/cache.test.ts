import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile, mkdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { buildOrLoadIndex, loadIndex } from "./cache.js";
import { SourceEmptyError, SourceNotFoundError } from "./errors.js";
import { logger } from "./observability/logs.js";

const TEXT = "tego, to cover; texit texit.\nvenio, to come; texit.\n";

describe("loadIndex", () => {
  let testDir: string;
  let sourcePath: string;
  let cachePath: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "lexicon-cache-"));
    sourcePath = join(testDir, "dictionary.txt");
    cachePath = join(testDir, "dictionary.index.json");
    await writeFile(sourcePath, TEXT, "utf-8");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  it("should build and persist on a missing cache", async () => {
    const report = await loadIndex(sourcePath, cachePath);

    expect(report.origin).toBe("build");
    expect(report.reason).toBe("missing");
    expect(report.persisted).toBe(true);
    expect(await readFile(cachePath, "utf-8")).toBe(report.snapshot.serialize());
  });

  it("should load from the cache on the next start", async () => {
    const first = await loadIndex(sourcePath, cachePath);
    const second = await loadIndex(sourcePath, cachePath);

    expect(second.origin).toBe("cache");
    expect(second.reason).toBe("hit");
    expect(second.snapshot.serialize()).toBe(first.snapshot.serialize());
    expect(second.snapshot.entries.map((e) => e.body)).toEqual(["tego, to cover; texit texit.", "venio, to come; texit."]);
  });

  it("should rebuild when the source text changed", async () => {
    await loadIndex(sourcePath, cachePath);
    await writeFile(sourcePath, TEXT + "texo, to weave.\n", "utf-8");
    const warn = vi.spyOn(logger, "warn");

    const report = await loadIndex(sourcePath, cachePath);

    expect(report.origin).toBe("build");
    expect(report.reason).toBe("stale");
    expect(report.snapshot.entries.map((e) => e.headword)).toEqual(["tego", "venio", "texo"]);
    expect(warn).toHaveBeenCalledWith("cache.stale", expect.objectContaining({ path: cachePath }));

    const reloaded = await loadIndex(sourcePath, cachePath);
    expect(reloaded.reason).toBe("hit");
  });

  it("should rebuild when the entry marker changed", async () => {
    await writeFile(sourcePath, "@@tego\nto cover\n@@venio\nto come\n", "utf-8");
    const first = await loadIndex(sourcePath, cachePath);
    expect(first.snapshot.entries).toHaveLength(0);
    const warn = vi.spyOn(logger, "warn");

    const report = await loadIndex(sourcePath, cachePath, { headwordPattern: /^@@(\S+)/ });

    expect(report.origin).toBe("build");
    expect(report.reason).toBe("stale");
    expect(report.snapshot.entries.map((e) => e.headword)).toEqual(["tego", "venio"]);
    expect(warn).toHaveBeenCalledWith(
      "cache.stale",
      expect.objectContaining({ message: "entry marker changed since the index was written; rebuilding" })
    );

    const again = await loadIndex(sourcePath, cachePath, { headwordPattern: /^@@(\S+)/ });
    expect(again.reason).toBe("hit");
    expect(again.snapshot.entries).toHaveLength(2);
  });

  it("should rebuild when fuzzy terms were dropped from the cache", async () => {
    await loadIndex(sourcePath, cachePath);
    const data: Record<string, unknown> = JSON.parse(await readFile(cachePath, "utf-8"));
    await writeFile(cachePath, JSON.stringify({ ...data, fuzzy: { gramSize: 2, terms: [] } }), "utf-8");

    const report = await loadIndex(sourcePath, cachePath);

    expect(report.reason).toBe("corrupt");
    expect(report.snapshot.fuzzy.terms()).toEqual(["tego", "venio"]);
  });

  it("should rebuild on a truncated cache file", async () => {
    const { snapshot } = await loadIndex(sourcePath, cachePath);
    const json = await readFile(cachePath, "utf-8");
    await writeFile(cachePath, json.slice(0, 40), "utf-8");
    const warn = vi.spyOn(logger, "warn");

    const report = await loadIndex(sourcePath, cachePath);

    expect(report.reason).toBe("corrupt");
    expect(report.snapshot.serialize()).toBe(snapshot.serialize());
    expect(warn).toHaveBeenCalledWith("cache.corrupt", expect.objectContaining({ path: cachePath }));
    expect(await readFile(cachePath, "utf-8")).toBe(json);
  });

  it("should rebuild on an unknown version", async () => {
    await loadIndex(sourcePath, cachePath);
    const data: Record<string, unknown> = JSON.parse(await readFile(cachePath, "utf-8"));
    await writeFile(cachePath, JSON.stringify({ ...data, version: 99 }), "utf-8");

    const report = await loadIndex(sourcePath, cachePath);
    expect(report.reason).toBe("corrupt");
    expect(report.origin).toBe("build");
  });

  it("should rebuild when the cache path is unreadable", async () => {
    await mkdir(cachePath);

    const report = await loadIndex(sourcePath, cachePath);
    expect(report.reason).toBe("corrupt");
    expect(report.persisted).toBe(false);
    expect(report.snapshot.entries).toHaveLength(2);
  });

  it("should serve a build when the cache cannot be written", async () => {
    const blocker = join(testDir, "blocker");
    await writeFile(blocker, "not a directory");
    const error = vi.spyOn(logger, "error");

    const report = await loadIndex(sourcePath, join(blocker, "index.json"));

    expect(report.persisted).toBe(false);
    expect(report.snapshot.entries).toHaveLength(2);
    expect(error).toHaveBeenCalledWith("cache.write.failed", expect.objectContaining({ path: join(blocker, "index.json") }));
  });

  it("should rebuild when forced", async () => {
    await loadIndex(sourcePath, cachePath);
    const report = await loadIndex(sourcePath, cachePath, { force: true });

    expect(report.origin).toBe("build");
    expect(report.reason).toBe("forced");
    expect(report.persisted).toBe(true);
  });

  it("should remove temp files left by an interrupted write", async () => {
    await writeFile(join(testDir, ".dictionary.index.json.0000.tmp"), "{", "utf-8");

    await loadIndex(sourcePath, cachePath);

    expect((await readdir(testDir)).sort()).toEqual(["dictionary.index.json", "dictionary.txt"]);
  });

  it("should fail on a missing source", async () => {
    await expect(loadIndex(join(testDir, "missing.txt"), cachePath)).rejects.toThrow(SourceNotFoundError);
  });

  it("should fail on an empty source even with a cache present", async () => {
    await loadIndex(sourcePath, cachePath);
    await writeFile(sourcePath, "", "utf-8");
    await expect(loadIndex(sourcePath, cachePath)).rejects.toThrow(SourceEmptyError);
  });
});

describe("buildOrLoadIndex", () => {
  it("should return the snapshot alone", async () => {
    const dir = await mkdtemp(join(tmpdir(), "lexicon-cache-"));
    try {
      const sourcePath = join(dir, "dictionary.txt");
      await writeFile(sourcePath, TEXT, "utf-8");

      const snapshot = await buildOrLoadIndex(sourcePath, join(dir, "index.json"));
      expect(snapshot.headwords.keys()).toEqual(["tego", "venio"]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
