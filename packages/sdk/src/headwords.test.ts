import { describe, it, expect } from "vitest";
import { HeadwordIndex } from "./headwords.js";

describe("HeadwordIndex", () => {
  const index = HeadwordIndex.fromPairs([
    ["abacus", 0],
    ["abalieno", 1],
    ["ab", 2],
    ["ab", 3],
    ["tego", 4],
  ]);

  it("should sort keys and keep homograph ids in source order", () => {
    expect(index.keys()).toEqual(["ab", "abacus", "abalieno", "tego"]);
    expect(index.get("ab")).toEqual([2, 3]);
    expect(index.size).toBe(4);
  });

  it("should return an empty list for an unknown key", () => {
    expect(index.get("venio")).toEqual([]);
    expect(index.get("a")).toEqual([]);
  });

  it("should find every key with a prefix", () => {
    expect(index.withPrefix("aba").map((row) => row.key)).toEqual(["abacus", "abalieno"]);
    expect(index.withPrefix("ab").map((row) => row.key)).toEqual(["ab", "abacus", "abalieno"]);
    expect(index.withPrefix("abalieno").map((row) => row.entryIds)).toEqual([[1]]);
  });

  it("should match nothing for an empty or absent prefix", () => {
    expect(index.withPrefix("")).toEqual([]);
    expect(index.withPrefix("x")).toEqual([]);
    expect(index.withPrefix("abalienox")).toEqual([]);
  });

  it("should stop at the row limit", () => {
    expect(index.withPrefix("a", 2).map((row) => row.key)).toEqual(["ab", "abacus"]);
  });

  it("should round-trip through its persisted form", () => {
    const data = index.toJSON();
    expect(data).toEqual({ ab: [2, 3], abacus: [0], abalieno: [1], tego: [4] });
    expect(HeadwordIndex.fromJSON(data).keys()).toEqual(index.keys());
  });
});
