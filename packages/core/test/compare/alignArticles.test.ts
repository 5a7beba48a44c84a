import { describe, expect, it } from "vitest";
import { alignArticles } from "../../src/compare/alignArticles";
import { parseStatute } from "../../src/parsers/parseStatute";
import type { AlignmentResult } from "../../src/types";
import { buildDocument, cjkRun, documentFromEntries, readFixture } from "../helpers";

function matchedPairs(result: AlignmentResult): Array<[number, number]> {
  return result.entries
    .filter((entry) => entry.newNumber !== -1)
    .map((entry): [number, number] => [entry.oldNumber, entry.newNumber]);
}

describe("alignArticles", () => {
  const oldDocument = parseStatute(readFixture("old_statute.txt"));
  const newDocument = parseStatute(readFixture("new_statute.txt"));

  it("pairs renumbered articles by similarity", () => {
    const result = alignArticles(oldDocument, newDocument);

    expect(matchedPairs(result)).toEqual([
      [1, 1],
      [2, 2],
      [4, 5],
      [5, 6],
      [6, 7],
    ]);
    expect(result.entries.find((entry) => entry.oldNumber === 3)).toEqual({
      oldNumber: 3,
      newNumber: -1,
      similarity: 0,
      matchType: "none",
    });
    expect(result.added).toEqual([3, 4]);
    expect(result.statistics).toEqual({
      totalOld: 6,
      totalNew: 7,
      manualCount: 0,
      autoCount: 5,
      deletedCount: 1,
      addedCount: 2,
    });
  });

  it("never uses an article on either side twice", () => {
    const result = alignArticles(oldDocument, newDocument, {
      manualMatches: [{ oldNumber: 3, newNumber: 3 }],
      threshold: 0.1,
    });
    const pairs = matchedPairs(result);

    expect(new Set(pairs.map(([oldNumber]) => oldNumber)).size).toBe(pairs.length);
    expect(new Set(pairs.map(([, newNumber]) => newNumber)).size).toBe(pairs.length);
  });

  it("applies manual matches before automatic ones", () => {
    const result = alignArticles(oldDocument, newDocument, {
      manualMatches: [{ oldNumber: 3, newNumber: 3 }],
    });

    expect(result.entries[0]).toEqual({ oldNumber: 3, newNumber: 3, similarity: 0.6, matchType: "manual" });
    expect(result.added).toEqual([4]);
    expect(result.statistics).toMatchObject({ manualCount: 1, autoCount: 5, deletedCount: 0, addedCount: 1 });
  });

  it("keeps a manual match however dissimilar the articles are", () => {
    const result = alignArticles(
      buildDocument({ 5: "本条例自发布之日起施行。" }),
      buildDocument({ 9: "违者处以罚款。" }),
      { manualMatches: [{ oldNumber: 5, newNumber: 9 }] },
    );

    expect(result.entries).toHaveLength(1);
    expect(result.entries[0]).toMatchObject({ oldNumber: 5, newNumber: 9, matchType: "manual" });
    expect(result.entries[0]?.similarity).toBeCloseTo(2 / 19, 10);
    expect(result.added).toEqual([]);
    expect(result.statistics.deletedCount).toBe(0);
  });

  it("matches at exactly the threshold", () => {
    const result = alignArticles(buildDocument({ 1: "abcde" }), buildDocument({ 1: "abcdf" }), { threshold: 0.8 });

    expect(result.entries).toEqual([{ oldNumber: 1, newNumber: 1, similarity: 0.8, matchType: "auto" }]);
  });

  it("leaves a candidate just below the threshold free for a later article", () => {
    const shared = cjkRun(0, 79);
    const result = alignArticles(
      buildDocument({ 1: shared + cjkRun(79, 21), 2: shared + cjkRun(100, 21) }),
      buildDocument({ 1: shared + cjkRun(100, 21) }),
      { threshold: 0.8 },
    );

    expect(result.entries).toEqual([
      { oldNumber: 1, newNumber: -1, similarity: 0, matchType: "none" },
      { oldNumber: 2, newNumber: 1, similarity: 1, matchType: "auto" },
    ]);
  });

  it("breaks ties in favour of the lowest new number whatever the source order", () => {
    const newDocument = documentFromEntries([
      [2, "abcf"],
      [1, "abce"],
    ]);
    expect([...newDocument.articles.keys()]).toEqual([2, 1]);

    const result = alignArticles(buildDocument({ 1: "abcd" }), newDocument, { threshold: 0.5 });

    expect(matchedPairs(result)).toEqual([[1, 1]]);
    expect(result.added).toEqual([2]);
  });

  it("visits old articles in ascending number order whatever the source order", () => {
    const oldDocument = documentFromEntries([
      [2, "abcd"],
      [1, "abce"],
    ]);
    const result = alignArticles(oldDocument, buildDocument({ 1: "abcd" }), { threshold: 0.5 });

    expect(result.entries).toEqual([
      { oldNumber: 1, newNumber: 1, similarity: 0.75, matchType: "auto" },
      { oldNumber: 2, newNumber: -1, similarity: 0, matchType: "none" },
    ]);
  });

  it("parses out-of-order headers and still aligns by number", () => {
    const oldDocument = parseStatute("第二条 abcd。\n第一条 abce。");
    const newDocument = parseStatute("第三条 abcd。\n第一条 abcd。");
    const result = alignArticles(oldDocument, newDocument, { threshold: 0.5 });

    expect([...oldDocument.articles.keys()]).toEqual([2, 1]);
    expect(result.entries).toEqual([
      { oldNumber: 1, newNumber: 1, similarity: 0.8, matchType: "auto" },
      { oldNumber: 2, newNumber: 3, similarity: 1, matchType: "auto" },
    ]);
  });

  it("manually matches an article numbered zero", () => {
    const result = alignArticles(buildDocument({ 0: "甲。" }), buildDocument({ 1: "乙。" }), {
      manualMatches: [{ oldNumber: 0, newNumber: 1 }],
    });

    expect(result.warnings).toEqual([]);
    expect(result.entries).toEqual([{ oldNumber: 0, newNumber: 1, similarity: 0.5, matchType: "manual" }]);
  });

  it("does not match articles with nothing in common, even at threshold 0", () => {
    const result = alignArticles(buildDocument({ 1: "abc" }), buildDocument({ 1: "xyz" }), { threshold: 0 });

    expect(result.entries).toEqual([{ oldNumber: 1, newNumber: -1, similarity: 0, matchType: "none" }]);
    expect(result.added).toEqual([1]);
  });

  it("warns about manual matches naming a missing article", () => {
    const result = alignArticles(buildDocument({ 1: "甲。" }), buildDocument({ 1: "甲。" }), {
      manualMatches: [{ oldNumber: 9, newNumber: 1 }],
    });

    expect(result.warnings).toEqual([
      {
        kind: "missing_article",
        oldNumber: 9,
        newNumber: 1,
        message: "Manual match references a missing article: old 9 -> new 1",
      },
    ]);
    expect(matchedPairs(result)).toEqual([[1, 1]]);
  });

  it("warns about manual matches reusing an article", () => {
    const result = alignArticles(buildDocument({ 1: "甲。", 2: "乙。" }), buildDocument({ 1: "甲。" }), {
      manualMatches: [
        { oldNumber: 1, newNumber: 1 },
        { oldNumber: 2, newNumber: 1 },
      ],
    });

    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toMatchObject({ kind: "already_matched", oldNumber: 2, newNumber: 1 });
    expect(result.entries).toEqual([
      { oldNumber: 1, newNumber: 1, similarity: 1, matchType: "manual" },
      { oldNumber: 2, newNumber: -1, similarity: 0, matchType: "none" },
    ]);
  });

  it("handles empty documents", () => {
    expect(alignArticles(buildDocument({}), buildDocument({}))).toEqual({
      entries: [],
      added: [],
      warnings: [],
      statistics: { totalOld: 0, totalNew: 0, manualCount: 0, autoCount: 0, deletedCount: 0, addedCount: 0 },
    });
    expect(alignArticles(buildDocument({}), buildDocument({ 1: "甲。" })).added).toEqual([1]);
    expect(alignArticles(buildDocument({ 1: "甲。" }), buildDocument({})).statistics.deletedCount).toBe(1);
  });
});
