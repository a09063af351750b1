import { describe, expect, it } from "vitest";

import { ConfigurationError } from "../errors.js";
import { fuse, toRankedList, type RankedList } from "../search/fusion.js";

describe("toRankedList", () => {
  it("ranks by score descending starting at 1", () => {
    const list = toRankedList("fulltext", 1, [
      { id: "a", score: 0.2 },
      { id: "b", score: 0.9 },
      { id: "c", score: 0.5 },
    ]);
    expect(list.entries).toEqual([
      { id: "b", rank: 1, score: 0.9 },
      { id: "c", rank: 2, score: 0.5 },
      { id: "a", rank: 3, score: 0.2 },
    ]);
  });

  it("keeps input order for equal scores", () => {
    const list = toRankedList("summary", 1, [
      { id: "x", score: 0.5 },
      { id: "y", score: 0.5 },
    ]);
    expect(list.entries.map((entry) => entry.id)).toEqual(["x", "y"]);
  });

  it("keeps only the best position of a repeated id", () => {
    const list = toRankedList("keyword", 1, [
      { id: "a", score: 0.3 },
      { id: "b", score: 0.6 },
      { id: "a", score: 0.8 },
    ]);
    expect(list.entries).toEqual([
      { id: "a", rank: 1, score: 0.8 },
      { id: "b", rank: 2, score: 0.6 },
    ]);
  });
});

describe("fuse", () => {
  it("sums weight / (k + rank) across lists", () => {
    const lists: RankedList[] = [
      toRankedList("fulltext", 2, [
        { id: "a", score: 3 },
        { id: "b", score: 1 },
      ]),
      toRankedList("summary", 1, [{ id: "b", score: 0.9 }]),
    ];

    const fused = fuse(lists, 10);

    expect(fused.map((entry) => entry.id)).toEqual(["b", "a"]);
    expect(fused[0]?.score).toBeCloseTo(2 / 12 + 1 / 11, 12);
    expect(fused[1]?.score).toBeCloseTo(2 / 11, 12);
    expect(fused[0]?.contributions).toEqual({
      fulltext: { rank: 2, score: 1 },
      summary: { rank: 1, score: 0.9 },
    });
  });

  it("returns rows from disjoint lists with single-list scores", () => {
    const fused = fuse(
      [
        toRankedList("fulltext", 0.5, [{ id: "c", score: 0.4 }]),
        toRankedList("summary", 0.5, [
          { id: "x", score: 0.9 },
          { id: "d", score: 0.8 },
        ]),
      ],
      50,
    );

    const scores = Object.fromEntries(fused.map((entry) => [entry.id, entry.score]));
    expect(scores.c).toBeCloseTo(0.5 / 51, 12);
    expect(scores.d).toBeCloseTo(0.5 / 52, 12);
    expect(scores.c).not.toBe(scores.d);
  });

  it("drops rows that only zero-weight lists contain", () => {
    const fused = fuse(
      [
        toRankedList("fulltext", 0, [{ id: "only-zero", score: 1 }]),
        toRankedList("summary", 1, [{ id: "kept", score: 1 }]),
      ],
      60,
    );
    expect(fused.map((entry) => entry.id)).toEqual(["kept"]);
  });

  it("counts a duplicated id once per list", () => {
    const fused = fuse(
      [
        {
          source: "fulltext",
          weight: 1,
          entries: [
            { id: "a", rank: 1, score: 1 },
            { id: "a", rank: 2, score: 1 },
          ],
        },
      ],
      0,
    );
    expect(fused).toHaveLength(1);
    expect(fused[0]?.score).toBe(1);
  });

  it("strictly increases a row's score when its rank improves", () => {
    const others = toRankedList("summary", 1, [
      { id: "p", score: 0.9 },
      { id: "q", score: 0.8 },
    ]);
    const before = fuse(
      [
        others,
        {
          source: "fulltext",
          weight: 1,
          entries: [
            { id: "p", rank: 1, score: 5 },
            { id: "q", rank: 3, score: 1 },
          ],
        },
      ],
      50,
    );
    const after = fuse(
      [
        others,
        {
          source: "fulltext",
          weight: 1,
          entries: [
            { id: "p", rank: 1, score: 5 },
            { id: "q", rank: 2, score: 1 },
          ],
        },
      ],
      50,
    );

    const scoreOf = (entries: typeof before, id: string) =>
      entries.find((entry) => entry.id === id)?.score ?? 0;
    expect(scoreOf(after, "q")).toBeGreaterThan(scoreOf(before, "q"));
    expect(scoreOf(after, "p")).toBe(scoreOf(before, "p"));
  });

  it("returns nothing for no lists", () => {
    expect(fuse([], 60)).toEqual([]);
  });

  it("rejects a negative k or weight", () => {
    expect(() => fuse([], -1)).toThrow(ConfigurationError);
    expect(() => fuse([toRankedList("keyword", -0.5, [])], 60)).toThrow(ConfigurationError);
  });
});
