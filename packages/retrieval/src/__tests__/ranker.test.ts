import { describe, expect, it, vi } from "vitest";
import { ConfigurationError, type Candidate } from "@kb/core";
import {
  Ranker,
  filterByThreshold,
  jaccardSimilarity,
  mmrSelect,
  wordSet,
} from "../ranker.js";

function cand(id: string, relevance: number, content = `content of ${id}`): Candidate {
  return { content, attributes: { id }, relevance };
}

const ids = (list: readonly Candidate[]) => list.map((c) => c.attributes.id);

const POOL: Candidate[] = [
  cand("a", 0.91, "red apple fruit"),
  cand("b", 0.87, "red apple fruit salad"),
  cand("c", 0.62, "blue ocean water"),
  cand("d", 0.55, "blue ocean waves"),
  cand("e", 0.3, "mountain trail"),
];

describe("wordSet / jaccardSimilarity", () => {
  it("lowercases and splits on any whitespace", () => {
    expect(wordSet("The  cat\nthe CAT\tsat")).toEqual(new Set(["the", "cat", "sat"]));
    expect(wordSet("   ").size).toBe(0);
  });

  it("computes intersection over union", () => {
    expect(jaccardSimilarity(new Set(["a", "b"]), new Set(["b", "c"]))).toBeCloseTo(1 / 3);
    expect(jaccardSimilarity(new Set(["a"]), new Set(["a"]))).toBe(1);
  });

  it("is 0 when either side is empty", () => {
    expect(jaccardSimilarity(new Set(), new Set(["a"]))).toBe(0);
    expect(jaccardSimilarity(new Set(["a"]), new Set())).toBe(0);
  });
});

describe("Ranker: similarity", () => {
  it("sorts by relevance, best first", () => {
    const ranked = new Ranker().rank([cand("x", 0.2), cand("y", 0.9), cand("z", 0.5)]);
    expect(ranked.map((c) => c.relevance)).toEqual([0.9, 0.5, 0.2]);
  });

  it("keeps input order among ties", () => {
    const ranked = new Ranker({ strategy: "similarity" }).rank([cand("a", 0.5), cand("b", 0.7), cand("c", 0.5)]);
    expect(ids(ranked)).toEqual(["b", "a", "c"]);
  });

  it("returns an empty list for no candidates", () => {
    expect(new Ranker().rank([])).toEqual([]);
  });

  it("does not touch the input array", () => {
    const input = [cand("a", 0.1), cand("b", 0.9)];
    new Ranker().rank(input);
    expect(ids(input)).toEqual(["a", "b"]);
  });

  it("falls back to similarity for unknown strategies", () => {
    const ranked = new Ranker({ strategy: "learned" }).rank(POOL.slice().reverse());
    expect(ids(ranked)).toEqual(["a", "b", "c", "d", "e"]);
  });
});

describe("Ranker: diversity", () => {
  it("interleaves the upper half (middle included) with the lower half", () => {
    const input = [cand("p", 0.1), cand("q", 0.9), cand("r", 0.5), cand("s", 0.7), cand("t", 0.3)];
    const ranked = new Ranker({ strategy: "diversity" }).rank(input);
    expect(ranked.map((c) => c.relevance)).toEqual([0.9, 0.3, 0.7, 0.1, 0.5]);
  });

  it("splits even counts evenly", () => {
    const input = [cand("p", 0.1), cand("q", 0.4), cand("r", 0.2), cand("s", 0.3)];
    const ranked = new Ranker({ strategy: "diversity" }).rank(input);
    expect(ranked.map((c) => c.relevance)).toEqual([0.4, 0.2, 0.3, 0.1]);
  });

  it("returns a single candidate unchanged", () => {
    expect(ids(new Ranker({ strategy: "diversity" }).rank([cand("only", 0.4)]))).toEqual(["only"]);
  });
});

describe("Ranker: mmr", () => {
  it("picks the most relevant first and fully penalizes duplicates", () => {
    const low = cand("low", 0.8, "identical words here");
    const high = cand("high", 0.9, "identical words here");

    for (const input of [
      [low, high],
      [high, low],
    ]) {
      const picks = mmrSelect(input, 0.5);
      expect(picks.map((p) => p.candidate.attributes.id)).toEqual(["high", "low"]);
      expect(picks[0]!.score).toBeCloseTo(0.45);
      expect(picks[1]!.score).toBeCloseTo(0.5 * 0.8 - 0.5 * 1);
    }
  });

  it("promotes dissimilar candidates over near-duplicates", () => {
    const ranked = new Ranker({ strategy: "mmr" }).rank(POOL);
    // a; then c (0.31) beats b (0.435 - 0.5 * 0.75); then e has no overlap with a or c
    expect(ids(ranked)).toEqual(["a", "c", "e", "b", "d"]);
  });

  it("matches similarity order when lambda is 1", () => {
    const ranked = new Ranker({ strategy: "mmr", lambda: 1 }).rank(POOL.slice().reverse());
    expect(ids(ranked)).toEqual(["a", "b", "c", "d", "e"]);
  });

  it("resolves ties to the earliest candidate", () => {
    const ranked = new Ranker({ strategy: "mmr" }).rank([
      cand("first", 0.5, "alpha"),
      cand("second", 0.5, "beta"),
      cand("third", 0.5, "gamma"),
    ]);
    expect(ids(ranked)).toEqual(["first", "second", "third"]);
  });

  it("never drops candidates", () => {
    expect(new Ranker({ strategy: "mmr" }).rank(POOL)).toHaveLength(POOL.length);
  });

  it("rejects lambda outside [0, 1]", () => {
    expect(() => new Ranker({ strategy: "mmr", lambda: 1.5 })).toThrow(ConfigurationError);
    expect(() => new Ranker({ strategy: "mmr", lambda: -0.1 })).toThrow(ConfigurationError);
  });
});

describe("Ranker: limit", () => {
  it.each(["similarity", "diversity", "mmr"])("%s truncates after ranking", (strategy) => {
    const ranker = new Ranker({ strategy });
    const full = ranker.rank(POOL);

    for (const k of [1, 2, 3, 4]) {
      const limited = ranker.rank(POOL, "query", k);
      expect(limited).toHaveLength(k);
      expect(limited).toEqual(full.slice(0, k));
    }
  });

  it("ignores a limit at or above the candidate count", () => {
    expect(new Ranker().rank(POOL, undefined, 10)).toHaveLength(5);
    expect(new Ranker().rank(POOL, undefined, 5)).toHaveLength(5);
  });

  it("returns nothing for a zero or negative limit", () => {
    expect(new Ranker().rank(POOL, undefined, 0)).toEqual([]);
    expect(new Ranker().rank(POOL, undefined, -3)).toEqual([]);
  });
});

describe("filterByThreshold", () => {
  it("keeps candidates at or above the threshold in their order", () => {
    const input = [cand("a", 0.4), cand("b", 0.7), cand("c", 0.5), cand("d", 0.49)];
    expect(ids(filterByThreshold(input, 0.5))).toEqual(["b", "c"]);
    expect(ids(new Ranker().filterByThreshold(input, 0.5))).toEqual(["b", "c"]);
  });

  it("is idempotent", () => {
    const once = filterByThreshold(POOL, 0.6);
    expect(filterByThreshold(once, 0.6)).toEqual(once);
  });
});

describe("Ranker.rankMany", () => {
  it("records a failing request and ranks the rest", () => {
    const ranker = new Ranker();
    vi.spyOn(ranker, "rank").mockImplementationOnce(() => {
      throw new Error("bad request");
    });

    const results = ranker.rankMany([
      { candidates: POOL },
      { candidates: [cand("x", 0.1), cand("y", 0.2)], limit: 1 },
    ]);

    expect(results[0]).toEqual({ ok: false, error: new Error("bad request") });
    expect(results[1]).toEqual({ ok: true, value: [cand("y", 0.2)] });
  });
});
