import {
  ConfigurationError,
  createLogger,
  toError,
  type BatchItemResult,
  type Candidate,
  type RankedList,
  type RankingStrategy,
} from "@kb/core";

const log = createLogger("ranker");

export const DEFAULT_MMR_LAMBDA = 0.5;

/** Case-insensitive, whitespace-delimited word set. */
export function wordSet(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/\s+/)
      .filter((w) => w.length > 0)
  );
}

/** 0 when either set is empty. */
export function jaccardSimilarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let shared = 0;
  for (const w of a) if (b.has(w)) shared++;
  return shared / (a.size + b.size - shared);
}

export function marginalRelevance(relevance: number, maxOverlap: number, lambda: number): number {
  return lambda * relevance - (1 - lambda) * maxOverlap;
}

export function filterByThreshold(candidates: readonly Candidate[], threshold: number): Candidate[] {
  return candidates.filter((c) => c.relevance >= threshold);
}

/** Stable: equal scores keep their input order. */
export function sortByRelevance(candidates: readonly Candidate[]): Candidate[] {
  return [...candidates].sort((a, b) => b.relevance - a.relevance);
}

/**
 * Upper half (the middle element included when the count is odd) interleaved
 * with the lower half: u0, l0, u1, l1, ...
 */
export function interleaveByRelevance(candidates: readonly Candidate[]): Candidate[] {
  const sorted = sortByRelevance(candidates);
  const mid = Math.ceil(sorted.length / 2);
  const upper = sorted.slice(0, mid);
  const lower = sorted.slice(mid);

  const out: Candidate[] = [];
  for (let i = 0; i < upper.length; i++) {
    out.push(upper[i]!);
    const low = lower[i];
    if (low) out.push(low);
  }
  return out;
}

export type MmrPick = {
  candidate: Candidate;
  /** Objective value at the moment this candidate was picked. */
  score: number;
};

/**
 * Greedy Maximal Marginal Relevance over the whole pool. Redundancy is the
 * highest word-set Jaccard similarity to anything already picked.
 */
export function mmrSelect(candidates: readonly Candidate[], lambda: number): MmrPick[] {
  const pool = sortByRelevance(candidates);
  const words = pool.map((c) => wordSet(c.content));
  const maxOverlap = pool.map(() => 0);
  const remaining = pool.map((_, i) => i);
  const picks: MmrPick[] = [];

  while (remaining.length > 0) {
    let bestPos = 0;
    let bestScore = -Infinity;

    remaining.forEach((idx, pos) => {
      const score = marginalRelevance(pool[idx]!.relevance, maxOverlap[idx]!, lambda);
      if (score > bestScore) {
        bestScore = score;
        bestPos = pos;
      }
    });

    const [picked] = remaining.splice(bestPos, 1);
    if (picked === undefined) break;
    picks.push({ candidate: pool[picked]!, score: bestScore });

    for (const idx of remaining) {
      const overlap = jaccardSimilarity(words[idx]!, words[picked]!);
      if (overlap > maxOverlap[idx]!) maxOverlap[idx] = overlap;
    }
  }

  return picks;
}

export function isRankingStrategy(value: string): value is RankingStrategy {
  return value === "similarity" || value === "diversity" || value === "mmr";
}

export type RankerOptions = {
  /** Unknown names fall back to "similarity". */
  strategy?: RankingStrategy | (string & {});
  /** MMR trade-off in [0, 1]; 1 is pure relevance. */
  lambda?: number;
};

export type RankRequest = {
  candidates: readonly Candidate[];
  query?: string;
  limit?: number;
};

export class Ranker {
  readonly strategy: string;
  readonly lambda: number;

  constructor(opts: RankerOptions = {}) {
    const lambda = opts.lambda ?? DEFAULT_MMR_LAMBDA;
    if (!Number.isFinite(lambda) || lambda < 0 || lambda > 1) {
      throw new ConfigurationError(`lambda must be within [0, 1], got ${lambda}`);
    }
    this.strategy = opts.strategy ?? "similarity";
    this.lambda = lambda;
  }

  /**
   * Reorders `candidates` and then truncates to `limit`. Never mutates the
   * input and never returns more than it was given.
   */
  rank(candidates: readonly Candidate[], query?: string, limit?: number): RankedList {
    if (candidates.length === 0) return [];

    let ranked = this.order(candidates);

    if (limit !== undefined && limit < ranked.length) {
      ranked = ranked.slice(0, Math.max(0, limit));
    }

    log.debug(
      { strategy: this.strategy, input: candidates.length, output: ranked.length, query },
      "ranked candidates"
    );
    return ranked;
  }

  filterByThreshold(candidates: readonly Candidate[], threshold: number): Candidate[] {
    const kept = filterByThreshold(candidates, threshold);
    log.debug({ input: candidates.length, output: kept.length, threshold }, "filtered candidates");
    return kept;
  }

  rankMany(requests: RankRequest[]): Array<BatchItemResult<RankedList>> {
    return requests.map((req, i): BatchItemResult<RankedList> => {
      try {
        return { ok: true, value: this.rank(req.candidates, req.query, req.limit) };
      } catch (e) {
        const error = toError(e);
        log.error({ index: i, err: error }, "ranking failed");
        return { ok: false, error };
      }
    });
  }

  private order(candidates: readonly Candidate[]): Candidate[] {
    switch (this.resolveStrategy()) {
      case "similarity":
        return sortByRelevance(candidates);
      case "diversity":
        return interleaveByRelevance(candidates);
      case "mmr":
        return mmrSelect(candidates, this.lambda).map((p) => p.candidate);
    }
  }

  private resolveStrategy(): RankingStrategy {
    if (isRankingStrategy(this.strategy)) return this.strategy;
    log.warn({ strategy: this.strategy }, "unknown ranking strategy, using similarity");
    return "similarity";
  }
}
