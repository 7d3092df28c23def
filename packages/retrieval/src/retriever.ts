import {
  createLogger,
  type Embedder,
  type IndexStats,
  type MetadataFilter,
  type RankedList,
  type VectorIndex,
} from "@kb/core";
import { Ranker } from "./ranker.js";

const log = createLogger("retriever");

export type RetrieverOptions = {
  embedder: Embedder;
  index: VectorIndex;
  ranker?: Ranker;
  /** Default number of results per query. */
  topK?: number;
  /** Default minimum relevance; 0 disables filtering. */
  threshold?: number;
};

export type RetrieveOptions = {
  limit?: number;
  filter?: MetadataFilter;
  threshold?: number;
};

export type RetrieverStats = {
  topK: number;
  threshold: number;
  strategy: string;
  index: IndexStats;
};

/**
 * Query path: embed → index search → threshold filter → rank.
 *
 * Filtering always runs before ranking so that sub-threshold candidates never
 * take a slot in the ranked order. Collaborator errors are rethrown as-is.
 */
export class Retriever {
  private readonly embedder: Embedder;
  private readonly index: VectorIndex;
  private readonly ranker: Ranker;
  readonly topK: number;
  readonly threshold: number;

  constructor(opts: RetrieverOptions) {
    this.embedder = opts.embedder;
    this.index = opts.index;
    this.ranker = opts.ranker ?? new Ranker();
    this.topK = opts.topK ?? 5;
    this.threshold = opts.threshold ?? 0;
  }

  async retrieve(query: string, opts: RetrieveOptions = {}): Promise<RankedList> {
    if (!query || !query.trim()) {
      log.warn("empty query provided");
      return [];
    }

    const limit = opts.limit ?? this.topK;
    const threshold = opts.threshold ?? this.threshold;

    try {
      const vector = await this.embedder.embed(query);
      const matches = await this.index.query(vector, limit, opts.filter);

      const eligible = threshold > 0 ? this.ranker.filterByThreshold(matches, threshold) : matches;
      const ranked = this.ranker.rank(eligible, query, limit);

      log.info(
        { matches: matches.length, eligible: eligible.length, returned: ranked.length },
        "retrieved candidates"
      );
      return ranked;
    } catch (e) {
      log.error({ err: e, query: query.slice(0, 100) }, "retrieval failed");
      throw e;
    }
  }

  /** Sequential; a failing query yields an empty list in its slot. */
  async retrieveBatch(queries: string[], opts: RetrieveOptions = {}): Promise<RankedList[]> {
    const results: RankedList[] = [];
    for (const query of queries) {
      try {
        results.push(await this.retrieve(query, opts));
      } catch (e) {
        log.error({ err: e, query: query.slice(0, 50) }, "batch query failed");
        results.push([]);
      }
    }
    return results;
  }

  async stats(): Promise<RetrieverStats> {
    return {
      topK: this.topK,
      threshold: this.threshold,
      strategy: this.ranker.strategy,
      index: await this.index.stats(),
    };
  }
}
