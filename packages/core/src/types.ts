export type AttributeValue = string | number | boolean | null;

export type Attributes = Record<string, AttributeValue>;

/**
 * One bounded slice of an input text.
 *
 * `sequenceIndex` is contiguous and zero-based within a single segmentation
 * call. Each unit owns its `attributes` object.
 */
export interface TextUnit {
  readonly content: string;
  readonly sequenceIndex: number;
  readonly attributes: Readonly<Attributes>;
}

/**
 * A scored item returned by similarity search. Higher `relevance` means more
 * relevant; the range is up to the index.
 */
export interface Candidate {
  readonly content: string;
  readonly attributes: Readonly<Attributes>;
  readonly relevance: number;
}

/** Best first. */
export type RankedList = readonly Candidate[];

export type SegmentationStrategy = "character" | "sentence" | "paragraph";

export type RankingStrategy = "similarity" | "diversity" | "mmr";

export type MetadataFilter = Attributes;

export type IndexStats = {
  documentCount: number;
  [key: string]: unknown;
};

export interface Embedder {
  embed(text: string): Promise<number[]>;
  /** One vector per input, same order. */
  embedMany(texts: string[]): Promise<number[][]>;
}

export interface VectorIndex {
  query(vector: number[], limit: number, filter?: MetadataFilter): Promise<Candidate[]>;
  upsert(texts: string[], vectors: number[][], metadatas?: Attributes[]): Promise<string[]>;
  delete(ids: string[]): Promise<number>;
  stats(): Promise<IndexStats>;
}

export interface SourceDocument {
  path: string;
  content: string;
  attributes: Attributes;
}

export type BatchItemResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error };
