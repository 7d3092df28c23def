import { randomUUID } from "node:crypto";
import Database from "better-sqlite3";
import type {
  Attributes,
  Candidate,
  IndexStats,
  MetadataFilter,
  VectorIndex,
} from "@kb/core";

type SqlRow = {
  id: string;
  content: string;
  metadata_json: string;
  vector_json: string;
};

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let na = 0;
  let nb = 0;

  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    na += av * av;
    nb += bv * bv;
  }

  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

function matchesFilter(metadata: Attributes, filter: MetadataFilter | undefined): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(([key, value]) => metadata[key] === value);
}

/**
 * Exact (brute-force) cosine search over vectors kept in one SQLite table.
 * Pass ":memory:" as `dbPath` for a throwaway index.
 */
export class SqliteVectorIndex implements VectorIndex {
  private db: Database.Database;
  readonly collection: string;

  constructor(opts: { dbPath: string; collection?: string }) {
    this.db = new Database(opts.dbPath);
    this.collection = opts.collection ?? "knowledge_base";
  }

  init(): void {
    this.db.exec(`PRAGMA journal_mode = WAL;`);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS units (
        id TEXT PRIMARY KEY,
        collection TEXT NOT NULL,
        content TEXT NOT NULL,
        metadata_json TEXT NOT NULL,
        vector_json TEXT NOT NULL
      );
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_units_collection
      ON units(collection);
    `);
  }

  async upsert(texts: string[], vectors: number[][], metadatas?: Attributes[]): Promise<string[]> {
    if (vectors.length !== texts.length) {
      throw new Error(`upsert: got ${vectors.length} vectors for ${texts.length} texts`);
    }
    if (metadatas && metadatas.length !== texts.length) {
      throw new Error(`upsert: got ${metadatas.length} metadatas for ${texts.length} texts`);
    }

    const stmt = this.db.prepare(`
      INSERT INTO units (id, collection, content, metadata_json, vector_json)
      VALUES (@id, @collection, @content, @metadata_json, @vector_json)
      ON CONFLICT(id) DO UPDATE SET
        collection = excluded.collection,
        content = excluded.content,
        metadata_json = excluded.metadata_json,
        vector_json = excluded.vector_json;
    `);

    const ids = texts.map(() => randomUUID());

    const tx = this.db.transaction(() => {
      texts.forEach((content, i) => {
        stmt.run({
          id: ids[i],
          collection: this.collection,
          content,
          metadata_json: JSON.stringify(metadatas?.[i] ?? {}),
          vector_json: JSON.stringify(vectors[i]),
        });
      });
    });

    tx();
    return ids;
  }

  async query(vector: number[], limit: number, filter?: MetadataFilter): Promise<Candidate[]> {
    if (limit <= 0) return [];

    const rows = this.db
      .prepare<[string], SqlRow>(
        `
        SELECT id, content, metadata_json, vector_json
        FROM units
        WHERE collection = ?
        ORDER BY rowid
      `
      )
      .all(this.collection);

    const scored: Candidate[] = [];
    for (const row of rows) {
      const attributes = JSON.parse(row.metadata_json) as Attributes;
      if (!matchesFilter(attributes, filter)) continue;

      const stored = JSON.parse(row.vector_json) as number[];
      scored.push({
        content: row.content,
        attributes: { ...attributes, id: row.id },
        relevance: cosineSimilarity(vector, stored),
      });
    }

    scored.sort((a, b) => b.relevance - a.relevance);
    return scored.slice(0, limit);
  }

  async delete(ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;
    const placeholders = ids.map(() => "?").join(",");
    const res = this.db
      .prepare(`DELETE FROM units WHERE collection = ? AND id IN (${placeholders})`)
      .run(this.collection, ...ids);
    return res.changes;
  }

  /** Removes every unit in this collection and returns how many were deleted. */
  async clear(): Promise<number> {
    const res = this.db.prepare(`DELETE FROM units WHERE collection = ?`).run(this.collection);
    return res.changes;
  }

  async stats(): Promise<IndexStats> {
    const row = this.db
      .prepare<[string], { n: number }>(`SELECT COUNT(*) AS n FROM units WHERE collection = ?`)
      .get(this.collection);
    return { documentCount: row?.n ?? 0, collection: this.collection };
  }

  close(): void {
    this.db.close();
  }
}
