import { createLogger, toError, type Embedder, type SourceDocument, type VectorIndex } from "@kb/core";
import type { Segmenter } from "./segmenter.js";

const log = createLogger("ingestion");

export type IngestReport =
  | { path: string; ok: true; unitCount: number; ids: string[] }
  | { path: string; ok: false; error: Error };

async function ingestOne(
  doc: SourceDocument,
  deps: { segmenter: Segmenter; embedder: Embedder; index: VectorIndex }
): Promise<string[]> {
  const units = deps.segmenter.segment(doc.content, doc.attributes);
  if (units.length === 0) return [];

  const texts = units.map((u) => u.content);
  const vectors = await deps.embedder.embedMany(texts);
  if (vectors.length !== units.length) {
    throw new Error(`Embedding count mismatch: got ${vectors.length}, expected ${units.length}`);
  }

  const metadatas = units.map((u) => ({ ...u.attributes, sequenceIndex: u.sequenceIndex }));
  return deps.index.upsert(texts, vectors, metadatas);
}

/**
 * Segment → embed → upsert, one document at a time. A document that fails is
 * reported and the rest still run.
 */
export async function ingestDocuments(params: {
  documents: SourceDocument[];
  segmenter: Segmenter;
  embedder: Embedder;
  index: VectorIndex;
}): Promise<IngestReport[]> {
  const reports: IngestReport[] = [];

  for (const doc of params.documents) {
    try {
      const ids = await ingestOne(doc, params);
      reports.push({ path: doc.path, ok: true, unitCount: ids.length, ids });
      log.info({ path: doc.path, units: ids.length }, "document ingested");
    } catch (e) {
      const error = toError(e);
      log.error({ path: doc.path, err: error }, "document ingestion failed");
      reports.push({ path: doc.path, ok: false, error });
    }
  }

  return reports;
}
