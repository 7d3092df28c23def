import { describe, expect, it, vi } from "vitest";
import type { Attributes, Embedder, VectorIndex } from "@kb/core";
import { Segmenter } from "../segmenter.js";
import { ingestDocuments } from "../ingestDocuments.js";

function fakeEmbedder() {
  return {
    embed: vi.fn(async (text: string) => [text.length, 1]),
    embedMany: vi.fn(async (texts: string[]) => {
      if (texts.some((t) => t.includes("FAIL"))) throw new Error("embedding service down");
      return texts.map((t) => [t.length, 1]);
    }),
  } satisfies Embedder;
}

function fakeIndex() {
  let next = 0;
  return {
    query: vi.fn(async () => []),
    upsert: vi.fn(async (texts: string[], _vectors: number[][], _metadatas?: Attributes[]) =>
      texts.map(() => `id-${next++}`)
    ),
    delete: vi.fn(async (ids: string[]) => ids.length),
    stats: vi.fn(async () => ({ documentCount: next })),
  } satisfies VectorIndex;
}

describe("ingestDocuments", () => {
  it("segments, embeds and stores each document", async () => {
    const embedder = fakeEmbedder();
    const index = fakeIndex();
    const segmenter = new Segmenter({ unitSize: 12, overlap: 0, strategy: "sentence" });

    const reports = await ingestDocuments({
      documents: [{ path: "a.md", content: "Alpha one. Beta two.", attributes: { filename: "a.md" } }],
      segmenter,
      embedder,
      index,
    });

    expect(reports).toEqual([{ path: "a.md", ok: true, unitCount: 2, ids: ["id-0", "id-1"] }]);
    expect(embedder.embedMany).toHaveBeenCalledWith(["Alpha one.", "Beta two."]);
    expect(index.upsert).toHaveBeenCalledWith(
      ["Alpha one.", "Beta two."],
      [
        [10, 1],
        [9, 1],
      ],
      [
        { filename: "a.md", sequenceIndex: 0 },
        { filename: "a.md", sequenceIndex: 1 },
      ]
    );
  });

  it("isolates a failing document from the rest of the batch", async () => {
    const index = fakeIndex();
    const reports = await ingestDocuments({
      documents: [
        { path: "bad.txt", content: "This will FAIL.", attributes: {} },
        { path: "empty.txt", content: "   ", attributes: {} },
        { path: "good.txt", content: "Fine.", attributes: {} },
      ],
      segmenter: new Segmenter({ unitSize: 100, overlap: 10 }),
      embedder: fakeEmbedder(),
      index,
    });

    expect(reports).toHaveLength(3);
    const bad = reports[0];
    expect(bad).toMatchObject({ path: "bad.txt", ok: false });
    expect(bad && !bad.ok ? bad.error.message : null).toBe("embedding service down");
    expect(reports[1]).toEqual({ path: "empty.txt", ok: true, unitCount: 0, ids: [] });
    expect(reports[2]).toEqual({ path: "good.txt", ok: true, unitCount: 1, ids: ["id-0"] });
    expect(index.upsert).toHaveBeenCalledTimes(1);
  });

  it("rejects an embedder that returns the wrong number of vectors", async () => {
    const embedder = fakeEmbedder();
    embedder.embedMany.mockResolvedValueOnce([[1, 1]]);

    const [report] = await ingestDocuments({
      documents: [{ path: "a.md", content: "One. Two.", attributes: {} }],
      segmenter: new Segmenter({ unitSize: 5, overlap: 0, strategy: "sentence" }),
      embedder,
      index: fakeIndex(),
    });

    expect(report).toMatchObject({ ok: false });
    expect(report && !report.ok ? report.error.message : null).toBe(
      "Embedding count mismatch: got 1, expected 2"
    );
  });
});
