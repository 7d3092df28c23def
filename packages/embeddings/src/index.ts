import { createLogger, type Embedder } from "@kb/core";
import { DEFAULT_OLLAMA_BASE_URL, ollamaEmbedOne } from "./ollama.js";

export { DEFAULT_OLLAMA_BASE_URL, ollamaEmbedOne } from "./ollama.js";

const DEFAULT_MODEL = "nomic-embed-text:latest";

const log = createLogger("embeddings");

export class OllamaEmbedder implements Embedder {
  readonly model: string;
  readonly baseUrl: string;

  constructor(opts: { model?: string; baseUrl?: string } = {}) {
    this.model = opts.model ?? DEFAULT_MODEL;
    this.baseUrl = (opts.baseUrl ?? process.env.OLLAMA_BASE_URL ?? DEFAULT_OLLAMA_BASE_URL).replace(/\/+$/, "");
  }

  async embed(text: string): Promise<number[]> {
    return ollamaEmbedOne({ baseUrl: this.baseUrl, model: this.model, text });
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const vectors: number[][] = [];
    for (const text of texts) {
      vectors.push(await this.embed(text));
    }

    const dim = vectors[0]?.length ?? 0;
    for (const v of vectors) {
      if (v.length !== dim) {
        throw new Error(
          `Inconsistent embedding dimension: expected ${dim}, got ${v.length}`
        );
      }
    }

    log.debug({ count: vectors.length, dim, model: this.model }, "embedded texts");
    return vectors;
  }
}
