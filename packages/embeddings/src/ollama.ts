export const DEFAULT_OLLAMA_BASE_URL = "http://localhost:11434";

export type EmbedRequest = {
  baseUrl: string;
  model: string;
  text: string;
};

function isVector(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((x) => typeof x === "number");
}

/** One POST to `/api/embeddings` per text; Ollama has no batch variant of this endpoint. */
export async function ollamaEmbedOne({ baseUrl, model, text }: EmbedRequest): Promise<number[]> {
  const res = await fetch(`${baseUrl}/api/embeddings`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify({ model: model.trim(), prompt: text }),
  });

  if (!res.ok) {
    const detail = await res.text().catch(() => "");
    throw new Error(`Ollama /api/embeddings returned ${res.status} ${res.statusText}: ${detail}`);
  }

  const data = (await res.json()) as { embedding?: unknown } | null;
  const embedding = data?.embedding;
  if (!isVector(embedding)) {
    throw new Error("Ollama /api/embeddings response has no numeric `embedding` array.");
  }
  return embedding;
}
