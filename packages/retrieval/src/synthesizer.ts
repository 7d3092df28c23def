import { createLogger, type Attributes, type RankedList } from "@kb/core";

const log = createLogger("synthesizer");

const SOURCE_PREVIEW_CHARS = 200;
const FALLBACK_CONTEXT_CHARS = 500;
const FALLBACK_MAX_SOURCES = 3;

export type SourceReference = {
  content: string;
  attributes: Attributes;
  relevance: number;
};

export type Synthesis = {
  answer: string;
  sources: SourceReference[];
  model: string;
};

export interface Synthesizer {
  synthesize(query: string, candidates: RankedList): Promise<Synthesis>;
}

export interface StreamingSynthesizer extends Synthesizer {
  synthesizeStream(query: string, candidates: RankedList): AsyncGenerator<string>;
}

const NO_CONTEXT_ANSWER = "I don't have enough information to answer this question.";
const STREAM_ERROR_ANSWER = "Error generating response.";

type GenerateChunk = { response?: string; done?: boolean };

const SYSTEM_PROMPT = [
  "You are a knowledge base assistant.",
  "Answer ONLY using the provided context.",
  "If the context does not contain the answer, say so.",
  "Always cite sources using [S1], [S2], etc.",
].join(" ");

function formatSource(attributes: Readonly<Attributes>): string {
  const name = attributes.filename ?? attributes.filePath;
  return typeof name === "string" && name ? name : "Unknown";
}

export function buildContext(candidates: RankedList): string {
  return candidates
    .map(
      (c, i) =>
        `### [S${i + 1}] ${formatSource(c.attributes)}\nRelevance: ${c.relevance.toFixed(4)}\n\n${c.content}\n`
    )
    .join("\n");
}

export function formatSources(candidates: RankedList): SourceReference[] {
  return candidates.map((c) => ({
    content: `${c.content.slice(0, SOURCE_PREVIEW_CHARS)}...`,
    attributes: { ...c.attributes },
    relevance: c.relevance,
  }));
}

/** Answer assembled from the top candidates when no model output is available. */
export function fallbackSynthesis(candidates: RankedList): Synthesis {
  const answer =
    candidates.length === 0
      ? "No relevant documents found to answer this question."
      : "Based on the retrieved documents:\n\n" +
        candidates
          .slice(0, FALLBACK_MAX_SOURCES)
          .map((c) => c.content.slice(0, FALLBACK_CONTEXT_CHARS))
          .join("\n\n");

  return { answer, sources: formatSources(candidates), model: "fallback" };
}

function buildPrompt(query: string, candidates: RankedList): string {
  return [
    `Question:\n${query}\n`,
    `Context:\n${buildContext(candidates)}\n`,
    "Write a helpful, concise answer. Include citations like [S1].",
  ].join("\n");
}

export class OllamaSynthesizer implements StreamingSynthesizer {
  readonly model: string;
  readonly baseUrl: string;
  readonly temperature: number;

  constructor(opts: { model?: string; baseUrl?: string; temperature?: number } = {}) {
    this.model = opts.model ?? "llama3.1:8b";
    this.baseUrl = (opts.baseUrl ?? process.env.OLLAMA_BASE_URL ?? "http://localhost:11434").replace(/\/+$/, "");
    this.temperature = opts.temperature ?? 0.2;
  }

  async synthesize(query: string, candidates: RankedList): Promise<Synthesis> {
    if (candidates.length === 0) {
      return { answer: NO_CONTEXT_ANSWER, sources: [], model: this.model };
    }

    try {
      const answer = await this.generate(buildPrompt(query, candidates));
      return { answer: answer.trim(), sources: formatSources(candidates), model: this.model };
    } catch (e) {
      log.error({ err: e, model: this.model }, "generation failed, using fallback answer");
      return fallbackSynthesis(candidates);
    }
  }

  /**
   * Yields the answer piece by piece as Ollama produces it. A failure part-way
   * through is logged and ends the stream with a short error line.
   */
  async *synthesizeStream(query: string, candidates: RankedList): AsyncGenerator<string> {
    if (candidates.length === 0) {
      yield NO_CONTEXT_ANSWER;
      return;
    }

    try {
      const res = await this.request(buildPrompt(query, candidates), true);
      if (!res.body) throw new Error("Ollama streaming response has no body.");

      const reader = res.body.getReader();
      const decoder = new TextDecoder();
      let buffered = "";
      for (;;) {
        const { done, value } = await reader.read();
        buffered += done ? decoder.decode() : decoder.decode(value, { stream: true });

        const lines = buffered.split("\n");
        buffered = done ? "" : (lines.pop() ?? "");
        for (const line of lines) {
          if (!line.trim()) continue;
          const chunk = JSON.parse(line) as GenerateChunk;
          if (chunk.response) yield chunk.response;
          if (chunk.done) return;
        }
        if (done) return;
      }
    } catch (e) {
      log.error({ err: e, model: this.model }, "streaming generation failed");
      yield STREAM_ERROR_ANSWER;
    }
  }

  private async request(prompt: string, stream: boolean): Promise<Response> {
    const res = await fetch(`${this.baseUrl}/api/generate`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({
        model: this.model,
        system: SYSTEM_PROMPT,
        prompt,
        stream,
        options: { temperature: this.temperature },
      }),
    });

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new Error(`Ollama error: ${res.status} ${res.statusText}\n${text}`);
    }
    return res;
  }

  private async generate(prompt: string): Promise<string> {
    const res = await this.request(prompt, false);
    const data = (await res.json()) as { response?: string } | null;
    return data?.response ?? "";
  }
}
