import "dotenv/config";
import { loadConfig, setLogLevel } from "@kb/core";
import { OllamaEmbedder } from "@kb/embeddings";
import { SqliteVectorIndex } from "@kb/vectorstore";
import { OllamaSynthesizer, Ranker, Retriever, buildContext, formatSources } from "@kb/retrieval";
import { getArg, getArgNumber, hasFlag } from "./cli.js";

const config = loadConfig();
setLogLevel(config.logLevel);

const q = getArg("q");
const dbPath = getArg("db") ?? config.store.dbPath;
const collection = getArg("collection") ?? config.store.collection;
const topK = getArgNumber("topK", config.ranking.topK);
const threshold = getArgNumber("minSim", config.ranking.threshold);
const model = getArg("model") ?? config.ollama.llmModel;
const debug = hasFlag("debug");
const stream = hasFlag("stream");

// --mmr is shorthand for --strategy mmr
const strategy = hasFlag("mmr") ? "mmr" : (getArg("strategy") ?? config.ranking.strategy);
const lambda = getArgNumber("mmrLambda", config.ranking.lambda);

if (!q) {
  console.error(`Usage:
npm run ask -- --q "..." \\
  [--collection <id>] \\
  [--db .data/vectorstore.sqlite] \\
  [--topK 5] \\
  [--minSim 0.55] \\
  [--strategy similarity|diversity|mmr] \\
  [--mmr] \\
  [--mmrLambda 0.5] \\
  [--model llama3.1:8b] \\
  [--stream] \\
  [--debug]`);
  process.exit(1);
}

console.log("[ask] start", { collection, dbPath, topK, threshold, strategy, lambda, model });

const index = new SqliteVectorIndex({ dbPath, collection });
index.init();

const retriever = new Retriever({
  embedder: new OllamaEmbedder({ model: config.ollama.embeddingModel, baseUrl: config.ollama.baseUrl }),
  index,
  ranker: new Ranker({ strategy, lambda }),
  topK,
  threshold,
});

console.log("[ask] retrieving...");
const selected = await retriever.retrieve(q);
console.log("[ask] retrieved", selected.length, "units");

if (debug) {
  console.log("\n=== CONTEXT (debug) ===\n");
  console.log(buildContext(selected));
}

console.log("[ask] generating with ollama...");
const synthesizer = new OllamaSynthesizer({
  model,
  baseUrl: config.ollama.baseUrl,
  temperature: config.ollama.temperature,
});

console.log("\n=== ANSWER ===\n");
let sources = formatSources(selected);
let usedModel = model;
if (stream) {
  for await (const piece of synthesizer.synthesizeStream(q, selected)) process.stdout.write(piece);
  process.stdout.write("\n");
} else {
  const result = await synthesizer.synthesize(q, selected);
  console.log(result.answer);
  sources = result.sources;
  usedModel = result.model;
}

console.log("\n=== SOURCES USED ===\n");
sources.forEach((s, i) => {
  console.log(`[S${i + 1}] ${String(s.attributes.filePath ?? "unknown")} (relevance=${s.relevance.toFixed(4)})`);
});

console.log(`\n[ask] done (model=${usedModel})`);
index.close();
