import "dotenv/config";
import { loadConfig, setLogLevel, type MetadataFilter } from "@kb/core";
import { OllamaEmbedder } from "@kb/embeddings";
import { SqliteVectorIndex } from "@kb/vectorstore";
import { Ranker, Retriever } from "@kb/retrieval";
import { getArg, getArgNumber } from "./cli.js";

const config = loadConfig();
setLogLevel(config.logLevel);

const q = getArg("q");
const dbPath = getArg("db") ?? config.store.dbPath;
const collection = getArg("collection") ?? config.store.collection;
const topK = getArgNumber("topK", config.ranking.topK);
const threshold = getArgNumber("threshold", config.ranking.threshold);
const strategy = getArg("strategy") ?? config.ranking.strategy;
const lambda = getArgNumber("lambda", config.ranking.lambda);
const fileType = getArg("fileType");

if (!q) {
  console.error(
    "Usage: npm run query -- --q <question> [--collection <id>] [--topK 5] [--threshold 0.5] [--strategy similarity|diversity|mmr] [--lambda 0.5] [--db <sqlitePath>] [--fileType md|txt]"
  );
  process.exit(1);
}

console.log("[query] start", { collection, dbPath, topK, threshold, strategy });

const index = new SqliteVectorIndex({ dbPath, collection });
index.init();

const retriever = new Retriever({
  embedder: new OllamaEmbedder({ model: config.ollama.embeddingModel, baseUrl: config.ollama.baseUrl }),
  index,
  ranker: new Ranker({ strategy, lambda }),
  topK,
  threshold,
});

const filter: MetadataFilter | undefined = fileType ? { fileType } : undefined;
const results = await retriever.retrieve(q, { filter });

console.log("[query] results:", results.length);

for (const r of results) {
  const md = r.attributes;

  console.log("—".repeat(80));
  console.log(`relevance: ${r.relevance.toFixed(4)}`);
  console.log(`source: ${String(md.filePath ?? "unknown")}  #${String(md.sequenceIndex ?? "?")}`);
  console.log("");
  console.log(r.content.slice(0, 600));
  if (r.content.length > 600) console.log("…");
}

console.log("—".repeat(80));
index.close();
