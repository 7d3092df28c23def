import "dotenv/config";
import { loadConfig, setLogLevel } from "@kb/core";
import { Segmenter, ingestDocuments, loadDocuments } from "@kb/ingestion";
import { OllamaEmbedder } from "@kb/embeddings";
import { SqliteVectorIndex } from "@kb/vectorstore";
import { ensureDir, getArg, getArgNumber, hasFlag } from "./cli.js";

const config = loadConfig();
setLogLevel(config.logLevel);

const rootPath = getArg("dir");
const dbPath = getArg("db") ?? config.store.dbPath;
const collection = getArg("collection") ?? config.store.collection;
const strategy = getArg("strategy") ?? config.segmentation.strategy;
const unitSize = getArgNumber("unitSize", config.segmentation.unitSize);
const overlap = getArgNumber("overlap", config.segmentation.overlap);
const clear = hasFlag("clear");

if (!rootPath) {
  console.error(
    "Usage: npm run ingest -- --dir <path> [--collection <id>] [--db <sqlitePath>] [--strategy character|sentence|paragraph] [--unitSize 500] [--overlap 50] [--clear]"
  );
  process.exit(1);
}

console.log("[ingest] start", { rootPath, collection, dbPath, strategy, unitSize, overlap, clear });

const documents = await loadDocuments({ rootPath });
console.log("[ingest] loaded", { documents: documents.length });

const segmenter = new Segmenter({ unitSize, overlap, strategy });
const embedder = new OllamaEmbedder({
  model: config.ollama.embeddingModel,
  baseUrl: config.ollama.baseUrl,
});

ensureDir(dbPath);
const index = new SqliteVectorIndex({ dbPath, collection });
index.init();

if (clear) {
  console.log("[ingest] cleared", { collection, removedUnits: await index.clear() });
}

const reports = await ingestDocuments({ documents, segmenter, embedder, index });

let stored = 0;
for (const r of reports) {
  if (r.ok) {
    stored += r.unitCount;
  } else {
    console.error(`[ingest] failed: ${r.path}: ${r.error.message}`);
  }
}

console.log("[ingest] done", {
  documents: reports.length,
  failed: reports.filter((r) => !r.ok).length,
  storedUnits: stored,
  index: await index.stats(),
});

index.close();
