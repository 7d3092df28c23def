export { SqliteVectorIndex, cosineSimilarity } from "./sqliteStore.js";
