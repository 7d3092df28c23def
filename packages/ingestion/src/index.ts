export * from "./segmenter.js";
export * from "./splitters.js";
export * from "./documentLoader.js";
export * from "./ingestDocuments.js";
export { DEFAULT_IGNORE_DIRS, DEFAULT_IGNORE_FILES, SUPPORTED_EXTENSIONS } from "./ignore.js";
