export * from "./ranker.js";
export * from "./retriever.js";
export * from "./synthesizer.js";
