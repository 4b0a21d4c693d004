export { parseConfig, loadConfigFile } from "./config.js";
export { initLogger, log, type LoggerBackend } from "./logger.js";
export { ConfigurationError } from "./errors.js";
export { slug } from "./slug.js";
export { countTokens, type TokenCounter } from "./tokenizer.js";
export { OpenAiBackend, createLlmBackend, type LlmBackend, type StructuredRequest, type TextRequest } from "./llm.js";
export { buildChapterMap, chunkDocument, mergeShortLines } from "./rulebook/chunker.js";
export { loadRulebooks } from "./rulebook/loader.js";
export { HttpEmbedder, OpenAiEmbedder, createEmbedder, cosineSimilarity, type Embedder } from "./rulebook/embedder.js";
export { SqliteVectorStore, type VectorStore, type ChunkFilter, type VectorMatch } from "./rulebook/vector-store.js";
export { RulebookIndex, NOT_COVERED_ANSWER } from "./rulebook/index.js";
export { splitByTokens } from "./transcript/chunker.js";
export { DeltaExtractor } from "./transcript/extractor.js";
export { WorldState, renderLocationTree } from "./world/state.js";
export { applyDelta, applyDeltas, updateFaction, updateLocation, updateNpc, type MergeOutcome } from "./world/merge.js";
export { WorldStateStore, type WorldStateFile } from "./world/store.js";
export { WorldLedger } from "./world/ledger.js";
export { SessionProcessor, summaryFilePath, type SessionReport } from "./session.js";
export type * from "./types.js";
