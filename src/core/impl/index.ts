export { SimpleTokenizer, distinctTerms } from "./simpleTokenizer.js";
export { MemoryIndexSnapshot, foldIdentifier, type SnapshotTables } from "./memoryIndexSnapshot.js";
export { MemorySnapshotBuilder, searchableText } from "./snapshotBuilder.js";
export { MatchCountRanker } from "./matchCountRanker.js";
export { IdfRanker, idf } from "./idfRanker.js";
export { MinHeapTopKSelector } from "./minHeapTopK.js";
export { MemoryQueryEngine, type QueryEngineDeps } from "./memoryQueryEngine.js";
