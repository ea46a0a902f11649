export type * from "./types.js";
export type { Tokenizer } from "./tokenizer.js";
export type { BuildOptions, IndexSnapshot, IndexStats, PostingsList, SnapshotBuilder } from "./invertedIndex.js";
export type { Ranker, RankerName } from "./ranker.js";
export type { Comparator, TopKSelector } from "./heap.js";
export { normalizePagination, type Pagination, type QueryEngine, type SearchPage, type TieBreak } from "./queryEngine.js";
export { SnapshotStore } from "./snapshotStore.js";
export { Refresher, type RefreshOutcome, type RefreshState, type RefreshStatus, type RefresherOptions } from "./refresher.js";
export * from "./errors.js";
export * from "./impl/index.js";
