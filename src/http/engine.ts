import type { MessageRecord } from "../core/types.js";
import type { SnapshotStore } from "../core/snapshotStore.js";
import { normalizePagination, type QueryEngine } from "../core/queryEngine.js";
import type { RefreshStatus } from "../core/refresher.js";

export interface SearchQuery {
  query: string;
  page: number;
  pageSize: number;
}

export interface SearchResponse {
  total: number;
  page: number;
  pageSize: number;
  results: MessageRecord[];
  generation: number;
}

export type SearchResult = { ready: true; response: SearchResponse } | { ready: false };

export interface EngineStatus {
  ready: boolean;
  generation: number | null;
  indexedRecords: number;
  indexedTerms: number;
  /** epoch millis of the active snapshot */
  builtAt: number | null;
  refresh?: RefreshStatus;
}

/** What the HTTP layer needs from the search core. */
export interface Engine {
  readonly maxPageSize: number;
  /** Throws InvalidArgumentError for bad pagination, ready or not. */
  search(q: SearchQuery): SearchResult;
  status(): EngineStatus;
}

export interface EngineDeps {
  store: SnapshotStore;
  queryEngine: QueryEngine;
  refreshStatus?: () => RefreshStatus;
}

export function createEngine(deps: EngineDeps): Engine {
  const { store, queryEngine } = deps;

  return {
    maxPageSize: queryEngine.maxPageSize,
    search(q) {
      // captured once: the whole request runs against this snapshot
      const snapshot = store.current();
      if (!snapshot) {
        normalizePagination(q.page, q.pageSize, queryEngine.maxPageSize);
        return { ready: false };
      }

      const page = queryEngine.search(q.query, q.page, q.pageSize, snapshot);
      return {
        ready: true,
        response: {
          total: page.total,
          page: page.page,
          pageSize: page.pageSize,
          results: page.items,
          generation: page.generation,
        },
      };
    },
    status() {
      const snapshot = store.current();
      const stats = snapshot?.getStats();
      return {
        ready: snapshot !== undefined,
        generation: snapshot?.generation ?? null,
        indexedRecords: stats?.docCount ?? 0,
        indexedTerms: stats?.termCount ?? 0,
        builtAt: snapshot?.builtAt ?? null,
        refresh: deps.refreshStatus?.(),
      };
    },
  };
}
