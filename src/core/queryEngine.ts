import type { MessageRecord } from "./types.js";
import type { IndexSnapshot } from "./invertedIndex.js";
import { InvalidArgumentError } from "./errors.js";

export type TieBreak = "id" | "upstream";

export interface SearchPage {
  items: MessageRecord[];
  /** distinct matching records before slicing */
  total: number;
  page: number;
  /** effective page size, after clamping */
  pageSize: number;
  /** generation of the snapshot that answered */
  generation: number;
}

export interface Pagination {
  page: number;
  pageSize: number;
}

/**
 * Answers paginated queries against one snapshot.
 *
 * Throws InvalidArgumentError for bad pagination; never does I/O.
 */
export interface QueryEngine {
  readonly maxPageSize: number;
  search(query: string, page: number, pageSize: number, snapshot: IndexSnapshot): SearchPage;
}

/**
 * Validates paging input and clamps `pageSize` to `maxPageSize`.
 * Shared by the engine and by callers that must validate before a snapshot exists.
 */
export function normalizePagination(page: number, pageSize: number, maxPageSize: number): Pagination {
  if (!Number.isInteger(page) || page < 1) {
    throw new InvalidArgumentError("page", "must be an integer >= 1");
  }
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new InvalidArgumentError("pageSize", "must be an integer >= 1");
  }
  return { page, pageSize: Math.min(pageSize, maxPageSize) };
}
