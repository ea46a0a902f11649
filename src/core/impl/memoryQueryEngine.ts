import type { MessageRecord, SearchHit, Term } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { IndexSnapshot } from "../invertedIndex.js";
import type { Ranker } from "../ranker.js";
import type { Comparator, TopKSelector } from "../heap.js";
import { normalizePagination, type QueryEngine, type SearchPage, type TieBreak } from "../queryEngine.js";

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface QueryEngineDeps {
  tokenizer: Tokenizer;
  ranker: Ranker;
  topK: TopKSelector<SearchHit>;
  maxPageSize: number;
  tieBreak?: TieBreak;
}

function byId(a: SearchHit, b: SearchHit): number {
  return a.docId < b.docId ? -1 : a.docId > b.docId ? 1 : 0;
}

export class MemoryQueryEngine implements QueryEngine {
  readonly maxPageSize: number;
  private readonly tieBreak: TieBreak;

  constructor(private readonly deps: QueryEngineDeps) {
    this.maxPageSize = deps.maxPageSize;
    this.tieBreak = deps.tieBreak ?? "id";
  }

  search(rawQuery: string, page: number, pageSize: number, snapshot: IndexSnapshot): SearchPage {
    const paging = normalizePagination(page, pageSize, this.maxPageSize);
    const hits = this.collectHits(rawQuery, snapshot);

    const start = (paging.page - 1) * paging.pageSize;
    const end = start + paging.pageSize;

    // past the last page: nothing to rank, total still reported
    const window = start < hits.length ? this.deps.topK.topK(hits, end, this.comparator(snapshot)) : [];

    const items: MessageRecord[] = [];
    for (const hit of window.slice(start)) {
      const record = snapshot.getRecord(hit.docId);
      if (record) items.push(record);
    }

    return {
      items,
      total: hits.length,
      page: paging.page,
      pageSize: paging.pageSize,
      generation: snapshot.generation,
    };
  }

  private collectHits(rawQuery: string, snapshot: IndexSnapshot): SearchHit[] {
    const trimmed = rawQuery.trim();
    if (UUID_RE.test(trimmed)) return exactIdHits(trimmed, snapshot);

    const queryTerms: Term[] = [];
    for (const tok of this.deps.tokenizer.tokenize(rawQuery)) queryTerms.push(tok.term);

    // blank or punctuation-only query matches nothing
    if (queryTerms.length === 0) return [];

    return this.deps.ranker.rank(queryTerms, snapshot);
  }

  private comparator(snapshot: IndexSnapshot): Comparator<SearchHit> {
    if (this.tieBreak === "id") return (a, b) => b.score - a.score || byId(a, b);

    return (a, b) =>
      b.score - a.score ||
      (snapshot.ordinalOf(a.docId) ?? Number.MAX_SAFE_INTEGER) - (snapshot.ordinalOf(b.docId) ?? Number.MAX_SAFE_INTEGER) ||
      byId(a, b);
  }
}

/**
 * Identifier queries match the record id or the author id exactly; tokenizing a
 * UUID would otherwise match unrelated records through its hex groups.
 */
function exactIdHits(query: string, snapshot: IndexSnapshot): SearchHit[] {
  return snapshot.matchIdentifier(query).map((docId) => ({ docId, score: 1 }));
}
