import type { DocId, MessageRecord, Term } from "../types.js";
import type { IndexSnapshot, IndexStats, PostingsList } from "../invertedIndex.js";

export interface SnapshotTables {
  /** id -> record, in upstream order */
  records: Map<DocId, MessageRecord>;
  /** term -> ids in upstream order */
  postings: Map<Term, DocId[]>;
  /** case-folded record id or author id -> ids in upstream order */
  identifiers: Map<string, DocId[]>;
}

export function foldIdentifier(value: string): string {
  return value.toLowerCase();
}

const NO_IDS: readonly DocId[] = Object.freeze([]);

/**
 * In-memory snapshot.
 *
 * Data structure:
 * - id -> frozen record (+ ordinal for upstream-order tie breaks)
 * - term -> frozen array of ids
 *
 * Takes ownership of the tables passed in; the builder must not touch them afterwards.
 */
export class MemoryIndexSnapshot implements IndexSnapshot {
  private readonly recordTable: ReadonlyMap<DocId, MessageRecord>;
  private readonly ordinals = new Map<DocId, number>();
  private readonly postings: ReadonlyMap<Term, PostingsList>;
  private readonly identifiers: ReadonlyMap<string, readonly DocId[]>;

  constructor(
    tables: SnapshotTables,
    readonly generation: number,
    readonly builtAt: number,
  ) {
    let ordinal = 0;
    for (const [docId, record] of tables.records) {
      Object.freeze(record.metadata);
      Object.freeze(record);
      this.ordinals.set(docId, ordinal++);
    }
    this.recordTable = tables.records;

    const postings = new Map<Term, PostingsList>();
    for (const [term, docIds] of tables.postings) {
      postings.set(term, Object.freeze({ term, df: docIds.length, docIds: Object.freeze(docIds) }));
    }
    this.postings = postings;

    for (const ids of tables.identifiers.values()) Object.freeze(ids);
    this.identifiers = tables.identifiers;
  }

  getRecord(docId: DocId): MessageRecord | undefined {
    return this.recordTable.get(docId);
  }

  ordinalOf(docId: DocId): number | undefined {
    return this.ordinals.get(docId);
  }

  matchIdentifier(value: string): readonly DocId[] {
    return this.identifiers.get(foldIdentifier(value)) ?? NO_IDS;
  }

  records(): IterableIterator<MessageRecord> {
    return this.recordTable.values();
  }

  getPostings(term: Term): PostingsList | undefined {
    return this.postings.get(term);
  }

  hasTerm(term: Term): boolean {
    return this.postings.has(term);
  }

  terms(): IterableIterator<Term> {
    return this.postings.keys();
  }

  getStats(): IndexStats {
    return { docCount: this.recordTable.size, termCount: this.postings.size };
  }
}
