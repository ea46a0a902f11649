import type { DocId, MessageRecord, RecordInput, Term } from "./types.js";

export interface PostingsList {
  term: Term;
  /** number of records containing the term */
  df: number;
  /** record ids in upstream order */
  docIds: readonly DocId[];
}

export interface IndexStats {
  docCount: number;
  termCount: number;
}

/**
 * One immutable generation of the index: record table + postings, built together.
 *
 * Contract notes:
 * - never mutated after construction, so any number of readers may share it
 * - every id in a postings list exists in the record table of the same snapshot
 */
export interface IndexSnapshot {
  readonly generation: number;
  /** epoch millis */
  readonly builtAt: number;

  getRecord(docId: DocId): MessageRecord | undefined;
  /** Position of the record in the upstream sequence (first occurrence). */
  ordinalOf(docId: DocId): number | undefined;
  /** Records whose id or author id equals `value`, ignoring case, in upstream order. */
  matchIdentifier(value: string): readonly DocId[];
  records(): IterableIterator<MessageRecord>;

  getPostings(term: Term): PostingsList | undefined;
  hasTerm(term: Term): boolean;
  terms(): IterableIterator<Term>;

  getStats(): IndexStats;
}

export interface BuildOptions {
  generation?: number;
  /** epoch millis, defaults to now */
  builtAt?: number;
}

export interface SnapshotBuilder {
  build(records: Iterable<RecordInput>, options?: BuildOptions): IndexSnapshot;
}
