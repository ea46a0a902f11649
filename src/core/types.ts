/** Shared core types used by module contracts. */

export type DocId = string;
export type Term = string;

/** A token produced by a tokenizer. */
export interface Token {
  term: Term;
  /** 0-based position within the source text (token index, not byte offset). */
  position: number;
  startOffset: number;
  endOffset: number;
}

export interface RecordMetadata {
  /** Upstream timestamp, passed through untouched. */
  timestamp?: string;
  /** Display name of the author; indexed alongside the text. */
  author?: string;
  /** Upstream user identifier, matched exactly by identifier queries. */
  authorId?: string;
}

/** A message as it sits in an index snapshot. */
export interface MessageRecord {
  id: DocId;
  text: string;
  metadata?: RecordMetadata;
}

/** A message as handed to the builder; the id may be missing upstream. */
export interface RecordInput {
  id?: DocId;
  text: string;
  metadata?: RecordMetadata;
}

export interface SearchHit {
  docId: DocId;
  score: number;
}
