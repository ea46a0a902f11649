import type { SearchHit, Term } from "./types.js";
import type { IndexSnapshot } from "./invertedIndex.js";

export type RankerName = "match-count" | "idf";

/**
 * Scores every record that contains at least one query term (OR semantics).
 *
 * Returned hits are unordered; ordering and tie-breaks belong to the query engine.
 * `queryTerms` may contain duplicates; implementations count each distinct term once.
 */
export interface Ranker {
  readonly name: RankerName;
  rank(queryTerms: readonly Term[], snapshot: IndexSnapshot): SearchHit[];
}
