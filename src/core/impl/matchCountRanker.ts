import type { DocId, SearchHit, Term } from "../types.js";
import type { IndexSnapshot } from "../invertedIndex.js";
import type { Ranker } from "../ranker.js";

/** Score = number of distinct query terms the record contains. */
export class MatchCountRanker implements Ranker {
  readonly name = "match-count";

  rank(queryTerms: readonly Term[], snapshot: IndexSnapshot): SearchHit[] {
    const scores = new Map<DocId, number>();

    for (const term of new Set(queryTerms)) {
      const pl = snapshot.getPostings(term);
      if (!pl) continue;
      for (const docId of pl.docIds) {
        scores.set(docId, (scores.get(docId) ?? 0) + 1);
      }
    }

    return Array.from(scores, ([docId, score]) => ({ docId, score }));
  }
}
