import type { DocId, SearchHit, Term } from "../types.js";
import type { IndexSnapshot } from "../invertedIndex.js";
import type { Ranker } from "../ranker.js";

export function idf(docCount: number, df: number, smoothing: number): number {
  // classic smooth: log((N + s) / (df + s)) + 1
  return Math.log((docCount + smoothing) / (df + smoothing)) + 1;
}

/**
 * Presence-only IDF ranker:
 * - a record scores the sum of idf over the distinct query terms it contains
 * - rare terms weigh more than common ones; term frequency is not tracked
 */
export class IdfRanker implements Ranker {
  readonly name = "idf";

  constructor(private readonly smoothing = 1) {}

  rank(queryTerms: readonly Term[], snapshot: IndexSnapshot): SearchHit[] {
    const docCount = snapshot.getStats().docCount;
    if (!docCount) return [];

    const scores = new Map<DocId, number>();
    for (const term of new Set(queryTerms)) {
      const pl = snapshot.getPostings(term);
      if (!pl || pl.df === 0) continue;
      const weight = idf(docCount, pl.df, this.smoothing);
      for (const docId of pl.docIds) {
        scores.set(docId, (scores.get(docId) ?? 0) + weight);
      }
    }

    return Array.from(scores, ([docId, score]) => ({ docId, score }));
  }
}
