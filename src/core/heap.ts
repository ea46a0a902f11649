/** Orders like Array.sort: negative means `a` ranks before `b`. */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Bounded selection of the best K items.
 * The query engine only needs the first `page * pageSize` ranked hits, so it
 * never sorts the whole candidate set.
 */
export interface TopKSelector<T> {
  /** Returns at most `k` items, sorted by `comparator`. */
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[];
}
