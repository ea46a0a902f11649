import type { IndexSnapshot } from "./invertedIndex.js";

/**
 * Holds the one active snapshot.
 *
 * Publishing is a single reference assignment. Readers call `current()` once per
 * request and keep using what they got, so a publish in the middle of a request
 * never mixes generations.
 */
export class SnapshotStore {
  private active: IndexSnapshot | undefined;

  constructor(initial?: IndexSnapshot) {
    this.active = initial;
  }

  current(): IndexSnapshot | undefined {
    return this.active;
  }

  /** Swaps in `next` and returns the snapshot it replaced. */
  publish(next: IndexSnapshot): IndexSnapshot | undefined {
    const previous = this.active;
    this.active = next;
    return previous;
  }

  isReady(): boolean {
    return this.active !== undefined;
  }
}
