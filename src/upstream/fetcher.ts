import type { RecordInput } from "../core/types.js";

export interface FetchOptions {
  /** Aborted when the refresh cycle gives up on this fetch. */
  signal?: AbortSignal;
}

/**
 * Source of the full current record set.
 * Resolves with every record or rejects; a partial set is never returned.
 */
export interface UpstreamFetcher {
  fetchAll(options?: FetchOptions): Promise<RecordInput[]>;
}
