import type { Token } from "./types.js";

/**
 * Turns text into a stream of normalized tokens.
 *
 * Contract notes:
 * - must be deterministic and free of state
 * - the same instance is shared by indexing and query parsing; results are
 *   only consistent when both sides tokenize identically
 */
export interface Tokenizer {
  tokenize(text: string): Iterable<Token>;
}
