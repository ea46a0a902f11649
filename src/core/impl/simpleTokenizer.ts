import type { Token } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";

function isAlphaNum(code: number): boolean {
  return (code >= 48 && code <= 57) || (code >= 97 && code <= 122);
}

/**
 * ASCII tokenizer:
 * - lowercases the whole input first
 * - splits on anything outside [a-z0-9]
 * - drops empty tokens, keeps duplicates (callers dedupe when they need presence)
 * - yields token positions (token index) and offsets into the lowercased text
 */
export class SimpleTokenizer implements Tokenizer {
  *tokenize(text: string): Iterable<Token> {
    const lowered = text.toLowerCase();
    const n = lowered.length;
    let i = 0;
    let position = 0;

    while (i < n) {
      while (i < n && !isAlphaNum(lowered.charCodeAt(i))) i++;
      if (i >= n) break;

      const start = i;
      while (i < n && isAlphaNum(lowered.charCodeAt(i))) i++;

      yield { term: lowered.slice(start, i), position, startOffset: start, endOffset: i };
      position++;
    }
  }
}

/** Distinct terms of `text`, in first-occurrence order. */
export function distinctTerms(tokenizer: Tokenizer, text: string): string[] {
  const seen = new Set<string>();
  for (const tok of tokenizer.tokenize(text)) seen.add(tok.term);
  return Array.from(seen);
}
