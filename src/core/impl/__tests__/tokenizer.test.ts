import { describe, expect, it } from "vitest";
import { SimpleTokenizer, distinctTerms } from "../simpleTokenizer.js";

const terms = (text: string) => Array.from(new SimpleTokenizer().tokenize(text), (t) => t.term);

describe("SimpleTokenizer", () => {
  it("lowercases and splits on non-alphanumerics", () => {
    expect(terms("Hello, World! It's 2024")).toEqual(["hello", "world", "it", "s", "2024"]);
  });

  it("yields nothing for blank or punctuation-only input", () => {
    expect(terms("")).toEqual([]);
    expect(terms("   \t\n")).toEqual([]);
    expect(terms("?!... --")).toEqual([]);
  });

  it("treats non-ascii letters as separators", () => {
    expect(terms("naïve café")).toEqual(["na", "ve", "caf"]);
  });

  it("reports token positions and offsets", () => {
    const toks = Array.from(new SimpleTokenizer().tokenize("  foo--BAR"));
    expect(toks).toEqual([
      { term: "foo", position: 0, startOffset: 2, endOffset: 5 },
      { term: "bar", position: 1, startOffset: 7, endOffset: 10 },
    ]);
  });

  it("is deterministic", () => {
    const text = "Dinner for 2 at Nobu, Friday 8pm";
    expect(terms(text)).toEqual(terms(text));
  });
});

describe("distinctTerms", () => {
  it("dedupes in first-occurrence order", () => {
    expect(distinctTerms(new SimpleTokenizer(), "b a B c a")).toEqual(["b", "a", "c"]);
  });
});
