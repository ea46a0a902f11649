import { describe, expect, it } from "vitest";
import {
  IdfRanker,
  InvalidArgumentError,
  MatchCountRanker,
  MemoryQueryEngine,
  MemorySnapshotBuilder,
  MinHeapTopKSelector,
  SimpleTokenizer,
  type Ranker,
  type RecordInput,
  type SearchHit,
  type TieBreak,
} from "../../index.js";
import { exampleRecords } from "../../../__tests__/helpers.js";

function setup(records: RecordInput[], opts: { maxPageSize?: number; tieBreak?: TieBreak; ranker?: Ranker } = {}) {
  const tokenizer = new SimpleTokenizer();
  const snapshot = new MemorySnapshotBuilder(tokenizer).build(records, { generation: 1 });
  const engine = new MemoryQueryEngine({
    tokenizer,
    ranker: opts.ranker ?? new MatchCountRanker(),
    topK: new MinHeapTopKSelector<SearchHit>(),
    maxPageSize: opts.maxPageSize ?? 100,
    tieBreak: opts.tieBreak,
  });
  return {
    search: (q: string, page = 1, pageSize = 10) => engine.search(q, page, pageSize, snapshot),
    ids: (q: string, page = 1, pageSize = 10) => engine.search(q, page, pageSize, snapshot).items.map((r) => r.id),
  };
}

const UUID = "123e4567-e89b-12d3-a456-426614174000";

describe("MemoryQueryEngine", () => {
  it("answers the hello/world/xyz example", () => {
    const { search } = setup(exampleRecords);

    const hello = search("hello");
    expect(hello.items.map((r) => r.id)).toEqual(["1", "2"]);
    expect(hello.total).toBe(2);

    const world = search("world");
    expect(world.items.map((r) => r.id)).toEqual(["1", "3"]);
    expect(world.total).toBe(2);

    expect(search("xyz")).toEqual({ items: [], total: 0, page: 1, pageSize: 10, generation: 1 });
  });

  it("returns the indexed record for a single token it contains", () => {
    const { search } = setup([
      { id: "a", text: "Please book a flight to Paris" },
      { id: "b", text: "Reserve two seats at the opera" },
    ]);
    for (const token of ["please", "book", "flight", "paris", "reserve", "seats", "opera"]) {
      const res = search(token.toUpperCase());
      expect(res.total).toBe(1);
      expect(res.items[0]?.text.toLowerCase()).toContain(token);
    }
  });

  it("ranks by distinct matching tokens, OR semantics", () => {
    const { ids } = setup([
      { id: "a", text: "red apple" },
      { id: "b", text: "red green apple" },
      { id: "c", text: "green" },
      { id: "d", text: "blue" },
    ]);
    expect(ids("red green apple")).toEqual(["b", "a", "c"]);
  });

  it("does not let repeated query tokens inflate a score", () => {
    const { ids } = setup([
      { id: "x", text: "cat cat" },
      { id: "y", text: "cat dog" },
    ]);
    expect(ids("cat cat cat dog")).toEqual(["y", "x"]);
  });

  it("returns zero results for blank or punctuation-only queries", () => {
    const { search } = setup(exampleRecords);
    for (const q of ["", "   ", "?!", "--- ..."]) {
      const res = search(q);
      expect(res.items).toEqual([]);
      expect(res.total).toBe(0);
    }
  });

  it("paginates with a stable total", () => {
    const { search } = setup(["m1", "m2", "m3", "m4", "m5"].map((id) => ({ id, text: `msg ${id}` })));

    expect(search("msg", 1, 2).items.map((r) => r.id)).toEqual(["m1", "m2"]);
    expect(search("msg", 2, 2).items.map((r) => r.id)).toEqual(["m3", "m4"]);
    expect(search("msg", 3, 2).items.map((r) => r.id)).toEqual(["m5"]);

    const past = search("msg", 4, 2);
    expect(past.items).toEqual([]);
    for (const page of [1, 2, 3, 4, 50]) expect(search("msg", page, 2).total).toBe(5);
  });

  it("is deterministic across repeated calls", () => {
    const records = Array.from({ length: 30 }, (_, i) => ({ id: `r${i}`, text: i % 3 === 0 ? "alpha beta" : "alpha" }));
    const { ids } = setup(records);
    const first = ids("alpha beta", 2, 7);
    for (let i = 0; i < 5; i++) expect(ids("alpha beta", 2, 7)).toEqual(first);
  });

  it("clamps page size to the configured maximum", () => {
    const { search } = setup(["a", "b", "c", "d", "e"].map((id) => ({ id, text: "same" })), { maxPageSize: 3 });
    const res = search("same", 1, 50);
    expect(res.pageSize).toBe(3);
    expect(res.items.map((r) => r.id)).toEqual(["a", "b", "c"]);
    expect(res.total).toBe(5);
  });

  it("rejects page or pageSize below 1 and non-integers", () => {
    const { search } = setup(exampleRecords);
    expect(() => search("hello", 0, 10)).toThrow(InvalidArgumentError);
    expect(() => search("hello", 1, 0)).toThrow(InvalidArgumentError);
    expect(() => search("hello", 1.5, 10)).toThrow("page must be an integer >= 1");
    expect(() => search("hello", 1, -3)).toThrow("pageSize must be an integer >= 1");
  });

  it("breaks ties by id or by upstream order", () => {
    const records = [
      { id: "b", text: "tie" },
      { id: "a", text: "tie" },
      { id: "c", text: "tie" },
    ];
    expect(setup(records).ids("tie")).toEqual(["a", "b", "c"]);
    expect(setup(records, { tieBreak: "upstream" }).ids("tie")).toEqual(["b", "a", "c"]);
  });

  it("can rank with idf weights instead of raw match counts", () => {
    const records = [
      { id: "a", text: "common" },
      { id: "b", text: "rare" },
      { id: "c", text: "common" },
    ];
    expect(setup(records).ids("common rare")).toEqual(["a", "b", "c"]);
    expect(setup(records, { ranker: new IdfRanker() }).ids("common rare")).toEqual(["b", "a", "c"]);
  });

  it("matches identifier queries exactly on record id or author id", () => {
    const { search } = setup([
      { id: UUID, text: "hello" },
      { id: "m2", text: "unrelated", metadata: { authorId: UUID } },
      { id: "m3", text: "mentions 123e4567 and e89b" },
    ]);

    const res = search(UUID);
    expect(res.items.map((r) => r.id)).toEqual([UUID, "m2"]);
    expect(res.total).toBe(2);
    expect(search(` ${UUID.toUpperCase()} `).total).toBe(2);
  });

  it("matches identifiers stored in upper or mixed case", () => {
    const upper = UUID.toUpperCase();
    const { ids } = setup([
      { id: upper, text: "hello" },
      { id: "m2", text: "other", metadata: { authorId: "123E4567-e89b-12D3-a456-426614174000" } },
    ]);

    expect(ids(UUID)).toEqual([upper, "m2"]);
  });
});
