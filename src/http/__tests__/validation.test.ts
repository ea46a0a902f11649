import { describe, expect, it } from "vitest";
import { firstParam, parseIntParam } from "../validation.js";

describe("firstParam", () => {
  it("returns the first alias present", () => {
    const params = new URLSearchParams("search_query=b&q=a");
    expect(firstParam(params, "q", "search_query")).toEqual({ name: "q", value: "a" });
    expect(firstParam(new URLSearchParams("search_query=b"), "q", "search_query")).toEqual({ name: "search_query", value: "b" });
  });

  it("keeps empty values and returns undefined when nothing matches", () => {
    expect(firstParam(new URLSearchParams("q="), "q")).toEqual({ name: "q", value: "" });
    expect(firstParam(new URLSearchParams("other=1"), "q")).toBeUndefined();
  });
});

describe("parseIntParam", () => {
  it("parses signed base-10 integers", () => {
    expect(parseIntParam("2")).toBe(2);
    expect(parseIntParam(" 10 ")).toBe(10);
    expect(parseIntParam("-1")).toBe(-1);
    expect(parseIntParam("+3")).toBe(3);
    expect(parseIntParam("0")).toBe(0);
  });

  it("rejects junk, fractions and unsafe integers", () => {
    expect(parseIntParam("2abc")).toBeUndefined();
    expect(parseIntParam("1.5")).toBeUndefined();
    expect(parseIntParam("")).toBeUndefined();
    expect(parseIntParam("0x10")).toBeUndefined();
    expect(parseIntParam("99999999999999999999")).toBeUndefined();
  });
});
