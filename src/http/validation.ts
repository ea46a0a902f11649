import type { FieldError } from "./problem.js";

/** First non-null value among the given query-string aliases. */
export function firstParam(params: URLSearchParams, ...names: string[]): { name: string; value: string } | undefined {
  for (const name of names) {
    const value = params.get(name);
    if (value !== null) return { name, value };
  }
  return undefined;
}

/** Parses a base-10 integer, rejecting anything with trailing junk ("2abc", "1.5"). */
export function parseIntParam(v: string): number | undefined {
  const trimmed = v.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return undefined;
  const n = Number(trimmed);
  return Number.isSafeInteger(n) ? n : undefined;
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}
