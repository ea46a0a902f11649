import { pino } from "pino";

import type { RecordInput } from "../core/types.js";
import type { FetchOptions, UpstreamFetcher } from "../upstream/fetcher.js";

export const silentLogger = pino({ level: "silent" });

export const exampleRecords: RecordInput[] = [
  { id: "1", text: "hello world" },
  { id: "2", text: "hello there" },
  { id: "3", text: "goodbye world" },
];

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(err: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Fetcher that replays queued results, one per call. */
export class ScriptedFetcher implements UpstreamFetcher {
  readonly calls: Array<FetchOptions | undefined> = [];
  private readonly script: Array<() => Promise<RecordInput[]>> = [];

  thenReturn(records: RecordInput[]): this {
    this.script.push(async () => records);
    return this;
  }

  thenFail(err: Error): this {
    this.script.push(async () => {
      throw err;
    });
    return this;
  }

  thenRun(fn: (options?: FetchOptions) => Promise<RecordInput[]>): this {
    const calls = this.calls;
    this.script.push(() => fn(calls[calls.length - 1]));
    return this;
  }

  fetchAll(options?: FetchOptions): Promise<RecordInput[]> {
    this.calls.push(options);
    const next = this.script.shift();
    if (!next) return Promise.reject(new Error("no scripted response left"));
    return next();
  }
}

/** Resolves after `n` microtask hops. */
export async function hops(n: number): Promise<void> {
  for (let i = 0; i < n; i++) await Promise.resolve();
}

/** A fetch that never settles on its own and rejects with the abort reason. */
export function hangUntilAborted(options?: FetchOptions): Promise<RecordInput[]> {
  return new Promise<RecordInput[]>((_, reject) => {
    const signal = options?.signal;
    if (!signal) return;
    signal.addEventListener("abort", () => reject(signal.reason));
  });
}
