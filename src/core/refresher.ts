import type { Logger } from "pino";

import type { RecordInput } from "./types.js";
import type { SnapshotBuilder } from "./invertedIndex.js";
import type { SnapshotStore } from "./snapshotStore.js";
import { SnapshotInvariantError, UpstreamUnavailableError, errorMessage } from "./errors.js";
import type { UpstreamFetcher } from "../upstream/fetcher.js";
import type { SearchMetrics } from "../metrics.js";

export type RefreshState = "idle" | "fetching" | "building" | "publishing" | "failed";

export type RefreshOutcome =
  | { status: "published"; generation: number; records: number; durationMs: number }
  | { status: "failed"; error: Error; durationMs: number }
  | { status: "skipped" };

export interface RefreshStatus {
  state: RefreshState;
  running: boolean;
  cycles: number;
  failures: number;
  consecutiveFailures: number;
  generation: number;
  /** epoch millis */
  lastSuccessAt?: number;
  lastFailureAt?: number;
  lastError?: string;
}

export interface RefresherOptions {
  fetcher: UpstreamFetcher;
  builder: SnapshotBuilder;
  store: SnapshotStore;
  logger: Logger;
  intervalMs: number;
  /** upper bound for the fetch step of one cycle */
  fetchTimeoutMs: number;
  metrics?: SearchMetrics;
  onStateChange?: (state: RefreshState) => void;
}

/**
 * Periodic fetch → build → publish loop.
 *
 * idle → fetching → building → publishing → idle, or → failed → idle.
 * Cycles never overlap: a trigger while one is running is skipped. A failed
 * cycle leaves the published snapshot alone.
 */
export class Refresher {
  private state: RefreshState = "idle";
  private running: Promise<RefreshOutcome> | undefined;
  private inflight: AbortController | undefined;
  private timer: NodeJS.Timeout | undefined;
  private readonly logger: Logger;

  private generation: number;
  private cycles = 0;
  private failures = 0;
  private consecutiveFailures = 0;
  private lastSuccessAt: number | undefined;
  private lastFailureAt: number | undefined;
  private lastError: string | undefined;

  constructor(private readonly opts: RefresherOptions) {
    this.logger = opts.logger.child({ component: "refresher" });
    this.generation = opts.store.current()?.generation ?? 0;
  }

  getState(): RefreshState {
    return this.state;
  }

  getStatus(): RefreshStatus {
    return {
      state: this.state,
      running: this.running !== undefined,
      cycles: this.cycles,
      failures: this.failures,
      consecutiveFailures: this.consecutiveFailures,
      generation: this.generation,
      lastSuccessAt: this.lastSuccessAt,
      lastFailureAt: this.lastFailureAt,
      lastError: this.lastError,
    };
  }

  /**
   * Arms the interval timer. With `immediate`, also runs a cycle now and
   * resolves with its outcome, so callers can wait for the first index.
   */
  async start(options?: { immediate?: boolean }): Promise<RefreshOutcome | undefined> {
    if (this.timer) return undefined;

    this.timer = setInterval(() => this.trigger(), this.opts.intervalMs);
    this.timer.unref();
    this.logger.info({ intervalMs: this.opts.intervalMs }, "refresher started");

    return options?.immediate ? this.refresh() : undefined;
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
      this.logger.info("refresher stopped");
    }
    this.inflight?.abort(new Error("refresher stopped"));
  }

  isStarted(): boolean {
    return this.timer !== undefined;
  }

  /** Runs one cycle now unless one is already in progress. */
  async refresh(): Promise<RefreshOutcome> {
    if (this.running) {
      this.logger.debug("refresh already in progress, skipping trigger");
      this.opts.metrics?.recordRefresh("skipped");
      return { status: "skipped" };
    }

    const cycle = this.runCycle();
    this.running = cycle;
    try {
      return await cycle;
    } finally {
      this.running = undefined;
    }
  }

  private trigger(): void {
    this.refresh().catch((err: unknown) => {
      this.logger.fatal({ err }, "refresh cycle hit a bug, stopping refresher");
      this.stop();
    });
  }

  private async runCycle(): Promise<RefreshOutcome> {
    const started = Date.now();
    const controller = new AbortController();
    this.inflight = controller;
    this.cycles++;

    try {
      this.transition("fetching");
      const records = await this.fetchWithTimeout(controller);

      this.transition("building");
      const next = this.opts.builder.build(records, { generation: this.generation + 1 });

      this.transition("publishing");
      const previous = this.opts.store.publish(next);
      this.generation = next.generation;

      const durationMs = Date.now() - started;
      const stats = next.getStats();
      this.lastSuccessAt = Date.now();
      this.consecutiveFailures = 0;
      this.opts.metrics?.recordRefresh("published", durationMs);
      this.opts.metrics?.recordSnapshot(next.generation, stats.docCount);
      this.logger.info(
        { generation: next.generation, previous: previous?.generation, records: stats.docCount, terms: stats.termCount, durationMs },
        "published snapshot",
      );

      this.transition("idle");
      return { status: "published", generation: next.generation, records: stats.docCount, durationMs };
    } catch (err) {
      if (err instanceof SnapshotInvariantError) {
        this.transition("failed");
        this.transition("idle");
        throw err;
      }

      const error = err instanceof Error ? err : new Error(String(err));
      const durationMs = Date.now() - started;
      this.failures++;
      this.consecutiveFailures++;
      this.lastFailureAt = Date.now();
      this.lastError = error.message;

      this.transition("failed");
      this.opts.metrics?.recordRefresh("failed", durationMs);
      this.logger.error(
        { err: error, consecutiveFailures: this.consecutiveFailures, generation: this.generation },
        "refresh failed, keeping previous snapshot",
      );
      this.transition("idle");
      return { status: "failed", error, durationMs };
    } finally {
      if (this.inflight === controller) this.inflight = undefined;
    }
  }

  /** Rejects with UpstreamUnavailableError on timeout and aborts the fetch. */
  private async fetchWithTimeout(controller: AbortController): Promise<RecordInput[]> {
    const ms = this.opts.fetchTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const err = new UpstreamUnavailableError(`fetch timed out after ${ms}ms`);
        controller.abort(err);
        reject(err);
      }, ms);
    });

    try {
      return await Promise.race([this.opts.fetcher.fetchAll({ signal: controller.signal }), timeout]);
    } catch (err) {
      if (err instanceof UpstreamUnavailableError) throw err;
      throw new UpstreamUnavailableError(`fetch failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }

  private transition(next: RefreshState): void {
    this.logger.trace({ from: this.state, to: next }, "refresh state");
    this.state = next;
    this.opts.onStateChange?.(next);
  }
}
