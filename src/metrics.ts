import { Counter, Gauge, Histogram, Registry } from "prom-client";

export type RefreshOutcomeLabel = "published" | "failed" | "skipped";
export type SearchOutcomeLabel = "ok" | "invalid" | "not_ready";

/**
 * Prometheus instruments for the refresher and the search path.
 * Each instance owns its registry so several apps (tests) never collide on names.
 */
export class SearchMetrics {
  public readonly registry: Registry;

  private readonly refreshCycles: Counter<"outcome">;
  private readonly refreshDuration: Histogram;
  private readonly snapshotRecords: Gauge;
  private readonly snapshotGeneration: Gauge;
  private readonly searches: Counter<"outcome">;
  private readonly searchDuration: Histogram;

  constructor(registry: Registry = new Registry()) {
    this.registry = registry;

    this.refreshCycles = new Counter({
      name: "search_refresh_cycles_total",
      help: "Refresh cycles by outcome",
      labelNames: ["outcome"],
      registers: [registry],
    });

    this.refreshDuration = new Histogram({
      name: "search_refresh_duration_seconds",
      help: "Duration of completed refresh cycles",
      buckets: [0.1, 0.5, 1, 2.5, 5, 10, 30, 60],
      registers: [registry],
    });

    this.snapshotRecords = new Gauge({
      name: "search_snapshot_records",
      help: "Records in the active snapshot",
      registers: [registry],
    });

    this.snapshotGeneration = new Gauge({
      name: "search_snapshot_generation",
      help: "Generation of the active snapshot",
      registers: [registry],
    });

    this.searches = new Counter({
      name: "search_queries_total",
      help: "Search calls by outcome",
      labelNames: ["outcome"],
      registers: [registry],
    });

    this.searchDuration = new Histogram({
      name: "search_query_duration_seconds",
      help: "Time spent answering a search against a snapshot",
      buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.5],
      registers: [registry],
    });
  }

  recordRefresh(outcome: RefreshOutcomeLabel, durationMs?: number): void {
    this.refreshCycles.inc({ outcome });
    if (durationMs !== undefined) this.refreshDuration.observe(durationMs / 1000);
  }

  recordSnapshot(generation: number, records: number): void {
    this.snapshotGeneration.set(generation);
    this.snapshotRecords.set(records);
  }

  recordSearch(outcome: SearchOutcomeLabel, durationMs?: number): void {
    this.searches.inc({ outcome });
    if (durationMs !== undefined) this.searchDuration.observe(durationMs / 1000);
  }

  async render(): Promise<{ contentType: string; body: string }> {
    return { contentType: this.registry.contentType, body: await this.registry.metrics() };
  }
}
