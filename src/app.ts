import type http from "node:http";
import type { Logger } from "pino";

import type { Config } from "./config.js";
import {
  IdfRanker,
  MatchCountRanker,
  MemoryQueryEngine,
  MemorySnapshotBuilder,
  MinHeapTopKSelector,
  Refresher,
  SimpleTokenizer,
  SnapshotStore,
  type Ranker,
  type SearchHit,
} from "./core/index.js";
import { createEngine, type Engine } from "./http/engine.js";
import { createServer } from "./http/server.js";
import { SearchMetrics } from "./metrics.js";
import type { UpstreamFetcher } from "./upstream/fetcher.js";
import { HttpMessagesClient } from "./upstream/messagesClient.js";

export interface App {
  config: Config;
  store: SnapshotStore;
  refresher: Refresher;
  engine: Engine;
  metrics: SearchMetrics;
  server: http.Server;
}

export interface AppOverrides {
  /** Replaces the HTTP messages client. */
  fetcher?: UpstreamFetcher;
  metrics?: SearchMetrics;
}

function createRanker(name: Config["search"]["ranker"]): Ranker {
  return name === "idf" ? new IdfRanker() : new MatchCountRanker();
}

/** Wires every component; nothing starts until the caller starts the refresher and listens. */
export function createApp(config: Config, logger: Logger, overrides: AppOverrides = {}): App {
  const tokenizer = new SimpleTokenizer();
  const store = new SnapshotStore();
  const metrics = overrides.metrics ?? new SearchMetrics();

  const fetcher =
    overrides.fetcher ??
    new HttpMessagesClient({
      logger,
      baseUrl: config.upstream.baseUrl,
      pageSize: config.upstream.pageSize,
      maxBatchSize: config.upstream.maxBatchSize,
      requestTimeoutMs: config.upstream.requestTimeoutMs,
      maxRetries: config.upstream.maxRetries,
      retryDelayMs: config.upstream.retryDelayMs,
      pageDelayMs: config.upstream.pageDelayMs,
      probeTotal: config.upstream.probeTotal,
    });

  const refresher = new Refresher({
    fetcher,
    builder: new MemorySnapshotBuilder(tokenizer),
    store,
    logger,
    metrics,
    intervalMs: config.refresh.intervalMs,
    fetchTimeoutMs: config.refresh.fetchTimeoutMs,
  });

  const queryEngine = new MemoryQueryEngine({
    tokenizer,
    ranker: createRanker(config.search.ranker),
    topK: new MinHeapTopKSelector<SearchHit>(),
    maxPageSize: config.search.maxPageSize,
    tieBreak: config.search.tieBreak,
  });

  const engine = createEngine({ store, queryEngine, refreshStatus: () => refresher.getStatus() });

  const server = createServer({
    engine,
    logger,
    metrics,
    metricsEnabled: config.metricsEnabled,
    defaultPageSize: config.search.defaultPageSize,
  });

  return { config, store, refresher, engine, metrics, server };
}
