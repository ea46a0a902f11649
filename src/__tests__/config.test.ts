import { describe, expect, it } from "vitest";
import { loadConfig } from "../config.js";
import { ConfigError } from "../core/errors.js";

function configError(env: NodeJS.ProcessEnv): ConfigError {
  try {
    loadConfig(env);
  } catch (e) {
    if (e instanceof ConfigError) return e;
    throw e;
  }
  throw new Error("expected loadConfig to throw");
}

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.upstream).toEqual({
      baseUrl: "https://november7-730026606190.europe-west1.run.app",
      pageSize: 100,
      maxBatchSize: 5000,
      requestTimeoutMs: 10_000,
      maxRetries: 3,
      retryDelayMs: 200,
      pageDelayMs: 50,
      probeTotal: true,
    });
    expect(config.refresh).toEqual({ intervalMs: 300_000, onStart: true, fetchTimeoutMs: 60_000 });
    expect(config.search).toEqual({ maxPageSize: 100, defaultPageSize: 10, ranker: "match-count", tieBreak: "id" });
    expect(config.logLevel).toBe("info");
    expect(config.metricsEnabled).toBe(false);
  });

  it("reads and coerces values", () => {
    const config = loadConfig({
      PORT: "8080",
      UPSTREAM_BASE_URL: "http://localhost:9000/api",
      REFRESH_INTERVAL_MS: "60000",
      REFRESH_ON_START: "no",
      MAX_PAGE_SIZE: "50",
      DEFAULT_PAGE_SIZE: "25",
      RANKER: "idf",
      TIE_BREAK: "upstream",
      LOG_LEVEL: "debug",
      METRICS_ENABLED: "1",
    });

    expect(config.port).toBe(8080);
    expect(config.upstream.baseUrl).toBe("http://localhost:9000/api");
    expect(config.refresh.intervalMs).toBe(60_000);
    expect(config.refresh.onStart).toBe(false);
    expect(config.search).toEqual({ maxPageSize: 50, defaultPageSize: 25, ranker: "idf", tieBreak: "upstream" });
    expect(config.logLevel).toBe("debug");
    expect(config.metricsEnabled).toBe(true);
  });

  it("treats empty strings as unset", () => {
    expect(loadConfig({ PORT: "", RANKER: "" }).port).toBe(3000);
  });

  it("keeps the default page size within a small maximum", () => {
    expect(loadConfig({ MAX_PAGE_SIZE: "5" }).search.defaultPageSize).toBe(5);
  });

  it("rejects a default page size above the maximum", () => {
    const err = configError({ MAX_PAGE_SIZE: "20", DEFAULT_PAGE_SIZE: "30" });
    expect(err.issues).toEqual(["DEFAULT_PAGE_SIZE: must not exceed MAX_PAGE_SIZE (20)"]);
  });

  it("reports every invalid variable", () => {
    const err = configError({ PORT: "70000", RANKER: "bm25", REFRESH_INTERVAL_MS: "10" });

    expect(err.code).toBe("CONFIG_INVALID");
    expect(err.issues.map((i) => i.split(":")[0])).toEqual(["PORT", "REFRESH_INTERVAL_MS", "RANKER"]);
  });
});
