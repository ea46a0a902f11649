import { z } from "zod";

import { ConfigError } from "./core/errors.js";

const DEFAULT_UPSTREAM = "https://november7-730026606190.europe-west1.run.app";

const flag = (fallback: boolean) =>
  z
    .enum(["1", "0", "true", "false", "yes", "no"])
    .default(fallback ? "true" : "false")
    .transform((v) => v === "1" || v === "true" || v === "yes");

const int = (fallback: number, min: number) => z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z
  .object({
    PORT: int(3000, 0).pipe(z.number().max(65535)),

    UPSTREAM_BASE_URL: z.string().url().default(DEFAULT_UPSTREAM),
    UPSTREAM_PAGE_SIZE: int(100, 1),
    UPSTREAM_MAX_BATCH_SIZE: int(5000, 1),
    UPSTREAM_REQUEST_TIMEOUT_MS: int(10_000, 1),
    UPSTREAM_MAX_RETRIES: int(3, 1),
    UPSTREAM_RETRY_DELAY_MS: int(200, 0),
    UPSTREAM_PAGE_DELAY_MS: int(50, 0),
    UPSTREAM_PROBE_TOTAL: flag(true),

    REFRESH_INTERVAL_MS: int(300_000, 1000),
    REFRESH_ON_START: flag(true),
    FETCH_TIMEOUT_MS: int(60_000, 1),

    MAX_PAGE_SIZE: int(100, 1),
    DEFAULT_PAGE_SIZE: z.coerce.number().int().min(1).optional(),
    RANKER: z.enum(["match-count", "idf"]).default("match-count"),
    TIE_BREAK: z.enum(["id", "upstream"]).default("id"),

    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    METRICS_ENABLED: flag(false),
  })
  .superRefine((env, ctx) => {
    if (env.DEFAULT_PAGE_SIZE !== undefined && env.DEFAULT_PAGE_SIZE > env.MAX_PAGE_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DEFAULT_PAGE_SIZE"],
        message: `must not exceed MAX_PAGE_SIZE (${env.MAX_PAGE_SIZE})`,
      });
    }
  });

export interface Config {
  port: number;
  upstream: {
    baseUrl: string;
    pageSize: number;
    maxBatchSize: number;
    requestTimeoutMs: number;
    maxRetries: number;
    retryDelayMs: number;
    pageDelayMs: number;
    probeTotal: boolean;
  };
  refresh: {
    intervalMs: number;
    onStart: boolean;
    fetchTimeoutMs: number;
  };
  search: {
    maxPageSize: number;
    defaultPageSize: number;
    ranker: "match-count" | "idf";
    tieBreak: "id" | "upstream";
  };
  logLevel: string;
  metricsEnabled: boolean;
}

/**
 * Reads configuration from environment variables.
 * Empty strings count as unset. Every invalid variable is reported at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    upstream: {
      baseUrl: e.UPSTREAM_BASE_URL,
      pageSize: e.UPSTREAM_PAGE_SIZE,
      maxBatchSize: e.UPSTREAM_MAX_BATCH_SIZE,
      requestTimeoutMs: e.UPSTREAM_REQUEST_TIMEOUT_MS,
      maxRetries: e.UPSTREAM_MAX_RETRIES,
      retryDelayMs: e.UPSTREAM_RETRY_DELAY_MS,
      pageDelayMs: e.UPSTREAM_PAGE_DELAY_MS,
      probeTotal: e.UPSTREAM_PROBE_TOTAL,
    },
    refresh: {
      intervalMs: e.REFRESH_INTERVAL_MS,
      onStart: e.REFRESH_ON_START,
      fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
    },
    search: {
      maxPageSize: e.MAX_PAGE_SIZE,
      defaultPageSize: e.DEFAULT_PAGE_SIZE ?? Math.min(10, e.MAX_PAGE_SIZE),
      ranker: e.RANKER,
      tieBreak: e.TIE_BREAK,
    },
    logLevel: e.LOG_LEVEL,
    metricsEnabled: e.METRICS_ENABLED,
  };
}
