import http from "node:http";
import { randomUUID } from "node:crypto";
import type { Logger } from "pino";

import { PROBLEM_CONTENT_TYPE, problem, type FieldError, type Problem } from "./problem.js";
import { firstParam, parseIntParam, pushErr } from "./validation.js";
import type { Engine, SearchResult } from "./engine.js";
import { InvalidArgumentError } from "../core/errors.js";
import type { SearchMetrics } from "../metrics.js";

const SERVICE = "message-search";
const VERSION = "0.1.0";
const MAX_QUERY_LENGTH = 4096;
const RETRY_AFTER_SECONDS = 5;
const BASE_URL = "http://localhost";
const ROUTES = new Set(["/search", "/health", "/ready", "/metrics"]);

export interface ServerOptions {
  engine: Engine;
  logger: Logger;
  metrics?: SearchMetrics;
  metricsEnabled?: boolean;
  defaultPageSize?: number;
}

export function createServer(opts: ServerOptions): http.Server {
  const start = Date.now();
  const { engine, metrics } = opts;
  const logger = opts.logger.child({ component: "http" });
  const metricsEnabled = (opts.metricsEnabled ?? false) && metrics !== undefined;
  const defaultPageSize = Math.min(opts.defaultPageSize ?? 10, engine.maxPageSize);

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const began = Date.now();
    res.on("finish", () => {
      logger.debug({ requestId, method: req.method, target: req.url, status: res.statusCode, ms: Date.now() - began }, "request");
    });

    // the Host header is client input; only the request target is routed on
    const url = URL.canParse(req.url ?? "/", BASE_URL) ? new URL(req.url ?? "/", BASE_URL) : undefined;
    if (!url) {
      return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "malformed request target", requestId }));
    }

    try {
      if (ROUTES.has(url.pathname) && req.method !== "GET" && req.method !== "HEAD") {
        res.setHeader("allow", "GET, HEAD");
        return sendProblem(res, problem({ status: 405, code: "METHOD_NOT_ALLOWED", detail: `${req.method} not allowed`, instance: url.pathname, requestId }));
      }

      if (url.pathname === "/health") {
        const status = engine.status();
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
          ready: status.ready,
          indexedRecords: status.indexedRecords,
          generation: status.generation,
          builtAt: status.builtAt === null ? null : new Date(status.builtAt).toISOString(),
          refresh: status.refresh ?? null,
        });
      }

      if (url.pathname === "/ready") {
        const status = engine.status();
        if (!status.ready) return sendNotReady(res, url.pathname, requestId);
        return sendJson(res, 200, { ready: true, generation: status.generation, indexedRecords: status.indexedRecords });
      }

      if (url.pathname === "/metrics") {
        if (!metricsEnabled || !metrics) {
          return sendProblem(res, problem({ status: 404, code: "NOT_FOUND", detail: "metrics not enabled", instance: url.pathname, requestId }));
        }
        const out = await metrics.render();
        res.statusCode = 200;
        res.setHeader("content-type", out.contentType);
        res.end(out.body);
        return;
      }

      if (url.pathname === "/search") {
        const params = url.searchParams;
        const errors: FieldError[] = [];

        const q = firstParam(params, "q", "search_query");
        if (!q) pushErr(errors, "q", "is required");
        else if (q.value.length > MAX_QUERY_LENGTH) pushErr(errors, q.name, `must be at most ${MAX_QUERY_LENGTH} characters`);

        const pageParam = firstParam(params, "page");
        const page = pageParam ? parseIntParam(pageParam.value) : 1;
        if (page === undefined) pushErr(errors, "page", "must be an integer");

        const sizeParam = firstParam(params, "pageSize", "page_size");
        const pageSize = sizeParam ? parseIntParam(sizeParam.value) : defaultPageSize;
        if (pageSize === undefined) pushErr(errors, sizeParam?.name ?? "pageSize", "must be an integer");

        if (errors.length || !q || page === undefined || pageSize === undefined) {
          metrics?.recordSearch("invalid");
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance: url.pathname, requestId, errors }));
        }

        const started = performance.now();
        let result: SearchResult;
        try {
          result = engine.search({ query: q.value, page, pageSize });
        } catch (e) {
          if (!(e instanceof InvalidArgumentError)) throw e;
          metrics?.recordSearch("invalid");
          const path = e.field === "pageSize" ? sizeParam?.name ?? "pageSize" : e.field;
          return sendProblem(
            res,
            problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance: url.pathname, requestId, errors: [{ path, message: e.reason }] }),
          );
        }

        if (!result.ready) {
          metrics?.recordSearch("not_ready");
          return sendNotReady(res, url.pathname, requestId);
        }

        const tookMs = performance.now() - started;
        metrics?.recordSearch("ok", tookMs);
        return sendJson(res, 200, { ...result.response, tookMs: Math.round(tookMs * 1000) / 1000 });
      }

      return sendProblem(res, problem({ status: 404, code: "NOT_FOUND", detail: "not found", instance: url.pathname, requestId }));
    } catch (e) {
      logger.error({ err: e, requestId, path: url.pathname }, "unhandled error");
      return sendProblem(res, problem({ status: 500, code: "INTERNAL", detail: "internal error", instance: url.pathname, requestId }));
    }
  });
}

/** Starts listening and resolves with the bound port (useful with port 0). */
export async function listen(server: http.Server, port: number): Promise<number> {
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  return typeof addr === "object" && addr ? addr.port : port;
}

function sendNotReady(res: http.ServerResponse, instance: string, requestId: string): void {
  res.setHeader("retry-after", String(RETRY_AFTER_SECONDS));
  sendProblem(res, problem({ status: 503, code: "NOT_READY", detail: "no index snapshot has been published yet", instance, requestId }));
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(data);
}

function sendProblem(res: http.ServerResponse, body: Problem): void {
  const data = JSON.stringify(body);
  res.statusCode = body.status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(data);
}
