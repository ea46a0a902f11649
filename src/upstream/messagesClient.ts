import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "pino";

import type { RecordInput } from "../core/types.js";
import { UpstreamUnavailableError, errorMessage } from "../core/errors.js";
import type { FetchOptions, UpstreamFetcher } from "./fetcher.js";
import { normalizePage, toRecordInput, UpstreamMessageListSchema, type UpstreamPage } from "./schema.js";

export interface MessagesClientOptions {
  baseUrl: string;
  logger: Logger;
  /** page size used when the total is unknown */
  pageSize?: number;
  /** upper bound for a single request once the total is known */
  maxBatchSize?: number;
  requestTimeoutMs?: number;
  /** attempts per page, first one included */
  maxRetries?: number;
  /** first backoff delay, doubled after each failed attempt */
  retryDelayMs?: number;
  /** pause between successive pages */
  pageDelayMs?: number;
  /** ask for one item first to learn `total` and fetch everything in fewer requests */
  probeTotal?: boolean;
  fetch?: typeof fetch;
}

/**
 * Pages through `GET {baseUrl}/messages/?skip=&limit=` until the reported total
 * is reached or a short page comes back.
 *
 * Any page that still fails after its retries fails the whole fetch; callers
 * never see a partial record set.
 */
export class HttpMessagesClient implements UpstreamFetcher {
  private readonly endpoint: URL;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;
  private readonly pageSize: number;
  private readonly maxBatchSize: number;
  private readonly requestTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly pageDelayMs: number;
  private readonly probeTotal: boolean;

  constructor(opts: MessagesClientOptions) {
    const base = opts.baseUrl.endsWith("/") ? opts.baseUrl : `${opts.baseUrl}/`;
    this.endpoint = new URL("messages/", base);
    this.logger = opts.logger.child({ component: "upstream" });
    this.fetchImpl = opts.fetch ?? fetch;
    this.pageSize = opts.pageSize ?? 100;
    this.maxBatchSize = opts.maxBatchSize ?? 5000;
    this.requestTimeoutMs = opts.requestTimeoutMs ?? 10_000;
    this.maxRetries = Math.max(1, opts.maxRetries ?? 3);
    this.retryDelayMs = opts.retryDelayMs ?? 200;
    this.pageDelayMs = opts.pageDelayMs ?? 50;
    this.probeTotal = opts.probeTotal ?? true;
  }

  async fetchAll(options?: FetchOptions): Promise<RecordInput[]> {
    const signal = options?.signal;
    let limit = this.pageSize;

    if (this.probeTotal) {
      const total = await this.discoverTotal(signal);
      if (total) limit = Math.min(total, this.maxBatchSize);
    }

    const records: RecordInput[] = [];
    let skip = 0;

    for (;;) {
      const page = await this.fetchPage(skip, limit, signal);
      if (page.items.length === 0) break;

      const parsed = UpstreamMessageListSchema.safeParse(page.items);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new UpstreamUnavailableError(
          `malformed messages payload at skip=${skip}: ${issue ? `${issue.path.join(".")} ${issue.message}` : "invalid items"}`,
        );
      }
      for (const msg of parsed.data) records.push(toRecordInput(msg));

      if (page.total !== undefined && records.length >= page.total) break;
      if (page.items.length < limit) break;

      skip += limit;
      if (this.pageDelayMs > 0) await sleep(this.pageDelayMs, undefined, { signal });
    }

    this.logger.debug({ records: records.length }, "fetched messages");
    return records;
  }

  /** One cheap request for `total`. Failure only means we page with the default size. */
  private async discoverTotal(signal: AbortSignal | undefined): Promise<number | undefined> {
    try {
      const body = await this.request(0, 1, signal);
      return normalizePage(body)?.total;
    } catch (err) {
      if (signal?.aborted) throw abortError(signal);
      this.logger.debug({ err }, "total probe failed, paging with default size");
      return undefined;
    }
  }

  private async fetchPage(skip: number, limit: number, signal: AbortSignal | undefined): Promise<UpstreamPage> {
    let delay = this.retryDelayMs;
    let lastError: UpstreamUnavailableError | undefined;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      let body: unknown;
      try {
        body = await this.request(skip, limit, signal);
      } catch (err) {
        if (signal?.aborted) throw abortError(signal);
        lastError = err instanceof UpstreamUnavailableError ? err : new UpstreamUnavailableError(errorMessage(err), { cause: err });

        // auth problems will not fix themselves between attempts
        if (lastError.status === 401 || lastError.status === 403) throw lastError;

        if (attempt < this.maxRetries) {
          this.logger.warn({ attempt, maxRetries: this.maxRetries, skip, err: lastError }, "transient error fetching messages");
          await sleep(delay, undefined, { signal });
          delay *= 2;
        }
        continue;
      }

      const page = normalizePage(body);
      if (!page) throw new UpstreamUnavailableError(`unexpected response shape from messages endpoint at skip=${skip}`);
      return page;
    }

    throw new UpstreamUnavailableError(`messages page at skip=${skip} failed after ${this.maxRetries} attempts`, {
      cause: lastError,
      status: lastError?.status,
    });
  }

  private async request(skip: number, limit: number, signal: AbortSignal | undefined): Promise<unknown> {
    const url = new URL(this.endpoint);
    url.searchParams.set("skip", String(skip));
    url.searchParams.set("limit", String(limit));

    const timeout = timeoutSignal(this.requestTimeoutMs, signal);
    try {
      let res: Response;
      try {
        res = await this.fetchImpl(url, { signal: timeout.signal, headers: { accept: "application/json" } });
      } catch (err) {
        throw new UpstreamUnavailableError(`GET ${url.pathname} failed: ${errorMessage(err)}`, { cause: err });
      }

      if (!res.ok) {
        // frees the connection for the retry
        await res.body?.cancel();
        throw new UpstreamUnavailableError(`GET ${url.pathname} returned ${res.status}`, { status: res.status });
      }

      try {
        return await res.json();
      } catch (err) {
        throw new UpstreamUnavailableError(`GET ${url.pathname} returned invalid JSON`, { cause: err });
      }
    } finally {
      timeout.dispose();
    }
  }
}

function abortError(signal: AbortSignal): UpstreamUnavailableError {
  return new UpstreamUnavailableError(`fetch aborted: ${errorMessage(signal.reason)}`, { cause: signal.reason });
}

/** Signal that fires after `ms` or when `parent` aborts, whichever comes first. */
function timeoutSignal(ms: number, parent: AbortSignal | undefined): { signal: AbortSignal; dispose(): void } {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error(`request timed out after ${ms}ms`)), ms);
  const onAbort = (): void => controller.abort(parent?.reason);

  if (parent?.aborted) controller.abort(parent.reason);
  else parent?.addEventListener("abort", onAbort, { once: true });

  return {
    signal: controller.signal,
    dispose() {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onAbort);
    },
  };
}
