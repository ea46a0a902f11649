export type ErrorCode = "INVALID_ARGUMENT" | "UPSTREAM_UNAVAILABLE" | "SNAPSHOT_INVARIANT" | "CONFIG_INVALID";

export class SearchError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed pagination or query input; surfaced synchronously to the caller. */
export class InvalidArgumentError extends SearchError {
  constructor(
    readonly field: string,
    readonly reason: string,
  ) {
    super("INVALID_ARGUMENT", `${field} ${reason}`);
  }
}

/** The upstream could not deliver a complete record set. Recovered by the refresher. */
export class UpstreamUnavailableError extends SearchError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super("UPSTREAM_UNAVAILABLE", message, { cause: options?.cause });
    this.status = options?.status;
  }
}

/** A snapshot broke its own consistency rules. This is a bug, not a runtime condition. */
export class SnapshotInvariantError extends SearchError {
  constructor(message: string) {
    super("SNAPSHOT_INVARIANT", message);
  }
}

export class ConfigError extends SearchError {
  constructor(readonly issues: string[]) {
    super("CONFIG_INVALID", `invalid configuration: ${issues.join("; ")}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
