import { z } from "zod";

/**
 * Error taxonomy. Only FatalConfigError is allowed to take the process down;
 * everything else is recovered where it is raised.
 */
export class SignalServiceError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure or rate limit on a source; retried with backoff. */
export class TransientIngestError extends SignalServiceError {
  constructor(
    message: string,
    readonly retryAfterMs?: number,
    options?: { cause?: unknown }
  ) {
    super("TRANSIENT_INGEST", message, options);
  }
}

export class OracleUnavailable extends SignalServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ORACLE_UNAVAILABLE", message, options);
  }
}

export class ClassifierTimeout extends SignalServiceError {
  constructor(readonly timeoutMs: number) {
    super("CLASSIFIER_TIMEOUT", `classifier did not answer within ${timeoutMs}ms`);
  }
}

export class ComputeTickOverlap extends SignalServiceError {
  constructor(readonly asset: string) {
    super("COMPUTE_TICK_OVERLAP", `signal tick already running for ${asset}`);
  }
}

export class InsufficientPriceHistory extends SignalServiceError {
  constructor(message: string) {
    super("INSUFFICIENT_PRICE_HISTORY", message);
  }
}

export class FatalConfigError extends SignalServiceError {
  constructor(readonly issues: string[]) {
    super("FATAL_CONFIG", `invalid configuration: ${issues.join("; ")}`);
  }
}

const HttpishSchema = z.object({
  code: z.unknown(),
  message: z.unknown(),
  response: z
    .object({ status: z.unknown(), headers: z.record(z.unknown()).optional() })
    .optional(),
});
type HttpishError = z.infer<typeof HttpishSchema>;

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "ERR_NETWORK",
]);

function asHttpish(err: unknown): HttpishError | undefined {
  const parsed = HttpishSchema.safeParse(err);
  return parsed.success ? parsed.data : undefined;
}

/** HTTP status carried by an axios-style error, if any. */
export function httpStatusOf(err: unknown): number | undefined {
  const status = asHttpish(err)?.response?.status;
  return typeof status === "number" ? status : undefined;
}

/** Retry-After header (seconds) as milliseconds. */
export function retryAfterMsOf(err: unknown): number | undefined {
  if (err instanceof TransientIngestError) return err.retryAfterMs;
  const raw = asHttpish(err)?.response?.headers?.["retry-after"];
  const seconds = Number(raw);
  return Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : undefined;
}

/** Network failures, timeouts, 429 and 5xx are worth another attempt. */
export function isTransient(err: unknown): boolean {
  if (err instanceof TransientIngestError) return true;
  if (err instanceof SignalServiceError) return false;
  const e = asHttpish(err);
  if (!e) return false;
  const status = httpStatusOf(err);
  if (status !== undefined) return status === 429 || status >= 500;
  if (typeof e.code === "string" && TRANSIENT_CODES.has(e.code)) return true;
  const message = typeof e.message === "string" ? e.message.toLowerCase() : "";
  return (
    message.includes("timeout") ||
    message.includes("network") ||
    message.includes("socket hang up")
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
