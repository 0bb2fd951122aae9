// src/pipeline/relevance.ts
import { z } from "zod";
import { ClassifierTimeout, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { HealthTracker } from "../runtime/health.js";
import { withTimeout } from "../runtime/retry.js";
import type { TokenBucket } from "../runtime/tokenBucket.js";
import type { Relevance } from "../types.js";
import { parseLooseJson, type CompletionClient, type ParseResult } from "./llm.js";

export type SkipReason = "disabled" | "rate_limited" | "timeout" | "parse_failure" | "error";

export type ClassificationOutcome =
  | { status: "ok"; result: Relevance }
  | { status: "skipped"; reason: SkipReason };

export type ClassifierSettings = {
  enabled: boolean;
  timeoutMs: number;
  minConfidence: number;
  assetName: string;
};

const flexBool = z.union([
  z.boolean(),
  z
    .string()
    .transform((s) => s.trim().toLowerCase())
    .pipe(z.enum(["true", "false", "yes", "no"]))
    .transform((s) => s === "true" || s === "yes"),
]);

const RelevanceSchema = z.object({
  relevant: flexBool,
  confidence: z.coerce.number().transform((n) => Math.max(0, Math.min(1, n))),
  labels: z
    .union([z.array(z.unknown()), z.string()])
    .optional()
    .transform((v) =>
      (Array.isArray(v) ? v : (v ?? "").split(","))
        .filter((x): x is string => typeof x === "string")
        .map((x) => x.trim())
        .filter(Boolean)
    ),
  reason: z.unknown().optional().transform((v) => (typeof v === "string" ? v : "")),
});

/** Parse a classifier answer; parse failure means "classification unavailable". */
export function parseClassification(text: string): ParseResult<Relevance> {
  const obj = parseLooseJson(text);
  if (!obj.ok) return obj;
  const parsed = RelevanceSchema.safeParse(obj.value);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ") };
  }
  return { ok: true, value: parsed.data, partial: obj.partial };
}

export function relevancePrompt(text: string, assetName: string): string {
  return (
    `You are a financial relevance filter for ${assetName} trading.\n` +
    "Given a post or a news item, answer in compact JSON with fields: " +
    '{"relevant": true|false, "confidence": float between 0 and 1, ' +
    '"labels": [short tags], "reason": "short reason"}.\n' +
    `An item is relevant if it carries concrete information or sentiment likely to move ${assetName} price: ` +
    "on-chain metrics, major news, actionable technical analysis, protocol changes, ETFs, regulation, " +
    "market structure, large flows, hacks, partnerships. Giveaways, memes, generic hype, unrelated coins " +
    "and spam are not relevant.\n" +
    `Text:\n${text}\nJSON:`
  );
}

/** True when the item should carry the low-relevance mark. */
export function isLowRelevance(r: Relevance | null, minConfidence: number): boolean {
  if (!r) return false;
  return !r.relevant || r.confidence < minConfidence;
}

/**
 * Relevance gate in front of the LLM. Never throws: rate-limit exhaustion,
 * timeouts, transport errors and unparseable answers all come back as
 * `skipped`.
 */
export class RelevanceClassifier {
  private counts: Record<SkipReason | "ok", number> = {
    ok: 0,
    disabled: 0,
    rate_limited: 0,
    timeout: 0,
    parse_failure: 0,
    error: 0,
  };

  constructor(
    private readonly llm: CompletionClient,
    private readonly bucket: TokenBucket,
    private readonly settings: ClassifierSettings,
    private readonly health?: HealthTracker
  ) {}

  async classify(text: string): Promise<ClassificationOutcome> {
    const out = await this.run(text);
    this.counts[out.status === "ok" ? "ok" : out.reason] += 1;
    return out;
  }

  private async run(text: string): Promise<ClassificationOutcome> {
    if (!this.settings.enabled) return { status: "skipped", reason: "disabled" };

    const { timeoutMs } = this.settings;
    const started = Date.now();
    if (!(await this.bucket.acquire(timeoutMs))) {
      log.warn("[LLM] rate limit wait exceeded, skipping classification");
      return { status: "skipped", reason: "rate_limited" };
    }

    const remaining = Math.max(1, timeoutMs - (Date.now() - started));
    const controller = new AbortController();
    let answer: string;
    try {
      answer = await withTimeout(
        this.llm.complete(relevancePrompt(text, this.settings.assetName), {
          signal: controller.signal,
          maxTokens: 80,
        }),
        remaining,
        () => new ClassifierTimeout(timeoutMs)
      );
    } catch (err) {
      controller.abort();
      this.health?.failure("classifier", errorMessage(err));
      if (err instanceof ClassifierTimeout) {
        log.warn("[LLM] classifier timeout", { timeoutMs });
        return { status: "skipped", reason: "timeout" };
      }
      log.warn("[LLM] classifier error", errorMessage(err));
      return { status: "skipped", reason: "error" };
    }
    this.health?.success("classifier");

    const parsed = parseClassification(answer);
    if (!parsed.ok) {
      log.warn("[LLM] unparseable classification", { error: parsed.error, answer: answer.slice(0, 160) });
      return { status: "skipped", reason: "parse_failure" };
    }
    return { status: "ok", result: parsed.value };
  }

  stats() {
    return { ...this.counts };
  }
}
