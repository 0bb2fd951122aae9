// src/pipeline/sentiment.ts
import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { OracleUnavailable, errorMessage, httpStatusOf } from "../errors.js";
import { log } from "../logger.js";
import type { HealthTracker } from "../runtime/health.js";
import { withTimeout } from "../runtime/retry.js";
import type { TokenBucket } from "../runtime/tokenBucket.js";
import type { DomainHint } from "../types.js";
import { parseLooseJson, type CompletionClient } from "./llm.js";

export type SentimentResult = { score: number; label: string };

export const UNSCORED: SentimentResult = Object.freeze({ score: 0, label: "unscored" });

export interface SentimentOracle {
  score(text: string, hint: DomainHint, signal?: AbortSignal): Promise<SentimentResult>;
}

const clamp = (x: number, lo = -1, hi = 1) => Math.max(lo, Math.min(hi, x));

const ClassScore = z.object({ label: z.string(), score: z.number() });
const Distribution = z.union([z.array(ClassScore), z.array(z.array(ClassScore)).min(1)]);

const LABEL_ALIASES: Record<string, string> = {
  positive: "positive",
  pos: "positive",
  label_2: "positive",
  negative: "negative",
  neg: "negative",
  label_0: "negative",
  neutral: "neutral",
  neu: "neutral",
  label_1: "neutral",
};

/** score = P(positive) − P(negative); label = most probable class. */
export function distributionToSentiment(dist: Array<{ label: string; score: number }>): SentimentResult {
  if (!dist.length) throw new OracleUnavailable("empty class distribution");
  let pos = 0;
  let neg = 0;
  let top = dist[0];
  for (const c of dist) {
    const name = LABEL_ALIASES[c.label.toLowerCase()] ?? c.label.toLowerCase();
    if (name === "positive") pos += c.score;
    if (name === "negative") neg += c.score;
    if (top === undefined || c.score > top.score) top = c;
  }
  const topName = top ? (LABEL_ALIASES[top.label.toLowerCase()] ?? top.label.toLowerCase()) : "neutral";
  return { score: clamp(pos - neg), label: topName };
}

export type HttpOracleSettings = {
  url: string;
  apiKey?: string;
  models: Record<DomainHint, string>;
  timeoutMs: number;
};

/**
 * Text-classification endpoint in the Hugging Face inference layout:
 * POST {url}/models/{model} with {inputs}. The model is picked by hint.
 */
export class HttpSentimentOracle implements SentimentOracle {
  private readonly http: AxiosInstance;

  constructor(
    private readonly settings: HttpOracleSettings,
    http?: AxiosInstance
  ) {
    this.http =
      http ??
      axios.create({
        baseURL: settings.url,
        timeout: settings.timeoutMs,
        headers: settings.apiKey ? { Authorization: `Bearer ${settings.apiKey}` } : {},
      });
  }

  async score(text: string, hint: DomainHint, signal?: AbortSignal): Promise<SentimentResult> {
    const model = this.settings.models[hint];
    try {
      const { data } = await this.http.post<unknown>(
        `/models/${model}`,
        { inputs: text.slice(0, 2000), options: { wait_for_model: true } },
        { signal, timeout: this.settings.timeoutMs }
      );
      const parsed = Distribution.safeParse(data);
      if (!parsed.success) throw new OracleUnavailable(`unexpected response from ${model}`);
      const flat: Array<z.infer<typeof ClassScore>> = [];
      for (const entry of parsed.data) {
        if (Array.isArray(entry)) flat.push(...entry);
        else flat.push(entry);
      }
      return distributionToSentiment(flat);
    } catch (err) {
      if (err instanceof OracleUnavailable) throw err;
      const status = httpStatusOf(err);
      throw new OracleUnavailable(`${model} failed${status ? ` (HTTP ${status})` : ""}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}

export type PolaritySettings = {
  enabled: boolean;
  minConfidence: number;
  timeoutMs: number;
};

const PolaritySchema = z.object({
  sentiment_sign: z.coerce.number().int().min(-1).max(1),
  confidence: z.coerce.number().transform((n) => clamp(n, 0, 1)),
});

export function polarityPrompt(text: string): string {
  return (
    "You are a sentiment polarity classifier for crypto trading context.\n" +
    "Return ONLY compact JSON: " +
    '{"sentiment_sign": -1|0|1, "confidence": 0..1, "explanation": "short reason"}.\n' +
    "-1 = bearish, 0 = neutral or unclear, 1 = bullish.\n" +
    `Text:\n${text}\nJSON:`
  );
}

/**
 * Second opinion on the sign of a score. When the model is confident its
 * sign replaces the oracle's (neutral zeroes the score); any failure keeps
 * the oracle result.
 */
export class PolarityAdjuster {
  constructor(
    private readonly llm: CompletionClient,
    private readonly bucket: TokenBucket,
    private readonly settings: PolaritySettings
  ) {}

  async adjust(text: string, base: SentimentResult): Promise<SentimentResult> {
    if (!this.settings.enabled || base.label === UNSCORED.label) return base;
    if (!(await this.bucket.acquire(this.settings.timeoutMs))) return base;

    const controller = new AbortController();
    try {
      const answer = await withTimeout(
        this.llm.complete(polarityPrompt(text), { signal: controller.signal, maxTokens: 60 }),
        this.settings.timeoutMs,
        () => new Error("polarity timeout")
      );
      const obj = parseLooseJson(answer);
      if (!obj.ok) return base;
      const parsed = PolaritySchema.safeParse(obj.value);
      if (!parsed.success || parsed.data.confidence < this.settings.minConfidence) return base;
      const sign = parsed.data.sentiment_sign;
      if (sign === 0) return { score: 0, label: "neutral" };
      const score = sign * Math.abs(base.score);
      return { score, label: sign > 0 ? "positive" : "negative" };
    } catch (err) {
      controller.abort();
      log.debug("[LLM] polarity skipped", errorMessage(err));
      return base;
    }
  }
}

/**
 * Bounded-latency front for the oracle. Never throws: errors and timeouts
 * degrade to a neutral "unscored" result.
 */
export class ScoringAdapter {
  private failures = 0;
  private calls = 0;

  constructor(
    private readonly oracle: SentimentOracle,
    private readonly timeoutMs: number,
    private readonly health?: HealthTracker,
    private readonly polarity?: PolarityAdjuster
  ) {}

  async score(text: string, hint: DomainHint): Promise<SentimentResult> {
    this.calls += 1;
    const controller = new AbortController();
    let result: SentimentResult;
    try {
      result = await withTimeout(
        this.oracle.score(text, hint, controller.signal),
        this.timeoutMs,
        () => new OracleUnavailable(`oracle did not answer within ${this.timeoutMs}ms`)
      );
    } catch (err) {
      controller.abort();
      this.failures += 1;
      this.health?.failure("oracle", errorMessage(err));
      log.warn("[SCORE] oracle unavailable, using neutral score", errorMessage(err));
      return { ...UNSCORED };
    }
    this.health?.success("oracle");
    return this.polarity ? this.polarity.adjust(text, result) : result;
  }

  stats() {
    return { calls: this.calls, failures: this.failures };
  }
}
