// src/pipeline/commentary.ts
import type { MarketDB } from "../db/MarketDB.js";
import { errorMessage } from "../errors.js";
import { log } from "../logger.js";
import { withTimeout } from "../runtime/retry.js";
import type { TokenBucket } from "../runtime/tokenBucket.js";
import type { Action, ItemSource } from "../types.js";
import type { CompletionClient } from "./llm.js";

export type CommentarySettings = {
  enabled: boolean;
  asset: string;
  symbol: string;
  timeframe: string;
  model: string;
  timeoutMs: number;
  /** a fresh answer is reused for this long */
  minIntervalMs: number;
  maxItems: number;
  maxTextLen: number;
};

export type CommentaryFacts = {
  now: number;
  asset: string;
  signal: { ts: number; action: Action; alpha: number; ema15: number; mentions: number } | null;
  price: {
    pctChange60m: number | null;
    /** last 10 closes of the past hour */
    closes: Array<{ ts: number; close: number }>;
  };
  items: Array<{ ts: number; source: ItemSource; score: number; confidence: number; labels: string[]; text: string }>;
  relevantLast15m: number;
};

export type Commentary = {
  commentary: string;
  facts: CommentaryFacts;
  model: string;
  generatedAt: number;
  /** true when the text is an older answer, or empty, because the LLM failed */
  stale: boolean;
  error?: "llm_unavailable";
};

const HOUR = 3_600_000;

/** Latest signal, the past hour of prices and the most recent relevant items. */
export function loadFacts(db: MarketDB, s: CommentarySettings, now: number): CommentaryFacts {
  const last = db.latestSignal(s.asset);
  const candles = db.candles(s.symbol, s.timeframe, now - HOUR, now);
  const first = candles[0];
  const latest = candles[candles.length - 1];
  const pctChange60m =
    candles.length >= 2 && first && latest && first.close > 0 ? (latest.close / first.close - 1) * 100 : null;

  const items = db.listItems({ asset: s.asset, relevant: true, limit: s.maxItems, order: "desc" });
  const recent = db.listItems({ asset: s.asset, relevant: true, since: now - 15 * 60_000, until: now, limit: 1000 });

  return {
    now,
    asset: s.asset,
    signal: last
      ? { ts: last.ts, action: last.action, alpha: last.alpha, ema15: last.ema15, mentions: last.mentions }
      : null,
    price: {
      pctChange60m,
      closes: candles.slice(-10).map((c) => ({ ts: c.ts, close: c.close })),
    },
    items: items.map((i) => ({
      ts: i.ts,
      source: i.source,
      score: i.score,
      confidence: i.relevance?.confidence ?? 0,
      labels: i.relevance?.labels ?? [],
      text: i.text.slice(0, s.maxTextLen),
    })),
    relevantLast15m: recent.length,
  };
}

const iso = (ts: number) => new Date(ts).toISOString();

export function factsToText(f: CommentaryFacts): string {
  const lines = [`now_utc: ${iso(f.now)}`, `asset: ${f.asset}`];
  if (f.signal) {
    lines.push(
      `signal: action=${f.signal.action} alpha=${f.signal.alpha.toFixed(2)} ema15=${f.signal.ema15.toFixed(2)} mentions_15m=${f.signal.mentions}`
    );
  } else {
    lines.push("signal: none yet");
  }
  if (f.price.pctChange60m !== null) lines.push(`price: pct_change_60m=${f.price.pctChange60m.toFixed(2)}%`);
  const lastClose = f.price.closes[f.price.closes.length - 1];
  if (lastClose) lines.push(`price_last: ${lastClose.close.toFixed(2)} @ ${iso(lastClose.ts)}`);
  lines.push(`items: sample_count=${f.items.length} recent_relevant_15m=${f.relevantLast15m}`);
  for (const i of f.items) {
    lines.push(
      `- [${iso(i.ts)} ${i.source}] score=${i.score.toFixed(2)} llm=${i.confidence.toFixed(2)} labels=${i.labels.join(",")} text=${i.text}`
    );
  }
  return lines.join("\n");
}

export function commentaryPrompt(factsText: string, assetName: string): string {
  return (
    `You are a crypto market assistant. Summarise the current state of ${assetName} ` +
    "in at most 5 bullet points, combining sentiment, momentum and news flow. " +
    "Be specific and brief. End with one line giving the current bias (bullish/neutral/bearish). " +
    "Answer in Markdown only, no preamble.\n\n" +
    `Context:\n${factsText}`
  );
}

/**
 * LLM market commentary over stored facts. A successful answer is cached for
 * `minIntervalMs`; when the LLM fails the last answer is served as stale.
 * Never throws.
 */
export class CommentaryService {
  private cache: { value: Commentary; at: number } | null = null;

  constructor(
    private readonly db: MarketDB,
    private readonly llm: CompletionClient,
    private readonly bucket: TokenBucket,
    private readonly settings: CommentarySettings,
    private readonly now: () => number = Date.now
  ) {}

  async generate(signal?: AbortSignal): Promise<Commentary> {
    const now = this.now();
    if (this.cache && now - this.cache.at < this.settings.minIntervalMs) {
      return { ...this.cache.value, stale: false };
    }

    const facts = loadFacts(this.db, this.settings, now);
    const text = await this.summarise(facts, signal);
    if (text) {
      const value: Commentary = { commentary: text, facts, model: this.settings.model, generatedAt: now, stale: false };
      this.cache = { value, at: now };
      return value;
    }
    if (this.cache) {
      log.warn("[SUMMARY] serving cached commentary");
      return { ...this.cache.value, stale: true };
    }
    return { commentary: "", facts, model: this.settings.model, generatedAt: now, stale: true, error: "llm_unavailable" };
  }

  private async summarise(facts: CommentaryFacts, signal?: AbortSignal): Promise<string | null> {
    const { enabled, timeoutMs, asset } = this.settings;
    if (!enabled) return null;
    if (!(await this.bucket.acquire(timeoutMs, signal))) {
      log.warn("[SUMMARY] rate limit wait exceeded");
      return null;
    }
    const controller = new AbortController();
    const cancel = () => controller.abort();
    signal?.addEventListener("abort", cancel, { once: true });
    try {
      const prompt = commentaryPrompt(factsToText(facts), asset.split(/[-/]/)[0] ?? asset);
      const answer = await withTimeout(
        this.llm.complete(prompt, { signal: controller.signal, maxTokens: 400 }),
        timeoutMs,
        () => new Error(`commentary timeout after ${timeoutMs}ms`)
      );
      return answer.trim() || null;
    } catch (err) {
      controller.abort();
      log.warn("[SUMMARY] commentary failed", errorMessage(err));
      return null;
    } finally {
      signal?.removeEventListener("abort", cancel);
    }
  }
}
