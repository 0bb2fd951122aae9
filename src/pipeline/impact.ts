// src/pipeline/impact.ts
import type { MarketDB, PendingImpact } from "../db/MarketDB.js";
import { InsufficientPriceHistory } from "../errors.js";
import type { EventBus } from "../events/EventBus.js";
import { log } from "../logger.js";
import type { Candle, ImpactMeta } from "../types.js";

export const HORIZONS = [15, 60] as const;
export type Horizon = (typeof HORIZONS)[number];

const MIN_VOL_SAMPLES = 5;

export type ImpactSettings = {
  asset: string;
  symbol: string;
  timeframe: string;
  timeframeMinutes: number;
  maxAgeMs: number;
  volLookbackMs: number;
  batchSize: number;
};

export type ImpactRunStats = {
  scanned: number;
  written15: number;
  written60: number;
  deferred: number;
};

/** Sample stddev; 0 below two values. */
export function stddev(xs: number[]): number {
  if (xs.length < 2) return 0;
  const m = xs.reduce((a, b) => a + b, 0) / xs.length;
  const v = xs.reduce((a, x) => a + (x - m) ** 2, 0) / (xs.length - 1);
  return Math.sqrt(Math.max(0, v));
}

/** k-step simple returns p[i+k]/p[i] − 1 */
export function kStepReturns(closes: number[], k: number): number[] {
  const out: number[] = [];
  for (let i = 0; i + k < closes.length; i++) {
    if (closes[i] > 0 && closes[i + k] > 0) out.push(closes[i + k] / closes[i] - 1);
  }
  return out;
}

/** First index whose ts >= t (candles ascending), or -1. */
function firstAtOrAfter(candles: Candle[], t: number): number {
  let lo = 0;
  let hi = candles.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (candles[mid].ts < t) lo = mid + 1;
    else hi = mid;
  }
  return lo < candles.length ? lo : -1;
}

export type HorizonImpact = { value: number; ret: number; sigma: number };

/**
 * Forward return from the first candle at/after `itemTs` over `horizon`
 * minutes, divided by twice the stddev of horizon-length returns in the
 * trailing window, clamped to [-1, 1]. Both ends must fall within one
 * timeframe of their target time.
 * @throws InsufficientPriceHistory when either end or the volatility window is missing
 */
export function horizonImpact(
  candles: Candle[],
  itemTs: number,
  horizon: Horizon,
  timeframeMinutes: number,
  volLookbackMs: number
): HorizonImpact {
  const tfMs = timeframeMinutes * 60_000;
  const i0 = firstAtOrAfter(candles, itemTs);
  if (i0 < 0 || candles[i0].ts - itemTs > tfMs) {
    throw new InsufficientPriceHistory("no candle at or after item time");
  }
  const entry = candles[i0];
  const exitAt = entry.ts + horizon * 60_000;
  const i1 = firstAtOrAfter(candles, exitAt);
  if (i1 < 0 || candles[i1].ts - exitAt > tfMs) {
    throw new InsufficientPriceHistory(`no candle ${horizon}m after entry`);
  }

  const k = Math.max(1, Math.round(horizon / timeframeMinutes));
  const trailing = candles
    .filter((c) => c.ts >= entry.ts - volLookbackMs && c.ts <= entry.ts)
    .map((c) => c.close);
  const rets = kStepReturns(trailing, k);
  if (rets.length < MIN_VOL_SAMPLES) {
    throw new InsufficientPriceHistory(`only ${rets.length} ${horizon}m returns in volatility window`);
  }
  const sigma = stddev(rets);
  if (sigma <= 0) throw new InsufficientPriceHistory("flat volatility window");

  const ret = candles[i1].close / entry.close - 1;
  const value = Math.max(-1, Math.min(1, ret / (2 * sigma)));
  return { value, ret, sigma };
}

/**
 * Deferred re-evaluation of stored items against realized price moves.
 * Each horizon is written at most once; items without enough price history
 * are left for a later run.
 */
export class ImpactCalculator {
  constructor(
    private readonly db: MarketDB,
    private readonly settings: ImpactSettings,
    private readonly bus?: EventBus
  ) {}

  runOnce(now = Date.now()): ImpactRunStats {
    const s = this.settings;
    const stats: ImpactRunStats = { scanned: 0, written15: 0, written60: 0, deferred: 0 };
    const pending = this.db.pendingImpactItems(s.asset, now, 15 * 60_000, s.maxAgeMs, s.batchSize);
    if (!pending.length) return stats;

    const first = pending[0].ts;
    const last = pending[pending.length - 1].ts;
    const candles = this.db.candles(
      s.symbol,
      s.timeframe,
      first - s.volLookbackMs,
      last + 60 * 60_000 + s.timeframeMinutes * 60_000
    );

    for (const item of pending) {
      stats.scanned += 1;
      for (const h of HORIZONS) {
        if (!this.missing(item, h) || now < item.ts + h * 60_000) continue;
        try {
          const r = horizonImpact(candles, item.ts, h, s.timeframeMinutes, s.volLookbackMs);
          const meta: ImpactMeta =
            h === 15
              ? { ret15: r.ret, sigma15: r.sigma, computedAt15: now }
              : { ret60: r.ret, sigma60: r.sigma, computedAt60: now };
          if (this.db.writeImpact(item.id, h, r.value, meta)) {
            if (h === 15) stats.written15 += 1;
            else stats.written60 += 1;
          }
        } catch (err) {
          if (!(err instanceof InsufficientPriceHistory)) throw err;
          stats.deferred += 1;
          log.debug("[IMPACT] deferred", { id: item.id.slice(0, 12), horizon: h, reason: err.message });
        }
      }
    }

    const written = stats.written15 + stats.written60;
    if (written) {
      this.bus?.emit("item", `${written} impacts computed`, { source: "impact", ...stats });
    }
    log.info("[IMPACT]", stats);
    return stats;
  }

  private missing(item: PendingImpact, h: Horizon): boolean {
    return h === 15 ? item.impact === null : item.impactMeta.norm60 === undefined;
  }
}
