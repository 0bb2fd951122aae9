// src/pipeline/aggregate.ts
import type { MarketDB, ScorePoint } from "../db/MarketDB.js";

/** 7 days of 15-minute buckets */
export const BASELINE_BUCKETS = 672;

/**
 * Time-aware EMA: the first point seeds, then each point is blended with
 * α = 1 − 2^(−Δt/halfLife), so weight halves every `halfLifeMs` of elapsed
 * time regardless of how many items arrived. Empty input → 0.
 */
export function timeDecayEma(points: ScorePoint[], halfLifeMs: number): number {
  let ema: number | undefined;
  let prevTs = 0;
  for (const p of points) {
    if (ema === undefined) {
      ema = p.score;
    } else {
      const dt = Math.max(0, p.ts - prevTs);
      const a = 1 - Math.pow(2, -dt / halfLifeMs);
      ema = a * p.score + (1 - a) * ema;
    }
    prevTs = p.ts;
  }
  return ema ?? 0;
}

export type Baseline = { mean: number; std: number };

/**
 * Mean and population stddev of per-bucket counts. `timestamps` are
 * bucketed into `buckets` windows of `windowMs` ending at `end` (exclusive).
 */
export function bucketBaseline(timestamps: number[], end: number, windowMs: number, buckets: number): Baseline {
  const counts = new Array<number>(buckets).fill(0);
  for (const ts of timestamps) {
    if (ts >= end) continue;
    const k = Math.floor((end - 1 - ts) / windowMs);
    if (k >= 0 && k < buckets) counts[k] += 1;
  }
  const mean = counts.reduce((a, b) => a + b, 0) / buckets;
  const variance = counts.reduce((a, c) => a + (c - mean) ** 2, 0) / buckets;
  return { mean, std: Math.sqrt(variance) };
}

export function zScore(x: number, b: Baseline, stdFloor: number): number {
  return (x - b.mean) / Math.max(b.std, stdFloor);
}

export type AggregatorSettings = {
  halfLifeMs: number;
  lookbackMs: number;
  mentionsWindowMs: number;
  stdFloor: number;
  excludeLowRelevance: boolean;
};

export type SentimentSnapshot = {
  ema15: number;
  mentions: number;
  mentions_z: number;
  baseline_7d: number;
  baseline_std: number;
  /** items that fed the EMA */
  samples: number;
};

/** Recomputes the sentiment side of a tick from the stored item window. */
export class RollingAggregator {
  constructor(
    private readonly db: MarketDB,
    private readonly settings: AggregatorSettings
  ) {}

  snapshot(asset: string, now: number): SentimentSnapshot {
    const { halfLifeMs, lookbackMs, mentionsWindowMs: w, stdFloor, excludeLowRelevance } = this.settings;

    const points = this.db.itemScores(asset, now - lookbackMs, now, excludeLowRelevance);
    const ema15 = timeDecayEma(points, halfLifeMs);

    const windowStart = now - w;
    const history = this.db.itemTimestamps(asset, windowStart - w * BASELINE_BUCKETS, now, excludeLowRelevance);
    const mentions = history.filter((ts) => ts >= windowStart).length;
    const baseline = bucketBaseline(history, windowStart, w, BASELINE_BUCKETS);

    return {
      ema15,
      mentions,
      mentions_z: zScore(mentions, baseline, stdFloor),
      baseline_7d: baseline.mean,
      baseline_std: baseline.std,
      samples: points.length,
    };
  }
}
