// src/pipeline/alpha.ts
import type { AlphaWeights } from "../config.js";
import type { Action } from "../types.js";

export type FeatureVector = {
  ema15: number;
  mentions_z: number;
  price_close: number | null;
  rsi14: number | null;
  macd: number | null;
  macd_signal: number | null;
  atr_pct: number | null;
  price_bias: number | null;
  pct_change_15m: number | null;
  pct_change_1h: number | null;
  high_4h: number | null;
  low_4h: number | null;
};

export type Feature = keyof AlphaWeights;

export const FEATURES: readonly Feature[] = [
  "sentiment",
  "mentions",
  "momentum",
  "rsi",
  "macd",
  "priceBias",
  "breakout",
];

/** Normalized feature values; a missing feature is absent, not zero. */
export type NormalizedFeatures = Partial<Record<Feature, number>>;

export type AlphaResult = {
  alpha: number;
  raw: number;
  riskMult: number;
  contributions: NormalizedFeatures;
};

export type Thresholds = {
  thresholdUp: number;
  thresholdDown: number;
  hysteresis: number;
};

const clamp = (x: number, lo = -1, hi = 1) => Math.max(lo, Math.min(hi, x));

/** z of 4 saturates */
const MENTIONS_Z_SCALE = 4;
/** MACD histogram of 0.1% of price saturates (via tanh) */
const MACD_SCALE = 0.001;
/** 1% deviation from VWAP saturates */
const PRICE_BIAS_SCALE = 1;
/** % moves counted as one sigma; each z is clipped at MOMENTUM_Z_CLIP */
const MOMENTUM_SIGMA_15M = 0.5;
const MOMENTUM_SIGMA_1H = 1;
const MOMENTUM_Z_CLIP = 4;
/** close must clear the 4h range by 0.05% */
const BREAKOUT_MARGIN = 0.0005;

function momentumZ(pct15: number | null, pct1h: number | null): number {
  const z = (pct: number | null, sigma: number) =>
    pct === null ? 0 : clamp(pct / sigma, -MOMENTUM_Z_CLIP, MOMENTUM_Z_CLIP);
  return 0.6 * z(pct15, MOMENTUM_SIGMA_15M) + 0.4 * z(pct1h, MOMENTUM_SIGMA_1H);
}

/** Map each available feature into [-1, 1]. */
export function normalizeFeatures(f: FeatureVector): NormalizedFeatures {
  const out: NormalizedFeatures = {
    sentiment: clamp(f.ema15),
    mentions: clamp(f.mentions_z / MENTIONS_Z_SCALE),
  };
  if (f.rsi14 !== null) {
    // oversold is bullish, overbought bearish, neutral in between
    if (f.rsi14 < 30) out.rsi = (30 - f.rsi14) / 30;
    else if (f.rsi14 > 70) out.rsi = -(f.rsi14 - 70) / 30;
    else out.rsi = 0;
  }
  if (f.macd !== null && f.macd_signal !== null && f.price_close) {
    out.macd = Math.tanh((f.macd - f.macd_signal) / (f.price_close * MACD_SCALE));
  }
  if (f.price_bias !== null) out.priceBias = clamp(f.price_bias / PRICE_BIAS_SCALE);
  if (f.pct_change_15m !== null || f.pct_change_1h !== null) {
    out.momentum = momentumZ(f.pct_change_15m, f.pct_change_1h) / MOMENTUM_Z_CLIP;
  }
  if (f.price_close !== null && f.high_4h !== null && f.low_4h !== null) {
    if (f.price_close > f.high_4h * (1 + BREAKOUT_MARGIN)) out.breakout = 1;
    else if (f.price_close < f.low_4h * (1 - BREAKOUT_MARGIN)) out.breakout = -1;
    else out.breakout = 0;
  }
  return out;
}

export function riskMultiplier(atrPct: number | null): number {
  if (atrPct === null) return 1;
  if (atrPct > 4) return 0.7;
  if (atrPct > 2) return 0.85;
  return 1;
}

/**
 * Weighted sum of normalized features. Weights are renormalized over the
 * features present, so without price data the decision rests on sentiment
 * and activity alone.
 */
export function combineAlpha(f: FeatureVector, weights: AlphaWeights): AlphaResult {
  const norm = normalizeFeatures(f);
  let num = 0;
  let den = 0;
  const contributions: NormalizedFeatures = {};
  for (const key of FEATURES) {
    const v = norm[key];
    const w = weights[key];
    if (v === undefined || w <= 0) continue;
    num += w * v;
    den += w;
    contributions[key] = v;
  }
  const raw = den > 0 ? num / den : 0;
  const riskMult = riskMultiplier(f.atr_pct);
  return { alpha: clamp(raw * riskMult), raw, riskMult, contributions };
}

/**
 * accumulate at or above the upper threshold, wait at or below the lower
 * one, hold otherwise. With a hysteresis band the previous accumulate/wait
 * is kept until alpha leaves the band around its threshold.
 */
export function decideAction(alpha: number, t: Thresholds, previous?: Action): Action {
  if (alpha >= t.thresholdUp) return "accumulate";
  if (alpha <= t.thresholdDown) return "wait";
  if (t.hysteresis > 0) {
    if (previous === "accumulate" && alpha >= t.thresholdUp - t.hysteresis) return "accumulate";
    if (previous === "wait" && alpha <= t.thresholdDown + t.hysteresis) return "wait";
  }
  return "hold";
}
