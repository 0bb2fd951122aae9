// src/pipeline/indicators.ts
import type { Candle, TechnicalFields } from "../types.js";

export const MIN_CANDLES = 30;

/** EMA over the whole series, seeded with the first value. */
export function emaSeries(values: number[], period: number): number[] {
  const a = 2 / (period + 1);
  const out: number[] = [];
  let e: number | undefined;
  for (const v of values) {
    e = e === undefined ? v : a * v + (1 - a) * e;
    out.push(e);
  }
  return out;
}

/** Wilder RSI. 50 on a flat series, 100 when there were no losses. */
export function rsi(closes: number[], period = 14): number | null {
  if (period <= 0 || closes.length <= period) return null;
  let gains = 0;
  let losses = 0;
  for (let i = 1; i <= period; i++) {
    const d = closes[i] - closes[i - 1];
    if (d > 0) gains += d;
    else losses -= d;
  }
  let avgGain = gains / period;
  let avgLoss = losses / period;
  for (let i = period + 1; i < closes.length; i++) {
    const d = closes[i] - closes[i - 1];
    avgGain = (avgGain * (period - 1) + Math.max(d, 0)) / period;
    avgLoss = (avgLoss * (period - 1) + Math.max(-d, 0)) / period;
  }
  if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
  return 100 - 100 / (1 + avgGain / avgLoss);
}

export type Macd = { macd: number; signal: number; histogram: number };

export function macd(closes: number[], fast = 12, slow = 26, signal = 9): Macd | null {
  if (closes.length < Math.max(fast, slow) + signal) return null;
  const f = emaSeries(closes, fast);
  const s = emaSeries(closes, slow);
  const line = f.map((v, i) => v - s[i]);
  const sig = emaSeries(line, signal);
  const m = line[line.length - 1];
  const sg = sig[sig.length - 1];
  return { macd: m, signal: sg, histogram: m - sg };
}

/** Wilder-smoothed average true range as a percentage of the last close. */
export function atrPct(candles: Candle[], period = 14): number | null {
  if (candles.length <= period) return null;
  const trs: number[] = [];
  for (let i = 0; i < candles.length; i++) {
    const c = candles[i];
    if (i === 0) {
      trs.push(c.high - c.low);
      continue;
    }
    const prev = candles[i - 1].close;
    trs.push(Math.max(c.high - c.low, Math.abs(c.high - prev), Math.abs(c.low - prev)));
  }
  let atr = trs.slice(0, period).reduce((a, b) => a + b, 0) / period;
  for (let i = period; i < trs.length; i++) atr = (atr * (period - 1) + trs[i]) / period;
  const last = candles[candles.length - 1].close;
  return last > 0 ? (atr / last) * 100 : null;
}

/** VWAP of the last `n` candles on typical price. */
export function vwap(candles: Candle[], n: number): number | null {
  const sub = candles.slice(-Math.max(1, n));
  let num = 0;
  let den = 0;
  for (const c of sub) {
    num += ((c.high + c.low + c.close) / 3) * c.volume;
    den += c.volume;
  }
  return den > 0 ? num / den : null;
}

/** % change of the last close against the close `steps` candles earlier. */
export function pctChange(closes: number[], steps: number): number | null {
  if (closes.length <= steps) return null;
  const ref = closes[closes.length - 1 - steps];
  if (ref === 0) return null;
  return ((closes[closes.length - 1] - ref) / ref) * 100;
}

/** Highest high and lowest low of the `n` candles before the last one. */
export function priorHighLow(candles: Candle[], n: number): { high: number; low: number } | null {
  const prior = candles.slice(Math.max(0, candles.length - 1 - n), -1);
  if (!prior.length) return null;
  return {
    high: Math.max(...prior.map((c) => c.high)),
    low: Math.min(...prior.map((c) => c.low)),
  };
}

/**
 * Technical snapshot over an ascending candle series.
 * Null when there are fewer than MIN_CANDLES candles.
 */
export function computeIndicators(candles: Candle[], timeframeMinutes: number): TechnicalFields | null {
  if (candles.length < MIN_CANDLES) return null;
  const closes = candles.map((c) => c.close);
  const close = closes[closes.length - 1];
  const steps = (minutes: number) => Math.max(1, Math.floor(minutes / timeframeMinutes));

  const m = macd(closes);
  const vwap60 = vwap(candles, steps(60));
  const range4h = priorHighLow(candles, steps(240));
  return {
    price_close: close,
    rsi14: rsi(closes, 14),
    macd: m?.macd ?? null,
    macd_signal: m?.signal ?? null,
    atr_pct: atrPct(candles, 14),
    vwap: vwap60,
    price_bias: vwap60 ? ((close - vwap60) / vwap60) * 100 : null,
    pct_change_15m: pctChange(closes, steps(15)),
    pct_change_1h: pctChange(closes, steps(60)),
    high_4h: range4h?.high ?? null,
    low_4h: range4h?.low ?? null,
  };
}
