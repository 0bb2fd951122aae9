import { describe, expect, it } from "vitest";
import type { AlphaWeights } from "../config.js";
import { combineAlpha, decideAction, normalizeFeatures, riskMultiplier, type FeatureVector, type Thresholds } from "./alpha.js";

const NO_PRICE: FeatureVector = {
  ema15: 0,
  mentions_z: 0,
  price_close: null,
  rsi14: null,
  macd: null,
  macd_signal: null,
  atr_pct: null,
  price_bias: null,
  pct_change_15m: null,
  pct_change_1h: null,
  high_4h: null,
  low_4h: null,
};

const DEFAULT_WEIGHTS: AlphaWeights = {
  sentiment: 0.35,
  mentions: 0.25,
  momentum: 0.2,
  rsi: 0.05,
  macd: 0.05,
  priceBias: 0.05,
  breakout: 0.05,
};
const NONE: AlphaWeights = { sentiment: 0, mentions: 0, momentum: 0, rsi: 0, macd: 0, priceBias: 0, breakout: 0 };
const thresholds: Thresholds = { thresholdUp: 0.33, thresholdDown: -0.33, hysteresis: 0 };

describe("normalizeFeatures", () => {
  it("maps each feature into [-1, 1]", () => {
    const n = normalizeFeatures({
      ...NO_PRICE,
      ema15: 1.4,
      mentions_z: 2,
      price_close: 100,
      rsi14: 20,
      macd: 0.2,
      macd_signal: 0.1,
      atr_pct: 1,
      price_bias: 2,
    });
    expect(n.sentiment).toBe(1);
    expect(n.mentions).toBe(0.5);
    expect(n.rsi).toBeCloseTo(1 / 3, 12);
    expect(n.macd).toBeCloseTo(Math.tanh(1), 12);
    expect(n.priceBias).toBe(1);
  });

  it("reads RSI as contrarian with a neutral band", () => {
    expect(normalizeFeatures({ ...NO_PRICE, rsi14: 85 }).rsi).toBe(-0.5);
    expect(normalizeFeatures({ ...NO_PRICE, rsi14: 50 }).rsi).toBe(0);
  });

  it("leaves missing price features out", () => {
    expect(normalizeFeatures(NO_PRICE)).toEqual({ sentiment: 0, mentions: 0 });
  });

  it("blends 15m and 1h momentum as clipped z-scores", () => {
    // z15 = 0.5 / 0.5 = 1, z1h = 2 / 1 = 2 → (0.6 + 0.8) / 4
    expect(normalizeFeatures({ ...NO_PRICE, pct_change_15m: 0.5, pct_change_1h: 2 }).momentum).toBeCloseTo(0.35, 12);
    // z15 clipped at 4, missing 1h counts as flat
    expect(normalizeFeatures({ ...NO_PRICE, pct_change_15m: 10 }).momentum).toBeCloseTo(0.6, 12);
    expect(normalizeFeatures({ ...NO_PRICE, pct_change_15m: -10, pct_change_1h: -10 }).momentum).toBe(-1);
  });

  it("flags a close beyond the prior 4h range", () => {
    const range = { ...NO_PRICE, high_4h: 100.9, low_4h: 99.1 };
    expect(normalizeFeatures({ ...range, price_close: 101 }).breakout).toBe(1);
    expect(normalizeFeatures({ ...range, price_close: 100.95 }).breakout).toBe(0);
    expect(normalizeFeatures({ ...range, price_close: 99 }).breakout).toBe(-1);
    expect(normalizeFeatures({ ...NO_PRICE, price_close: 101, high_4h: null, low_4h: 99.1 }).breakout).toBeUndefined();
  });
});

describe("combineAlpha", () => {
  it("weights the available features", () => {
    const r = combineAlpha(
      { ...NO_PRICE, ema15: 0.8, mentions_z: 4, price_close: 100, rsi14: 50, macd: 0.1, macd_signal: 0.1, atr_pct: 1, price_bias: 0.5 },
      { ...NONE, sentiment: 0.6, mentions: 0.2, rsi: 0.1, macd: 0.05, priceBias: 0.05 }
    );
    expect(r.raw).toBeCloseTo(0.705, 12);
    expect(r.alpha).toBeCloseTo(0.705, 12);
    expect(r.riskMult).toBe(1);
    expect(decideAction(r.alpha, thresholds)).toBe("accumulate");
  });

  it("lets momentum and breakouts move alpha", () => {
    const f = { ...NO_PRICE, ema15: 0.2, price_close: 101, pct_change_15m: 0.5, pct_change_1h: 2, high_4h: 100.9, low_4h: 99.1 };
    const r = combineAlpha(f, { ...NONE, sentiment: 0.5, momentum: 0.3, breakout: 0.2 });
    // 0.5 * 0.2 + 0.3 * 0.35 + 0.2 * 1
    expect(r.alpha).toBeCloseTo(0.405, 12);
    expect(r.contributions).toEqual({ sentiment: 0.2, momentum: expect.closeTo(0.35, 12), breakout: 1 });
  });

  it("renormalizes over sentiment and activity when prices are missing", () => {
    const r = combineAlpha({ ...NO_PRICE, ema15: 0.5, mentions_z: 2 }, DEFAULT_WEIGHTS);
    expect(r.alpha).toBeCloseTo(0.5, 12);
    expect(Object.keys(r.contributions)).toEqual(["sentiment", "mentions"]);
  });

  it("ignores features with zero weight", () => {
    const r = combineAlpha({ ...NO_PRICE, ema15: -0.6, mentions_z: 4 }, { ...DEFAULT_WEIGHTS, mentions: 0 });
    expect(r.alpha).toBeCloseTo(-0.6, 12);
  });

  it("scales down in volatile markets", () => {
    expect(riskMultiplier(null)).toBe(1);
    expect(riskMultiplier(2)).toBe(1);
    expect(riskMultiplier(3)).toBe(0.85);
    expect(riskMultiplier(5)).toBe(0.7);

    const r = combineAlpha({ ...NO_PRICE, ema15: 0.5, mentions_z: 2, atr_pct: 5 }, DEFAULT_WEIGHTS);
    expect(r.raw).toBeCloseTo(0.5, 12);
    expect(r.alpha).toBeCloseTo(0.35, 12);
  });

  it("never decreases as sentiment rises", () => {
    let prev = -Infinity;
    for (let s = -1; s <= 1.0001; s += 0.1) {
      const { alpha } = combineAlpha({ ...NO_PRICE, ema15: s, mentions_z: 1, price_close: 100, rsi14: 40, macd: 0.05, macd_signal: 0, price_bias: -0.3, atr_pct: 3 }, DEFAULT_WEIGHTS);
      expect(alpha).toBeGreaterThanOrEqual(prev);
      expect(Math.abs(alpha)).toBeLessThanOrEqual(1);
      prev = alpha;
    }
  });
});

describe("decideAction", () => {
  it("includes the thresholds themselves", () => {
    expect(decideAction(0.33, thresholds)).toBe("accumulate");
    expect(decideAction(-0.33, thresholds)).toBe("wait");
    expect(decideAction(0.329, thresholds)).toBe("hold");
    expect(decideAction(0, thresholds, "accumulate")).toBe("hold");
  });

  it("keeps the previous action inside the hysteresis band", () => {
    const t = { ...thresholds, hysteresis: 0.1 };
    expect(decideAction(0.25, t, "accumulate")).toBe("accumulate");
    expect(decideAction(0.2, t, "accumulate")).toBe("hold");
    expect(decideAction(-0.25, t, "wait")).toBe("wait");
    expect(decideAction(0.25, t, "hold")).toBe("hold");
    expect(decideAction(0.25, t)).toBe("hold");
  });
});
