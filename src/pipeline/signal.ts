// src/pipeline/signal.ts
import type { AlphaWeights } from "../config.js";
import type { MarketDB } from "../db/MarketDB.js";
import { ComputeTickOverlap } from "../errors.js";
import type { EventBus } from "../events/EventBus.js";
import { log } from "../logger.js";
import type { TransitionNotifier } from "../notify/discord.js";
import type { Signal, TechnicalFields } from "../types.js";
import type { RollingAggregator } from "./aggregate.js";
import { combineAlpha, decideAction, type NormalizedFeatures, type Thresholds } from "./alpha.js";
import { computeIndicators } from "./indicators.js";

export type SignalSettings = Thresholds & {
  asset: string;
  weights: AlphaWeights;
  symbol: string;
  timeframe: string;
  timeframeMinutes: number;
  priceLookbackMs: number;
};

export type TickResult =
  | { status: "written"; signal: Signal; contributions: NormalizedFeatures }
  | { status: "duplicate"; ts: number }
  | { status: "skipped"; reason: "overlap" };

/**
 * One compute tick per asset at a time. A tick reads the item and price
 * windows, derives the signal, appends it and announces it.
 */
export class SignalEngine {
  private readonly inFlight = new Set<string>();

  constructor(
    private readonly db: MarketDB,
    private readonly aggregator: RollingAggregator,
    private readonly bus: EventBus,
    private readonly settings: SignalSettings,
    private readonly notifier?: TransitionNotifier
  ) {}

  private technicals(now: number): TechnicalFields | null {
    const { symbol, timeframe, timeframeMinutes, priceLookbackMs } = this.settings;
    const candles = this.db.candles(symbol, timeframe, now - priceLookbackMs, now);
    return computeIndicators(candles, timeframeMinutes);
  }

  /** `signal` cancels the transition notification on shutdown. */
  async tick(now = Date.now(), signal?: AbortSignal): Promise<TickResult> {
    const { asset } = this.settings;
    if (this.inFlight.has(asset)) {
      log.warn("[SIGNAL] tick skipped", new ComputeTickOverlap(asset).message);
      return { status: "skipped", reason: "overlap" };
    }
    this.inFlight.add(asset);
    try {
      const sent = this.aggregator.snapshot(asset, now);
      const tech = this.technicals(now);
      const previous = this.db.latestSignal(asset);

      const { alpha, contributions } = combineAlpha(
        {
          ema15: sent.ema15,
          mentions_z: sent.mentions_z,
          price_close: tech?.price_close ?? null,
          rsi14: tech?.rsi14 ?? null,
          macd: tech?.macd ?? null,
          macd_signal: tech?.macd_signal ?? null,
          atr_pct: tech?.atr_pct ?? null,
          price_bias: tech?.price_bias ?? null,
          pct_change_15m: tech?.pct_change_15m ?? null,
          pct_change_1h: tech?.pct_change_1h ?? null,
          high_4h: tech?.high_4h ?? null,
          low_4h: tech?.low_4h ?? null,
        },
        this.settings.weights
      );
      const action = decideAction(alpha, this.settings, previous?.action);

      const next: Signal = {
        asset,
        ts: now,
        ema15: sent.ema15,
        mentions: sent.mentions,
        mentions_z: sent.mentions_z,
        baseline_7d: sent.baseline_7d,
        alpha,
        action,
        price_close: tech?.price_close ?? null,
        rsi14: tech?.rsi14 ?? null,
        macd: tech?.macd ?? null,
        macd_signal: tech?.macd_signal ?? null,
        atr_pct: tech?.atr_pct ?? null,
        price_bias: tech?.price_bias ?? null,
      };

      if (!this.db.insertSignal(next)) {
        log.warn("[SIGNAL] signal already written for tick", { asset, ts: now });
        return { status: "duplicate", ts: now };
      }

      log.info("[SIGNAL]", {
        ema15: +sent.ema15.toFixed(3),
        mentions: sent.mentions,
        z: +sent.mentions_z.toFixed(2),
        alpha: +alpha.toFixed(3),
        action,
        technicals: tech ? "yes" : "none",
      });
      this.bus.emit("signal", `${asset} ${action} (alpha ${alpha.toFixed(2)})`, {
        signal: next,
        contributions,
        vwap: tech?.vwap ?? null,
        pct_change_15m: tech?.pct_change_15m ?? null,
        pct_change_1h: tech?.pct_change_1h ?? null,
      });

      if (previous && previous.action !== action && this.notifier) {
        await this.notifier.notifyTransition(previous, next, signal);
      }
      return { status: "written", signal: next, contributions };
    } finally {
      this.inFlight.delete(asset);
    }
  }
}
