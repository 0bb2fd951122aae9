// src/marketdata/prices.ts
import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { MarketDB } from "../db/MarketDB.js";
import { TransientIngestError, errorMessage, httpStatusOf, retryAfterMsOf } from "../errors.js";
import type { EventBus } from "../events/EventBus.js";
import { log } from "../logger.js";
import type { HealthTracker } from "../runtime/health.js";
import type { Candle } from "../types.js";

const num = z.union([z.number(), z.string()]).pipe(z.coerce.number());

/** [openTime, open, high, low, close, volume, closeTime, ...] */
const KlineSchema = z
  .tuple([z.number(), num, num, num, num, num])
  .rest(z.unknown())
  .transform(
    ([ts, open, high, low, close, volume]): Candle => ({ ts, open, high, low, close, volume })
  );

const KlinesSchema = z.array(KlineSchema);

export function parseKlines(data: unknown): Candle[] {
  const parsed = KlinesSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`unexpected klines payload: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data.filter((c) => Number.isFinite(c.close) && c.close > 0);
}

export interface CandleSource {
  fetchCandles(symbol: string, timeframe: string, limit: number, signal?: AbortSignal): Promise<Candle[]>;
}

/** Binance-compatible REST klines. */
export class PriceFeed implements CandleSource {
  private readonly http: AxiosInstance;

  constructor(apiBase: string, timeoutMs: number, http?: AxiosInstance) {
    this.http = http ?? axios.create({ baseURL: apiBase, timeout: timeoutMs });
  }

  async fetchCandles(symbol: string, timeframe: string, limit: number, signal?: AbortSignal): Promise<Candle[]> {
    try {
      const { data } = await this.http.get<unknown>("/api/v3/klines", {
        params: { symbol, interval: timeframe, limit },
        signal,
      });
      return parseKlines(data);
    } catch (err) {
      const status = httpStatusOf(err);
      if (status === 429 || status === 418 || (status !== undefined && status >= 500)) {
        throw new TransientIngestError(`klines HTTP ${status}`, retryAfterMsOf(err), { cause: err });
      }
      throw err;
    }
  }
}

export type PricePollSettings = {
  symbol: string;
  timeframe: string;
  maxCandles: number;
};

/** One poll: fetch, upsert, announce the last close. */
export async function pollPrices(
  source: CandleSource,
  db: MarketDB,
  bus: EventBus,
  settings: PricePollSettings,
  health?: HealthTracker,
  signal?: AbortSignal
): Promise<number> {
  let candles: Candle[];
  try {
    candles = await source.fetchCandles(settings.symbol, settings.timeframe, settings.maxCandles, signal);
    health?.success("prices");
  } catch (err) {
    health?.failure("prices", errorMessage(err));
    throw err;
  }
  if (!candles.length) return 0;

  const n = db.upsertCandles(settings.symbol, settings.timeframe, candles);
  const last = candles[candles.length - 1];
  log.debug("[PRICES] upserted", { symbol: settings.symbol, n, close: last.close });
  bus.emit("state", `${settings.symbol} ${last.close}`, {
    kind: "price",
    symbol: settings.symbol,
    timeframe: settings.timeframe,
    ts: last.ts,
    close: last.close,
  });
  return n;
}
