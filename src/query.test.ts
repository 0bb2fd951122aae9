import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MarketDB } from "./db/MarketDB.js";
import { EventBus } from "./events/EventBus.js";
import { QueryService } from "./query.js";
import { HealthTracker } from "./runtime/health.js";
import { MIN, T0, flatCandles, makeItem, makeSignal } from "./testing/fixtures.js";

const SCOPE = { asset: "ETH-USD", symbol: "ETHUSDT", timeframe: "1m" };

describe("QueryService", () => {
  let db: MarketDB;
  let bus: EventBus;
  let health: HealthTracker;
  let q: QueryService;

  beforeEach(() => {
    db = new MarketDB(":memory:");
    bus = new EventBus(10);
    health = new HealthTracker(3);
    q = new QueryService(db, bus, health, SCOPE, () => [], () => T0 + 30_000);
  });
  afterEach(() => db.close());

  it("buckets mentions per minute with empty minutes filled", () => {
    db.insertItem(makeItem({ ts: T0 - 3 * MIN }));
    db.insertItem(makeItem({ ts: T0 - 2 * MIN + 10_000 }));
    db.insertItem(makeItem({ ts: T0 + 5_000 }));
    db.insertItem(makeItem({ ts: T0 + 5_000, asset: "BTC-USD" }));

    expect(q.mentionSeries(3)).toEqual([
      { minute: T0 - 2 * MIN, count: 1 },
      { minute: T0 - MIN, count: 0 },
      { minute: T0, count: 1 },
    ]);
  });

  it("reports the latest signal and degraded dependencies", () => {
    expect(q.state()).toMatchObject({ asset: "ETH-USD", now: T0 + 30_000, signal: null, degraded: [], lastEventId: 0 });

    for (let i = 0; i < 3; i++) health.failure("oracle", "HTTP 503");
    health.failure("prices", "timeout");
    db.insertSignal({
      asset: "ETH-USD",
      ts: T0,
      ema15: 0.1,
      mentions: 1,
      mentions_z: 0,
      baseline_7d: 1,
      alpha: 0.05,
      action: "hold",
      price_close: null,
      rsi14: null,
      macd: null,
      macd_signal: null,
      atr_pct: null,
      price_bias: null,
    });
    bus.emit("state", "ready");

    const s = q.state();
    expect(s.degraded).toEqual(["oracle"]);
    expect(s.signal?.action).toBe("hold");
    expect(s.lastEventId).toBe(1);
    expect(q.listSignals(10)).toHaveLength(1);
  });

  it("scopes item queries to the asset and clamps limits", () => {
    db.insertItem(makeItem({ ts: T0 - MIN, score: 0.5 }));
    db.insertItem(makeItem({ ts: T0, score: -0.5 }));
    db.insertItem(makeItem({ ts: T0, asset: "BTC-USD" }));

    expect(q.listItems(0)).toHaveLength(1);
    expect(q.listItems(100)).toHaveLength(2);
    expect(q.listItems(100, { maxScore: 0 }).map((i) => i.score)).toEqual([-0.5]);
  });

  it("ranks recent impact", () => {
    const recent = makeItem({ ts: T0 - 60 * MIN });
    const old = makeItem({ ts: T0 - 30 * 60 * MIN });
    db.insertItem(recent);
    db.insertItem(old);
    db.writeImpact(recent.id, 15, 0.1, {});
    db.writeImpact(old.id, 15, 0.9, {});

    expect(q.topImpact(5).map((i) => i.id)).toEqual([recent.id]);
    expect(q.topImpact(5, 48).map((i) => i.id)).toEqual([old.id, recent.id]);
  });

  it("exposes the event log", () => {
    const seen: number[] = [];
    const off = q.subscribe((e) => seen.push(e.id));
    bus.emit("item", "a");
    off();
    bus.emit("item", "b");
    expect(seen).toEqual([1]);
    expect(q.eventsSince(1).events.map((e) => e.summary)).toEqual(["b"]);
  });

  it("serves price and signal series for the scoped asset", () => {
    db.upsertCandles("ETHUSDT", "1m", flatCandles(T0 - 20 * MIN, 21));
    db.upsertCandles("BTCUSDT", "1m", flatCandles(T0 - 5 * MIN, 6));
    db.upsertCandles("ETHUSDT", "5m", flatCandles(T0 - 5 * MIN, 2, 5 * MIN));
    for (const ts of [T0 - 20 * MIN, T0 - 5 * MIN, T0]) db.insertSignal(makeSignal({ ts }));
    db.insertSignal(makeSignal({ ts: T0, asset: "BTC-USD" }));

    // window starts at T0 - 9.5 min
    const candles = q.priceSeries(10);
    expect(candles).toHaveLength(10);
    expect(candles[0]?.ts).toBe(T0 - 9 * MIN);
    expect(candles[9]?.ts).toBe(T0);
    expect(q.signalSeries(10).map((s) => s.ts)).toEqual([T0 - 5 * MIN, T0]);
    expect(q.signalSeries().map((s) => s.ts)).toEqual([T0 - 20 * MIN, T0 - 5 * MIN, T0]);
  });

  it("bundles the series for a first load and clamps the window", () => {
    db.upsertCandles("ETHUSDT", "1m", flatCandles(T0 - 2 * MIN, 3));
    db.insertSignal(makeSignal({ ts: T0 - MIN }));
    db.insertItem(makeItem({ ts: T0 }));

    const b = q.bootstrap(3);
    expect(b.minutes).toBe(3);
    expect(b.mentions.map((p) => p.count)).toEqual([0, 0, 1]);
    expect(b.candles.map((c) => c.ts)).toEqual([T0 - 2 * MIN, T0 - MIN, T0]);
    expect(b.signals.map((s) => s.ts)).toEqual([T0 - MIN]);

    expect(q.bootstrap(0).minutes).toBe(1);
    expect(q.bootstrap(1e9).minutes).toBe(7 * 24 * 60);
    expect(q.bootstrap(Number.NaN).minutes).toBe(240);
    expect(q.bootstrap().mentions).toHaveLength(240);
  });
});
