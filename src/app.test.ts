import { describe, expect, it } from "vitest";
import { createApp, type AppDeps } from "./app.js";
import { MarketDB } from "./db/MarketDB.js";
import type { CandleSource } from "./marketdata/prices.js";
import type { TransitionNotifier } from "./notify/discord.js";
import { FakeLlm, FakeOracle, MIN, flatCandles, testConfig, waitFor } from "./testing/fixtures.js";
import type { RawItem, Signal } from "./types.js";

class FixedCandles implements CandleSource {
  async fetchCandles() {
    const end = Math.floor(Date.now() / MIN) * MIN;
    return flatCandles(end - 39 * MIN, 40);
  }
}

class NoopNotifier implements TransitionNotifier {
  sent: Signal[] = [];
  async notifyTransition(_previous: Signal, next: Signal) {
    this.sent.push(next);
  }
}

function deps(feed: () => Promise<RawItem[]>): Partial<AppDeps> {
  return {
    db: new MarketDB(":memory:"),
    oracle: new FakeOracle(() => ({ score: 0.6, label: "positive" })),
    llm: new FakeLlm(async () => '{"relevant": true, "confidence": 0.9}'),
    candles: new FixedCandles(),
    notifier: new NoopNotifier(),
    sources: { feed, social: async () => [] },
  };
}

const headline = (text: string): RawItem => ({ source: "feed", asset: "ETH-USD", timestamp: Date.now(), text });

describe("createApp", () => {
  it("wires ingestion, prices and signals through the loop tasks", async () => {
    const app = createApp(testConfig(), deps(async () => [headline("Ethereum ETF sees record inflows")]));
    const signal = new AbortController().signal;

    await app.tasks.feed(signal);
    await app.tasks.prices(signal);
    await app.tasks.signal(signal);
    await app.tasks.impact(signal);

    const state = app.query.state();
    expect(app.query.listItems(10)).toHaveLength(1);
    expect(state.signal?.price_close).toBe(100);
    expect(state.signal?.mentions).toBe(1);
    expect(state.health.feed?.consecutiveFailures).toBe(0);
    expect(state.health.prices?.consecutiveFailures).toBe(0);
    expect(app.bus.since(0).events.map((e) => e.type)).toEqual(["item", "state", "signal"]);
    app.db.close();
  });

  it("records a failing source and rethrows for the loop to retry", async () => {
    const app = createApp(
      testConfig(),
      deps(async () => {
        throw new Error("feed unreachable");
      })
    );
    await expect(app.tasks.feed(new AbortController().signal)).rejects.toThrow("feed unreachable");
    expect(app.health.snapshot().feed?.lastError).toBe("feed unreachable");
    app.db.close();
  });

  it("runs every loop and shuts down cleanly", async () => {
    const app = createApp(testConfig(), deps(async () => []));
    app.orchestrator.start();
    await waitFor(() => app.orchestrator.stats().every((s) => s.iterations >= 1));

    expect(app.query.state().loops.map((l) => l.name)).toEqual(["feed", "social", "prices", "signal", "impact"]);
    expect(await app.orchestrator.stop(1000)).toEqual([]);
    app.db.close();
  });
});
