import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MarketDB } from "../db/MarketDB.js";
import { OracleUnavailable } from "../errors.js";
import { EventBus } from "../events/EventBus.js";
import { TokenBucket } from "../runtime/tokenBucket.js";
import { FakeLlm, FakeOracle, T0, never, testConfig } from "../testing/fixtures.js";
import type { RawItem } from "../types.js";
import { IngestPipeline, hintFor } from "./ingest.js";
import { Normalizer, RecentHashCache } from "./normalize.js";
import { RelevanceClassifier } from "./relevance.js";
import { ScoringAdapter, type SentimentResult } from "./sentiment.js";

const RELEVANT = '{"relevant": true, "confidence": 0.9, "labels": ["etf"], "reason": "flows"}';

const raw = (text: string, over: Partial<RawItem> = {}): RawItem => ({
  source: "feed",
  asset: "ETH-USD",
  timestamp: T0,
  text,
  ...over,
});

describe("IngestPipeline", () => {
  const cfg = testConfig();
  let db: MarketDB;
  let bus: EventBus;

  beforeEach(() => {
    db = new MarketDB(":memory:");
    bus = new EventBus(20);
  });
  afterEach(() => {
    db.close();
    vi.restoreAllMocks();
  });

  function pipeline(
    oracleFn: (text: string) => SentimentResult | Promise<SentimentResult>,
    llmFn: (prompt: string, call: number) => Promise<string>
  ) {
    const oracle = new FakeOracle(oracleFn);
    const llm = new FakeLlm(llmFn);
    const normalizer = new Normalizer(db, cfg.spam, new RecentHashCache(100, 60_000));
    const scorer = new ScoringAdapter(oracle, 100);
    const classifier = new RelevanceClassifier(llm, new TokenBucket(100), {
      enabled: true,
      timeoutMs: 30,
      minConfidence: 0.6,
      assetName: "ETH-USD",
    });
    return { oracle, llm, ingest: new IngestPipeline(db, normalizer, scorer, classifier, bus, 0.6) };
  }

  it("stores a repeated headline once", async () => {
    const { ingest, oracle } = pipeline(
      () => ({ score: 0.5, label: "positive" }),
      async () => RELEVANT
    );
    const text = "Ethereum ETF sees record inflows";
    const stats = await ingest.ingestBatch([raw(text), raw(text), raw(`  ${text.toUpperCase()} `)], "feed");

    expect(stats).toMatchObject({ received: 3, inserted: 1, duplicates: 2, rejected: 0, failed: 0, unscored: 0 });
    expect(oracle.calls).toHaveLength(1);
    const [item] = db.listItems({ limit: 10 });
    expect(item).toMatchObject({
      text,
      score: 0.5,
      label: "positive",
      lowRelevance: false,
      relevance: { relevant: true, confidence: 0.9, labels: ["etf"], reason: "flows" },
    });

    const evt = bus.since(0).events[0];
    expect(evt?.summary).toBe("1 new items (feed)");
    expect(evt?.payload.count).toBe(1);
    expect(evt?.payload.source).toBe("feed");
  });

  it("keeps going when the classifier times out on one item", async () => {
    const { ingest } = pipeline(
      () => ({ score: 0.1, label: "neutral" }),
      (_prompt, call) => (call === 1 ? never<string>() : Promise.resolve(RELEVANT))
    );
    const stats = await ingest.ingestBatch([
      raw("Ethereum developers schedule upgrade", { timestamp: T0 }),
      raw("Ethereum staking deposits climb again", { timestamp: T0 + 1 }),
    ]);

    expect(stats).toMatchObject({ received: 2, inserted: 2, unclassified: 1, lowRelevance: 0 });
    const [first, second] = db.listItems({ limit: 10, order: "asc" });
    expect(first?.relevance).toBeNull();
    expect(first?.lowRelevance).toBe(false);
    expect(second?.relevance?.relevant).toBe(true);
  });

  it("stores an unscored item when the oracle is down and flags low relevance", async () => {
    const { ingest } = pipeline(
      () => {
        throw new OracleUnavailable("HTTP 503");
      },
      async () => '{"relevant": false, "confidence": 0.95, "labels": [], "reason": "meme"}'
    );
    const stats = await ingest.ingestBatch([raw("Ethereum meme of the day goes viral")]);

    expect(stats).toMatchObject({ inserted: 1, unscored: 1, lowRelevance: 1, unclassified: 0 });
    const [item] = db.listItems({ limit: 1 });
    expect(item?.score).toBe(0);
    expect(item?.label).toBe("unscored");
    expect(item?.lowRelevance).toBe(true);
  });

  it("counts rejected items by reason and scores social posts as social", async () => {
    const { ingest, oracle } = pipeline(
      () => ({ score: 0.2, label: "positive" }),
      async () => RELEVANT
    );
    const stats = await ingest.ingestBatch([
      raw("eth up"),
      raw("gm frens, bitcoin to the moon today", { source: "social" }),
      raw("$ETH breaking out of the range this week", { source: "social", url: "https://x.example/1" }),
    ]);

    expect(stats).toMatchObject({ received: 3, inserted: 1, rejected: 2 });
    expect(stats.rejectReasons).toEqual({ too_short: 1, off_topic: 1 });
    expect(oracle.calls).toEqual([{ text: "$ETH breaking out of the range this week", hint: "social" }]);
    expect(db.listItems({ limit: 1 })[0]?.url).toBe("https://x.example/1");
    expect(bus.latestId).toBe(1);
  });

  it("logs one summary line per batch with every counter", async () => {
    const info = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { ingest } = pipeline(
      () => {
        throw new OracleUnavailable("HTTP 503");
      },
      async () => "no json here"
    );
    await ingest.ingestBatch([raw("eth up"), raw("Ethereum gas fees fall to a yearly low")], "feed");

    const line = info.mock.calls.find((c) => c[2] === "[INGEST] feed");
    expect(line?.[3]).toEqual({
      received: 2,
      inserted: 1,
      duplicates: 0,
      rejected: 1,
      failed: 0,
      unscored: 1,
      unclassified: 1,
      lowRelevance: 0,
      rejectReasons: { too_short: 1 },
    });
  });

  it("emits nothing when no item is stored", async () => {
    const { ingest } = pipeline(
      () => ({ score: 0, label: "neutral" }),
      async () => RELEVANT
    );
    await ingest.ingestBatch([raw("eth up")]);
    expect(bus.latestId).toBe(0);
  });
});

describe("hintFor", () => {
  it("routes social posts to the social model", () => {
    expect(hintFor("social")).toBe("social");
    expect(hintFor("feed")).toBe("news");
    expect(hintFor("notification")).toBe("news");
  });
});
