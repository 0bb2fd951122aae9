import { describe, expect, it } from "vitest";
import { MarketDB } from "../db/MarketDB.js";
import { T0, makeItem, testConfig } from "../testing/fixtures.js";
import type { RawItem } from "../types.js";
import { Normalizer, RecentHashCache, itemId, normalizeText } from "./normalize.js";

const raw = (text: string, over: Partial<RawItem> = {}): RawItem => ({
  source: "feed",
  asset: "ETH-USD",
  timestamp: T0,
  text,
  ...over,
});

describe("normalizeText / itemId", () => {
  it("folds case and whitespace", () => {
    expect(normalizeText("  Ethereum\tETF \n News ")).toBe("ethereum etf news");
  });

  it("keys on source, asset and normalized text", () => {
    const a = itemId("ethereum etf news", "feed", "ETH-USD");
    expect(a).toMatch(/^[0-9a-f]{64}$/);
    expect(itemId("ethereum etf news", "feed", "ETH-USD")).toBe(a);
    expect(itemId("ethereum etf news", "social", "ETH-USD")).not.toBe(a);
    expect(itemId("ethereum etf news", "feed", "BTC-USD")).not.toBe(a);
  });
});

describe("RecentHashCache", () => {
  it("evicts the oldest entry past its size", () => {
    const c = new RecentHashCache(2, 60_000);
    c.add("a");
    c.add("b");
    c.add("c");
    expect(c.size).toBe(2);
    expect(c.has("a")).toBe(false);
    expect(c.has("c")).toBe(true);
  });

  it("forgets entries older than the ttl", () => {
    let t = 0;
    const c = new RecentHashCache(10, 1000, () => t);
    c.add("a");
    t = 1000;
    expect(c.has("a")).toBe(true);
    t = 1001;
    expect(c.has("a")).toBe(false);
    expect(c.size).toBe(0);
  });
});

describe("Normalizer", () => {
  const cfg = testConfig();

  it("accepts clean text and collapses its whitespace", () => {
    const db = new MarketDB(":memory:");
    const n = new Normalizer(db, cfg.spam, new RecentHashCache(100, 60_000));
    const out = n.prepare(raw("Ethereum  ETF sees\nrecord inflows"));
    expect(out.kind).toBe("accepted");
    if (out.kind === "accepted") {
      expect(out.item.text).toBe("Ethereum ETF sees record inflows");
      expect(out.item.id).toBe(itemId("ethereum etf sees record inflows", "feed", "ETH-USD"));
    }
    db.close();
  });

  it("treats a remembered or stored id as a duplicate", () => {
    const db = new MarketDB(":memory:");
    const n = new Normalizer(db, cfg.spam, new RecentHashCache(100, 60_000));
    const first = n.prepare(raw("Ethereum ETF sees record inflows"));
    if (first.kind !== "accepted") throw new Error("expected accepted");
    n.remember(first.item.id);
    expect(n.prepare(raw("ETHEREUM etf sees   record inflows"))).toEqual({ kind: "duplicate", id: first.item.id });

    db.insertItem(makeItem({ id: first.item.id }));
    const fresh = new Normalizer(db, cfg.spam, new RecentHashCache(100, 60_000));
    expect(fresh.prepare(raw("Ethereum ETF sees record inflows")).kind).toBe("duplicate");
    db.close();
  });

  it("applies the rules of the item's source", () => {
    const db = new MarketDB(":memory:");
    const n = new Normalizer(db, cfg.spam, new RecentHashCache(100, 60_000));
    const short = n.prepare(raw("eth up"));
    expect(short.kind === "rejected" && short.reasons).toEqual(["too_short"]);

    const social = n.prepare(raw("bitcoin to the moon, buy now friends", { source: "social" }));
    expect(social.kind === "rejected" && social.reasons).toEqual(["banned_keyword", "off_topic"]);
    db.close();
  });
});
