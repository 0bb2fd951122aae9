// src/pipeline/normalize.ts
import { createHash } from "crypto";
import type { SpamRules } from "../config.js";
import type { MarketDB } from "../db/MarketDB.js";
import type { ItemSource, RawItem } from "../types.js";
import { evaluateSpam, type SpamReason } from "./spam.js";

/** Case-fold and collapse whitespace. */
export function normalizeText(text: string): string {
  return text.normalize("NFKC").toLowerCase().replace(/\s+/g, " ").trim();
}

/** Dedup key: stable over normalized text, source and asset. */
export function itemId(normText: string, source: ItemSource, asset: string): string {
  return createHash("sha256").update(`${source}|${asset}|${normText}`).digest("hex");
}

/**
 * Recently seen ids, bounded in size and age. Only saves a trip to the
 * store; the items primary key decides what is a duplicate.
 */
export class RecentHashCache {
  private readonly seen = new Map<string, number>();

  constructor(
    private readonly maxSize: number,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  has(id: string): boolean {
    const at = this.seen.get(id);
    if (at === undefined) return false;
    if (this.now() - at > this.ttlMs) {
      this.seen.delete(id);
      return false;
    }
    return true;
  }

  add(id: string) {
    this.seen.delete(id);
    this.seen.set(id, this.now());
    while (this.seen.size > this.maxSize) {
      const oldest = this.seen.keys().next();
      if (oldest.done) break;
      this.seen.delete(oldest.value);
    }
  }

  get size() {
    return this.seen.size;
  }
}

export type PreparedItem = {
  id: string;
  raw: RawItem;
  /** whitespace-collapsed original text (case kept) */
  text: string;
};

export type PrepareOutcome =
  | { kind: "accepted"; item: PreparedItem }
  | { kind: "duplicate"; id: string }
  | { kind: "rejected"; id: string; reasons: SpamReason[] };

/** Dedupes and filters raw items before they reach scoring. */
export class Normalizer {
  constructor(
    private readonly db: MarketDB,
    private readonly rules: Readonly<Record<ItemSource, SpamRules>>,
    private readonly cache: RecentHashCache
  ) {}

  prepare(raw: RawItem): PrepareOutcome {
    const norm = normalizeText(raw.text);
    const id = itemId(norm, raw.source, raw.asset);

    if (this.cache.has(id) || this.db.hasItem(id)) {
      this.cache.add(id);
      return { kind: "duplicate", id };
    }

    const verdict = evaluateSpam(raw, this.rules[raw.source]);
    if (!verdict.accept) return { kind: "rejected", id, reasons: verdict.reasons };

    return {
      kind: "accepted",
      item: { id, raw, text: raw.text.replace(/\s+/g, " ").trim() },
    };
  }

  /** Record an id once it is stored, so repeats short-circuit. */
  remember(id: string) {
    this.cache.add(id);
  }
}
