// src/pipeline/ingest.ts
import type { MarketDB } from "../db/MarketDB.js";
import { errorMessage } from "../errors.js";
import type { EventBus } from "../events/EventBus.js";
import { log } from "../logger.js";
import type { DomainHint, Item, ItemSource, RawItem } from "../types.js";
import type { Normalizer } from "./normalize.js";
import { isLowRelevance, type RelevanceClassifier } from "./relevance.js";
import { UNSCORED, type ScoringAdapter } from "./sentiment.js";
import type { SpamReason } from "./spam.js";

export type IngestStats = {
  received: number;
  inserted: number;
  duplicates: number;
  rejected: number;
  failed: number;
  unscored: number;
  unclassified: number;
  lowRelevance: number;
  rejectReasons: Partial<Record<SpamReason, number>>;
};

export const hintFor = (source: ItemSource): DomainHint => (source === "social" ? "social" : "news");

const emptyStats = (): IngestStats => ({
  received: 0,
  inserted: 0,
  duplicates: 0,
  rejected: 0,
  failed: 0,
  unscored: 0,
  unclassified: 0,
  lowRelevance: 0,
  rejectReasons: {},
});

/**
 * normalize → filter → score + classify → persist. Items are handled one
 * after another; a failure on one item never stops the rest of the batch.
 */
export class IngestPipeline {
  constructor(
    private readonly db: MarketDB,
    private readonly normalizer: Normalizer,
    private readonly scorer: ScoringAdapter,
    private readonly classifier: RelevanceClassifier,
    private readonly bus: EventBus,
    private readonly minConfidence: number
  ) {}

  async ingestBatch(raws: RawItem[], label = "batch"): Promise<IngestStats> {
    const stats = emptyStats();
    const stored: Item[] = [];

    for (const raw of raws) {
      stats.received += 1;
      try {
        const item = await this.ingestOne(raw, stats);
        if (item) stored.push(item);
      } catch (err) {
        stats.failed += 1;
        log.error("[INGEST] item failed", { source: raw.source, err: errorMessage(err) });
      }
    }

    if (stored.length) {
      this.bus.emit("item", `${stored.length} new items (${label})`, {
        count: stored.length,
        source: label,
        items: stored.slice(0, 20).map((i) => ({
          id: i.id,
          source: i.source,
          ts: i.ts,
          score: i.score,
          label: i.label,
          lowRelevance: i.lowRelevance,
          text: i.text.slice(0, 160),
        })),
      });
    }
    log.info(`[INGEST] ${label}`, stats);
    return stats;
  }

  private async ingestOne(raw: RawItem, stats: IngestStats): Promise<Item | null> {
    const outcome = this.normalizer.prepare(raw);
    if (outcome.kind === "duplicate") {
      stats.duplicates += 1;
      return null;
    }
    if (outcome.kind === "rejected") {
      stats.rejected += 1;
      for (const r of outcome.reasons) stats.rejectReasons[r] = (stats.rejectReasons[r] ?? 0) + 1;
      log.debug("[INGEST] rejected", { id: outcome.id.slice(0, 12), reasons: outcome.reasons });
      return null;
    }

    const { id, text } = outcome.item;
    const [sentiment, cls] = await Promise.all([
      this.scorer.score(text, hintFor(raw.source)),
      this.classifier.classify(text),
    ]);
    if (sentiment.label === UNSCORED.label) stats.unscored += 1;
    const relevance = cls.status === "ok" ? cls.result : null;
    if (!relevance) stats.unclassified += 1;
    const low = isLowRelevance(relevance, this.minConfidence);
    if (low) stats.lowRelevance += 1;

    const item: Item = {
      id,
      source: raw.source,
      asset: raw.asset,
      ts: raw.timestamp,
      text,
      score: sentiment.score,
      label: sentiment.label,
      relevance,
      lowRelevance: low,
      impact: null,
      impactMeta: null,
      url: raw.url ?? null,
    };

    // the primary key has the final say on duplicates
    if (!this.db.insertItem(item)) {
      stats.duplicates += 1;
      this.normalizer.remember(id);
      return null;
    }
    this.normalizer.remember(id);
    stats.inserted += 1;
    return item;
  }
}
