// src/app.ts
import type { AppConfig } from "./config.js";
import { MarketDB } from "./db/MarketDB.js";
import { errorMessage } from "./errors.js";
import { EventBus } from "./events/EventBus.js";
import { log } from "./logger.js";
import { PriceFeed, pollPrices, type CandleSource } from "./marketdata/prices.js";
import { DiscordNotifier, type TransitionNotifier } from "./notify/discord.js";
import { RollingAggregator } from "./pipeline/aggregate.js";
import { CommentaryService } from "./pipeline/commentary.js";
import { ImpactCalculator } from "./pipeline/impact.js";
import { IngestPipeline } from "./pipeline/ingest.js";
import { OpenAICompletionClient, type CompletionClient } from "./pipeline/llm.js";
import { Normalizer, RecentHashCache } from "./pipeline/normalize.js";
import { RelevanceClassifier } from "./pipeline/relevance.js";
import { HttpSentimentOracle, PolarityAdjuster, ScoringAdapter, type SentimentOracle } from "./pipeline/sentiment.js";
import { SignalEngine } from "./pipeline/signal.js";
import { buildSources, type SourceFetcher } from "./providers/index.js";
import { QueryService } from "./query.js";
import { HealthTracker, type Dependency } from "./runtime/health.js";
import { TokenBucket } from "./runtime/tokenBucket.js";
import { LoopWorker, Orchestrator, type LoopTask } from "./runtime/worker.js";
import type { RawItem } from "./types.js";

/** External collaborators; tests swap these for in-process fakes. */
export type AppDeps = {
  db: MarketDB;
  oracle: SentimentOracle;
  llm: CompletionClient;
  candles: CandleSource;
  notifier: TransitionNotifier;
  sources: { feed: SourceFetcher; social: SourceFetcher };
};

export type LoopName = "feed" | "social" | "signal" | "prices" | "impact";

export type App = {
  cfg: AppConfig;
  db: MarketDB;
  bus: EventBus;
  health: HealthTracker;
  ingest: IngestPipeline;
  signals: SignalEngine;
  impact: ImpactCalculator;
  query: QueryService;
  commentary: CommentaryService;
  tasks: Record<LoopName, LoopTask>;
  orchestrator: Orchestrator;
};

function sourceTask(
  name: "feed" | "social",
  fetch: SourceFetcher,
  ingest: IngestPipeline,
  health: HealthTracker
): LoopTask {
  const dep: Dependency = name;
  return async (signal) => {
    let raws: RawItem[];
    try {
      raws = await fetch(signal);
      health.success(dep);
    } catch (err) {
      health.failure(dep, errorMessage(err));
      throw err;
    }
    if (signal.aborted) return;
    await ingest.ingestBatch(raws, name);
  };
}

/** Construct every component once, from one immutable configuration. */
export function createApp(cfg: AppConfig, overrides: Partial<AppDeps> = {}): App {
  const db = overrides.db ?? new MarketDB(cfg.dbPath);
  const bus = new EventBus(cfg.events.capacity);
  const health = new HealthTracker(cfg.health.degradedAfter);

  const llm =
    overrides.llm ??
    new OpenAICompletionClient({
      baseURL: cfg.llm.baseURL,
      apiKey: cfg.llm.apiKey,
      model: cfg.llm.model,
      timeoutMs: cfg.llm.timeoutMs,
    });
  // one bucket for every LLM call in the process
  const bucket = new TokenBucket(cfg.llm.maxQps);

  const oracle = overrides.oracle ?? new HttpSentimentOracle(cfg.oracle);
  const polarity = cfg.llm.polarityEnabled
    ? new PolarityAdjuster(llm, bucket, {
        enabled: cfg.llm.enabled,
        minConfidence: cfg.llm.polarityMinConfidence,
        timeoutMs: cfg.llm.timeoutMs,
      })
    : undefined;
  const scorer = new ScoringAdapter(oracle, cfg.oracle.timeoutMs, health, polarity);
  const classifier = new RelevanceClassifier(
    llm,
    bucket,
    {
      enabled: cfg.llm.enabled,
      timeoutMs: cfg.llm.timeoutMs,
      minConfidence: cfg.llm.minConfidence,
      assetName: cfg.asset.split(/[-/]/)[0] ?? cfg.asset,
    },
    health
  );

  const normalizer = new Normalizer(db, cfg.spam, new RecentHashCache(cfg.dedup.cacheSize, cfg.dedup.windowMs));
  const ingest = new IngestPipeline(db, normalizer, scorer, classifier, bus, cfg.llm.minConfidence);

  const aggregator = new RollingAggregator(db, {
    ...cfg.aggregation,
    excludeLowRelevance: cfg.llm.excludeLowRelevance,
  });
  const notifier =
    overrides.notifier ??
    new DiscordNotifier({ ...cfg.discord, timeoutMs: cfg.httpTimeoutMs }, health);
  const signals = new SignalEngine(
    db,
    aggregator,
    bus,
    {
      asset: cfg.asset,
      weights: cfg.alpha.weights,
      thresholdUp: cfg.alpha.thresholdUp,
      thresholdDown: cfg.alpha.thresholdDown,
      hysteresis: cfg.alpha.hysteresis,
      symbol: cfg.prices.symbol,
      timeframe: cfg.prices.timeframe,
      timeframeMinutes: cfg.prices.timeframeMinutes,
      priceLookbackMs: cfg.prices.lookbackMs,
    },
    notifier
  );

  const impact = new ImpactCalculator(
    db,
    {
      asset: cfg.asset,
      symbol: cfg.prices.symbol,
      timeframe: cfg.prices.timeframe,
      timeframeMinutes: cfg.prices.timeframeMinutes,
      ...cfg.impact,
    },
    bus
  );

  const candles = overrides.candles ?? new PriceFeed(cfg.prices.apiBase, cfg.httpTimeoutMs);
  const sources = overrides.sources ?? buildSources(cfg);

  const tasks: Record<LoopName, LoopTask> = {
    feed: sourceTask("feed", sources.feed, ingest, health),
    social: sourceTask("social", sources.social, ingest, health),
    signal: async (signal) => {
      await signals.tick(Date.now(), signal);
    },
    prices: async (signal) => {
      await pollPrices(candles, db, bus, cfg.prices, health, signal);
    },
    impact: async () => {
      impact.runOnce();
    },
  };

  const orchestrator = new Orchestrator()
    .add(new LoopWorker("feed", cfg.loops.feedMs, tasks.feed, cfg.retry))
    .add(new LoopWorker("social", cfg.loops.socialMs, tasks.social, cfg.retry))
    .add(new LoopWorker("prices", cfg.loops.pricesMs, tasks.prices, cfg.retry))
    .add(new LoopWorker("signal", cfg.loops.signalMs, tasks.signal, cfg.retry))
    .add(new LoopWorker("impact", cfg.loops.impactMs, tasks.impact, cfg.retry));

  const scope = { asset: cfg.asset, symbol: cfg.prices.symbol, timeframe: cfg.prices.timeframe };
  const query = new QueryService(db, bus, health, scope, () => orchestrator.stats());
  const commentary = new CommentaryService(db, llm, bucket, {
    ...scope,
    ...cfg.commentary,
    enabled: cfg.llm.enabled,
    model: cfg.llm.model,
    timeoutMs: cfg.llm.timeoutMs,
  });

  log.debug("[BOOT] components ready", { asset: cfg.asset, db: cfg.dbPath });
  return { cfg, db, bus, health, ingest, signals, impact, query, commentary, tasks, orchestrator };
}
