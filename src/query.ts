// src/query.ts
import type { ItemQuery, MarketDB, StoreMetrics } from "./db/MarketDB.js";
import type { EventBus, EventListener, EventsPage } from "./events/EventBus.js";
import { DEPENDENCIES, type Dependency, type DependencyHealth, type HealthTracker } from "./runtime/health.js";
import type { WorkerStats } from "./runtime/worker.js";
import type { Candle, Item, ItemSource, Signal } from "./types.js";

export type StateSnapshot = {
  asset: string;
  now: number;
  signal: Signal | null;
  health: Partial<Record<Dependency, DependencyHealth>>;
  degraded: Dependency[];
  loops: WorkerStats[];
  lastEventId: number;
};

export type ItemFilter = Omit<ItemQuery, "limit" | "asset">;

export type MinutePoint = { minute: number; count: number };

/** What the service reads: the tracked asset and its price series. */
export type QueryScope = { asset: string; symbol: string; timeframe: string };

export type Bootstrap = {
  minutes: number;
  mentions: MinutePoint[];
  candles: Candle[];
  signals: Signal[];
};

const MAX_LIMIT = 1000;
const clampLimit = (n: number) => Math.max(1, Math.min(MAX_LIMIT, Math.floor(n)));

// series windows: 4h by default, one week at most
export const DEFAULT_SERIES_MINUTES = 240;
const MAX_SERIES_MINUTES = 7 * 24 * 60;
const clampMinutes = (n: number) =>
  Number.isFinite(n) ? Math.max(1, Math.min(MAX_SERIES_MINUTES, Math.floor(n))) : DEFAULT_SERIES_MINUTES;

/** Read-only view of the core for an API or UI layer. */
export class QueryService {
  constructor(
    private readonly db: MarketDB,
    private readonly bus: EventBus,
    private readonly health: HealthTracker,
    private readonly scope: QueryScope,
    private readonly loops: () => WorkerStats[] = () => [],
    private readonly now: () => number = Date.now
  ) {}

  private get asset(): string {
    return this.scope.asset;
  }

  state(): StateSnapshot {
    const health = this.health.snapshot();
    const degraded = DEPENDENCIES.filter((d) => health[d]?.degraded);
    return {
      asset: this.asset,
      now: this.now(),
      signal: this.db.latestSignal(this.asset) ?? null,
      health,
      degraded,
      loops: this.loops(),
      lastEventId: this.bus.latestId,
    };
  }

  listSignals(limit: number, since?: number): Signal[] {
    return this.db.listSignals({ asset: this.asset, limit: clampLimit(limit), since });
  }

  listItems(limit: number, filter: ItemFilter = {}): Item[] {
    return this.db.listItems({ ...filter, asset: this.asset, limit: clampLimit(limit) });
  }

  metrics(): StoreMetrics {
    return this.db.metrics(this.now());
  }

  eventsSince(cursor: number | undefined, limit = 50): EventsPage {
    return this.bus.since(cursor, limit);
  }

  subscribe(listener: EventListener): () => void {
    return this.bus.subscribe(listener);
  }

  topImpact(limit: number, hours = 24, source?: ItemSource): Item[] {
    return this.db.topImpact(clampLimit(limit), this.now() - hours * 3_600_000, source);
  }

  /** Items per minute over the last `minutes`, oldest first, empty minutes included. */
  mentionSeries(minutes = DEFAULT_SERIES_MINUTES): MinutePoint[] {
    const n = clampMinutes(minutes);
    const end = Math.floor(this.now() / 60_000) * 60_000;
    const start = end - (n - 1) * 60_000;
    const counts = new Map<number, number>();
    for (const ts of this.db.itemTimestamps(this.asset, start, end + 59_999, false)) {
      const m = Math.floor(ts / 60_000) * 60_000;
      counts.set(m, (counts.get(m) ?? 0) + 1);
    }
    const out: MinutePoint[] = [];
    for (let m = start; m <= end; m += 60_000) out.push({ minute: m, count: counts.get(m) ?? 0 });
    return out;
  }

  /** Stored candles of the configured symbol and timeframe opened in the last `minutes`, oldest first. */
  priceSeries(minutes = DEFAULT_SERIES_MINUTES): Candle[] {
    const now = this.now();
    return this.db.candles(this.scope.symbol, this.scope.timeframe, now - clampMinutes(minutes) * 60_000, now);
  }

  /** Signals of the last `minutes`, oldest first. Newest rows win if the cap is hit. */
  signalSeries(minutes = DEFAULT_SERIES_MINUTES): Signal[] {
    const n = clampMinutes(minutes);
    // capped at one signal per second
    return this.db.listSignals({ asset: this.asset, since: this.now() - n * 60_000, limit: n * 60 }).reverse();
  }

  /** Everything a chart needs on first load. */
  bootstrap(minutes = DEFAULT_SERIES_MINUTES): Bootstrap {
    const n = clampMinutes(minutes);
    return {
      minutes: n,
      mentions: this.mentionSeries(n),
      candles: this.priceSeries(n),
      signals: this.signalSeries(n),
    };
  }
}
