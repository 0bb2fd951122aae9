import Database from "better-sqlite3";
import { z } from "zod";
import { log } from "../logger.js";
import type {
  Action,
  Candle,
  ImpactMeta,
  Item,
  ItemSource,
  Signal,
} from "../types.js";

type ItemRow = {
  id: string;
  source: ItemSource;
  asset: string;
  ts: number;
  text: string;
  score: number;
  label: string;
  url: string | null;
  llm_relevant: number | null;
  llm_confidence: number | null;
  llm_labels: string | null;
  llm_reason: string | null;
  low_relevance: number | null;
  impact: number | null;
  impact_meta: string | null;
};

type SignalRow = {
  asset: string;
  ts: number;
  ema15: number;
  mentions: number;
  mentions_z: number | null;
  baseline_7d: number | null;
  alpha: number | null;
  action: Action;
  price_close: number | null;
  rsi14: number | null;
  macd: number | null;
  macd_signal: number | null;
  atr_pct: number | null;
  price_bias: number | null;
};

type CandleRow = { ts: number; o: number; h: number; l: number; c: number; v: number };

export type ScorePoint = { ts: number; score: number };

export type PendingImpact = {
  id: string;
  ts: number;
  impact: number | null;
  impactMeta: ImpactMeta;
};

export type SignalQuery = {
  asset?: string;
  limit: number;
  since?: number;
  until?: number;
  action?: Action;
  order?: "asc" | "desc";
};

export type ItemQuery = {
  asset?: string;
  limit: number;
  source?: ItemSource;
  label?: string;
  q?: string;
  minScore?: number;
  maxScore?: number;
  since?: number;
  until?: number;
  /** true = relevant only; false = irrelevant or unclassified */
  relevant?: boolean;
  order?: "asc" | "desc";
};

export type StoreMetrics = {
  itemsTotal: number;
  signalsTotal: number;
  itemsLast15m: number;
  avgScore1h: number;
};

/**
 * Base columns. Everything after these is added through ALTER TABLE so that
 * a fresh store and an upgraded one end up with the same layout.
 */
const BASE_TABLES = [
  `CREATE TABLE IF NOT EXISTS items (
    id TEXT PRIMARY KEY,
    source TEXT NOT NULL,
    asset TEXT NOT NULL,
    ts INTEGER NOT NULL,
    text TEXT NOT NULL,
    score REAL NOT NULL,
    label TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS signals (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    asset TEXT NOT NULL,
    ts INTEGER NOT NULL,
    ema15 REAL NOT NULL,
    mentions INTEGER NOT NULL,
    action TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS prices (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    symbol TEXT NOT NULL,
    timeframe TEXT NOT NULL,
    ts INTEGER NOT NULL,
    o REAL, h REAL, l REAL, c REAL, v REAL
  )`,
];

const OPTIONAL_COLUMNS: Record<string, Array<[string, string]>> = {
  items: [
    ["url", "TEXT"],
    ["llm_relevant", "INTEGER"],
    ["llm_confidence", "REAL"],
    ["llm_labels", "TEXT"],
    ["llm_reason", "TEXT"],
    ["low_relevance", "INTEGER NOT NULL DEFAULT 0"],
    ["impact", "REAL"],
    ["impact_meta", "TEXT"],
  ],
  signals: [
    ["mentions_z", "REAL"],
    ["baseline_7d", "REAL"],
    ["alpha", "REAL"],
    ["price_close", "REAL"],
    ["rsi14", "REAL"],
    ["macd", "REAL"],
    ["macd_signal", "REAL"],
    ["atr_pct", "REAL"],
    ["price_bias", "REAL"],
  ],
  prices: [],
};

const INDEXES = [
  "CREATE INDEX IF NOT EXISTS ix_items_asset_ts ON items(asset, ts)",
  "CREATE INDEX IF NOT EXISTS ix_items_source ON items(source)",
  "CREATE UNIQUE INDEX IF NOT EXISTS ux_signals_asset_ts ON signals(asset, ts)",
  "CREATE UNIQUE INDEX IF NOT EXISTS ux_prices_key ON prices(symbol, timeframe, ts)",
];

const ImpactMetaSchema = z
  .object({
    ret15: z.number(),
    sigma15: z.number(),
    ret60: z.number(),
    sigma60: z.number(),
    norm60: z.number(),
    computedAt15: z.number(),
    computedAt60: z.number(),
  })
  .partial();

const LabelsSchema = z.array(z.string());

function parseImpactMeta(raw: string | null): ImpactMeta {
  if (!raw) return {};
  try {
    const parsed = ImpactMetaSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

function parseLabels(raw: string | null): string[] {
  if (!raw) return [];
  try {
    const parsed = LabelsSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}

function toItem(r: ItemRow): Item {
  return {
    id: r.id,
    source: r.source,
    asset: r.asset,
    ts: r.ts,
    text: r.text,
    score: r.score,
    label: r.label,
    url: r.url,
    relevance:
      r.llm_relevant === null
        ? null
        : {
            relevant: r.llm_relevant === 1,
            confidence: r.llm_confidence ?? 0,
            labels: parseLabels(r.llm_labels),
            reason: r.llm_reason ?? "",
          },
    lowRelevance: r.low_relevance === 1,
    impact: r.impact,
    impactMeta: r.impact_meta ? parseImpactMeta(r.impact_meta) : null,
  };
}

function toSignal(r: SignalRow): Signal {
  return {
    asset: r.asset,
    ts: r.ts,
    ema15: r.ema15,
    mentions: r.mentions,
    mentions_z: r.mentions_z ?? 0,
    baseline_7d: r.baseline_7d ?? 0,
    alpha: r.alpha ?? 0,
    action: r.action,
    price_close: r.price_close,
    rsi14: r.rsi14,
    macd: r.macd,
    macd_signal: r.macd_signal,
    atr_pct: r.atr_pct,
    price_bias: r.price_bias,
  };
}

/**
 * SQLite persistence for items, signals and price candles.
 * Append-only: items and signals are never updated except for the impact
 * columns, each of which is written at most once.
 */
export class MarketDB {
  private db: Database.Database;

  constructor(path: string) {
    this.db = new Database(path);
    if (path !== ":memory:") this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
    this.init();
  }

  /** Create missing tables, columns and indexes. Safe to call repeatedly. */
  init() {
    const migrate = this.db.transaction(() => {
      for (const ddl of BASE_TABLES) this.db.exec(ddl);
      for (const [table, cols] of Object.entries(OPTIONAL_COLUMNS)) {
        const have = new Set(this.columns(table));
        for (const [name, type] of cols) {
          if (have.has(name)) continue;
          this.db.exec(`ALTER TABLE ${table} ADD COLUMN ${name} ${type}`);
          log.info("[DB] migrated", { table, column: name });
        }
      }
      for (const ddl of INDEXES) this.db.exec(ddl);
    });
    migrate();
  }

  private columns(table: string): string[] {
    return this.db
      .prepare<[], { name: string }>(`SELECT name FROM pragma_table_info('${table}')`)
      .all()
      .map((r) => r.name);
  }

  /** Table → ordered column names, plus index names. */
  schema(): { tables: Record<string, string[]>; indexes: string[] } {
    const tables: Record<string, string[]> = {};
    for (const t of Object.keys(OPTIONAL_COLUMNS)) tables[t] = this.columns(t);
    const indexes = this.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'index' AND name NOT LIKE 'sqlite_%' ORDER BY name"
      )
      .all()
      .map((r) => r.name);
    return { tables, indexes };
  }

  close() {
    this.db.close();
  }

  /* ---------------- items ---------------- */

  hasItem(id: string): boolean {
    return !!this.db.prepare<[string], { one: number }>("SELECT 1 AS one FROM items WHERE id = ?").get(id);
  }

  /** @returns false when the id already exists */
  insertItem(item: Item): boolean {
    const res = this.db
      .prepare(
        `INSERT OR IGNORE INTO items
          (id, source, asset, ts, text, score, label, url,
           llm_relevant, llm_confidence, llm_labels, llm_reason, low_relevance)
         VALUES (@id, @source, @asset, @ts, @text, @score, @label, @url,
           @llm_relevant, @llm_confidence, @llm_labels, @llm_reason, @low_relevance)`
      )
      .run({
        id: item.id,
        source: item.source,
        asset: item.asset,
        ts: item.ts,
        text: item.text,
        score: item.score,
        label: item.label,
        url: item.url,
        llm_relevant: item.relevance ? (item.relevance.relevant ? 1 : 0) : null,
        llm_confidence: item.relevance?.confidence ?? null,
        llm_labels: item.relevance ? JSON.stringify(item.relevance.labels) : null,
        llm_reason: item.relevance?.reason ?? null,
        low_relevance: item.lowRelevance ? 1 : 0,
      });
    return res.changes === 1;
  }

  getItem(id: string): Item | undefined {
    const row = this.db.prepare<[string], ItemRow>("SELECT * FROM items WHERE id = ?").get(id);
    return row ? toItem(row) : undefined;
  }

  /** Scores in [from, to], oldest first. */
  itemScores(asset: string, from: number, to: number, excludeLowRelevance: boolean): ScorePoint[] {
    return this.db
      .prepare<[string, number, number, number], ScorePoint>(
        `SELECT ts, score FROM items
         WHERE asset = ? AND ts >= ? AND ts <= ? AND (? = 0 OR low_relevance = 0)
         ORDER BY ts ASC, id ASC`
      )
      .all(asset, from, to, excludeLowRelevance ? 1 : 0);
  }

  itemTimestamps(asset: string, from: number, to: number, excludeLowRelevance: boolean): number[] {
    return this.db
      .prepare<[string, number, number, number], { ts: number }>(
        `SELECT ts FROM items
         WHERE asset = ? AND ts >= ? AND ts <= ? AND (? = 0 OR low_relevance = 0)
         ORDER BY ts ASC`
      )
      .all(asset, from, to, excludeLowRelevance ? 1 : 0)
      .map((r) => r.ts);
  }

  listItems(q: ItemQuery): Item[] {
    const where: string[] = [];
    const params: Array<string | number> = [];
    const add = (clause: string, value: string | number) => {
      where.push(clause);
      params.push(value);
    };
    if (q.asset) add("asset = ?", q.asset);
    if (q.source) add("source = ?", q.source);
    if (q.label) add("label = ?", q.label);
    if (q.minScore !== undefined) add("score >= ?", q.minScore);
    if (q.maxScore !== undefined) add("score <= ?", q.maxScore);
    if (q.since !== undefined) add("ts >= ?", q.since);
    if (q.until !== undefined) add("ts <= ?", q.until);
    if (q.q) add("text LIKE ?", `%${q.q}%`);
    if (q.relevant === true) where.push("llm_relevant = 1");
    if (q.relevant === false) where.push("(llm_relevant = 0 OR llm_relevant IS NULL)");
    const sql =
      "SELECT * FROM items" +
      (where.length ? ` WHERE ${where.join(" AND ")}` : "") +
      ` ORDER BY ts ${q.order === "asc" ? "ASC" : "DESC"} LIMIT ?`;
    return this.db
      .prepare<Array<string | number>, ItemRow>(sql)
      .all(...params, q.limit)
      .map(toItem);
  }

  /* ---------------- impact ---------------- */

  /** Items old enough for the 15m horizon with at least one horizon missing. */
  pendingImpactItems(asset: string, now: number, minAgeMs: number, maxAgeMs: number, limit: number): PendingImpact[] {
    return this.db
      .prepare<[string, number, number, number], Pick<ItemRow, "id" | "ts" | "impact" | "impact_meta">>(
        `SELECT id, ts, impact, impact_meta FROM items
         WHERE asset = ? AND ts <= ? AND ts >= ?
           AND (impact IS NULL OR json_extract(impact_meta, '$.norm60') IS NULL)
         ORDER BY ts ASC LIMIT ?`
      )
      .all(asset, now - minAgeMs, now - maxAgeMs, limit)
      .map((r) => ({
        id: r.id,
        ts: r.ts,
        impact: r.impact,
        impactMeta: parseImpactMeta(r.impact_meta),
      }));
  }

  /**
   * Fill one impact horizon. A horizon that is already set is left alone.
   * New metadata keys are merged into what is stored.
   * @returns true when this call wrote the horizon
   */
  writeImpact(id: string, horizon: 15 | 60, value: number, meta: ImpactMeta): boolean {
    const write = this.db.transaction((): boolean => {
      const row = this.db
        .prepare<[string], Pick<ItemRow, "impact" | "impact_meta">>(
          "SELECT impact, impact_meta FROM items WHERE id = ?"
        )
        .get(id);
      if (!row) return false;
      const current = parseImpactMeta(row.impact_meta);
      if (horizon === 15 && row.impact !== null) return false;
      if (horizon === 60 && current.norm60 !== undefined) return false;

      const merged: ImpactMeta =
        horizon === 60 ? { ...current, ...meta, norm60: value } : { ...current, ...meta };
      if (horizon === 15) {
        this.db
          .prepare("UPDATE items SET impact = ?, impact_meta = ? WHERE id = ? AND impact IS NULL")
          .run(value, JSON.stringify(merged), id);
      } else {
        this.db.prepare("UPDATE items SET impact_meta = ? WHERE id = ?").run(JSON.stringify(merged), id);
      }
      return true;
    });
    return write();
  }

  topImpact(limit: number, since: number, source?: ItemSource): Item[] {
    const sql =
      "SELECT * FROM items WHERE ts >= ? AND impact IS NOT NULL" +
      (source ? " AND source = ?" : "") +
      " ORDER BY impact DESC LIMIT ?";
    const params: Array<string | number> = source ? [since, source, limit] : [since, limit];
    return this.db.prepare<Array<string | number>, ItemRow>(sql).all(...params).map(toItem);
  }

  /* ---------------- signals ---------------- */

  /** @returns false when a row for (asset, ts) already exists */
  insertSignal(s: Signal): boolean {
    const res = this.db
      .prepare(
        `INSERT OR IGNORE INTO signals
          (asset, ts, ema15, mentions, action, mentions_z, baseline_7d, alpha,
           price_close, rsi14, macd, macd_signal, atr_pct, price_bias)
         VALUES (@asset, @ts, @ema15, @mentions, @action, @mentions_z, @baseline_7d, @alpha,
           @price_close, @rsi14, @macd, @macd_signal, @atr_pct, @price_bias)`
      )
      .run(s);
    return res.changes === 1;
  }

  latestSignal(asset: string): Signal | undefined {
    const row = this.db
      .prepare<[string], SignalRow>("SELECT * FROM signals WHERE asset = ? ORDER BY ts DESC LIMIT 1")
      .get(asset);
    return row ? toSignal(row) : undefined;
  }

  listSignals(q: SignalQuery): Signal[] {
    const where: string[] = [];
    const params: Array<string | number> = [];
    const add = (clause: string, value: string | number) => {
      where.push(clause);
      params.push(value);
    };
    if (q.asset) add("asset = ?", q.asset);
    if (q.action) add("action = ?", q.action);
    if (q.since !== undefined) add("ts >= ?", q.since);
    if (q.until !== undefined) add("ts <= ?", q.until);
    const sql =
      "SELECT * FROM signals" +
      (where.length ? ` WHERE ${where.join(" AND ")}` : "") +
      ` ORDER BY ts ${q.order === "asc" ? "ASC" : "DESC"} LIMIT ?`;
    return this.db
      .prepare<Array<string | number>, SignalRow>(sql)
      .all(...params, q.limit)
      .map(toSignal);
  }

  countSignals(asset: string, ts: number): number {
    return (
      this.db
        .prepare<[string, number], { n: number }>("SELECT COUNT(*) AS n FROM signals WHERE asset = ? AND ts = ?")
        .get(asset, ts)?.n ?? 0
    );
  }

  /* ---------------- prices ---------------- */

  /** Insert candles; a candle already stored for the same open time is refreshed (it may still be forming). */
  upsertCandles(symbol: string, timeframe: string, candles: Candle[]): number {
    const stmt = this.db.prepare(
      `INSERT INTO prices (symbol, timeframe, ts, o, h, l, c, v)
       VALUES (@symbol, @timeframe, @ts, @o, @h, @l, @c, @v)
       ON CONFLICT(symbol, timeframe, ts) DO UPDATE SET
         o = excluded.o, h = excluded.h, l = excluded.l, c = excluded.c, v = excluded.v`
    );
    const run = this.db.transaction((rows: Candle[]) => {
      let n = 0;
      for (const c of rows) {
        n += stmt.run({
          symbol,
          timeframe,
          ts: c.ts,
          o: c.open,
          h: c.high,
          l: c.low,
          c: c.close,
          v: c.volume,
        }).changes;
      }
      return n;
    });
    return run(candles);
  }

  candles(symbol: string, timeframe: string, from: number, to: number): Candle[] {
    return this.db
      .prepare<[string, string, number, number], CandleRow>(
        `SELECT ts, o, h, l, c, v FROM prices
         WHERE symbol = ? AND timeframe = ? AND ts >= ? AND ts <= ? AND c IS NOT NULL
         ORDER BY ts ASC`
      )
      .all(symbol, timeframe, from, to)
      .map((r) => ({ ts: r.ts, open: r.o, high: r.h, low: r.l, close: r.c, volume: r.v }));
  }

  /* ---------------- metrics ---------------- */

  metrics(now: number): StoreMetrics {
    const count = (sql: string, ...p: number[]) =>
      this.db.prepare<number[], { n: number }>(sql).get(...p)?.n ?? 0;
    const avg =
      this.db
        .prepare<[number], { a: number | null }>("SELECT AVG(score) AS a FROM items WHERE ts >= ?")
        .get(now - 3_600_000)?.a ?? 0;
    return {
      itemsTotal: count("SELECT COUNT(*) AS n FROM items"),
      signalsTotal: count("SELECT COUNT(*) AS n FROM signals"),
      itemsLast15m: count("SELECT COUNT(*) AS n FROM items WHERE ts >= ?", now - 15 * 60_000),
      avgScore1h: avg,
    };
  }
}
