/**
 * Shared types across the pipeline
 */
export type ItemSource = "feed" | "social" | "notification" | "seed";

/** Selects the sentiment model variant. */
export type DomainHint = "news" | "social";

export type Engagement = {
  likes: number;
  reposts: number;
  replies: number;
};

export type RawItem = {
  source: ItemSource;
  asset: string;
  /** ms since epoch */
  timestamp: number;
  text: string;
  url?: string;
  engagement?: Engagement;
};

export type Relevance = {
  relevant: boolean;
  confidence: number; // 0..1
  labels: string[];
  reason: string;
};

export type ImpactMeta = {
  ret15?: number;
  sigma15?: number;
  ret60?: number;
  sigma60?: number;
  /** normalized 60m impact */
  norm60?: number;
  computedAt15?: number;
  computedAt60?: number;
};

export type Item = {
  /** sha256(source|asset|normalized text) */
  id: string;
  source: ItemSource;
  asset: string;
  ts: number;
  text: string;
  score: number; // -1..1
  label: string;
  relevance: Relevance | null;
  lowRelevance: boolean;
  impact: number | null;
  impactMeta: ImpactMeta | null;
  url: string | null;
};

export type Action = "hold" | "accumulate" | "wait";

export type TechnicalFields = {
  price_close: number;
  rsi14: number | null;
  macd: number | null;
  macd_signal: number | null;
  atr_pct: number | null;
  vwap: number | null;
  /** % deviation of close from 60m VWAP */
  price_bias: number | null;
  pct_change_15m: number | null;
  pct_change_1h: number | null;
  /** range of the 4h before the last candle */
  high_4h: number | null;
  low_4h: number | null;
};

export type Signal = {
  asset: string;
  ts: number;
  ema15: number;
  mentions: number;
  mentions_z: number;
  baseline_7d: number;
  alpha: number;
  action: Action;
  price_close: number | null;
  rsi14: number | null;
  macd: number | null;
  macd_signal: number | null;
  atr_pct: number | null;
  price_bias: number | null;
};

/** OHLCV candle; ts = open time in ms */
export type Candle = {
  ts: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

export type EventType = "state" | "signal" | "item";

export type BusEvent = {
  id: number;
  type: EventType;
  timestamp: number;
  summary: string;
  payload: Record<string, unknown>;
};
