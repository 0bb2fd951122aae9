import "dotenv/config";
import { z } from "zod";
import { FatalConfigError } from "./errors.js";
import type { ItemSource } from "./types.js";

const bool = (def: boolean) =>
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .optional()
    .transform((v) => (v === undefined ? def : v === "true" || v === "1" || v === "yes"));

const list = (def: string[]) =>
  z
    .string()
    .optional()
    .transform((v) =>
      v === undefined
        ? def
        : v
            .split(",")
            .map((s) => s.trim())
            .filter(Boolean)
    );

const DEFAULT_FEEDS = [
  "https://www.coindesk.com/arc/outboundfeeds/rss/?output=xml",
  "https://cointelegraph.com/rss",
  "https://crypto.news/feed",
  "https://www.newsbtc.com/feed",
];

const DEFAULT_BANNED = [
  "airdrop",
  "giveaway",
  "presale",
  "pre-sale",
  "whitelist",
  "referral",
  "claim now",
  "buy now",
  "launch now",
  "100x",
];

/** Validate & normalize environment variables */
const EnvSchema = z.object({
  ASSET: z.string().min(1).default("ETH-USD"),
  ASSET_KEYWORDS: list(["eth", "ethereum", "$eth"]),
  DB_PATH: z.string().default("./data/market.db"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  FEED_POLL_SECONDS: z.coerce.number().positive().default(60),
  SOCIAL_POLL_SECONDS: z.coerce.number().positive().default(60),
  SIGNAL_POLL_SECONDS: z.coerce.number().positive().default(60),
  PRICE_POLL_SECONDS: z.coerce.number().positive().default(30),
  IMPACT_POLL_SECONDS: z.coerce.number().positive().default(60),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  RETRY_MAX: z.coerce.number().int().min(0).default(3),
  RETRY_BASE_MS: z.coerce.number().int().positive().default(500),
  RETRY_MAX_MS: z.coerce.number().int().positive().default(30_000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  RSS_FEEDS: list(DEFAULT_FEEDS),
  FEED_WINDOW_MINUTES: z.coerce.number().min(0).default(0),

  SOCIAL_API_BASE: z.string().url().default("https://api.twitterapi.io"),
  SOCIAL_API_KEY: z.string().optional(),
  SOCIAL_QUERY: z.string().default("ETH OR Ethereum OR $ETH"),
  SOCIAL_MAX_PER_RUN: z.coerce.number().int().positive().max(100).default(40),
  SOCIAL_PAGES_PER_RUN: z.coerce.number().int().positive().default(1),

  DEDUP_WINDOW_MINUTES: z.coerce.number().positive().default(24 * 60),
  DEDUP_CACHE_SIZE: z.coerce.number().int().positive().default(5000),

  FEED_MIN_TEXT_LEN: z.coerce.number().int().min(0).default(16),
  FEED_MAX_TEXT_LEN: z.coerce.number().int().min(0).default(20_000),
  FEED_MAX_URLS: z.coerce.number().int().min(0).default(20),
  FEED_REQUIRE_KEYWORD: bool(false),
  SOCIAL_MIN_TEXT_LEN: z.coerce.number().int().min(0).default(20),
  SOCIAL_MAX_TEXT_LEN: z.coerce.number().int().min(0).default(1000),
  SOCIAL_MIN_ENGAGEMENT: z.coerce.number().int().min(0).default(0),
  SOCIAL_MAX_HASHTAGS: z.coerce.number().int().min(0).default(6),
  SOCIAL_MAX_HASHTAG_RATIO: z.coerce.number().min(0).max(1).default(0.5),
  SOCIAL_MAX_MENTIONS: z.coerce.number().int().min(0).default(4),
  SOCIAL_MAX_URLS: z.coerce.number().int().min(0).default(3),
  SOCIAL_MAX_UPPER_RATIO: z.coerce.number().min(0).max(1).default(0.7),
  SOCIAL_MAX_SYMBOL_RATIO: z.coerce.number().min(0).max(1).default(0.3),
  SOCIAL_MAX_REPEAT_RATIO: z.coerce.number().min(0).max(1).default(0.5),
  SOCIAL_MAX_CHAR_RUN: z.coerce
    .number()
    .int()
    .min(0)
    .refine((n) => n === 0 || n >= 2, "expected 0 (off) or a run of at least 2")
    .default(8),
  SOCIAL_ONLY_ASSET_CASHTAG: bool(true),
  SOCIAL_REQUIRE_KEYWORD: bool(true),
  BANNED_KEYWORDS: list(DEFAULT_BANNED),

  SENTIMENT_API_URL: z.string().url().default("https://api-inference.huggingface.co"),
  SENTIMENT_API_KEY: z.string().optional(),
  SENTIMENT_MODEL_NEWS: z.string().default("ProsusAI/finbert"),
  SENTIMENT_MODEL_SOCIAL: z
    .string()
    .default("cardiffnlp/twitter-roberta-base-sentiment-latest"),
  SENTIMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),

  LLM_ENABLED: bool(true),
  LLM_BASE_URL: z.string().url().default("http://127.0.0.1:11434/v1"),
  LLM_API_KEY: z.string().default("local"),
  LLM_MODEL: z.string().default("qwen2.5:3b"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  LLM_MAX_QPS: z.coerce.number().positive().default(2),
  LLM_MIN_CONF: z.coerce.number().min(0).max(1).default(0.6),
  LLM_POLARITY_ENABLED: bool(false),
  LLM_POLARITY_MIN_CONF: z.coerce.number().min(0).max(1).default(0.7),
  EXCLUDE_LOW_RELEVANCE: bool(true),

  SUMMARY_MIN_SECONDS: z.coerce.number().min(0).default(60),
  SUMMARY_MAX_ITEMS: z.coerce.number().int().min(0).max(100).default(12),
  SUMMARY_MAX_TEXT_LEN: z.coerce.number().int().positive().default(220),

  EMA_HALF_LIFE_MINUTES: z.coerce.number().positive().default(15),
  EMA_LOOKBACK_MINUTES: z.coerce.number().positive().default(60),
  MENTIONS_WINDOW_MINUTES: z.coerce.number().positive().default(15),
  MENTIONS_STD_FLOOR: z.coerce.number().positive().default(1),

  PRICE_API_BASE: z.string().url().default("https://api.binance.com"),
  PRICE_SYMBOL: z.string().default("ETHUSDT"),
  PRICE_TIMEFRAME: z
    .string()
    .regex(/^[1-9]\d*[mh]$/, "expected a timeframe such as 1m, 5m or 1h")
    .default("1m"),
  PRICE_MAX_CANDLES: z.coerce.number().int().positive().max(1000).default(300),
  PRICE_LOOKBACK_MINUTES: z.coerce.number().positive().default(24 * 60),

  ALPHA_W_SENTIMENT: z.coerce.number().min(0).default(0.35),
  ALPHA_W_MENTIONS: z.coerce.number().min(0).default(0.25),
  ALPHA_W_MOMENTUM: z.coerce.number().min(0).default(0.2),
  ALPHA_W_RSI: z.coerce.number().min(0).default(0.05),
  ALPHA_W_MACD: z.coerce.number().min(0).default(0.05),
  ALPHA_W_PRICE_BIAS: z.coerce.number().min(0).default(0.05),
  ALPHA_W_BREAKOUT: z.coerce.number().min(0).default(0.05),
  SIGNAL_THRESHOLD_UP: z.coerce.number().default(0.33),
  SIGNAL_THRESHOLD_DOWN: z.coerce.number().default(-0.33),
  SIGNAL_HYSTERESIS: z.coerce.number().min(0).default(0),

  IMPACT_MAX_AGE_HOURS: z.coerce.number().positive().default(48),
  IMPACT_VOL_LOOKBACK_MINUTES: z.coerce.number().positive().default(360),
  IMPACT_BATCH_SIZE: z.coerce.number().int().positive().default(400),

  EVENT_BUFFER_SIZE: z.coerce.number().int().positive().default(500),
  DEGRADED_AFTER_FAILURES: z.coerce.number().int().positive().default(3),

  DISCORD_BOT_TOKEN: z.string().optional(),
  DISCORD_CHANNEL_ID: z.string().optional(),
});

export type Env = Record<string, string | undefined>;

export type SpamRules = {
  minTextLen: number;
  maxTextLen: number;
  minEngagement: number;
  maxHashtags: number;
  maxHashtagRatio: number;
  maxMentions: number;
  maxUrls: number;
  maxUpperRatio: number;
  maxSymbolRatio: number;
  maxRepeatRatio: number;
  maxCharRun: number;
  bannedKeywords: string[];
  /** Reject text that names none of these. Empty = off. */
  requiredKeywords: string[];
  /** Cashtag that may appear alongside others; unset = no cashtag rule. */
  onlyCashtag?: string;
};

export type AlphaWeights = {
  sentiment: number;
  mentions: number;
  momentum: number;
  rsi: number;
  macd: number;
  priceBias: number;
  breakout: number;
};

export type AppConfig = ReturnType<typeof buildConfig>;

/** "15m" → 15, "1h" → 60 */
export function timeframeMinutes(tf: string): number {
  const m = /^(\d+)([mh])$/.exec(tf);
  const n = Number(m?.[1]);
  if (!m || !(n > 0)) throw new FatalConfigError([`unsupported timeframe ${tf}`]);
  return m[2] === "h" ? n * 60 : n;
}

function buildConfig(env: z.output<typeof EnvSchema>) {
  const baseCashtag = `$${env.ASSET.split(/[-/]/)[0]?.toLowerCase() ?? ""}`;
  const off: SpamRules = {
    minTextLen: 0,
    maxTextLen: 0,
    minEngagement: 0,
    maxHashtags: 0,
    maxHashtagRatio: 0,
    maxMentions: 0,
    maxUrls: 0,
    maxUpperRatio: 0,
    maxSymbolRatio: 0,
    maxRepeatRatio: 0,
    maxCharRun: 0,
    bannedKeywords: [],
    requiredKeywords: [],
  };

  const spam: Record<ItemSource, SpamRules> = {
    feed: {
      ...off,
      minTextLen: env.FEED_MIN_TEXT_LEN,
      maxTextLen: env.FEED_MAX_TEXT_LEN,
      maxUrls: env.FEED_MAX_URLS,
      requiredKeywords: env.FEED_REQUIRE_KEYWORD ? env.ASSET_KEYWORDS : [],
    },
    social: {
      minTextLen: env.SOCIAL_MIN_TEXT_LEN,
      maxTextLen: env.SOCIAL_MAX_TEXT_LEN,
      minEngagement: env.SOCIAL_MIN_ENGAGEMENT,
      maxHashtags: env.SOCIAL_MAX_HASHTAGS,
      maxHashtagRatio: env.SOCIAL_MAX_HASHTAG_RATIO,
      maxMentions: env.SOCIAL_MAX_MENTIONS,
      maxUrls: env.SOCIAL_MAX_URLS,
      maxUpperRatio: env.SOCIAL_MAX_UPPER_RATIO,
      maxSymbolRatio: env.SOCIAL_MAX_SYMBOL_RATIO,
      maxRepeatRatio: env.SOCIAL_MAX_REPEAT_RATIO,
      maxCharRun: env.SOCIAL_MAX_CHAR_RUN,
      bannedKeywords: env.BANNED_KEYWORDS,
      requiredKeywords: env.SOCIAL_REQUIRE_KEYWORD ? env.ASSET_KEYWORDS : [],
      onlyCashtag: env.SOCIAL_ONLY_ASSET_CASHTAG ? baseCashtag : undefined,
    },
    notification: { ...off },
    seed: { ...off },
  };

  return {
    asset: env.ASSET,
    assetKeywords: env.ASSET_KEYWORDS,
    dbPath: env.DB_PATH,
    logLevel: env.LOG_LEVEL,
    loops: {
      feedMs: env.FEED_POLL_SECONDS * 1000,
      socialMs: env.SOCIAL_POLL_SECONDS * 1000,
      signalMs: env.SIGNAL_POLL_SECONDS * 1000,
      pricesMs: env.PRICE_POLL_SECONDS * 1000,
      impactMs: env.IMPACT_POLL_SECONDS * 1000,
      shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS,
    },
    retry: {
      maxRetries: env.RETRY_MAX,
      baseDelayMs: env.RETRY_BASE_MS,
      maxDelayMs: env.RETRY_MAX_MS,
    },
    httpTimeoutMs: env.HTTP_TIMEOUT_MS,
    feeds: {
      urls: env.RSS_FEEDS,
      windowMinutes: env.FEED_WINDOW_MINUTES,
    },
    social: {
      apiBase: env.SOCIAL_API_BASE.replace(/\/+$/, ""),
      apiKey: env.SOCIAL_API_KEY,
      query: env.SOCIAL_QUERY,
      maxPerRun: env.SOCIAL_MAX_PER_RUN,
      pagesPerRun: env.SOCIAL_PAGES_PER_RUN,
    },
    dedup: {
      windowMs: env.DEDUP_WINDOW_MINUTES * 60_000,
      cacheSize: env.DEDUP_CACHE_SIZE,
    },
    spam,
    oracle: {
      url: env.SENTIMENT_API_URL.replace(/\/+$/, ""),
      apiKey: env.SENTIMENT_API_KEY,
      models: {
        news: env.SENTIMENT_MODEL_NEWS,
        social: env.SENTIMENT_MODEL_SOCIAL,
      },
      timeoutMs: env.SENTIMENT_TIMEOUT_MS,
    },
    llm: {
      enabled: env.LLM_ENABLED,
      baseURL: env.LLM_BASE_URL,
      apiKey: env.LLM_API_KEY,
      model: env.LLM_MODEL,
      timeoutMs: env.LLM_TIMEOUT_MS,
      maxQps: env.LLM_MAX_QPS,
      minConfidence: env.LLM_MIN_CONF,
      polarityEnabled: env.LLM_POLARITY_ENABLED,
      polarityMinConfidence: env.LLM_POLARITY_MIN_CONF,
      excludeLowRelevance: env.EXCLUDE_LOW_RELEVANCE,
    },
    commentary: {
      minIntervalMs: env.SUMMARY_MIN_SECONDS * 1000,
      maxItems: env.SUMMARY_MAX_ITEMS,
      maxTextLen: env.SUMMARY_MAX_TEXT_LEN,
    },
    aggregation: {
      halfLifeMs: env.EMA_HALF_LIFE_MINUTES * 60_000,
      lookbackMs: env.EMA_LOOKBACK_MINUTES * 60_000,
      mentionsWindowMs: env.MENTIONS_WINDOW_MINUTES * 60_000,
      stdFloor: env.MENTIONS_STD_FLOOR,
    },
    prices: {
      apiBase: env.PRICE_API_BASE.replace(/\/+$/, ""),
      symbol: env.PRICE_SYMBOL,
      timeframe: env.PRICE_TIMEFRAME,
      timeframeMinutes: timeframeMinutes(env.PRICE_TIMEFRAME),
      maxCandles: env.PRICE_MAX_CANDLES,
      lookbackMs: env.PRICE_LOOKBACK_MINUTES * 60_000,
    },
    alpha: {
      weights: {
        sentiment: env.ALPHA_W_SENTIMENT,
        mentions: env.ALPHA_W_MENTIONS,
        momentum: env.ALPHA_W_MOMENTUM,
        rsi: env.ALPHA_W_RSI,
        macd: env.ALPHA_W_MACD,
        priceBias: env.ALPHA_W_PRICE_BIAS,
        breakout: env.ALPHA_W_BREAKOUT,
      } satisfies AlphaWeights,
      thresholdUp: env.SIGNAL_THRESHOLD_UP,
      thresholdDown: env.SIGNAL_THRESHOLD_DOWN,
      hysteresis: env.SIGNAL_HYSTERESIS,
    },
    impact: {
      maxAgeMs: env.IMPACT_MAX_AGE_HOURS * 3_600_000,
      volLookbackMs: env.IMPACT_VOL_LOOKBACK_MINUTES * 60_000,
      batchSize: env.IMPACT_BATCH_SIZE,
    },
    events: { capacity: env.EVENT_BUFFER_SIZE },
    health: { degradedAfter: env.DEGRADED_AFTER_FAILURES },
    discord: {
      token: env.DISCORD_BOT_TOKEN,
      channelId: env.DISCORD_CHANNEL_ID,
    },
  };
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (value && typeof value === "object") {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

/**
 * Build the immutable configuration once, at startup.
 * Throws FatalConfigError on anything the service cannot run with.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new FatalConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  const e = parsed.data;
  const issues: string[] = [];
  if (e.SIGNAL_THRESHOLD_UP <= e.SIGNAL_THRESHOLD_DOWN) {
    issues.push("SIGNAL_THRESHOLD_UP must be greater than SIGNAL_THRESHOLD_DOWN");
  }
  const w = [
    e.ALPHA_W_SENTIMENT,
    e.ALPHA_W_MENTIONS,
    e.ALPHA_W_MOMENTUM,
    e.ALPHA_W_RSI,
    e.ALPHA_W_MACD,
    e.ALPHA_W_PRICE_BIAS,
    e.ALPHA_W_BREAKOUT,
  ];
  if (w.every((x) => x === 0)) issues.push("at least one ALPHA_W_* weight must be positive");
  if (e.EMA_LOOKBACK_MINUTES < e.MENTIONS_WINDOW_MINUTES) {
    issues.push("EMA_LOOKBACK_MINUTES must cover MENTIONS_WINDOW_MINUTES");
  }
  if (issues.length) throw new FatalConfigError(issues);
  return deepFreeze(buildConfig(e));
}
