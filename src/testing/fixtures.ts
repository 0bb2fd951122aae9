// Shared fakes for the test suites. Nothing here reaches the network.
import axios, {
  AxiosError,
  AxiosHeaders,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";
import { loadConfig, type AppConfig, type Env } from "../config.js";
import type { CompletionClient } from "../pipeline/llm.js";
import type { SentimentOracle, SentimentResult } from "../pipeline/sentiment.js";
import type { Candle, DomainHint, Item, Signal } from "../types.js";

/** Mon 2023-11-13 22:00:00 UTC, on a whole hour */
export const T0 = Date.UTC(2023, 10, 13, 22, 0, 0);
export const MIN = 60_000;

export function testConfig(env: Env = {}): AppConfig {
  return loadConfig({ DB_PATH: ":memory:", LLM_ENABLED: "false", ...env });
}

let seq = 0;
export function makeItem(over: Partial<Item> = {}): Item {
  seq += 1;
  return {
    id: `item-${seq}`,
    source: "feed",
    asset: "ETH-USD",
    ts: T0,
    text: `ethereum headline ${seq}`,
    score: 0,
    label: "neutral",
    relevance: null,
    lowRelevance: false,
    impact: null,
    impactMeta: null,
    url: null,
    ...over,
  };
}

export function makeSignal(over: Partial<Signal> = {}): Signal {
  return {
    asset: "ETH-USD",
    ts: T0,
    ema15: 0,
    mentions: 0,
    mentions_z: 0,
    baseline_7d: 0,
    alpha: 0,
    action: "wait",
    price_close: null,
    rsi14: null,
    macd: null,
    macd_signal: null,
    atr_pct: null,
    price_bias: null,
    ...over,
  };
}

export function flatCandles(start: number, n: number, stepMs = MIN, close = 100): Candle[] {
  return Array.from({ length: n }, (_, i) => ({
    ts: start + i * stepMs,
    open: close,
    high: close + 1,
    low: close - 1,
    close,
    volume: 1,
  }));
}

export class FakeOracle implements SentimentOracle {
  calls: Array<{ text: string; hint: DomainHint }> = [];

  constructor(private readonly fn: (text: string) => SentimentResult | Promise<SentimentResult>) {}

  async score(text: string, hint: DomainHint): Promise<SentimentResult> {
    this.calls.push({ text, hint });
    return this.fn(text);
  }
}

export class FakeLlm implements CompletionClient {
  prompts: string[] = [];

  constructor(private readonly fn: (prompt: string, call: number) => Promise<string>) {}

  complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.fn(prompt, this.prompts.length);
  }
}

export const never = <T>() => new Promise<T>(() => undefined);

export type StubReply = { status: number; data?: unknown; headers?: Record<string, string> };

/**
 * axios instance whose adapter answers from `handler`; non-2xx replies are
 * raised as AxiosError the way the real adapters do.
 */
export function stubHttp(handler: (config: InternalAxiosRequestConfig) => StubReply | Promise<StubReply>): {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const reply = await handler(config);
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: new AxiosHeaders(reply.headers ?? {}),
        config,
      };
      if (reply.status >= 200 && reply.status < 300) return response;
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
        config,
        null,
        response
      );
    },
  });
  return { http, requests };
}

/** Poll until `cond` holds or `timeoutMs` passes. */
export async function waitFor(cond: () => boolean, timeoutMs = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!cond()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await new Promise((r) => setTimeout(r, 5));
  }
}
