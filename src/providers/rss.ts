// src/providers/rss.ts
import axios, { type AxiosInstance } from "axios";
import * as cheerio from "cheerio";
import { TransientIngestError, errorMessage, isTransient } from "../errors.js";
import { log } from "../logger.js";
import type { RawItem } from "../types.js";

export type FeedSettings = {
  urls: readonly string[];
  /** Only keep entries published within the last N minutes; 0 = no filter. */
  windowMinutes: number;
  timeoutMs: number;
};

const httpClient = axios.create({
  headers: {
    "User-Agent": "sentiment-signal/1.0",
    Accept: "application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.8",
  },
});

/** Tags out, entities decoded, whitespace collapsed. */
export function stripHtml(s: string): string {
  if (!s) return "";
  return cheerio.load(s).root().text().replace(/\s+/g, " ").trim();
}

function parseDate(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const t = Date.parse(raw.trim());
  return Number.isFinite(t) ? t : fallback;
}

/** RSS 2.0 <item> and Atom <entry> elements as raw feed items. */
export function parseFeed(xml: string, asset: string, now = Date.now()): RawItem[] {
  const $ = cheerio.load(xml, { xml: true });
  const out: RawItem[] = [];

  $("item, entry").each((_, el) => {
    const node = $(el);
    const field = (...names: string[]) => {
      for (const n of names) {
        const v = node.children(n).first().text().trim();
        if (v) return v;
      }
      return "";
    };

    const title = stripHtml(field("title"));
    const body = stripHtml(field("description", "summary", "content\\:encoded", "content"));
    const text = [title, body].filter(Boolean).join(" ");
    if (!text) return;

    const linkEl = node.children("link").first();
    const link = (linkEl.attr("href") ?? linkEl.text()).trim() || field("guid", "id") || undefined;

    out.push({
      source: "feed",
      asset,
      timestamp: parseDate(field("pubDate", "published", "updated", "dc\\:date"), now),
      text,
      url: link?.startsWith("http") ? link : undefined,
    });
  });
  return out;
}

/**
 * Pull every configured feed concurrently. A failing feed is logged and
 * skipped; only when all of them fail transiently is the batch retried.
 */
export async function fetchFeedItems(
  settings: FeedSettings,
  asset: string,
  signal?: AbortSignal,
  http: AxiosInstance = httpClient
): Promise<RawItem[]> {
  const now = Date.now();
  const results = await Promise.allSettled(
    settings.urls.map(async (url) => {
      const { data } = await http.get<string>(url, {
        timeout: settings.timeoutMs,
        responseType: "text",
        signal,
      });
      return parseFeed(String(data), asset, now);
    })
  );

  const out: RawItem[] = [];
  const errors: unknown[] = [];
  results.forEach((r, i) => {
    if (r.status === "fulfilled") out.push(...r.value);
    else {
      errors.push(r.reason);
      log.warn("[RSS] feed error", { url: settings.urls[i], err: errorMessage(r.reason) });
    }
  });
  if (settings.urls.length && errors.length === settings.urls.length && errors.every(isTransient)) {
    throw new TransientIngestError("all feeds failed", undefined, { cause: errors[0] });
  }

  if (settings.windowMinutes > 0) {
    const cutoff = now - settings.windowMinutes * 60_000;
    return out.filter((it) => it.timestamp >= cutoff);
  }
  return out;
}
