// src/providers/social.ts
import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { TransientIngestError, httpStatusOf, retryAfterMsOf } from "../errors.js";
import { log } from "../logger.js";
import type { RawItem } from "../types.js";

export type SocialSettings = {
  apiBase: string;
  apiKey?: string;
  query: string;
  maxPerRun: number;
  pagesPerRun: number;
  timeoutMs: number;
};

const count = z.coerce.number().int().nonnegative().catch(0);

const TweetSchema = z
  .object({
    id: z.coerce.string(),
    text: z.string().default(""),
    url: z.string().optional(),
    createdAt: z.string().optional(),
    likeCount: count,
    retweetCount: count,
    replyCount: count,
    isReply: z.boolean().optional(),
    inReplyToId: z.string().nullish(),
    quoted_tweet: z.unknown().optional(),
    author: z.object({ userName: z.string().optional() }).passthrough().nullish(),
  })
  .passthrough();

const SearchPageSchema = z.object({
  tweets: z.array(TweetSchema).default([]),
  has_next_page: z.boolean().optional(),
  next_cursor: z.string().nullish(),
});

export type Tweet = z.infer<typeof TweetSchema>;

export function isReplyOrQuote(t: Tweet): boolean {
  return t.isReply === true || !!t.inReplyToId || (t.quoted_tweet !== undefined && t.quoted_tweet !== null);
}

export function tweetToRawItem(t: Tweet, asset: string, now = Date.now()): RawItem {
  const parsed = t.createdAt ? Date.parse(t.createdAt) : NaN;
  const user = t.author?.userName;
  return {
    source: "social",
    asset,
    timestamp: Number.isFinite(parsed) ? parsed : now,
    text: t.text,
    url: t.url ?? (user ? `https://x.com/${user}/status/${t.id}` : undefined),
    engagement: { likes: t.likeCount, reposts: t.retweetCount, replies: t.replyCount },
  };
}

let warnedNoKey = false;

/**
 * Advanced search, newest first, following the cursor for up to
 * `pagesPerRun` pages. Replies and quotes are dropped here.
 * 429 and 5xx surface as TransientIngestError.
 */
export async function fetchSocialItems(
  settings: SocialSettings,
  asset: string,
  signal?: AbortSignal,
  http: AxiosInstance = axios
): Promise<RawItem[]> {
  if (!settings.apiKey) {
    if (!warnedNoKey) log.warn("[SOCIAL] SOCIAL_API_KEY missing; social ingestion disabled");
    warnedNoKey = true;
    return [];
  }

  const out: RawItem[] = [];
  let cursor = "";
  for (let page = 0; page < settings.pagesPerRun && out.length < settings.maxPerRun; page++) {
    let data: unknown;
    try {
      const res = await http.get<unknown>(`${settings.apiBase}/twitter/tweet/advanced_search`, {
        headers: { "X-API-Key": settings.apiKey },
        params: { query: settings.query, queryType: "Latest", ...(cursor ? { cursor } : {}) },
        timeout: settings.timeoutMs,
        signal,
      });
      data = res.data;
    } catch (err) {
      const status = httpStatusOf(err);
      if (status === 429 || (status !== undefined && status >= 500)) {
        throw new TransientIngestError(`social search HTTP ${status}`, retryAfterMsOf(err), { cause: err });
      }
      throw err;
    }

    const parsed = SearchPageSchema.safeParse(data);
    if (!parsed.success) {
      log.warn("[SOCIAL] unexpected search response", parsed.error.issues[0]?.message);
      break;
    }
    const now = Date.now();
    for (const t of parsed.data.tweets) {
      if (out.length >= settings.maxPerRun) break;
      if (isReplyOrQuote(t) || !t.text.trim()) continue;
      out.push(tweetToRawItem(t, asset, now));
    }
    const next = parsed.data.next_cursor ?? "";
    if (!parsed.data.has_next_page || !next) break;
    cursor = next;
  }
  return out;
}
