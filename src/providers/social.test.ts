import { describe, expect, it } from "vitest";
import { TransientIngestError } from "../errors.js";
import { stubHttp } from "../testing/fixtures.js";
import { fetchSocialItems, isReplyOrQuote, tweetToRawItem, type SocialSettings } from "./social.js";

const settings: SocialSettings = {
  apiBase: "https://social.test",
  apiKey: "test-key",
  query: "ETH OR Ethereum",
  maxPerRun: 10,
  pagesPerRun: 3,
  timeoutMs: 1000,
};

const PAGE_1 = {
  tweets: [
    {
      id: "1",
      text: "$ETH breaking out of the range",
      createdAt: "2024-10-07T10:00:00.000Z",
      likeCount: 5,
      retweetCount: 2,
      replyCount: 1,
      author: { userName: "alice" },
    },
    { id: "2", text: "agreed", isReply: true, inReplyToId: "1" },
    { id: "3", text: "look at this", quoted_tweet: { id: "9" } },
  ],
  has_next_page: true,
  next_cursor: "c2",
};

const PAGE_2 = {
  tweets: [{ id: 4, text: "eth gas fees are low today", url: "https://x.example/bob/4", createdAt: "2024-10-07T11:00:00.000Z" }],
  has_next_page: false,
  next_cursor: "",
};

describe("tweet helpers", () => {
  it("recognises replies and quotes", () => {
    const base = { id: "1", text: "t", likeCount: 0, retweetCount: 0, replyCount: 0 };
    expect(isReplyOrQuote(base)).toBe(false);
    expect(isReplyOrQuote({ ...base, isReply: true })).toBe(true);
    expect(isReplyOrQuote({ ...base, inReplyToId: "7" })).toBe(true);
    expect(isReplyOrQuote({ ...base, quoted_tweet: null })).toBe(false);
    expect(isReplyOrQuote({ ...base, quoted_tweet: { id: "7" } })).toBe(true);
  });

  it("falls back to now for unreadable dates", () => {
    const item = tweetToRawItem({ id: "5", text: "eth", createdAt: "yesterday", likeCount: 0, retweetCount: 0, replyCount: 0 }, "ETH-USD", 42);
    expect(item.timestamp).toBe(42);
    expect(item.url).toBeUndefined();
  });
});

describe("fetchSocialItems", () => {
  it("follows the cursor and drops replies and quotes", async () => {
    const { http, requests } = stubHttp((config) => ({
      status: 200,
      data: config.params?.cursor === "c2" ? PAGE_2 : PAGE_1,
    }));
    const items = await fetchSocialItems(settings, "ETH-USD", undefined, http);

    expect(items).toEqual([
      {
        source: "social",
        asset: "ETH-USD",
        timestamp: Date.UTC(2024, 9, 7, 10),
        text: "$ETH breaking out of the range",
        url: "https://x.com/alice/status/1",
        engagement: { likes: 5, reposts: 2, replies: 1 },
      },
      {
        source: "social",
        asset: "ETH-USD",
        timestamp: Date.UTC(2024, 9, 7, 11),
        text: "eth gas fees are low today",
        url: "https://x.example/bob/4",
        engagement: { likes: 0, reposts: 0, replies: 0 },
      },
    ]);
    expect(requests).toHaveLength(2);
    expect(requests[0]?.url).toBe("https://social.test/twitter/tweet/advanced_search");
    expect(requests[0]?.params).toEqual({ query: "ETH OR Ethereum", queryType: "Latest" });
    expect(requests[1]?.params).toEqual({ query: "ETH OR Ethereum", queryType: "Latest", cursor: "c2" });
    expect(requests[0]?.headers.get("X-API-Key")).toBe("test-key");
  });

  it("stops at the per-run cap", async () => {
    const { http, requests } = stubHttp(() => ({ status: 200, data: PAGE_1 }));
    const items = await fetchSocialItems({ ...settings, maxPerRun: 1 }, "ETH-USD", undefined, http);
    expect(items).toHaveLength(1);
    expect(requests).toHaveLength(1);
  });

  it("does nothing without an API key", async () => {
    const { http, requests } = stubHttp(() => ({ status: 200, data: PAGE_1 }));
    expect(await fetchSocialItems({ ...settings, apiKey: undefined }, "ETH-USD", undefined, http)).toEqual([]);
    expect(requests).toHaveLength(0);
  });

  it("turns rate limits into retryable errors", async () => {
    const { http } = stubHttp(() => ({ status: 429, headers: { "retry-after": "3" } }));
    const err = await fetchSocialItems(settings, "ETH-USD", undefined, http).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransientIngestError);
    if (err instanceof TransientIngestError) expect(err.retryAfterMs).toBe(3000);
  });

  it("passes client errors through", async () => {
    const { http } = stubHttp(() => ({ status: 401 }));
    const err = await fetchSocialItems(settings, "ETH-USD", undefined, http).catch((e: unknown) => e);
    expect(err).not.toBeInstanceOf(TransientIngestError);
    expect(err).toBeInstanceOf(Error);
  });

  it("stops on a malformed page", async () => {
    const { http } = stubHttp(() => ({ status: 200, data: { tweets: "none" } }));
    expect(await fetchSocialItems(settings, "ETH-USD", undefined, http)).toEqual([]);
  });
});
