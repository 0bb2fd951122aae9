import type { AppConfig } from "../config.js";
import type { RawItem } from "../types.js";
import { fetchFeedItems } from "./rss.js";
import { fetchSocialItems } from "./social.js";

export type SourceFetcher = (signal: AbortSignal) => Promise<RawItem[]>;

/** Bind each source adapter to its slice of the configuration. */
export function buildSources(cfg: AppConfig): { feed: SourceFetcher; social: SourceFetcher } {
  return {
    feed: (signal) =>
      fetchFeedItems(
        { urls: cfg.feeds.urls, windowMinutes: cfg.feeds.windowMinutes, timeoutMs: cfg.httpTimeoutMs },
        cfg.asset,
        signal
      ),
    social: (signal) =>
      fetchSocialItems({ ...cfg.social, timeoutMs: cfg.httpTimeoutMs }, cfg.asset, signal),
  };
}
