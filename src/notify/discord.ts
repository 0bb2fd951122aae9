import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { z } from "zod";
import { errorMessage, httpStatusOf } from "../errors.js";
import { log } from "../logger.js";
import type { HealthTracker } from "../runtime/health.js";
import { sleep } from "../runtime/retry.js";
import type { Action, Signal } from "../types.js";

// ---------- Types ----------
type EmbedField = { name: string; value: string; inline?: boolean };
export type Embed = {
  title?: string;
  description?: string;
  color?: number;
  timestamp?: string; // ISO
  fields?: EmbedField[];
  footer?: { text: string };
};

/** Push sink for action changes. Implementations must not throw. */
export interface TransitionNotifier {
  notifyTransition(previous: Signal, next: Signal, signal?: AbortSignal): Promise<void>;
}

// ---------- Limits ----------
const LIMITS = {
  TITLE: 256,
  DESC: 4096,
  FIELDS: 25,
  FIELD_NAME: 256,
  FIELD_VALUE: 1024,
};

const COLORS: Record<Action, number> = {
  accumulate: 0x2ecc71,
  hold: 0x95a5a6,
  wait: 0xe74c3c,
};

export function sanitizeEmbed(e: Embed): Embed {
  const out: Embed = { ...e };
  if (out.title && out.title.length > LIMITS.TITLE)
    out.title = out.title.slice(0, LIMITS.TITLE - 1) + "…";
  if (out.description && out.description.length > LIMITS.DESC)
    out.description = out.description.slice(0, LIMITS.DESC - 1) + "…";
  if (out.fields) {
    out.fields = out.fields.slice(0, LIMITS.FIELDS).map((f) => {
      let name = f.name || "";
      let value = f.value || "";
      if (name.length > LIMITS.FIELD_NAME)
        name = name.slice(0, LIMITS.FIELD_NAME - 1) + "…";
      if (value.length > LIMITS.FIELD_VALUE)
        value = value.slice(0, LIMITS.FIELD_VALUE - 1) + "…";
      return { name, value, inline: f.inline };
    });
  }
  return out;
}

const fmt = (n: number | null, digits = 2) =>
  n === null || !Number.isFinite(n) ? "n/a" : n.toFixed(digits);

/** One embed describing the action change. */
export function transitionEmbed(previous: Signal, next: Signal): Embed {
  return sanitizeEmbed({
    title: `${next.asset}: ${previous.action} → ${next.action}`,
    description: `alpha ${fmt(next.alpha)} (was ${fmt(previous.alpha)})`,
    color: COLORS[next.action],
    timestamp: new Date(next.ts).toISOString(),
    fields: [
      { name: "Sentiment EMA", value: fmt(next.ema15, 3), inline: true },
      { name: "Mentions", value: `${next.mentions} (z ${fmt(next.mentions_z)})`, inline: true },
      { name: "Close", value: fmt(next.price_close), inline: true },
      { name: "RSI14", value: fmt(next.rsi14, 1), inline: true },
      { name: "ATR%", value: fmt(next.atr_pct), inline: true },
      { name: "Price bias", value: `${fmt(next.price_bias)}%`, inline: true },
    ],
    footer: { text: "signal transition" },
  });
}

const RateLimitBody = z.object({ retry_after: z.coerce.number().nonnegative() }).partial();

export type DiscordSettings = {
  token?: string;
  channelId?: string;
  timeoutMs: number;
};

/**
 * Bot Token + Channel ID delivery. One 429 retry honouring retry_after;
 * anything else is logged and dropped.
 */
export class DiscordNotifier implements TransitionNotifier {
  private readonly http: AxiosInstance;

  constructor(
    private readonly settings: DiscordSettings,
    private readonly health?: HealthTracker,
    http?: AxiosInstance
  ) {
    this.http = http ?? axios.create({ baseURL: "https://discord.com/api/v10" });
  }

  get enabled(): boolean {
    return !!(this.settings.token && this.settings.channelId);
  }

  private async post(path: string, body: unknown, signal?: AbortSignal): Promise<AxiosResponse<unknown>> {
    const headers = {
      Authorization: `Bot ${this.settings.token ?? ""}`,
      "Content-Type": "application/json",
    };
    const opts = { headers, timeout: this.settings.timeoutMs, signal };
    try {
      return await this.http.post<unknown>(path, body, opts);
    } catch (err) {
      if (httpStatusOf(err) !== 429) throw err;
      const data = axios.isAxiosError(err) ? err.response?.data : undefined;
      const parsed = RateLimitBody.safeParse(data);
      const retryAfter = ((parsed.success ? parsed.data.retry_after : undefined) ?? 1) * 1000;
      await sleep(Math.min(retryAfter, 10_000), signal);
      return await this.http.post<unknown>(path, body, opts);
    }
  }

  async notifyTransition(previous: Signal, next: Signal, signal?: AbortSignal): Promise<void> {
    if (!this.enabled) return;
    try {
      await this.post(
        `/channels/${this.settings.channelId}/messages`,
        { embeds: [transitionEmbed(previous, next)] },
        signal
      );
      this.health?.success("notifier");
    } catch (err) {
      if (signal?.aborted) {
        log.debug("[NOTIFY] delivery cancelled on shutdown");
        return;
      }
      this.health?.failure("notifier", errorMessage(err));
      log.warn("[NOTIFY] discord delivery failed", errorMessage(err));
    }
  }
}
