// src/pipeline/spam.ts
import type { SpamRules } from "../config.js";
import type { RawItem } from "../types.js";

export type SpamReason =
  | "empty"
  | "too_short"
  | "too_long"
  | "low_engagement"
  | "too_many_hashtags"
  | "hashtag_ratio"
  | "too_many_mentions"
  | "too_many_urls"
  | "shouting"
  | "symbol_ratio"
  | "banned_keyword"
  | "repetition"
  | "foreign_cashtags"
  | "off_topic";

export type SpamVerdict = { accept: boolean; reasons: SpamReason[] };

const HASHTAG_RE = /#\w+/g;
const MENTION_RE = /@[A-Za-z0-9_]+/g;
const URL_RE = /https?:\/\/\S+|www\.\S+/g;
const CASHTAG_RE = /\$[A-Za-z][A-Za-z0-9]{1,9}/g;
const SYMBOLS = new Set("!$%^&*~+><=:_|");

const count = (re: RegExp, s: string) => s.match(re)?.length ?? 0;

/** Text without mentions and URLs, whitespace collapsed. */
export function cleanText(s: string): string {
  return s.replace(MENTION_RE, "").replace(URL_RE, "").split(/\s+/).filter(Boolean).join(" ");
}

function hasRepetition(clean: string, maxRepeatRatio: number, maxCharRun: number): boolean {
  // a run of one is any character
  if (maxCharRun > 1) {
    const run = new RegExp(`(.)\\1{${maxCharRun - 1},}`, "u");
    if (run.test(clean)) return true;
  }
  if (maxRepeatRatio > 0) {
    const words = clean.toLowerCase().split(" ").filter((w) => w.length > 1);
    if (words.length >= 6) {
      const freq = new Map<string, number>();
      for (const w of words) freq.set(w, (freq.get(w) ?? 0) + 1);
      const top = Math.max(...freq.values());
      if (top / words.length > maxRepeatRatio) return true;
    }
  }
  return false;
}

function mentionsKeyword(low: string, keywords: string[]): boolean {
  return keywords.some((k) => {
    const kw = k.toLowerCase();
    if (kw.startsWith("$")) return low.includes(kw);
    const escaped = kw.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    return new RegExp(`(^|[^a-z0-9])${escaped}([^a-z0-9]|$)`).test(low);
  });
}

/**
 * Anti-spam rules. Every rule is evaluated; the item is rejected when any
 * of them fires. A threshold of 0 (or an empty list) switches a rule off.
 */
export function evaluateSpam(raw: Pick<RawItem, "text" | "engagement">, rules: SpamRules): SpamVerdict {
  const reasons: SpamReason[] = [];
  const text = raw.text ?? "";
  const clean = cleanText(text);
  if (!clean) return { accept: false, reasons: ["empty"] };

  if (rules.minTextLen > 0 && clean.length < rules.minTextLen) reasons.push("too_short");
  if (rules.maxTextLen > 0 && clean.length > rules.maxTextLen) reasons.push("too_long");

  if (rules.minEngagement > 0 && raw.engagement) {
    const { likes, reposts, replies } = raw.engagement;
    if (likes + reposts + replies < rules.minEngagement) reasons.push("low_engagement");
  }

  const hashtags = count(HASHTAG_RE, text);
  if (rules.maxHashtags > 0 && hashtags > rules.maxHashtags) reasons.push("too_many_hashtags");
  if (rules.maxHashtagRatio > 0) {
    const words = text.split(/\s+/).filter(Boolean).length;
    if (words > 0 && hashtags / words > rules.maxHashtagRatio) reasons.push("hashtag_ratio");
  }
  if (rules.maxMentions > 0 && count(MENTION_RE, text) > rules.maxMentions) reasons.push("too_many_mentions");
  if (rules.maxUrls > 0 && count(URL_RE, text) > rules.maxUrls) reasons.push("too_many_urls");

  if (rules.maxUpperRatio > 0) {
    let upper = 0;
    let lower = 0;
    for (const ch of clean) {
      if (ch >= "A" && ch <= "Z") upper++;
      else if (ch >= "a" && ch <= "z") lower++;
    }
    const letters = upper + lower;
    if (letters >= 10 && upper / letters > rules.maxUpperRatio) reasons.push("shouting");
  }

  if (rules.maxSymbolRatio > 0) {
    let sym = 0;
    for (const ch of text) if (SYMBOLS.has(ch)) sym++;
    if (sym / text.length > rules.maxSymbolRatio) reasons.push("symbol_ratio");
  }

  const low = clean.toLowerCase();
  if (rules.bannedKeywords.some((w) => low.includes(w.toLowerCase()))) reasons.push("banned_keyword");

  if (hasRepetition(clean, rules.maxRepeatRatio, rules.maxCharRun)) reasons.push("repetition");

  if (rules.onlyCashtag) {
    const tags = (text.match(CASHTAG_RE) ?? []).map((c) => c.toLowerCase());
    const allowed = rules.onlyCashtag.toLowerCase();
    const foreign = tags.filter((t) => t !== allowed);
    if (foreign.length >= 1 && tags.length >= 2) reasons.push("foreign_cashtags");
  }

  if (rules.requiredKeywords.length && !mentionsKeyword(text.toLowerCase(), rules.requiredKeywords)) {
    reasons.push("off_topic");
  }

  return { accept: reasons.length === 0, reasons };
}
