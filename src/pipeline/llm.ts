// src/pipeline/llm.ts
import OpenAI from "openai";

/** Anything that turns a prompt into completion text. */
export interface CompletionClient {
  complete(prompt: string, opts?: { signal?: AbortSignal; maxTokens?: number }): Promise<string>;
}

export type LlmSettings = {
  baseURL: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
};

/** Chat completions against any OpenAI-compatible endpoint (hosted or local). */
export class OpenAICompletionClient implements CompletionClient {
  private readonly client: OpenAI;

  constructor(private readonly settings: LlmSettings) {
    this.client = new OpenAI({
      apiKey: settings.apiKey,
      baseURL: settings.baseURL,
      timeout: settings.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(prompt: string, opts: { signal?: AbortSignal; maxTokens?: number } = {}): Promise<string> {
    const resp = await this.client.chat.completions.create(
      {
        model: this.settings.model,
        temperature: 0.2,
        max_tokens: opts.maxTokens ?? 120,
        messages: [{ role: "user", content: prompt }],
      },
      { signal: opts.signal, timeout: this.settings.timeoutMs }
    );
    return resp.choices[0]?.message?.content ?? "";
  }
}

export type ParseResult<T> =
  | { ok: true; value: T; partial: boolean }
  | { ok: false; error: string };

const FIELD_RE =
  /"([A-Za-z_][A-Za-z0-9_]*)"\s*:\s*("(?:[^"\\]|\\.)*"|-?\d+(?:\.\d+)?(?:[eE][-+]?\d+)?|true|false|null|\[[^\]]*\])/g;

function asObject(v: unknown): Record<string, unknown> | null {
  return v && typeof v === "object" && !Array.isArray(v) ? Object.fromEntries(Object.entries(v)) : null;
}

function tryParse(s: string): Record<string, unknown> | null {
  try {
    return asObject(JSON.parse(s));
  } catch {
    return null;
  }
}

/**
 * Best-effort JSON object extraction from model output: strict parse, then
 * the outermost {...} slice, then field-by-field recovery from a truncated
 * object. Never throws.
 */
export function parseLooseJson(text: string): ParseResult<Record<string, unknown>> {
  const s = text.replace(/```(?:json)?/gi, "").trim();
  if (!s) return { ok: false, error: "empty response" };

  const whole = tryParse(s);
  if (whole) return { ok: true, value: whole, partial: false };

  const i = s.indexOf("{");
  const j = s.lastIndexOf("}");
  if (i >= 0 && j > i) {
    const slice = tryParse(s.slice(i, j + 1));
    if (slice) return { ok: true, value: slice, partial: false };
  }

  if (i >= 0) {
    const recovered: Record<string, unknown> = {};
    for (const m of s.slice(i).matchAll(FIELD_RE)) {
      const key = m[1];
      const raw = m[2];
      if (key === undefined || raw === undefined) continue;
      try {
        recovered[key] = JSON.parse(raw);
      } catch {
        continue;
      }
    }
    if (Object.keys(recovered).length) return { ok: true, value: recovered, partial: true };
  }
  return { ok: false, error: "no JSON object found" };
}
