/**
 * OpenAI-compatible completion client
 *
 * Supports any OpenAI-compatible endpoint (OpenAI, Ollama, vLLM, DeepSeek, etc.).
 * Failures come back as CompletionError values; retrying is the caller's job.
 */

import { createLogger } from "../utils/logger.js";
import { err, ok, type Result } from "../utils/result.js";
import type { CompletionRequest, Turn } from "../core/types.js";
import { describeError, type CompletionError } from "../core/errors.js";

const log = createLogger("completion-client");

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CompletionClientConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
  timeoutMs: number;
  maxTokens?: number;
  temperature?: number;
  /** Used when a 429 carries no usable Retry-After. */
  defaultRetryAfterMs: number;
  now?: () => number;
}

export interface OpenAIMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

interface OpenAIRequest {
  model: string;
  messages: OpenAIMessage[];
  max_tokens?: number;
  temperature?: number;
  stream: false;
}

export interface CompletionClient {
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<Result<string, CompletionError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Message Conversion
// ─────────────────────────────────────────────────────────────────────────────

/** Group user turns carry the speaker so the model can tell people apart. */
export function formatUserTurn(turn: Readonly<Turn>, group: boolean): string {
  if (!group || !turn.senderId) return turn.text;
  const name = turn.senderName ?? turn.senderId;
  return `[${name}(${turn.senderId})] ${turn.text}`;
}

export function toOpenAIMessages(request: CompletionRequest): OpenAIMessage[] {
  const group = request.scope.kind === "group";
  const messages: OpenAIMessage[] = [{ role: "system", content: request.systemPrompt }];
  for (const turn of request.turns) {
    messages.push(
      turn.role === "user"
        ? { role: "user", content: formatUserTurn(turn, group) }
        : { role: "assistant", content: turn.text },
    );
  }
  return messages;
}

/**
 * Retry-After as milliseconds: delta-seconds or an HTTP-date.
 * Returns null when absent or unparseable.
 */
export function parseRetryAfter(value: string | null, now: number): number | null {
  if (value === null) return null;
  const trimmed = value.trim();
  if (trimmed === "") return null;
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
}

/** Map a non-2xx status to an error kind. */
export function classifyStatus(
  status: number,
  message: string,
  retryAfterMs: number,
): CompletionError {
  if (status === 429) return { kind: "rate_limited", retryAfterMs, message };
  if (status === 408 || status >= 500) return { kind: "transient", message };
  return { kind: "fatal", message };
}

/** First choice's text, or null when the body has no usable completion. */
export function extractContent(body: unknown): string | null {
  if (typeof body !== "object" || body === null || !("choices" in body)) return null;
  const choices = body.choices;
  if (!Array.isArray(choices) || choices.length === 0) return null;
  const first: unknown = choices[0];
  if (typeof first !== "object" || first === null || !("message" in first)) return null;
  const message: unknown = first.message;
  if (typeof message !== "object" || message === null || !("content" in message)) return null;
  const content: unknown = message.content;
  if (content === null) return "";
  return typeof content === "string" ? content : null;
}

// ─────────────────────────────────────────────────────────────────────────────
// API Client
// ─────────────────────────────────────────────────────────────────────────────

export class OpenAICompatibleClient implements CompletionClient {
  private readonly url: string;
  private readonly now: () => number;

  constructor(private readonly config: CompletionClientConfig) {
    // Normalize baseUrl - remove trailing slash, ensure /chat/completions path
    const normalizedBaseUrl = config.baseUrl.replace(/\/+$/, "");
    this.url = normalizedBaseUrl.endsWith("/chat/completions")
      ? normalizedBaseUrl
      : `${normalizedBaseUrl}/chat/completions`;
    this.now = config.now ?? Date.now;
  }

  async complete(
    request: CompletionRequest,
    signal?: AbortSignal,
  ): Promise<Result<string, CompletionError>> {
    const { model, apiKey, timeoutMs } = this.config;

    const requestBody: OpenAIRequest = {
      model,
      messages: toOpenAIMessages(request),
      stream: false,
    };
    if (this.config.maxTokens !== undefined) requestBody.max_tokens = this.config.maxTokens;
    if (this.config.temperature !== undefined) requestBody.temperature = this.config.temperature;

    log.debug(`Calling ${this.url} (model: ${model}, turns: ${request.turns.length})`);

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (apiKey && apiKey.trim() !== "") {
      headers["Authorization"] = `Bearer ${apiKey}`;
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await fetch(this.url, {
        method: "POST",
        headers,
        body: JSON.stringify(requestBody),
        signal: controller.signal,
      });

      if (!response.ok) {
        let errorMessage = `HTTP ${response.status}: ${response.statusText}`;
        try {
          const detail = errorDetail(await response.json());
          if (detail) errorMessage = `HTTP ${response.status}: ${detail}`;
        } catch {
          // non-JSON error body, keep the status line
        }
        const retryAfterMs =
          parseRetryAfter(response.headers.get("retry-after"), this.now()) ??
          this.config.defaultRetryAfterMs;
        const error = classifyStatus(response.status, errorMessage, retryAfterMs);
        log.warn(`Completion failed (${error.kind}): ${errorMessage}`);
        return err(error);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (e) {
        return err({ kind: "fatal", message: `Malformed completion body: ${describeError(e)}` });
      }

      const content = extractContent(body);
      if (content === null) {
        return err({ kind: "fatal", message: "Malformed completion body: no choices[0].message.content" });
      }
      if (content.trim() === "") {
        return err({ kind: "transient", message: "Empty completion" });
      }
      return ok(content.trim());
    } catch (e) {
      if (e instanceof Error && e.name === "AbortError") {
        if (timedOut) {
          log.warn(`Completion timed out after ${timeoutMs}ms`);
          return err({ kind: "timeout", message: `Request timed out after ${timeoutMs}ms` });
        }
        return err({ kind: "transient", message: "Request aborted" });
      }
      log.warn(`Completion network error: ${describeError(e)}`);
      return err({ kind: "transient", message: `Network error: ${describeError(e)}` });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}

function errorDetail(body: unknown): string | null {
  if (typeof body !== "object" || body === null || !("error" in body)) return null;
  const error: unknown = body.error;
  if (typeof error === "string") return error;
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return null;
}
