/**
 * OneBot v11 HTTP command API: outbound messages.
 */

import { z } from "zod";
import { createLogger } from "../../utils/logger.js";
import { err, ok, type Result } from "../../utils/result.js";
import type { Scope } from "../../core/scope.js";
import type { DeliveryId } from "../../core/types.js";
import { describeError, type GatewayError } from "../../core/errors.js";

const log = createLogger("onebot-poster");

export interface OneBotPosterConfig {
  httpUrl: string;
  token?: string;
  timeoutMs: number;
}

const actionResponseSchema = z.object({
  status: z.string(),
  retcode: z.number().optional(),
  data: z
    .object({ message_id: z.union([z.number(), z.string()]).optional() })
    .passthrough()
    .nullish(),
  message: z.string().optional(),
  wording: z.string().optional(),
});

export function sendAction(scope: Scope, text: string): { action: string; body: Record<string, unknown> } {
  if (scope.kind === "group") {
    return { action: "send_group_msg", body: { group_id: numericId(scope.id), message: text } };
  }
  return { action: "send_private_msg", body: { user_id: numericId(scope.id), message: text } };
}

/**
 * POST a text message to the bridge. Returns the bridge's message id.
 */
export async function postMessage(
  config: OneBotPosterConfig,
  scope: Scope,
  text: string,
): Promise<Result<DeliveryId, GatewayError>> {
  const { action, body } = sendAction(scope, text);
  const url = `${config.httpUrl.replace(/\/+$/, "")}/${action}`;

  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (config.token && config.token.trim() !== "") {
    headers["Authorization"] = `Bearer ${config.token}`;
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), config.timeoutMs);

  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal: controller.signal,
    });
  } catch (e) {
    clearTimeout(timeoutId);
    if (e instanceof Error && e.name === "AbortError") {
      log.warn(`${action} timed out after ${config.timeoutMs}ms`);
      return err({ kind: "timeout", message: `Send timed out after ${config.timeoutMs}ms` });
    }
    log.warn(`${action} network error: ${describeError(e)}`);
    return err({ kind: "disconnected", message: describeError(e) });
  }

  try {
    if (!response.ok) {
      const message = `HTTP ${response.status}: ${response.statusText}`;
      log.warn(`${action} failed: ${message}`);
      return err({ kind: "send_failed", message, retryable: response.status >= 500 });
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (e) {
      return err({ kind: "send_failed", message: `Malformed response: ${describeError(e)}`, retryable: false });
    }

    const parsed = actionResponseSchema.safeParse(json);
    if (!parsed.success) {
      return err({ kind: "send_failed", message: "Malformed response body", retryable: false });
    }
    if (parsed.data.status !== "ok") {
      const detail = parsed.data.wording ?? parsed.data.message ?? `retcode ${parsed.data.retcode ?? "?"}`;
      log.warn(`${action} rejected: ${detail}`);
      return err({ kind: "send_failed", message: detail, retryable: false });
    }

    const messageId = parsed.data.data?.message_id;
    return ok(messageId !== undefined ? String(messageId) : "");
  } catch (e) {
    if (e instanceof Error && e.name === "AbortError") {
      return err({ kind: "timeout", message: `Send timed out after ${config.timeoutMs}ms` });
    }
    throw e;
  } finally {
    clearTimeout(timeoutId);
  }
}

function numericId(id: string): number | string {
  return /^\d+$/.test(id) ? Number(id) : id;
}
