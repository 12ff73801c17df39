// src/gateway/commands.ts
/**
 * Chat-command interceptor for the dispatch pipeline.
 *
 * Commands are answered directly and never reach the completion provider:
 * - `#echo <text>`: reply with the text
 * - `/new`: clear the scope's context
 * - `/tier`: report the sender's tier in this scope
 * - `/resume` (admin): lift a halt caused by a fatal provider error
 * - `/reload-policy` (admin): re-read the permission policy from storage
 */

import { createLogger } from "../utils/logger.js";
import { scopeKey, type Scope } from "../core/scope.js";
import type { InboundEvent } from "../core/types.js";
import { describeError } from "../core/errors.js";
import type { ConversationStore } from "../conversation/store.js";
import type { PolicyHolder } from "../policy/loader.js";
import { tierAtLeast, type Tier } from "../policy/types.js";

const log = createLogger("commands");

const ECHO_TRIGGER = "#echo";
const RESET_TRIGGERS = ["/new", "/reset"];
const TIER_TRIGGERS = ["/tier"];
const RESUME_TRIGGERS = ["/resume"];
const RELOAD_TRIGGERS = ["/reload-policy"];

export interface CommandContext {
  event: InboundEvent;
  tier: Tier;
  store: ConversationStore;
  policy: PolicyHolder;
  /** Clears a halted scope; returns whether it was halted. */
  resume: (scope: Scope) => boolean;
}

export type CommandResult =
  | { handled: false }
  | { handled: true; command: string; reply: string };

/** Text with leading `@<id>` mentions removed. */
export function stripLeadingMentions(text: string): string {
  return text.replace(/^(\s*@<[^>]*>)+/, "").trim();
}

/** Splits `"/cmd a b"` into the lower-cased trigger and the remainder. */
export function parseCommand(text: string): { trigger: string; args: string } | null {
  const body = stripLeadingMentions(text);
  if (!body.startsWith("/") && !body.startsWith("#")) return null;
  const match = /^(\S+)\s*([\s\S]*)$/.exec(body);
  if (!match) return null;
  return { trigger: match[1].toLowerCase(), args: match[2].trim() };
}

/**
 * Try to intercept a command. Returns `{ handled: false }` when the text is
 * not a known command and should continue to the provider.
 */
export async function tryHandleCommand(options: CommandContext): Promise<CommandResult> {
  const { event, tier, store, policy, resume } = options;
  const parsed = parseCommand(event.text);
  if (!parsed) return { handled: false };
  const { trigger, args } = parsed;
  const key = scopeKey(event.scope);

  if (trigger === ECHO_TRIGGER) {
    return { handled: true, command: ECHO_TRIGGER, reply: args };
  }

  if (RESET_TRIGGERS.includes(trigger)) {
    await store.clear(event.scope);
    log.info(`Context reset in ${key} by ${event.senderId}`);
    return { handled: true, command: "/new", reply: "Started a new conversation." };
  }

  if (TIER_TRIGGERS.includes(trigger)) {
    return { handled: true, command: "/tier", reply: `Your tier here: ${tier}` };
  }

  const isResume = RESUME_TRIGGERS.includes(trigger);
  const isReload = RELOAD_TRIGGERS.includes(trigger);
  if (!isResume && !isReload) return { handled: false };

  const command = isResume ? "/resume" : "/reload-policy";
  if (!tierAtLeast(tier, "admin")) {
    log.warn(`Unauthorized ${command} from ${event.senderId} in ${key}`);
    return { handled: true, command, reply: `${command} requires admin.` };
  }

  if (isResume) {
    const wasHalted = resume(event.scope);
    log.info(`${key} resumed by ${event.senderId} (was halted: ${wasHalted})`);
    return {
      handled: true,
      command,
      reply: wasHalted ? "Resumed." : "Nothing to resume.",
    };
  }

  try {
    const next = await policy.reload();
    return {
      handled: true,
      command,
      reply: `Policy reloaded (default: ${next.defaultTier}, private: ${next.privateTier}, admins: ${next.adminIds.length}).`,
    };
  } catch (err) {
    log.error(`Policy reload failed: ${describeError(err)}`);
    return { handled: true, command, reply: `Policy reload failed: ${describeError(err)}` };
  }
}
