import type { InboundEvent } from "../core/types.js";

export type ActivationMode = "always" | "mention";

export interface ActivationConfig {
  activation: ActivationMode;
  mentionPatterns?: readonly string[];
  /** Case-insensitive substrings and the score each adds. */
  keywords?: Readonly<Record<string, number>>;
  /** Score a group message needs in `mention` mode. */
  threshold?: number;
  /** Score added while a scope is in its follow-up window. */
  followUpBonus?: number;
  /** User turns after a delivered reply that get the follow-up bonus. */
  followUpTurns?: number;
}

/** An @-mention or a matching mention pattern. */
export const MENTION_SCORE = 100;
export const DEFAULT_THRESHOLD = 50;
export const DEFAULT_FOLLOW_UP_BONUS = 30;
export const DEFAULT_FOLLOW_UP_TURNS = 3;

export const DEFAULT_KEYWORDS: Readonly<Record<string, number>> = {
  "帮": 20,
  "?": 20,
  "？": 20,
  "呢": 20,
  "嘛": 20,
  "吗": 20,
  "!": 10,
  "！": 10,
};

export function matchesMentionPatterns(body: string, patterns?: readonly string[]): boolean {
  if (!patterns || patterns.length === 0) return false;
  for (const p of patterns) {
    const pat = p.trim();
    if (!pat) continue;
    try {
      const re = new RegExp(pat, "i");
      if (re.test(body)) return true;
    } catch {
      // Invalid regex: fall back to case-insensitive substring match.
      if (body.toLowerCase().includes(pat.toLowerCase())) return true;
    }
  }
  return false;
}

/**
 * How strongly a group message asks for an answer: mentions, keyword hits
 * and the follow-up bonus add up.
 */
export function activationScore(
  event: InboundEvent,
  config: ActivationConfig,
  followingUp = false,
): number {
  let score = followingUp ? (config.followUpBonus ?? DEFAULT_FOLLOW_UP_BONUS) : 0;
  if (event.mentioned || matchesMentionPatterns(event.text, config.mentionPatterns)) {
    score += MENTION_SCORE;
  }
  const body = event.text.toLowerCase();
  for (const [keyword, weight] of Object.entries(config.keywords ?? {})) {
    if (keyword !== "" && body.includes(keyword.toLowerCase())) score += weight;
  }
  return score;
}

/**
 * Whether an event should trigger a completion. Private chats always do;
 * groups in `mention` mode only when the activation score reaches the
 * threshold. `followingUp` is true for the turns right after a reply.
 */
export function shouldRespond(
  event: InboundEvent,
  config: ActivationConfig,
  followingUp = false,
): boolean {
  if (event.scope.kind === "private") return true;
  if (config.activation === "always") return true;
  return activationScore(event, config, followingUp) >= (config.threshold ?? DEFAULT_THRESHOLD);
}
