/**
 * Permission tiers and policy types
 */

export type Tier = "blocked" | "default" | "trusted" | "admin";

/** Lowest to highest. */
export const TIERS: readonly Tier[] = ["blocked", "default", "trusted", "admin"];

export interface PermissionPolicy {
  readonly defaultTier: Tier;
  readonly privateTier: Tier;
  readonly adminIds: readonly string[];
  /**
   * Keyed by scope ("group:20002") or by scope and sender
   * ("group:20002/10001").
   */
  readonly overrides: Readonly<Record<string, Tier>>;
}

/** Sender with the tier it resolved to for one event. Never stored. */
export interface Principal {
  senderId: string;
  tier: Tier;
}

export type TierRule =
  | "principal-override"
  | "admin"
  | "scope-override"
  | "private-default"
  | "default";

export interface TierResolution {
  tier: Tier;
  rule: TierRule;
}

export function tierRank(tier: Tier): number {
  return TIERS.indexOf(tier);
}

export function compareTiers(a: Tier, b: Tier): number {
  return tierRank(a) - tierRank(b);
}

export function tierAtLeast(tier: Tier, min: Tier): boolean {
  return compareTiers(tier, min) >= 0;
}
