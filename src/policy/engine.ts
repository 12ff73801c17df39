/**
 * Permission engine: resolves the tier a sender has in a scope.
 *
 * Precedence, highest first:
 *   1. override for this sender in this scope ("group:1/42")
 *   2. admin id
 *   3. override for the whole scope ("group:1")
 *   4. private-chat default (private scopes only)
 *   5. policy default
 */

import { scopeKey, type Scope } from "../core/scope.js";
import {
  tierAtLeast,
  type PermissionPolicy,
  type Principal,
  type Tier,
  type TierResolution,
} from "./types.js";

/** Minimum tier that may trigger a completion. */
export const TRIGGER_TIER: Tier = "default";

export function resolveTier(
  senderId: string,
  scope: Scope,
  policy: PermissionPolicy,
): TierResolution {
  const key = scopeKey(scope);

  const principalOverride = policy.overrides[`${key}/${senderId}`];
  if (principalOverride) return { tier: principalOverride, rule: "principal-override" };

  if (policy.adminIds.includes(senderId)) return { tier: "admin", rule: "admin" };

  const scopeOverride = policy.overrides[key];
  if (scopeOverride) return { tier: scopeOverride, rule: "scope-override" };

  if (scope.kind === "private") return { tier: policy.privateTier, rule: "private-default" };

  return { tier: policy.defaultTier, rule: "default" };
}

export function evaluate(senderId: string, scope: Scope, policy: PermissionPolicy): Tier {
  return resolveTier(senderId, scope, policy).tier;
}

export function resolvePrincipal(
  senderId: string,
  scope: Scope,
  policy: PermissionPolicy,
): Principal {
  return { senderId, tier: evaluate(senderId, scope, policy) };
}

export function mayTrigger(tier: Tier): boolean {
  return tierAtLeast(tier, TRIGGER_TIER);
}
