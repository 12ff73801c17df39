/**
 * Zod schema for the permission policy
 */

import { z } from "zod";
import { ConfigError } from "../core/errors.js";
import type { PermissionPolicy, Tier } from "./types.js";

/** Legacy numeric levels: -1 blocked, 0 default, 1 trusted, 2 admin. */
function tierFromLevel(level: number): Tier {
  switch (level) {
    case -1:
      return "blocked";
    case 1:
      return "trusted";
    case 2:
      return "admin";
    default:
      return "default";
  }
}

export const tierSchema = z.union([
  z.enum(["blocked", "default", "trusted", "admin"]),
  z.number().int().min(-1).max(2).transform(tierFromLevel),
]);

const OVERRIDE_KEY = /^(private|group):[^/\s]+(\/[^/\s]+)?$/;

const idSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

export const permissionPolicySchema = z.object({
  defaultTier: tierSchema.default("default"),
  privateTier: tierSchema.default("default"),
  adminIds: z.array(idSchema).default([]),
  overrides: z
    .record(
      z.string().regex(OVERRIDE_KEY, {
        message: 'override keys look like "group:<id>" or "group:<id>/<senderId>"',
      }),
      tierSchema,
    )
    .default({}),
});

export type PermissionPolicyInput = z.input<typeof permissionPolicySchema>;

/**
 * Validate and freeze a policy. Malformed input is a ConfigError: policies
 * are checked when loaded, never while evaluating.
 */
export function parsePolicy(raw: unknown): PermissionPolicy {
  const result = permissionPolicySchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.errors
      .map((e) => `${e.path.length > 0 ? e.path.join(".") : "(root)"}: ${e.message}`)
      .join(", ");
    throw new ConfigError(`Invalid permission policy: ${issues}`);
  }
  const { defaultTier, privateTier, adminIds, overrides } = result.data;
  return Object.freeze({
    defaultTier,
    privateTier,
    adminIds: Object.freeze([...new Set(adminIds)]),
    overrides: Object.freeze({ ...overrides }),
  });
}
