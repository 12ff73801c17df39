/**
 * Policy holder: the live permission policy snapshot.
 *
 * Every reader gets a whole frozen snapshot; updates swap the reference in
 * one assignment, so no worker can see a half-applied policy.
 */

import { createLogger } from "../utils/logger.js";
import { parsePolicy } from "./schema.js";
import type { PermissionPolicy } from "./types.js";
import type { PolicyRepository } from "../storage/repository.js";

const log = createLogger("policy-loader");

export class PolicyHolder {
  private snapshot: PermissionPolicy;

  constructor(
    initial: PermissionPolicy,
    private readonly repository: PolicyRepository | null = null,
  ) {
    this.snapshot = initial;
  }

  /**
   * Build the startup snapshot. A policy from the config file wins and is
   * written through to the repository; without one, the last stored policy
   * is used, then the built-in defaults.
   */
  static async load(
    repository: PolicyRepository | null,
    configured?: unknown,
  ): Promise<PolicyHolder> {
    if (configured !== undefined) {
      const policy = parsePolicy(configured);
      await repository?.savePolicy(policy);
      log.info("Permission policy loaded from config", summarize(policy));
      return new PolicyHolder(policy, repository);
    }

    const stored = repository ? await repository.loadPolicy() : null;
    const policy = parsePolicy(stored ?? {});
    log.info(
      stored ? "Permission policy loaded from storage" : "Using default permission policy",
      summarize(policy),
    );
    return new PolicyHolder(policy, repository);
  }

  current(): PermissionPolicy {
    return this.snapshot;
  }

  /** Validate, persist, then swap. The old snapshot stays if any step fails. */
  async replace(raw: unknown): Promise<PermissionPolicy> {
    const next = parsePolicy(raw);
    await this.repository?.savePolicy(next);
    this.snapshot = next;
    log.info("Permission policy replaced", summarize(next));
    return next;
  }

  /** Re-read the stored policy. Keeps the current one when nothing is stored. */
  async reload(): Promise<PermissionPolicy> {
    if (!this.repository) return this.snapshot;
    const stored = await this.repository.loadPolicy();
    if (stored === null) {
      log.warn("No stored permission policy; keeping the current one");
      return this.snapshot;
    }
    this.snapshot = parsePolicy(stored);
    log.info("Permission policy reloaded", summarize(this.snapshot));
    return this.snapshot;
  }
}

function summarize(policy: PermissionPolicy) {
  return {
    defaultTier: policy.defaultTier,
    privateTier: policy.privateTier,
    adminCount: policy.adminIds.length,
    overrideCount: Object.keys(policy.overrides).length,
  };
}
