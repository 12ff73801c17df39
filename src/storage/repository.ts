/**
 * Persistence repository
 *
 * Narrow interface the dispatch core uses for durable state. The backing
 * schema belongs to the implementation.
 */

import type { Scope } from "../core/scope.js";
import type { ConversationContext, Turn } from "../core/types.js";
import type { PermissionPolicy } from "../policy/types.js";

export interface ContextRepository {
  /** Stored turns for the scope, oldest first, or null if none. */
  loadContext(scope: Scope): Promise<Turn[] | null>;
  saveContext(scope: Scope, context: ConversationContext): Promise<void>;
}

export interface PolicyRepository {
  /** Raw stored policy (validated by the caller), or null if none. */
  loadPolicy(): Promise<unknown | null>;
  savePolicy(policy: PermissionPolicy): Promise<void>;
}

export interface PersistenceRepository extends ContextRepository, PolicyRepository {
  close(): void;
}
