/**
 * Conversation scope: a private chat with one user, or a group.
 */

export type ScopeKind = "private" | "group";

export interface Scope {
  readonly kind: ScopeKind;
  readonly id: string;
}

/** Canonical key, e.g. "private:10001" or "group:20002". */
export type ScopeKey = `${ScopeKind}:${string}`;

export function makeScope(kind: ScopeKind, id: string | number): Scope {
  return Object.freeze({ kind, id: String(id) });
}

export function scopeKey(scope: Scope): ScopeKey {
  return `${scope.kind}:${scope.id}`;
}
