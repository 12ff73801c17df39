/**
 * ConversationStore
 *
 * Rolling per-scope context window with write-behind persistence.
 *
 * - At most `windowSize` turns per scope; the oldest turn is evicted first.
 * - Hydrates a scope from the repository the first time it is touched.
 * - `flush` never rejects: write failures are logged and dispatch continues.
 *
 * Callers must serialize operations per scope (the dispatcher's scope queue
 * does); distinct scopes are independent.
 */

import { createLogger } from "../utils/logger.js";
import { scopeKey, type Scope, type ScopeKey } from "../core/scope.js";
import type { ConversationContext, Turn } from "../core/types.js";
import { PersistenceError, describeError } from "../core/errors.js";
import type { ContextRepository } from "../storage/repository.js";

const log = createLogger("conversation-store");

export interface ConversationStoreOptions {
  repository: ContextRepository | null;
  /** Maximum turns kept per scope (N). */
  windowSize: number;
  /** Drop turns older than this from request snapshots (0 = keep all). */
  maxTurnAgeMs?: number;
}

interface ScopeEntry {
  scope: Scope;
  turns: Turn[];
  dirty: boolean;
  /** Tail of the write chain for this scope. */
  writing: Promise<void>;
}

export class ConversationStore {
  private readonly entries = new Map<ScopeKey, ScopeEntry>();
  private readonly loading = new Map<ScopeKey, Promise<ScopeEntry>>();
  private readonly repository: ContextRepository | null;
  readonly windowSize: number;
  private readonly maxTurnAgeMs: number;

  constructor(options: ConversationStoreOptions) {
    if (!Number.isInteger(options.windowSize) || options.windowSize < 1) {
      throw new RangeError(`windowSize must be a positive integer, got ${options.windowSize}`);
    }
    this.repository = options.repository;
    this.windowSize = options.windowSize;
    this.maxTurnAgeMs = options.maxTurnAgeMs ?? 0;
  }

  /** Hydrate a scope from the repository if it is not in memory yet. */
  async load(scope: Scope): Promise<ConversationContext> {
    const entry = await this.entry(scope);
    return freezeTurns(entry.turns);
  }

  /** Append a turn and return the window after eviction. */
  async append(scope: Scope, turn: Turn): Promise<ConversationContext> {
    const entry = await this.entry(scope);
    entry.turns.push({ ...turn });
    if (entry.turns.length > this.windowSize) {
      entry.turns.splice(0, entry.turns.length - this.windowSize);
    }
    entry.dirty = true;
    return freezeTurns(entry.turns);
  }

  /** Read-only copy of the stored window (empty for unknown scopes). */
  snapshot(scope: Scope): ConversationContext {
    const entry = this.entries.get(scopeKey(scope));
    return freezeTurns(entry?.turns ?? []);
  }

  /** Window used to build a completion request: stale turns dropped. */
  snapshotForRequest(scope: Scope, now: number): ConversationContext {
    const turns = this.snapshot(scope);
    if (this.maxTurnAgeMs <= 0) return turns;
    const cutoff = now - this.maxTurnAgeMs;
    return turns.filter((t) => t.timestamp >= cutoff);
  }

  async clear(scope: Scope): Promise<void> {
    const entry = await this.entry(scope);
    entry.turns = [];
    entry.dirty = true;
    await this.flush(scope);
    log.info(`Cleared context for ${scopeKey(scope)}`);
  }

  /**
   * Best-effort durable write of the scope's window. Writes for one scope
   * land in call order. Resolves once this write has settled.
   */
  flush(scope: Scope): Promise<void> {
    const key = scopeKey(scope);
    const entry = this.entries.get(key);
    if (!entry || !this.repository) return Promise.resolve();

    const repository = this.repository;
    const write = entry.writing.then(async () => {
      if (!entry.dirty) return;
      entry.dirty = false;
      const turns = freezeTurns(entry.turns);
      try {
        await repository.saveContext(entry.scope, turns);
        log.debug(`Flushed ${turns.length} turns for ${key}`);
      } catch (err) {
        entry.dirty = true;
        const failure =
          err instanceof PersistenceError
            ? err
            : new PersistenceError("write_failed", describeError(err), { cause: err });
        log.warn(`Context write failed for ${key}: ${failure.message}`);
      }
    });
    entry.writing = write;
    return write;
  }

  async flushAll(): Promise<void> {
    await Promise.all([...this.entries.values()].map((entry) => this.flush(entry.scope)));
  }

  scopes(): Scope[] {
    return [...this.entries.values()].map((entry) => entry.scope);
  }

  private async entry(scope: Scope): Promise<ScopeEntry> {
    const key = scopeKey(scope);
    const existing = this.entries.get(key);
    if (existing) return existing;

    const pending = this.loading.get(key);
    if (pending) return pending;

    const load = this.hydrate(scope).finally(() => this.loading.delete(key));
    this.loading.set(key, load);
    return load;
  }

  private async hydrate(scope: Scope): Promise<ScopeEntry> {
    const key = scopeKey(scope);
    let turns: Turn[] = [];
    if (this.repository) {
      try {
        turns = (await this.repository.loadContext(scope)) ?? [];
      } catch (err) {
        log.warn(`Could not load context for ${key}, starting empty: ${describeError(err)}`);
      }
    }
    if (turns.length > this.windowSize) {
      turns = turns.slice(turns.length - this.windowSize);
    }
    const entry: ScopeEntry = { scope, turns, dirty: false, writing: Promise.resolve() };
    this.entries.set(key, entry);
    return entry;
  }
}

function freezeTurns(turns: readonly Turn[]): ConversationContext {
  return Object.freeze(turns.map((t) => Object.freeze({ ...t })));
}
