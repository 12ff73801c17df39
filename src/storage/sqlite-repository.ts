/**
 * SQLite-backed persistence repository (better-sqlite3).
 */

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { createLogger } from "../utils/logger.js";
import { scopeKey, type Scope } from "../core/scope.js";
import type { ConversationContext, Turn } from "../core/types.js";
import { PersistenceError, describeError } from "../core/errors.js";
import type { PermissionPolicy } from "../policy/types.js";
import type { PersistenceRepository } from "./repository.js";

const log = createLogger("sqlite-repository");

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface SqliteRepositoryConfig {
  /** Path to SQLite database file, or ":memory:" */
  sqlitePath: string;
}

interface ContextRow {
  turns_json: string;
}

interface PolicyRow {
  policy_json: string;
}

const turnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  text: z.string(),
  timestamp: z.number(),
  senderId: z.string().optional(),
  senderName: z.string().optional(),
});

const turnsSchema = z.array(turnSchema);

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

export function createSqliteRepository(config: SqliteRepositoryConfig): PersistenceRepository {
  if (config.sqlitePath !== ":memory:") {
    mkdirSync(dirname(config.sqlitePath), { recursive: true });
  }

  const db = new Database(config.sqlitePath);
  db.pragma("journal_mode = WAL");

  db.exec(`
    CREATE TABLE IF NOT EXISTS conversation_contexts (
      scope_key TEXT PRIMARY KEY,
      turns_json TEXT NOT NULL,
      updated_at INTEGER NOT NULL
    );
    CREATE TABLE IF NOT EXISTS permission_policy (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      policy_json TEXT NOT NULL,
      updated_at INTEGER NOT NULL
    );
  `);

  const selectContext = db.prepare<[string], ContextRow>(
    "SELECT turns_json FROM conversation_contexts WHERE scope_key=?",
  );
  const upsertContext = db.prepare<[string, string, number]>(
    "INSERT OR REPLACE INTO conversation_contexts(scope_key, turns_json, updated_at) VALUES(?,?,?)",
  );
  const selectPolicy = db.prepare<[], PolicyRow>(
    "SELECT policy_json FROM permission_policy WHERE id=1",
  );
  const upsertPolicy = db.prepare<[string, number]>(
    "INSERT OR REPLACE INTO permission_policy(id, policy_json, updated_at) VALUES(1,?,?)",
  );

  return {
    async loadContext(scope: Scope): Promise<Turn[] | null> {
      const key = scopeKey(scope);
      let row: ContextRow | undefined;
      try {
        row = selectContext.get(key);
      } catch (err) {
        throw new PersistenceError("read_failed", `Failed to read context ${key}: ${describeError(err)}`, {
          cause: err,
        });
      }
      if (!row) return null;

      let parsed: unknown;
      try {
        parsed = JSON.parse(row.turns_json);
      } catch (err) {
        throw new PersistenceError("read_failed", `Corrupt context ${key}: ${describeError(err)}`, {
          cause: err,
        });
      }
      const result = turnsSchema.safeParse(parsed);
      if (!result.success) {
        throw new PersistenceError("read_failed", `Corrupt context ${key}: ${result.error.message}`);
      }
      log.debug(`Loaded ${result.data.length} turns for ${key}`);
      return result.data;
    },

    async saveContext(scope: Scope, context: ConversationContext): Promise<void> {
      const key = scopeKey(scope);
      try {
        upsertContext.run(key, JSON.stringify(context), Date.now());
      } catch (err) {
        throw new PersistenceError("write_failed", `Failed to save context ${key}: ${describeError(err)}`, {
          cause: err,
        });
      }
    },

    async loadPolicy(): Promise<unknown | null> {
      const row = selectPolicy.get();
      if (!row) return null;
      try {
        return JSON.parse(row.policy_json);
      } catch (err) {
        throw new PersistenceError("read_failed", `Corrupt stored policy: ${describeError(err)}`, {
          cause: err,
        });
      }
    },

    async savePolicy(policy: PermissionPolicy): Promise<void> {
      try {
        upsertPolicy.run(JSON.stringify(policy), Date.now());
      } catch (err) {
        throw new PersistenceError("write_failed", `Failed to save policy: ${describeError(err)}`, {
          cause: err,
        });
      }
    },

    close() {
      db.close();
    },
  };
}
