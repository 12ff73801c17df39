// src/storage/__tests__/sqlite-repository.test.ts
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createSqliteRepository } from "../sqlite-repository.js";
import type { PersistenceRepository } from "../repository.js";
import { makeScope } from "../../core/scope.js";
import { PersistenceError } from "../../core/errors.js";
import { parsePolicy } from "../../policy/schema.js";
import type { Turn } from "../../core/types.js";

describe("SqliteRepository", () => {
  let repo: PersistenceRepository;
  let tempDir: string;
  let dbPath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "murmur-repo-"));
    dbPath = join(tempDir, "nested", "murmur.db");
    repo = createSqliteRepository({ sqlitePath: dbPath });
  });

  afterEach(() => {
    repo.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe("contexts", () => {
    const scope = makeScope("group", "20002");
    const turns: Turn[] = [
      { role: "user", text: "hi", timestamp: 1, senderId: "10001", senderName: "alice" },
      { role: "assistant", text: "hello", timestamp: 2 },
    ];

    it("returns null for an unknown scope", async () => {
      expect(await repo.loadContext(scope)).toBeNull();
    });

    it("round-trips a saved context", async () => {
      await repo.saveContext(scope, turns);
      expect(await repo.loadContext(scope)).toEqual(turns);
    });

    it("replaces the previous context on save", async () => {
      await repo.saveContext(scope, turns);
      await repo.saveContext(scope, [turns[1]]);
      expect(await repo.loadContext(scope)).toEqual([turns[1]]);
    });

    it("keeps private and group scopes with the same id apart", async () => {
      await repo.saveContext(scope, turns);
      expect(await repo.loadContext(makeScope("private", "20002"))).toBeNull();
    });

    it("survives reopening the database", async () => {
      await repo.saveContext(scope, turns);
      repo.close();
      repo = createSqliteRepository({ sqlitePath: dbPath });
      expect(await repo.loadContext(scope)).toEqual(turns);
    });

    it("reports corrupt rows as read failures", async () => {
      const raw = new Database(dbPath);
      raw
        .prepare("INSERT INTO conversation_contexts(scope_key, turns_json, updated_at) VALUES(?,?,?)")
        .run("group:20002", '[{"role":"robot"}]', 0);
      raw.close();

      await expect(repo.loadContext(scope)).rejects.toBeInstanceOf(PersistenceError);
      await expect(repo.loadContext(scope)).rejects.toMatchObject({ kind: "read_failed" });
    });

    it("reports writes after close as write failures", async () => {
      repo.close();
      await expect(repo.saveContext(scope, turns)).rejects.toMatchObject({ kind: "write_failed" });
      repo = createSqliteRepository({ sqlitePath: dbPath });
    });
  });

  describe("policy", () => {
    it("returns null before anything is stored", async () => {
      expect(await repo.loadPolicy()).toBeNull();
    });

    it("round-trips a policy", async () => {
      const policy = parsePolicy({ defaultTier: "blocked", adminIds: ["1"], overrides: { "group:2": "trusted" } });
      await repo.savePolicy(policy);
      expect(parsePolicy(await repo.loadPolicy())).toEqual(policy);
    });

    it("keeps a single policy row", async () => {
      await repo.savePolicy(parsePolicy({ defaultTier: "blocked" }));
      await repo.savePolicy(parsePolicy({ defaultTier: "trusted" }));
      expect(await repo.loadPolicy()).toMatchObject({ defaultTier: "trusted" });
    });
  });

  it("works in memory", async () => {
    const memory = createSqliteRepository({ sqlitePath: ":memory:" });
    try {
      await memory.saveContext(makeScope("private", "1"), [{ role: "user", text: "x", timestamp: 0 }]);
      expect(await memory.loadContext(makeScope("private", "1"))).toHaveLength(1);
    } finally {
      memory.close();
    }
  });
});
