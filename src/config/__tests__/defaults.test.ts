import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parse } from "yaml";
import { writeDefaultConfig } from "../defaults.js";
import { loadConfig } from "../loader.js";

const ENV_SNAPSHOT = { ...process.env };

describe("writeDefaultConfig", () => {
  let dir: string;

  beforeEach(async () => {
    process.env = { ...ENV_SNAPSHOT };
    delete process.env.MURMUR_GATEWAY_TOKEN;
    delete process.env.MURMUR_API_KEY;
    dir = await mkdtemp(join(tmpdir(), "murmur-init-"));
    process.env.MURMUR_HOME = dir;
  });

  afterEach(async () => {
    process.env = { ...ENV_SNAPSHOT };
    await rm(dir, { recursive: true, force: true });
  });

  it("writes app.yaml and a private secrets.yaml", async () => {
    const configPath = join(dir, "nested", "app.yaml");

    const written = await writeDefaultConfig(configPath);

    expect(written).toEqual({ configPath, secretsPath: join(dir, "nested", "secrets.yaml") });
    const app = parse(await readFile(configPath, "utf-8"));
    expect(app.gateway.token).toBe("secrets");
    expect(app.completion.apiKey).toBe("secrets");
    const secretsStat = await stat(join(dir, "nested", "secrets.yaml"));
    expect(secretsStat.mode & 0o777).toBe(0o600);
  });

  it("produces a config the loader accepts", async () => {
    const configPath = join(dir, "app.yaml");
    await writeDefaultConfig(configPath);
    await writeFile(
      join(dir, "secrets.yaml"),
      "gateway:\n  token: test-secret\ncompletion:\n  apiKey: test-key\n",
      "utf-8",
    );

    const config = await loadConfig(configPath);

    expect(config.gateway.token).toBe("test-secret");
    expect(config.completion.apiKey).toBe("test-key");
    expect(config.storage.sqlitePath).toBe(join(dir, "murmur.db"));
    expect(config.permission).toEqual({ defaultTier: "default", privateTier: "default", adminIds: [], overrides: {} });
  });

  it("never overwrites an existing config", async () => {
    const configPath = join(dir, "app.yaml");
    await writeFile(configPath, "persona: mine\n", "utf-8");

    await expect(writeDefaultConfig(configPath)).rejects.toThrow(`Config file already exists: ${configPath}`);
    expect(await readFile(configPath, "utf-8")).toBe("persona: mine\n");
  });

  it("leaves an existing secrets.yaml alone", async () => {
    const secretsPath = join(dir, "secrets.yaml");
    await writeFile(secretsPath, "gateway:\n  token: keep-me\n", "utf-8");

    const written = await writeDefaultConfig(join(dir, "app.yaml"));

    expect(written.secretsPath).toBeNull();
    expect(await readFile(secretsPath, "utf-8")).toBe("gateway:\n  token: keep-me\n");
  });
});
