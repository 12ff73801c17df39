/**
 * Starter config written by `murmur init`.
 */

import { writeFile, mkdir, chmod, access } from "node:fs/promises";
import { dirname, join } from "node:path";
import { stringify } from "yaml";
import { ConfigError } from "../core/errors.js";
import {
  DEFAULT_FOLLOW_UP_BONUS,
  DEFAULT_FOLLOW_UP_TURNS,
  DEFAULT_KEYWORDS,
  DEFAULT_THRESHOLD,
} from "../gateway/activation.js";

export function defaultAppConfig(): Record<string, unknown> {
  return {
    heartbeatMs: 500,
    gateway: {
      websocketUrl: "ws://127.0.0.1:3001",
      httpUrl: "http://127.0.0.1:3000",
      token: "secrets",
      reconnectMaxMs: 30_000,
      sendTimeoutMs: 10_000,
    },
    completion: {
      baseUrl: "https://api.openai.com/v1",
      model: "gpt-4o-mini",
      apiKey: "secrets",
      timeoutMs: 60_000,
      defaultRetryAfterMs: 5_000,
    },
    persona: "You are a friendly, concise chat assistant.",
    timezone: "UTC",
    permission: {
      defaultTier: "default",
      privateTier: "default",
      adminIds: [],
      overrides: {},
    },
    context: { windowSize: 20, maxTurnAgeMs: 0 },
    dispatcher: {
      concurrency: 4,
      maxAttempts: 3,
      baseDelayMs: 1_000,
      maxDelayMs: 30_000,
      rateLimitCapMs: 60_000,
      maxRateLimitRetries: 5,
      dedupCapacity: 1_000,
      shutdownTimeoutMs: 10_000,
    },
    group: {
      activation: "mention",
      mentionPatterns: [],
      keywords: { ...DEFAULT_KEYWORDS },
      threshold: DEFAULT_THRESHOLD,
      followUpBonus: DEFAULT_FOLLOW_UP_BONUS,
      followUpTurns: DEFAULT_FOLLOW_UP_TURNS,
    },
    logging: { info: true, warning: true, error: true, chat: true, debug: false },
    storage: { sqlitePath: "${MURMUR_HOME}/murmur.db" },
  };
}

export function defaultSecrets(): Record<string, unknown> {
  return {
    gateway: { token: "" },
    completion: { apiKey: "" },
  };
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write app.yaml (and secrets.yaml beside it, if missing). Refuses to
 * overwrite an existing app config.
 */
export async function writeDefaultConfig(
  appConfigPath: string,
): Promise<{ configPath: string; secretsPath: string | null }> {
  if (await exists(appConfigPath)) {
    throw new ConfigError(`Config file already exists: ${appConfigPath}`);
  }
  await mkdir(dirname(appConfigPath), { recursive: true });
  await writeFile(appConfigPath, stringify(defaultAppConfig(), { indent: 2 }), "utf-8");

  const secretsPath = join(dirname(appConfigPath), "secrets.yaml");
  if (await exists(secretsPath)) {
    return { configPath: appConfigPath, secretsPath: null };
  }
  await writeFile(secretsPath, stringify(defaultSecrets(), { indent: 2 }), "utf-8");
  await chmod(secretsPath, 0o600);
  return { configPath: appConfigPath, secretsPath };
}
