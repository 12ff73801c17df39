/**
 * Config loader with environment variable expansion
 */

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { resolve, dirname, join } from "node:path";
import { ZodError } from "zod";
import { configSchema, type Config } from "./schema.js";
import { createLogger } from "../utils/logger.js";
import { ConfigError, describeError } from "../core/errors.js";
import { ensureMurmurHomeEnv, resolvePathLike } from "../utils/paths.js";
import { expandEnvVarsDeep } from "./expand-env.js";

const log = createLogger("config");

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readYaml(path: string): Promise<unknown> {
  const content = await readFile(path, "utf-8");
  try {
    return parse(content);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${path}: ${describeError(err)}`);
  }
}

/** Fill `section[field]` from secrets.yaml, then the environment, unless already set. */
function mergeSecret(
  raw: RawRecord,
  secrets: RawRecord | null,
  section: string,
  field: string,
  envValue: string | undefined,
): void {
  const target = raw[section];
  if (!isRecord(target)) return;
  const current = target[field];
  if (typeof current === "string" && current.trim() !== "" && current !== "secrets") return;

  const fromSecrets = secrets?.[section];
  const secretValue = isRecord(fromSecrets) ? fromSecrets[field] : undefined;
  const value = typeof secretValue === "string" && secretValue !== "" ? secretValue : envValue;
  if (value !== undefined && value !== "") {
    target[field] = value;
  } else {
    delete target[field];
  }
}

export async function loadConfig(path: string): Promise<Config> {
  // Ensure MURMUR_HOME is always defined so ${MURMUR_HOME} defaults expand.
  ensureMurmurHomeEnv();

  const expandedPath = resolvePathLike(path);
  log.info(`Loading config from ${expandedPath}`);

  let loaded: unknown;
  try {
    loaded = await readYaml(expandedPath);
  } catch (err) {
    if (isNotFound(err)) {
      throw new ConfigError(`Config file not found: ${expandedPath}`);
    }
    throw err;
  }
  const raw: RawRecord = isRecord(loaded) ? loaded : {};

  const configDir = dirname(expandedPath);

  // Optional secrets beside the app config: <configDir>/secrets.yaml
  const secretsPath = join(configDir, "secrets.yaml");
  let secrets: RawRecord | null = null;
  try {
    const parsed = await readYaml(secretsPath);
    secrets = isRecord(parsed) ? parsed : null;
  } catch (err) {
    if (!isNotFound(err)) throw err;
  }

  mergeSecret(raw, secrets, "gateway", "token", process.env.MURMUR_GATEWAY_TOKEN);
  mergeSecret(raw, secrets, "completion", "apiKey", process.env.MURMUR_API_KEY);

  // Expand user-provided values, then again to cover schema defaults
  // such as ${MURMUR_HOME}/murmur.db.
  let config = validate(expandEnvVarsDeep(raw, process.env));
  config = validate(expandEnvVarsDeep(config, process.env));

  if (config.storage.sqlitePath !== ":memory:") {
    config.storage.sqlitePath = resolveFrom(configDir, config.storage.sqlitePath);
  }
  if (config.logging.file) {
    config.logging.file = resolveFrom(configDir, config.logging.file);
  }
  log.debug(`Resolved storage path: ${config.storage.sqlitePath}`);

  if (!config.gateway.token) log.warn("No gateway token configured; connecting without auth");
  if (!config.completion.apiKey) log.warn("No completion API key configured");

  log.info("Config loaded successfully");
  return config;
}

/** Relative paths resolve against the config file's directory. */
function resolveFrom(configDir: string, path: string): string {
  return path.startsWith("~") ? resolvePathLike(path) : resolve(configDir, path);
}

function validate(input: unknown): Config {
  try {
    return configSchema.parse(input);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError(formatZodError(err));
    }
    throw err;
  }
}

export function formatZodError(error: ZodError): string {
  const lines = error.errors.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `- ${path}: ${issue.message}`;
  });
  return `Config validation failed:\n${lines.join("\n")}`;
}
