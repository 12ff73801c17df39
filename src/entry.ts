#!/usr/bin/env node
/**
 * murmur entry point
 */

import { program } from "commander";
import { join, dirname } from "node:path";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { loadConfig } from "./config/loader.js";
import { writeDefaultConfig } from "./config/defaults.js";
import { startGateway } from "./gateway/server.js";
import { logger } from "./utils/logger.js";
import { parsePolicy } from "./policy/schema.js";
import { defaultConfigPath, ensureMurmurHomeEnv, resolvePathLike } from "./utils/paths.js";
import { describeError } from "./core/errors.js";

const log = logger;

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg = JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8")) as {
  name: string;
  version: string;
};

const CONFIG_FLAGS = "-c, --config <path>";
const CONFIG_HELP = "Config file path (default: $MURMUR_HOME/app.yaml)";

function configPathDefault(): string {
  return process.env.MURMUR_CONFIG_PATH ?? defaultConfigPath();
}

program
  .name("murmur")
  .description("Chat relay between a OneBot gateway and an OpenAI-compatible model")
  .version(pkg.version);

program
  .command("start")
  .description("Connect to the gateway and start answering")
  .option(CONFIG_FLAGS, CONFIG_HELP, configPathDefault())
  .action(async (options: { config: string }) => {
    try {
      ensureMurmurHomeEnv();
      log.info(`Starting murmur v${pkg.version}...`);

      const config = await loadConfig(options.config);
      const running = await startGateway({ config });

      let shuttingDown = false;
      const shutdown = async () => {
        if (shuttingDown) return;
        shuttingDown = true;
        log.info("Shutting down...");
        try {
          await running.stop();
        } catch (err) {
          log.error("Error stopping gateway", err);
          process.exit(1);
        }
        process.exit(0);
      };

      process.on("SIGINT", () => void shutdown());
      process.on("SIGTERM", () => void shutdown());

      log.info("Bot is up and running. Press Ctrl+C to stop.");
    } catch (err) {
      log.error(`Failed to start: ${describeError(err)}`);
      process.exit(1);
    }
  });

program
  .command("init")
  .description("Write a starter config (never overwrites)")
  .option(CONFIG_FLAGS, CONFIG_HELP, configPathDefault())
  .action(async (options: { config: string }) => {
    try {
      ensureMurmurHomeEnv();
      const written = await writeDefaultConfig(resolvePathLike(options.config));
      log.info(`Wrote ${written.configPath}`);
      if (written.secretsPath) {
        log.info(`Wrote ${written.secretsPath}; put the gateway token and API key there`);
      }
    } catch (err) {
      log.error(`Init failed: ${describeError(err)}`);
      process.exit(1);
    }
  });

program
  .command("check")
  .description("Validate the config and print the permission policy it declares (stored policy is not read)")
  .option(CONFIG_FLAGS, CONFIG_HELP, configPathDefault())
  .action(async (options: { config: string }) => {
    try {
      const config = await loadConfig(options.config);
      const policy = parsePolicy(config.permission ?? {});
      console.log(JSON.stringify({ ok: true, storage: config.storage.sqlitePath, policy }, null, 2));
    } catch (err) {
      log.error(describeError(err));
      process.exit(1);
    }
  });

program.parse();
