// src/gateway/server.ts
/**
 * Gateway / main loop: wires storage, policy, the OneBot client, the
 * completion client and the dispatcher together.
 */

import { createLogger, configureLogging } from "../utils/logger.js";
import type { Clock } from "../utils/clock.js";
import type { Config } from "../config/schema.js";
import { scopeKey } from "../core/scope.js";
import type { GatewayClient } from "../channels/interface.js";
import { OneBotGateway } from "../channels/onebot/index.js";
import { OpenAICompatibleClient, type CompletionClient } from "../agent/completion-client.js";
import { ConversationStore } from "../conversation/store.js";
import { PolicyHolder } from "../policy/loader.js";
import { createSqliteRepository } from "../storage/sqlite-repository.js";
import type { PersistenceRepository } from "../storage/repository.js";
import { Dispatcher, type DispatchOutcome, type FatalEvent } from "./dispatcher.js";
import { RetryPolicy } from "./retry.js";

const log = createLogger("gateway");

export interface GatewayOptions {
  config: Config;
  /** Overrides for tests; built from config when absent. */
  gateway?: GatewayClient;
  completion?: CompletionClient;
  repository?: PersistenceRepository;
  clock?: Clock;
}

export interface RunningGateway {
  dispatcher: Dispatcher;
  gateway: GatewayClient;
  policy: PolicyHolder;
  store: ConversationStore;
  stop: () => Promise<void>;
}

export async function startGateway(options: GatewayOptions): Promise<RunningGateway> {
  const { config } = options;

  configureLogging(config.logging);

  const repository =
    options.repository ?? createSqliteRepository({ sqlitePath: config.storage.sqlitePath });
  log.info(`Storage ready: ${config.storage.sqlitePath}`);

  const policy = await PolicyHolder.load(repository, config.permission);

  const store = new ConversationStore({
    repository,
    windowSize: config.context.windowSize,
    maxTurnAgeMs: config.context.maxTurnAgeMs,
  });

  const onebot =
    options.gateway ??
    new OneBotGateway({
      websocketUrl: config.gateway.websocketUrl,
      httpUrl: config.gateway.httpUrl,
      token: config.gateway.token,
      heartbeatMs: config.heartbeatMs,
      reconnectMaxMs: config.gateway.reconnectMaxMs,
      sendTimeoutMs: config.gateway.sendTimeoutMs,
      clock: options.clock,
    });

  const completion =
    options.completion ??
    new OpenAICompatibleClient({
      baseUrl: config.completion.baseUrl,
      model: config.completion.model,
      apiKey: config.completion.apiKey,
      timeoutMs: config.completion.timeoutMs,
      maxTokens: config.completion.maxTokens,
      temperature: config.completion.temperature,
      defaultRetryAfterMs: config.completion.defaultRetryAfterMs,
    });

  const { concurrency, dedupCapacity, shutdownTimeoutMs, ...retryOptions } = config.dispatcher;
  const dispatcher = new Dispatcher({
    gateway: onebot,
    completion,
    store,
    policy,
    retry: new RetryPolicy(retryOptions),
    clock: options.clock,
    concurrency,
    dedupCapacity,
    activation: config.group,
    persona: config.persona,
    timezone: config.timezone,
    botId: () => (onebot instanceof OneBotGateway ? onebot.botId : null),
  });

  dispatcher.on("fatal", (event: FatalEvent) => {
    log.error(
      `Provider rejected requests for ${scopeKey(event.scope)}; an admin can send /resume once fixed: ${event.error.message}`,
    );
  });
  dispatcher.on("outcome", (outcome: DispatchOutcome) => {
    log.debug(
      `Outcome ${scopeKey(outcome.scope)}#${outcome.sequenceNo}: ${outcome.status}${outcome.reason ? ` (${outcome.reason})` : ""}`,
    );
  });

  await onebot.start();
  dispatcher.start();
  log.info("Gateway started");

  let stopped = false;
  const stop = async () => {
    if (stopped) return;
    stopped = true;
    log.info("Stopping gateway...");
    await dispatcher.stop(shutdownTimeoutMs);
    await onebot.stop();
    repository.close();
    log.info("Gateway stopped");
  };

  return { dispatcher, gateway: onebot, policy, store, stop };
}
