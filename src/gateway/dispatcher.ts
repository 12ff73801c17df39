/**
 * Dispatcher: drives each inbound event through permission evaluation, the
 * completion provider and delivery.
 *
 * Per scope the state machine is
 *   idle → evaluating → requesting → replying → idle
 * with `retrying` between failed attempts and `failed` when retries run out.
 * Events for one scope are processed strictly in arrival order; different
 * scopes run in parallel under the scheduler's concurrency cap.
 *
 * Emits:
 * - "transition" `{ scope, from, to }`
 * - "outcome"    `{ scope, sequenceNo, status, reason? }`
 * - "fatal"      `{ scope, error }` when the provider rejects permanently
 */

import { EventEmitter } from "node:events";
import { createLogger, logChat } from "../utils/logger.js";
import { AbortError, systemClock, type Clock } from "../utils/clock.js";
import { err, ok, type Result } from "../utils/result.js";
import { scopeKey, type Scope, type ScopeKey } from "../core/scope.js";
import type { DeliveryId, InboundEvent, Turn } from "../core/types.js";
import { describeError, type DispatchError } from "../core/errors.js";
import type { GatewayClient } from "../channels/interface.js";
import type { CompletionClient } from "../agent/completion-client.js";
import { buildSystemPrompt } from "../agent/system-prompt.js";
import type { ConversationStore } from "../conversation/store.js";
import type { PolicyHolder } from "../policy/loader.js";
import { evaluate, mayTrigger } from "../policy/engine.js";
import { ScopeScheduler } from "./scheduler.js";
import { RetryPolicy } from "./retry.js";
import { RecentKeys } from "./dedup.js";
import { DEFAULT_FOLLOW_UP_TURNS, shouldRespond, type ActivationConfig } from "./activation.js";
import { tryHandleCommand } from "./commands.js";

const log = createLogger("dispatcher");

export type ScopeState = "idle" | "evaluating" | "requesting" | "replying" | "retrying" | "failed";

export type OutcomeStatus =
  /** Reply delivered. */
  | "replied"
  /** Command answered without the provider. */
  | "command"
  /** Turn stored, no request (group not activated, or the bot's own message). */
  | "recorded"
  /** Not processed: duplicate, blocked sender or halted scope. */
  | "dropped"
  | "failed";

export interface TransitionEvent {
  scope: Scope;
  from: ScopeState;
  to: ScopeState;
}

export interface DispatchOutcome {
  scope: Scope;
  sequenceNo: number;
  status: OutcomeStatus;
  reason?: string;
}

export interface FatalEvent {
  scope: Scope;
  error: DispatchError;
}

export interface DispatcherOptions {
  gateway: GatewayClient;
  completion: CompletionClient;
  store: ConversationStore;
  policy: PolicyHolder;
  retry?: RetryPolicy;
  clock?: Clock;
  concurrency: number;
  dedupCapacity: number;
  activation: ActivationConfig;
  persona: string;
  timezone: string;
  /** Bot account id, once the gateway knows it. */
  botId?: () => string | null;
}

type Failure = { reason: string; error?: DispatchError };

const SHUTDOWN: Failure = { reason: "shutdown" };

export class Dispatcher extends EventEmitter {
  private readonly scheduler: ScopeScheduler;
  private readonly recent: RecentKeys;
  private readonly retry: RetryPolicy;
  private readonly clock: Clock;
  private readonly states = new Map<ScopeKey, ScopeState>();
  private readonly halted = new Set<ScopeKey>();
  /** Group user turns left in each scope's follow-up window. */
  private readonly followUps = new Map<ScopeKey, number>();
  private pulling: Promise<void> | null = null;
  private pullController: AbortController | null = null;
  private stopping = false;

  constructor(private readonly options: DispatcherOptions) {
    super();
    this.scheduler = new ScopeScheduler(options.concurrency);
    this.recent = new RecentKeys(options.dedupCapacity);
    this.retry = options.retry ?? new RetryPolicy();
    this.clock = options.clock ?? systemClock;
  }

  /** Start pulling events from the gateway. */
  start(): void {
    if (this.pulling) return;
    this.stopping = false;
    const controller = new AbortController();
    this.pullController = controller;
    this.pulling = this.pull(controller.signal);
  }

  stateOf(scope: Scope): ScopeState {
    return this.states.get(scopeKey(scope)) ?? "idle";
  }

  /** Scopes not currently idle. */
  get busyScopeCount(): number {
    return this.states.size;
  }

  isHalted(scope: Scope): boolean {
    return this.halted.has(scopeKey(scope));
  }

  /** Lift a halt. Returns whether the scope was halted. */
  resume(scope: Scope): boolean {
    return this.halted.delete(scopeKey(scope));
  }

  /** Queue an event for its scope. Duplicates are dropped here. */
  submit(event: InboundEvent): void {
    const scope = event.scope;
    const key = scopeKey(scope);

    if (this.stopping) {
      this.emitOutcome({ scope, sequenceNo: event.sequenceNo, status: "failed", reason: "shutdown" });
      return;
    }

    if (!this.recent.add(`${key}#${event.sequenceNo}`)) {
      log.debug(`Duplicate event ${event.sequenceNo} in ${key}`);
      this.emitOutcome({ scope, sequenceNo: event.sequenceNo, status: "dropped", reason: "duplicate" });
      return;
    }

    this.scheduler.enqueue(
      key,
      (signal) => this.process(event, signal),
      () => {
        log.warn(`Cancelled queued event ${event.sequenceNo} in ${key}`);
        this.emitOutcome({ scope, sequenceNo: event.sequenceNo, status: "failed", reason: "shutdown" });
      },
    );
  }

  /** Resolves when no event is queued or in flight. */
  idle(): Promise<void> {
    return this.scheduler.idle();
  }

  /**
   * Graceful shutdown: stop pulling, cancel queued events, give in-flight
   * events `timeoutMs` to finish, abort the rest, then flush every context.
   */
  async stop(timeoutMs: number): Promise<void> {
    this.stopping = true;
    this.pullController?.abort();
    await this.pulling;
    this.pulling = null;
    this.pullController = null;

    const cancelled = this.scheduler.cancelPending();
    if (cancelled > 0) log.info(`Cancelled ${cancelled} queued event(s)`);

    const deadline = new AbortController();
    const finished = await Promise.race([
      this.scheduler.idle().then(() => true),
      systemClock.sleep(timeoutMs, deadline.signal).then(
        () => false,
        () => true,
      ),
    ]);
    deadline.abort();

    if (!finished) {
      log.warn(`Aborting ${this.scheduler.activeCount} in-flight event(s) after ${timeoutMs}ms`);
      this.scheduler.abortRunning();
      await this.scheduler.idle();
    }

    await this.options.store.flushAll();
    log.info("Dispatcher stopped");
  }

  private async pull(signal: AbortSignal): Promise<void> {
    try {
      for await (const event of this.options.gateway.events(signal)) {
        this.submit(event);
      }
    } catch (e) {
      if (e instanceof AbortError) return;
      log.error(`Event stream failed: ${describeError(e)}`);
    }
  }

  private async process(event: InboundEvent, signal: AbortSignal): Promise<void> {
    const { scope } = event;
    try {
      await this.runPipeline(event, signal);
    } finally {
      await this.options.store.flush(scope);
    }
  }

  private async runPipeline(event: InboundEvent, signal: AbortSignal): Promise<void> {
    const { scope, sequenceNo } = event;
    const key = scopeKey(scope);
    const { store, policy, gateway } = this.options;

    // evaluating
    this.transition(scope, "evaluating");

    if (event.fromSelf || event.senderId === this.options.botId?.()) {
      await this.recordOwnMessage(event);
      this.finish(scope, "idle", { scope, sequenceNo, status: "recorded", reason: "self" });
      return;
    }

    const tier = evaluate(event.senderId, scope, policy.current());
    if (!mayTrigger(tier)) {
      log.debug(`Dropped event ${sequenceNo} from ${event.senderId} in ${key} (tier ${tier})`);
      this.finish(scope, "idle", { scope, sequenceNo, status: "dropped", reason: "blocked" });
      return;
    }

    logChat(`${key} ${event.senderName ?? event.senderId}(${event.senderId}): ${event.text}`);

    const command = await tryHandleCommand({
      event,
      tier,
      store,
      policy,
      resume: (target) => this.resume(target),
    });
    if (command.handled) {
      if (command.reply !== "") {
        const sent = await gateway.send(scope, command.reply);
        if (!sent.ok) log.warn(`Could not deliver ${command.command} reply to ${key}: ${sent.error.message}`);
      }
      this.finish(scope, "idle", { scope, sequenceNo, status: "command", reason: command.command });
      return;
    }

    if (this.halted.has(key)) {
      log.warn(`Scope ${key} is halted after a fatal provider error; dropping event ${sequenceNo}`);
      this.finish(scope, "idle", { scope, sequenceNo, status: "dropped", reason: "halted" });
      return;
    }

    const userTurn: Turn = {
      role: "user",
      text: event.text,
      timestamp: event.receivedAt,
      senderId: event.senderId,
      senderName: event.senderName,
    };
    await store.append(scope, userTurn);

    const followingUp = scope.kind === "group" && this.consumeFollowUp(key);
    if (!shouldRespond(event, this.options.activation, followingUp)) {
      this.finish(scope, "idle", { scope, sequenceNo, status: "recorded", reason: "not_activated" });
      return;
    }

    // requesting
    this.transition(scope, "requesting");
    const completion = await this.withRetry<string>(scope, "requesting", signal, async () => {
      const now = this.clock.now();
      const result = await this.options.completion.complete(
        {
          scope,
          systemPrompt: buildSystemPrompt({
            persona: this.options.persona,
            scopeKind: scope.kind,
            timezone: this.options.timezone,
            now,
            botId: this.options.botId?.() ?? null,
          }),
          turns: store.snapshotForRequest(scope, now),
        },
        signal,
      );
      return result.ok ? result : err({ source: "completion" as const, ...result.error });
    });

    if (!completion.ok) {
      const { error, reason } = completion.error;
      if (error?.source === "completion" && error.kind === "fatal") {
        this.halted.add(key);
        log.error(`Fatal provider error in ${key}, scope halted: ${error.message}`);
        this.emit("fatal", { scope, error } satisfies FatalEvent);
      } else {
        log.error(`Giving up on event ${sequenceNo} in ${key} (${reason})${error ? `: ${error.message}` : ""}`);
      }
      this.finish(scope, "failed", { scope, sequenceNo, status: "failed", reason });
      return;
    }

    const replyText = completion.value;
    await store.append(scope, { role: "assistant", text: replyText, timestamp: this.clock.now() });

    // replying
    this.transition(scope, "replying");
    const delivery = await this.withRetry<DeliveryId>(scope, "replying", signal, async () => {
      const result = await gateway.send(scope, replyText);
      return result.ok ? result : err({ source: "gateway" as const, ...result.error });
    });

    if (!delivery.ok) {
      const { error, reason } = delivery.error;
      log.error(`Reply to ${key} not delivered (${reason})${error ? `: ${error.message}` : ""}`);
      this.finish(scope, "failed", { scope, sequenceNo, status: "failed", reason });
      return;
    }

    logChat(`${key} reply: ${replyText}`);
    if (scope.kind === "group") {
      const turns = this.options.activation.followUpTurns ?? DEFAULT_FOLLOW_UP_TURNS;
      if (turns > 0) this.followUps.set(key, turns);
    }
    this.finish(scope, "idle", { scope, sequenceNo, status: "replied" });
  }

  /**
   * Store a message the bot account sent as an assistant turn. The bridge
   * echoes replies this process already stored; those are skipped.
   */
  private async recordOwnMessage(event: InboundEvent): Promise<void> {
    const { store } = this.options;
    const last = (await store.load(event.scope)).at(-1);
    if (last?.role === "assistant" && last.text === event.text) return;
    await store.append(event.scope, { role: "assistant", text: event.text, timestamp: event.receivedAt });
  }

  /** Whether the scope is in its follow-up window; uses up one turn of it. */
  private consumeFollowUp(key: ScopeKey): boolean {
    const left = this.followUps.get(key) ?? 0;
    if (left <= 0) return false;
    if (left === 1) this.followUps.delete(key);
    else this.followUps.set(key, left - 1);
    return true;
  }

  private async withRetry<T>(
    scope: Scope,
    state: "requesting" | "replying",
    signal: AbortSignal,
    attempt: () => Promise<Result<T, DispatchError>>,
  ): Promise<Result<T, Failure>> {
    let failures = 0;
    let rateLimits = 0;

    while (true) {
      if (signal.aborted) return err(SHUTDOWN);
      const result = await attempt();
      if (result.ok) return ok(result.value);
      if (signal.aborted) return err(SHUTDOWN);

      const error = result.error;
      const count =
        error.source === "completion" && error.kind === "rate_limited" ? ++rateLimits : ++failures;
      const decision = this.retry.decide(error, count);
      if (!decision.retry) return err({ reason: decision.reason, error });

      log.warn(
        `${error.source} ${error.kind} in ${scopeKey(scope)}, retry ${count} in ${decision.delayMs}ms: ${error.message}`,
      );
      this.transition(scope, "retrying");
      try {
        await this.clock.sleep(decision.delayMs, signal);
      } catch (e) {
        if (e instanceof AbortError) return err(SHUTDOWN);
        throw e;
      }
      this.transition(scope, state);
    }
  }

  private transition(scope: Scope, to: ScopeState): void {
    const key = scopeKey(scope);
    const from = this.states.get(key) ?? "idle";
    if (from === to) return;
    if (to === "idle") this.states.delete(key);
    else this.states.set(key, to);
    log.debug(`${key}: ${from} -> ${to}`);
    this.emit("transition", { scope, from, to } satisfies TransitionEvent);
  }

  private finish(scope: Scope, to: "idle" | "failed", outcome: DispatchOutcome): void {
    this.transition(scope, to);
    this.emitOutcome(outcome);
  }

  private emitOutcome(outcome: DispatchOutcome): void {
    this.emit("outcome", outcome);
  }
}
