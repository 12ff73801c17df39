/**
 * OneBot v11 gateway client
 *
 * Reads posts from the bridge's event socket (ws) and sends replies through
 * its HTTP command API. Reconnects with exponential backoff while running.
 */

import { EventEmitter } from "node:events";
import WebSocket from "ws";
import { createLogger } from "../../utils/logger.js";
import { computeBackoff } from "../../utils/backoff.js";
import { AbortError, systemClock, type Clock } from "../../utils/clock.js";
import type { Result } from "../../utils/result.js";
import { scopeKey, type Scope } from "../../core/scope.js";
import type { DeliveryId, InboundEvent } from "../../core/types.js";
import { describeError, type GatewayError } from "../../core/errors.js";
import type { GatewayClient } from "../interface.js";
import { EventQueue } from "../event-queue.js";
import { parsePost } from "./posts.js";
import { postMessage } from "./poster.js";

const log = createLogger("onebot");

export interface OneBotGatewayOptions {
  websocketUrl: string;
  httpUrl: string;
  token?: string;
  /** Seeds the reconnect backoff. */
  heartbeatMs: number;
  reconnectMaxMs: number;
  sendTimeoutMs: number;
  clock?: Clock;
  random?: () => number;
}

/**
 * Emits "connected" and "disconnected" as the event socket opens and closes.
 */
export class OneBotGateway extends EventEmitter implements GatewayClient {
  readonly id = "onebot" as const;

  private readonly queue = new EventQueue<InboundEvent>();
  private readonly clock: Clock;
  private readonly random: () => number;
  private socket: WebSocket | null = null;
  private connected = false;
  private running = false;
  private loop: Promise<void> | null = null;
  private lifetime: AbortController | null = null;
  private selfId: string | null = null;
  private lastSequenceNo: number | null = null;
  private reconnected = false;

  constructor(private readonly options: OneBotGatewayOptions) {
    super();
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  /** Bot account id reported by the bridge's lifecycle event. */
  get botId(): string | null {
    return this.selfId;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.queue.reopen();
    const lifetime = new AbortController();
    this.lifetime = lifetime;
    this.loop = this.run(lifetime.signal);
    log.info(`OneBot gateway starting (${this.options.websocketUrl})`);
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.lifetime?.abort();
    this.socket?.close(1000, "shutdown");
    this.queue.close();
    await this.loop;
    this.loop = null;
    log.info("OneBot gateway stopped");
  }

  events(signal?: AbortSignal): AsyncIterable<InboundEvent> {
    return this.queue.drain(signal);
  }

  async send(scope: Scope, text: string): Promise<Result<DeliveryId, GatewayError>> {
    const result = await postMessage(
      {
        httpUrl: this.options.httpUrl,
        token: this.options.token,
        timeoutMs: this.options.sendTimeoutMs,
      },
      scope,
      text,
    );
    if (result.ok) {
      log.debug(`Delivered ${result.value} to ${scopeKey(scope)}`);
    }
    return result;
  }

  private async run(signal: AbortSignal): Promise<void> {
    let attempt = 0;
    let everConnected = false;

    while (this.running) {
      const opened = await this.connectOnce(signal);
      if (!this.running) break;

      if (opened) {
        everConnected = true;
        attempt = 1;
      } else {
        attempt += 1;
      }
      this.reconnected = everConnected;

      const delay = computeBackoff(
        attempt,
        { baseMs: this.options.heartbeatMs, maxMs: this.options.reconnectMaxMs, jitter: true },
        this.random,
      );
      log.info(`Reconnecting to OneBot in ${delay}ms (attempt ${attempt})`);
      try {
        await this.clock.sleep(delay, signal);
      } catch (e) {
        if (e instanceof AbortError) break;
        throw e;
      }
    }
  }

  /** Resolves when the socket closes; true if it was ever open. */
  private connectOnce(signal: AbortSignal): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const headers: Record<string, string> = {};
      if (this.options.token && this.options.token.trim() !== "") {
        headers["Authorization"] = `Bearer ${this.options.token}`;
      }

      let ws: WebSocket;
      try {
        ws = new WebSocket(this.options.websocketUrl, { headers });
      } catch (e) {
        log.warn(`Cannot open OneBot socket ${this.options.websocketUrl}: ${describeError(e)}`);
        resolve(false);
        return;
      }
      this.socket = ws;
      let opened = false;

      const onAbort = () => ws.close(1000, "shutdown");
      signal.addEventListener("abort", onAbort, { once: true });

      ws.on("open", () => {
        opened = true;
        this.connected = true;
        log.info("Connected to OneBot event socket");
        this.emit("connected");
      });

      ws.on("message", (data) => {
        this.handleFrame(data.toString());
      });

      ws.on("error", (error) => {
        log.warn(`OneBot socket error: ${error.message}`);
      });

      ws.on("close", (code, reason) => {
        signal.removeEventListener("abort", onAbort);
        if (this.socket === ws) this.socket = null;
        if (opened) {
          this.connected = false;
          log.warn(`OneBot socket closed (${code}${reason.length > 0 ? ` ${reason.toString()}` : ""})`);
          this.emit("disconnected");
        }
        resolve(opened);
      });
    });
  }

  private handleFrame(frame: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(frame);
    } catch (e) {
      log.debug(`Skipping non-JSON frame: ${describeError(e)}`);
      return;
    }

    const post = parsePost(raw, { selfId: this.selfId, now: this.clock.now() });
    switch (post.type) {
      case "lifecycle":
        this.selfId = post.selfId;
        log.info(`Bot account ${post.selfId} ${post.subType ?? "connected"}`);
        return;
      case "heartbeat":
        if (!post.online || !post.good) {
          log.warn(`Bot reported unhealthy status (online=${post.online}, good=${post.good})`);
        }
        return;
      case "invalid":
        log.debug(`Skipping malformed post: ${post.reason}`);
        return;
      case "ignored":
        return;
      case "message":
        this.trackSequence(post.event.sequenceNo);
        this.queue.push(post.event);
        return;
    }
  }

  /**
   * Compares the first message after a reconnect with the last one before it.
   * Some bridges (NapCat) hand out message ids that are not consecutive or
   * even increasing, so a gap or reset is only a hint and logs at debug.
   */
  private trackSequence(sequenceNo: number): void {
    const last = this.lastSequenceNo;
    if (this.reconnected && last !== null) {
      if (sequenceNo > last + 1) {
        log.debug(`Sequence gap after reconnect: ${sequenceNo - last - 1} event(s) may have been missed`);
      } else if (sequenceNo < last) {
        log.debug(`Bridge sequence reset (${last} -> ${sequenceNo})`);
      }
    }
    this.reconnected = false;
    this.lastSequenceNo = sequenceNo;
  }
}
