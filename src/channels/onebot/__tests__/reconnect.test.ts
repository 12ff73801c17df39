import { describe, it, expect, vi, afterEach, beforeEach } from "vitest";
import { once } from "node:events";
import { WebSocketServer, type WebSocket } from "ws";
import { OneBotGateway } from "../index.js";
import { AbortError, type Clock } from "../../../utils/clock.js";
import type { InboundEvent } from "../../../core/types.js";

const logs = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../../../utils/logger.js", () => ({
  createLogger: () => logs,
}));

/**
 * Records every sleep. The first `limit - 1` sleeps finish at once; later
 * ones wait until the gateway stops.
 */
class StepClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private readonly limit = Number.POSITIVE_INFINITY) {}

  now(): number {
    return 0;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(new AbortError());
    this.sleeps.push(ms);
    if (this.sleeps.length < this.limit) return Promise.resolve();
    return new Promise<void>((_, reject) => {
      signal?.addEventListener("abort", () => reject(new AbortError()), { once: true });
    });
  }
}

function groupMessage(messageId: number, text: string): string {
  return JSON.stringify({
    post_type: "message",
    message_type: "group",
    message_id: messageId,
    group_id: 20002,
    user_id: 10001,
    raw_message: text,
    message: [{ type: "text", data: { text } }],
    sender: { user_id: 10001, nickname: "alice" },
  });
}

async function nextEvent(gateway: OneBotGateway): Promise<InboundEvent> {
  const next = await gateway.events()[Symbol.asyncIterator]().next();
  if (next.done) throw new Error("event stream ended");
  return next.value;
}

describe("OneBotGateway reconnect", () => {
  let server: WebSocketServer | null = null;
  let gateway: OneBotGateway | null = null;

  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(async () => {
    await gateway?.stop();
    gateway = null;
    if (server) {
      const s = server;
      for (const client of s.clients) client.terminate();
      await new Promise<void>((resolve) => s.close(() => resolve()));
      server = null;
    }
  });

  it("backs off from heartbeatMs, doubling up to reconnectMaxMs", async () => {
    const clock = new StepClock(5);
    gateway = new OneBotGateway({
      websocketUrl: "ftp://127.0.0.1:3001",
      httpUrl: "http://127.0.0.1:9",
      heartbeatMs: 100,
      reconnectMaxMs: 500,
      sendTimeoutMs: 1_000,
      clock,
      random: () => 1,
    });

    await gateway.start();
    await vi.waitFor(() => expect(clock.sleeps).toHaveLength(5));

    expect(clock.sleeps).toEqual([100, 200, 400, 500, 500]);
    expect(gateway.isConnected).toBe(false);
    expect(logs.warn).toHaveBeenCalledWith(
      expect.stringContaining("Cannot open OneBot socket ftp://127.0.0.1:3001"),
    );
    expect(logs.info).toHaveBeenCalledWith("Reconnecting to OneBot in 500ms (attempt 5)");
  });

  describe("against a bridge", () => {
    async function connect(): Promise<{ sockets: WebSocket[]; gateway: OneBotGateway; clock: StepClock }> {
      const wss = new WebSocketServer({ port: 0, host: "127.0.0.1" });
      server = wss;
      await once(wss, "listening");
      const address = wss.address();
      if (typeof address !== "object" || address === null) throw new Error("bridge has no port");
      const sockets: WebSocket[] = [];
      wss.on("connection", (socket: WebSocket) => sockets.push(socket));

      const clock = new StepClock();
      const g = new OneBotGateway({
        websocketUrl: `ws://127.0.0.1:${address.port}`,
        httpUrl: "http://127.0.0.1:9",
        heartbeatMs: 10,
        reconnectMaxMs: 50,
        sendTimeoutMs: 1_000,
        clock,
        random: () => 0,
      });
      gateway = g;
      const connected = once(g, "connected");
      await g.start();
      await connected;
      return { sockets, gateway: g, clock };
    }

    async function dropAndReconnect(sockets: WebSocket[], g: OneBotGateway): Promise<void> {
      const reconnected = once(g, "connected");
      sockets[sockets.length - 1].terminate();
      await reconnected;
    }

    it("notes a forward jump in message ids after a reconnect", async () => {
      const { sockets, gateway, clock } = await connect();

      sockets[0].send(groupMessage(10, "before"));
      expect((await nextEvent(gateway)).sequenceNo).toBe(10);

      await dropAndReconnect(sockets, gateway);
      expect(clock.sleeps).toEqual([5]);

      sockets[1].send(groupMessage(15, "after"));
      expect((await nextEvent(gateway)).sequenceNo).toBe(15);

      expect(logs.debug).toHaveBeenCalledWith(
        "Sequence gap after reconnect: 4 event(s) may have been missed",
      );
    });

    it("notes a reset when ids go backwards after a reconnect", async () => {
      const { sockets, gateway } = await connect();

      sockets[0].send(groupMessage(10, "before"));
      await nextEvent(gateway);

      await dropAndReconnect(sockets, gateway);
      sockets[1].send(groupMessage(3, "after"));
      expect((await nextEvent(gateway)).sequenceNo).toBe(3);

      expect(logs.debug).toHaveBeenCalledWith("Bridge sequence reset (10 -> 3)");
      expect(logs.debug).not.toHaveBeenCalledWith(expect.stringContaining("Sequence gap"));
    });

    it("ignores jumps while the connection holds", async () => {
      const { sockets, gateway } = await connect();

      sockets[0].send(groupMessage(1, "one"));
      await nextEvent(gateway);
      sockets[0].send(groupMessage(9, "nine"));
      await nextEvent(gateway);

      expect(logs.debug).not.toHaveBeenCalledWith(expect.stringContaining("Sequence gap"));
    });
  });
});
