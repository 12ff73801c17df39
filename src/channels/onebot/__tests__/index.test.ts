import { describe, it, expect, afterEach } from "vitest";
import { once } from "node:events";
import type { IncomingMessage } from "node:http";
import { WebSocketServer, type WebSocket } from "ws";
import { OneBotGateway } from "../index.js";
import type { InboundEvent } from "../../../core/types.js";

interface Bridge {
  server: WebSocketServer;
  url: string;
  sockets: WebSocket[];
  authHeaders: Array<string | undefined>;
}

async function startBridge(): Promise<Bridge> {
  const server = new WebSocketServer({ port: 0, host: "127.0.0.1" });
  await once(server, "listening");
  const address = server.address();
  if (typeof address !== "object" || address === null) throw new Error("bridge has no port");
  const { port } = address;
  const bridge: Bridge = { server, url: `ws://127.0.0.1:${port}`, sockets: [], authHeaders: [] };
  server.on("connection", (socket: WebSocket, request: IncomingMessage) => {
    bridge.sockets.push(socket);
    bridge.authHeaders.push(request.headers.authorization);
  });
  return bridge;
}

function groupMessage(messageId: number, text: string) {
  return JSON.stringify({
    post_type: "message",
    message_type: "group",
    message_id: messageId,
    group_id: 20002,
    user_id: 10001,
    raw_message: text,
    message: [
      { type: "at", data: { qq: "42" } },
      { type: "text", data: { text: ` ${text}` } },
    ],
    sender: { user_id: 10001, nickname: "alice" },
  });
}

function createGateway(url: string) {
  return new OneBotGateway({
    websocketUrl: url,
    httpUrl: "http://127.0.0.1:9",
    token: "test-secret",
    heartbeatMs: 10,
    reconnectMaxMs: 50,
    sendTimeoutMs: 1_000,
    random: () => 0,
  });
}

describe("OneBotGateway", () => {
  let bridge: Bridge | null = null;
  let gateway: OneBotGateway | null = null;

  async function setup(): Promise<{ bridge: Bridge; gateway: OneBotGateway }> {
    const b = await startBridge();
    const g = createGateway(b.url);
    bridge = b;
    gateway = g;
    const connected = once(g, "connected");
    await g.start();
    await connected;
    return { bridge: b, gateway: g };
  }

  afterEach(async () => {
    await gateway?.stop();
    gateway = null;
    if (bridge) {
      const server = bridge.server;
      for (const socket of bridge.sockets) socket.terminate();
      await new Promise<void>((resolve) => server.close(() => resolve()));
      bridge = null;
    }
  });

  it("connects with the bearer token and streams message posts", async () => {
    const { bridge, gateway } = await setup();

    expect(gateway.isConnected).toBe(true);
    expect(bridge.authHeaders).toEqual(["Bearer test-secret"]);

    const socket = bridge.sockets[0];
    socket.send(JSON.stringify({ post_type: "meta_event", meta_event_type: "lifecycle", self_id: 42, sub_type: "connect" }));
    socket.send("not json");
    socket.send(JSON.stringify({ post_type: "notice", notice_type: "group_recall" }));
    socket.send(groupMessage(1, "hello"));

    const iterator = gateway.events()[Symbol.asyncIterator]();
    const first = await iterator.next();
    expect(first.done).toBe(false);
    const event: InboundEvent = first.value;
    expect(event.text).toBe("@<42> hello");
    expect(event.mentioned).toBe(true);
    expect(event.sequenceNo).toBe(1);
    expect(gateway.botId).toBe("42");
  });

  it("reconnects after the bridge drops the socket", async () => {
    const { bridge, gateway } = await setup();

    const disconnected = once(gateway, "disconnected");
    bridge.sockets[0].terminate();
    await disconnected;
    expect(gateway.isConnected).toBe(false);

    // reconnect delay is a few ms; the listener is in place long before
    await once(gateway, "connected");

    expect(gateway.isConnected).toBe(true);
    expect(bridge.sockets).toHaveLength(2);

    bridge.sockets[1].send(groupMessage(5, "back"));
    const iterator = gateway.events()[Symbol.asyncIterator]();
    const next = await iterator.next();
    expect(next.done).toBe(false);
    expect(next.value.text).toBe("@<42> back");
  });

  it("ends the event stream on stop", async () => {
    const { gateway } = await setup();

    const collected: InboundEvent[] = [];
    const consumer = (async () => {
      for await (const event of gateway.events()) collected.push(event);
    })();

    await gateway.stop();
    await consumer;

    expect(collected).toEqual([]);
    expect(gateway.isConnected).toBe(false);
  });
});
