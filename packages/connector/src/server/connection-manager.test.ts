import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { TUNNEL_FRAME_TYPE_CODES, type TunnelFrame } from "../shared/tunnel-frames.js";
import { createCaptureLogger } from "../test-utils/capture-logger.js";
import {
  createMockSocketFactory,
  flushMicrotasks,
  type MockTunnelSocket,
} from "../test-utils/mock-tunnel-socket.js";
import { ConnectionManager, type ConnectionManagerOptions, type ConnectionState } from "./connection-manager.js";
import { AuthError, TransportError } from "./errors.js";

function setup(overrides: Partial<ConnectionManagerOptions> = {}) {
  const sockets = createMockSocketFactory();
  const capture = createCaptureLogger();
  const manager = new ConnectionManager({
    url: "wss://broker.test/connect",
    token: "test-secret",
    agent: "test-agent",
    version: "0.0.0",
    logger: capture.logger,
    maxPayloadBytes: 1024,
    random: () => 0.5,
    socketFactory: sockets.factory,
    ...overrides,
  });
  const frames: TunnelFrame[] = [];
  const states: ConnectionState[] = [];
  manager.on("frame", (frame) => frames.push(frame));
  manager.on("state", (state) => states.push(state));
  return { manager, sockets, capture, frames, states };
}

/** Starts the manager and swallows the start promise's outcome into a value. */
function startSettled(manager: ConnectionManager): Promise<unknown> {
  return manager.start().then(
    () => "active",
    (error: unknown) => error
  );
}

async function activate(socket: MockTunnelSocket): Promise<void> {
  socket.open();
  socket.receive({ type: "hello_ack", accepted: true });
  await flushMicrotasks();
}

function reconnectDelays(capture: ReturnType<typeof createCaptureLogger>): unknown[] {
  return capture.records
    .filter((record) => record.msg === "tunnel_reconnect_scheduled")
    .map((record) => record.delayMs);
}

const requestOpen: TunnelFrame = {
  type: "request_open",
  sessionId: "s1",
  method: "GET",
  path: "/v1/models",
  headers: {},
  bodyComplete: true,
  body: new Uint8Array(),
};

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe("ConnectionManager handshake", () => {
  test("dials with the bearer token and sends hello before anything else", () => {
    const { manager, sockets, states } = setup();
    void startSettled(manager);

    const socket = sockets.latest();
    expect(socket.url).toBe("wss://broker.test/connect");
    expect(socket.options.headers).toEqual({ Authorization: "Bearer test-secret" });
    expect(socket.options.maxPayloadBytes).toBe(1024 + 1024 * 1024);

    socket.open();

    expect(socket.sentFrames()).toEqual([
      { type: "hello", token: "test-secret", agent: "test-agent", version: "0.0.0" },
    ]);
    expect(states).toEqual(["connecting"]);
  });

  test("runs the post-auth hook before going active", async () => {
    const hook = { register: (): Promise<void> => Promise.resolve() };
    const { manager, sockets, states } = setup({ onAuthenticated: () => hook.register() });
    hook.register = () => manager.send({ type: "register", models: ["coder"], maxConcurrentSessions: 2 });
    const outcome = startSettled(manager);
    const socket = sockets.latest();

    await activate(socket);

    expect(await outcome).toBe("active");
    expect(states).toEqual(["connecting", "authenticated", "active"]);
    expect(socket.sentFrames()).toEqual([
      { type: "hello", token: "test-secret", agent: "test-agent", version: "0.0.0" },
      { type: "register", models: ["coder"], maxConcurrentSessions: 2 },
    ]);
  });

  test("treats session traffic before hello_ack as a protocol error", async () => {
    const { manager, sockets, frames } = setup();
    void startSettled(manager);
    const socket = sockets.latest();
    socket.open();

    socket.receive(requestOpen);

    expect(frames).toEqual([]);
    expect(socket.closeCalls[0]?.code).toBe(1002);
    expect(manager.state).toBe("disconnected");
    await vi.advanceTimersByTimeAsync(500);
    expect(sockets.sockets).toHaveLength(2);
  });

  test("a permanent rejection is fatal and never dispatches traffic", async () => {
    const { manager, sockets, frames } = setup();
    const fatal = vi.fn();
    manager.on("fatal", fatal);
    const outcome = startSettled(manager);
    const socket = sockets.latest();
    socket.open();

    socket.receive({ type: "hello_ack", accepted: false, message: "invalid token" });
    socket.receive(requestOpen);

    const error = await outcome;
    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ message: "invalid token", transient: false });
    expect(fatal).toHaveBeenCalledTimes(1);
    expect(frames).toEqual([]);
    await vi.advanceTimersByTimeAsync(120_000);
    expect(sockets.sockets).toHaveLength(1);
  });

  test("close code 4001 before the ack is an authentication failure", async () => {
    const { manager, sockets } = setup();
    const outcome = startSettled(manager);
    const socket = sockets.latest();
    socket.open();

    socket.remoteClose(4001, "unauthorized");

    const error = await outcome;
    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ message: "unauthorized" });
    expect(manager.state).toBe("disconnected");
  });

  test("a transient rejection backs off and retries", async () => {
    const { manager, sockets, capture } = setup();
    void startSettled(manager);
    const socket = sockets.latest();
    socket.open();

    socket.receive({ type: "hello_ack", accepted: false, message: "broker warming up", transient: true });

    expect(socket.terminateCalls).toBe(1);
    expect(capture.has("tunnel_auth_rejected_transient")).toBe(true);
    await vi.advanceTimersByTimeAsync(500);
    expect(sockets.sockets).toHaveLength(2);
  });

  test("terminates a socket whose hello is never acknowledged", async () => {
    const { manager, sockets, capture } = setup();
    void startSettled(manager);
    const socket = sockets.latest();
    socket.open();

    await vi.advanceTimersByTimeAsync(7_999);
    expect(socket.terminateCalls).toBe(0);
    await vi.advanceTimersByTimeAsync(1);

    expect(socket.terminateCalls).toBe(1);
    expect(capture.has("tunnel_hello_timeout_terminating")).toBe(true);
  });
});

describe("ConnectionManager liveness", () => {
  test("pings on an interval and drops the socket once pongs stop", async () => {
    const { manager, sockets, capture } = setup();
    void startSettled(manager);
    const socket = sockets.latest();
    await activate(socket);

    await vi.advanceTimersByTimeAsync(30_000);
    expect(socket.sentTypes().filter((type) => type === "ping")).toHaveLength(3);
    expect(socket.terminateCalls).toBe(0);

    await vi.advanceTimersByTimeAsync(10_000);
    expect(socket.terminateCalls).toBe(1);
    expect(capture.has("tunnel_pong_timeout_terminating")).toBe(true);
  });

  test("keeps the socket while pongs keep arriving", async () => {
    const { manager, sockets } = setup();
    void startSettled(manager);
    const socket = sockets.latest();
    await activate(socket);

    await vi.advanceTimersByTimeAsync(25_000);
    socket.receive({ type: "pong", ts: Date.now() });
    await vi.advanceTimersByTimeAsync(25_000);

    expect(socket.terminateCalls).toBe(0);
    expect(manager.state).toBe("active");
  });

  test("answers a broker ping with a pong carrying the same timestamp", async () => {
    const { manager, sockets } = setup();
    void startSettled(manager);
    const socket = sockets.latest();
    await activate(socket);

    socket.receive({ type: "ping", ts: 1234 });

    expect(socket.sentFrames().at(-1)).toEqual({ type: "pong", ts: 1234 });
  });
});

describe("ConnectionManager inbound frames", () => {
  test("dispatches session traffic once active", async () => {
    const { manager, sockets, frames } = setup();
    void startSettled(manager);
    const socket = sockets.latest();
    await activate(socket);

    socket.receive(requestOpen);
    socket.receive({ type: "cancel", sessionId: "s1", reason: "client_gone" });

    expect(frames.map((frame) => frame.type)).toEqual(["request_open", "cancel"]);
  });

  test("closes with 1002 and reports connection loss on a malformed frame", async () => {
    const { manager, sockets } = setup();
    const lost = vi.fn();
    manager.on("connection_lost", lost);
    void startSettled(manager);
    const socket = sockets.latest();
    await activate(socket);

    socket.receiveRaw(new Uint8Array([1, 2, 3]));

    expect(socket.closeCalls[0]?.code).toBe(1002);
    expect(lost).toHaveBeenCalledWith("protocol error: Frame shorter than header (3 bytes)");
    await vi.advanceTimersByTimeAsync(500);
    expect(sockets.sockets).toHaveLength(2);
  });

  test("skips unknown frame types and stays connected", async () => {
    const { manager, sockets, capture, frames } = setup();
    void startSettled(manager);
    const socket = sockets.latest();
    await activate(socket);
    const unknown = new Uint8Array(22);
    unknown.set([0x54, 0x4e, 1, 99]);

    socket.receiveRaw(unknown);

    expect(capture.find("tunnel_unknown_frame_skipped")).toMatchObject({ typeCode: 99 });
    expect(manager.state).toBe("active");
    expect(socket.closeCalls).toEqual([]);
    expect(frames).toEqual([]);
  });

  test("scopes an oversized frame to its session", async () => {
    const { manager, sockets } = setup();
    const decodeErrors = vi.fn();
    manager.on("session_decode_error", decodeErrors);
    void startSettled(manager);
    const socket = sockets.latest();
    await activate(socket);

    socket.receive({ type: "request_chunk", sessionId: "big", seq: 0, data: new Uint8Array(2048), final: true });

    expect(decodeErrors).toHaveBeenCalledWith({
      kind: "payload_too_large",
      message: "Payload of 2048 bytes exceeds limit of 1024",
      sessionId: "big",
      typeCode: TUNNEL_FRAME_TYPE_CODES.request_chunk,
    });
    expect(manager.state).toBe("active");
  });
});

describe("ConnectionManager reconnect", () => {
  test("backs off with full jitter and resets after a stable connection", async () => {
    const { manager, sockets, capture } = setup({ pongTimeoutMs: 120_000 });
    void startSettled(manager);

    sockets.latest().remoteClose(1006);
    await vi.advanceTimersByTimeAsync(500);
    sockets.latest().remoteClose(1006);
    await vi.advanceTimersByTimeAsync(1_000);
    sockets.latest().remoteClose(1006);
    await vi.advanceTimersByTimeAsync(2_000);
    expect(reconnectDelays(capture)).toEqual([500, 1000, 2000]);
    expect(manager.retryCount).toBe(3);

    const socket = sockets.latest();
    await activate(socket);
    await vi.advanceTimersByTimeAsync(59_999);
    expect(manager.retryCount).toBe(3);
    await vi.advanceTimersByTimeAsync(1);
    expect(manager.retryCount).toBe(0);

    socket.remoteClose(1006);
    expect(reconnectDelays(capture).at(-1)).toBe(500);
  });

  test("reports connection loss only for connections that were live", async () => {
    const { manager, sockets } = setup();
    const lost = vi.fn();
    manager.on("connection_lost", lost);
    void startSettled(manager);

    sockets.latest().remoteClose(1006);
    expect(lost).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(500);
    const socket = sockets.latest();
    await activate(socket);
    socket.remoteClose(1011, "broker restarting");

    expect(lost).toHaveBeenCalledWith("socket closed (code=1011)");
  });

  test("close stops reconnecting", async () => {
    const { manager, sockets } = setup();
    void startSettled(manager);
    const socket = sockets.latest();
    await activate(socket);

    manager.close();

    expect(socket.closeCalls).toEqual([{ code: 1000, reason: "shutdown" }]);
    expect(manager.state).toBe("disconnected");
    await vi.advanceTimersByTimeAsync(120_000);
    expect(sockets.sockets).toHaveLength(1);
  });
});

describe("ConnectionManager writes", () => {
  test("rejects sends while disconnected", async () => {
    const { manager } = setup();

    const attempt = manager.send({ type: "ping", ts: 1 });

    await expect(attempt).rejects.toBeInstanceOf(TransportError);
    await expect(attempt).rejects.toThrow("Cannot send ping while disconnected");
  });

  test("writes frames in the order they were sent", async () => {
    const { manager, sockets } = setup();
    void startSettled(manager);
    const socket = sockets.latest();
    await activate(socket);

    const writes = [1, 2, 3].map((seq) =>
      manager.send({ type: "response_chunk", sessionId: "s1", seq, data: new Uint8Array([seq]), final: seq === 3 })
    );
    await Promise.all(writes);
    await manager.flush();

    const seqs = socket
      .sentFrames()
      .flatMap((frame) => (frame.type === "response_chunk" ? [frame.seq] : []));
    expect(seqs).toEqual([1, 2, 3]);
  });

  test("draining keeps the socket writable", async () => {
    const { manager, sockets } = setup();
    void startSettled(manager);
    const socket = sockets.latest();
    await activate(socket);

    manager.beginDrain();

    expect(manager.state).toBe("draining");
    await expect(
      manager.send({ type: "error", sessionId: "s1", code: "cancelled", message: "bye" })
    ).resolves.toBeUndefined();
    expect(socket.sentFrames().at(-1)).toEqual({ type: "error", sessionId: "s1", code: "cancelled", message: "bye" });
  });
});
