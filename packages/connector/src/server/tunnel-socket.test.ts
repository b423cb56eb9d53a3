import { afterEach, describe, expect, test, vi } from "vitest";
import { WebSocketServer, type VerifyClientCallbackAsync } from "ws";
import { createCaptureLogger } from "../test-utils/capture-logger.js";
import { ConnectionManager } from "./connection-manager.js";
import { AuthError } from "./errors.js";
import { createWsTunnelSocket, type TunnelSocket, type TunnelSocketHandlers } from "./tunnel-socket.js";

let broker: WebSocketServer | null = null;
let client: TunnelSocket | null = null;

afterEach(async () => {
  client?.terminate();
  client = null;
  const running = broker;
  broker = null;
  if (!running) return;
  for (const peer of running.clients) {
    peer.terminate();
  }
  await new Promise<void>((resolve) => running.close(() => resolve()));
});

/** Starts a loopback broker and returns its URL. */
async function startBroker(verifyClient?: VerifyClientCallbackAsync): Promise<{ url: string; server: WebSocketServer }> {
  const server = new WebSocketServer({ host: "127.0.0.1", port: 0, ...(verifyClient ? { verifyClient } : {}) });
  broker = server;
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (typeof address === "string") {
    throw new Error("expected a TCP address");
  }
  return { url: `ws://127.0.0.1:${address.port}/connect`, server };
}

/** Refuses every upgrade with `status`. ws only treats two-argument verifiers as async. */
function rejectWith(status: number) {
  const attempts = { count: 0 };
  const verifyClient: VerifyClientCallbackAsync = (_info, callback) => {
    attempts.count += 1;
    callback(false, status);
  };
  return { verifyClient, attempts };
}

function createHandlers() {
  return {
    onOpen: vi.fn<TunnelSocketHandlers["onOpen"]>(),
    onMessage: vi.fn<TunnelSocketHandlers["onMessage"]>(),
    onClose: vi.fn<TunnelSocketHandlers["onClose"]>(),
    onError: vi.fn<TunnelSocketHandlers["onError"]>(),
  };
}

const socketOptions = { headers: { Authorization: "Bearer test-secret" }, maxPayloadBytes: 1024, handshakeTimeoutMs: 2_000 };

describe("createWsTunnelSocket", () => {
  test("sends binary frames to the broker once open", async () => {
    const { url, server } = await startBroker();
    const received: Buffer[] = [];
    const authorization: Array<string | undefined> = [];
    server.on("connection", (peer, request) => {
      authorization.push(request.headers.authorization);
      peer.on("message", (data, isBinary) => {
        if (isBinary && Buffer.isBuffer(data)) received.push(data);
      });
    });
    const handlers = createHandlers();

    client = createWsTunnelSocket(url, socketOptions, handlers);
    await vi.waitFor(() => expect(handlers.onOpen).toHaveBeenCalledTimes(1));
    await client.send(new Uint8Array([1, 2, 3]));

    await vi.waitFor(() => expect(received).toHaveLength(1));
    expect(Array.from(received[0])).toEqual([1, 2, 3]);
    expect(authorization).toEqual(["Bearer test-secret"]);
    expect(client.isOpen).toBe(true);
  });

  test.each([401, 403])("reports an HTTP %i upgrade answer as an auth close", async (status) => {
    const { url } = await startBroker(rejectWith(status).verifyClient);
    const handlers = createHandlers();

    client = createWsTunnelSocket(url, socketOptions, handlers);

    await vi.waitFor(() => expect(handlers.onClose).toHaveBeenCalledTimes(1));
    expect(handlers.onClose).toHaveBeenCalledWith(4001, `Broker refused the upgrade with HTTP ${status}`);
    expect(handlers.onOpen).not.toHaveBeenCalled();
    expect(handlers.onError).not.toHaveBeenCalled();
  });

  test("reports other upgrade failures as an abnormal close", async () => {
    const { url } = await startBroker(rejectWith(503).verifyClient);
    const handlers = createHandlers();

    client = createWsTunnelSocket(url, socketOptions, handlers);

    await vi.waitFor(() => expect(handlers.onClose).toHaveBeenCalledTimes(1));
    expect(handlers.onClose).toHaveBeenCalledWith(1006, "Broker refused the upgrade with HTTP 503");
  });
});

describe("ConnectionManager over a real socket", () => {
  test("stops for good when the broker refuses the token at the upgrade", async () => {
    const { verifyClient, attempts } = rejectWith(401);
    const { url } = await startBroker(verifyClient);
    const capture = createCaptureLogger();
    const manager = new ConnectionManager({
      url,
      token: "test-secret",
      agent: "test-agent",
      version: "0.0.0",
      logger: capture.logger,
      maxPayloadBytes: 1024,
      reconnect: { baseDelayMs: 5, maxDelayMs: 10 },
    });
    const fatal = vi.fn<(error: AuthError) => void>();
    manager.on("fatal", fatal);

    const outcome = await manager.start().then(
      () => "active",
      (error: unknown) => error
    );

    expect(outcome).toBeInstanceOf(AuthError);
    expect(outcome).toMatchObject({ message: "Broker refused the upgrade with HTTP 401", transient: false });
    expect(fatal).toHaveBeenCalledTimes(1);
    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(attempts.count).toBe(1);
    expect(capture.has("tunnel_reconnect_scheduled")).toBe(false);
    expect(manager.state).toBe("disconnected");
  });
});
