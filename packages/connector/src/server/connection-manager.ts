import type pino from "pino";
import {
  decodeTunnelFrame,
  describeFrame,
  encodeTunnelFrame,
  type TunnelDecodeError,
  type TunnelFrame,
} from "../shared/tunnel-frames.js";
import {
  DEFAULT_RECONNECT_POLICY,
  computeReconnectDelay,
  type ReconnectPolicy,
} from "./backoff.js";
import { AuthError, ProtocolError, TransportError } from "./errors.js";
import {
  CLOSE_CODE_UNAUTHORIZED,
  createWsTunnelSocket,
  type TunnelSocket,
  type TunnelSocketFactory,
} from "./tunnel-socket.js";

export type ConnectionState =
  | "disconnected"
  | "connecting"
  | "authenticated"
  | "active"
  | "draining";

export type SessionDecodeError = TunnelDecodeError & { sessionId: string };

type ConnectionEvents = {
  state: (state: ConnectionState, previous: ConnectionState) => void;
  frame: (frame: TunnelFrame) => void;
  session_decode_error: (error: SessionDecodeError) => void;
  connection_lost: (reason: string) => void;
  fatal: (error: AuthError) => void;
};

type ListenerSets = { [E in keyof ConnectionEvents]: Set<ConnectionEvents[E]> };

export type ConnectionManagerOptions = {
  url: string;
  token: string;
  agent: string;
  version: string;
  logger: pino.Logger;
  maxPayloadBytes: number;
  reconnect?: Partial<ReconnectPolicy>;
  helloTimeoutMs?: number;
  handshakeTimeoutMs?: number;
  pingIntervalMs?: number;
  pongTimeoutMs?: number;
  random?: () => number;
  socketFactory?: TunnelSocketFactory;
  /** Runs after the broker accepts `hello` and before the connection goes active. */
  onAuthenticated?: () => Promise<void>;
};

const DEFAULT_HELLO_TIMEOUT_MS = 8_000;
const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;
const DEFAULT_PING_INTERVAL_MS = 10_000;
const DEFAULT_PONG_TIMEOUT_MS = 30_000;
// Room for the frame header, session id and JSON metadata on top of the payload cap.
const FRAME_OVERHEAD_BYTES = 1024 * 1024;
const CLOSE_CODE_PROTOCOL_ERROR = 1002;

const SESSION_TRAFFIC: ReadonlySet<TunnelFrame["type"]> = new Set([
  "request_open",
  "request_chunk",
  "cancel",
  "error",
]);

type PendingWrite = {
  data: Uint8Array;
  resolve: () => void;
  reject: (error: Error) => void;
};

export class ConnectionManager {
  private readonly logger: pino.Logger;
  private readonly policy: ReconnectPolicy;
  private readonly socketFactory: TunnelSocketFactory;
  private readonly listeners: ListenerSets = {
    state: new Set(),
    frame: new Set(),
    session_decode_error: new Set(),
    connection_lost: new Set(),
    fatal: new Set(),
  };

  private currentState: ConnectionState = "disconnected";
  private socket: TunnelSocket | null = null;
  private generation = 0;
  private attempt = 0;
  private stopped = true;
  private lastActivity = 0;
  private lastPongAt = 0;

  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private helloTimer: ReturnType<typeof setTimeout> | null = null;
  private pingTimer: ReturnType<typeof setInterval> | null = null;
  private stableTimer: ReturnType<typeof setTimeout> | null = null;

  private writeQueue: PendingWrite[] = [];
  private writing = false;
  private flushWaiters: Array<() => void> = [];

  private startPromise: Promise<void> | null = null;
  private startResolve: (() => void) | null = null;
  private startReject: ((error: Error) => void) | null = null;

  constructor(private readonly options: ConnectionManagerOptions) {
    this.logger = options.logger.child({ module: "connection-manager" });
    this.policy = { ...DEFAULT_RECONNECT_POLICY, ...options.reconnect };
    this.socketFactory = options.socketFactory ?? createWsTunnelSocket;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get retryCount(): number {
    return this.attempt;
  }

  get lastActivityAt(): number {
    return this.lastActivity;
  }

  get url(): string {
    return this.options.url;
  }

  on<E extends keyof ConnectionEvents>(event: E, listener: ConnectionEvents[E]): () => void {
    const set: Set<ConnectionEvents[E]> = this.listeners[event];
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  /**
   * Starts the connect loop. Resolves once the connection first turns active;
   * rejects with AuthError if the broker permanently refuses the token.
   */
  start(): Promise<void> {
    if (this.startPromise) {
      return this.startPromise;
    }
    this.stopped = false;
    this.startPromise = new Promise<void>((resolve, reject) => {
      this.startResolve = resolve;
      this.startReject = reject;
    });
    this.connect();
    return this.startPromise;
  }

  /** Encodes and queues a frame. Writes go out one at a time in queue order. */
  send(frame: TunnelFrame): Promise<void> {
    if (
      !this.socket ||
      (this.currentState !== "authenticated" &&
        this.currentState !== "active" &&
        this.currentState !== "draining")
    ) {
      return Promise.reject(new TransportError(`Cannot send ${frame.type} while ${this.currentState}`));
    }
    return this.enqueue(encodeTunnelFrame(frame));
  }

  /** Resolves once every queued frame has been written or rejected, or after `timeoutMs`. */
  flush(timeoutMs = 2_000): Promise<void> {
    if (!this.writing && this.writeQueue.length === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const timer = setTimeout(done, timeoutMs);
      function done(): void {
        clearTimeout(timer);
        resolve();
      }
      this.flushWaiters.push(done);
    });
  }

  /** Stops accepting new sessions; the socket stays up for in-flight ones. */
  beginDrain(): void {
    if (this.currentState === "active" || this.currentState === "authenticated") {
      this.setState("draining");
    }
  }

  close(code = 1000, reason = "shutdown"): void {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    const socket = this.socket;
    if (socket) {
      this.teardown(`closed locally: ${reason}`);
      try {
        socket.close(code, reason);
      } catch (error) {
        this.logger.debug({ err: error }, "tunnel_socket_close_failed");
      }
    } else {
      this.setState("disconnected");
    }
    this.rejectStart(new TransportError("Connection closed before it became active"));
  }

  private connect(): void {
    if (this.stopped) return;

    const generation = ++this.generation;
    const guard =
      <A extends unknown[]>(handler: (...args: A) => void) =>
      (...args: A): void => {
        if (generation !== this.generation) return;
        handler(...args);
      };

    this.setState("connecting");
    this.logger.info({ url: this.options.url, attempt: this.attempt }, "tunnel_connecting");

    try {
      this.socket = this.socketFactory(
        this.options.url,
        {
          headers: { Authorization: `Bearer ${this.options.token}` },
          maxPayloadBytes: this.options.maxPayloadBytes + FRAME_OVERHEAD_BYTES,
          handshakeTimeoutMs: this.options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS,
        },
        {
          onOpen: guard(() => this.handleOpen(generation)),
          onMessage: guard((data: Uint8Array) => this.handleMessage(generation, data)),
          onClose: guard((code: number, reason: string) => this.handleClose(generation, code, reason)),
          onError: guard((error: Error) => {
            // A close event always follows; reconnect is scheduled from there.
            this.logger.warn({ err: error, url: this.options.url }, "tunnel_socket_error");
          }),
        }
      );
    } catch (error) {
      this.logger.error({ err: error, url: this.options.url }, "tunnel_socket_create_failed");
      this.handleDisconnect(generation, "socket creation failed");
    }
  }

  private handleOpen(generation: number): void {
    this.lastActivity = Date.now();
    this.helloTimer = setTimeout(() => {
      if (generation !== this.generation) return;
      this.logger.warn(
        { waitedMs: this.options.helloTimeoutMs ?? DEFAULT_HELLO_TIMEOUT_MS },
        "tunnel_hello_timeout_terminating"
      );
      this.dropConnection(generation, "hello not acknowledged in time");
    }, this.options.helloTimeoutMs ?? DEFAULT_HELLO_TIMEOUT_MS);

    const hello = encodeTunnelFrame({
      type: "hello",
      token: this.options.token,
      agent: this.options.agent,
      version: this.options.version,
    });
    void this.enqueue(hello).catch((error: unknown) => {
      this.logger.warn({ err: error }, "tunnel_hello_send_failed");
      this.dropConnection(generation, "hello send failed");
    });
    this.logger.debug({ url: this.options.url }, "tunnel_open_waiting_for_hello_ack");
  }

  private handleMessage(generation: number, data: Uint8Array): void {
    this.lastActivity = Date.now();
    const result = decodeTunnelFrame(data, { maxPayloadBytes: this.options.maxPayloadBytes });
    if (!result.ok) {
      this.handleDecodeError(generation, result.error);
      return;
    }

    const frame = result.frame;
    if (frame.type === "ping") {
      void this.enqueue(encodeTunnelFrame({ type: "pong", ts: frame.ts })).catch((error: unknown) => {
        this.logger.debug({ err: error }, "tunnel_pong_send_failed");
      });
      return;
    }
    if (frame.type === "pong") {
      this.lastPongAt = Date.now();
      return;
    }

    if (this.currentState === "connecting") {
      if (frame.type === "hello_ack") {
        this.handleHelloAck(generation, frame.accepted, frame.message, frame.transient === true);
        return;
      }
      if (frame.type === "error") {
        this.logger.warn({ code: frame.code, message: frame.message }, "broker_error_before_ack");
        return;
      }
      this.failProtocol(generation, new ProtocolError(`Received ${frame.type} before hello_ack`));
      return;
    }

    if (!SESSION_TRAFFIC.has(frame.type)) {
      this.failProtocol(generation, new ProtocolError(`Unexpected ${frame.type} frame from broker`));
      return;
    }
    this.logger.trace(describeFrame(frame), "tunnel_frame_in");
    for (const listener of this.listeners.frame) {
      this.notify("frame", () => listener(frame));
    }
  }

  private handleDecodeError(generation: number, error: TunnelDecodeError): void {
    switch (error.kind) {
      case "malformed":
        this.failProtocol(generation, new ProtocolError(error.message));
        return;
      case "unknown_type":
        this.logger.warn({ typeCode: error.typeCode, sessionId: error.sessionId }, "tunnel_unknown_frame_skipped");
        return;
      case "payload_too_large": {
        const sessionId = error.sessionId;
        if (sessionId !== undefined) {
          const scoped: SessionDecodeError = { ...error, sessionId };
          for (const listener of this.listeners.session_decode_error) {
            this.notify("session_decode_error", () => listener(scoped));
          }
        } else {
          this.logger.warn({ message: error.message }, "tunnel_oversized_frame_skipped");
        }
        return;
      }
    }
  }

  private handleHelloAck(
    generation: number,
    accepted: boolean,
    message: string | undefined,
    transient: boolean
  ): void {
    if (this.helloTimer) {
      clearTimeout(this.helloTimer);
      this.helloTimer = null;
    }

    if (!accepted) {
      const error = new AuthError(message ?? "Broker rejected connector token", transient);
      if (transient) {
        this.logger.warn({ message: error.message }, "tunnel_auth_rejected_transient");
        this.dropConnection(generation, "authentication rejected (transient)");
        return;
      }
      this.failAuth(generation, error);
      return;
    }

    this.setState("authenticated");
    this.logger.info({ url: this.options.url }, "tunnel_authenticated");
    const onAuthenticated = this.options.onAuthenticated ?? (() => Promise.resolve());
    void onAuthenticated().then(
      () => {
        if (generation !== this.generation || this.currentState !== "authenticated") return;
        this.markActive(generation);
      },
      (error: unknown) => {
        this.logger.error({ err: error }, "tunnel_post_auth_failed");
        this.dropConnection(generation, "post-authentication setup failed");
      }
    );
  }

  private markActive(generation: number): void {
    this.setState("active");
    this.lastPongAt = Date.now();
    this.logger.info({ url: this.options.url, retries: this.attempt }, "tunnel_active");

    const pingIntervalMs = this.options.pingIntervalMs ?? DEFAULT_PING_INTERVAL_MS;
    const pongTimeoutMs = this.options.pongTimeoutMs ?? DEFAULT_PONG_TIMEOUT_MS;
    this.pingTimer = setInterval(() => {
      if (generation !== this.generation) return;
      const now = Date.now();
      const silentForMs = now - this.lastPongAt;
      // A half-open socket may never emit close; missing pongs are the only signal.
      if (silentForMs > pongTimeoutMs) {
        this.logger.warn({ silentForMs, pongTimeoutMs }, "tunnel_pong_timeout_terminating");
        this.dropConnection(generation, "pong timeout");
        return;
      }
      void this.enqueue(encodeTunnelFrame({ type: "ping", ts: now })).catch((error: unknown) => {
        this.logger.warn({ err: error }, "tunnel_ping_send_failed");
        this.dropConnection(generation, "ping send failed");
      });
    }, pingIntervalMs);

    this.stableTimer = setTimeout(() => {
      if (generation !== this.generation) return;
      this.attempt = 0;
    }, this.policy.stableAfterMs);

    this.resolveStart();
  }

  private handleClose(generation: number, code: number, reason: string): void {
    if (this.currentState === "connecting" && code === CLOSE_CODE_UNAUTHORIZED) {
      this.failAuth(generation, new AuthError(reason || "Broker rejected connector token", false));
      return;
    }
    this.logger.warn({ code, reason, url: this.options.url }, "tunnel_disconnected");
    this.handleDisconnect(generation, `socket closed (code=${code})`);
  }

  private failProtocol(generation: number, error: ProtocolError): void {
    this.logger.error({ err: error }, "tunnel_protocol_error");
    this.dropConnection(generation, `protocol error: ${error.message}`, CLOSE_CODE_PROTOCOL_ERROR);
  }

  private failAuth(generation: number, error: AuthError): void {
    if (generation !== this.generation) return;
    this.logger.error({ message: error.message }, "tunnel_auth_rejected");
    this.stopped = true;
    const socket = this.socket;
    this.teardown("authentication rejected");
    try {
      socket?.close(1000, "authentication rejected");
    } catch (closeError) {
      this.logger.debug({ err: closeError }, "tunnel_socket_close_failed");
    }
    for (const listener of this.listeners.fatal) {
      this.notify("fatal", () => listener(error));
    }
    this.rejectStart(error);
  }

  /** Tears the socket down now and reconnects; the socket's own close event is ignored. */
  private dropConnection(generation: number, reason: string, code?: number): void {
    if (generation !== this.generation) return;
    const socket = this.socket;
    this.handleDisconnect(generation, reason);
    try {
      if (code !== undefined) {
        socket?.close(code, reason);
      } else {
        socket?.terminate();
      }
    } catch (error) {
      this.logger.debug({ err: error }, "tunnel_socket_close_failed");
    }
  }

  private handleDisconnect(generation: number, reason: string): void {
    if (generation !== this.generation) return;
    this.teardown(reason);
    this.scheduleReconnect();
  }

  /** Clears per-connection state and moves to disconnected. */
  private teardown(reason: string): void {
    this.generation += 1;
    const wasLive =
      this.currentState === "authenticated" ||
      this.currentState === "active" ||
      this.currentState === "draining";
    this.socket = null;
    this.clearConnectionTimers();
    const pending = this.writeQueue;
    this.writeQueue = [];
    for (const write of pending) {
      write.reject(new TransportError(`Connection lost: ${reason}`));
    }
    if (!this.writing) {
      this.releaseFlushWaiters();
    }
    this.setState("disconnected");
    if (wasLive) {
      for (const listener of this.listeners.connection_lost) {
        this.notify("connection_lost", () => listener(reason));
      }
    }
  }

  private scheduleReconnect(): void {
    if (this.stopped || this.reconnectTimer) return;
    const delayMs = computeReconnectDelay(this.attempt, this.policy, this.options.random);
    this.attempt += 1;
    this.logger.info({ attempt: this.attempt, delayMs }, "tunnel_reconnect_scheduled");
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delayMs);
  }

  private clearConnectionTimers(): void {
    if (this.helloTimer) {
      clearTimeout(this.helloTimer);
      this.helloTimer = null;
    }
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    if (this.stableTimer) {
      clearTimeout(this.stableTimer);
      this.stableTimer = null;
    }
  }

  private enqueue(data: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.writeQueue.push({ data, resolve, reject });
      void this.pump();
    });
  }

  private async pump(): Promise<void> {
    if (this.writing) return;
    this.writing = true;
    try {
      let next = this.writeQueue.shift();
      while (next) {
        const socket = this.socket;
        if (!socket || !socket.isOpen) {
          next.reject(new TransportError("Socket is not open"));
        } else {
          try {
            await socket.send(next.data);
            next.resolve();
          } catch (error) {
            next.reject(new TransportError("Socket write failed", { cause: error }));
          }
        }
        next = this.writeQueue.shift();
      }
    } finally {
      this.writing = false;
      this.releaseFlushWaiters();
    }
  }

  private releaseFlushWaiters(): void {
    const waiters = this.flushWaiters;
    this.flushWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private setState(next: ConnectionState): void {
    const previous = this.currentState;
    if (previous === next) return;
    this.currentState = next;
    for (const listener of this.listeners.state) {
      this.notify("state", () => listener(next, previous));
    }
  }

  private notify(event: keyof ConnectionEvents, invoke: () => void): void {
    try {
      invoke();
    } catch (error) {
      this.logger.error({ err: error, event }, "connection_listener_failed");
    }
  }

  private resolveStart(): void {
    this.startResolve?.();
    this.startResolve = null;
    this.startReject = null;
  }

  private rejectStart(error: Error): void {
    this.startReject?.(error);
    this.startResolve = null;
    this.startReject = null;
  }
}
