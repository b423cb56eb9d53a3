import type pino from "pino";
import type { TunnelFrame, TunnelHeaders } from "../shared/tunnel-frames.js";
import {
  BackendError,
  SessionError,
  TransportError,
  toTunnelError,
  type TunnelErrorCode,
} from "./errors.js";
import type { LocalApiRequest, ResponseHandle } from "./local-api-client.js";

export type SessionState =
  | "open"
  | "forwarding"
  | "streaming"
  | "completed"
  | "failed"
  | "cancelled";

const TERMINAL_STATES: ReadonlySet<SessionState> = new Set(["completed", "failed", "cancelled"]);

export function isTerminalSessionState(state: SessionState): boolean {
  return TERMINAL_STATES.has(state);
}

export type RequestMeta = {
  method: string;
  path: string;
  headers: Readonly<TunnelHeaders>;
  /** When false the body arrives through request chunks ending with `final`. */
  bodyComplete: boolean;
  body?: Uint8Array;
};

export type SessionSnapshot = {
  sessionId: string;
  state: SessionState;
  method: string;
  path: string;
  streaming: boolean;
  requestBytes: number;
  responseBytes: number;
  openedAt: number;
  endReason?: string;
};

export type SessionBackend = {
  send: (request: LocalApiRequest) => Promise<ResponseHandle>;
};

export type FrameSender = (frame: TunnelFrame) => Promise<void>;

export type SessionMultiplexerOptions = {
  backend: SessionBackend;
  send: FrameSender;
  logger: pino.Logger;
  maxRequestBytes: number;
  /** Whole-exchange deadline, from open until the final response frame. */
  sessionTimeoutMs: number;
  maxPendingChunks?: number;
  onSessionEnd?: (snapshot: SessionSnapshot) => void;
};

export type DrainResult = {
  completed: number;
  failed: number;
  cancelled: number;
};

const DEFAULT_MAX_PENDING_CHUNKS = 64;
const EMPTY = new Uint8Array(0);

type PendingChunk = { data: Uint8Array; final: boolean };

type TunnelSession = {
  id: string;
  meta: RequestMeta;
  state: SessionState;
  streaming: boolean;
  bodyChunks: Uint8Array[];
  requestBytes: number;
  nextInboundSeq: number;
  pending: Map<number, PendingChunk>;
  /** Bytes parked in `pending`; they count toward the request limit. */
  pendingBytes: number;
  nextOutboundSeq: number;
  responseBytes: number;
  openedAt: number;
  abort: AbortController;
  handle: ResponseHandle | null;
  timeout: ReturnType<typeof setTimeout> | null;
  endReason?: string;
  done: Promise<void>;
  resolveDone: () => void;
};

function concatChunks(chunks: Uint8Array[]): Uint8Array {
  if (chunks.length === 0) return EMPTY;
  if (chunks.length === 1) return chunks[0];
  return Buffer.concat(chunks);
}

/**
 * Maps broker sessions onto backend calls. Each session runs as its own async
 * task; a slow or failing session never holds up its siblings.
 */
export class SessionMultiplexer {
  private readonly sessions = new Map<string, TunnelSession>();
  private readonly logger: pino.Logger;
  private readonly maxPendingChunks: number;
  private accepting = true;

  constructor(private readonly options: SessionMultiplexerOptions) {
    this.logger = options.logger.child({ module: "session-multiplexer" });
    this.maxPendingChunks = options.maxPendingChunks ?? DEFAULT_MAX_PENDING_CHUNKS;
  }

  get activeCount(): number {
    return this.sessions.size;
  }

  get isAccepting(): boolean {
    return this.accepting;
  }

  getState(sessionId: string): SessionState | undefined {
    return this.sessions.get(sessionId)?.state;
  }

  snapshot(): SessionSnapshot[] {
    return Array.from(this.sessions.values(), (session) => this.toSnapshot(session));
  }

  open(sessionId: string, meta: RequestMeta): void {
    if (!this.accepting) {
      throw new SessionError("draining", sessionId, "Connector is draining; not accepting new sessions");
    }
    if (this.sessions.has(sessionId)) {
      throw new SessionError("duplicate_session", sessionId, `Session ${sessionId} is already open`);
    }

    let resolveDone: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      resolveDone = resolve;
    });
    const initialBody = meta.body ?? EMPTY;
    const session: TunnelSession = {
      id: sessionId,
      meta,
      state: "open",
      streaming: false,
      bodyChunks: initialBody.byteLength > 0 ? [initialBody] : [],
      requestBytes: initialBody.byteLength,
      nextInboundSeq: 0,
      pending: new Map(),
      pendingBytes: 0,
      nextOutboundSeq: 0,
      responseBytes: 0,
      openedAt: Date.now(),
      abort: new AbortController(),
      handle: null,
      timeout: null,
      done,
      resolveDone,
    };
    this.sessions.set(sessionId, session);
    session.timeout = setTimeout(() => {
      this.failSession(
        session,
        "timeout",
        `Session exceeded ${this.options.sessionTimeoutMs}ms deadline`
      );
    }, this.options.sessionTimeoutMs);

    this.logger.debug(
      { sessionId, method: meta.method, path: meta.path, bodyComplete: meta.bodyComplete },
      "session_opened"
    );

    if (session.requestBytes > this.options.maxRequestBytes) {
      this.failSession(session, "payload_too_large", "Request body exceeds size limit");
      return;
    }
    if (meta.bodyComplete) {
      this.dispatch(session);
    }
  }

  feedInboundChunk(sessionId: string, seq: number, data: Uint8Array, final: boolean): void {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionError("unknown_session", sessionId, `No open session ${sessionId}`);
    }
    if (session.state !== "open") {
      this.failSession(session, "sequence_error", `Request chunk ${seq} after request body was complete`);
      return;
    }
    if (seq < session.nextInboundSeq || session.pending.has(seq)) {
      this.failSession(session, "sequence_error", `Duplicate request chunk ${seq}`);
      return;
    }
    if (seq >= session.nextInboundSeq + this.maxPendingChunks) {
      this.failSession(
        session,
        "sequence_error",
        `Request chunk ${seq} is too far ahead of ${session.nextInboundSeq}`
      );
      return;
    }

    if (session.requestBytes + session.pendingBytes + data.byteLength > this.options.maxRequestBytes) {
      this.failSession(session, "payload_too_large", "Request body exceeds size limit");
      return;
    }

    session.pending.set(seq, { data, final });
    session.pendingBytes += data.byteLength;
    let finalReceived = false;
    let next = session.pending.get(session.nextInboundSeq);
    while (next) {
      session.pending.delete(session.nextInboundSeq);
      session.pendingBytes -= next.data.byteLength;
      session.nextInboundSeq += 1;
      if (next.data.byteLength > 0) {
        session.bodyChunks.push(next.data);
        session.requestBytes += next.data.byteLength;
      }
      if (next.final) {
        finalReceived = true;
        break;
      }
      next = session.pending.get(session.nextInboundSeq);
    }

    if (finalReceived) {
      if (session.pending.size > 0) {
        this.failSession(session, "sequence_error", "Request chunks received after the final chunk");
        return;
      }
      this.dispatch(session);
    }
  }

  /** Idempotent; unknown or already-terminated sessions are ignored. */
  cancel(sessionId: string, reason = "cancelled_by_broker"): void {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    this.cancelSession(session, reason, false);
  }

  /**
   * Cancels every live session. With `notify` an error frame is sent for each,
   * which only makes sense while the socket is still writable.
   */
  cancelAll(reason: string, options: { notify: boolean }): number {
    const live = Array.from(this.sessions.values());
    for (const session of live) {
      this.cancelSession(session, reason, options.notify);
    }
    if (live.length > 0) {
      this.logger.info({ reason, count: live.length }, "sessions_cancelled");
    }
    return live.length;
  }

  /** Fails a session from outside, e.g. for an oversized frame that referenced it. */
  fail(sessionId: string, code: TunnelErrorCode, message: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    this.failSession(session, code, message);
    return true;
  }

  /**
   * Stops accepting sessions, waits up to `graceMs` for live ones to finish,
   * then cancels the rest with an error frame.
   */
  async drain(graceMs: number): Promise<DrainResult> {
    this.accepting = false;
    const live = Array.from(this.sessions.values());
    if (live.length === 0) {
      return { completed: 0, failed: 0, cancelled: 0 };
    }

    this.logger.info({ sessions: live.length, graceMs }, "sessions_draining");
    let stopGraceTimer: () => void = () => undefined;
    const graceElapsed = new Promise<void>((resolve) => {
      const timer = setTimeout(resolve, graceMs);
      stopGraceTimer = () => clearTimeout(timer);
    });
    await Promise.race([Promise.all(live.map((session) => session.done)), graceElapsed]);
    stopGraceTimer();

    this.cancelAll("drain_deadline", { notify: true });
    const result: DrainResult = { completed: 0, failed: 0, cancelled: 0 };
    for (const session of live) {
      if (session.state === "completed") result.completed += 1;
      else if (session.state === "failed") result.failed += 1;
      else result.cancelled += 1;
    }
    return result;
  }

  private dispatch(session: TunnelSession): void {
    this.transition(session, "forwarding");
    void this.runSession(session).catch((error: unknown) => {
      this.logger.error({ err: error, sessionId: session.id }, "session_task_crashed");
      this.failSession(session, "internal", "Internal connector error");
    });
  }

  private async runSession(session: TunnelSession): Promise<void> {
    const body = concatChunks(session.bodyChunks);
    session.bodyChunks = [];

    let handle: ResponseHandle;
    try {
      handle = await this.options.backend.send({
        method: session.meta.method,
        path: session.meta.path,
        headers: session.meta.headers,
        body,
        signal: session.abort.signal,
      });
    } catch (error) {
      this.handleSessionError(session, error);
      return;
    }

    if (isTerminalSessionState(session.state)) {
      handle.abort();
      return;
    }
    session.handle = handle;
    session.streaming = handle.streaming;

    try {
      if (!handle.streaming) {
        const chunks: Uint8Array[] = [];
        for await (const chunk of handle.body) {
          chunks.push(chunk);
        }
        await this.emitResponseChunk(session, {
          status: handle.status,
          headers: handle.headers,
          data: concatChunks(chunks),
          final: true,
        });
        this.complete(session);
        return;
      }

      this.transition(session, "streaming");
      await this.emitResponseChunk(session, {
        status: handle.status,
        headers: handle.headers,
        data: EMPTY,
        final: false,
      });
      for await (const chunk of handle.body) {
        if (isTerminalSessionState(session.state)) break;
        await this.emitResponseChunk(session, { data: chunk, final: false });
      }
      await this.emitResponseChunk(session, { data: EMPTY, final: true });
      this.complete(session);
    } catch (error) {
      this.handleSessionError(session, error);
    }
  }

  private async emitResponseChunk(
    session: TunnelSession,
    chunk: { status?: number; headers?: TunnelHeaders; data: Uint8Array; final: boolean }
  ): Promise<void> {
    if (isTerminalSessionState(session.state)) return;
    const seq = session.nextOutboundSeq;
    session.nextOutboundSeq += 1;
    session.responseBytes += chunk.data.byteLength;
    await this.options.send({
      type: "response_chunk",
      sessionId: session.id,
      seq,
      ...(chunk.status !== undefined ? { status: chunk.status } : {}),
      ...(chunk.headers !== undefined ? { headers: chunk.headers } : {}),
      data: chunk.data,
      final: chunk.final,
    });
  }

  private handleSessionError(session: TunnelSession, error: unknown): void {
    if (isTerminalSessionState(session.state)) {
      return;
    }
    if (error instanceof TransportError) {
      this.cancelSession(session, "connection_lost", false);
      return;
    }
    const tunnelError = toTunnelError(error);
    this.failSession(
      session,
      tunnelError.code,
      tunnelError.message,
      tunnelError instanceof BackendError ? tunnelError.retryable : undefined
    );
  }

  private transition(session: TunnelSession, next: SessionState): void {
    if (isTerminalSessionState(session.state)) return;
    session.state = next;
  }

  private complete(session: TunnelSession): void {
    if (isTerminalSessionState(session.state)) return;
    session.state = "completed";
    session.endReason = "completed";
    this.logger.debug(
      {
        sessionId: session.id,
        streaming: session.streaming,
        responseBytes: session.responseBytes,
        durationMs: Date.now() - session.openedAt,
      },
      "session_completed"
    );
    this.finalize(session);
  }

  private failSession(
    session: TunnelSession,
    code: TunnelErrorCode,
    message: string,
    retryable?: boolean
  ): void {
    if (isTerminalSessionState(session.state)) return;
    session.state = "failed";
    session.endReason = code;
    this.logger.warn({ sessionId: session.id, code, message }, "session_failed");
    this.stopBackend(session);
    this.finalize(session);
    this.sendSessionError(session.id, code, message, retryable);
  }

  private cancelSession(session: TunnelSession, reason: string, notify: boolean): void {
    if (isTerminalSessionState(session.state)) return;
    session.state = "cancelled";
    session.endReason = reason;
    this.logger.debug({ sessionId: session.id, reason }, "session_cancelled");
    this.stopBackend(session);
    this.finalize(session);
    if (notify) {
      this.sendSessionError(session.id, "cancelled", `Session cancelled: ${reason}`);
    }
  }

  private stopBackend(session: TunnelSession): void {
    session.abort.abort();
    session.handle?.abort();
  }

  private sendSessionError(
    sessionId: string,
    code: TunnelErrorCode,
    message: string,
    retryable?: boolean
  ): void {
    void this.options
      .send({
        type: "error",
        sessionId,
        code,
        message,
        ...(retryable !== undefined ? { retryable } : {}),
      })
      .catch((error: unknown) => {
        this.logger.debug({ err: error, sessionId, code }, "session_error_frame_not_sent");
      });
  }

  private finalize(session: TunnelSession): void {
    if (session.timeout) {
      clearTimeout(session.timeout);
      session.timeout = null;
    }
    session.bodyChunks = [];
    session.pending.clear();
    session.pendingBytes = 0;
    if (this.sessions.get(session.id) === session) {
      this.sessions.delete(session.id);
    }
    session.resolveDone();
    this.options.onSessionEnd?.(this.toSnapshot(session));
  }

  private toSnapshot(session: TunnelSession): SessionSnapshot {
    const snapshot: SessionSnapshot = {
      sessionId: session.id,
      state: session.state,
      method: session.meta.method,
      path: session.meta.path,
      streaming: session.streaming,
      requestBytes: session.requestBytes,
      responseBytes: session.responseBytes,
      openedAt: session.openedAt,
    };
    if (session.endReason) snapshot.endReason = session.endReason;
    return snapshot;
  }
}
