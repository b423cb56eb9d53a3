export type TunnelErrorCode =
  | "transport_error"
  | "protocol_error"
  | "auth_rejected"
  | "backend_unavailable"
  | "timeout"
  | "overloaded"
  | "cancelled"
  | "duplicate_session"
  | "payload_too_large"
  | "sequence_error"
  | "unknown_session"
  | "draining"
  | "internal";

export class TunnelError extends Error {
  readonly code: TunnelErrorCode;

  constructor(code: TunnelErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TunnelError";
    this.code = code;
  }
}

/** Socket-level failure. The connection manager reconnects. */
export class TransportError extends TunnelError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transport_error", message, options);
    this.name = "TransportError";
  }
}

/** Malformed or out-of-order traffic. Fatal to the current connection. */
export class ProtocolError extends TunnelError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("protocol_error", message, options);
    this.name = "ProtocolError";
  }
}

export class AuthError extends TunnelError {
  readonly transient: boolean;

  constructor(message: string, transient: boolean) {
    super("auth_rejected", message);
    this.name = "AuthError";
    this.transient = transient;
  }
}

export type BackendErrorKind =
  | "connection_refused"
  | "timeout"
  | "overloaded"
  | "cancelled"
  | "network";

const BACKEND_ERROR_CODES: Record<BackendErrorKind, TunnelErrorCode> = {
  connection_refused: "backend_unavailable",
  timeout: "timeout",
  overloaded: "overloaded",
  cancelled: "cancelled",
  network: "backend_unavailable",
};

export class BackendError extends TunnelError {
  readonly kind: BackendErrorKind;
  readonly retryable: boolean;

  constructor(kind: BackendErrorKind, message: string, options?: { cause?: unknown }) {
    super(BACKEND_ERROR_CODES[kind], message, options);
    this.name = "BackendError";
    this.kind = kind;
    this.retryable = kind === "connection_refused" || kind === "overloaded";
  }
}

export type SessionErrorCode = Extract<
  TunnelErrorCode,
  | "timeout"
  | "cancelled"
  | "duplicate_session"
  | "payload_too_large"
  | "sequence_error"
  | "unknown_session"
  | "draining"
>;

/** Scoped to a single session; never affects its siblings. */
export class SessionError extends TunnelError {
  readonly sessionId: string;

  constructor(code: SessionErrorCode, sessionId: string, message: string) {
    super(code, message);
    this.name = "SessionError";
    this.sessionId = sessionId;
  }
}

export function toTunnelError(error: unknown): TunnelError {
  if (error instanceof TunnelError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TunnelError("internal", message, { cause: error });
}
