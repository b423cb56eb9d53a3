import WebSocket from "ws";
import { asUint8Array } from "../shared/tunnel-frames.js";

export type TunnelSocketHandlers = {
  onOpen: () => void;
  onMessage: (data: Uint8Array, isBinary: boolean) => void;
  onClose: (code: number, reason: string) => void;
  onError: (error: Error) => void;
};

export type TunnelSocketOptions = {
  headers: Record<string, string>;
  maxPayloadBytes: number;
  handshakeTimeoutMs: number;
};

/** The slice of a WebSocket the connection manager relies on. */
export type TunnelSocket = {
  readonly isOpen: boolean;
  send: (data: Uint8Array) => Promise<void>;
  close: (code?: number, reason?: string) => void;
  terminate: () => void;
};

/** Close code reported when the broker refuses the connector's credentials. */
export const CLOSE_CODE_UNAUTHORIZED = 4001;

const AUTH_REJECTION_STATUSES: ReadonlySet<number> = new Set([401, 403]);

export type TunnelSocketFactory = (
  url: string,
  options: TunnelSocketOptions,
  handlers: TunnelSocketHandlers
) => TunnelSocket;

export const createWsTunnelSocket: TunnelSocketFactory = (url, options, handlers) => {
  const socket = new WebSocket(url, {
    headers: options.headers,
    handshakeTimeout: options.handshakeTimeoutMs,
    maxPayload: options.maxPayloadBytes,
    perMessageDeflate: false,
  });

  // A non-101 answer to the upgrade is reported as a close once ws tears the
  // handshake down; 401 and 403 surface as an auth close so they are not retried.
  let rejectedStatus: number | null = null;
  socket.on("unexpected-response", (_request, response) => {
    rejectedStatus = response.statusCode ?? 0;
    response.resume();
    socket.terminate();
  });

  socket.on("open", () => handlers.onOpen());
  socket.on("message", (data, isBinary) => {
    const bytes = asUint8Array(data);
    if (bytes) {
      handlers.onMessage(bytes, isBinary);
    }
  });
  socket.on("close", (code, reason) => {
    if (rejectedStatus === null) {
      handlers.onClose(code, reason.toString("utf8"));
      return;
    }
    const message = `Broker refused the upgrade with HTTP ${rejectedStatus}`;
    handlers.onClose(AUTH_REJECTION_STATUSES.has(rejectedStatus) ? CLOSE_CODE_UNAUTHORIZED : code, message);
  });
  socket.on("error", (error) => {
    if (rejectedStatus === null) {
      handlers.onError(error);
    }
  });

  return {
    get isOpen() {
      return socket.readyState === WebSocket.OPEN;
    },
    send: (data) =>
      new Promise<void>((resolve, reject) => {
        socket.send(data, { binary: true }, (error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      }),
    close: (code, reason) => socket.close(code, reason),
    terminate: () => socket.terminate(),
  };
};
