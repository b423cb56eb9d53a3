import type pino from "pino";
import type { TunnelFrame } from "../shared/tunnel-frames.js";
import type { ConnectorConfig } from "./config.js";
import {
  ConnectionManager,
  type ConnectionManagerOptions,
  type SessionDecodeError,
} from "./connection-manager.js";
import { SessionError, toTunnelError, type TunnelErrorCode } from "./errors.js";
import { LocalApiClient } from "./local-api-client.js";
import { SessionMultiplexer, type DrainResult } from "./session-multiplexer.js";
import type { TunnelSocketFactory } from "./tunnel-socket.js";

export const CONNECTOR_AGENT = "inference-tunnel-connector";
export const CONNECTOR_VERSION = "0.1.0";

export type TunnelBridgeDeps = {
  logger: pino.Logger;
  fetchImpl?: typeof fetch;
  socketFactory?: TunnelSocketFactory;
  random?: () => number;
  timing?: Pick<
    ConnectionManagerOptions,
    "helloTimeoutMs" | "handshakeTimeoutMs" | "pingIntervalMs" | "pongTimeoutMs"
  >;
};

export type TunnelBridge = {
  connection: ConnectionManager;
  sessions: SessionMultiplexer;
  client: LocalApiClient;
  /** Probes the backend, resolves models, then connects. Resolves once active. */
  start: () => Promise<void>;
  /** Drains sessions, closes the tunnel and the backend client. Safe to call twice. */
  stop: () => Promise<DrainResult>;
};

export function createTunnelBridge(config: ConnectorConfig, deps: TunnelBridgeDeps): TunnelBridge {
  const logger = deps.logger.child({ module: "bridge" });
  let models: string[] = [];

  const client = new LocalApiClient({
    baseUrl: config.backendUrl,
    apiKey: config.backendApiKey,
    requestTimeoutMs: config.requestTimeoutMs,
    maxConcurrentRequests: config.maxConcurrentSessions,
    maxQueuedRequests: config.maxQueuedSessions,
    fetchImpl: deps.fetchImpl,
    logger: deps.logger,
  });

  const connection = new ConnectionManager({
    url: config.brokerUrl,
    token: config.token,
    agent: CONNECTOR_AGENT,
    version: CONNECTOR_VERSION,
    logger: deps.logger,
    maxPayloadBytes: config.maxPayloadBytes,
    reconnect: config.reconnect,
    random: deps.random,
    socketFactory: deps.socketFactory,
    ...deps.timing,
    // Sent on every (re)connect, before the broker may route sessions to us.
    onAuthenticated: async () => {
      await connection.send({
        type: "register",
        models,
        maxConcurrentSessions: config.maxConcurrentSessions,
      });
      logger.info({ models, maxConcurrentSessions: config.maxConcurrentSessions }, "models_registered");
    },
  });

  const sessions = new SessionMultiplexer({
    backend: client,
    send: (frame) => connection.send(frame),
    logger: deps.logger,
    maxRequestBytes: config.maxPayloadBytes,
    sessionTimeoutMs: config.requestTimeoutMs,
  });

  const sendSessionError = (sessionId: string, code: TunnelErrorCode, message: string): void => {
    void connection.send({ type: "error", sessionId, code, message }).catch((error: unknown) => {
      logger.debug({ err: error, sessionId, code }, "session_error_frame_not_sent");
    });
  };

  const reportSessionError = (sessionId: string, error: unknown): void => {
    if (error instanceof SessionError) {
      logger.warn({ sessionId, code: error.code, message: error.message }, "session_rejected");
      sendSessionError(error.sessionId, error.code, error.message);
      return;
    }
    const tunnelError = toTunnelError(error);
    logger.error({ err: error, sessionId }, "session_dispatch_failed");
    sendSessionError(sessionId, tunnelError.code, tunnelError.message);
  };

  const handleFrame = (frame: TunnelFrame): void => {
    switch (frame.type) {
      case "request_open": {
        if (connection.state === "draining" || !sessions.isAccepting) {
          sendSessionError(frame.sessionId, "draining", "Connector is draining; not accepting new sessions");
          return;
        }
        try {
          sessions.open(frame.sessionId, {
            method: frame.method,
            path: frame.path,
            headers: frame.headers,
            bodyComplete: frame.bodyComplete,
            body: frame.body,
          });
        } catch (error) {
          reportSessionError(frame.sessionId, error);
        }
        return;
      }
      case "request_chunk": {
        try {
          sessions.feedInboundChunk(frame.sessionId, frame.seq, frame.data, frame.final);
        } catch (error) {
          reportSessionError(frame.sessionId, error);
        }
        return;
      }
      case "cancel":
        sessions.cancel(frame.sessionId, frame.reason ?? "cancelled_by_broker");
        return;
      case "error":
        logger.warn(
          { sessionId: frame.sessionId, code: frame.code, message: frame.message },
          "broker_error_received"
        );
        if (frame.sessionId !== undefined) {
          sessions.cancel(frame.sessionId, "broker_error");
        }
        return;
      default:
        logger.debug({ type: frame.type }, "tunnel_frame_ignored");
    }
  };

  const handleSessionDecodeError = (error: SessionDecodeError): void => {
    logger.warn({ sessionId: error.sessionId, message: error.message }, "session_frame_too_large");
    if (!sessions.fail(error.sessionId, "payload_too_large", error.message)) {
      sendSessionError(error.sessionId, "payload_too_large", error.message);
    }
  };

  connection.on("frame", handleFrame);
  connection.on("session_decode_error", handleSessionDecodeError);
  connection.on("connection_lost", (reason) => {
    const cancelled = sessions.cancelAll("connection_lost", { notify: false });
    logger.warn({ reason, cancelled }, "tunnel_connection_lost");
  });
  connection.on("state", (state, previous) => {
    logger.debug({ state, previous }, "tunnel_state_changed");
  });
  connection.on("fatal", (error) => {
    logger.error({ message: error.message }, "tunnel_fatal");
  });

  const resolveModels = async (): Promise<string[]> => {
    try {
      const listed = await client.listModels();
      if (listed.length > 0) {
        return listed;
      }
    } catch (error) {
      logger.warn({ err: error }, "backend_model_listing_failed");
    }
    if (config.modelName) {
      return [config.modelName];
    }
    logger.warn({ backendUrl: config.backendUrl }, "no_models_to_register");
    return [];
  };

  const start = async (): Promise<void> => {
    const healthy = await client.checkHealth();
    if (healthy) {
      logger.info({ backendUrl: config.backendUrl }, "backend_healthy");
    } else {
      logger.warn({ backendUrl: config.backendUrl }, "backend_unhealthy_continuing");
    }
    models = await resolveModels();
    logger.info({ brokerUrl: config.brokerUrl, models }, "tunnel_bridge_starting");
    await connection.start();
  };

  let stopping: Promise<DrainResult> | null = null;
  const stop = (): Promise<DrainResult> => {
    if (stopping) {
      return stopping;
    }
    stopping = (async () => {
      logger.info({ sessions: sessions.activeCount, graceMs: config.drainGraceMs }, "tunnel_bridge_stopping");
      connection.beginDrain();
      const result = await sessions.drain(config.drainGraceMs);
      await connection.flush();
      connection.close(1000, "shutdown");
      client.close();
      logger.info(result, "tunnel_bridge_stopped");
      return result;
    })();
    return stopping;
  };

  return { connection, sessions, client, start, stop };
}
