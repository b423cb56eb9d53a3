export { createTunnelBridge, CONNECTOR_AGENT, CONNECTOR_VERSION, type TunnelBridge, type TunnelBridgeDeps } from "./server/bridge.js";
export {
  loadConnectorConfig,
  loadBackendConfig,
  ConfigError,
  type ConnectorConfig,
  type BackendConfig,
  type ConnectorConfigOverrides,
} from "./server/config.js";
export { createRootLogger, resolveLogConfig, type LogLevel, type LogFormat } from "./server/logger.js";
export { ConnectionManager, type ConnectionState, type ConnectionManagerOptions } from "./server/connection-manager.js";
export { SessionMultiplexer, type SessionState, type SessionSnapshot, type DrainResult } from "./server/session-multiplexer.js";
export { LocalApiClient, type LocalApiRequest, type ResponseHandle } from "./server/local-api-client.js";
export { computeReconnectDelay, DEFAULT_RECONNECT_POLICY, type ReconnectPolicy } from "./server/backoff.js";
export {
  TunnelError,
  TransportError,
  ProtocolError,
  AuthError,
  BackendError,
  SessionError,
  type TunnelErrorCode,
} from "./server/errors.js";

// Wire format
export {
  encodeTunnelFrame,
  decodeTunnelFrame,
  TUNNEL_FRAME_TYPE_CODES,
  type TunnelFrame,
  type TunnelFrameType,
  type TunnelDecodeError,
  type TunnelDecodeResult,
} from "./shared/tunnel-frames.js";
