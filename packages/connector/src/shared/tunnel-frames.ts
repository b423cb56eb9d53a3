import { z } from "zod";

const FRAME_MAGIC_1 = 0x54; // 'T'
const FRAME_MAGIC_2 = 0x4e; // 'N'
const FRAME_VERSION = 1;
const HEADER_SIZE = 22;
const UINT16_MAX = 0xffff;
const UINT32_MAX = 0xffffffff;
const FLAG_FINAL = 0x01;

export const DEFAULT_MAX_PAYLOAD_BYTES = 16 * 1024 * 1024;

export const TunnelFrameConstants = {
  magic1: FRAME_MAGIC_1,
  magic2: FRAME_MAGIC_2,
  version: FRAME_VERSION,
  headerSize: HEADER_SIZE,
} as const;

export type TunnelHeaders = Record<string, string>;

export type HelloFrame = {
  readonly type: "hello";
  readonly token: string;
  readonly agent?: string;
  readonly version?: string;
};

export type HelloAckFrame = {
  readonly type: "hello_ack";
  readonly accepted: boolean;
  readonly message?: string;
  // Set by the broker when a rejection may succeed on a later attempt.
  readonly transient?: boolean;
};

export type RegisterFrame = {
  readonly type: "register";
  readonly models: readonly string[];
  readonly maxConcurrentSessions?: number;
};

export type RequestOpenFrame = {
  readonly type: "request_open";
  readonly sessionId: string;
  readonly method: string;
  readonly path: string;
  readonly headers: Readonly<TunnelHeaders>;
  readonly bodyComplete: boolean;
  readonly body: Uint8Array;
};

export type RequestChunkFrame = {
  readonly type: "request_chunk";
  readonly sessionId: string;
  readonly seq: number;
  readonly data: Uint8Array;
  readonly final: boolean;
};

export type ResponseChunkFrame = {
  readonly type: "response_chunk";
  readonly sessionId: string;
  readonly seq: number;
  readonly status?: number;
  readonly headers?: Readonly<TunnelHeaders>;
  readonly data: Uint8Array;
  readonly final: boolean;
};

export type CancelFrame = {
  readonly type: "cancel";
  readonly sessionId: string;
  readonly reason?: string;
};

export type ErrorFrame = {
  readonly type: "error";
  readonly sessionId?: string;
  readonly code: string;
  readonly message: string;
  /** Set for backend failures; tells the broker whether the request may be retried elsewhere. */
  readonly retryable?: boolean;
};

export type PingFrame = { readonly type: "ping"; readonly ts: number };
export type PongFrame = { readonly type: "pong"; readonly ts: number };

export type TunnelFrame =
  | HelloFrame
  | HelloAckFrame
  | RegisterFrame
  | RequestOpenFrame
  | RequestChunkFrame
  | ResponseChunkFrame
  | CancelFrame
  | ErrorFrame
  | PingFrame
  | PongFrame;

export type TunnelFrameType = TunnelFrame["type"];

export const TUNNEL_FRAME_TYPE_CODES = {
  hello: 1,
  hello_ack: 2,
  register: 3,
  request_open: 4,
  request_chunk: 5,
  response_chunk: 6,
  cancel: 7,
  error: 8,
  ping: 9,
  pong: 10,
} as const satisfies Record<TunnelFrameType, number>;

const FRAME_TYPES: readonly TunnelFrameType[] = [
  "hello",
  "hello_ack",
  "register",
  "request_open",
  "request_chunk",
  "response_chunk",
  "cancel",
  "error",
  "ping",
  "pong",
];

const FRAME_TYPES_BY_CODE = new Map<number, TunnelFrameType>(
  FRAME_TYPES.map((type) => [TUNNEL_FRAME_TYPE_CODES[type], type])
);

export type TunnelDecodeErrorKind = "malformed" | "unknown_type" | "payload_too_large";

export type TunnelDecodeError = {
  kind: TunnelDecodeErrorKind;
  message: string;
  sessionId?: string;
  typeCode?: number;
};

export type TunnelDecodeResult =
  | { ok: true; frame: TunnelFrame }
  | { ok: false; error: TunnelDecodeError };

export type DecodeTunnelFrameOptions = {
  maxPayloadBytes?: number;
};

const HeadersSchema = z.record(z.string());

const HelloMetaSchema = z
  .object({
    token: z.string(),
    agent: z.string().optional(),
    version: z.string().optional(),
  })
  .strict();

const HelloAckMetaSchema = z
  .object({
    accepted: z.boolean(),
    message: z.string().optional(),
    transient: z.boolean().optional(),
  })
  .strict();

const RegisterMetaSchema = z
  .object({
    models: z.array(z.string()),
    maxConcurrentSessions: z.number().int().positive().optional(),
  })
  .strict();

const RequestOpenMetaSchema = z
  .object({
    method: z.string().min(1),
    path: z.string().startsWith("/"),
    headers: HeadersSchema,
    bodyComplete: z.boolean(),
  })
  .strict();

const ResponseChunkMetaSchema = z
  .object({
    status: z.number().int().min(100).max(599).optional(),
    headers: HeadersSchema.optional(),
  })
  .strict();

const CancelMetaSchema = z.object({ reason: z.string().optional() }).strict();

const ErrorMetaSchema = z
  .object({
    code: z.string().min(1),
    message: z.string(),
    retryable: z.boolean().optional(),
  })
  .strict();

const TimestampMetaSchema = z.object({ ts: z.number() }).strict();

type FrameLayout = {
  sessionId: "required" | "optional" | "none";
  payload: boolean;
};

const FRAME_LAYOUTS: Record<TunnelFrameType, FrameLayout> = {
  hello: { sessionId: "none", payload: false },
  hello_ack: { sessionId: "none", payload: false },
  register: { sessionId: "none", payload: false },
  request_open: { sessionId: "required", payload: true },
  request_chunk: { sessionId: "required", payload: true },
  response_chunk: { sessionId: "required", payload: true },
  cancel: { sessionId: "required", payload: false },
  error: { sessionId: "optional", payload: false },
  ping: { sessionId: "none", payload: false },
  pong: { sessionId: "none", payload: false },
};

const textEncoder = new TextEncoder();
const strictTextDecoder = new TextDecoder("utf-8", { fatal: true });
const EMPTY = new Uint8Array(0);

export function asUint8Array(data: unknown): Uint8Array | null {
  if (data instanceof Uint8Array) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  if (ArrayBuffer.isView(data)) {
    return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
  }
  // ws delivers fragmented messages as Buffer[]
  if (Array.isArray(data) && data.every((part) => Buffer.isBuffer(part))) {
    return Buffer.concat(data);
  }
  return null;
}

function frameSessionId(frame: TunnelFrame): string | undefined {
  return "sessionId" in frame ? frame.sessionId : undefined;
}

function frameMetadata(frame: TunnelFrame): Record<string, unknown> | null {
  switch (frame.type) {
    case "hello":
      return { token: frame.token, agent: frame.agent, version: frame.version };
    case "hello_ack":
      return { accepted: frame.accepted, message: frame.message, transient: frame.transient };
    case "register":
      return { models: frame.models, maxConcurrentSessions: frame.maxConcurrentSessions };
    case "request_open":
      return {
        method: frame.method,
        path: frame.path,
        headers: frame.headers,
        bodyComplete: frame.bodyComplete,
      };
    case "request_chunk":
      return null;
    case "response_chunk":
      if (frame.status === undefined && frame.headers === undefined) {
        return null;
      }
      return { status: frame.status, headers: frame.headers };
    case "cancel":
      return frame.reason === undefined ? null : { reason: frame.reason };
    case "error":
      return {
        code: frame.code,
        message: frame.message,
        ...(frame.retryable !== undefined ? { retryable: frame.retryable } : {}),
      };
    case "ping":
    case "pong":
      return { ts: frame.ts };
  }
}

function framePayload(frame: TunnelFrame): Uint8Array {
  switch (frame.type) {
    case "request_open":
      return frame.body;
    case "request_chunk":
    case "response_chunk":
      return frame.data;
    default:
      return EMPTY;
  }
}

function frameSeq(frame: TunnelFrame): number {
  return frame.type === "request_chunk" || frame.type === "response_chunk" ? frame.seq : 0;
}

function frameFinal(frame: TunnelFrame): boolean {
  return frame.type === "request_chunk" || frame.type === "response_chunk" ? frame.final : false;
}

export function encodeTunnelFrame(frame: TunnelFrame): Uint8Array {
  const seq = frameSeq(frame);
  if (!Number.isInteger(seq) || seq < 0 || seq > UINT32_MAX) {
    throw new Error(`Invalid seq: ${seq}`);
  }

  const sessionId = frameSessionId(frame);
  const sessionBytes = sessionId === undefined ? EMPTY : textEncoder.encode(sessionId);
  if (sessionBytes.byteLength > UINT16_MAX) {
    throw new Error(`Session id too long: ${sessionBytes.byteLength} bytes`);
  }
  if (FRAME_LAYOUTS[frame.type].sessionId === "required" && sessionBytes.byteLength === 0) {
    throw new Error(`Frame ${frame.type} requires a session id`);
  }

  // JSON.stringify drops undefined members, so optional fields stay absent on decode.
  const metadata = frameMetadata(frame);
  const metaBytes = metadata === null ? EMPTY : textEncoder.encode(JSON.stringify(metadata));
  const payload = framePayload(frame);

  const out = new Uint8Array(
    HEADER_SIZE + sessionBytes.byteLength + metaBytes.byteLength + payload.byteLength
  );
  const view = new DataView(out.buffer, out.byteOffset, out.byteLength);

  view.setUint8(0, FRAME_MAGIC_1);
  view.setUint8(1, FRAME_MAGIC_2);
  view.setUint8(2, FRAME_VERSION);
  view.setUint8(3, TUNNEL_FRAME_TYPE_CODES[frame.type]);
  view.setUint8(4, frameFinal(frame) ? FLAG_FINAL : 0);
  view.setUint8(5, 0);
  view.setUint8(6, 0);
  view.setUint8(7, 0);
  view.setUint32(8, seq >>> 0);
  view.setUint16(12, sessionBytes.byteLength);
  view.setUint32(14, metaBytes.byteLength);
  view.setUint32(18, payload.byteLength);

  let cursor = HEADER_SIZE;
  out.set(sessionBytes, cursor);
  cursor += sessionBytes.byteLength;
  out.set(metaBytes, cursor);
  cursor += metaBytes.byteLength;
  out.set(payload, cursor);
  return out;
}

function fail(
  kind: TunnelDecodeErrorKind,
  message: string,
  extra: { sessionId?: string; typeCode?: number } = {}
): TunnelDecodeResult {
  const error: TunnelDecodeError = { kind, message };
  if (extra.sessionId) error.sessionId = extra.sessionId;
  if (extra.typeCode !== undefined) error.typeCode = extra.typeCode;
  return { ok: false, error };
}

function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return strictTextDecoder.decode(bytes);
  } catch {
    return null;
  }
}

export function decodeTunnelFrame(
  data: Uint8Array,
  options: DecodeTunnelFrameOptions = {}
): TunnelDecodeResult {
  const maxPayloadBytes = options.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES;

  if (data.byteLength < HEADER_SIZE) {
    return fail("malformed", `Frame shorter than header (${data.byteLength} bytes)`);
  }
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  if (view.getUint8(0) !== FRAME_MAGIC_1 || view.getUint8(1) !== FRAME_MAGIC_2) {
    return fail("malformed", "Bad frame magic");
  }
  if (view.getUint8(2) !== FRAME_VERSION) {
    return fail("malformed", `Unsupported frame version ${view.getUint8(2)}`);
  }

  const typeCode = view.getUint8(3);
  const flags = view.getUint8(4);
  const seq = view.getUint32(8);
  const sessionLength = view.getUint16(12);
  const metaLength = view.getUint32(14);
  const payloadLength = view.getUint32(18);

  const sessionEnd = HEADER_SIZE + sessionLength;
  let sessionId: string | undefined;
  if (sessionLength > 0 && sessionEnd <= data.byteLength) {
    const decoded = decodeUtf8(data.subarray(HEADER_SIZE, sessionEnd));
    if (decoded === null) {
      return fail("malformed", "Session id is not valid UTF-8");
    }
    sessionId = decoded;
  }

  if (payloadLength > maxPayloadBytes) {
    return fail(
      "payload_too_large",
      `Payload of ${payloadLength} bytes exceeds limit of ${maxPayloadBytes}`,
      { sessionId, typeCode }
    );
  }

  const metaEnd = sessionEnd + metaLength;
  if (metaEnd + payloadLength !== data.byteLength) {
    return fail("malformed", "Frame length does not match header", { sessionId, typeCode });
  }

  const type = FRAME_TYPES_BY_CODE.get(typeCode);
  if (!type) {
    return fail("unknown_type", `Unknown frame type ${typeCode}`, { sessionId, typeCode });
  }

  const layout = FRAME_LAYOUTS[type];
  if (layout.sessionId === "required" && sessionId === undefined) {
    return fail("malformed", `Frame ${type} is missing its session id`, { typeCode });
  }
  if (layout.sessionId === "none" && sessionId !== undefined) {
    return fail("malformed", `Frame ${type} must not carry a session id`, { sessionId, typeCode });
  }
  if (!layout.payload && payloadLength > 0) {
    return fail("malformed", `Frame ${type} must not carry a payload`, { sessionId, typeCode });
  }

  let metadata: unknown = {};
  if (metaLength > 0) {
    const text = decodeUtf8(data.subarray(sessionEnd, metaEnd));
    if (text === null) {
      return fail("malformed", "Metadata is not valid UTF-8", { sessionId, typeCode });
    }
    try {
      metadata = JSON.parse(text);
    } catch {
      return fail("malformed", "Metadata is not valid JSON", { sessionId, typeCode });
    }
  }

  // Copy so the frame does not pin the (possibly pooled) socket buffer.
  const payload = new Uint8Array(data.subarray(metaEnd));
  const final = (flags & FLAG_FINAL) !== 0;
  const frame = buildFrame(type, { sessionId, seq, final, metadata, payload });
  if (!frame) {
    return fail("malformed", `Invalid metadata for ${type} frame`, { sessionId, typeCode });
  }
  return { ok: true, frame: Object.freeze(frame) };
}

type FrameParts = {
  sessionId: string | undefined;
  seq: number;
  final: boolean;
  metadata: unknown;
  payload: Uint8Array;
};

function buildFrame(type: TunnelFrameType, parts: FrameParts): TunnelFrame | null {
  const { sessionId, seq, final, metadata, payload } = parts;
  switch (type) {
    case "hello": {
      const meta = HelloMetaSchema.safeParse(metadata);
      return meta.success ? { type, ...meta.data } : null;
    }
    case "hello_ack": {
      const meta = HelloAckMetaSchema.safeParse(metadata);
      return meta.success ? { type, ...meta.data } : null;
    }
    case "register": {
      const meta = RegisterMetaSchema.safeParse(metadata);
      return meta.success ? { type, ...meta.data } : null;
    }
    case "request_open": {
      const meta = RequestOpenMetaSchema.safeParse(metadata);
      if (!meta.success || sessionId === undefined) return null;
      return { type, sessionId, ...meta.data, body: payload };
    }
    case "request_chunk": {
      if (sessionId === undefined) return null;
      return { type, sessionId, seq, data: payload, final };
    }
    case "response_chunk": {
      const meta = ResponseChunkMetaSchema.safeParse(metadata);
      if (!meta.success || sessionId === undefined) return null;
      return { type, sessionId, seq, ...meta.data, data: payload, final };
    }
    case "cancel": {
      const meta = CancelMetaSchema.safeParse(metadata);
      if (!meta.success || sessionId === undefined) return null;
      return { type, sessionId, ...meta.data };
    }
    case "error": {
      const meta = ErrorMetaSchema.safeParse(metadata);
      if (!meta.success) return null;
      return sessionId === undefined ? { type, ...meta.data } : { type, sessionId, ...meta.data };
    }
    case "ping":
    case "pong": {
      const meta = TimestampMetaSchema.safeParse(metadata);
      return meta.success ? { type, ts: meta.data.ts } : null;
    }
  }
}

export function describeFrame(frame: TunnelFrame): Record<string, unknown> {
  const summary: Record<string, unknown> = { type: frame.type };
  const sessionId = frameSessionId(frame);
  if (sessionId !== undefined) summary.sessionId = sessionId;
  if (frame.type === "request_chunk" || frame.type === "response_chunk") {
    summary.seq = frame.seq;
    summary.bytes = frame.data.byteLength;
    summary.final = frame.final;
  }
  return summary;
}
