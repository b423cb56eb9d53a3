import type pino from "pino";
import { z } from "zod";
import { ConcurrencyGate } from "./concurrency-gate.js";
import { BackendError, TunnelError } from "./errors.js";

export type LocalApiRequest = {
  method: string;
  path: string;
  headers: Readonly<Record<string, string>>;
  body?: Uint8Array;
  signal?: AbortSignal;
};

export type ResponseHandle = {
  status: number;
  headers: Record<string, string>;
  /** True for `text/event-stream` responses, which are relayed chunk by chunk. */
  streaming: boolean;
  /** Backend answered 5xx. The response is still relayed verbatim. */
  upstreamError: boolean;
  /** Readable once. Non-streaming responses yield exactly one chunk. */
  body: AsyncIterable<Uint8Array>;
  /** Abandon the response and free its backend slot. Idempotent. */
  abort: () => void;
};

export type LocalApiClientOptions = {
  baseUrl: string;
  apiKey?: string;
  requestTimeoutMs: number;
  maxConcurrentRequests: number;
  maxQueuedRequests: number;
  probeTimeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger: pino.Logger;
};

const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

const REQUEST_HOP_HEADERS = new Set([
  "connection",
  "keep-alive",
  "transfer-encoding",
  "upgrade",
  "host",
  "content-length",
]);

const RESPONSE_HOP_HEADERS = new Set([
  "connection",
  "keep-alive",
  "transfer-encoding",
  "content-length",
]);

// Codings fetch decodes on read; the relayed body is already plain.
const DECODED_CONTENT_CODINGS = new Set(["gzip", "x-gzip", "deflate", "br"]);

const ModelListSchema = z.object({
  data: z.array(z.object({ id: z.string() }).passthrough()),
});

function errorCode(error: unknown): string | null {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current; depth += 1) {
    if (typeof current !== "object" || current === null) {
      return null;
    }
    if ("code" in current && typeof current.code === "string") {
      return current.code;
    }
    if ("errors" in current && Array.isArray(current.errors)) {
      for (const inner of current.errors) {
        const code = errorCode(inner);
        if (code) return code;
      }
    }
    current = "cause" in current ? current.cause : null;
  }
  return null;
}

/** True when fetch has undone every coding listed in a `content-encoding` value. */
export function isDecodedContentEncoding(value: string): boolean {
  const codings = value
    .split(",")
    .map((coding) => coding.trim().toLowerCase())
    .filter((coding) => coding.length > 0);
  return codings.length > 0 && codings.every((coding) => DECODED_CONTENT_CODINGS.has(coding));
}

export function isEventStream(contentType: string | null | undefined): boolean {
  return (contentType ?? "").toLowerCase().includes("text/event-stream");
}

function hasHeader(headers: Readonly<Record<string, string>>, name: string): boolean {
  return Object.keys(headers).some((key) => key.toLowerCase() === name);
}

export class LocalApiClient {
  private readonly logger: pino.Logger;
  private readonly gate: ConcurrencyGate;
  private readonly fetchImpl: typeof fetch;
  private readonly baseUrl: string;
  private readonly inFlight = new Set<AbortController>();

  constructor(private readonly options: LocalApiClientOptions) {
    this.logger = options.logger.child({ module: "local-api-client" });
    this.gate = new ConcurrencyGate({
      maxActive: options.maxConcurrentRequests,
      maxQueued: options.maxQueuedRequests,
    });
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  get activeCount(): number {
    return this.gate.activeCount;
  }

  get queuedCount(): number {
    return this.gate.queuedCount;
  }

  buildUrl(path: string): string {
    return `${this.baseUrl}${path.startsWith("/") ? path : `/${path}`}`;
  }

  async send(request: LocalApiRequest): Promise<ResponseHandle> {
    const release = await this.gate.acquire(request.signal);

    const controller = new AbortController();
    this.inFlight.add(controller);
    let timedOut = false;
    let finished = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.requestTimeoutMs);
    const onCallerAbort = () => controller.abort();
    request.signal?.addEventListener("abort", onCallerAbort, { once: true });
    if (request.signal?.aborted) {
      controller.abort();
    }

    const finish = () => {
      if (finished) return;
      finished = true;
      clearTimeout(timeout);
      request.signal?.removeEventListener("abort", onCallerAbort);
      this.inFlight.delete(controller);
      release();
    };

    const mapError = (error: unknown): TunnelError => {
      if (error instanceof TunnelError) {
        return error;
      }
      if (timedOut) {
        return new BackendError(
          "timeout",
          `Backend did not finish within ${this.options.requestTimeoutMs}ms`,
          { cause: error }
        );
      }
      if (controller.signal.aborted) {
        return new BackendError("cancelled", "Backend request cancelled", { cause: error });
      }
      if (errorCode(error) === "ECONNREFUSED") {
        return new BackendError("connection_refused", `Backend refused connection at ${this.baseUrl}`, {
          cause: error,
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      return new BackendError("network", `Backend request failed: ${message}`, { cause: error });
    };

    let response: Response;
    try {
      response = await this.fetchImpl(this.buildUrl(request.path), {
        method: request.method,
        headers: this.buildRequestHeaders(request.headers),
        body: this.requestBody(request),
        signal: controller.signal,
        redirect: "manual",
      });
    } catch (error) {
      finish();
      throw mapError(error);
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      const name = key.toLowerCase();
      if (RESPONSE_HOP_HEADERS.has(name)) return;
      if (name === "content-encoding" && isDecodedContentEncoding(value)) return;
      headers[key] = value;
    });
    const streaming = isEventStream(response.headers.get("content-type"));
    const upstreamError = response.status >= 500;
    if (upstreamError) {
      this.logger.warn(
        { method: request.method, path: request.path, status: response.status },
        "backend_upstream_error"
      );
    }

    const chunks = streaming
      ? readStream(response, controller, mapError, finish)
      : readBuffered(response, mapError, finish);

    let consumed = false;
    const body: AsyncIterable<Uint8Array> = {
      [Symbol.asyncIterator]: () => {
        if (consumed) {
          throw new Error("Response body has already been read");
        }
        consumed = true;
        return chunks[Symbol.asyncIterator]();
      },
    };

    return {
      status: response.status,
      headers,
      streaming,
      upstreamError,
      body,
      abort: () => {
        controller.abort();
        if (!consumed) {
          consumed = true;
          void response.body?.cancel().catch(() => undefined);
        }
        finish();
      },
    };
  }

  async checkHealth(): Promise<boolean> {
    try {
      const response = await this.probe("/health");
      return response.ok;
    } catch (error) {
      this.logger.debug({ err: error }, "backend_health_probe_failed");
      return false;
    }
  }

  async listModels(): Promise<string[]> {
    const response = await this.probe("/v1/models");
    if (!response.ok) {
      throw new BackendError("network", `Model listing failed with HTTP ${response.status}`);
    }
    const parsed = ModelListSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new BackendError("network", "Model listing returned an unexpected payload");
    }
    return parsed.data.data.map((model) => model.id);
  }

  close(): void {
    this.gate.close(new BackendError("cancelled", "Local API client closed"));
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }

  private async probe(path: string): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(
      () => controller.abort(),
      this.options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS
    );
    try {
      return await this.fetchImpl(this.buildUrl(path), {
        method: "GET",
        headers: this.buildRequestHeaders({}),
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private buildRequestHeaders(input: Readonly<Record<string, string>>): Record<string, string> {
    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(input)) {
      if (!REQUEST_HOP_HEADERS.has(key.toLowerCase())) {
        headers[key] = value;
      }
    }
    if (this.options.apiKey && !hasHeader(headers, "authorization")) {
      headers["Authorization"] = `Bearer ${this.options.apiKey}`;
    }
    return headers;
  }

  private requestBody(request: LocalApiRequest): Uint8Array | undefined {
    const method = request.method.toUpperCase();
    if (method === "GET" || method === "HEAD") {
      return undefined;
    }
    return request.body;
  }
}

async function* readBuffered(
  response: Response,
  mapError: (error: unknown) => TunnelError,
  finish: () => void
): AsyncGenerator<Uint8Array> {
  try {
    let data: Uint8Array;
    try {
      data = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw mapError(error);
    }
    yield data;
  } finally {
    finish();
  }
}

async function* readStream(
  response: Response,
  controller: AbortController,
  mapError: (error: unknown) => TunnelError,
  finish: () => void
): AsyncGenerator<Uint8Array> {
  const reader = response.body?.getReader();
  if (!reader) {
    finish();
    return;
  }
  let done = false;
  try {
    while (true) {
      const result = await reader.read().catch((error: unknown) => {
        throw mapError(error);
      });
      if (result.done) {
        done = true;
        return;
      }
      if (result.value.byteLength > 0) {
        yield result.value;
      }
    }
  } finally {
    if (!done) {
      controller.abort();
      await reader.cancel().catch(() => undefined);
    }
    finish();
  }
}
