import { decodeTunnelFrame, encodeTunnelFrame, type TunnelFrame } from "../shared/tunnel-frames.js";
import type {
  TunnelSocket,
  TunnelSocketFactory,
  TunnelSocketHandlers,
  TunnelSocketOptions,
} from "../server/tunnel-socket.js";

export class MockTunnelSocket implements TunnelSocket {
  isOpen = false;
  sent: Uint8Array[] = [];
  closeCalls: Array<{ code?: number; reason?: string }> = [];
  terminateCalls = 0;

  constructor(
    readonly url: string,
    readonly options: TunnelSocketOptions,
    private readonly handlers: TunnelSocketHandlers
  ) {}

  open(): void {
    this.isOpen = true;
    this.handlers.onOpen();
  }

  receive(frame: TunnelFrame): void {
    this.handlers.onMessage(encodeTunnelFrame(frame), true);
  }

  receiveRaw(data: Uint8Array): void {
    this.handlers.onMessage(data, true);
  }

  /** The broker side closing the socket. */
  remoteClose(code: number, reason = ""): void {
    this.isOpen = false;
    this.handlers.onClose(code, reason);
  }

  send(data: Uint8Array): Promise<void> {
    if (!this.isOpen) {
      return Promise.reject(new Error("socket not open"));
    }
    this.sent.push(data);
    return Promise.resolve();
  }

  close(code?: number, reason?: string): void {
    this.closeCalls.push({ code, reason });
    const wasOpen = this.isOpen;
    this.isOpen = false;
    if (wasOpen) {
      this.handlers.onClose(code ?? 1005, reason ?? "");
    }
  }

  terminate(): void {
    this.terminateCalls += 1;
    const wasOpen = this.isOpen;
    this.isOpen = false;
    if (wasOpen) {
      this.handlers.onClose(1006, "");
    }
  }

  sentFrames(): TunnelFrame[] {
    return this.sent.flatMap((data) => {
      const result = decodeTunnelFrame(data);
      return result.ok ? [result.frame] : [];
    });
  }

  sentTypes(): string[] {
    return this.sentFrames().map((frame) => frame.type);
  }
}

export function createMockSocketFactory() {
  const sockets: MockTunnelSocket[] = [];
  const factory: TunnelSocketFactory = (url, options, handlers) => {
    const socket = new MockTunnelSocket(url, options, handlers);
    sockets.push(socket);
    return socket;
  };
  return {
    factory,
    sockets,
    latest(): MockTunnelSocket {
      const socket = sockets.at(-1);
      if (!socket) {
        throw new Error("no socket created yet");
      }
      return socket;
    },
  };
}

/** Lets queued promise callbacks run without touching timers. */
export async function flushMicrotasks(rounds = 20): Promise<void> {
  for (let i = 0; i < rounds; i += 1) {
    await Promise.resolve();
  }
}
