import WebSocket from "ws";
import type { ServerMessage } from "./messages";
import { encodeServerMessage } from "./messages";
import { errorMessage } from "../utils/errors";
import { logger as rootLogger } from "../utils/logger";

const logger = rootLogger.child({ service: "ws-connection" });

export type IncomingFrame = { type: "text"; data: string } | { type: "binary"; data: Buffer };

/** The socket operations a device session uses. */
export interface DeviceConnection {
  readonly isOpen: boolean;
  /** Resolves once the socket has closed, from either side. */
  readonly closed: Promise<void>;
  sendJson(message: ServerMessage): Promise<void>;
  sendBinary(data: Buffer): Promise<void>;
  onMessage(handler: (frame: IncomingFrame) => void): void;
  close(code: number, reason: string): void;
}

const TERMINATE_AFTER_MS = 1000;

/**
 * `DeviceConnection` over a `ws` socket. Frames that arrive before a handler
 * is attached are buffered.
 */
export class WsDeviceConnection implements DeviceConnection {
  readonly closed: Promise<void>;
  private handler: ((frame: IncomingFrame) => void) | null = null;
  private readonly backlog: IncomingFrame[] = [];

  constructor(
    private readonly socket: WebSocket,
    deviceId: string
  ) {
    this.closed = new Promise(resolve => socket.once("close", () => resolve()));
    socket.on("message", (data, isBinary) => this.receive(toFrame(data, isBinary)));
    // Protocol errors (bad UTF-8, oversized or malformed frames) end only this socket
    socket.on("error", error => {
      logger.warn({ deviceId, error: errorMessage(error) }, "Device socket error, terminating");
      socket.terminate();
    });
  }

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  sendJson(message: ServerMessage): Promise<void> {
    return this.send(encodeServerMessage(message), false);
  }

  sendBinary(data: Buffer): Promise<void> {
    return this.send(data, true);
  }

  onMessage(handler: (frame: IncomingFrame) => void): void {
    this.handler = handler;
    for (const frame of this.backlog.splice(0)) {
      handler(frame);
    }
  }

  close(code: number, reason: string): void {
    if (this.socket.readyState === WebSocket.CLOSED) return;
    this.socket.close(code, reason);
    const timer = setTimeout(() => this.socket.terminate(), TERMINATE_AFTER_MS);
    timer.unref();
  }

  private send(data: string | Buffer, binary: boolean): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.isOpen) {
        reject(new Error("WebSocket is not open"));
        return;
      }
      this.socket.send(data, { binary }, error => (error ? reject(error) : resolve()));
    });
  }

  private receive(frame: IncomingFrame): void {
    if (this.handler) {
      this.handler(frame);
    } else {
      this.backlog.push(frame);
    }
  }
}

function toFrame(data: WebSocket.RawData, isBinary: boolean): IncomingFrame {
  const buffer = Array.isArray(data)
    ? Buffer.concat(data)
    : Buffer.isBuffer(data)
      ? data
      : Buffer.from(data);
  return isBinary ? { type: "binary", data: buffer } : { type: "text", data: buffer.toString("utf8") };
}
