import type { IncomingMessage, Server } from "http";
import type { Duplex } from "stream";
import WebSocket, { WebSocketServer } from "ws";
import type { IDevice } from "../models/Device";
import type { DeviceStore } from "../services/deviceStore";
import { isValidDeviceId } from "../services/deviceState";
import { WsDeviceConnection } from "./connection";
import type { DeviceConnection } from "./connection";
import { SessionRegistry } from "./registry";
import { CLOSE_POLICY_VIOLATION, DeviceSession } from "./session";
import type { SessionDependencies } from "./session";
import { ProtocolViolationError, StorageWriteError, errorMessage } from "../utils/errors";
import { logger as rootLogger } from "../utils/logger";

const logger = rootLogger.child({ service: "ws-server" });

const DEVICE_WS_PATH = /^\/([^/]+)\/ws\/?$/;

export function matchDeviceSocketPath(url: string | undefined): string | null {
  if (!url) return null;
  const pathname = url.split("?")[0];
  const match = DEVICE_WS_PATH.exec(pathname);
  if (!match) return null;
  try {
    return decodeURIComponent(match[1]);
  } catch {
    return null;
  }
}

/**
 * Accepts device connections and runs one `DeviceSession` per device.
 */
export class DeviceSocketServer {
  readonly registry = new SessionRegistry();
  private readonly wss = new WebSocketServer({ noServer: true });

  constructor(private readonly deps: SessionDependencies) {}

  attach(server: Server): void {
    server.on("upgrade", (request: IncomingMessage, socket: Duplex, head: Buffer) => {
      const deviceId = matchDeviceSocketPath(request.url);
      if (deviceId === null) {
        socket.destroy();
        return;
      }
      this.wss.handleUpgrade(request, socket, head, ws => {
        this.accept(deviceId, new WsDeviceConnection(ws, deviceId)).catch((error: unknown) => {
          logger.error({ deviceId, error: errorMessage(error) }, "Failed to start device session");
          if (ws.readyState === WebSocket.OPEN) {
            ws.close(1011, "Internal error");
          }
        });
      });
    });
  }

  /**
   * Validates the device and runs its session until it ends. Resolves once the
   * session has finished and been unregistered.
   */
  async accept(deviceId: string, connection: DeviceConnection): Promise<void> {
    try {
      const device = await this.loadDevice(deviceId, this.deps.store);
      try {
        await this.deps.store.updateDeviceInfo(deviceId, { protocolType: "WS" });
      } catch (error) {
        if (!(error instanceof StorageWriteError)) throw error;
        logger.error({ deviceId, error: error.message }, "Failed to record protocol type");
      }
      device.info = { ...device.info, protocolType: "WS" };

      const session = new DeviceSession(device, connection, this.deps);
      await this.registry.register(session);
      logger.info({ deviceId }, "Device connected");

      await session.start();
      this.registry.unregister(session);
      logger.info({ deviceId, state: session.state }, "Device disconnected");
    } catch (error) {
      if (error instanceof ProtocolViolationError) {
        logger.warn({ deviceId, reason: error.message }, "Rejecting device connection");
        connection.close(CLOSE_POLICY_VIOLATION, error.message);
        return;
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.registry.closeAll();
    await new Promise<void>(resolve => this.wss.close(() => resolve()));
  }

  private async loadDevice(deviceId: string, store: DeviceStore): Promise<IDevice> {
    if (!isValidDeviceId(deviceId)) {
      throw new ProtocolViolationError("Invalid device id");
    }
    const device = await store.getDevice(deviceId);
    if (!device) {
      throw new ProtocolViolationError("Device not found");
    }
    return device;
  }
}
