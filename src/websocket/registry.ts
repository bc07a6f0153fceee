import type { DeviceSession } from "./session";
import { errorMessage } from "../utils/errors";
import { logger as rootLogger } from "../utils/logger";

const logger = rootLogger.child({ service: "ws-registry" });

/**
 * Active sessions by device id, at most one per device.
 *
 * Registrations for the same device run one after another: the previous
 * session is stopped and fully finished before the new one is installed.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, DeviceSession>();
  private readonly pending = new Map<string, Promise<void>>();

  get size(): number {
    return this.sessions.size;
  }

  get(deviceId: string): DeviceSession | undefined {
    return this.sessions.get(deviceId);
  }

  register(session: DeviceSession): Promise<void> {
    const deviceId = session.deviceId;
    const previous = this.pending.get(deviceId) ?? Promise.resolve();
    const next = previous.then(() => this.replace(session));
    const settled = next.catch((error: unknown) => {
      logger.error({ deviceId, error: errorMessage(error) }, "Session registration failed");
    });
    this.pending.set(deviceId, settled);
    void settled.then(() => {
      if (this.pending.get(deviceId) === settled) {
        this.pending.delete(deviceId);
      }
    });
    return next;
  }

  /** Removes the session only if it is still the registered one. */
  unregister(session: DeviceSession): boolean {
    if (this.sessions.get(session.deviceId) !== session) return false;
    this.sessions.delete(session.deviceId);
    return true;
  }

  async closeAll(): Promise<void> {
    const sessions = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(sessions.map(session => session.stop("shutdown")));
  }

  private async replace(session: DeviceSession): Promise<void> {
    const existing = this.sessions.get(session.deviceId);
    if (existing && existing !== session) {
      logger.info({ deviceId: session.deviceId }, "Replacing existing session");
      await existing.stop("superseded");
    }
    this.sessions.set(session.deviceId, session);
  }
}
