import type { IDevice } from "../models/Device";
import type { DeviceInfoPatch, DeviceStore } from "../services/deviceStore";
import type { DeliveryService, Frame } from "../services/delivery";
import type { Notifier, NotifierPayload, Waiter } from "../services/notifier";
import type { Clock } from "../services/renderGate";
import { effectiveBrightness } from "../services/deviceState";
import { AckState } from "./ackState";
import type { DeviceConnection, IncomingFrame } from "./connection";
import { parseClientMessage } from "./messages";
import type { ClientMessage } from "./messages";
import { errorMessage } from "../utils/errors";
import { logger as rootLogger } from "../utils/logger";
import type { Logger } from "../utils/logger";

export const CLOSE_NORMAL = 1000;
export const CLOSE_GOING_AWAY = 1001;
export const CLOSE_POLICY_VIOLATION = 1008;
export const CLOSE_INTERNAL_ERROR = 1011;

export type SessionState = "connecting" | "active" | "superseded" | "disconnected" | "errored";

export type StopReason = "superseded" | "shutdown";

export interface SessionSettings {
  /** Floor for the ack timeout of devices that send acknowledgments. */
  minAckTimeoutSecs: number;
  /** Longest single wait before the sender re-checks the session. */
  pollIntervalMs: number;
}

export interface SessionDependencies {
  store: DeviceStore;
  delivery: DeliveryService;
  notifier: Notifier;
  settings: SessionSettings;
  now?: Clock;
}

type WaitOutcome = "ack" | "timeout" | "interrupted" | "closed";

/**
 * One device's WebSocket session: a sender loop that streams frames and
 * waits for acknowledgments, and a receiver that handles device messages.
 *
 * The sender keeps its own copy of the device and reloads it at the start of
 * every ack wait and whenever a notification arrives.
 */
export class DeviceSession {
  private currentState: SessionState = "connecting";
  private readonly abort = new AbortController();
  private readonly ack = new AckState();
  private readonly log: Logger;
  private readonly now: Clock;
  private device: IDevice;
  private lastSentBrightness = -1;
  private pendingImage: Buffer | null = null;
  private receiveChain: Promise<void> = Promise.resolve();
  private done: Promise<void> | null = null;

  constructor(
    device: IDevice,
    private readonly connection: DeviceConnection,
    private readonly deps: SessionDependencies
  ) {
    this.device = device;
    this.now = deps.now ?? (() => new Date());
    this.log = rootLogger.child({ service: "ws-session", deviceId: device.deviceId });
  }

  get deviceId(): string {
    return this.device.deviceId;
  }

  get state(): SessionState {
    return this.currentState;
  }

  /** Resolves when both loops have exited. */
  get finished(): Promise<void> {
    return this.done ?? Promise.resolve();
  }

  start(): Promise<void> {
    if (this.done) return this.done;
    if (this.abort.signal.aborted) return Promise.resolve();
    this.currentState = "active";
    this.log.info("Session started");

    const sender = this.runSender();
    const receiver = this.runReceiver();
    this.done = Promise.all([sender, receiver]).then(() => {
      if (this.currentState === "active") {
        this.currentState = "disconnected";
      }
      this.log.info({ state: this.currentState }, "Session ended");
    });
    return this.done;
  }

  async stop(reason: StopReason): Promise<void> {
    if (this.currentState === "active" || this.currentState === "connecting") {
      this.currentState = reason === "superseded" ? "superseded" : "disconnected";
    }
    this.abort.abort();
    this.connection.close(
      reason === "superseded" ? CLOSE_NORMAL : CLOSE_GOING_AWAY,
      reason === "superseded" ? "Superseded by a newer connection" : "Server shutting down"
    );
    await this.finished;
  }

  // ---------------------------------------------------------------------------
  // Sender
  // ---------------------------------------------------------------------------

  private async runSender(): Promise<void> {
    let waiter: Waiter | null = null;
    try {
      waiter = await this.deps.notifier.getWaiter(this.deviceId);

      while (this.isRunning()) {
        this.ack.resetForFrame();
        const frame = this.pendingImage
          ? this.deps.delivery.immediateFrame(this.device, this.pendingImage)
          : await this.deps.delivery.computeNextFrame(this.device);
        this.pendingImage = null;

        if (!this.isRunning()) break;
        await this.sendFrame(frame);

        const outcome = await this.awaitAcknowledgment(frame, waiter);
        if (outcome === "closed") break;
        if (outcome === "timeout") {
          this.log.debug({ iname: frame.app?.iname }, "No acknowledgment before timeout, moving on");
        }
      }
    } catch (error) {
      if (this.isRunning()) {
        this.currentState = "errored";
        this.log.error({ error: errorMessage(error) }, "Sender loop failed");
        this.connection.close(CLOSE_INTERNAL_ERROR, "Internal error");
      }
    } finally {
      this.abort.abort();
      if (waiter) {
        await waiter.close();
      }
    }
  }

  private async sendFrame(frame: Frame): Promise<void> {
    await this.connection.sendJson({ dwell_secs: frame.dwellSecs });
    if (frame.brightness !== this.lastSentBrightness) {
      await this.connection.sendJson({ brightness: frame.brightness });
      this.lastSentBrightness = frame.brightness;
    }
    await this.connection.sendBinary(frame.image);
    // Sent after the bytes so the device has buffered the image when told to switch
    if (frame.immediate) {
      await this.connection.sendJson({ immediate: true });
    }
  }

  ackTimeoutMs(dwellSecs: number): number {
    const acknowledging = (this.device.info.protocolVersion ?? null) !== null;
    const seconds = acknowledging ? Math.max(dwellSecs * 2, this.deps.settings.minAckTimeoutSecs) : dwellSecs;
    return seconds * 1000;
  }

  private async awaitAcknowledgment(frame: Frame, waiter: Waiter): Promise<WaitOutcome> {
    if (!(await this.reloadDevice())) return "closed";

    const deadline = Date.now() + this.ackTimeoutMs(frame.dwellSecs);

    while (this.isRunning()) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) return "timeout";

      const result = await this.raceOnce(waiter, Math.min(this.deps.settings.pollIntervalMs, remaining));
      if (result === "ack") {
        await this.recordDisplaying(frame);
        return "ack";
      }
      if (result === "notified" && (await this.drainNotifications(waiter))) {
        return "interrupted";
      }
    }
    return "closed";
  }

  /** One bounded wait on the ack event and the notifier, whichever fires first. */
  private async raceOnce(waiter: Waiter, sliceMs: number): Promise<"ack" | "notified" | null> {
    const race = new AbortController();
    const onAbort = (): void => race.abort();
    this.abort.signal.addEventListener("abort", onAbort, { once: true });
    try {
      return await Promise.race([
        this.ack.displayed.wait(sliceMs, race.signal).then((set): "ack" | null => (set ? "ack" : null)),
        waiter.wait(sliceMs, race.signal).then((set): "notified" | null => (set ? "notified" : null)),
      ]);
    } finally {
      race.abort();
      this.abort.signal.removeEventListener("abort", onAbort);
    }
  }

  /** Handles every pending notification; true when a pushed image should preempt. */
  private async drainNotifications(waiter: Waiter): Promise<boolean> {
    let interrupt = false;
    for (let payload = waiter.take(); payload; payload = waiter.take()) {
      if (await this.handleNotification(payload)) {
        interrupt = true;
      }
    }
    return interrupt;
  }

  private async handleNotification(payload: NotifierPayload): Promise<boolean> {
    switch (payload.type) {
      case "image":
        if (payload.image.length === 0) return false;
        this.pendingImage = payload.image;
        return true;

      case "brightness":
        await this.connection.sendJson({ brightness: payload.brightness });
        this.lastSentBrightness = payload.brightness;
        return false;

      case "refresh": {
        if (!(await this.reloadDevice())) return false;
        const brightness = effectiveBrightness(this.device, this.now());
        if (brightness !== this.lastSentBrightness) {
          await this.connection.sendJson({ brightness });
          this.lastSentBrightness = brightness;
        }
        return false;
      }
    }
  }

  private async recordDisplaying(frame: Frame): Promise<void> {
    if (!frame.app) return;
    const iname = frame.app.iname;
    this.device.displayingApp = iname;
    try {
      await this.deps.store.updateDevice(this.deviceId, { displayingApp: iname });
    } catch (error) {
      this.log.error({ iname, error: errorMessage(error) }, "Failed to record displaying app");
    }
  }

  /**
   * False when the device no longer exists; the session is then closed. A
   * failed read keeps the cached copy.
   */
  private async reloadDevice(): Promise<boolean> {
    let reloaded: IDevice | null;
    try {
      reloaded = await this.deps.store.getDevice(this.deviceId);
    } catch (error) {
      this.log.warn({ error: errorMessage(error) }, "Failed to reload device, using cached copy");
      return true;
    }
    if (!reloaded) {
      this.log.warn("Device removed, closing session");
      this.currentState = "disconnected";
      this.abort.abort();
      this.connection.close(CLOSE_POLICY_VIOLATION, "Device not found");
      return false;
    }
    this.device = reloaded;
    return true;
  }

  // ---------------------------------------------------------------------------
  // Receiver
  // ---------------------------------------------------------------------------

  private async runReceiver(): Promise<void> {
    this.connection.onMessage(frame => {
      this.receiveChain = this.receiveChain
        .then(() => this.handleFrame(frame))
        .catch((error: unknown) => {
          this.log.error({ error: errorMessage(error) }, "Failed to handle device message");
        });
    });

    await Promise.race([this.connection.closed, abortedPromise(this.abort.signal)]);
    this.abort.abort();
    await this.receiveChain;
  }

  private async handleFrame(frame: IncomingFrame): Promise<void> {
    await this.touchLastSeen();

    if (frame.type === "binary") {
      this.log.warn({ bytes: frame.data.length }, "Ignoring binary frame from device");
      return;
    }

    const parsed = parseClientMessage(frame.data);
    if (!parsed.ok) {
      this.log.warn({ error: parsed.error, raw: frame.data.slice(0, 200) }, "Ignoring malformed device message");
      return;
    }
    await this.handleMessage(parsed.message);
  }

  private async handleMessage(message: ClientMessage): Promise<void> {
    switch (message.kind) {
      case "queued":
      case "displaying":
        await this.stampProtocolVersion();
        if (message.kind === "queued") {
          this.ack.markQueued(message.seq);
        } else {
          this.ack.markDisplaying(message.seq);
        }
        return;

      case "client_info": {
        const patch: DeviceInfoPatch = {};
        if (message.info.firmwareVersion !== undefined) patch.firmwareVersion = message.info.firmwareVersion;
        if (message.info.firmwareType !== undefined) patch.firmwareType = message.info.firmwareType;
        if (message.info.protocolVersion !== undefined) patch.protocolVersion = message.info.protocolVersion;
        if (message.info.macAddress !== undefined) patch.macAddress = message.info.macAddress;
        if (Object.keys(patch).length === 0) return;

        this.device.info = { ...this.device.info, ...patch };
        try {
          await this.deps.store.updateDeviceInfo(this.deviceId, patch);
        } catch (error) {
          this.log.error({ error: errorMessage(error) }, "Failed to update device info");
        }
        return;
      }
    }
  }

  // First ack from a device without a recorded protocol version marks it as ack-capable
  private async stampProtocolVersion(): Promise<void> {
    const info = this.device.info;
    if ((info.protocolVersion ?? null) !== null) return;

    this.log.info("First acknowledgment from device, setting protocol version 1");
    this.device.info = { ...info, protocolVersion: 1 };
    try {
      await this.deps.store.updateDeviceInfo(this.deviceId, { protocolVersion: 1 });
    } catch (error) {
      this.log.error({ error: errorMessage(error) }, "Failed to record protocol version");
    }
  }

  private async touchLastSeen(): Promise<void> {
    const now = this.now();
    this.device.lastSeen = now;
    try {
      await this.deps.store.updateDevice(this.deviceId, { lastSeen: now });
    } catch (error) {
      this.log.error({ error: errorMessage(error) }, "Failed to update last seen");
    }
  }

  private isRunning(): boolean {
    return !this.abort.signal.aborted && this.connection.isOpen;
  }
}

function abortedPromise(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise(resolve => signal.addEventListener("abort", () => resolve(), { once: true }));
}
