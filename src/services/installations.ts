import type { IApp, IDevice } from "../models/Device";
import type { DeviceStore } from "./deviceStore";
import type { ImageStore } from "./imageStore";
import type { Notifier } from "./notifier";
import { findApp, isValidDeviceId } from "./deviceState";
import { AppNotFoundError, DeviceNotFoundError, InvalidDeviceIdError, errorMessage } from "../utils/errors";
import { logger as rootLogger } from "../utils/logger";

const logger = rootLogger.child({ service: "installations" });

export const MOVE_DIRECTIONS = ["up", "down", "top", "bottom"] as const;
export type MoveDirection = (typeof MOVE_DIRECTIONS)[number];

const FIRST_INAME = 100;

export interface NewAppInput {
  name: string;
  path?: string | null;
  uinterval?: number;
  displayTime?: number;
  enabled?: boolean;
  autopin?: boolean;
  startTime?: string | null;
  endTime?: string | null;
  days?: string[];
  config?: Record<string, unknown>;
}

/** Next free numeric iname: one past the highest numeric iname, never below 100. */
export function nextIname(device: IDevice): string {
  const numeric = device.apps
    .map(app => app.iname)
    .filter(iname => /^\d+$/.test(iname))
    .map(iname => parseInt(iname, 10));
  const highest = numeric.length > 0 ? Math.max(...numeric) : FIRST_INAME - 1;
  return String(Math.max(highest + 1, FIRST_INAME));
}

function sortedInames(device: IDevice): string[] {
  return [...device.apps].sort((a, b) => a.order - b.order).map(app => app.iname);
}

function toOrderMap(inames: string[]): Map<string, number> {
  return new Map(inames.map((iname, order) => [iname, order]));
}

/** Orders `0..n-1` after moving `iname` one step or to an end. */
export function computeMovedOrders(device: IDevice, iname: string, direction: MoveDirection): Map<string, number> {
  const inames = sortedInames(device);
  const from = inames.indexOf(iname);
  if (from < 0) {
    throw new AppNotFoundError(device.deviceId, iname);
  }

  const last = inames.length - 1;
  const targets: Record<MoveDirection, number> = {
    up: Math.max(0, from - 1),
    down: Math.min(last, from + 1),
    top: 0,
    bottom: last,
  };
  const to = targets[direction];

  inames.splice(from, 1);
  inames.splice(to, 0, iname);
  return toOrderMap(inames);
}

/** Orders `0..n-1` after dropping `dragged` before or after `target`. */
export function computeReorderedOrders(
  device: IDevice,
  dragged: string,
  target: string,
  insertAfter: boolean
): Map<string, number> {
  const inames = sortedInames(device);
  if (!inames.includes(dragged)) throw new AppNotFoundError(device.deviceId, dragged);
  if (!inames.includes(target)) throw new AppNotFoundError(device.deviceId, target);
  if (dragged === target) return toOrderMap(inames);

  const remaining = inames.filter(iname => iname !== dragged);
  const targetIndex = remaining.indexOf(target);
  remaining.splice(insertAfter ? targetIndex + 1 : targetIndex, 0, dragged);
  return toOrderMap(remaining);
}

/**
 * Installs, removes and rearranges apps on a device. Every change is
 * followed by a refresh notification so a connected session reloads.
 */
export class InstallationService {
  constructor(
    private readonly store: DeviceStore,
    private readonly images: ImageStore,
    private readonly notifier: Notifier
  ) {}

  async requireDevice(deviceId: string): Promise<IDevice> {
    if (!isValidDeviceId(deviceId)) {
      throw new InvalidDeviceIdError(deviceId);
    }
    const device = await this.store.getDevice(deviceId);
    if (!device) {
      throw new DeviceNotFoundError(deviceId);
    }
    return device;
  }

  async addApp(deviceId: string, input: NewAppInput): Promise<IApp> {
    const device = await this.requireDevice(deviceId);
    const app: IApp = {
      iname: nextIname(device),
      name: input.name,
      path: input.path ?? null,
      order: device.apps.length,
      uinterval: input.uinterval ?? 0,
      displayTime: input.displayTime ?? 0,
      enabled: input.enabled ?? true,
      pushed: false,
      lastRender: null,
      emptyLastRender: false,
      startTime: input.startTime ?? null,
      endTime: input.endTime ?? null,
      days: input.days ?? [],
      useCustomRecurrence: false,
      recurrenceType: null,
      recurrenceInterval: 1,
      recurrencePattern: null,
      recurrenceStartDate: null,
      recurrenceEndDate: null,
      autopin: input.autopin ?? false,
      config: input.config ?? {},
    };

    await this.store.addApp(deviceId, app);
    logger.info({ deviceId, iname: app.iname, name: app.name }, "App installed");
    await this.refresh(deviceId);
    return app;
  }

  /**
   * Returns the pushed app for `iname`, creating it at the end of the rotation
   * when it does not exist yet.
   */
  async upsertPushedApp(deviceId: string, iname: string): Promise<IApp> {
    const device = await this.requireDevice(deviceId);
    const existing = findApp(device, iname);
    if (existing) return existing;

    const maxOrder = device.apps.reduce((max, app) => Math.max(max, app.order), -1);
    const app: IApp = {
      iname,
      name: "pushed",
      path: null,
      order: maxOrder + 1,
      uinterval: 0,
      displayTime: 0,
      enabled: true,
      pushed: true,
      lastRender: new Date(),
      emptyLastRender: false,
      startTime: null,
      endTime: null,
      days: [],
      useCustomRecurrence: false,
      recurrenceType: null,
      recurrenceInterval: 1,
      recurrencePattern: null,
      recurrenceStartDate: null,
      recurrenceEndDate: null,
      autopin: false,
      config: {},
    };
    await this.store.addApp(deviceId, app);
    logger.info({ deviceId, iname }, "Pushed app created");
    return app;
  }

  /** Removes the app and its cached image. Remaining orders keep their gaps. */
  async removeApp(deviceId: string, iname: string): Promise<void> {
    const device = await this.requireDevice(deviceId);
    const app = findApp(device, iname);
    if (!app) {
      throw new AppNotFoundError(deviceId, iname);
    }

    await this.store.removeApp(deviceId, iname);
    if (device.pinnedApp === iname) {
      await this.store.updateDevice(deviceId, { pinnedApp: null });
    }
    try {
      await this.images.removeAppImage(deviceId, app);
    } catch (error) {
      logger.warn({ deviceId, iname, error: errorMessage(error) }, "Failed to remove app image");
    }

    logger.info({ deviceId, iname }, "App removed");
    await this.refresh(deviceId);
  }

  async moveApp(deviceId: string, iname: string, direction: MoveDirection): Promise<void> {
    const device = await this.requireDevice(deviceId);
    await this.store.setAppOrders(deviceId, computeMovedOrders(device, iname, direction));
    await this.refresh(deviceId);
  }

  async reorderApps(deviceId: string, dragged: string, target: string, insertAfter: boolean): Promise<void> {
    const device = await this.requireDevice(deviceId);
    await this.store.setAppOrders(deviceId, computeReorderedOrders(device, dragged, target, insertAfter));
    await this.refresh(deviceId);
  }

  /** Renumbers orders to `0..n-1`, keeping their relative order. Returns how many changed. */
  async normalizeOrders(deviceId: string): Promise<number> {
    const device = await this.requireDevice(deviceId);
    const orders = toOrderMap(sortedInames(device));
    const changed = device.apps.filter(app => orders.get(app.iname) !== app.order).length;
    if (changed > 0) {
      await this.store.setAppOrders(deviceId, orders);
    }
    return changed;
  }

  async setEnabled(deviceId: string, iname: string, enabled: boolean): Promise<void> {
    await this.requireApp(deviceId, iname);
    await this.store.updateApp(deviceId, iname, { enabled });
    await this.refresh(deviceId);
  }

  async setPinned(deviceId: string, iname: string, pinned: boolean): Promise<void> {
    const device = await this.requireApp(deviceId, iname);
    if (pinned) {
      await this.store.updateDevice(deviceId, { pinnedApp: iname });
    } else if (device.pinnedApp === iname) {
      await this.store.updateDevice(deviceId, { pinnedApp: null });
    }
    await this.refresh(deviceId);
  }

  /** Deletes the device record and purges its image cache. */
  async deleteDevice(deviceId: string): Promise<void> {
    await this.requireDevice(deviceId);
    await this.store.deleteDevice(deviceId);
    await this.images.purgeDevice(deviceId);
    logger.info({ deviceId }, "Device deleted");
    await this.refresh(deviceId);
  }

  private async requireApp(deviceId: string, iname: string): Promise<IDevice> {
    const device = await this.requireDevice(deviceId);
    if (!findApp(device, iname)) {
      throw new AppNotFoundError(deviceId, iname);
    }
    return device;
  }

  private async refresh(deviceId: string): Promise<void> {
    try {
      await this.notifier.notify(deviceId, { type: "refresh" });
    } catch (error) {
      logger.error({ deviceId, error: errorMessage(error) }, "Failed to notify device");
    }
  }
}
