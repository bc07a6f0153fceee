import type { DeviceType, IApp, IDevice } from "../models/Device";
import { isDimModeActive, isNightModeActive } from "./schedule";

export const DEVICE_ID_PATTERN = /^[0-9a-fA-F]{8}$/;

export function isValidDeviceId(deviceId: string): boolean {
  return DEVICE_ID_PATTERN.test(deviceId);
}

const WIDE_DEVICE_TYPES: ReadonlySet<DeviceType> = new Set<DeviceType>(["tronbyt_s3_wide", "raspberrypi_wide"]);

export function supports2x(type: DeviceType): boolean {
  return WIDE_DEVICE_TYPES.has(type);
}

export function findApp(device: IDevice, iname: string | null | undefined): IApp | undefined {
  if (!iname) return undefined;
  return device.apps.find(app => app.iname === iname);
}

/** Night brightness wins over dim brightness, which wins over the base setting. */
export function effectiveBrightness(device: IDevice, now: Date): number {
  if (isNightModeActive(device, now)) {
    return clampBrightness(device.nightBrightness);
  }
  if (isDimModeActive(device, now) && device.dimBrightness !== null && device.dimBrightness !== undefined) {
    return clampBrightness(device.dimBrightness);
  }
  return clampBrightness(device.brightness);
}

function clampBrightness(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, Math.round(value)));
}

export function effectiveDwellSecs(device: IDevice, app: IApp | null | undefined): number {
  if (app && app.displayTime > 0) {
    return app.displayTime;
  }
  return device.defaultInterval;
}
