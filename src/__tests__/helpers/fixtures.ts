import fs from "fs";
import os from "os";
import path from "path";
import type { IApp, IDevice } from "../../models/Device";

export const DEVICE_ID = "abcd1234";
export const DEFAULT_IMAGE = Buffer.from("default-image");

export function makeApp(overrides: Partial<IApp> & { iname: string }): IApp {
  return {
    name: `app${overrides.iname}`,
    path: `apps/${overrides.iname}.star`,
    order: 0,
    uinterval: 0,
    displayTime: 0,
    enabled: true,
    pushed: false,
    lastRender: null,
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
    ...overrides,
  };
}

export function makeDevice(overrides: Partial<IDevice> = {}): IDevice {
  return {
    deviceId: DEVICE_ID,
    username: "tester",
    name: "Kitchen",
    type: "tidbyt_gen1",
    brightness: 50,
    nightBrightness: 10,
    dimBrightness: null,
    nightModeEnabled: false,
    nightModeApp: null,
    nightStart: null,
    nightEnd: null,
    dimTime: null,
    defaultInterval: 15,
    timezone: "UTC",
    locale: null,
    lastAppIndex: 0,
    pinnedApp: null,
    displayingApp: null,
    interstitialEnabled: false,
    interstitialApp: null,
    lastSeen: null,
    info: {},
    apps: [],
    ...overrides,
  };
}

/** Fresh data directory with a default image, removed by `cleanup`. */
export function makeDataDir(): { dataDir: string; defaultImagePath: string; cleanup: () => void } {
  const dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "pixel-fleet-test-"));
  const defaultImagePath = path.join(dataDir, "default.webp");
  fs.writeFileSync(defaultImagePath, DEFAULT_IMAGE);
  return {
    dataDir,
    defaultImagePath,
    cleanup: () => fs.rmSync(dataDir, { recursive: true, force: true }),
  };
}

/** Polls until `predicate` holds, failing after `timeoutMs`. */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error("Timed out waiting for condition");
    }
    await new Promise(resolve => setTimeout(resolve, 5));
  }
}
