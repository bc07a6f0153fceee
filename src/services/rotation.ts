import type { IApp, IDevice } from "../models/Device";
import type { DeviceStore } from "./deviceStore";
import type { ImageStore } from "./imageStore";
import type { Clock, RenderGate } from "./renderGate";
import { findApp } from "./deviceState";
import { isNightModeActive, isScheduleActive } from "./schedule";
import { errorMessage } from "../utils/errors";
import { logger as rootLogger } from "../utils/logger";

const logger = rootLogger.child({ service: "rotation" });

export interface Selection {
  app: IApp;
  /** Cursor into the expanded rotation list after this selection. */
  index: number;
  isPinned: boolean;
  isNightModeApp: boolean;
  isInterstitialApp: boolean;
}

/**
 * Apps sorted by `order`, with the interstitial app (when enabled and
 * installed) inserted after every app except the last. Entries are the
 * device's own app objects, so an interstitial appears several times by
 * reference.
 */
export function buildExpandedList(device: IDevice): IApp[] {
  const sorted = [...device.apps].sort((a, b) => a.order - b.order);
  const interstitial = device.interstitialEnabled ? findApp(device, device.interstitialApp) : undefined;
  if (!interstitial) return sorted;

  const expanded: IApp[] = [];
  sorted.forEach((app, i) => {
    expanded.push(app);
    if (i < sorted.length - 1) {
      expanded.push(interstitial);
    }
  });
  return expanded;
}

export class AppScheduler {
  constructor(
    private readonly store: DeviceStore,
    private readonly gate: RenderGate,
    private readonly images: ImageStore,
    private readonly now: Clock = () => new Date()
  ) {}

  /**
   * Picks the app to show. Night-mode app first, then the pinned app, then the
   * rotation. With `advance` the cursor moves past `lastIndex` and the new
   * position is saved; without it the app at `lastIndex` is reported.
   *
   * Resolves `null` when nothing can be shown.
   */
  async selectApp(device: IDevice, lastIndex: number, advance: boolean): Promise<Selection | null> {
    if (device.apps.length === 0) return null;
    const now = this.now();
    const log = logger.child({ deviceId: device.deviceId });

    if (isNightModeActive(device, now)) {
      const nightApp = findApp(device, device.nightModeApp);
      if (nightApp) {
        if (await this.isRenderable(device, nightApp)) {
          return { app: nightApp, index: lastIndex, isPinned: false, isNightModeApp: true, isInterstitialApp: false };
        }
        log.warn({ iname: nightApp.iname }, "Night mode app not renderable, falling back");
      }
    }

    if (device.pinnedApp) {
      const pinned = findApp(device, device.pinnedApp);
      if (pinned && (await this.isRenderable(device, pinned))) {
        return { app: pinned, index: lastIndex, isPinned: true, isNightModeApp: false, isInterstitialApp: false };
      }
      log.warn({ iname: device.pinnedApp, installed: Boolean(pinned) }, "Pinned app unavailable, unpinning");
      await this.unpin(device);
    }

    const expanded = buildExpandedList(device);
    const length = expanded.length;
    if (length === 0) return null;

    const interstitialActive = length > device.apps.length;
    const inRange = lastIndex >= 0 && lastIndex < length;
    let index = advance ? ((inRange ? lastIndex : -1) + 1) % length : inRange ? lastIndex : 0;

    for (let depth = 0; depth <= length; depth++) {
      const candidate = expanded[index];
      const isInterstitialPosition = interstitialActive && index % 2 === 1;

      let shouldDisplay: boolean;
      if (isInterstitialPosition) {
        // An interstitial never shows next to a skipped app
        const previous = expanded[index - 1];
        shouldDisplay = previous.enabled && isScheduleActive(previous, device, now) && !previous.emptyLastRender;
      } else {
        shouldDisplay = candidate.enabled && isScheduleActive(candidate, device, now);
      }

      if (!isInterstitialPosition && candidate.iname === device.interstitialApp && !candidate.enabled) {
        shouldDisplay = false;
      }

      if (shouldDisplay && (await this.isRenderable(device, candidate))) {
        if (advance && index !== device.lastAppIndex) {
          await this.saveCursor(device, index);
        }
        return {
          app: candidate,
          index,
          isPinned: false,
          isNightModeApp: false,
          isInterstitialApp: isInterstitialPosition && candidate.iname === device.interstitialApp,
        };
      }

      index = (index + 1) % length;
    }

    log.debug({ attempts: length + 1 }, "No displayable app in rotation");
    return null;
  }

  private async isRenderable(device: IDevice, app: IApp): Promise<boolean> {
    if (!(await this.gate.ensureRendered(device, app))) return false;
    if (app.emptyLastRender) return false;
    return this.images.hasImage(device.deviceId, app);
  }

  private async unpin(device: IDevice): Promise<void> {
    device.pinnedApp = null;
    try {
      await this.store.updateDevice(device.deviceId, { pinnedApp: null });
    } catch (error) {
      logger.error({ deviceId: device.deviceId, error: errorMessage(error) }, "Failed to clear pinned app");
    }
  }

  private async saveCursor(device: IDevice, index: number): Promise<void> {
    device.lastAppIndex = index;
    try {
      await this.store.updateDevice(device.deviceId, { lastAppIndex: index });
    } catch (error) {
      logger.error({ deviceId: device.deviceId, error: errorMessage(error) }, "Failed to save rotation cursor");
    }
  }
}
