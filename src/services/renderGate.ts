import type { IApp, IDevice } from "../models/Device";
import type { DevicePatch, DeviceStore } from "./deviceStore";
import type { ImageStore } from "./imageStore";
import type { Renderer } from "./renderer";
import { effectiveDwellSecs, supports2x } from "./deviceState";
import { errorMessage } from "../utils/errors";
import { logger as rootLogger } from "../utils/logger";

const logger = rootLogger.child({ service: "render-gate" });

export type Clock = () => Date;

export function isRenderStale(app: IApp, now: Date): boolean {
  if (app.uinterval <= 0 || !app.lastRender) return true;
  const elapsedMs = now.getTime() - new Date(app.lastRender).getTime();
  return elapsedMs >= app.uinterval * 60 * 1000;
}

/**
 * Keeps each app's cached image fresh.
 *
 * `ensureRendered` resolves `false` only when the app cannot be rendered at
 * all; an empty render resolves `true` and is recorded as `emptyLastRender`.
 * The passed-in app and device are updated in place so the caller's snapshot
 * matches what was written.
 */
export class RenderGate {
  constructor(
    private readonly store: DeviceStore,
    private readonly renderer: Renderer,
    private readonly images: ImageStore,
    private readonly now: Clock = () => new Date()
  ) {}

  async ensureRendered(device: IDevice, app: IApp): Promise<boolean> {
    if (app.pushed) return true;
    if (!app.path) return false;

    const sourcePath = this.images.resolveSourcePath(app.path);
    if (!sourcePath) return false;

    if (app.path.toLowerCase().endsWith(".webp")) {
      return this.images.ensureStaticCopy(device.deviceId, app, sourcePath);
    }

    const now = this.now();
    if (!isRenderStale(app, now)) return true;

    let output: Buffer | null = null;
    try {
      output = await this.renderer.render({
        appPath: sourcePath,
        config: { ...app.config, $tz: device.timezone ?? undefined },
        context: {
          timezone: device.timezone,
          locale: device.locale,
          output2x: supports2x(device.type),
          dwellSecs: effectiveDwellSecs(device, app),
        },
      });
    } catch (error) {
      logger.error({ deviceId: device.deviceId, iname: app.iname, error: errorMessage(error) }, "Render failed");
    }

    if (output && output.length > 0) {
      try {
        await this.images.writeAppImage(device.deviceId, app, output);
      } catch (error) {
        logger.error({ deviceId: device.deviceId, iname: app.iname, error: errorMessage(error) }, "Failed to cache render");
      }
    }

    const emptyLastRender = output !== null && output.length === 0;
    const devicePatch: DevicePatch = {};
    if (app.autopin && output && output.length > 0) {
      devicePatch.pinnedApp = app.iname;
    }

    app.emptyLastRender = emptyLastRender;
    app.lastRender = now;
    if (devicePatch.pinnedApp) {
      device.pinnedApp = devicePatch.pinnedApp;
    }

    try {
      await this.store.updateApp(device.deviceId, app.iname, { emptyLastRender, lastRender: now }, devicePatch);
    } catch (error) {
      logger.error({ deviceId: device.deviceId, iname: app.iname, error: errorMessage(error) }, "Failed to record render");
    }

    return output !== null;
  }
}
