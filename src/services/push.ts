import type { DeviceStore } from "./deviceStore";
import type { ImageStore } from "./imageStore";
import type { InstallationService } from "./installations";
import type { Notifier } from "./notifier";
import type { Renderer } from "./renderer";
import type { Clock } from "./renderGate";
import { effectiveBrightness, effectiveDwellSecs, supports2x } from "./deviceState";
import { InvalidPushPayloadError, errorMessage } from "../utils/errors";
import { logger as rootLogger } from "../utils/logger";

const logger = rootLogger.child({ service: "push" });

export type PushOutcome =
  /** A connected session took the image. */
  | "delivered"
  /** Stored for the next poll or rotation pass. */
  | "stored"
  /** The app rendered nothing; nothing was pushed. */
  | "empty";

/**
 * Out-of-band updates: images and apps pushed from outside the rotation, and
 * brightness changes that should reach a connected device right away.
 */
export class PushService {
  constructor(
    private readonly store: DeviceStore,
    private readonly images: ImageStore,
    private readonly installations: InstallationService,
    private readonly notifier: Notifier,
    private readonly renderer: Renderer,
    private readonly now: Clock = () => new Date()
  ) {}

  /**
   * With an installation id the image becomes that pushed app's image and
   * stays in the rotation. Without one it is shown once: handed to a live
   * session if there is one, otherwise queued for the next request.
   */
  async pushImage(deviceId: string, image: Buffer, installationId?: string): Promise<PushOutcome> {
    if (image.length === 0) {
      throw new InvalidPushPayloadError("Image is empty");
    }
    await this.installations.requireDevice(deviceId);

    if (installationId) {
      await this.installations.upsertPushedApp(deviceId, installationId);
      await this.images.savePushedImage(deviceId, installationId, image);
      const delivered = await this.notify(deviceId, image);
      return delivered ? "delivered" : "stored";
    }

    if (await this.notify(deviceId, image)) {
      return "delivered";
    }
    await this.images.savePushedImage(deviceId, undefined, image);
    return "stored";
  }

  /** Renders an app once with the given config and pushes the result. */
  async pushApp(
    deviceId: string,
    appPath: string,
    config: Record<string, unknown>,
    installationId?: string
  ): Promise<PushOutcome> {
    const device = await this.installations.requireDevice(deviceId);
    const sourcePath = this.images.resolveSourcePath(appPath);
    if (!sourcePath) {
      throw new InvalidPushPayloadError(`Invalid app path: ${appPath}`);
    }

    const image = await this.renderer.render({
      appPath: sourcePath,
      config: { ...config, $tz: device.timezone ?? undefined },
      context: {
        timezone: device.timezone,
        locale: device.locale,
        output2x: supports2x(device.type),
        dwellSecs: effectiveDwellSecs(device, null),
      },
    });

    if (image.length === 0) {
      logger.info({ deviceId, appPath }, "Pushed app rendered nothing");
      return "empty";
    }
    return this.pushImage(deviceId, image, installationId);
  }

  /** Saves the base brightness and sends the resulting effective brightness. */
  async setBrightness(deviceId: string, brightness: number): Promise<number> {
    const device = await this.installations.requireDevice(deviceId);
    await this.store.updateDevice(deviceId, { brightness });
    const effective = effectiveBrightness({ ...device, brightness }, this.now());

    try {
      await this.notifier.notify(deviceId, { type: "brightness", brightness: effective });
    } catch (error) {
      logger.error({ deviceId, error: errorMessage(error) }, "Failed to send brightness");
    }
    return effective;
  }

  private async notify(deviceId: string, image: Buffer): Promise<boolean> {
    try {
      return await this.notifier.notify(deviceId, { type: "image", image });
    } catch (error) {
      logger.error({ deviceId, error: errorMessage(error) }, "Failed to notify device of pushed image");
      return false;
    }
  }
}
