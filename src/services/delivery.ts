import type { IApp, IDevice } from "../models/Device";
import type { ImageStore } from "./imageStore";
import type { AppScheduler } from "./rotation";
import type { Clock } from "./renderGate";
import { effectiveBrightness, effectiveDwellSecs, findApp } from "./deviceState";
import { logger as rootLogger } from "../utils/logger";

const logger = rootLogger.child({ service: "delivery" });

/** One image plus the metadata the device needs to show it. */
export interface Frame {
  image: Buffer;
  brightness: number;
  dwellSecs: number;
  /** Show now, preempting whatever is on screen. */
  immediate: boolean;
  /** Installed app the image came from; null for default and one-shot images. */
  app: IApp | null;
  isDefault: boolean;
}

export class DeliveryService {
  constructor(
    private readonly scheduler: AppScheduler,
    private readonly images: ImageStore,
    private readonly pushDwellSecs: number,
    private readonly now: Clock = () => new Date()
  ) {}

  /**
   * Frame for the next rotation step. One-shot pushed images go first; any
   * path that finds nothing to show ends in the default image.
   */
  async computeNextFrame(device: IDevice): Promise<Frame> {
    const ephemeral = await this.images.takeEphemeralImage(device.deviceId);
    if (ephemeral) {
      return this.frame(device, ephemeral, null, false);
    }

    if (device.apps.length === 0) {
      logger.debug({ deviceId: device.deviceId }, "No apps installed, serving default image");
      return this.defaultFrame(device);
    }

    if (effectiveBrightness(device, this.now()) === 0) {
      logger.debug({ deviceId: device.deviceId }, "Brightness is 0, serving default image");
      return this.defaultFrame(device);
    }

    const selection = await this.scheduler.selectApp(device, device.lastAppIndex, true);
    if (!selection) {
      return this.defaultFrame(device);
    }

    const image = await this.images.readAppImage(device.deviceId, selection.app);
    if (!image) {
      logger.warn({ deviceId: device.deviceId, iname: selection.app.iname }, "Selected app has no image");
      return this.defaultFrame(device);
    }
    return this.frame(device, image, selection.app, false);
  }

  /** Frame currently on screen, without moving the rotation cursor. */
  async computeCurrentFrame(device: IDevice): Promise<Frame> {
    const displaying = findApp(device, device.displayingApp);
    if (displaying) {
      const image = await this.images.readAppImage(device.deviceId, displaying);
      if (image) {
        return this.frame(device, image, displaying, false);
      }
      logger.warn({ deviceId: device.deviceId, iname: displaying.iname }, "Displaying app has no image, falling back");
    }

    const selection = await this.scheduler.selectApp(device, device.lastAppIndex, false);
    if (selection) {
      const image = await this.images.readAppImage(device.deviceId, selection.app);
      if (image) {
        return this.frame(device, image, selection.app, false);
      }
    }
    return this.defaultFrame(device);
  }

  /** Last render of one installed app, or null when it has none. */
  async computeAppFrame(device: IDevice, app: IApp): Promise<Frame | null> {
    const image = await this.images.readAppImage(device.deviceId, app);
    return image ? this.frame(device, image, app, false) : null;
  }

  immediateFrame(device: IDevice, image: Buffer): Frame {
    return {
      image,
      brightness: effectiveBrightness(device, this.now()),
      dwellSecs: this.pushDwellSecs,
      immediate: true,
      app: null,
      isDefault: false,
    };
  }

  async defaultFrame(device: IDevice): Promise<Frame> {
    const image = await this.images.readDefaultImage();
    return { ...this.frame(device, image, null, false), isDefault: true };
  }

  private frame(device: IDevice, image: Buffer, app: IApp | null, immediate: boolean): Frame {
    return {
      image,
      brightness: effectiveBrightness(device, this.now()),
      dwellSecs: effectiveDwellSecs(device, app),
      immediate,
      app,
      isDefault: false,
    };
  }
}
