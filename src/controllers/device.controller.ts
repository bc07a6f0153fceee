import { createHash } from "crypto";
import { Request, Response, NextFunction } from "express";
import type { Services } from "../services";
import type { Frame } from "../services/delivery";
import type { DeviceInfoPatch, DevicePatch } from "../services/deviceStore";
import { findApp } from "../services/deviceState";
import { ApiError, AppNotFoundError, errorMessage } from "../utils/errors";
import { logger as rootLogger } from "../utils/logger";

const logger = rootLogger.child({ service: "device-api" });

export const BRIGHTNESS_HEADER = "Tronbyt-Brightness";
export const DWELL_HEADER = "Tronbyt-Dwell-Secs";

export function frameEtag(image: Buffer): string {
  return `"${createHash("md5").update(image).digest("hex")}"`;
}

/** True when an If-None-Match header lists `etag`, weakly compared, or is `*`. */
export function etagMatches(header: string | undefined, etag: string): boolean {
  if (!header) return false;
  const strip = (tag: string) => tag.trim().replace(/^W\//, "");
  const wanted = strip(etag);
  return header.split(",").some(tag => tag.trim() === "*" || strip(tag) === wanted);
}

function sendFrame(res: Response, frame: Frame, cacheControl: string): void {
  res.set({
    "Content-Type": "image/webp",
    "Cache-Control": cacheControl,
    [BRIGHTNESS_HEADER]: String(frame.brightness),
    [DWELL_HEADER]: String(frame.dwellSecs),
  });
  res.status(200).send(frame.image);
}

/**
 * Endpoints polled by devices: the next rotation frame, the frame on screen
 * and a single app's last render.
 */
export function createDeviceController(services: Services) {
  const { installations, delivery, store } = services;

  /**
   * GET /:deviceId/next
   * Advances the rotation and returns the frame to show.
   */
  const getNextFrame = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId } = req.params;
      const device = await installations.requireDevice(deviceId);

      const infoPatch: DeviceInfoPatch = {};
      if (device.info.protocolType !== "HTTP") infoPatch.protocolType = "HTTP";
      const firmwareVersion = req.get("X-Firmware-Version");
      if (firmwareVersion && firmwareVersion !== device.info.firmwareVersion) {
        infoPatch.firmwareVersion = firmwareVersion;
      }
      if (Object.keys(infoPatch).length > 0) {
        await store.updateDeviceInfo(deviceId, infoPatch).catch((error: unknown) => {
          logger.error({ deviceId, error: errorMessage(error) }, "Failed to update device info");
        });
      }

      const frame = await delivery.computeNextFrame(device);

      const devicePatch: DevicePatch = { lastSeen: services.now() };
      if (frame.app) devicePatch.displayingApp = frame.app.iname;
      await store.updateDevice(deviceId, devicePatch).catch((error: unknown) => {
        logger.error({ deviceId, error: errorMessage(error) }, "Failed to update device state");
      });

      sendFrame(res, frame, "no-cache, no-store, must-revalidate");
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /:deviceId/currentapp
   * Frame currently on screen; honours If-None-Match.
   */
  const getCurrentFrame = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId } = req.params;
      const device = await installations.requireDevice(deviceId);
      const frame = await delivery.computeCurrentFrame(device);

      const etag = frameEtag(frame.image);
      res.set("ETag", etag);
      if (etagMatches(req.get("If-None-Match"), etag)) {
        res.status(304).end();
        return;
      }
      sendFrame(res, frame, "no-cache");
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /:deviceId/:iname/appwebp
   * Last render of one installed app, regardless of rotation.
   */
  const getAppImage = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId, iname } = req.params;
      const device = await installations.requireDevice(deviceId);
      const app = findApp(device, iname);
      if (!app) {
        throw new AppNotFoundError(deviceId, iname);
      }

      const frame = await delivery.computeAppFrame(device, app);
      if (!frame) {
        throw new ApiError(404, `No image rendered yet for app ${iname}`);
      }
      sendFrame(res, frame, "no-cache");
    } catch (error) {
      next(error);
    }
  };

  return { getNextFrame, getCurrentFrame, getAppImage };
}
