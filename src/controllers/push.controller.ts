import { Request, Response, NextFunction } from "express";
import { z } from "zod";
import type { Services } from "../services";
import type { PushOutcome } from "../services/push";
import { InvalidPushPayloadError } from "../utils/errors";

const installationIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]{1,64}$/, "installationID may only contain letters, digits, '-' and '_'");

const BASE64_PATTERN = /^[A-Za-z0-9+/\r\n]+={0,2}$/;

export const pushImageSchema = z.object({
  image: z.string().regex(BASE64_PATTERN, "image must be base64").optional(),
  installationID: installationIdSchema.optional(),
});

export const pushAppSchema = z.object({
  appPath: z.string().min(1),
  config: z.record(z.unknown()).default({}),
  installationID: installationIdSchema.optional(),
});

export const patchDeviceSchema = z
  .object({
    brightness: z.number().int().min(0).max(100).optional(),
    pinnedApp: z.string().min(1).nullable().optional(),
  })
  .refine(body => body.brightness !== undefined || body.pinnedApp !== undefined, {
    message: "Nothing to update",
  });

const PUSH_MESSAGES: Record<PushOutcome, string> = {
  delivered: "Image pushed to device",
  stored: "Image stored for the next update",
  empty: "Empty image, not pushing",
};

export function createPushController(services: Services) {
  const { push, installations } = services;

  /**
   * POST /v0/devices/:deviceId/push
   * JSON `{ image, installationID? }` or multipart with an `image` file.
   */
  const pushImage = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId } = req.params;
      const body = pushImageSchema.parse(req.body ?? {});

      const image = req.file ? req.file.buffer : body.image ? Buffer.from(body.image, "base64") : null;
      if (!image || image.length === 0) {
        throw new InvalidPushPayloadError("An image is required");
      }

      const outcome = await push.pushImage(deviceId, image, body.installationID);
      res.json({ success: true, message: PUSH_MESSAGES[outcome], data: { outcome } });
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /v0/devices/:deviceId/push_app
   * Renders an app with the given config and pushes the result.
   */
  const pushApp = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId } = req.params;
      const body = pushAppSchema.parse(req.body);

      const outcome = await push.pushApp(deviceId, body.appPath, body.config, body.installationID);
      res.json({ success: true, message: PUSH_MESSAGES[outcome], data: { outcome } });
    } catch (error) {
      next(error);
    }
  };

  /**
   * PATCH /v0/devices/:deviceId
   * Updates brightness and/or the pinned app.
   */
  const patchDevice = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId } = req.params;
      const body = patchDeviceSchema.parse(req.body);
      const data: { brightness?: number; pinnedApp?: string | null } = {};

      if (body.brightness !== undefined) {
        data.brightness = await push.setBrightness(deviceId, body.brightness);
      }

      if (body.pinnedApp !== undefined) {
        if (body.pinnedApp === null) {
          const device = await installations.requireDevice(deviceId);
          if (device.pinnedApp) {
            await installations.setPinned(deviceId, device.pinnedApp, false);
          }
        } else {
          await installations.setPinned(deviceId, body.pinnedApp, true);
        }
        data.pinnedApp = body.pinnedApp;
      }

      res.json({ success: true, message: "Device updated", data });
    } catch (error) {
      next(error);
    }
  };

  return { pushImage, pushApp, patchDevice };
}
