import { Request, Response, NextFunction } from "express";
import { z } from "zod";
import type { Services } from "../services";
import { MOVE_DIRECTIONS } from "../services/installations";

export const createInstallationSchema = z.object({
  name: z.string().min(1),
  path: z.string().min(1).optional(),
  uinterval: z.number().int().min(0).optional(),
  displayTime: z.number().int().min(0).optional(),
  enabled: z.boolean().optional(),
  autopin: z.boolean().optional(),
  startTime: z.string().regex(/^\d{1,2}:\d{2}$/).optional(),
  endTime: z.string().regex(/^\d{1,2}:\d{2}$/).optional(),
  days: z.array(z.string()).optional(),
  config: z.record(z.unknown()).optional(),
});

export const patchInstallationSchema = z.object({
  enabled: z.boolean().optional(),
  pinned: z.boolean().optional(),
  direction: z.enum(MOVE_DIRECTIONS).optional(),
  reorder: z
    .object({
      target: z.string().min(1),
      insertAfter: z.boolean().default(false),
    })
    .optional(),
});

export function createInstallationController(services: Services) {
  const { installations } = services;

  /**
   * POST /v0/devices/:deviceId/installations
   */
  const createInstallation = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId } = req.params;
      const body = createInstallationSchema.parse(req.body);
      const app = await installations.addApp(deviceId, body);
      res.status(201).json({ success: true, message: "App installed", data: app });
    } catch (error) {
      next(error);
    }
  };

  /**
   * PATCH /v0/devices/:deviceId/installations/:iname
   */
  const updateInstallation = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId, iname } = req.params;
      const body = patchInstallationSchema.parse(req.body);

      if (body.enabled !== undefined) {
        await installations.setEnabled(deviceId, iname, body.enabled);
      }
      if (body.pinned !== undefined) {
        await installations.setPinned(deviceId, iname, body.pinned);
      }
      if (body.direction) {
        await installations.moveApp(deviceId, iname, body.direction);
      }
      if (body.reorder) {
        await installations.reorderApps(deviceId, iname, body.reorder.target, body.reorder.insertAfter);
      }

      res.json({ success: true, message: "Installation updated" });
    } catch (error) {
      next(error);
    }
  };

  /**
   * DELETE /v0/devices/:deviceId/installations/:iname
   */
  const deleteInstallation = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId, iname } = req.params;
      await installations.removeApp(deviceId, iname);
      res.json({ success: true, message: "App removed" });
    } catch (error) {
      next(error);
    }
  };

  /**
   * DELETE /v0/devices/:deviceId
   */
  const deleteDevice = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId } = req.params;
      await installations.deleteDevice(deviceId);
      res.json({ success: true, message: "Device deleted" });
    } catch (error) {
      next(error);
    }
  };

  return { createInstallation, updateInstallation, deleteInstallation, deleteDevice };
}
