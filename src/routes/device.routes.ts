import { Router } from "express";
import type { Services } from "../services";
import { createDeviceController } from "../controllers/device.controller";
import { validateDeviceId } from "../middleware/validateDeviceId";

/** Routes polled by devices, mounted at the root. */
export function deviceRoutes(services: Services): Router {
  const router = Router();
  const controller = createDeviceController(services);

  // Next frame in the rotation
  router.get("/:deviceId/next", validateDeviceId, controller.getNextFrame);

  // Frame currently on screen
  router.get("/:deviceId/currentapp", validateDeviceId, controller.getCurrentFrame);

  // One app's last render
  router.get("/:deviceId/:iname/appwebp", validateDeviceId, controller.getAppImage);

  return router;
}
