import { Router } from "express";
import type { Services } from "../services";
import { createPushController } from "../controllers/push.controller";
import { createInstallationController } from "../controllers/installation.controller";
import { validateDeviceId } from "../middleware/validateDeviceId";
import { pushImageUpload } from "../middleware/upload";

/** Management API, mounted at `/v0`. */
export function apiRoutes(services: Services): Router {
  const router = Router();
  const push = createPushController(services);
  const installation = createInstallationController(services);

  router.param("deviceId", (req, res, next) => validateDeviceId(req, res, next));

  // Push an image (JSON base64 or multipart)
  router.post("/devices/:deviceId/push", pushImageUpload, push.pushImage);

  // Render an app once and push it
  router.post("/devices/:deviceId/push_app", push.pushApp);

  // Brightness / pinned app
  router.patch("/devices/:deviceId", push.patchDevice);

  // Remove a device and its image cache
  router.delete("/devices/:deviceId", installation.deleteDevice);

  // Installations
  router.post("/devices/:deviceId/installations", installation.createInstallation);
  router.patch("/devices/:deviceId/installations/:iname", installation.updateInstallation);
  router.delete("/devices/:deviceId/installations/:iname", installation.deleteInstallation);

  return router;
}
