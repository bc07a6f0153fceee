/**
 * Maintenance Script: renumber app orders
 *
 * Removing apps leaves gaps in each device's `order` values. Rotation copes
 * with gaps, but move/reorder operations expect `0..n-1`. This script
 * renumbers every device's apps, keeping their relative order.
 *
 * Usage:
 *   npm run build && npm run normalize-order
 *
 * Safe to run repeatedly; devices that are already contiguous are skipped.
 */

import mongoose from "mongoose";
import { config } from "../config";
import { MongoDeviceStore } from "../services/deviceStore";
import { ImageStore } from "../services/imageStore";
import { InstallationService } from "../services/installations";
import { LocalNotifier } from "../services/notifier";
import { errorMessage } from "../utils/errors";
import { logger as rootLogger } from "../utils/logger";

const logger = rootLogger.child({ service: "normalize-app-order" });

export interface NormalizeSummary {
  devices: number;
  devicesChanged: number;
  appsRenumbered: number;
  failures: number;
}

export async function normalizeAllDevices(installations: InstallationService, deviceIds: string[]): Promise<NormalizeSummary> {
  const summary: NormalizeSummary = { devices: deviceIds.length, devicesChanged: 0, appsRenumbered: 0, failures: 0 };

  for (const deviceId of deviceIds) {
    try {
      const changed = await installations.normalizeOrders(deviceId);
      if (changed > 0) {
        summary.devicesChanged++;
        summary.appsRenumbered += changed;
        logger.info({ deviceId, changed }, "Renumbered apps");
      }
    } catch (error) {
      summary.failures++;
      logger.error({ deviceId, error: errorMessage(error) }, "Failed to renumber apps");
    }
  }
  return summary;
}

async function main(): Promise<void> {
  logger.info("Connecting to MongoDB...");
  await mongoose.connect(config.mongodbUri);

  try {
    const store = new MongoDeviceStore();
    // Sessions live in the server process; nothing here listens for refreshes
    const installations = new InstallationService(
      store,
      new ImageStore(config.dataDir, config.defaultImagePath),
      new LocalNotifier()
    );

    const summary = await normalizeAllDevices(installations, await store.listDeviceIds());
    logger.info(summary, "Normalization complete");
    if (summary.failures > 0) {
      process.exitCode = 1;
    }
  } finally {
    await mongoose.disconnect();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error({ error: errorMessage(error) }, "Normalization failed");
    process.exit(1);
  });
}
