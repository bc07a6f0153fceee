import fs from "fs/promises";
import path from "path";
import type { IApp } from "../models/Device";
import { isValidDeviceId } from "./deviceState";
import { InvalidDeviceIdError, errorMessage } from "../utils/errors";
import { logger as rootLogger } from "../utils/logger";

const logger = rootLogger.child({ service: "image-store" });

const PUSHED_DIR = "pushed";
const EPHEMERAL_PREFIX = "__";

/**
 * On-disk WebP cache.
 *
 * Layout under `<dataDir>/webp/<deviceId>/`:
 * - `<name>-<iname>.webp`   last render of an installed app
 * - `pushed/<iname>.webp`   image pushed for a pushed installation
 * - `pushed/__<n>.webp`     one-shot image, served once then deleted
 */
export class ImageStore {
  private defaultImage: Buffer | null = null;
  private ephemeralCounter = 0;

  constructor(
    private readonly dataDir: string,
    private readonly defaultImagePath: string
  ) {}

  deviceDir(deviceId: string): string {
    if (!isValidDeviceId(deviceId)) {
      throw new InvalidDeviceIdError(deviceId);
    }
    return path.join(this.dataDir, "webp", deviceId);
  }

  appImagePath(deviceId: string, app: IApp): string {
    const dir = this.deviceDir(deviceId);
    if (app.pushed) {
      return path.join(dir, PUSHED_DIR, `${safeSegment(app.iname)}.webp`);
    }
    return path.join(dir, `${safeSegment(app.name)}-${safeSegment(app.iname)}.webp`);
  }

  /** True when the app has a non-empty cached image. */
  async hasImage(deviceId: string, app: IApp): Promise<boolean> {
    try {
      const stats = await fs.stat(this.appImagePath(deviceId, app));
      return stats.isFile() && stats.size > 0;
    } catch {
      return false;
    }
  }

  async readAppImage(deviceId: string, app: IApp): Promise<Buffer | null> {
    try {
      const data = await fs.readFile(this.appImagePath(deviceId, app));
      return data.length > 0 ? data : null;
    } catch (error) {
      logger.debug({ deviceId, iname: app.iname, error: errorMessage(error) }, "No cached image for app");
      return null;
    }
  }

  async writeAppImage(deviceId: string, app: IApp, data: Buffer): Promise<void> {
    const target = this.appImagePath(deviceId, app);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, data);
  }

  async removeAppImage(deviceId: string, app: IApp): Promise<void> {
    await fs.rm(this.appImagePath(deviceId, app), { force: true });
  }

  /** Copies a static `.webp` app into the cache unless it is already there. */
  async ensureStaticCopy(deviceId: string, app: IApp, sourcePath: string): Promise<boolean> {
    if (await this.hasImage(deviceId, app)) {
      return true;
    }
    try {
      const data = await fs.readFile(sourcePath);
      await this.writeAppImage(deviceId, app, data);
      return data.length > 0;
    } catch (error) {
      logger.warn({ deviceId, sourcePath, error: errorMessage(error) }, "Static WebP source not readable");
      return false;
    }
  }

  /**
   * Stores a pushed image. With an installation id it becomes that pushed app's
   * image; without one it is queued as a one-shot image.
   */
  async savePushedImage(deviceId: string, installationId: string | undefined, data: Buffer): Promise<string> {
    const dir = path.join(this.deviceDir(deviceId), PUSHED_DIR);
    await fs.mkdir(dir, { recursive: true });

    const filename = installationId
      ? `${safeSegment(installationId)}.webp`
      : `${EPHEMERAL_PREFIX}${Date.now()}-${String(this.ephemeralCounter++).padStart(4, "0")}.webp`;
    const target = path.join(dir, filename);
    await fs.writeFile(target, data);
    return target;
  }

  /** Returns the oldest one-shot image for the device and deletes it. */
  async takeEphemeralImage(deviceId: string): Promise<Buffer | null> {
    const dir = path.join(this.deviceDir(deviceId), PUSHED_DIR);
    let entries: string[];
    try {
      entries = await fs.readdir(dir);
    } catch {
      return null;
    }

    const candidates = entries.filter(name => name.startsWith(EPHEMERAL_PREFIX)).sort();
    for (const name of candidates) {
      const fullPath = path.join(dir, name);
      try {
        const data = await fs.readFile(fullPath);
        await fs.rm(fullPath, { force: true });
        return data;
      } catch (error) {
        logger.error({ deviceId, path: fullPath, error: errorMessage(error) }, "Failed to consume ephemeral image");
      }
    }
    return null;
  }

  async purgeDevice(deviceId: string): Promise<void> {
    await fs.rm(this.deviceDir(deviceId), { recursive: true, force: true });
  }

  async readDefaultImage(): Promise<Buffer> {
    if (!this.defaultImage) {
      this.defaultImage = await fs.readFile(this.defaultImagePath);
    }
    return this.defaultImage;
  }

  resolveSourcePath(relativePath: string): string | null {
    const root = path.resolve(this.dataDir);
    const resolved = path.resolve(root, relativePath);
    if (resolved !== root && !resolved.startsWith(root + path.sep)) {
      logger.error({ path: relativePath }, "App path escapes the data directory");
      return null;
    }
    return resolved;
  }
}

function safeSegment(value: string): string {
  return path.basename(value).replace(/[^A-Za-z0-9_.-]/g, "_");
}
