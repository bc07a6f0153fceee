import type { UpdateQuery } from "mongoose";
import Device, { IApp, IDevice, IDeviceInfo } from "../models/Device";
import { StorageWriteError, errorMessage } from "../utils/errors";

export type DevicePatch = Partial<Omit<IDevice, "deviceId" | "apps" | "info">>;
export type AppPatch = Partial<Omit<IApp, "iname">>;
export type DeviceInfoPatch = Partial<IDeviceInfo>;

/**
 * Record store for devices and their installed apps.
 *
 * Every write method is one atomic update of a single device document; callers
 * never read-modify-write a shared device object.
 */
export interface DeviceStore {
  getDevice(deviceId: string): Promise<IDevice | null>;
  listDeviceIds(): Promise<string[]>;
  updateDevice(deviceId: string, patch: DevicePatch): Promise<void>;
  updateDeviceInfo(deviceId: string, patch: DeviceInfoPatch): Promise<void>;
  /** Updates app fields and, in the same write, optional device fields. */
  updateApp(deviceId: string, iname: string, patch: AppPatch, devicePatch?: DevicePatch): Promise<void>;
  addApp(deviceId: string, app: IApp): Promise<void>;
  removeApp(deviceId: string, iname: string): Promise<void>;
  setAppOrders(deviceId: string, orders: ReadonlyMap<string, number>): Promise<void>;
  deleteDevice(deviceId: string): Promise<boolean>;
}

function prefixKeys(prefix: string, patch: object): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) {
      result[`${prefix}${key}`] = value;
    }
  }
  return result;
}

/**
 * Mongoose-backed store. Embedded apps are addressed with the positional
 * operator, or with array filters when several apps change at once.
 */
export class MongoDeviceStore implements DeviceStore {
  async getDevice(deviceId: string): Promise<IDevice | null> {
    return Device.findOne({ deviceId }).lean<IDevice>().exec();
  }

  async listDeviceIds(): Promise<string[]> {
    const devices = await Device.find({}, { deviceId: 1 }).lean<Pick<IDevice, "deviceId">[]>().exec();
    return devices.map(device => device.deviceId);
  }

  async updateDevice(deviceId: string, patch: DevicePatch): Promise<void> {
    await this.write(deviceId, { deviceId }, { $set: prefixKeys("", patch) });
  }

  async updateDeviceInfo(deviceId: string, patch: DeviceInfoPatch): Promise<void> {
    await this.write(deviceId, { deviceId }, { $set: prefixKeys("info.", patch) });
  }

  async updateApp(deviceId: string, iname: string, patch: AppPatch, devicePatch: DevicePatch = {}): Promise<void> {
    await this.write(
      deviceId,
      { deviceId, "apps.iname": iname },
      { $set: { ...prefixKeys("apps.$.", patch), ...prefixKeys("", devicePatch) } }
    );
  }

  async addApp(deviceId: string, app: IApp): Promise<void> {
    await this.write(deviceId, { deviceId, "apps.iname": { $ne: app.iname } }, { $push: { apps: app } });
  }

  async removeApp(deviceId: string, iname: string): Promise<void> {
    await this.write(deviceId, { deviceId }, { $pull: { apps: { iname } } });
  }

  async setAppOrders(deviceId: string, orders: ReadonlyMap<string, number>): Promise<void> {
    if (orders.size === 0) return;

    const $set: Record<string, number> = {};
    const arrayFilters: Record<string, string>[] = [];
    let i = 0;
    for (const [iname, order] of orders) {
      $set[`apps.$[a${i}].order`] = order;
      arrayFilters.push({ [`a${i}.iname`]: iname });
      i++;
    }

    try {
      const result = await Device.updateOne({ deviceId }, { $set }, { arrayFilters }).exec();
      if (result.matchedCount === 0) {
        throw new StorageWriteError(`No device ${deviceId} to reorder`);
      }
    } catch (error) {
      if (error instanceof StorageWriteError) throw error;
      throw new StorageWriteError(`Failed to reorder apps on ${deviceId}: ${errorMessage(error)}`);
    }
  }

  async deleteDevice(deviceId: string): Promise<boolean> {
    const result = await Device.deleteOne({ deviceId }).exec();
    return result.deletedCount > 0;
  }

  private async write(deviceId: string, filter: Record<string, unknown>, update: UpdateQuery<IDevice>): Promise<void> {
    try {
      const result = await Device.updateOne(filter, update).exec();
      if (result.matchedCount === 0) {
        throw new StorageWriteError(`No matching record for device ${deviceId}`);
      }
    } catch (error) {
      if (error instanceof StorageWriteError) throw error;
      throw new StorageWriteError(`Failed to update device ${deviceId}: ${errorMessage(error)}`);
    }
  }
}
