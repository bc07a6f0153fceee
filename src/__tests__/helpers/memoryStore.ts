import type { IApp, IDevice } from "../../models/Device";
import type { AppPatch, DeviceInfoPatch, DevicePatch, DeviceStore } from "../../services/deviceStore";
import { StorageWriteError } from "../../utils/errors";

export type StoreWrite =
  | { op: "updateDevice"; deviceId: string; patch: DevicePatch }
  | { op: "updateDeviceInfo"; deviceId: string; patch: DeviceInfoPatch }
  | { op: "updateApp"; deviceId: string; iname: string; patch: AppPatch; devicePatch: DevicePatch }
  | { op: "addApp"; deviceId: string; app: IApp }
  | { op: "removeApp"; deviceId: string; iname: string }
  | { op: "setAppOrders"; deviceId: string; orders: Map<string, number> }
  | { op: "deleteDevice"; deviceId: string };

function defined(patch: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(patch).filter(([, value]) => value !== undefined));
}

/** DeviceStore over a Map; reads return deep copies like a database would. */
export class InMemoryDeviceStore implements DeviceStore {
  readonly writes: StoreWrite[] = [];
  failWrites = false;
  /** Number of upcoming reads to reject. */
  failReads = 0;
  private readonly devices = new Map<string, IDevice>();

  constructor(devices: IDevice[] = []) {
    for (const device of devices) this.put(device);
  }

  put(device: IDevice): void {
    this.devices.set(device.deviceId, structuredClone(device));
  }

  peek(deviceId: string): IDevice | undefined {
    return this.devices.get(deviceId);
  }

  async getDevice(deviceId: string): Promise<IDevice | null> {
    if (this.failReads > 0) {
      this.failReads--;
      throw new Error("read failed");
    }
    const device = this.devices.get(deviceId);
    return device ? structuredClone(device) : null;
  }

  async listDeviceIds(): Promise<string[]> {
    return [...this.devices.keys()];
  }

  async updateDevice(deviceId: string, patch: DevicePatch): Promise<void> {
    this.writes.push({ op: "updateDevice", deviceId, patch });
    Object.assign(this.require(deviceId), defined(patch));
  }

  async updateDeviceInfo(deviceId: string, patch: DeviceInfoPatch): Promise<void> {
    this.writes.push({ op: "updateDeviceInfo", deviceId, patch });
    const device = this.require(deviceId);
    device.info = Object.assign({}, device.info, defined(patch));
  }

  async updateApp(deviceId: string, iname: string, patch: AppPatch, devicePatch: DevicePatch = {}): Promise<void> {
    this.writes.push({ op: "updateApp", deviceId, iname, patch, devicePatch });
    const device = this.require(deviceId);
    const app = device.apps.find(candidate => candidate.iname === iname);
    if (!app) throw new StorageWriteError(`No app ${iname}`);
    Object.assign(app, defined(patch));
    Object.assign(device, defined(devicePatch));
  }

  async addApp(deviceId: string, app: IApp): Promise<void> {
    this.writes.push({ op: "addApp", deviceId, app });
    const device = this.require(deviceId);
    if (device.apps.some(candidate => candidate.iname === app.iname)) {
      throw new StorageWriteError(`App ${app.iname} exists`);
    }
    device.apps.push(structuredClone(app));
  }

  async removeApp(deviceId: string, iname: string): Promise<void> {
    this.writes.push({ op: "removeApp", deviceId, iname });
    const device = this.require(deviceId);
    device.apps = device.apps.filter(app => app.iname !== iname);
  }

  async setAppOrders(deviceId: string, orders: ReadonlyMap<string, number>): Promise<void> {
    this.writes.push({ op: "setAppOrders", deviceId, orders: new Map(orders) });
    const device = this.require(deviceId);
    for (const app of device.apps) {
      const order = orders.get(app.iname);
      if (order !== undefined) app.order = order;
    }
  }

  async deleteDevice(deviceId: string): Promise<boolean> {
    this.writes.push({ op: "deleteDevice", deviceId });
    return this.devices.delete(deviceId);
  }

  private require(deviceId: string): IDevice {
    if (this.failWrites) throw new StorageWriteError("write failed");
    const device = this.devices.get(deviceId);
    if (!device) throw new StorageWriteError(`No device ${deviceId}`);
    return device;
  }
}
