import mongoose, { Schema } from "mongoose";

/**
 * Device Model
 *
 * A pixel display owned by a user. Installed apps are embedded sub-documents,
 * so every rotation-cursor, pin and render-outcome write is a single `$set`
 * on one document.
 */

export const DEVICE_TYPES = [
  "tidbyt_gen1",
  "tidbyt_gen2",
  "tronbyt_s3",
  "tronbyt_s3_wide",
  "raspberrypi",
  "raspberrypi_wide",
  "matrixportal",
  "other",
] as const;

export type DeviceType = (typeof DEVICE_TYPES)[number];

export const RECURRENCE_TYPES = ["daily", "weekly", "monthly", "yearly"] as const;

export type RecurrenceType = (typeof RECURRENCE_TYPES)[number];

export type ProtocolType = "HTTP" | "WS";

export interface IRecurrencePattern {
  /** Lower-case weekday names, used by weekly recurrence. */
  weekdays?: string[];
  /** 1-31, used by monthly recurrence. */
  dayOfMonth?: number;
  /** `<first|second|third|fourth|last>_<weekday>`, used by monthly recurrence. */
  dayOfWeek?: string;
}

export interface IApp {
  iname: string;
  name: string;
  /** Source path relative to the data directory; `.webp` paths are static images. */
  path?: string | null;
  order: number;
  /** Minutes between renders. 0 renders on every pass. */
  uinterval: number;
  /** Seconds on screen. 0 falls back to the device default. */
  displayTime: number;
  enabled: boolean;
  pushed: boolean;
  lastRender?: Date | null;
  emptyLastRender: boolean;
  startTime?: string | null;
  endTime?: string | null;
  days: string[];
  useCustomRecurrence: boolean;
  recurrenceType?: RecurrenceType | null;
  recurrenceInterval: number;
  recurrencePattern?: IRecurrencePattern | null;
  recurrenceStartDate?: string | null;
  recurrenceEndDate?: string | null;
  autopin: boolean;
  config: Record<string, unknown>;
}

export interface IDeviceInfo {
  protocolType?: ProtocolType | null;
  protocolVersion?: number | null;
  firmwareVersion?: string | null;
  firmwareType?: string | null;
  macAddress?: string | null;
}

export interface IDevice {
  deviceId: string;
  username: string;
  name: string;
  type: DeviceType;
  brightness: number;
  nightBrightness: number;
  dimBrightness?: number | null;
  nightModeEnabled: boolean;
  nightModeApp?: string | null;
  nightStart?: string | null;
  nightEnd?: string | null;
  dimTime?: string | null;
  defaultInterval: number;
  timezone?: string | null;
  locale?: string | null;
  lastAppIndex: number;
  pinnedApp?: string | null;
  displayingApp?: string | null;
  interstitialEnabled: boolean;
  interstitialApp?: string | null;
  lastSeen?: Date | null;
  info: IDeviceInfo;
  apps: IApp[];
}

const RecurrencePatternSchema = new Schema<IRecurrencePattern>(
  {
    weekdays: { type: [String], default: undefined },
    dayOfMonth: { type: Number, min: 1, max: 31 },
    dayOfWeek: { type: String, trim: true },
  },
  { _id: false }
);

const AppSchema = new Schema<IApp>(
  {
    iname: {
      type: String,
      required: [true, "App iname is required"],
      trim: true,
    },
    name: {
      type: String,
      required: [true, "App name is required"],
      trim: true,
    },
    path: { type: String, default: null },
    order: { type: Number, default: 0 },
    uinterval: { type: Number, default: 0, min: 0 },
    displayTime: { type: Number, default: 0, min: 0 },
    enabled: { type: Boolean, default: true },
    pushed: { type: Boolean, default: false },
    lastRender: { type: Date, default: null },
    emptyLastRender: { type: Boolean, default: false },
    startTime: { type: String, default: null },
    endTime: { type: String, default: null },
    days: { type: [String], default: [] },
    useCustomRecurrence: { type: Boolean, default: false },
    recurrenceType: {
      type: String,
      enum: {
        values: [...RECURRENCE_TYPES, null],
        message: "Recurrence type must be daily, weekly, monthly or yearly",
      },
      default: null,
    },
    recurrenceInterval: { type: Number, default: 1, min: 1 },
    recurrencePattern: { type: RecurrencePatternSchema, default: null },
    recurrenceStartDate: { type: String, default: null },
    recurrenceEndDate: { type: String, default: null },
    autopin: { type: Boolean, default: false },
    config: { type: Schema.Types.Mixed, default: {} },
  },
  { _id: false, minimize: false }
);

const DeviceInfoSchema = new Schema<IDeviceInfo>(
  {
    protocolType: { type: String, enum: ["HTTP", "WS", null], default: null },
    protocolVersion: { type: Number, default: null },
    firmwareVersion: { type: String, default: null },
    firmwareType: { type: String, default: null },
    macAddress: { type: String, default: null },
  },
  { _id: false }
);

const DeviceSchema = new Schema<IDevice>(
  {
    deviceId: {
      type: String,
      required: [true, "Device ID is required"],
      unique: true,
      match: [/^[0-9a-fA-F]{8}$/, "Device ID must be 8 hex characters"],
    },
    username: {
      type: String,
      required: [true, "Username is required"],
    },
    name: {
      type: String,
      required: [true, "Device name is required"],
      trim: true,
    },
    type: {
      type: String,
      enum: {
        values: [...DEVICE_TYPES],
        message: "Unknown device type",
      },
      default: "tidbyt_gen1",
    },
    brightness: { type: Number, default: 20, min: 0, max: 100 },
    nightBrightness: { type: Number, default: 0, min: 0, max: 100 },
    dimBrightness: { type: Number, default: null, min: 0, max: 100 },
    nightModeEnabled: { type: Boolean, default: false },
    nightModeApp: { type: String, default: null },
    nightStart: { type: String, default: null },
    nightEnd: { type: String, default: null },
    dimTime: { type: String, default: null },
    defaultInterval: { type: Number, default: 15, min: 1 },
    timezone: { type: String, default: null },
    locale: { type: String, default: null },
    lastAppIndex: { type: Number, default: 0 },
    pinnedApp: { type: String, default: null },
    displayingApp: { type: String, default: null },
    interstitialEnabled: { type: Boolean, default: false },
    interstitialApp: { type: String, default: null },
    lastSeen: { type: Date, default: null },
    info: { type: DeviceInfoSchema, default: () => ({}) },
    apps: { type: [AppSchema], default: [] },
  },
  {
    timestamps: true,
  }
);

// Indexes
DeviceSchema.index({ username: 1 });

const Device: mongoose.Model<IDevice> =
  mongoose.models.Device || mongoose.model<IDevice>("Device", DeviceSchema);

export default Device;
