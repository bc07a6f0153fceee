import { z } from "zod";

/**
 * Device WebSocket wire format.
 *
 * Client frames are JSON objects told apart by which key they carry; every
 * shape below decodes into one `ClientMessage` variant.
 */

const sequence = z.number().int();

const queuedSchema = z.object({ queued: sequence });
const displayingSchema = z.object({ displaying: sequence });
const statusDisplayingSchema = z.object({ status: z.literal("displaying"), counter: sequence });
const clientInfoSchema = z.object({
  client_info: z
    .object({
      firmware_version: z.string().optional(),
      firmware_type: z.string().optional(),
      protocol_version: z.number().int().optional(),
      mac_address: z.string().optional(),
      mac: z.string().optional(),
    })
    .passthrough(),
});

export interface ClientInfo {
  firmwareVersion?: string;
  firmwareType?: string;
  protocolVersion?: number;
  macAddress?: string;
}

export type ClientMessage =
  | { kind: "queued"; seq: number }
  | { kind: "displaying"; seq: number }
  | { kind: "client_info"; info: ClientInfo };

export type ServerMessage =
  | { dwell_secs: number }
  | { brightness: number }
  | { immediate: true }
  | { status: string; message: string };

export type ParseResult = { ok: true; message: ClientMessage } | { ok: false; error: string };

export function parseClientMessage(raw: string): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, error: "invalid JSON" };
  }

  const displaying = displayingSchema.safeParse(json);
  if (displaying.success) {
    return { ok: true, message: { kind: "displaying", seq: displaying.data.displaying } };
  }

  const status = statusDisplayingSchema.safeParse(json);
  if (status.success) {
    return { ok: true, message: { kind: "displaying", seq: status.data.counter } };
  }

  const queued = queuedSchema.safeParse(json);
  if (queued.success) {
    return { ok: true, message: { kind: "queued", seq: queued.data.queued } };
  }

  const clientInfo = clientInfoSchema.safeParse(json);
  if (clientInfo.success) {
    const info = clientInfo.data.client_info;
    return {
      ok: true,
      message: {
        kind: "client_info",
        info: {
          firmwareVersion: info.firmware_version,
          firmwareType: info.firmware_type,
          protocolVersion: info.protocol_version,
          macAddress: info.mac_address ?? info.mac,
        },
      },
    };
  }

  return { ok: false, error: "unrecognized message" };
}

export function encodeServerMessage(message: ServerMessage): string {
  return JSON.stringify(message);
}
