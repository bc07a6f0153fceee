import { z } from "zod";
import type { NotifierPayload } from "./types";

const wireSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("image"), image: z.string() }),
  z.object({ type: z.literal("brightness"), brightness: z.number().int().min(0).max(100) }),
  z.object({ type: z.literal("refresh") }),
]);

export function encodePayload(payload: NotifierPayload): string {
  if (payload.type === "image") {
    return JSON.stringify({ type: "image", image: payload.image.toString("base64") });
  }
  return JSON.stringify(payload);
}

/** Returns null for anything that is not a well-formed payload. */
export function decodePayload(raw: string): NotifierPayload | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = wireSchema.safeParse(json);
  if (!parsed.success) return null;

  const message = parsed.data;
  if (message.type === "image") {
    return { type: "image", image: Buffer.from(message.image, "base64") };
  }
  return message;
}
