import { Redis } from "ioredis";
import type { AppConfig } from "../../config";
import { LocalNotifier } from "./local";
import { RedisNotifier } from "./redis";
import type { Notifier } from "./types";
import { logger as rootLogger } from "../../utils/logger";

export type { Notifier, NotifierPayload, Waiter } from "./types";
export { LocalNotifier } from "./local";
export { RedisNotifier } from "./redis";

const logger = rootLogger.child({ service: "notifier" });

export function createNotifier(config: Pick<AppConfig, "notifierBackend" | "redisUrl">): Notifier {
  if (config.notifierBackend === "local") {
    logger.info("Using in-process notifier");
    return new LocalNotifier();
  }

  const publisher = new Redis(config.redisUrl);
  const subscriber = new Redis(config.redisUrl);
  publisher.on("error", (error: Error) => logger.error({ error: error.message }, "Redis publisher error"));
  subscriber.on("error", (error: Error) => logger.error({ error: error.message }, "Redis subscriber error"));
  logger.info("Using Redis notifier");
  return new RedisNotifier(publisher, subscriber);
}
