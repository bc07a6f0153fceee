import type { Notifier, NotifierPayload, Waiter } from "./types";
import { QueueWaiter } from "./queueWaiter";
import { decodePayload, encodePayload } from "./codec";
import { errorMessage } from "../../utils/errors";
import { logger as rootLogger } from "../../utils/logger";

const logger = rootLogger.child({ service: "redis-notifier" });

export const CHANNEL_PREFIX = "tronbyt:device:";

/** The part of an ioredis client the publisher side needs. */
export interface RedisPublisher {
  publish(channel: string, message: string): Promise<number>;
  quit(): Promise<unknown>;
}

/** The part of an ioredis client in subscriber mode the notifier needs. */
export interface RedisSubscriber {
  subscribe(...channels: string[]): Promise<unknown>;
  unsubscribe(...channels: string[]): Promise<unknown>;
  on(event: "message", listener: (channel: string, message: string) => void): unknown;
  quit(): Promise<unknown>;
}

/**
 * Pub/sub notifier for deployments with several server processes. Each
 * process subscribes to a device's channel while it has a session for that
 * device, and fans incoming messages out to its local waiters.
 */
export class RedisNotifier implements Notifier {
  private readonly waiters = new Map<string, Set<QueueWaiter>>();
  /** Subscription per device, settled or in flight; dropped when it fails or the last waiter leaves. */
  private readonly subscriptions = new Map<string, Promise<void>>();

  constructor(
    private readonly publisher: RedisPublisher,
    private readonly subscriber: RedisSubscriber
  ) {
    this.subscriber.on("message", (channel, message) => this.dispatch(channel, message));
  }

  /** Resolves once this process is subscribed to the device's channel. */
  async getWaiter(deviceId: string): Promise<Waiter> {
    for (;;) {
      const subscription = this.subscribe(deviceId);
      await subscription;
      // The last waiter may have left while the subscribe was in flight
      if (this.subscriptions.get(deviceId) !== subscription) continue;

      const waiter = new QueueWaiter(closed => this.release(deviceId, closed));
      let group = this.waiters.get(deviceId);
      if (!group) {
        group = new Set();
        this.waiters.set(deviceId, group);
      }
      group.add(waiter);
      return waiter;
    }
  }

  async notify(deviceId: string, payload: NotifierPayload = { type: "refresh" }): Promise<boolean> {
    const receivers = await this.publisher.publish(CHANNEL_PREFIX + deviceId, encodePayload(payload));
    return receivers > 0;
  }

  async close(): Promise<void> {
    this.waiters.clear();
    this.subscriptions.clear();
    await Promise.all([this.subscriber.quit(), this.publisher.quit()]);
  }

  private dispatch(channel: string, message: string): void {
    if (!channel.startsWith(CHANNEL_PREFIX)) return;
    const deviceId = channel.slice(CHANNEL_PREFIX.length);
    const group = this.waiters.get(deviceId);
    if (!group) return;

    const payload = decodePayload(message);
    if (!payload) {
      logger.warn({ deviceId }, "Dropping malformed notification");
      return;
    }
    for (const waiter of group) {
      waiter.push(payload);
    }
  }

  private subscribe(deviceId: string): Promise<void> {
    const existing = this.subscriptions.get(deviceId);
    if (existing) return existing;

    const subscription = this.subscriber.subscribe(CHANNEL_PREFIX + deviceId).then(
      () => undefined,
      (error: unknown) => {
        if (this.subscriptions.get(deviceId) === subscription) {
          this.subscriptions.delete(deviceId);
        }
        logger.error({ deviceId, error: errorMessage(error) }, "Failed to subscribe");
        throw error;
      }
    );
    this.subscriptions.set(deviceId, subscription);
    return subscription;
  }

  private async release(deviceId: string, waiter: QueueWaiter): Promise<void> {
    const group = this.waiters.get(deviceId);
    if (!group) return;
    group.delete(waiter);
    if (group.size > 0) return;

    this.waiters.delete(deviceId);
    this.subscriptions.delete(deviceId);
    try {
      await this.subscriber.unsubscribe(CHANNEL_PREFIX + deviceId);
    } catch (error) {
      logger.error({ deviceId, error: errorMessage(error) }, "Failed to unsubscribe");
    }
  }
}
