import type { Notifier, NotifierPayload, Waiter } from "./types";
import { QueueWaiter } from "./queueWaiter";

/**
 * In-process notifier. Waiters are grouped per device and the group is
 * dropped when its last waiter closes.
 */
export class LocalNotifier implements Notifier {
  private readonly waiters = new Map<string, Set<QueueWaiter>>();

  async getWaiter(deviceId: string): Promise<Waiter> {
    const waiter = new QueueWaiter(closed => this.release(deviceId, closed));
    let group = this.waiters.get(deviceId);
    if (!group) {
      group = new Set();
      this.waiters.set(deviceId, group);
    }
    group.add(waiter);
    return waiter;
  }

  async notify(deviceId: string, payload: NotifierPayload = { type: "refresh" }): Promise<boolean> {
    const group = this.waiters.get(deviceId);
    if (!group || group.size === 0) return false;
    for (const waiter of group) {
      waiter.push(payload);
    }
    return true;
  }

  listenerCount(deviceId: string): number {
    return this.waiters.get(deviceId)?.size ?? 0;
  }

  async close(): Promise<void> {
    const all = [...this.waiters.values()].flatMap(group => [...group]);
    await Promise.all(all.map(waiter => waiter.close()));
    this.waiters.clear();
  }

  private release(deviceId: string, waiter: QueueWaiter): void {
    const group = this.waiters.get(deviceId);
    if (!group) return;
    group.delete(waiter);
    if (group.size === 0) {
      this.waiters.delete(deviceId);
    }
  }
}
