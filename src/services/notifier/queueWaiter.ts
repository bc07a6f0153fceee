import { AsyncEvent } from "../../utils/asyncEvent";
import type { NotifierPayload, Waiter } from "./types";

const MAX_PENDING = 8;

/** Waiter backed by a bounded in-memory queue; the oldest entry is dropped on overflow. */
export class QueueWaiter implements Waiter {
  private readonly pending: NotifierPayload[] = [];
  private readonly event = new AsyncEvent();
  private closed = false;

  constructor(private readonly onClose: (waiter: QueueWaiter) => Promise<void> | void) {}

  push(payload: NotifierPayload): void {
    if (this.closed) return;
    this.pending.push(payload);
    if (this.pending.length > MAX_PENDING) {
      this.pending.shift();
    }
    this.event.set();
  }

  wait(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    return this.event.wait(timeoutMs, signal);
  }

  take(): NotifierPayload | undefined {
    const payload = this.pending.shift();
    if (this.pending.length === 0) {
      this.event.clear();
    }
    return payload;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.pending.length = 0;
    this.event.clear();
    await this.onClose(this);
  }
}
