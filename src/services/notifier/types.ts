/** What a notification carries to a device's session. */
export type NotifierPayload =
  | { type: "image"; image: Buffer }
  | { type: "brightness"; brightness: number }
  | { type: "refresh" };

/**
 * One session's subscription to its device's notifications.
 */
export interface Waiter {
  /** Resolves `true` once a notification is pending, `false` on timeout or abort. */
  wait(timeoutMs: number, signal?: AbortSignal): Promise<boolean>;
  /** Removes and returns the oldest pending notification. */
  take(): NotifierPayload | undefined;
  close(): Promise<void>;
}

export interface Notifier {
  getWaiter(deviceId: string): Promise<Waiter>;
  /**
   * Wakes every waiter of the device. Resolves `true` when at least one
   * listener is known to have received it.
   */
  notify(deviceId: string, payload?: NotifierPayload): Promise<boolean>;
  close(): Promise<void>;
}
