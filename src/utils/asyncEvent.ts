/**
 * Level-triggered event: once set, every `wait` resolves immediately until
 * `clear` is called.
 */
export class AsyncEvent {
  private flag = false;
  private listeners = new Set<() => void>();

  isSet(): boolean {
    return this.flag;
  }

  set(): void {
    this.flag = true;
    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) {
      listener();
    }
  }

  clear(): void {
    this.flag = false;
  }

  /**
   * Resolves `true` when the event is set, `false` on timeout or abort.
   */
  wait(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    if (this.flag) return Promise.resolve(true);
    if (signal?.aborted) return Promise.resolve(false);

    return new Promise(resolve => {
      const finish = (value: boolean): void => {
        clearTimeout(timer);
        this.listeners.delete(onSet);
        signal?.removeEventListener("abort", onAbort);
        resolve(value);
      };
      const onSet = (): void => finish(true);
      const onAbort = (): void => finish(false);
      const timer = setTimeout(() => finish(false), Math.max(0, timeoutMs));

      this.listeners.add(onSet);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
