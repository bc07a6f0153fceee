import { AsyncEvent } from "../asyncEvent";

describe("AsyncEvent", () => {
  it("resolves immediately once set", async () => {
    const event = new AsyncEvent();
    event.set();
    expect(event.isSet()).toBe(true);
    await expect(event.wait(1000)).resolves.toBe(true);
  });

  it("wakes a pending waiter when set", async () => {
    const event = new AsyncEvent();
    const waiting = event.wait(1000);
    event.set();
    await expect(waiting).resolves.toBe(true);
  });

  it("resolves false on timeout", async () => {
    await expect(new AsyncEvent().wait(10)).resolves.toBe(false);
  });

  it("resolves false when aborted", async () => {
    const event = new AsyncEvent();
    const controller = new AbortController();
    const waiting = event.wait(1000, controller.signal);
    controller.abort();
    await expect(waiting).resolves.toBe(false);
    await expect(event.wait(1000, controller.signal)).resolves.toBe(false);
  });

  it("blocks again after clear", async () => {
    const event = new AsyncEvent();
    event.set();
    event.clear();
    expect(event.isSet()).toBe(false);
    await expect(event.wait(10)).resolves.toBe(false);
  });
});
