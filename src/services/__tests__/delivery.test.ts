import type { IDevice } from "../../models/Device";
import { DEFAULT_IMAGE, DEVICE_ID, makeApp, makeDevice } from "../../__tests__/helpers/fixtures";
import { PUSH_DWELL_SECS, createHarness } from "../../__tests__/helpers/harness";
import type { Harness } from "../../__tests__/helpers/harness";

describe("DeliveryService", () => {
  let harness: Harness;

  const setup = (overrides: Partial<IDevice>): void => {
    harness = createHarness([makeDevice(overrides)]);
  };
  const load = async (): Promise<IDevice> => {
    const device = await harness.store.getDevice(DEVICE_ID);
    if (!device) throw new Error("device missing");
    return device;
  };

  afterEach(() => harness.cleanup());

  describe("computeNextFrame", () => {
    it("serves the default image when no apps are installed", async () => {
      setup({ apps: [] });
      const frame = await harness.services.delivery.computeNextFrame(await load());

      expect(frame).toEqual({
        image: DEFAULT_IMAGE,
        brightness: 50,
        dwellSecs: 15,
        immediate: false,
        app: null,
        isDefault: true,
      });
    });

    it("serves the default image when brightness is 0", async () => {
      setup({ brightness: 0, apps: [makeApp({ iname: "100" })] });
      const frame = await harness.services.delivery.computeNextFrame(await load());

      expect(frame.isDefault).toBe(true);
      expect(harness.renderer.requests).toHaveLength(0);
    });

    it("serves the next app with its own dwell time", async () => {
      setup({ lastAppIndex: 1, apps: [makeApp({ iname: "100", displayTime: 8 }), makeApp({ iname: "101", order: 1 })] });
      const frame = await harness.services.delivery.computeNextFrame(await load());

      expect(frame.image).toEqual(Buffer.from("img:100.star"));
      expect(frame.app?.iname).toBe("100");
      expect(frame.dwellSecs).toBe(8);
      expect(frame.isDefault).toBe(false);
    });

    it("serves the default image when nothing in the rotation can be shown", async () => {
      setup({ apps: [makeApp({ iname: "100", enabled: false })] });
      const frame = await harness.services.delivery.computeNextFrame(await load());

      expect(frame.isDefault).toBe(true);
      expect(frame.image).toEqual(DEFAULT_IMAGE);
    });

    it("serves a one-shot pushed image before the rotation, once", async () => {
      setup({ apps: [makeApp({ iname: "100" })] });
      await harness.services.images.savePushedImage(DEVICE_ID, undefined, Buffer.from("once"));

      const first = await harness.services.delivery.computeNextFrame(await load());
      expect(first.image).toEqual(Buffer.from("once"));
      expect(first.app).toBeNull();

      const second = await harness.services.delivery.computeNextFrame(await load());
      expect(second.image).toEqual(Buffer.from("img:100.star"));
    });
  });

  describe("computeCurrentFrame", () => {
    it("serves the app on screen", async () => {
      setup({ displayingApp: "101", apps: [makeApp({ iname: "100" }), makeApp({ iname: "101", order: 1 })] });
      const device = await load();
      await harness.services.images.writeAppImage(DEVICE_ID, device.apps[1], Buffer.from("on-screen"));

      const frame = await harness.services.delivery.computeCurrentFrame(device);
      expect(frame.image).toEqual(Buffer.from("on-screen"));
      expect(harness.renderer.requests).toHaveLength(0);
    });

    it("falls back to the app at the cursor without advancing", async () => {
      setup({ lastAppIndex: 1, apps: [makeApp({ iname: "100" }), makeApp({ iname: "101", order: 1 })] });

      const frame = await harness.services.delivery.computeCurrentFrame(await load());
      expect(frame.app?.iname).toBe("101");
      expect(harness.store.peek(DEVICE_ID)?.lastAppIndex).toBe(1);
    });
  });

  it("returns null for an app that has never rendered", async () => {
    setup({ apps: [makeApp({ iname: "100" })] });
    const device = await load();
    expect(await harness.services.delivery.computeAppFrame(device, device.apps[0])).toBeNull();
  });

  it("builds immediate frames with the push dwell time", async () => {
    setup({ brightness: 40 });
    const frame = harness.services.delivery.immediateFrame(await load(), Buffer.from("now"));

    expect(frame).toEqual({
      image: Buffer.from("now"),
      brightness: 40,
      dwellSecs: PUSH_DWELL_SECS,
      immediate: true,
      app: null,
      isDefault: false,
    });
  });
});
