import { normalizeAllDevices } from "../normalize-app-order";
import { makeApp, makeDevice } from "../../__tests__/helpers/fixtures";
import { createHarness } from "../../__tests__/helpers/harness";

describe("normalizeAllDevices", () => {
  it("renumbers gapped devices and counts failures", async () => {
    const harness = createHarness([
      makeDevice({
        deviceId: "aaaa0001",
        apps: [makeApp({ iname: "100", order: 0 }), makeApp({ iname: "101", order: 4 }), makeApp({ iname: "102", order: 9 })],
      }),
      makeDevice({ deviceId: "aaaa0002", apps: [makeApp({ iname: "100", order: 0 }), makeApp({ iname: "101", order: 1 })] }),
    ]);

    const summary = await normalizeAllDevices(harness.services.installations, ["aaaa0001", "aaaa0002", "cafebabe"]);

    expect(summary).toEqual({ devices: 3, devicesChanged: 1, appsRenumbered: 2, failures: 1 });
    expect(harness.store.peek("aaaa0001")?.apps.map(app => app.order)).toEqual([0, 1, 2]);
    await harness.cleanup();
  });
});
