import path from "path";
import { PixletRenderer } from "../renderer";
import { RenderFailureError } from "../../utils/errors";

describe("PixletRenderer", () => {
  it("wraps a failure to run the renderer", async () => {
    const renderer = new PixletRenderer(path.join(__dirname, "no-such-renderer"), 1000);

    await expect(
      renderer.render({
        appPath: "/apps/clock.star",
        config: {},
        context: { output2x: false, dwellSecs: 15 },
      })
    ).rejects.toBeInstanceOf(RenderFailureError);
  });
});
