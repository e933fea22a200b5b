import { ExitScreen } from "../ExitScreen";
import { Display } from "@services/oled/Display";
import { BitmapUtils } from "@services/oled/BitmapUtils";
import { MockOledDriver } from "@services/oled/drivers";
import { createFakeFonts } from "./fakeFonts";

describe("ExitScreen", () => {
  it("should show GOOD BYE on a single line", async () => {
    const driver = new MockOledDriver(128, 32);
    const display = await Display.open(driver);
    const { rasterizer, fonts } = createFakeFonts();
    const screen = new ExitScreen({ display, duration: 0, fonts });

    await screen.run();

    expect(screen.textLines).toBe(1);
    expect(rasterizer.load).toHaveBeenCalledWith(14, false);
    expect(driver.displayCount).toBe(2);
    const shown = driver.getLastImage();
    expect(shown).not.toBeNull();
    if (shown) {
      // "GOOD BYE" is eight characters of two pixels each
      expect(BitmapUtils.countLitPixels(shown)).toBe(32);
      expect(BitmapUtils.getPixel(shown, 15, 1)).toBe(true);
      expect(BitmapUtils.getPixel(shown, 16, 0)).toBe(false);
    }
  });
});
