import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ServiceContainer } from "@di/ServiceContainer";
import { IConfigService } from "@core/interfaces";
import { success } from "@core/types";
import { ConfigService } from "@services/config/ConfigService";
import { MockMetricsService } from "@services/metrics/MockMetricsService";
import { MockI2cAdapter } from "@services/oled/adapters/MockI2cAdapter";
import { FontRegistry } from "@services/screens";
import { createFakeRasterizer } from "@services/screens/__tests__/fakeFonts";

/**
 * Integration Test
 *
 * Runs the wired-up screen loop against the mock I2C bus: config →
 * container → display → status screen → exit screen.
 */
describe("Integration: Container → Rotator → Screens → Panel", () => {
  let tmpDir: string;
  let adapter: MockI2cAdapter;
  let container: ServiceContainer;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "oled-integration-"));

    const config = ConfigService.getDefaultConfig();
    config.display.screenshot = tmpDir;
    config.screens.statusDuration = 0;
    config.screens.exitDuration = 0;
    const configService: IConfigService = {
      initialize: async () => success(undefined),
      getConfig: () => config,
      getOledConfig: () => config.display,
      getHomeAssistantConfig: () => config.homeAssistant,
      getScreensConfig: () => config.screens,
    };

    ServiceContainer.reset();
    container = ServiceContainer.getInstance();
    adapter = new MockI2cAdapter();
    container.setConfigService(configService);
    container.setI2cAdapter(adapter);
    container.setMetricsService(new MockMetricsService());
    container.setFontRegistry(new FontRegistry(createFakeRasterizer()));
  });

  afterEach(() => {
    ServiceContainer.reset();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should render the status screen, then say goodbye and clear on stop", async () => {
    const rotator = await container.getScreenRotator();

    expect(rotator.start().success).toBe(true);
    while (rotator.getCycleCount() < 1) {
      await new Promise((resolve) => setImmediate(resolve));
    }
    adapter.clearLog();
    await rotator.stop();

    expect(fs.existsSync(path.join(tmpDir, "status.png"))).toBe(true);
    expect(fs.existsSync(path.join(tmpDir, "exit.png"))).toBe(true);

    // The last frame is the blank one, 512 bytes on a 128x32 panel
    const data = adapter.getData();
    expect(data.length).toBeGreaterThanOrEqual(1024);
    expect(data.subarray(data.length - 512).every((byte) => byte === 0)).toBe(
      true,
    );
    expect(adapter.getCommands()).toContain(0xaf);
  });
});
