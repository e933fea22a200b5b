import { ConfigService } from "@services/config/ConfigService";
import { ConfigError, ConfigErrorCode } from "@core/errors";
import * as fs from "fs/promises";

// Mock fs module
jest.mock("fs/promises");

const mockFs = fs as jest.Mocked<typeof fs>;

describe("ConfigService", () => {
  const testConfigPath = "./test-config.json";

  const fileContent = (config: unknown) =>
    mockFs.readFile.mockResolvedValue(JSON.stringify(config));

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe("initialization", () => {
    it("should use the defaults when the file does not exist", async () => {
      mockFs.readFile.mockRejectedValue(new Error("ENOENT: no such file"));
      const configService = new ConfigService(testConfigPath, {});

      const result = await configService.initialize();

      expect(result.success).toBe(true);
      expect(configService.getConfig()).toEqual(
        ConfigService.getDefaultConfig(),
      );
      expect(mockFs.readFile).toHaveBeenCalledWith(testConfigPath, "utf-8");
    });

    it("should merge a partial file over the defaults", async () => {
      fileContent({
        display: { driver: "SSD1309", rotation: 180 },
        homeAssistant: { baseUrl: "http://hass.local:8123" },
      });
      const configService = new ConfigService(testConfigPath, {});

      const result = await configService.initialize();

      expect(result.success).toBe(true);
      expect(configService.getOledConfig()).toEqual({
        driver: "SSD1309",
        busNumber: 1,
        address: 0x3c,
        rotation: 180,
        screenshot: false,
      });
      expect(configService.getHomeAssistantConfig()).toEqual({
        baseUrl: "http://hass.local:8123",
        token: "",
        timeoutMs: 5000,
      });
      expect(configService.getScreensConfig()).toEqual({
        statusDuration: 10,
        exitDuration: 2,
      });
    });

    it("should only load once", async () => {
      mockFs.readFile.mockRejectedValue(new Error("ENOENT: no such file"));
      const configService = new ConfigService(testConfigPath, {});

      await configService.initialize();
      await configService.initialize();

      expect(mockFs.readFile).toHaveBeenCalledTimes(1);
    });

    it("should fail on a read error other than a missing file", async () => {
      mockFs.readFile.mockRejectedValue(new Error("EACCES: permission denied"));
      const configService = new ConfigService(testConfigPath, {});

      const result = await configService.initialize();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(ConfigError);
        expect(result.error).toMatchObject({
          code: ConfigErrorCode.FILE_READ_ERROR,
        });
      }
    });

    it("should fail on malformed JSON and keep the defaults", async () => {
      mockFs.readFile.mockResolvedValue("{ not json");
      const configService = new ConfigService(testConfigPath, {});

      const result = await configService.initialize();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toMatchObject({
          code: ConfigErrorCode.INVALID_JSON,
        });
      }
      expect(configService.getConfig()).toEqual(
        ConfigService.getDefaultConfig(),
      );
    });

    it("should reject values of the wrong type", async () => {
      fileContent({ display: { busNumber: "one" } });
      const configService = new ConfigService(testConfigPath, {});

      const result = await configService.initialize();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toMatchObject({
          code: ConfigErrorCode.INVALID_CONFIG,
        });
        expect(result.error.message).toBe(
          "Invalid configuration: display.busNumber: Bus number must be a number",
        );
      }
    });

    it("should reject an address outside the 7-bit range", async () => {
      fileContent({ display: { address: 0x78 } });
      const configService = new ConfigService(testConfigPath, {});

      const result = await configService.initialize();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe(
          "Invalid configuration: display.address: Address must be between 0x03 and 0x77",
        );
      }
    });

    it("should accept a screenshot directory", async () => {
      fileContent({ display: { screenshot: "/tmp/shots/" } });
      const configService = new ConfigService(testConfigPath, {});

      await configService.initialize();

      expect(configService.getOledConfig().screenshot).toBe("/tmp/shots/");
    });
  });

  describe("environment overrides", () => {
    beforeEach(() => {
      fileContent({
        display: { driver: "SSD1306", busNumber: 1 },
        homeAssistant: { baseUrl: "http://file.local:8123", token: "file" },
      });
    });

    it("should let the environment win over the file", async () => {
      const configService = new ConfigService(testConfigPath, {
        OLED_DRIVER: "SSD1309",
        OLED_BUS: "3",
        OLED_ADDRESS: "0x3d",
        OLED_ROTATION: "90",
        OLED_SCREENSHOT: "true",
        HASS_URL: "http://env.local:8123",
        HASS_TOKEN: "test-secret",
        HASS_TIMEOUT_MS: "2500",
        STATUS_DURATION: "30",
      });

      const result = await configService.initialize();

      expect(result.success).toBe(true);
      expect(configService.getOledConfig()).toEqual({
        driver: "SSD1309",
        busNumber: 3,
        address: 0x3d,
        rotation: 90,
        screenshot: true,
      });
      expect(configService.getHomeAssistantConfig()).toEqual({
        baseUrl: "http://env.local:8123",
        token: "test-secret",
        timeoutMs: 2500,
      });
      expect(configService.getScreensConfig().statusDuration).toBe(30);
    });

    it("should read a screenshot path and a disabled rotation", async () => {
      const configService = new ConfigService(testConfigPath, {
        OLED_SCREENSHOT: "./shots",
        OLED_ROTATION: "none",
      });

      await configService.initialize();

      expect(configService.getOledConfig().screenshot).toBe("./shots");
      expect(configService.getOledConfig().rotation).toBeNull();
    });

    it("should turn screenshots off with false", async () => {
      const configService = new ConfigService(testConfigPath, {
        OLED_SCREENSHOT: "false",
      });

      await configService.initialize();

      expect(configService.getOledConfig().screenshot).toBe(false);
    });

    it("should fail on a variable that is not a number", async () => {
      const configService = new ConfigService(testConfigPath, {
        OLED_BUS: "first",
      });

      const result = await configService.initialize();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toMatchObject({
          code: ConfigErrorCode.INVALID_VALUE,
        });
        expect(result.error.message).toBe(
          "Invalid value for OLED_BUS: 'first' (expected a number)",
        );
      }
    });

    it("should reject a URL that is not one", async () => {
      const configService = new ConfigService(testConfigPath, {
        HASS_URL: "hass",
      });

      const result = await configService.initialize();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toMatchObject({
          code: ConfigErrorCode.INVALID_CONFIG,
        });
      }
    });
  });
});
