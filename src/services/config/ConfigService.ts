import * as fs from "fs/promises";
import { z } from "zod";
import { IConfigService } from "@core/interfaces";
import {
  AppConfig,
  HomeAssistantConfig,
  OledConfig,
  Result,
  ScreensConfig,
  success,
  failure,
} from "@core/types";
import { ConfigError } from "@core/errors";
import {
  HASS_DEFAULT_TIMEOUT_MS,
  OLED_DEFAULT_ADDRESS,
  OLED_DEFAULT_BUS_NUMBER,
  OLED_DEFAULT_DRIVER,
  SCREEN_DEFAULT_EXIT_DURATION,
  SCREEN_DEFAULT_STATUS_DURATION,
} from "@core/constants";
import { getLogger } from "@utils/logger";

const logger = getLogger("ConfigService");

/**
 * Schema of the complete configuration
 */
export const appConfigSchema = z.object({
  version: z.string(),
  display: z.object({
    driver: z.string().min(1, "Driver name must not be empty"),
    busNumber: z
      .number({ message: "Bus number must be a number" })
      .min(0, "Bus number must not be negative"),
    address: z
      .number({ message: "Address must be a number" })
      .int()
      .min(0x03, "Address must be between 0x03 and 0x77")
      .max(0x77, "Address must be between 0x03 and 0x77"),
    rotation: z.number({ message: "Rotation must be a number" }).nullable(),
    screenshot: z.union([z.boolean(), z.string().min(1)]),
  }),
  homeAssistant: z.object({
    baseUrl: z.union([z.literal(""), z.string().url("Base URL must be a URL")]),
    token: z.string(),
    timeoutMs: z
      .number({ message: "Timeout must be a number" })
      .int()
      .positive("Timeout must be positive"),
  }),
  screens: z.object({
    statusDuration: z.number().nonnegative("Duration must not be negative"),
    exitDuration: z.number().nonnegative("Duration must not be negative"),
  }),
});

/**
 * Schema of the configuration file; every key may be left out
 */
const configFileSchema = appConfigSchema.deepPartial();

type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Config Service Implementation
 *
 * Builds the application configuration from three layers, later ones
 * winning: built-in defaults, the JSON configuration file and environment
 * variables. The merged result is validated before it is used.
 */
export class ConfigService implements IConfigService {
  private isInitialized: boolean = false;
  private config: AppConfig;

  constructor(
    private readonly configPath: string = "./config/default.json",
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {
    this.config = ConfigService.getDefaultConfig();
  }

  /**
   * Load the file, apply the environment and validate.
   * On failure the defaults stay in place.
   */
  async initialize(): Promise<Result<void>> {
    if (this.isInitialized) {
      return success(undefined);
    }

    const fileResult = await this.loadConfigFile();
    if (!fileResult.success) {
      return failure(fileResult.error);
    }

    let merged: ConfigFile;
    try {
      merged = this.applyEnvironment(
        ConfigService.merge(ConfigService.getDefaultConfig(), fileResult.data),
      );
    } catch (error) {
      if (error instanceof ConfigError) {
        return failure(error);
      }
      throw error;
    }

    const parsed = appConfigSchema.safeParse(merged);
    if (!parsed.success) {
      return failure(
        ConfigError.invalidConfig(
          parsed.error.issues.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`,
          ),
        ),
      );
    }

    this.config = parsed.data;
    this.isInitialized = true;
    logger.info(
      `Configuration loaded: ${this.config.display.driver} on bus ${this.config.display.busNumber}`,
    );
    return success(undefined);
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getOledConfig(): OledConfig {
    return this.config.display;
  }

  getHomeAssistantConfig(): HomeAssistantConfig {
    return this.config.homeAssistant;
  }

  getScreensConfig(): ScreensConfig {
    return this.config.screens;
  }

  /**
   * Read and shape-check the configuration file. A missing file is an
   * empty configuration.
   */
  private async loadConfigFile(): Promise<Result<ConfigFile>> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, "utf-8");
    } catch (error) {
      if (error instanceof Error && error.message.includes("ENOENT")) {
        logger.warn(`No configuration file at ${this.configPath}, using defaults`);
        return success({});
      }
      return failure(
        ConfigError.readError(
          this.configPath,
          error instanceof Error ? error : new Error("Unknown error"),
        ),
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      return failure(
        ConfigError.invalidJSON(
          this.configPath,
          error instanceof Error ? error : new Error("Unknown error"),
        ),
      );
    }

    const parsed = configFileSchema.safeParse(json);
    if (!parsed.success) {
      return failure(
        ConfigError.invalidConfig(
          parsed.error.issues.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`,
          ),
        ),
      );
    }
    return success(parsed.data);
  }

  /**
   * Overlay the environment variables that are set
   * @throws ConfigError when a variable cannot be parsed
   */
  private applyEnvironment(config: ConfigFile): ConfigFile {
    const display = { ...config.display };
    const homeAssistant = { ...config.homeAssistant };
    const screens = { ...config.screens };

    if (this.env.OLED_DRIVER) {
      display.driver = this.env.OLED_DRIVER;
    }
    if (this.env.OLED_BUS) {
      display.busNumber = this.parseNumber("OLED_BUS", this.env.OLED_BUS);
    }
    if (this.env.OLED_ADDRESS) {
      // Number() reads both "60" and "0x3c"
      display.address = this.parseNumber("OLED_ADDRESS", this.env.OLED_ADDRESS);
    }
    if (this.env.OLED_ROTATION !== undefined) {
      const raw = this.env.OLED_ROTATION.trim().toLowerCase();
      display.rotation =
        raw === "" || raw === "none" || raw === "null"
          ? null
          : this.parseNumber("OLED_ROTATION", raw);
    }
    if (this.env.OLED_SCREENSHOT) {
      const raw = this.env.OLED_SCREENSHOT;
      display.screenshot =
        raw === "true" ? true : raw === "false" ? false : raw;
    }
    if (this.env.HASS_URL !== undefined) {
      homeAssistant.baseUrl = this.env.HASS_URL;
    }
    if (this.env.HASS_TOKEN !== undefined) {
      homeAssistant.token = this.env.HASS_TOKEN;
    }
    if (this.env.HASS_TIMEOUT_MS) {
      homeAssistant.timeoutMs = this.parseNumber(
        "HASS_TIMEOUT_MS",
        this.env.HASS_TIMEOUT_MS,
      );
    }
    if (this.env.STATUS_DURATION) {
      screens.statusDuration = this.parseNumber(
        "STATUS_DURATION",
        this.env.STATUS_DURATION,
      );
    }

    return { ...config, display, homeAssistant, screens };
  }

  private parseNumber(key: string, raw: string): number {
    const value = Number(raw);
    if (raw.trim() === "" || Number.isNaN(value)) {
      throw ConfigError.invalidValue(key, raw, "a number");
    }
    return value;
  }

  /**
   * Overlay the sections of `file` onto `defaults`
   */
  private static merge(defaults: AppConfig, file: ConfigFile): ConfigFile {
    return {
      version: file.version ?? defaults.version,
      display: { ...defaults.display, ...file.display },
      homeAssistant: { ...defaults.homeAssistant, ...file.homeAssistant },
      screens: { ...defaults.screens, ...file.screens },
    };
  }

  static getDefaultConfig(): AppConfig {
    return {
      version: "1.0.0",
      display: {
        driver: OLED_DEFAULT_DRIVER,
        busNumber: OLED_DEFAULT_BUS_NUMBER,
        address: OLED_DEFAULT_ADDRESS,
        rotation: null,
        screenshot: false,
      },
      homeAssistant: {
        baseUrl: "",
        token: "",
        timeoutMs: HASS_DEFAULT_TIMEOUT_MS,
      },
      screens: {
        statusDuration: SCREEN_DEFAULT_STATUS_DURATION,
        exitDuration: SCREEN_DEFAULT_EXIT_DURATION,
      },
    };
  }
}
