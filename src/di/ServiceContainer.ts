import {
  IConfigService,
  IMetricsService,
  II2cAdapter,
} from "@core/interfaces";
import { getLogger } from "@utils/logger";
import { getHostname } from "@utils/system";
// Mock services - safe to import (no hardware dependencies)
import { MockI2cAdapter } from "@services/oled/adapters/MockI2cAdapter";
import { MockMetricsService } from "@services/metrics/MockMetricsService";

// Non-hardware services - safe to import
import { ConfigService } from "@services/config/ConfigService";
import { HomeAssistantService } from "@services/metrics/HomeAssistantService";
import { Display } from "@services/oled/Display";
import {
  ExitScreen,
  FontRegistry,
  StatusScreen,
  defaultFontRegistry,
} from "@services/screens";
import { ScreenRotator } from "@services/rotator/ScreenRotator";

// The I2C adapter is imported lazily so the native i2c-bus module is only
// loaded on the board

const logger = getLogger("ServiceContainer");

/**
 * Service Container (Dependency Injection Container)
 *
 * Singleton that manages service instances and their dependencies.
 * Provides factory methods for production and test setters for mocking.
 */
export class ServiceContainer {
  private static instance: ServiceContainer;

  private services: {
    config?: IConfigService;
    metrics?: IMetricsService;
    i2cAdapter?: II2cAdapter;
    display?: Display;
    fonts?: FontRegistry;
    rotator?: ScreenRotator;
  } = {};

  private constructor() {}

  /**
   * Get singleton instance
   */
  static getInstance(): ServiceContainer {
    if (!ServiceContainer.instance) {
      ServiceContainer.instance = new ServiceContainer();
    }
    return ServiceContainer.instance;
  }

  /**
   * Reset the container (useful for testing)
   */
  static reset(): void {
    if (ServiceContainer.instance) {
      ServiceContainer.instance.services = {};
    }
  }

  // Factory methods for production

  /**
   * Get Config Service
   */
  getConfigService(): IConfigService {
    if (!this.services.config) {
      this.services.config = new ConfigService();
    }
    return this.services.config;
  }

  /**
   * Get Metrics Service
   * Uses the mock service while no Home Assistant URL is configured
   */
  getMetricsService(): IMetricsService {
    if (!this.services.metrics) {
      const config = this.getConfigService().getHomeAssistantConfig();
      if (!config.baseUrl) {
        logger.warn("No Home Assistant URL configured, using mock metrics");
        this.services.metrics = new MockMetricsService();
      } else {
        this.services.metrics = new HomeAssistantService(config);
      }
    }
    return this.services.metrics;
  }

  /**
   * Get the I2C adapter for the current platform
   * Automatically uses the mock adapter on non-Linux platforms or when
   * USE_MOCK_OLED=true
   */
  getI2cAdapter(): II2cAdapter {
    if (!this.services.i2cAdapter) {
      if (
        process.env.USE_MOCK_OLED === "true" ||
        process.platform !== "linux"
      ) {
        this.services.i2cAdapter = new MockI2cAdapter();
      } else {
        // Lazy import to avoid loading i2c-bus on non-Linux platforms
        const { I2cBusAdapter } =
          // eslint-disable-next-line @typescript-eslint/no-require-imports
          require("@services/oled/adapters/I2cBusAdapter") as typeof import("@services/oled/adapters/I2cBusAdapter");
        this.services.i2cAdapter = new I2cBusAdapter();
      }
    }
    return this.services.i2cAdapter;
  }

  /**
   * Get the Display, initializing the panel on first use
   */
  async getDisplay(): Promise<Display> {
    if (!this.services.display) {
      const config = this.getConfigService().getOledConfig();
      this.services.display = await Display.create(this.getI2cAdapter(), {
        driver: config.driver,
        busNumber: config.busNumber,
        address: config.address,
        rotation: config.rotation,
        screenshot: config.screenshot,
      });
    }
    return this.services.display;
  }

  /**
   * Get the font registry shared by the screens
   */
  getFontRegistry(): FontRegistry {
    if (!this.services.fonts) {
      this.services.fonts = defaultFontRegistry;
    }
    return this.services.fonts;
  }

  /**
   * Get the Screen Rotator with the status screen in its playlist and the
   * exit screen for shutdown
   */
  async getScreenRotator(): Promise<ScreenRotator> {
    if (!this.services.rotator) {
      const display = await this.getDisplay();
      const screensConfig = this.getConfigService().getScreensConfig();
      const fonts = this.getFontRegistry();

      const status = new StatusScreen({
        display,
        duration: screensConfig.statusDuration,
        fonts,
        metrics: this.getMetricsService(),
        hostname: getHostname,
      });
      const exit = new ExitScreen({
        display,
        duration: screensConfig.exitDuration,
        fonts,
      });

      this.services.rotator = new ScreenRotator({
        display,
        screens: [status],
        exitScreen: exit,
      });
    }
    return this.services.rotator;
  }

  // Test setters

  setConfigService(service: IConfigService): void {
    this.services.config = service;
  }

  setMetricsService(service: IMetricsService): void {
    this.services.metrics = service;
  }

  setI2cAdapter(adapter: II2cAdapter): void {
    this.services.i2cAdapter = adapter;
  }

  setDisplay(display: Display): void {
    this.services.display = display;
  }

  setFontRegistry(fonts: FontRegistry): void {
    this.services.fonts = fonts;
  }
}
