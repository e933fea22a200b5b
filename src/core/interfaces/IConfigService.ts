import {
  AppConfig,
  HomeAssistantConfig,
  OledConfig,
  Result,
  ScreensConfig,
} from "@core/types";

/**
 * Config Service Interface
 *
 * Loads the configuration file, applies environment overrides and
 * validates the result.
 */
export interface IConfigService {
  /**
   * Load and validate the configuration
   */
  initialize(): Promise<Result<void>>;

  getConfig(): AppConfig;

  getOledConfig(): OledConfig;

  getHomeAssistantConfig(): HomeAssistantConfig;

  getScreensConfig(): ScreensConfig;
}
