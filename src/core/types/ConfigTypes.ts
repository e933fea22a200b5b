import { ScreenshotSetting, Rotation } from "./DisplayTypes";

/**
 * OLED panel configuration
 */
export type OledConfig = {
  /** Controller name (SSD1306, SSD1309); unknown names fall back to SSD1306 */
  driver: string;

  /** I2C bus number */
  busNumber: number;

  /** I2C address of the controller */
  address: number;

  rotation: Rotation;

  screenshot: ScreenshotSetting;
};

/**
 * Home Assistant connection
 */
export type HomeAssistantConfig = {
  /** Base URL, e.g. http://homeassistant.local:8123. Empty disables the client */
  baseUrl: string;

  /** Long-lived access token */
  token: string;

  /** Request timeout in milliseconds */
  timeoutMs: number;
};

/**
 * How long each screen stays visible, in seconds
 */
export type ScreensConfig = {
  statusDuration: number;
  exitDuration: number;
};

/**
 * Application configuration
 */
export type AppConfig = {
  version: string;
  display: OledConfig;
  homeAssistant: HomeAssistantConfig;
  screens: ScreensConfig;
};
