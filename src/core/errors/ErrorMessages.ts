/**
 * Centralized user-facing messages for every error code.
 *
 * Codes are plain string literals here so this module does not import the
 * error classes (which import it). They match the enum values declared in
 * each error class.
 *
 * @example
 * ```typescript
 * import { getUserMessage } from "@errors/ErrorMessages";
 *
 * getUserMessage("DISPLAY_DEVICE_INIT_FAILED");
 * // "Failed to initialize the OLED panel. Check the I2C wiring."
 * ```
 */

/**
 * Display error user messages
 */
export const DISPLAY_ERROR_MESSAGES: Record<string, string> = {
  DISPLAY_DEVICE_INIT_FAILED:
    "Failed to initialize the OLED panel. Check the I2C wiring.",
  DISPLAY_DEVICE_NOT_INITIALIZED:
    "OLED panel not initialized. Please restart the service.",
  DISPLAY_I2C_ERROR: "Communication with the OLED panel failed.",
  DISPLAY_BITMAP_SIZE_MISMATCH:
    "Image size does not match the panel. Check the configured driver.",
  DISPLAY_INVALID_TIMESTAMP: "Received a timestamp that could not be read.",
  DISPLAY_UNSUPPORTED_LINE_COUNT: "Too many or too few lines of text.",
  DISPLAY_SCREENSHOT_FAILED:
    "Failed to save a screenshot. Check the screenshot directory.",
  DISPLAY_NO_SCREENS: "No screens are configured.",
  DISPLAY_ALREADY_RUNNING: "The screens are already being shown.",
  DISPLAY_UNKNOWN_ERROR: "Display error occurred.",
};

/**
 * Config error user messages
 */
export const CONFIG_ERROR_MESSAGES: Record<string, string> = {
  CONFIG_FILE_READ_ERROR:
    "Failed to read configuration. Using default settings.",
  CONFIG_INVALID_JSON:
    "Configuration file is not valid JSON. Using default settings.",
  CONFIG_INVALID_CONFIG: "Invalid configuration. Please fix the settings.",
  CONFIG_INVALID_VALUE: "Configuration contains invalid values.",
  CONFIG_NOT_INITIALIZED: "Configuration not loaded. Using default settings.",
  CONFIG_UNKNOWN_ERROR: "Configuration error occurred.",
};

/**
 * Metrics error user messages
 */
export const METRICS_ERROR_MESSAGES: Record<string, string> = {
  METRICS_NOT_CONFIGURED: "Home Assistant is not configured.",
  METRICS_REQUEST_FAILED: "Could not reach Home Assistant.",
  METRICS_HTTP_ERROR: "Home Assistant rejected the request.",
  METRICS_TIMEOUT: "Home Assistant did not answer in time.",
  METRICS_INVALID_RESPONSE: "Home Assistant sent an unexpected response.",
  METRICS_UNKNOWN_ERROR: "Metrics error occurred.",
};

/**
 * Combined mapping of all error codes to their user messages.
 */
export const ERROR_MESSAGES: Record<string, string> = {
  ...DISPLAY_ERROR_MESSAGES,
  ...CONFIG_ERROR_MESSAGES,
  ...METRICS_ERROR_MESSAGES,
};

/**
 * Fallback messages by error category (the code prefix before the first
 * underscore).
 */
export const DEFAULT_ERROR_MESSAGES: Record<string, string> = {
  DISPLAY: "Display error occurred.",
  CONFIG: "Configuration error occurred.",
  METRICS: "Metrics error occurred.",
};

/**
 * Get the user-friendly message for an error code, falling back to the
 * category default and then to a generic message.
 */
export function getUserMessage(code: string): string {
  const message = ERROR_MESSAGES[code];
  if (message) {
    return message;
  }

  const category = code.split("_")[0];
  const defaultMessage = DEFAULT_ERROR_MESSAGES[category];
  if (defaultMessage) {
    return defaultMessage;
  }

  return "An error occurred.";
}
