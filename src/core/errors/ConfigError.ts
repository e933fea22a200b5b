import { BaseError } from "./BaseError";

/**
 * Config-related error codes
 */
export enum ConfigErrorCode {
  FILE_READ_ERROR = "CONFIG_FILE_READ_ERROR",
  INVALID_JSON = "CONFIG_INVALID_JSON",
  INVALID_CONFIG = "CONFIG_INVALID_CONFIG",
  INVALID_VALUE = "CONFIG_INVALID_VALUE",
  NOT_INITIALIZED = "CONFIG_NOT_INITIALIZED",
  UNKNOWN = "CONFIG_UNKNOWN_ERROR",
}

/**
 * Config Service Error
 */
export class ConfigError extends BaseError {
  constructor(
    message: string,
    code: ConfigErrorCode = ConfigErrorCode.UNKNOWN,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }

  static readError(filePath: string, error: Error): ConfigError {
    return new ConfigError(
      `Failed to read configuration file: ${error.message}`,
      ConfigErrorCode.FILE_READ_ERROR,
      false,
      { filePath, originalError: error.message },
    );
  }

  static invalidJSON(filePath: string, error: Error): ConfigError {
    return new ConfigError(
      `Invalid JSON in configuration file: ${error.message}`,
      ConfigErrorCode.INVALID_JSON,
      false,
      { filePath, originalError: error.message },
    );
  }

  /**
   * Create error for a configuration that fails schema validation
   */
  static invalidConfig(issues: string[]): ConfigError {
    return new ConfigError(
      `Invalid configuration: ${issues.join("; ")}`,
      ConfigErrorCode.INVALID_CONFIG,
      false,
      { issues },
    );
  }

  /**
   * Create error for an environment variable that cannot be parsed
   */
  static invalidValue(key: string, value: string, expected: string): ConfigError {
    return new ConfigError(
      `Invalid value for ${key}: '${value}' (expected ${expected})`,
      ConfigErrorCode.INVALID_VALUE,
      false,
      { key, value, expected },
    );
  }

  static notInitialized(): ConfigError {
    return new ConfigError(
      "Configuration not loaded. Call initialize() first.",
      ConfigErrorCode.NOT_INITIALIZED,
      false,
    );
  }
}
