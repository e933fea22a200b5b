import { BaseError } from "./BaseError";

/**
 * Display-related error codes
 */
export enum DisplayErrorCode {
  // Panel errors
  DEVICE_INIT_FAILED = "DISPLAY_DEVICE_INIT_FAILED",
  DEVICE_NOT_INITIALIZED = "DISPLAY_DEVICE_NOT_INITIALIZED",
  I2C_ERROR = "DISPLAY_I2C_ERROR",

  // Data errors
  BITMAP_SIZE_MISMATCH = "DISPLAY_BITMAP_SIZE_MISMATCH",
  INVALID_TIMESTAMP = "DISPLAY_INVALID_TIMESTAMP",

  // Layout errors
  UNSUPPORTED_LINE_COUNT = "DISPLAY_UNSUPPORTED_LINE_COUNT",

  // Output errors
  SCREENSHOT_FAILED = "DISPLAY_SCREENSHOT_FAILED",

  // Screen loop errors
  NO_SCREENS = "DISPLAY_NO_SCREENS",
  ALREADY_RUNNING = "DISPLAY_ALREADY_RUNNING",

  // Generic
  UNKNOWN = "DISPLAY_UNKNOWN_ERROR",
}

/**
 * Display Error
 */
export class DisplayError extends BaseError {
  constructor(
    message: string,
    code: DisplayErrorCode = DisplayErrorCode.UNKNOWN,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }

  static initFailed(reason: string, error?: Error): DisplayError {
    return new DisplayError(
      `Failed to initialize OLED panel: ${reason}`,
      DisplayErrorCode.DEVICE_INIT_FAILED,
      false,
      { reason, originalError: error?.message },
    );
  }

  static notInitialized(): DisplayError {
    return new DisplayError(
      "I2C bus not open. Call open() first.",
      DisplayErrorCode.DEVICE_NOT_INITIALIZED,
      false,
    );
  }

  /**
   * Create error for a failed I2C transfer
   */
  static i2cError(address: number, error: Error): DisplayError {
    return new DisplayError(
      `I2C write to 0x${address.toString(16).padStart(2, "0")} failed: ${error.message}`,
      DisplayErrorCode.I2C_ERROR,
      true,
      { address, originalError: error.message },
    );
  }

  static sizeMismatch(
    bitmapWidth: number,
    bitmapHeight: number,
    displayWidth: number,
    displayHeight: number,
  ): DisplayError {
    return new DisplayError(
      `Bitmap size (${bitmapWidth}x${bitmapHeight}) does not match display (${displayWidth}x${displayHeight})`,
      DisplayErrorCode.BITMAP_SIZE_MISMATCH,
      false,
      { bitmapWidth, bitmapHeight, displayWidth, displayHeight },
    );
  }

  /**
   * Create error for a timestamp that is not ISO-8601
   */
  static invalidTimestamp(value: string): DisplayError {
    return new DisplayError(
      `Invalid ISO-8601 timestamp: '${value}'`,
      DisplayErrorCode.INVALID_TIMESTAMP,
      false,
      { value },
    );
  }

  /**
   * Create error for a line count the text layout has no offsets for
   */
  static unsupportedLineCount(lines: number, max: number): DisplayError {
    return new DisplayError(
      `No text layout for ${lines} lines (supported: 1-${max})`,
      DisplayErrorCode.UNSUPPORTED_LINE_COUNT,
      false,
      { lines, max },
    );
  }

  static screenshotFailed(path: string, error: Error): DisplayError {
    return new DisplayError(
      `Failed to write screenshot ${path}: ${error.message}`,
      DisplayErrorCode.SCREENSHOT_FAILED,
      true,
      { path, originalError: error.message },
    );
  }

  static noScreens(): DisplayError {
    return new DisplayError(
      "No screens to rotate through",
      DisplayErrorCode.NO_SCREENS,
      false,
    );
  }

  static alreadyRunning(): DisplayError {
    return new DisplayError(
      "Screen rotation is already running",
      DisplayErrorCode.ALREADY_RUNNING,
      true,
    );
  }
}
