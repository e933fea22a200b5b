/**
 * 1-bit bitmap, packed row-major, 8 pixels per byte, MSB first.
 *
 * On the OLED canvas a set bit is a lit pixel and a cleared bit is
 * background, so a freshly allocated bitmap is blank.
 */
export type Bitmap1Bit = {
  /** Width in pixels */
  width: number;

  /** Height in pixels */
  height: number;

  /** Raw bitmap data, ceil(width / 8) bytes per row */
  data: Uint8Array;
};

/**
 * 2D point in pixel coordinates
 */
export type Point2D = {
  x: number;
  y: number;
};

/**
 * Rectangle in pixel coordinates
 */
export type Rectangle = {
  /** X coordinate of top-left corner */
  x: number;

  /** Y coordinate of top-left corner */
  y: number;

  width: number;
  height: number;
};

/**
 * Pixel value as seen by drawing code: 0 is background, anything else lit
 */
export type PixelFill = number;

/**
 * Names of the supported OLED controllers
 */
export enum OledDriverName {
  SSD1306 = "SSD1306",
  SSD1309 = "SSD1309",
}

/**
 * Screenshot setting of a display.
 *
 * `false` disables screenshots, `true` writes them to the default
 * directory and a string names the directory to write to.
 */
export type ScreenshotSetting = boolean | string;

/**
 * Rotation applied to every frame before it is sent to the panel,
 * in degrees counter-clockwise. `null` leaves frames untouched.
 */
export type Rotation = number | null;

/**
 * Options for building a Display
 */
export type DisplayOptions = {
  /** I2C bus number (falls back to 1 when not an integer) */
  busNumber?: number;

  /** I2C address of the controller */
  address?: number;

  screenshot?: ScreenshotSetting;

  rotation?: Rotation;

  /** Controller name; unknown names fall back to SSD1306 */
  driver?: string;

  /** Clock used by the time helpers */
  now?: () => Date;
};
