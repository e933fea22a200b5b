import { Bitmap1Bit } from "@core/types";

/**
 * OLED Driver Interface
 *
 * Contract for a panel controller. Each controller (SSD1306, SSD1309, mock)
 * implements the command sequences for its geometry; the Display only ever
 * talks to this interface.
 */
export interface IOledDriver {
  /**
   * Controller identifier, e.g. 'SSD1306'
   */
  readonly name: string;

  /** Panel width in pixels */
  readonly width: number;

  /** Panel height in pixels */
  readonly height: number;

  /**
   * Send the initialization sequence and switch the panel on
   */
  begin(): Promise<void>;

  /**
   * Blank the driver's frame buffer. The panel only changes on display()
   */
  clear(): void;

  /**
   * Copy a row-major bitmap into the driver's frame buffer
   * @throws DisplayError when the bitmap does not match the panel size
   */
  image(bitmap: Bitmap1Bit): void;

  /**
   * Push the frame buffer to the panel
   */
  display(): Promise<void>;

  /**
   * Release the transport
   */
  dispose(): Promise<void>;
}
