import { Bitmap1Bit } from "@core/types";
import { II2cAdapter } from "@core/interfaces/II2cAdapter";
import { MockI2cAdapter } from "../adapters/MockI2cAdapter";
import { BaseOledDriver, OledBusOptions, SSD130X } from "./BaseOledDriver";

/**
 * Mock OLED driver for tests and development
 *
 * Behaves like an SSD130x of any size on a mock bus and keeps a copy of
 * every bitmap handed to image(), plus call counters.
 */
export class MockOledDriver extends BaseOledDriver {
  readonly name = "mock_oled";
  readonly width: number;
  readonly height: number;

  beginCount = 0;
  clearCount = 0;
  displayCount = 0;
  readonly images: Bitmap1Bit[] = [];

  constructor(
    width: number = 128,
    height: number = 64,
    adapter: II2cAdapter = new MockI2cAdapter(),
    options?: OledBusOptions,
  ) {
    super(adapter, options);
    this.width = width;
    this.height = height;
  }

  protected initSequence(): number[] {
    return [
      SSD130X.DISPLAY_OFF,
      SSD130X.SET_MULTIPLEX,
      this.height - 1,
      SSD130X.MEMORY_MODE,
      0x00,
    ];
  }

  async begin(): Promise<void> {
    this.beginCount++;
    await super.begin();
  }

  clear(): void {
    this.clearCount++;
    super.clear();
  }

  image(bitmap: Bitmap1Bit): void {
    super.image(bitmap);
    this.images.push({
      width: bitmap.width,
      height: bitmap.height,
      data: Uint8Array.from(bitmap.data),
    });
  }

  async display(): Promise<void> {
    this.displayCount++;
    await super.display();
  }

  /**
   * Last bitmap sent with image(), or null
   */
  getLastImage(): Bitmap1Bit | null {
    return this.images.length > 0 ? this.images[this.images.length - 1] : null;
  }

  /**
   * Current page buffer, as the panel would receive it
   */
  getPageBuffer(): Uint8Array {
    return Uint8Array.from(this.getBuffer());
  }
}
