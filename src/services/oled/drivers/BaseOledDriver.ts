import { IOledDriver } from "@core/interfaces/IOledDriver";
import { II2cAdapter } from "@core/interfaces/II2cAdapter";
import { Bitmap1Bit } from "@core/types";
import { DisplayError } from "@core/errors";
import {
  OLED_DEFAULT_ADDRESS,
  OLED_DEFAULT_BUS_NUMBER,
  OLED_I2C_CHUNK_SIZE,
} from "@core/constants";
import { getLogger, Logger } from "@utils/logger";
import { BitmapUtils } from "../BitmapUtils";

/**
 * SSD130x command bytes shared by the supported controllers
 */
export const SSD130X = {
  SET_CONTRAST: 0x81,
  DISPLAY_ALL_ON_RESUME: 0xa4,
  NORMAL_DISPLAY: 0xa6,
  DISPLAY_OFF: 0xae,
  DISPLAY_ON: 0xaf,
  SET_DISPLAY_OFFSET: 0xd3,
  SET_COM_PINS: 0xda,
  SET_VCOM_DETECT: 0xdb,
  SET_DISPLAY_CLOCK_DIV: 0xd5,
  SET_PRECHARGE: 0xd9,
  SET_MULTIPLEX: 0xa8,
  SET_START_LINE: 0x40,
  MEMORY_MODE: 0x20,
  COLUMN_ADDR: 0x21,
  PAGE_ADDR: 0x22,
  COM_SCAN_DEC: 0xc8,
  SEG_REMAP: 0xa0,
  CHARGE_PUMP: 0x8d,
} as const;

/**
 * Where the controller sits on the bus
 */
export type OledBusOptions = {
  busNumber?: number;
  address?: number;
};

/**
 * Base class for SSD130x panel drivers
 *
 * Handles what all SSD130x controllers share:
 * - opening the transport on first begin()
 * - the page-organised frame buffer (8 vertical pixels per byte)
 * - conversion of row-major bitmaps into pages
 * - streaming the buffer in fixed-size I2C chunks
 *
 * Subclasses provide the geometry and the initialization sequence.
 */
export abstract class BaseOledDriver implements IOledDriver {
  abstract readonly name: string;
  abstract readonly width: number;
  abstract readonly height: number;

  private driverLogger: Logger | null = null;

  protected readonly busNumber: number;
  protected readonly address: number;

  private pageBuffer: Uint8Array | null = null;

  constructor(
    protected readonly adapter: II2cAdapter,
    options: OledBusOptions = {},
  ) {
    this.busNumber = options.busNumber ?? OLED_DEFAULT_BUS_NUMBER;
    this.address = options.address ?? OLED_DEFAULT_ADDRESS;
  }

  /**
   * Commands sent before DISPLAY_ON, controller specific
   */
  protected abstract initSequence(): number[];

  async begin(): Promise<void> {
    if (!this.adapter.isOpen()) {
      await this.adapter.open(this.busNumber, this.address);
    }

    for (const command of this.initSequence()) {
      await this.adapter.writeCommand(command);
    }
    await this.adapter.writeCommand(SSD130X.DISPLAY_ON);
    this.logger.debug(`${this.name} ${this.width}x${this.height} initialized`);
  }

  clear(): void {
    this.getBuffer().fill(0);
  }

  /**
   * Convert a row-major bitmap into SSD130x pages. Pixel (x, y) lands in
   * byte x + (y >> 3) * width, bit y & 7.
   */
  image(bitmap: Bitmap1Bit): void {
    if (bitmap.width !== this.width || bitmap.height !== this.height) {
      throw DisplayError.sizeMismatch(
        bitmap.width,
        bitmap.height,
        this.width,
        this.height,
      );
    }

    const buffer = this.getBuffer();
    buffer.fill(0);
    for (let y = 0; y < this.height; y++) {
      const pageOffset = (y >> 3) * this.width;
      const bit = 1 << (y & 7);
      for (let x = 0; x < this.width; x++) {
        if (BitmapUtils.getPixel(bitmap, x, y)) {
          buffer[pageOffset + x] |= bit;
        }
      }
    }
  }

  async display(): Promise<void> {
    await this.adapter.writeCommand(SSD130X.COLUMN_ADDR);
    await this.adapter.writeCommand(0);
    await this.adapter.writeCommand(this.width - 1);
    await this.adapter.writeCommand(SSD130X.PAGE_ADDR);
    await this.adapter.writeCommand(0);
    await this.adapter.writeCommand(this.pages - 1);

    const buffer = this.getBuffer();
    for (let i = 0; i < buffer.length; i += OLED_I2C_CHUNK_SIZE) {
      await this.adapter.writeData(buffer.subarray(i, i + OLED_I2C_CHUNK_SIZE));
    }
  }

  async dispose(): Promise<void> {
    await this.adapter.close();
    this.pageBuffer = null;
  }

  protected get pages(): number {
    return Math.ceil(this.height / 8);
  }

  /**
   * Logger named after the controller, created once the subclass has set
   * its name
   */
  protected get logger(): Logger {
    if (!this.driverLogger) {
      this.driverLogger = getLogger(this.name);
    }
    return this.driverLogger;
  }

  /**
   * Page buffer, allocated on first use since the geometry of a subclass
   * is only known after construction
   */
  protected getBuffer(): Uint8Array {
    if (!this.pageBuffer) {
      this.pageBuffer = new Uint8Array(this.width * this.pages);
    }
    return this.pageBuffer;
  }
}
