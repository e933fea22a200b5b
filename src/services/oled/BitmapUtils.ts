import { Bitmap1Bit, Point2D, Rectangle } from "@core/types";

/**
 * Low-level operations on packed 1-bit bitmaps.
 *
 * Bits are stored row-major, MSB first, ceil(width / 8) bytes per row.
 * A set bit is a lit pixel.
 */
export class BitmapUtils {
  /**
   * Create a blank (all background) bitmap
   */
  static createBlankBitmap(width: number, height: number): Bitmap1Bit {
    const bytesPerRow = Math.ceil(width / 8);
    return {
      width,
      height,
      data: new Uint8Array(bytesPerRow * height),
    };
  }

  static getBytesPerRow(bitmap: Bitmap1Bit): number {
    return Math.ceil(bitmap.width / 8);
  }

  /**
   * Whether the pixel is lit; pixels outside the bitmap are not
   */
  static getPixel(bitmap: Bitmap1Bit, x: number, y: number): boolean {
    if (x < 0 || x >= bitmap.width || y < 0 || y >= bitmap.height) {
      return false;
    }
    const byteIndex = y * BitmapUtils.getBytesPerRow(bitmap) + (x >> 3);
    return (bitmap.data[byteIndex] & (0x80 >> (x & 7))) !== 0;
  }

  /**
   * Light or clear a pixel. Out of bounds writes are ignored
   */
  static setPixel(
    bitmap: Bitmap1Bit,
    x: number,
    y: number,
    lit: boolean = true,
  ): void {
    if (x < 0 || x >= bitmap.width || y < 0 || y >= bitmap.height) {
      return;
    }

    const byteIndex = y * BitmapUtils.getBytesPerRow(bitmap) + (x >> 3);
    const mask = 0x80 >> (x & 7);

    if (lit) {
      bitmap.data[byteIndex] |= mask;
    } else {
      bitmap.data[byteIndex] &= ~mask;
    }
  }

  /**
   * Fill a rectangle, clipped to the bitmap
   */
  static fillRect(bitmap: Bitmap1Bit, rect: Rectangle, lit: boolean): void {
    const x0 = Math.max(0, rect.x);
    const y0 = Math.max(0, rect.y);
    const x1 = Math.min(bitmap.width, rect.x + rect.width);
    const y1 = Math.min(bitmap.height, rect.y + rect.height);

    // Whole-bitmap fills are the common case (frame clear)
    if (x0 === 0 && y0 === 0 && x1 === bitmap.width && y1 === bitmap.height) {
      bitmap.data.fill(lit ? 0xff : 0x00);
      return;
    }

    for (let y = y0; y < y1; y++) {
      for (let x = x0; x < x1; x++) {
        BitmapUtils.setPixel(bitmap, x, y, lit);
      }
    }
  }

  /**
   * Stamp the lit pixels of `source` onto `target` with its top-left corner
   * at `origin`. Background pixels of the source leave the target untouched.
   */
  static blit(
    target: Bitmap1Bit,
    source: Bitmap1Bit,
    origin: Point2D,
    lit: boolean = true,
  ): void {
    for (let y = 0; y < source.height; y++) {
      const ty = origin.y + y;
      if (ty < 0 || ty >= target.height) continue;
      for (let x = 0; x < source.width; x++) {
        if (BitmapUtils.getPixel(source, x, y)) {
          BitmapUtils.setPixel(target, origin.x + x, ty, lit);
        }
      }
    }
  }

  /**
   * Rotate counter-clockwise about the centre by `degrees`, keeping the
   * size. Pixels rotated in from outside the source are background.
   */
  static rotate(bitmap: Bitmap1Bit, degrees: number): Bitmap1Bit {
    const rotated = BitmapUtils.createBlankBitmap(bitmap.width, bitmap.height);
    const radians = (degrees * Math.PI) / 180;
    // Snap right angles so 90/180/270 map pixels exactly
    const exact = degrees % 90 === 0;
    const cos = exact ? Math.round(Math.cos(radians)) : Math.cos(radians);
    const sin = exact ? Math.round(Math.sin(radians)) : Math.sin(radians);
    const cx = bitmap.width / 2;
    const cy = bitmap.height / 2;

    for (let y = 0; y < bitmap.height; y++) {
      for (let x = 0; x < bitmap.width; x++) {
        const dx = x + 0.5 - cx;
        const dy = y + 0.5 - cy;
        const sx = Math.floor(cx + dx * cos - dy * sin);
        const sy = Math.floor(cy + dx * sin + dy * cos);
        if (BitmapUtils.getPixel(bitmap, sx, sy)) {
          BitmapUtils.setPixel(rotated, x, y, true);
        }
      }
    }

    return rotated;
  }

  static countLitPixels(bitmap: Bitmap1Bit): number {
    let count = 0;
    for (let y = 0; y < bitmap.height; y++) {
      for (let x = 0; x < bitmap.width; x++) {
        if (BitmapUtils.getPixel(bitmap, x, y)) count++;
      }
    }
    return count;
  }

  /**
   * Expand to one byte per pixel (255 lit, 0 background), e.g. for encoding
   * as PNG
   */
  static toGreyscale(bitmap: Bitmap1Bit): Buffer {
    const grey = Buffer.alloc(bitmap.width * bitmap.height);
    for (let y = 0; y < bitmap.height; y++) {
      for (let x = 0; x < bitmap.width; x++) {
        if (BitmapUtils.getPixel(bitmap, x, y)) {
          grey[y * bitmap.width + x] = 255;
        }
      }
    }
    return grey;
  }

  /**
   * Pack raw interleaved pixel data into a bitmap. A pixel is lit when its
   * first channel is at or above `threshold`.
   */
  static fromRaw(
    raw: Uint8Array,
    width: number,
    height: number,
    channels: number,
    threshold: number = 128,
  ): Bitmap1Bit {
    const bitmap = BitmapUtils.createBlankBitmap(width, height);
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        if (raw[(y * width + x) * channels] >= threshold) {
          BitmapUtils.setPixel(bitmap, x, y, true);
        }
      }
    }
    return bitmap;
  }
}
