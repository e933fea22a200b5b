import { Bitmap1Bit, PixelFill, Point2D, Rectangle } from "@core/types";
import { RasterFont } from "@core/interfaces/IFontRasterizer";
import { BitmapUtils } from "./BitmapUtils";

/**
 * Drawing operations bound to one canvas image.
 *
 * A fill of 0 draws background; any other value lights pixels.
 */
export class DrawContext {
  constructor(readonly image: Bitmap1Bit) {}

  rectangle(rect: Rectangle, fill: PixelFill): void {
    BitmapUtils.fillRect(this.image, rect, fill !== 0);
  }

  /**
   * Draw one line of text with the top of the font's ascent at origin.y
   */
  async text(
    origin: Point2D,
    text: string,
    font: RasterFont,
    fill: PixelFill = 255,
  ): Promise<void> {
    const glyphs = await font.render(text);
    BitmapUtils.blit(this.image, glyphs, origin, fill !== 0);
  }
}
