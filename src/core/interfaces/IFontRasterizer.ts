import { Bitmap1Bit } from "@core/types";

/**
 * A font loaded at one size and weight
 */
export interface RasterFont {
  readonly size: number;
  readonly bold: boolean;

  /**
   * Render a single line of text. The returned bitmap has the lit pixels
   * of the glyphs, with the top of the font's ascent at row 0.
   */
  render(text: string): Promise<Bitmap1Bit>;
}

/**
 * Produces fonts; the FontRegistry caches what it returns
 */
export interface IFontRasterizer {
  load(size: number, bold: boolean): RasterFont;
}
