import sharp from "sharp";
import { Bitmap1Bit } from "@core/types";
import { IFontRasterizer, RasterFont } from "@core/interfaces";
import {
  TEXT_FONT_ASCENT,
  TEXT_FONT_DESCENT,
  TEXT_FONT_FAMILY,
} from "@core/constants";
import { BitmapUtils } from "@services/oled/BitmapUtils";

/**
 * Escape XML special characters
 */
function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Width of the SVG canvas for a text run. Sized for the widest glyph
 * advance of the font (W, M and % reach about 1 em, more in bold) so that
 * no character is cut off; the blank tail is never drawn.
 */
export function estimateTextWidth(
  text: string,
  fontSize: number,
  bold: boolean = false,
): number {
  const ratio = bold ? 1.15 : 1;
  return Math.max(1, Math.ceil(text.length * fontSize * ratio) + 4);
}

/**
 * A font rendered through sharp's SVG support
 */
class SvgRasterFont implements RasterFont {
  readonly lineHeight: number;

  constructor(
    readonly size: number,
    readonly bold: boolean,
    private readonly family: string,
  ) {
    this.lineHeight = Math.ceil(size * (TEXT_FONT_ASCENT + TEXT_FONT_DESCENT));
  }

  async render(text: string): Promise<Bitmap1Bit> {
    const width = estimateTextWidth(text, this.size, this.bold);
    if (text.length === 0) {
      return BitmapUtils.createBlankBitmap(width, this.lineHeight);
    }

    // White on black so the lit pixels come out as set bits
    const baseline = this.size * TEXT_FONT_ASCENT;
    const svg =
      `<svg width="${width}" height="${this.lineHeight}" xmlns="http://www.w3.org/2000/svg">` +
      `<rect width="100%" height="100%" fill="black"/>` +
      `<text x="0" y="${baseline}" font-family="${this.family}" font-size="${this.size}" ` +
      `font-weight="${this.bold ? "bold" : "normal"}" fill="white">${escapeXml(text)}</text>` +
      `</svg>`;

    const { data, info } = await sharp(Buffer.from(svg))
      .greyscale()
      .raw()
      .toBuffer({ resolveWithObject: true });

    return BitmapUtils.fromRaw(data, info.width, info.height, info.channels);
  }
}

/**
 * Rasterizes text with the system's font renderer (librsvg inside sharp)
 */
export class SvgFontRasterizer implements IFontRasterizer {
  constructor(private readonly family: string = TEXT_FONT_FAMILY) {}

  load(size: number, bold: boolean): RasterFont {
    return new SvgRasterFont(size, bold, this.family);
  }
}
