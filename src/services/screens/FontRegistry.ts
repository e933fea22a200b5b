import { IFontRasterizer, RasterFont } from "@core/interfaces";
import { getLogger } from "@utils/logger";
import { SvgFontRasterizer } from "./SvgFontRasterizer";

const logger = getLogger("FontRegistry");

/**
 * Cache of loaded fonts keyed by size and weight
 *
 * Fonts are loaded on first use and then shared by every screen.
 */
export class FontRegistry {
  private readonly fonts = new Map<string, RasterFont>();

  constructor(
    private readonly rasterizer: IFontRasterizer = new SvgFontRasterizer(),
  ) {}

  /**
   * `font_<size>` or `font_<size>_bold`
   */
  static key(size: number, bold: boolean): string {
    return bold ? `font_${size}_bold` : `font_${size}`;
  }

  get(size: number, bold: boolean = false): RasterFont {
    const key = FontRegistry.key(size, bold);
    const cached = this.fonts.get(key);
    if (cached) {
      return cached;
    }

    logger.debug(`loading ${key}`);
    const font = this.rasterizer.load(size, bold);
    this.fonts.set(key, font);
    return font;
  }

  has(size: number, bold: boolean = false): boolean {
    return this.fonts.has(FontRegistry.key(size, bold));
  }

  get size(): number {
    return this.fonts.size;
  }
}

/**
 * Registry shared by all screens of the process
 */
export const defaultFontRegistry = new FontRegistry();
