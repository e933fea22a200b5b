import { RasterFont } from "@core/interfaces";
import { DisplayError } from "@core/errors";
import {
  TEXT_INITIAL_FONT_SIZE,
  TEXT_MAX_LINES,
  TEXT_NARROW_INDENT,
} from "@core/constants";
import { getLogger, Logger } from "@utils/logger";
import { Display } from "@services/oled/Display";
import { FontRegistry, defaultFontRegistry } from "./FontRegistry";

/**
 * Options shared by every screen
 */
export type ScreenOptions = {
  /** Display the screen draws on; shared between screens */
  display: Display;

  /** Seconds the screen stays visible after it is shown */
  duration: number;

  /** Font cache, the process-wide registry by default */
  fonts?: FontRegistry;
};

/**
 * Vertical offsets of the text lines, by number of lines
 */
const TEXT_Y: Record<number, number[]> = {
  1: [0],
  2: [0, 18],
  3: [0, 11, 21],
  4: [0, 11, 21, 31, 41, 51],
  5: [0, 11, 21, 31, 41, 51],
};

/**
 * Base class of all screens
 *
 * A screen renders one frame on the shared Display: run() blanks the
 * canvas and calls render(), which subclasses override to lay out their
 * content and show it.
 *
 * Text is laid out by line count: fewer lines get a larger font, and
 * screens with an indent of 10 pixels or more get a slightly smaller one.
 */
export class BaseScreen {
  readonly display: Display;
  readonly duration: number;

  protected readonly logger: Logger;
  protected readonly fonts: FontRegistry;

  private lineCount: number = 0;
  private currentFontSize: number = TEXT_INITIAL_FONT_SIZE;

  constructor(options: ScreenOptions) {
    this.display = options.display;
    this.duration = options.duration;
    this.fonts = options.fonts ?? defaultFontRegistry;
    this.logger = getLogger("Screen");
    this.logger.info(`'${this.constructor.name}' created`);
  }

  /**
   * Class name in lower case without "screen", e.g. "status"
   */
  get name(): string {
    return this.constructor.name.toLowerCase().replace(/screen/g, "");
  }

  /**
   * Left margin of every text line
   */
  get textIndent(): number {
    return 0;
  }

  /**
   * Number of lines of the last text layout
   */
  get textLines(): number {
    return this.lineCount;
  }

  get fontSize(): number {
    return this.currentFontSize;
  }

  /**
   * Record the number of text lines and pick the font size for it
   */
  setTextLines(lines: number): void {
    this.lineCount = lines;
    const narrow = this.textIndent >= TEXT_NARROW_INDENT;
    if (lines > 2) {
      this.currentFontSize = narrow ? 9 : 10;
    } else {
      this.currentFontSize = narrow ? 13 : 14;
    }
  }

  /**
   * Offsets of the text lines for the current line count, or null when
   * there is no layout for it
   */
  get textY(): number[] | null {
    return BaseScreen.textYFor(this.lineCount);
  }

  static textYFor(lines: number): number[] | null {
    return TEXT_Y[lines] ?? null;
  }

  /**
   * Offsets for a line count that must have a layout
   * @throws DisplayError for counts outside 1-5
   */
  protected textOffsets(lines: number): number[] {
    const offsets = BaseScreen.textYFor(lines);
    if (!offsets) {
      throw DisplayError.unsupportedLineCount(lines, TEXT_MAX_LINES);
    }
    return offsets;
  }

  /**
   * Draw lines of text at the layout for their count. Only the first five
   * lines are drawn.
   */
  async displayText(lines: string[]): Promise<void> {
    if (lines.length === 0) {
      return;
    }

    this.setTextLines(lines.length);
    const offsets = this.textOffsets(Math.min(lines.length, TEXT_MAX_LINES));
    const font = this.font();

    const drawn = lines.slice(0, TEXT_MAX_LINES);
    for (let i = 0; i < drawn.length; i++) {
      await this.display.draw.text(
        { x: this.textIndent, y: offsets[i] },
        drawn[i],
        font,
        255,
      );
    }
  }

  /**
   * Font of the given size, the current font size by default
   */
  font(size?: number, bold: boolean = false): RasterFont {
    return this.fonts.get(size || this.currentFontSize, bold);
  }

  async captureScreenshot(name?: string): Promise<void> {
    await this.display.captureScreenshot(name || this.name);
  }

  /**
   * Screenshot, show the frame and hold it for the screen's duration
   */
  async renderWithDefaults(): Promise<void> {
    await this.captureScreenshot();
    await this.display.show();
    await new Promise((resolve) => setTimeout(resolve, this.duration * 1000));
  }

  async render(): Promise<void> {
    await this.display.show();
  }

  /**
   * Render one frame from a blank canvas
   */
  async run(): Promise<void> {
    this.display.prepare();
    await this.render();
  }
}
