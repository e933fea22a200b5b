import sharp from "sharp";
import { IOledDriver } from "@core/interfaces/IOledDriver";
import { II2cAdapter } from "@core/interfaces/II2cAdapter";
import {
  Bitmap1Bit,
  DisplayOptions,
  Rotation,
  ScreenshotSetting,
} from "@core/types";
import { DisplayError } from "@core/errors";
import {
  OLED_DEFAULT_BUS_NUMBER,
  OLED_DEFAULT_DRIVER,
  OLED_DEFAULT_SCREENSHOT_DIRECTORY,
} from "@core/constants";
import { getLogger } from "@utils/logger";
import { BitmapUtils } from "./BitmapUtils";
import { DrawContext } from "./DrawContext";
import { createOledDriver } from "./drivers/OledDriverFactory";

const logger = getLogger("Display");

const ISO_8601 =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

/**
 * Display
 *
 * Owns the panel driver and the in-memory canvas every screen draws on.
 * A frame is: prepare() (blank canvas), drawing through `draw`, then
 * show() (optionally rotate, push to the panel).
 *
 * One Display is shared by all screens; only one screen drives it at a
 * time.
 */
export class Display {
  static readonly DEFAULT_BUS_NUMBER = OLED_DEFAULT_BUS_NUMBER;
  static readonly SCREENSHOT_PATH = OLED_DEFAULT_SCREENSHOT_DIRECTORY;

  readonly width: number;
  readonly height: number;
  readonly rotation: Rotation;
  readonly screenshot: ScreenshotSetting;

  private canvas: Bitmap1Bit;
  private context: DrawContext;
  private readonly now: () => Date;

  /**
   * Wrap an already constructed driver. The panel is not touched; use
   * Display.open() or Display.create() to get an initialized display.
   */
  constructor(
    readonly device: IOledDriver,
    options: DisplayOptions = {},
  ) {
    this.width = device.width;
    this.height = device.height;
    this.rotation = options.rotation ?? null;
    this.screenshot = options.screenshot ?? false;
    this.now = options.now ?? (() => new Date());

    this.canvas = BitmapUtils.createBlankBitmap(this.width, this.height);
    this.context = new DrawContext(this.canvas);
  }

  /**
   * Build the driver named in the options on the given bus, initialize
   * the panel and allocate the canvas
   */
  static async create(
    adapter: II2cAdapter,
    options: DisplayOptions = {},
  ): Promise<Display> {
    const busNumber =
      options.busNumber !== undefined && Number.isInteger(options.busNumber)
        ? options.busNumber
        : Display.DEFAULT_BUS_NUMBER;

    const device = createOledDriver(
      options.driver ?? OLED_DEFAULT_DRIVER,
      adapter,
      { busNumber, address: options.address },
    );
    return Display.open(device, options);
  }

  /**
   * Initialize the panel behind `device` and return the display
   */
  static async open(
    device: IOledDriver,
    options: DisplayOptions = {},
  ): Promise<Display> {
    const display = new Display(device, options);
    await display.clear();
    logger.info(
      `Display ready: ${device.name} ${display.width}x${display.height}`,
    );
    return display;
  }

  /**
   * Current canvas image
   */
  get image(): Bitmap1Bit {
    return this.canvas;
  }

  /**
   * Draw context bound to the current canvas image
   */
  get draw(): DrawContext {
    return this.context;
  }

  /**
   * Re-initialize the panel and show a blank frame
   */
  async clear(): Promise<void> {
    await this.device.begin();
    this.device.clear();
    await this.device.display();
  }

  /**
   * Start a frame: blank the whole canvas
   */
  prepare(): void {
    this.context.rectangle(
      { x: 0, y: 0, width: this.width, height: this.height },
      0,
    );
  }

  /**
   * End a frame: apply the rotation, if any, and push the canvas to the
   * panel.
   *
   * The rotation is applied to the canvas itself, so calling show() twice
   * without prepare() in between rotates twice.
   */
  async show(): Promise<void> {
    if (this.rotation !== null && Number.isInteger(this.rotation)) {
      this.canvas = BitmapUtils.rotate(this.canvas, this.rotation);
      this.context = new DrawContext(this.canvas);
    }

    logger.time("show");
    this.device.image(this.canvas);
    await this.device.display();
    logger.timeEnd("show");
  }

  /**
   * Save the canvas as `<directory>/<name>.png` when screenshots are
   * enabled.
   * @returns the written path, or null when screenshots are off
   * @throws DisplayError when the file cannot be written
   */
  async captureScreenshot(name: string): Promise<string | null> {
    if (!this.screenshot) {
      return null;
    }

    const directory =
      typeof this.screenshot === "string"
        ? this.screenshot
        : Display.SCREENSHOT_PATH;
    const path = `${directory.replace(/\/+$/, "")}/${name.toLowerCase()}.png`;

    logger.info(`saving screenshot to '${path}'`);
    try {
      await sharp(BitmapUtils.toGreyscale(this.canvas), {
        raw: { width: this.width, height: this.height, channels: 1 },
      })
        .png()
        .toFile(path);
    } catch (error) {
      throw DisplayError.screenshotFailed(
        path,
        error instanceof Error ? error : new Error(String(error)),
      );
    }
    return path;
  }

  /**
   * Current UTC time as `T[HH:MM:SS]`
   */
  humanReadableTimeNow(): string {
    const now = this.now();
    const hh = String(now.getUTCHours()).padStart(2, "0");
    const mm = String(now.getUTCMinutes()).padStart(2, "0");
    const ss = String(now.getUTCSeconds()).padStart(2, "0");
    return `T[${hh}:${mm}:${ss}]`;
  }

  /**
   * Time elapsed since an ISO-8601 timestamp, e.g. "12.50m ago",
   * "3.25h ago" or "2.00d ago".
   * @throws DisplayError when the timestamp cannot be parsed
   */
  humanReadableTimeSince(dateString: string): string {
    const then = Display.parseIsoTimestamp(dateString);
    const totalSeconds = (this.now().getTime() - then.getTime()) / 1000;

    let value: number;
    let unit: string;
    if (totalSeconds < 3600) {
      value = totalSeconds / 60;
      unit = "m";
    } else if (totalSeconds < 86400) {
      value = totalSeconds / 3600;
      unit = "h";
    } else {
      value = totalSeconds / 86400;
      unit = "d";
    }

    return `${value.toFixed(2)}${unit} ago`;
  }

  /**
   * Parse an ISO-8601 date or date-time. A value without offset is taken
   * as UTC.
   */
  static parseIsoTimestamp(value: string): Date {
    const match = ISO_8601.exec(value.trim());
    if (!match) {
      throw DisplayError.invalidTimestamp(value);
    }

    const [, year, month, day, hour, minute, second, fraction, zone] = match;
    const fields = {
      year: Number(year),
      month: Number(month),
      day: Number(day),
      hour: Number(hour ?? 0),
      minute: Number(minute ?? 0),
      second: Number(second ?? 0),
    };
    const millis = fraction ? Math.floor(Number(`0.${fraction}`) * 1000) : 0;

    const utc = new Date(
      Date.UTC(
        fields.year,
        fields.month - 1,
        fields.day,
        fields.hour,
        fields.minute,
        fields.second,
        millis,
      ),
    );

    // Date.UTC rolls over out-of-range fields; reject instead
    if (
      utc.getUTCFullYear() !== fields.year ||
      utc.getUTCMonth() !== fields.month - 1 ||
      utc.getUTCDate() !== fields.day ||
      utc.getUTCHours() !== fields.hour ||
      utc.getUTCMinutes() !== fields.minute ||
      utc.getUTCSeconds() !== fields.second
    ) {
      throw DisplayError.invalidTimestamp(value);
    }

    return new Date(utc.getTime() - Display.offsetMinutes(zone) * 60000);
  }

  /**
   * Minutes east of UTC for a zone designator ("Z", "+02:00", "-0530")
   */
  private static offsetMinutes(zone: string | undefined): number {
    if (!zone || zone.toUpperCase() === "Z") {
      return 0;
    }
    const sign = zone.startsWith("-") ? -1 : 1;
    const digits = zone.slice(1).replace(":", "");
    const hours = Number(digits.slice(0, 2));
    const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
    return sign * (hours * 60 + minutes);
  }

  /**
   * Release the panel's transport
   */
  async dispose(): Promise<void> {
    await this.device.dispose();
  }
}
