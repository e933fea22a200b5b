import { Result, success, failure } from "@core/types";
import { BaseError, DisplayError } from "@core/errors";
import { SCREEN_RETRY_DELAY_MS } from "@core/constants";
import { getLogger } from "@utils/logger";
import { Display } from "@services/oled/Display";
import { BaseScreen } from "@services/screens/BaseScreen";

const logger = getLogger("ScreenRotator");

/**
 * What the rotator needs of a screen
 */
export type RotatorScreen = Pick<BaseScreen, "name" | "run">;

export type ScreenRotatorOptions = {
  display: Display;

  /** Screens shown in turn, in this order */
  screens: RotatorScreen[];

  /** Shown once after stop() */
  exitScreen?: RotatorScreen;

  /** Pause after a cycle in which every screen failed */
  retryDelayMs?: number;
};

/**
 * Shows screens one after the other until stopped
 *
 * Only one screen runs at a time: each run() is awaited before the next
 * starts, so screens never draw over each other on the shared display.
 * A screen that throws is logged and skipped for this cycle, as a warning
 * when its error is recoverable.
 */
export class ScreenRotator {
  private readonly display: Display;
  private readonly screens: RotatorScreen[];
  private readonly exitScreen: RotatorScreen | null;
  private readonly retryDelayMs: number;

  private running: boolean = false;
  private loop: Promise<void> | null = null;
  private cycles: number = 0;

  constructor(options: ScreenRotatorOptions) {
    this.display = options.display;
    this.screens = options.screens;
    this.exitScreen = options.exitScreen ?? null;
    this.retryDelayMs = options.retryDelayMs ?? SCREEN_RETRY_DELAY_MS;
  }

  /**
   * Start the rotation in the background
   */
  start(): Result<void> {
    if (this.screens.length === 0) {
      return failure(DisplayError.noScreens());
    }
    if (this.running) {
      logger.warn("Rotation already running");
      return failure(DisplayError.alreadyRunning());
    }

    logger.info(
      `Starting rotation: ${this.screens.map((screen) => screen.name).join(", ")}`,
    );
    this.running = true;
    this.loop = this.rotate();
    return success(undefined);
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Completed passes through the playlist
   */
  getCycleCount(): number {
    return this.cycles;
  }

  /**
   * Let the current screen finish, show the exit screen and clear the
   * panel
   */
  async stop(): Promise<void> {
    if (!this.loop) {
      logger.info("Rotation not running, nothing to stop");
      return;
    }

    logger.info("Stopping rotation");
    this.running = false;
    await this.loop;
    this.loop = null;

    if (this.exitScreen) {
      await this.runScreen(this.exitScreen);
    }
    await this.display.clear();
    logger.info("✓ Rotation stopped");
  }

  private async rotate(): Promise<void> {
    while (this.running) {
      let failures = 0;
      for (const screen of this.screens) {
        if (!this.running) {
          return;
        }
        if (!(await this.runScreen(screen))) {
          failures++;
        }
      }
      this.cycles++;

      if (failures === this.screens.length && this.running) {
        logger.warn(
          `Every screen failed, retrying in ${this.retryDelayMs}ms`,
        );
        await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs));
      }
    }
  }

  /**
   * Run one screen, logging instead of throwing
   * @returns whether the screen ran without error
   */
  private async runScreen(screen: RotatorScreen): Promise<boolean> {
    try {
      await screen.run();
      return true;
    } catch (error) {
      const detail =
        error instanceof BaseError
          ? error.toLogString()
          : error instanceof Error
            ? error.message
            : String(error);
      if (BaseError.isRecoverable(error)) {
        logger.warn(
          `Screen '${screen.name}' failed, running it again next cycle: ${detail}`,
        );
      } else {
        logger.error(`Screen '${screen.name}' failed: ${detail}`);
      }
      return false;
    }
  }
}
