import dotenv from "dotenv";
dotenv.config();

import { ServiceContainer } from "@di/ServiceContainer";
import { isSuccess } from "@core/types";
import { ScreenRotator } from "@services/rotator/ScreenRotator";
import { Display } from "@services/oled/Display";
import { getLogger } from "@utils/logger";
import { getShutdownTimeoutMs } from "@utils/shutdown";

const logger = getLogger("OledStatus");

/**
 * Main Entry Point for the OLED status display
 *
 * 1. Loads the configuration
 * 2. Initializes the panel
 * 3. Rotates through the screens until a shutdown signal arrives
 */
async function main() {
  logger.info("🚀 Starting OLED status display...");

  try {
    const container = ServiceContainer.getInstance();

    logger.info("Loading configuration...");
    const configResult = await container.getConfigService().initialize();
    if (!isSuccess(configResult)) {
      logger.error(
        `Failed to load configuration: ${configResult.error.message}`,
      );
      process.exit(1);
    }
    logger.info("✓ Configuration loaded");

    logger.info("Initializing display...");
    const display = await container.getDisplay();
    logger.info(`✓ Display ready (${display.width}x${display.height})`);

    const rotator = await container.getScreenRotator();
    const startResult = rotator.start();
    if (!isSuccess(startResult)) {
      logger.error(`Failed to start screens: ${startResult.error.message}`);
      process.exit(1);
    }

    logger.info("✅ OLED status display is running");

    const config = container.getConfigService();
    setupGracefulShutdown(
      rotator,
      display,
      getShutdownTimeoutMs(
        config.getScreensConfig(),
        config.getHomeAssistantConfig(),
      ),
    );
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    logger.error(`Fatal error during startup: ${errorMsg}`);
    process.exit(1);
  }
}

/**
 * Setup handlers for graceful shutdown
 */
function setupGracefulShutdown(
  rotator: ScreenRotator,
  display: Display,
  timeoutMs: number,
): void {
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`${signal} received. Shutting down gracefully...`);

    // Force exit if the current screen, the goodbye or the clear hang
    const forceExitTimeout = setTimeout(() => {
      logger.warn(`Shutdown took over ${timeoutMs}ms, forcing exit`);
      process.exit(1);
    }, timeoutMs);

    try {
      await rotator.stop();
      await display.dispose();

      clearTimeout(forceExitTimeout);
      logger.info("✓ Shutdown complete");
      process.exit(0);
    } catch (error) {
      clearTimeout(forceExitTimeout);
      const errorMsg = error instanceof Error ? error.message : String(error);
      logger.error(`Error during shutdown: ${errorMsg}`);
      process.exit(1);
    }
  };

  // Handle shutdown signals
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  // Handle uncaught errors
  process.on("uncaughtException", (error) => {
    logger.error(`Uncaught exception: ${error.message}`);
    void shutdown("UNCAUGHT_EXCEPTION");
  });

  process.on("unhandledRejection", (reason) => {
    logger.error(`Unhandled rejection: ${String(reason)}`);
    void shutdown("UNHANDLED_REJECTION");
  });
}

// Start the application
main().catch((error) => {
  logger.error(`Failed to start application: ${String(error)}`);
  process.exit(1);
});
