import { HomeAssistantConfig, ScreensConfig, StatusEntities } from "@core/types";
import { SCREEN_RETRY_DELAY_MS, SHUTDOWN_MARGIN_MS } from "@core/constants";

/**
 * How long a graceful shutdown may take before the process is forced out.
 *
 * stop() waits for the screen on the panel to finish: every status entity
 * read may run into the request timeout, then the status hold runs out, or
 * the loop is in its retry pause. The exit screen's hold comes after that.
 */
export function getShutdownTimeoutMs(
  screens: ScreensConfig,
  homeAssistant: HomeAssistantConfig,
): number {
  const entityReads = Object.keys(StatusEntities).length;
  return (
    (screens.statusDuration + screens.exitDuration) * 1000 +
    entityReads * homeAssistant.timeoutMs +
    SCREEN_RETRY_DELAY_MS +
    SHUTDOWN_MARGIN_MS
  );
}
