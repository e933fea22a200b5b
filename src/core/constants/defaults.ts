/**
 * Default Configuration Constants
 *
 * Default values used when neither the configuration file nor the
 * environment provides one.
 */

// =============================================================================
// OLED Defaults
// =============================================================================

/**
 * I2C bus the panel hangs off
 * Bus 1 is the header I2C bus on a Raspberry Pi
 */
export const OLED_DEFAULT_BUS_NUMBER = 1;

/**
 * I2C address of SSD130x controllers with the address pin low
 */
export const OLED_DEFAULT_ADDRESS = 0x3c;

/**
 * Controller used when the configured name is not recognised
 */
export const OLED_DEFAULT_DRIVER = "SSD1306";

/**
 * Directory screenshots go to when enabled without an explicit path
 */
export const OLED_DEFAULT_SCREENSHOT_DIRECTORY = "./img/examples/";

/**
 * Bytes of pixel data per I2C transfer
 */
export const OLED_I2C_CHUNK_SIZE = 16;

// =============================================================================
// Text Layout
// =============================================================================

/**
 * Most lines a screen ever draws; anything after is dropped
 */
export const TEXT_MAX_LINES = 5;

/**
 * Indent from which the smaller font sizes are used
 */
export const TEXT_NARROW_INDENT = 10;

/**
 * Font family used for screen text
 */
export const TEXT_FONT_FAMILY = "DejaVu Sans";

/**
 * Font ascent as a fraction of the font size (DejaVu Sans)
 * Text drawn at y has the top of its ascent at y
 */
export const TEXT_FONT_ASCENT = 0.928;

/**
 * Font descent as a fraction of the font size (DejaVu Sans)
 */
export const TEXT_FONT_DESCENT = 0.236;

/**
 * Font size a screen starts with before any text is laid out
 */
export const TEXT_INITIAL_FONT_SIZE = 8;

// =============================================================================
// Home Assistant Defaults
// =============================================================================

/**
 * Request timeout for the Home Assistant REST API
 */
export const HASS_DEFAULT_TIMEOUT_MS = 5000;

// =============================================================================
// Screen Defaults
// =============================================================================

/**
 * Seconds the status screen stays up before the next screen runs
 */
export const SCREEN_DEFAULT_STATUS_DURATION = 10;

/**
 * Seconds the goodbye message stays up on shutdown
 */
export const SCREEN_DEFAULT_EXIT_DURATION = 2;

/**
 * Shown instead of the ping latency when the probe is not "on"
 */
export const STATUS_PING_UNAVAILABLE = "XXX";

/**
 * Shown for metric values the collaborator could not provide
 */
export const STATUS_VALUE_MISSING = "?";

/**
 * Pause before the next cycle when every screen of a cycle failed
 */
export const SCREEN_RETRY_DELAY_MS = 1000;

/**
 * Slack on top of the longest possible stop() before a shutdown is forced
 */
export const SHUTDOWN_MARGIN_MS = 5000;
