/**
 * Error classes of the OLED status display
 *
 * All custom errors extend BaseError and carry an error code, a timestamp,
 * optional context and a recoverable flag. User-facing messages live in
 * ErrorMessages.ts.
 */

export * from "./BaseError";
export * from "./DisplayError";
export * from "./ConfigError";
export * from "./MetricsError";
export * from "./ErrorMessages";
