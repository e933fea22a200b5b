/**
 * Core types for the OLED status display
 */
export * from "./ResultTypes";
export * from "./ConfigTypes";
export * from "./DisplayTypes";
export * from "./MetricsTypes";
