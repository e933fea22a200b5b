/**
 * Service contracts of the OLED status display
 */

export * from "./IConfigService";
export * from "./IMetricsService";
export * from "./IFontRasterizer";

// Panel abstraction interfaces
export * from "./IOledDriver";
export * from "./II2cAdapter";
