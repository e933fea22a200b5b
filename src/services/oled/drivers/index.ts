/**
 * OLED Drivers
 *
 * To add a controller:
 * 1. Create a driver class extending BaseOledDriver
 * 2. Add its name to OledDriverName
 * 3. Register it in OledDriverFactory
 */

export { BaseOledDriver, SSD130X } from "./BaseOledDriver";
export type { OledBusOptions } from "./BaseOledDriver";
export { Ssd1306Driver } from "./Ssd1306Driver";
export { Ssd1309Driver } from "./Ssd1309Driver";
export { MockOledDriver } from "./MockOledDriver";
export {
  createOledDriver,
  resolveOledDriverName,
  getSupportedDrivers,
  DEFAULT_OLED_DRIVER,
} from "./OledDriverFactory";

export type { IOledDriver } from "@core/interfaces/IOledDriver";
