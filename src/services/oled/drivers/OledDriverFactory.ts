import { IOledDriver } from "@core/interfaces/IOledDriver";
import { II2cAdapter } from "@core/interfaces/II2cAdapter";
import { OledDriverName } from "@core/types";
import { getLogger } from "@utils/logger";
import { OledBusOptions } from "./BaseOledDriver";
import { Ssd1306Driver } from "./Ssd1306Driver";
import { Ssd1309Driver } from "./Ssd1309Driver";

const logger = getLogger("OledDriverFactory");

type DriverFactory = (adapter: II2cAdapter, options: OledBusOptions) => IOledDriver;

/**
 * The closed set of supported controllers
 */
const DRIVERS: Record<OledDriverName, DriverFactory> = {
  [OledDriverName.SSD1306]: (adapter, options) =>
    new Ssd1306Driver(adapter, options),
  [OledDriverName.SSD1309]: (adapter, options) =>
    new Ssd1309Driver(adapter, options),
};

/**
 * Controller used for names outside the supported set
 */
export const DEFAULT_OLED_DRIVER = OledDriverName.SSD1306;

function isOledDriverName(name: string): name is OledDriverName {
  return Object.prototype.hasOwnProperty.call(DRIVERS, name);
}

/**
 * Resolve a configured controller name. Unknown names resolve to the
 * default controller; the substitution is logged, not raised.
 */
export function resolveOledDriverName(name: string): OledDriverName {
  if (isOledDriverName(name)) {
    return name;
  }
  logger.warn(
    `Unknown driver '${name}', falling back to ${DEFAULT_OLED_DRIVER}`,
  );
  return DEFAULT_OLED_DRIVER;
}

/**
 * Create the driver for a controller name
 */
export function createOledDriver(
  name: string,
  adapter: II2cAdapter,
  options: OledBusOptions = {},
): IOledDriver {
  const resolved = resolveOledDriverName(name);
  logger.info(`Creating a ${resolved} driver`);
  return DRIVERS[resolved](adapter, options);
}

export function getSupportedDrivers(): OledDriverName[] {
  return Object.values(OledDriverName);
}
