import winston from "winston";

/**
 * winston logger with a console.time style timer
 */
export interface Logger extends winston.Logger {
  time(label: string): void;
  timeEnd(label: string): void;
}

/**
 * Logger prefixes allowed by LOG_ONLY, or null when every logger may log
 */
const getAllowedLoggers = (): Set<string> | null => {
  const logOnly = process.env.LOG_ONLY;
  if (!logOnly) return null;
  return new Set(logOnly.split(",").map((s) => s.trim()));
};

/**
 * Create a logger whose lines are prefixed with `[prefix]`.
 *
 * Logs go to stdout, plus the optional extra transport (tests pass one to
 * capture output). The level comes from LOG_LEVEL and defaults to `info`.
 *
 * @example
 * const logger = getLogger("Display");
 * logger.info("Creating a SSD1306 driver");
 * logger.time("flip");
 * // ... push the frame
 * logger.timeEnd("flip"); // [Display] flip: 12ms
 *
 * @remarks
 * Set LOG_ONLY=Display,Screen to only see those loggers.
 */
export const getLogger = (
  prefix: string,
  transport?: winston.transport,
): Logger => {
  const allowedLoggers = getAllowedLoggers();

  const filterFormat = winston.format((info) => {
    if (
      allowedLoggers &&
      !(typeof info.label === "string" && allowedLoggers.has(info.label))
    ) {
      return false;
    }
    return info;
  });

  const baseLogger = winston.createLogger({
    level: process.env.LOG_LEVEL || "info",
    format: winston.format.combine(
      winston.format.label({ label: prefix }),
      winston.format.timestamp(),
      filterFormat(),
      winston.format.printf(({ label, level, message }) => {
        return `[${label}] ${level}: ${message}`;
      }),
    ),
    transports: [
      new winston.transports.Console(),
      ...(transport ? [transport] : []),
    ],
  });

  const timers = new Map<string, number>();

  const time = (label: string): void => {
    timers.set(label, Date.now());
  };

  const timeEnd = (label: string): void => {
    const startTime = timers.get(label);
    if (startTime === undefined) {
      baseLogger.warn(`Timer '${label}' does not exist`);
      return;
    }

    baseLogger.info(`${label}: ${Date.now() - startTime}ms`);
    timers.delete(label);
  };

  return Object.assign(baseLogger, { time, timeEnd });
};
