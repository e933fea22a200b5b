import winston from "winston";
import { getLogger } from "../logger";

class TestTransport extends winston.transports.Stream {
  logs: winston.Logform.TransformableInfo[] = [];

  constructor() {
    super({
      stream: process.stdout,
      format: winston.format.json(),
    });
  }

  log(info: winston.Logform.TransformableInfo, cb: () => void): void {
    this.logs.push(info);
    cb();
  }
}

describe("logger", () => {
  let levelBackup: string | undefined;
  let logOnlyBackup: string | undefined;

  beforeEach(() => {
    levelBackup = process.env.LOG_LEVEL;
    logOnlyBackup = process.env.LOG_ONLY;
    delete process.env.LOG_ONLY;
  });

  afterEach(() => {
    if (levelBackup === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = levelBackup;
    }
    if (logOnlyBackup === undefined) {
      delete process.env.LOG_ONLY;
    } else {
      process.env.LOG_ONLY = logOnlyBackup;
    }
  });

  it("should log info and above when LOG_LEVEL is not set", () => {
    process.env.LOG_LEVEL = "";
    const transport = new TestTransport();
    const logger = getLogger("Display", transport);

    logger.debug("debug");
    logger.info("info");

    expect(transport.logs).toHaveLength(1);
    expect(transport).toHaveProperty("logs[0].level", "info");
  });

  it("should log warn and above when LOG_LEVEL is warn", () => {
    process.env.LOG_LEVEL = "warn";
    const transport = new TestTransport();
    const logger = getLogger("Display", transport);

    logger.info("info");
    logger.warn("warn");
    logger.error("error");

    expect(transport.logs).toHaveLength(2);
    expect(transport).toHaveProperty("logs[0].level", "warn");
    expect(transport).toHaveProperty("logs[1].level", "error");
  });

  it("should attach the prefix as label", () => {
    process.env.LOG_LEVEL = "info";
    const transport = new TestTransport();
    const logger = getLogger("Screen", transport);

    logger.info("'StatusScreen' created");

    expect(transport).toHaveProperty("logs[0].label", "Screen");
    expect(transport).toHaveProperty(
      "logs[0].message",
      "'StatusScreen' created",
    );
  });

  it("should drop loggers not named in LOG_ONLY", () => {
    process.env.LOG_LEVEL = "info";
    process.env.LOG_ONLY = "Display, HomeAssistant";
    const silenced = new TestTransport();
    const allowed = new TestTransport();

    getLogger("Screen", silenced).info("hidden");
    getLogger("HomeAssistant", allowed).info("shown");

    expect(silenced.logs).toHaveLength(0);
    expect(allowed.logs).toHaveLength(1);
  });

  describe("timing functionality", () => {
    it("should log the elapsed time of a timer", async () => {
      process.env.LOG_LEVEL = "info";
      const transport = new TestTransport();
      const logger = getLogger("Display", transport);

      logger.time("flip");
      await new Promise((resolve) => setTimeout(resolve, 20));
      logger.timeEnd("flip");

      expect(transport.logs).toHaveLength(1);
      expect(String(transport.logs[0].message)).toMatch(/^flip: \d+ms$/);
    });

    it("should warn when timeEnd is called without time", () => {
      process.env.LOG_LEVEL = "info";
      const transport = new TestTransport();
      const logger = getLogger("Display", transport);

      logger.timeEnd("nonexistent");

      expect(transport).toHaveProperty("logs[0].level", "warn");
      expect(transport).toHaveProperty(
        "logs[0].message",
        "Timer 'nonexistent' does not exist",
      );
    });

    it("should remove the timer after timeEnd", () => {
      process.env.LOG_LEVEL = "info";
      const transport = new TestTransport();
      const logger = getLogger("Display", transport);

      logger.time("flip");
      logger.timeEnd("flip");
      logger.timeEnd("flip");

      expect(transport.logs).toHaveLength(2);
      expect(transport).toHaveProperty("logs[1].level", "warn");
    });
  });
});
