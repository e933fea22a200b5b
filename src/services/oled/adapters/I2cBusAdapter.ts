import * as i2c from "i2c-bus";
import { II2cAdapter } from "@core/interfaces/II2cAdapter";
import { DisplayError } from "@core/errors";
import { getLogger } from "@utils/logger";

const logger = getLogger("I2cBusAdapter");

/** Control byte announcing a command */
const CONTROL_COMMAND = 0x00;

/** Control byte announcing display RAM data */
const CONTROL_DATA = 0x40;

/**
 * I2C transport backed by the i2c-bus library
 *
 * Used on the board itself; anywhere else the MockI2cAdapter stands in.
 */
export class I2cBusAdapter implements II2cAdapter {
  private bus: i2c.PromisifiedBus | null = null;
  private address: number = 0;

  async open(busNumber: number, address: number): Promise<void> {
    if (this.bus) {
      logger.warn("I2C bus already open");
      return;
    }

    logger.info(
      `Opening I2C bus ${busNumber}, device 0x${address.toString(16)}`,
    );
    try {
      this.bus = await i2c.openPromisified(busNumber);
      this.address = address;
    } catch (error) {
      throw DisplayError.initFailed(
        `cannot open I2C bus ${busNumber}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  async close(): Promise<void> {
    if (!this.bus) {
      return;
    }
    await this.bus.close();
    this.bus = null;
    logger.info("I2C bus closed");
  }

  isOpen(): boolean {
    return this.bus !== null;
  }

  async writeCommand(command: number): Promise<void> {
    const bus = this.requireBus();
    try {
      await bus.writeByte(this.address, CONTROL_COMMAND, command);
    } catch (error) {
      throw this.wrapError(error);
    }
  }

  async writeData(data: Uint8Array): Promise<void> {
    const bus = this.requireBus();
    const payload = Buffer.alloc(data.length + 1);
    payload[0] = CONTROL_DATA;
    payload.set(data, 1);
    try {
      await bus.i2cWrite(this.address, payload.length, payload);
    } catch (error) {
      throw this.wrapError(error);
    }
  }

  private requireBus(): i2c.PromisifiedBus {
    if (!this.bus) {
      throw DisplayError.notInitialized();
    }
    return this.bus;
  }

  private wrapError(error: unknown): DisplayError {
    return DisplayError.i2cError(
      this.address,
      error instanceof Error ? error : new Error(String(error)),
    );
  }
}
