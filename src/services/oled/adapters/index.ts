/**
 * I2C transports
 *
 * I2cBusAdapter is not exported here so importing the barrel never loads
 * the native i2c-bus module off the board.
 */
export { MockI2cAdapter } from "./MockI2cAdapter";
export type { I2cWrite } from "./MockI2cAdapter";
