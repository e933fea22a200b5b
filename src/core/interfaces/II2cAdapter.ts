/**
 * I2C Transport Interface
 *
 * Abstracts the bus an SSD130x controller sits on so drivers can run
 * against real hardware (i2c-bus) or a recording mock.
 */
export interface II2cAdapter {
  /**
   * Open the bus and remember the device address
   */
  open(busNumber: number, address: number): Promise<void>;

  /**
   * Close the bus
   */
  close(): Promise<void>;

  isOpen(): boolean;

  /**
   * Send a single command byte (control byte 0x00)
   */
  writeCommand(command: number): Promise<void>;

  /**
   * Send display RAM data (control byte 0x40)
   */
  writeData(data: Uint8Array): Promise<void>;
}
