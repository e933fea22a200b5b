import { II2cAdapter } from "@core/interfaces/II2cAdapter";
import { DisplayError } from "@core/errors";
import { getLogger } from "@utils/logger";

const logger = getLogger("MockI2cAdapter");

/**
 * One transfer seen by the mock bus
 */
export type I2cWrite =
  | { type: "cmd"; value: number }
  | { type: "data"; value: Uint8Array };

/**
 * Mock I2C transport for tests and for running off the board
 *
 * Records the most recent transfers so tests can assert the exact byte
 * stream a driver sends. Older entries are dropped once `maxLogEntries` is
 * reached, which keeps a long running off-board loop at a fixed size.
 */
export class MockI2cAdapter implements II2cAdapter {
  /** About 60 full frames of a 128x64 panel */
  static readonly DEFAULT_MAX_LOG_ENTRIES = 4096;

  private opened: boolean = false;
  private busNumber: number | null = null;
  private address: number | null = null;
  private writeLog: I2cWrite[] = [];

  constructor(
    private readonly maxLogEntries: number = MockI2cAdapter.DEFAULT_MAX_LOG_ENTRIES,
  ) {}

  async open(busNumber: number, address: number): Promise<void> {
    if (this.opened) {
      logger.warn("MockI2cAdapter already open");
      return;
    }
    logger.info(
      `Opening mock I2C bus ${busNumber}, device 0x${address.toString(16)}`,
    );
    this.busNumber = busNumber;
    this.address = address;
    this.opened = true;
  }

  async close(): Promise<void> {
    this.opened = false;
  }

  isOpen(): boolean {
    return this.opened;
  }

  async writeCommand(command: number): Promise<void> {
    this.ensureOpen();
    this.record({ type: "cmd", value: command });
    logger.debug(`Command: 0x${command.toString(16).padStart(2, "0")}`);
  }

  async writeData(data: Uint8Array): Promise<void> {
    this.ensureOpen();
    this.record({ type: "data", value: Uint8Array.from(data) });
    logger.debug(`Data: ${data.length} bytes`);
  }

  // --- Test helpers ---

  getBusNumber(): number | null {
    return this.busNumber;
  }

  getAddress(): number | null {
    return this.address;
  }

  getWrites(): I2cWrite[] {
    return [...this.writeLog];
  }

  /**
   * Command bytes in the order they were sent
   */
  getCommands(): number[] {
    const commands: number[] = [];
    for (const write of this.writeLog) {
      if (write.type === "cmd") commands.push(write.value);
    }
    return commands;
  }

  /**
   * All data bytes, concatenated
   */
  getData(): Uint8Array {
    const chunks: number[] = [];
    for (const write of this.writeLog) {
      if (write.type === "data") chunks.push(...write.value);
    }
    return Uint8Array.from(chunks);
  }

  clearLog(): void {
    this.writeLog = [];
  }

  private record(write: I2cWrite): void {
    this.writeLog.push(write);
    if (this.writeLog.length > this.maxLogEntries) {
      this.writeLog.shift();
    }
  }

  private ensureOpen(): void {
    if (!this.opened) {
      throw DisplayError.notInitialized();
    }
  }
}
