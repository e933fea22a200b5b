import { getUserMessage } from "./ErrorMessages";

/**
 * Root of the application's errors: a message plus a code from one of the
 * `*ErrorCode` enums, with the moment it happened and optional context.
 *
 * `recoverable` tells the screen loop what to expect of the next cycle. A
 * recoverable error (an I2C hiccup, a Home Assistant timeout) is logged as
 * a warning and the screen simply runs again; anything else is logged as
 * an error, though the loop still carries on with the next screen.
 */
export abstract class BaseError extends Error {
  readonly code: string;
  readonly timestamp: Date = new Date();
  readonly context?: Record<string, unknown>;
  readonly recoverable: boolean;

  constructor(
    message: string,
    code: string,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.recoverable = recoverable;
    this.context = context;
  }

  /**
   * Whether `error` is one the next cycle may get past. Errors that are not
   * ours carry no such promise.
   */
  static isRecoverable(error: unknown): boolean {
    return error instanceof BaseError && error.recoverable;
  }

  /**
   * `[CODE] message`, the form the log lines use
   */
  toLogString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      recoverable: this.recoverable,
      context: this.context,
      stack: this.stack,
    };
  }

  /**
   * Message for people looking at logs or the panel, by code
   */
  getUserMessage(): string {
    return getUserMessage(this.code);
  }
}
