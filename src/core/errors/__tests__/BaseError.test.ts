import { BaseError } from "@errors/BaseError";

class TestError extends BaseError {
  constructor(
    message: string,
    code: string = "TEST_ERROR",
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }
}

describe("BaseError", () => {
  describe("constructor", () => {
    it("should create error with message and code", () => {
      const error = new TestError("Test message", "TEST_CODE");

      expect(error.message).toBe("Test message");
      expect(error.code).toBe("TEST_CODE");
      expect(error.recoverable).toBe(false);
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it("should keep recoverable flag and context", () => {
      const context = { key: "value" };
      const error = new TestError("Test message", "TEST_CODE", true, context);

      expect(error.recoverable).toBe(true);
      expect(error.context).toEqual(context);
    });

    it("should set the error name to the subclass name", () => {
      const error = new TestError("Test message");
      expect(error.name).toBe("TestError");
    });

    it("should be an instance of Error and of the subclass", () => {
      const error = new TestError("Test message");
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(TestError);
    });
  });

  describe("isRecoverable", () => {
    it("should follow the flag of our own errors", () => {
      expect(
        BaseError.isRecoverable(new TestError("Busy", "TEST_CODE", true)),
      ).toBe(true);
      expect(BaseError.isRecoverable(new TestError("Broken"))).toBe(false);
    });

    it("should treat foreign errors and values as not recoverable", () => {
      expect(BaseError.isRecoverable(new Error("plain"))).toBe(false);
      expect(BaseError.isRecoverable("text")).toBe(false);
      expect(BaseError.isRecoverable(undefined)).toBe(false);
    });
  });

  describe("toLogString", () => {
    it("should put the code before the message", () => {
      const error = new TestError("Bus busy", "DISPLAY_I2C_ERROR");
      expect(error.toLogString()).toBe("[DISPLAY_I2C_ERROR] Bus busy");
    });
  });

  describe("toJSON", () => {
    it("should serialize error to a plain object", () => {
      const error = new TestError("Test message", "TEST_CODE", true, {
        key: "value",
      });
      const json = error.toJSON();

      expect(json.name).toBe("TestError");
      expect(json.message).toBe("Test message");
      expect(json.code).toBe("TEST_CODE");
      expect(json.recoverable).toBe(true);
      expect(json.context).toEqual({ key: "value" });
      expect(json.timestamp).toBe(error.timestamp.toISOString());
      expect(json.stack).toBeDefined();
    });
  });

  describe("getUserMessage", () => {
    it("should return the centralized message for a known code", () => {
      const error = new TestError("Technical", "DISPLAY_I2C_ERROR");
      expect(error.getUserMessage()).toBe(
        "Communication with the OLED panel failed.",
      );
    });

    it("should return the category fallback for an unknown code of a known category", () => {
      const error = new TestError("Technical", "METRICS_SOMETHING_NEW");
      expect(error.getUserMessage()).toBe("Metrics error occurred.");
    });

    it("should return the generic fallback for an unknown category", () => {
      const error = new TestError("Technical", "UNKNOWN_CODE");
      expect(error.getUserMessage()).toBe("An error occurred.");
    });
  });
});
