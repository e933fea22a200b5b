import { BaseError } from "./BaseError";

/**
 * Metrics-related error codes
 */
export enum MetricsErrorCode {
  NOT_CONFIGURED = "METRICS_NOT_CONFIGURED",
  REQUEST_FAILED = "METRICS_REQUEST_FAILED",
  HTTP_ERROR = "METRICS_HTTP_ERROR",
  TIMEOUT = "METRICS_TIMEOUT",
  INVALID_RESPONSE = "METRICS_INVALID_RESPONSE",
  UNKNOWN = "METRICS_UNKNOWN_ERROR",
}

/**
 * Metrics Service Error
 */
export class MetricsError extends BaseError {
  constructor(
    message: string,
    code: MetricsErrorCode = MetricsErrorCode.UNKNOWN,
    recoverable: boolean = true,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }

  static notConfigured(): MetricsError {
    return new MetricsError(
      "Home Assistant base URL is not configured",
      MetricsErrorCode.NOT_CONFIGURED,
      false,
    );
  }

  static requestFailed(entityId: string, error: Error): MetricsError {
    return new MetricsError(
      `Request for ${entityId} failed: ${error.message}`,
      MetricsErrorCode.REQUEST_FAILED,
      true,
      { entityId, originalError: error.message },
    );
  }

  static httpError(entityId: string, status: number): MetricsError {
    return new MetricsError(
      `Request for ${entityId} returned HTTP ${status}`,
      MetricsErrorCode.HTTP_ERROR,
      status >= 500,
      { entityId, status },
    );
  }

  static timeout(entityId: string, timeoutMs: number): MetricsError {
    return new MetricsError(
      `Request for ${entityId} timed out after ${timeoutMs}ms`,
      MetricsErrorCode.TIMEOUT,
      true,
      { entityId, timeoutMs },
    );
  }

  static invalidResponse(entityId: string, reason: string): MetricsError {
    return new MetricsError(
      `Unexpected response for ${entityId}: ${reason}`,
      MetricsErrorCode.INVALID_RESPONSE,
      false,
      { entityId, reason },
    );
  }
}
