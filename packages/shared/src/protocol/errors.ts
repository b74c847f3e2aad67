/**
 * Error categories for the serial bridge
 */
export enum ErrorCategory {
  CONNECTION = 'connection',
  VALIDATION = 'validation',
  CAPACITY = 'capacity',
  SYSTEM = 'system',
}

/**
 * Error codes organized by category
 *
 * 1xxx - Connection errors
 * 2xxx - Validation errors
 * 3xxx - Capacity errors
 * 5xxx - System errors
 */
export enum ErrorCode {
  // Connection errors (1xxx)
  SERIAL_NOT_CONNECTED = 1001,
  SERIAL_WRITE_FAILED = 1002,
  SERIAL_OPEN_FAILED = 1003,
  BRIDGE_UNREACHABLE = 1004,

  // Validation errors (2xxx)
  INVALID_JSON = 2001,
  INVALID_REQUEST = 2002,
  MISSING_TOPIC = 2003,
  CONFIG_INVALID = 2004,

  // Capacity errors (3xxx)
  CONNECTION_LIMIT_REACHED = 3001,

  // System errors (5xxx)
  NOT_FOUND = 5001,
  INTERNAL_ERROR = 5002,
}

/**
 * Get the category for an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  if (code >= 1000 && code < 2000) return ErrorCategory.CONNECTION;
  if (code >= 2000 && code < 3000) return ErrorCategory.VALIDATION;
  if (code >= 3000 && code < 4000) return ErrorCategory.CAPACITY;
  return ErrorCategory.SYSTEM;
}

/**
 * Check if an error is recoverable (retry might succeed)
 */
export function isRecoverable(code: ErrorCode): boolean {
  const recoverableCodes = new Set([
    ErrorCode.SERIAL_NOT_CONNECTED,
    ErrorCode.SERIAL_WRITE_FAILED,
    ErrorCode.SERIAL_OPEN_FAILED,
    ErrorCode.BRIDGE_UNREACHABLE,
    ErrorCode.CONNECTION_LIMIT_REACHED,
  ]);
  return recoverableCodes.has(code);
}

/**
 * HTTP status used when an error surfaces through the HTTP API
 */
export function getHttpStatus(code: ErrorCode): number {
  const statuses: Record<ErrorCode, number> = {
    [ErrorCode.SERIAL_NOT_CONNECTED]: 503,
    [ErrorCode.SERIAL_WRITE_FAILED]: 500,
    [ErrorCode.SERIAL_OPEN_FAILED]: 503,
    [ErrorCode.BRIDGE_UNREACHABLE]: 502,
    [ErrorCode.INVALID_JSON]: 400,
    [ErrorCode.INVALID_REQUEST]: 400,
    [ErrorCode.MISSING_TOPIC]: 400,
    [ErrorCode.CONFIG_INVALID]: 500,
    [ErrorCode.CONNECTION_LIMIT_REACHED]: 503,
    [ErrorCode.NOT_FOUND]: 404,
    [ErrorCode.INTERNAL_ERROR]: 500,
  };
  return statuses[code];
}

/**
 * Bridge error class with category metadata
 */
export class BridgeError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'BridgeError';
  }

  get category(): ErrorCategory {
    return getErrorCategory(this.code);
  }

  get recoverable(): boolean {
    return isRecoverable(this.code);
  }

  get httpStatus(): number {
    return getHttpStatus(this.code);
  }

  toJSON() {
    return {
      code: this.code,
      category: this.category,
      message: this.message,
      details: this.details,
      recoverable: this.recoverable,
    };
  }
}

/**
 * Render any thrown value as a log-friendly message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
