/**
 * Clockwork MCP - Custom Error Types
 * Specialized error classes surfaced to tool callers
 */

export class ClockworkError extends Error {
  constructor(
    message: string,
    public code: string = 'UNKNOWN_ERROR',
    public statusCode: number = 500
  ) {
    super(message);
    this.name = 'ClockworkError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidArgumentError extends ClockworkError {
  constructor(
    message: string,
    public field?: string,
    public value?: unknown
  ) {
    super(message, 'INVALID_ARGUMENT', 400);
    this.name = 'InvalidArgumentError';
  }
}

export class FormatMismatchError extends ClockworkError {
  constructor(
    public input: string,
    public expectedFormat: string
  ) {
    super(
      `Time data '${input}' does not match format '${expectedFormat}'`,
      'FORMAT_MISMATCH',
      400
    );
    this.name = 'FormatMismatchError';
  }
}

export class ConfigurationError extends ClockworkError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', 500);
    this.name = 'ConfigurationError';
  }
}
