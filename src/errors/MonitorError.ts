/**
 * Base error class for the inactivity monitor
 */
export class MonitorError extends Error {
  public readonly code: string;
  public readonly originalError?: Error;

  constructor(code: string, message: string, originalError?: Error) {
    super(message);
    this.name = 'MonitorError';
    this.code = code;
    this.originalError = originalError;

    Error.captureStackTrace?.(this, new.target);
  }
}

/**
 * The activity store could not be read. Fatal to the cycle.
 */
export class StoreUnavailableError extends MonitorError {
  constructor(message: string, originalError?: Error) {
    super('STORE_UNAVAILABLE', message, originalError);
    this.name = 'StoreUnavailableError';
  }
}

/**
 * One recipient's send failed. Recovered locally by the dispatcher.
 */
export class TransportError extends MonitorError {
  public readonly recipient: string;

  constructor(recipient: string, message: string, originalError?: Error) {
    super('TRANSPORT_FAILED', message, originalError);
    this.name = 'TransportError';
    this.recipient = recipient;
  }
}

export class AuditWriteError extends MonitorError {
  public readonly cycleId: string;
  public readonly recipient: string;

  constructor(cycleId: string, recipient: string, originalError?: Error) {
    super(
      'AUDIT_WRITE_FAILED',
      `Failed to append audit entry for ${recipient} in cycle ${cycleId}: ${originalError?.message ?? 'unknown error'}`,
      originalError
    );
    this.name = 'AuditWriteError';
    this.cycleId = cycleId;
    this.recipient = recipient;
  }
}

export class AuditReadError extends MonitorError {
  constructor(cycleId: string, originalError?: Error) {
    super(
      'AUDIT_READ_FAILED',
      `Failed to read audit entries for cycle ${cycleId}: ${originalError?.message ?? 'unknown error'}`,
      originalError
    );
    this.name = 'AuditReadError';
  }
}

export class ReportPersistError extends MonitorError {
  public readonly targetPath: string;

  constructor(targetPath: string, originalError?: Error) {
    super(
      'REPORT_PERSIST_FAILED',
      `Failed to write report ${targetPath}: ${originalError?.message ?? 'unknown error'}`,
      originalError
    );
    this.name = 'ReportPersistError';
    this.targetPath = targetPath;
  }
}

export class ConfigurationError extends MonitorError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super('INVALID_CONFIGURATION', `Invalid monitor configuration: ${errors.join('; ')}`);
    this.name = 'ConfigurationError';
    this.errors = errors;
  }
}

/**
 * Normalise anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * One-line description of a thrown value, suitable for an outcome reason
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

/**
 * Like describeError(), but for a MonitorError wrapping another error
 * describes the wrapped one
 */
export function describeRootCause(error: unknown): string {
  if (error instanceof MonitorError && error.originalError) {
    return describeError(error.originalError);
  }
  return describeError(error);
}

interface LoggedError {
  message: string;
  name: string;
  stack?: string;
  code?: string;
  cause?: LoggedError;
}

/**
 * Utility class for formatting errors
 */
export class ErrorFormatter {
  /**
   * Generates detailed technical error information for logs
   */
  static formatErrorForLogs(error: unknown): LoggedError {
    const err = toError(error);
    const result: LoggedError = {
      message: err.message || 'Unknown error',
      name: err.name || 'Error',
      stack: err.stack
    };

    if (err instanceof MonitorError) {
      result.code = err.code;

      if (err.originalError) {
        result.cause = this.formatErrorForLogs(err.originalError);
      }
    }

    return result;
  }
}
