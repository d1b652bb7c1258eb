export enum ErrorCode {
  ConfigError = 'ConfigError',
  TransportError = 'TransportError',
  ExtractionError = 'ExtractionError',
  ParseValueError = 'ParseValueError',
  ValidationError = 'ValidationError',
  BackendRejectionError = 'BackendRejectionError',
  NotificationError = 'NotificationError',
  InternalError = 'InternalError',
}

export interface ScraperError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export function createError(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): ScraperError {
  const result: ScraperError = {
    code,
    message,
  };

  if (details !== undefined) {
    result.details = details;
  }

  return result;
}
