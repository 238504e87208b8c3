// Error taxonomy for page extraction.
// Fatal errors are thrown to the caller; ExtractionFailure is only ever recorded.

export enum ErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  SESSION_ACQUISITION = 'SESSION_ACQUISITION',
  NAVIGATION = 'NAVIGATION',
  ELEMENT_NOT_FOUND = 'ELEMENT_NOT_FOUND',
  SESSION_CLOSED = 'SESSION_CLOSED',
  EXTRACTION = 'EXTRACTION',
}

export class WebParserError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'WebParserError';
  }
}

export class ConfigurationError extends WebParserError {
  constructor(message: string, public readonly problems: string[] = []) {
    super(message, ErrorCode.CONFIG_INVALID);
    this.name = 'ConfigurationError';
  }
}

export class SessionAcquisitionError extends WebParserError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCode.SESSION_ACQUISITION, cause);
    this.name = 'SessionAcquisitionError';
  }
}

export class NavigationError extends WebParserError {
  constructor(public readonly address: string, cause?: unknown) {
    super(`Failed to load ${address}: ${describeError(cause)}`, ErrorCode.NAVIGATION, cause);
    this.name = 'NavigationError';
  }
}

export class ElementNotFoundError extends WebParserError {
  constructor(public readonly locator: string) {
    super(`No element matches ${locator}`, ErrorCode.ELEMENT_NOT_FOUND);
    this.name = 'ElementNotFoundError';
  }
}

export class SessionClosedError extends WebParserError {
  constructor(operation: string) {
    super(`Cannot ${operation}: browser session is closed`, ErrorCode.SESSION_CLOSED);
    this.name = 'SessionClosedError';
  }
}

/**
 * Record of a single routine that failed during a run, either by returning a
 * message or by throwing.
 */
export class ExtractionFailure extends WebParserError {
  constructor(
    public readonly routine: string,
    message: string,
    cause?: unknown
  ) {
    super(message, ErrorCode.EXTRACTION, cause);
    this.name = 'ExtractionFailure';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
