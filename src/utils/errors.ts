export type CaptureErrorKind =
  | 'configuration'
  | 'connection'
  | 'authentication'
  | 'protocol'
  | 'timeout'
  | 'encoding';

export class CaptureError extends Error {
  readonly kind: CaptureErrorKind;

  constructor(kind: CaptureErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CaptureError';
    this.kind = kind;
  }
}

// Unsupported format or method, bad environment. Raised before any network activity.
export class ConfigurationError extends CaptureError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('configuration', message, options);
    this.name = 'ConfigurationError';
  }
}

export class ConnectionError extends CaptureError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('connection', message, options);
    this.name = 'ConnectionError';
  }
}

export class AuthenticationError extends CaptureError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('authentication', message, options);
    this.name = 'AuthenticationError';
  }
}

export class ProtocolError extends CaptureError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('protocol', message, options);
    this.name = 'ProtocolError';
  }
}

export class TimeoutError extends CaptureError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('timeout', message, options);
    this.name = 'TimeoutError';
  }
}

export class EncodingError extends CaptureError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('encoding', message, options);
    this.name = 'EncodingError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Wraps anything thrown into a CaptureError, keeping existing ones as they are.
 */
export function toCaptureError(
  error: unknown,
  wrap: (message: string, options: { cause: unknown }) => CaptureError,
): CaptureError {
  if (error instanceof CaptureError) return error;
  return wrap(describeError(error), { cause: error });
}
