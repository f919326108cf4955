/**
 * Error types for request building and execution.
 */

/**
 * Reasons a request description can fail to build.
 */
export enum BuildErrorKind {
  /** Resolved URL lacks a scheme or a host. */
  InvalidUrl = 'invalid_url',
  /** The parameter encoder raised, or none was registered. */
  EncodingFailure = 'encoding_failure',
}

/**
 * Raised synchronously by `build()`. No partially built request accompanies it.
 */
export class BuildError extends Error {
  readonly kind: BuildErrorKind;
  /** URL or encoding token the failure relates to. */
  readonly subject: string;
  readonly cause?: unknown;

  constructor(kind: BuildErrorKind, message: string, subject: string, cause?: unknown) {
    super(message);
    this.name = 'BuildError';
    this.kind = kind;
    this.subject = subject;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BuildError);
    }
  }

  static invalidUrl(url: string, cause?: unknown): BuildError {
    return new BuildError(
      BuildErrorKind.InvalidUrl,
      `Invalid request URL '${url}': a scheme and a host are required`,
      url,
      cause
    );
  }

  static encodingFailure(encoding: string, cause?: unknown): BuildError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new BuildError(
      BuildErrorKind.EncodingFailure,
      `Failed to encode parameters as ${encoding}: ${reason}`,
      encoding,
      cause
    );
  }
}

/**
 * Failure categories reported by the bundled transport.
 */
export enum TransportErrorCode {
  /** Connection or protocol failure. */
  Network = 'network_error',
  /** The configured timeout elapsed. */
  Timeout = 'timeout_error',
  /** The caller aborted the request. */
  Aborted = 'aborted',
}

/**
 * Raised by the bundled transport. Custom loaders raise whatever they like;
 * the execution layer never wraps or reinterprets it.
 */
export class TransportError extends Error {
  readonly code: TransportErrorCode;
  readonly url?: string;
  readonly cause?: unknown;

  constructor(code: TransportErrorCode, message: string, details: { url?: string; cause?: unknown } = {}) {
    super(message);
    this.name = 'TransportError';
    this.code = code;
    this.url = details.url;
    this.cause = details.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TransportError);
    }
  }

  static network(url: string, cause?: unknown): TransportError {
    const reason = cause instanceof Error ? cause.message : 'unknown network error';
    return new TransportError(TransportErrorCode.Network, `Network error for ${url}: ${reason}`, {
      url,
      cause,
    });
  }

  static timeout(url: string, timeoutMs: number): TransportError {
    return new TransportError(
      TransportErrorCode.Timeout,
      `Request to ${url} timed out after ${timeoutMs}ms`,
      { url }
    );
  }

  static aborted(url: string, cause?: unknown): TransportError {
    return new TransportError(TransportErrorCode.Aborted, `Request to ${url} was aborted`, {
      url,
      cause,
    });
  }
}

/**
 * Raised when configuration fails validation.
 */
export class ConfigurationError extends Error {
  /** Offending configuration fields. */
  readonly fields: string[];

  constructor(message: string, fields: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.fields = fields;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}

/**
 * Type guard for BuildError.
 */
export function isBuildError(error: unknown): error is BuildError {
  return error instanceof BuildError;
}

/**
 * Type guard for TransportError.
 */
export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}
