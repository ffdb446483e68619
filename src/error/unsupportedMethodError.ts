import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a request method is not one the client can dispatch.
 */
export class UnsupportedMethodError extends Error {
  /** UnsupportedMethodError error-name */
  static name = 'UnsupportedMethodError';
  /** Method as it was given */
  #method: string;

  /** Creates a new instance of an UnsupportedMethodError for the rejected method */
  constructor(method: string, opts?: ErrorOptions) {
    super(`unsupported method ${method}`, opts);
    this.#method = method;
  }

  /** Method as it was given */
  get method(): string {
    return this.#method;
  }
}

/**
 * Type guard for {@link UnsupportedMethodError}.
 */
export function isUnsupportedMethodError(error: unknown): error is UnsupportedMethodError {
  return isErrorType(UnsupportedMethodError, error);
}
