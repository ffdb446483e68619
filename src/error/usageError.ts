import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error for invalid command-line input: bad flags, an unreadable or malformed payload,
 * or a payload of the wrong shape for the request method. Terminates the program.
 */
export class UsageError extends Error {
  /** UsageError error-name */
  static name = 'UsageError';
  /** Process exit status to report */
  #exitCode: number;

  /** Creates a new instance of a UsageError, exiting with status 1 unless told otherwise */
  constructor(message: string, opts?: ErrorOptions & { exitCode?: number }) {
    super(message, opts);
    this.#exitCode = opts?.exitCode ?? 1;
  }

  /** Process exit status to report */
  get exitCode(): number {
    return this.#exitCode;
  }
}

/**
 * Type guard for {@link UsageError}.
 */
export function isUsageError(error: unknown): error is UsageError {
  return isErrorType(UsageError, error);
}

/**
 * Extract a {@link UsageError} from an unknown error value, following nested causes.
 */
export function getUsageError(error: unknown): null | UsageError {
  return unwrapErrorType(UsageError, error);
}
