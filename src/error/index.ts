/**
 * Error entrypoint: exports the typed errors raised by the catalog client and CLI,
 * plus helpers for identifying and unwrapping them from a cause chain.
 * @module
 */

/** Error representing a non-2xx HTTP response, with its guard and extractor. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error raised for a request method the dispatcher cannot handle. */
export { isUnsupportedMethodError, UnsupportedMethodError } from './unsupportedMethodError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { causeChain, type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Error for invalid command-line input, carrying the exit status. */
export { getUsageError, isUsageError, UsageError } from './usageError.js';
/** Error thrown when validation of options fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
