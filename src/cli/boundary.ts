import { getHttpError } from '../error/httpError.js';
import { causeChain } from '../error/unwrapErrorType.js';
import { getUsageError, type UsageError } from '../error/usageError.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/** Options for {@link reportFailures}. */
export interface ReportOptions {
  /** Also print the stack of the error and of each of its causes. */
  traceback: boolean;
  /** Line writer for the report. */
  write: (line: string) => void;
}

/**
 * Joins the messages of an error and its causes, outermost first.
 */
export function describeError(err: Error): string {
  return causeChain(err)
    .map((link) => link.message)
    .filter(Boolean)
    .join(': ');
}

async function report(err: Error, { traceback, write }: ReportOptions) {
  const httpError = getHttpError(err);
  if (httpError) {
    write(String(httpError.status));
    const [errBody, body] = await safeWrapAsync(() => httpError.response.text());
    write(errBody ? `error reading response body: ${errBody.message}` : body);
  } else {
    write(describeError(err));
  }

  if (!traceback) {
    return;
  }

  for (const [index, link] of causeChain(err).entries()) {
    const stack = link.stack ?? `${link.name}: ${link.message}`;
    write(index === 0 ? stack : `Caused by: ${stack}`);
  }
}

/**
 * Prints a failure: for an HTTP error the status code and response body, otherwise the message
 * chain, plus stacks under `traceback`. The failure then counts as handled.
 * A {@link UsageError} is not printed and is resolved to the caller instead.
 */
export async function reportError(err: Error, opts: ReportOptions): Promise<UsageError | null> {
  const usageError = getUsageError(err);
  if (usageError) {
    return usageError;
  }

  await report(err, opts);
  return null;
}

/**
 * Runs a task and reports its returned or thrown error through {@link reportError}.
 */
export async function reportFailures(
  task: () => SafeWrapAsync<Error, void>,
  opts: ReportOptions,
): Promise<UsageError | null> {
  const [errThrown, outcome] = await safeWrapAsync(task);
  const err = errThrown ? errThrown : outcome[0];
  if (!err) {
    return null;
  }

  return reportError(err, opts);
}
