import { ResourceClient } from '../core/client.js';
import { createSession } from '../core/session.js';
import type { UsageError } from '../error/usageError.js';
import { reportError, reportFailures } from './boundary.js';
import { COMMENT_HEADER } from './config.js';
import { loadData } from './data.js';
import { dispatch } from './dispatch.js';
import { type CliIO, processIO } from './io.js';
import { parseOptions } from './options.js';
import { formatJson } from './output.js';

/**
 * Runs the CLI once: parse options, load the payload, send the request, print the response.
 *
 * Resolves to the process exit status: `1` for usage errors, `0` otherwise, including
 * request failures, which are printed and count as handled.
 *
 * @param argv - Arguments without the node and script entries.
 */
export async function main(argv: readonly string[], io: CliIO = processIO): Promise<number> {
  const [errOptions, outcome] = await parseOptions(argv);
  if (errOptions) {
    io.write(errOptions.message);
    io.write('Run with --help for usage.');
    return errOptions.exitCode;
  }

  if (outcome.kind === 'exit') {
    io.write(outcome.output);
    return 0;
  }

  const { config } = outcome;
  const [errData, payload] = await loadData(config, io);
  if (errData) {
    io.write(errData.message);
    return errData.exitCode;
  }

  const reportOptions = { traceback: config.traceback, write: io.write };
  const [errSession, session] = await createSession({
    verify: config.verify,
    headers: config.comment === undefined ? undefined : { [COMMENT_HEADER]: config.comment },
    dispatcher: io.dispatcher,
  });
  if (errSession) {
    const usageError = await reportError(new Error('error creating session in main', { cause: errSession }), reportOptions);
    return exitStatus(usageError, io);
  }

  // Failures are printed before closing: an unread error body holds the connection open.
  try {
    const usageError = await reportFailures(async () => {
      const client = new ResourceClient({ server: config.server, session });
      const [errDispatch, response] = await dispatch({
        resource: client.resource(config.resource),
        method: config.method,
        payload,
        headers: session.headers,
        debug: config.debug,
        write: io.write,
      });
      if (errDispatch) {
        return [errDispatch, null];
      }

      io.write(formatJson(response));
      return [null, undefined];
    }, reportOptions);

    return exitStatus(usageError, io);
  } finally {
    await session.close();
  }
}

function exitStatus(usageError: UsageError | null, io: CliIO): number {
  if (!usageError) {
    return 0;
  }

  io.write(usageError.message);
  return usageError.exitCode;
}
