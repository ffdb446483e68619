import yargs from 'yargs';
import { UsageError } from '../error/usageError.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, toError } from '../utils/wrap.js';
import { NAME, VERSION } from '../version.js';
import { type Configuration, configurationSchema } from './config.js';

/** Result of parsing the command line: run a request, or just show what yargs printed. */
export type ParseOutcome = { kind: 'run'; config: Configuration } | { kind: 'exit'; output: string };

/**
 * Declares the command-line surface. Every option can also come from a
 * `CATALOG_`-prefixed environment variable, e.g. `CATALOG_SERVER`.
 */
export function createParser() {
  return yargs()
    .scriptName(NAME)
    .usage('$0 -s <server> [-x <method>] [-r <resource>] [-d <json> | -f <file>]')
    .env('CATALOG')
    .option('server', {
      alias: 's',
      type: 'string',
      description: 'Catalog server address',
      demandOption: true,
    })
    .option('insecure', {
      alias: 'k',
      type: 'boolean',
      description: 'Do not verify the server certificate (conflicts with --ca-cert)',
    })
    .option('ca-cert', {
      type: 'string',
      description: 'CA bundle to verify the server certificate against',
    })
    .option('request', {
      alias: 'x',
      type: 'string',
      description: 'Request method: GET, POST, PUT, PATCH or DELETE',
      default: 'GET',
    })
    .option('resource', {
      alias: 'r',
      type: 'string',
      description: 'Resource path; empty for the API root',
      default: '',
    })
    .option('data', {
      alias: 'd',
      type: 'string',
      description: 'Request data as inline JSON',
    })
    .option('file', {
      alias: 'f',
      type: 'string',
      description: 'Read request data from a JSON file, - for standard input (conflicts with --data)',
    })
    .option('traceback', {
      alias: 't',
      type: 'boolean',
      description: 'Print the full error chain on failure',
      default: false,
    })
    .option('debug', {
      type: 'boolean',
      description: 'Print the request method, URL and headers before sending',
      default: false,
    })
    .option('comment', {
      alias: 'c',
      type: 'string',
      description: 'Change comment sent with the request',
    })
    .version(VERSION)
    .alias('version', 'V')
    .help()
    .alias('help', 'h');
}

/**
 * Parses command-line arguments (without the node and script entries) into a {@link Configuration}.
 *
 * `--help` and `--version` resolve to an `exit` outcome carrying the text to print. Invalid or
 * conflicting flags and failed validation resolve to a {@link UsageError}.
 */
export async function parseOptions(argv: readonly string[]): SafeWrapAsync<UsageError, ParseOutcome> {
  const [errParse, args, output] = await new Promise<[Error | undefined, unknown, string]>((resolve) => {
    createParser().parse(argv, {}, (err, parsed, text) => {
      void Promise.resolve(parsed).then(
        (resolved) => resolve([err, resolved, text]),
        (rejected: unknown) => resolve([toError(rejected), null, text]),
      );
    });
  });

  if (errParse) {
    return [new UsageError(errParse.message, { cause: errParse }), null];
  }

  if (output) {
    return [null, { kind: 'exit', output }];
  }

  const [errValidate, config] = await validator(args, configurationSchema);
  if (errValidate) {
    return [new UsageError(`invalid options: ${errValidate.message}`, { cause: errValidate }), null];
  }

  return [null, { kind: 'run', config }];
}
