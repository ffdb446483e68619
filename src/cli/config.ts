import { z } from 'zod';
import type { VerifyOption } from '../types/request.js';

/** Header carrying the `--comment` text. */
export const COMMENT_HEADER = 'X-Change-Comment';

/** Settings for one run of the CLI. Frozen once built. */
export interface Configuration {
  /** Server address, the base of every resource URL. */
  readonly server: string;
  /** Resource path below the API root; empty for the root itself. */
  readonly resource: string;
  /** Request method as given, matched case-insensitively on dispatch. */
  readonly method: string;
  /** TLS verification mode. */
  readonly verify: VerifyOption;
  /** Print the error chain with stacks for caught failures. */
  readonly traceback: boolean;
  /** Print request diagnostics before the call. */
  readonly debug: boolean;
  /** Change comment sent in {@link COMMENT_HEADER}. */
  readonly comment?: string;
  /** Inline JSON payload. */
  readonly data?: string;
  /** Path of a JSON payload, `-` for standard input. */
  readonly file?: string;
}

/**
 * Schema turning parsed command-line arguments into a {@link Configuration}.
 * Keys match the camel-cased option names yargs produces; unknown keys are dropped.
 */
export const configurationSchema = z
  .object({
    server: z.string().trim().min(1, 'server address is required'),
    insecure: z.boolean().default(false),
    caCert: z.string().min(1, 'CA bundle path must not be empty').optional(),
    request: z.string().trim().min(1, 'request method must not be empty').default('GET'),
    resource: z.string().default(''),
    data: z.string().optional(),
    file: z.string().min(1, 'file path must not be empty').optional(),
    traceback: z.boolean().default(false),
    debug: z.boolean().default(false),
    comment: z.string().optional(),
  })
  .superRefine((args, ctx) => {
    if (args.insecure && args.caCert !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: '--insecure and --ca-cert are mutually exclusive' });
    }

    if (args.data !== undefined && args.file !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: '--data and --file are mutually exclusive' });
    }
  })
  .transform(
    (args): Configuration =>
      Object.freeze({
        server: args.server,
        resource: args.resource,
        method: args.request,
        verify: args.insecure ? false : (args.caCert ?? true),
        traceback: args.traceback,
        debug: args.debug,
        comment: args.comment,
        data: args.data,
        file: args.file,
      }),
  );
