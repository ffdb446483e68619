import { text } from 'node:stream/consumers';
import type { Dispatcher } from 'undici';

/** Everything the CLI touches outside its own arguments. */
export interface CliIO {
  /** Writes one line to standard output. Results and diagnostics alike go here. */
  write: (line: string) => void;
  /** Reads standard input to its end. */
  readStdin: () => Promise<string>;
  /** Dispatcher requests go through instead of the TLS-configured one. */
  dispatcher?: Dispatcher;
}

/** Process-backed {@link CliIO}. */
export const processIO: CliIO = {
  write: (line) => console.log(line),
  readStdin: () => text(process.stdin),
};
