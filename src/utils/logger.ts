/**
 * @fileoverview Buffer logger
 * @description Tracing and warnings are written only while verbose output is
 * on (CHUNKED_BUFFER_DEBUG=1 at load, or setDebug); errors always are.
 */

interface Logger {
  debug(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setDebug(enable: boolean): void;
}

let verbose: boolean = process.env.CHUNKED_BUFFER_DEBUG === '1';

const logger: Logger = {
  debug(...args: unknown[]): void {
    // eslint-disable-next-line no-console
    if (verbose) console.log(...args);
  },

  warn(...args: unknown[]): void {
    // eslint-disable-next-line no-console
    if (verbose) console.warn(...args);
  },

  error(...args: unknown[]): void {
    // eslint-disable-next-line no-console
    console.error(...args);
  },

  setDebug(enable: boolean): void {
    verbose = enable;
  }
};

export { logger, type Logger };
