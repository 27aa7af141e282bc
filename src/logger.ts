/**
 * Logging surface shared by the collector and the git adapters. Only
 * diagnostics are logged; user-facing errors are printed by the CLI.
 */
export interface Logger {
  debug(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Emit debug messages (default: false) */
  verbose?: boolean;
  /** Prepended to every line, e.g. "[diffstat-status]" */
  prefix?: string;
}

/**
 * Logger writing to stderr through console.error, so stdout stays reserved
 * for the report.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { verbose = false, prefix } = options;
  const format = (message: string) => (prefix ? `${prefix} ${message}` : message);

  return {
    debug(message) {
      if (verbose) {
        console.error(format(message));
      }
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
};
