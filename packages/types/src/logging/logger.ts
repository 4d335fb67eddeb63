/**
 * Stage logger. Lines go to stderr tagged `[INFO]`, `[WARN]`, `[ERROR]` so
 * stdout stays free for command output.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  return {
    debug: (message) => {
      if (verbose) console.error(`[DEBUG] ${message}`);
    },
    info: (message) => console.error(`[INFO] ${message}`),
    warn: (message) => console.error(`[WARN] ${message}`),
    error: (message) => console.error(`[ERROR] ${message}`),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
