export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

const PREFIX = '[lingolayer]';

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.DEBUG?.includes('lingolayer') ?? false;
}

/**
 * Console-backed logger. Debug lines are only printed when `DEBUG` mentions lingolayer.
 */
export function createConsoleLogger(options: { debug?: boolean } = {}): Logger {
  const debug = options.debug ?? isDebugEnabled();
  return {
    debug(message) {
      if (debug) {
        console.log(`${PREFIX} ${message}`);
      }
    },
    info(message) {
      console.log(`${PREFIX} ${message}`);
    },
    warn(message) {
      console.warn(`${PREFIX} ${message}`);
    },
    error(message, error) {
      if (error === undefined) {
        console.error(`${PREFIX} ${message}`);
        return;
      }
      console.error(`${PREFIX} ${message}`, error);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export const defaultLogger: Logger = createConsoleLogger();
