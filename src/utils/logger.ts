export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/**
 * Console logger tagged with a component name. Debug lines print only when `debug` is set.
 */
export function createLogger(component: string, debug = false): Logger {
  const prefix = `[${component}]`;
  return {
    info(message: string) {
      console.log(`${prefix} ${message}`);
    },
    warn(message: string) {
      console.warn(`${prefix} ${message}`);
    },
    error(message: string) {
      console.error(`${prefix} ${message}`);
    },
    debug(message: string) {
      if (debug) console.debug(`${prefix} ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
  debug() {},
};
